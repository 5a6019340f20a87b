export function normalizeMarketText(value: string): string {
  return value
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{N}\s:$&+.-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function buildMarketText(question: string, description: string | null | undefined): string {
  const parts = [question];
  if (description) parts.push(description);
  return normalizeMarketText(parts.join(" "));
}
