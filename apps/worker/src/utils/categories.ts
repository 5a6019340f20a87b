import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CATEGORIES, type Category } from "@movewatch/shared";
import { z } from "zod";
import { buildMarketText } from "./market-text.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const KEYWORDS_PATH = path.resolve(__dirname, "../../data/category-keywords.json");

const keywordFileSchema = z.record(z.enum(CATEGORIES), z.array(z.string().min(1)));

export type CategoryKeywords = Partial<Record<Category, string[]>>;

type CompiledCategory = { category: Category; patterns: RegExp[] };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileKeyword(keyword: string): RegExp {
  const body = escapeRegExp(keyword.trim().toLowerCase()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "u");
}

export function loadCategoryKeywords(filePath: string = KEYWORDS_PATH): CategoryKeywords {
  const raw = readFileSync(filePath, "utf-8");
  return keywordFileSchema.parse(JSON.parse(raw));
}

export class CategoryClassifier {
  private readonly compiled: CompiledCategory[];

  constructor(keywords: CategoryKeywords) {
    this.compiled = CATEGORIES.map((category) => ({
      category,
      patterns: (keywords[category] ?? []).map(compileKeyword)
    })).filter((entry) => entry.patterns.length > 0);
  }

  /** Tags matched against the combined, normalized question and description. */
  classify(question: string, description?: string | null): Category[] {
    const text = buildMarketText(question, description);
    return this.compiled
      .filter(({ patterns }) => patterns.some((pattern) => pattern.test(text)))
      .map(({ category }) => category);
  }
}

let defaultClassifier: CategoryClassifier | null = null;

export function getDefaultCategoryClassifier(): CategoryClassifier {
  if (!defaultClassifier) defaultClassifier = new CategoryClassifier(loadCategoryKeywords());
  return defaultClassifier;
}
