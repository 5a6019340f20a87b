import { daysAfter, toPct, type Signal } from "@movewatch/shared";
import {
  gateLookbackMs,
  selectAlerts,
  type RateGateOptions
} from "../analysis/rate-gate.js";
import { marketUrl } from "../providers/polymarket.js";
import type { AlertStore } from "../stores/alerts.js";

export const ALERT_TTL_DAYS = 365;
const MAX_QUESTION_LENGTH = 180;

export interface AlertPayload {
  signal: Signal;
  text: string;
  url: string | null;
}

export interface AlertSink {
  readonly name: string;
  /** Delivers in order; resolves with the payloads that went out. */
  deliver(payloads: readonly AlertPayload[]): Promise<AlertPayload[]>;
}

/** Used when no delivery channel is configured; alerts still count against the rate gate. */
export class ConsoleAlertSink implements AlertSink {
  readonly name = "console";

  async deliver(payloads: readonly AlertPayload[]): Promise<AlertPayload[]> {
    for (const payload of payloads) {
      console.info(`[alerts] ${payload.signal.marketId}\n${payload.text}`);
    }
    return [...payloads];
  }
}

export interface AlertDeps {
  alerts: AlertStore;
  sink: AlertSink;
}

export interface AlertSummary {
  candidates: number;
  suppressed: number;
  sent: number;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function formatAlert(signal: Signal): string {
  const arrow = signal.currentPrice >= signal.previousPrice ? "↑" : "↓";
  const change = `${(signal.priceChange * 100).toFixed(1)}pp`;
  const lines = [
    truncate(signal.question, MAX_QUESTION_LENGTH),
    "",
    `Outcome: ${signal.trackedOutcome}`,
    `Price: ${toPct(signal.currentPrice)} (${arrow}${change} from ${toPct(signal.previousPrice)} in ${signal.windowHours}h)`,
    `Signal: ${signal.type} / ${signal.strength} / confidence ${toPct(signal.confidence, 0)}`
  ];
  if (signal.predictedOutcome) lines.push(`Leaning: ${signal.predictedOutcome}`);

  const url = marketUrl(signal.slug);
  if (url) lines.push("", url);
  return lines.join("\n");
}

export function buildPayload(signal: Signal): AlertPayload {
  return { signal, text: formatAlert(signal), url: marketUrl(signal.slug) };
}

/** Gates ranked signals against recent alert history and hands the survivors to the sink. */
export async function runAlerts(
  deps: AlertDeps,
  ranked: readonly Signal[],
  options: RateGateOptions & { now: Date }
): Promise<AlertSummary> {
  if (ranked.length === 0) return { candidates: 0, suppressed: 0, sent: 0 };

  const recent = await deps.alerts.since(new Date(options.now.getTime() - gateLookbackMs(options)));
  const { selected, suppressed } = selectAlerts(ranked, recent, options.now, options);

  for (const entry of suppressed) {
    console.info(`[alerts] suppressed ${entry.signal.marketId}/${entry.signal.signalId}: ${entry.reason}`);
  }

  let delivered: AlertPayload[] = [];
  if (selected.length > 0) {
    try {
      delivered = await deps.sink.deliver(selected.map(buildPayload));
    } catch (error) {
      console.error(`[alerts] ${deps.sink.name} delivery failed`, error);
    }
  }

  for (const payload of delivered) {
    await deps.alerts.record(
      {
        marketId: payload.signal.marketId,
        signalId: payload.signal.signalId,
        sentAt: options.now,
        text: payload.text
      },
      daysAfter(options.now, ALERT_TTL_DAYS)
    );
  }

  const summary = { candidates: ranked.length, suppressed: suppressed.length, sent: delivered.length };
  console.info(`[alerts] candidates=${summary.candidates} suppressed=${summary.suppressed} sent=${summary.sent}`);
  return summary;
}
