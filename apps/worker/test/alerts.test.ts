import { describe, expect, it } from "vitest";
import { DEFAULT_RATE_GATE } from "../src/analysis/rate-gate.js";
import { formatAlert, runAlerts, type AlertPayload, type AlertSink } from "../src/tasks/alerts.js";
import { makeSignal, NOW } from "./support/fixtures.js";
import { MemoryAlertStore } from "./support/memory-stores.js";

class RecordingSink implements AlertSink {
  readonly name = "recording";
  readonly delivered: AlertPayload[] = [];
  fail = false;

  async deliver(payloads: readonly AlertPayload[]): Promise<AlertPayload[]> {
    if (this.fail) throw new Error("sink offline");
    this.delivered.push(...payloads);
    return [...payloads];
  }
}

describe("formatAlert", () => {
  it("renders the question, move, classification and link", () => {
    expect(formatAlert(makeSignal())).toBe(
      [
        "Will the test proposal pass?",
        "",
        "Outcome: Yes",
        "Price: 58.0% (↑18.0pp from 40.0% in 6h)",
        "Signal: PRICE_JUMP / STRONG / confidence 50%",
        "Leaning: Yes",
        "",
        "https://polymarket.com/market/test-proposal"
      ].join("\n")
    );
  });

  it("truncates long questions to 180 characters", () => {
    const text = formatAlert(makeSignal({ question: "a".repeat(200), slug: null, predictedOutcome: null }));
    const [firstLine] = text.split("\n");
    expect(firstLine).toBe(`${"a".repeat(177)}...`);
    expect(text).not.toContain("Leaning:");
    expect(text.endsWith("confidence 50%")).toBe(true);
  });

  it("points the arrow down for a fall", () => {
    const text = formatAlert(makeSignal({ type: "PRICE_DROP", currentPrice: 0.3, previousPrice: 0.5, priceChange: 0.2 }));
    expect(text.split("\n")[3]).toBe("Price: 30.0% (↓20.0pp from 50.0% in 6h)");
  });
});

describe("runAlerts", () => {
  const options = { ...DEFAULT_RATE_GATE, now: NOW };

  it("delivers gated signals and records them", async () => {
    const alerts = new MemoryAlertStore();
    const sink = new RecordingSink();
    const ranked = [
      makeSignal({ marketId: "mkt-1", signalId: "a" }),
      makeSignal({ marketId: "mkt-2", signalId: "b" })
    ];

    const summary = await runAlerts({ alerts, sink }, ranked, options);

    expect(summary).toEqual({ candidates: 2, suppressed: 1, sent: 1 });
    expect(sink.delivered.map((payload) => payload.signal.signalId)).toEqual(["a"]);
    expect(alerts.rows.map((row) => [row.value.signalId, row.value.sentAt])).toEqual([["a", NOW]]);
  });

  it("respects alerts recorded by earlier passes", async () => {
    const alerts = new MemoryAlertStore();
    await alerts.record(
      { marketId: "mkt-1", signalId: "old", sentAt: new Date(NOW.getTime() - 60 * 60_000), text: "earlier" },
      NOW
    );
    const sink = new RecordingSink();

    const summary = await runAlerts({ alerts, sink }, [makeSignal({ marketId: "mkt-1" })], options);

    expect(summary.sent).toBe(0);
    expect(sink.delivered).toHaveLength(0);
  });

  it("does not record alerts the sink failed to deliver", async () => {
    const alerts = new MemoryAlertStore();
    const sink = new RecordingSink();
    sink.fail = true;

    const summary = await runAlerts({ alerts, sink }, [makeSignal()], options);

    expect(summary.sent).toBe(0);
    expect(alerts.rows).toHaveLength(0);
  });

  it("does nothing without candidates", async () => {
    const summary = await runAlerts({ alerts: new MemoryAlertStore(), sink: new RecordingSink() }, [], options);
    expect(summary).toEqual({ candidates: 0, suppressed: 0, sent: 0 });
  });
});
