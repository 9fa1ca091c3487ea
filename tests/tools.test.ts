import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app.js";
import type { App } from "../src/app.js";
import { parseConfig } from "../src/config.js";
import { ValidationError } from "../src/errors.js";
import { handleEvaluate } from "../src/tools/evaluate-fare.js";
import { handleBaseline } from "../src/tools/get-baseline.js";
import { handleListDeals } from "../src/tools/list-deals.js";
import { handleRunScan } from "../src/tools/run-scan.js";
import { NRT_HISTORY, RecordingSink, ScriptedFareSource, fare } from "./helpers.js";

// One route and, from 2026-10-18, the single date pair 2026-11-05/2026-11-12.
const env = {
  DB_PATH: ":memory:",
  SCAN_ORIGINS: "CDG",
  SCAN_DESTINATIONS: "NRT",
  MIN_STAY_DAYS: "7",
  MAX_STAY_DAYS: "7",
  MIN_DAYS_FROM_NOW: "18",
  MAX_DAYS_FROM_NOW: "25",
};

describe("MCP tool handlers", () => {
  let app: App;
  let source: ScriptedFareSource;
  let sink: RecordingSink;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    source = new ScriptedFareSource();
    sink = new RecordingSink();
    app = createApp(parseConfig(env), {
      source,
      sink,
      now: () => new Date("2026-10-18T06:00:00.000Z"),
    });
    for (const price of NRT_HISTORY) {
      await app.store.record(fare({ price }));
    }
  });

  afterEach(() => {
    app.close();
    vi.restoreAllMocks();
  });

  it("get_baseline shows the bucket statistics", async () => {
    const text = await handleBaseline({ origin: "cdg", destination: "nrt", month: 11, year: 2026 }, app);

    expect(text.split("\n")).toEqual([
      "## CDG → NRT, 2026-11",
      "",
      "| Observations | Median | Mean | Min | Max |",
      "|--------------|--------|------|-----|-----|",
      "| 10 | 413.50 EUR | 414.00 EUR | 400.00 EUR | 430.00 EUR |",
      "",
      "Baseline: **413.50 EUR** over 10 observations.",
    ]);
  });

  it("get_baseline reports a missing baseline for an empty month", async () => {
    const text = await handleBaseline({ origin: "CDG", destination: "NRT", month: 12, year: 2026 }, app);
    expect(text.endsWith("No baseline: 0/10 observations.")).toBe(true);
  });

  it("evaluate_fare judges without recording", async () => {
    const input = {
      origin: "CDG",
      destination: "NRT",
      outbound_date: "2026-11-05",
      return_date: "2026-11-12",
      price: 150,
    };

    const text = await handleEvaluate(input, app);

    expect(text.startsWith("**Deal**\n\n✈️ Deal: CDG → NRT")).toBe(true);
    expect((await app.store.bucketSummary({ origin: "CDG", destination: "NRT" }, 11, 2026)).count).toBe(10);
    expect(await handleEvaluate({ ...input, price: 250 }, app)).toBe(
      "Price above cap: 250.00 EUR > 200.00 EUR."
    );
  });

  it("evaluate_fare rejects a stay outside the configured bounds", async () => {
    const input = {
      origin: "CDG",
      destination: "NRT",
      outbound_date: "2026-11-05",
      return_date: "2026-11-15",
      price: 150,
    };
    await expect(handleEvaluate(input, app)).rejects.toBeInstanceOf(ValidationError);
  });

  it("run_scan_cycle notifies, then the deal shows up in list_claimed_deals and evaluate_fare", async () => {
    expect(await handleListDeals({ limit: 20 }, app)).toBe("No deals notified yet.");
    source.set(
      { origin: "CDG", destination: "NRT", outbound_date: "2026-11-05", return_date: "2026-11-12" },
      [150]
    );

    const report = await handleRunScan({}, app);

    expect(report).toContain("Notified: 1, already claimed: 0, delivery failures: 0");
    expect(source.queries).toHaveLength(1);
    expect(sink.sent).toHaveLength(1);

    const table = await handleListDeals({ limit: 20 }, app);
    expect(table.split("\n")[0]).toBe("Last **1** notified deals:");

    const evaluation = await handleEvaluate(
      { origin: "CDG", destination: "NRT", outbound_date: "2026-11-05", return_date: "2026-11-12", price: 150 },
      app
    );
    expect(evaluation.endsWith("\n\nThis exact fare was already notified.")).toBe(true);
  });
});
