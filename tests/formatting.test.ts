import { describe, expect, it } from "vitest";
import type { CycleReport } from "../src/services/scan-cycle.js";
import type { Deal } from "../src/services/types.js";
import {
  formatBucketSummary,
  formatClaimsTable,
  formatCycleReport,
  formatDealMessage,
  formatOutcome,
  formatPercent,
} from "../src/utils/formatting.js";

const deal: Deal = {
  fingerprint: "a".repeat(64),
  origin: "CDG",
  destination: "NRT",
  outbound_date: "2026-11-05",
  return_date: "2026-11-12",
  carrier: "",
  currency: "EUR",
  observed_price: 150,
  baseline_price: 413.5,
  discount_ratio: 1 - 150 / 413.5,
  observation_count: 10,
};

describe("formatting", () => {
  it("rounds percentages to one decimal", () => {
    expect(formatPercent(0.5)).toBe("50.0%");
    expect(formatPercent(1 - 150 / 413.5)).toBe("63.7%");
  });

  it("leaves the carrier line out when it is unknown", () => {
    expect(formatDealMessage(deal)).toBe(
      [
        "✈️ Deal: CDG → NRT",
        "Price: 150.00 EUR (usual ~413.50 EUR, -63.7%)",
        "Dates: 2026-11-05 → 2026-11-12 (7 days)",
        "Based on 10 observations",
      ].join("\n")
    );
  });

  it("describes each detector outcome", () => {
    expect(formatOutcome({ kind: "no_baseline" }, "EUR")).toBe(
      "No baseline yet: not enough observations in this month's bucket."
    );
    expect(formatOutcome({ kind: "price_above_cap", price: 210, max_price: 200 }, "EUR")).toBe(
      "Price above cap: 210.00 EUR > 200.00 EUR."
    );
    expect(formatOutcome({ kind: "insufficient_discount", discount_ratio: 0.25 }, "EUR")).toBe(
      "Insufficient discount: 25.0% below baseline."
    );
    expect(formatOutcome({ kind: "insufficient_discount", discount_ratio: null }, "EUR")).toBe(
      "Insufficient discount: baseline is not positive."
    );
    expect(formatOutcome({ kind: "deal", deal }, "EUR")).toBe(`**Deal**\n\n${formatDealMessage(deal)}`);
  });

  it("renders a bucket summary with and without a baseline", () => {
    const summary = {
      route: { origin: "CDG", destination: "NRT" },
      month: 3,
      year: 2027,
      count: 2,
      median: 250,
      mean: 250,
      min: 200,
      max: 300,
    };

    expect(formatBucketSummary(summary, null, 10, "EUR")).toBe(
      [
        "## CDG → NRT, 2027-03\n",
        "| Observations | Median | Mean | Min | Max |",
        "|--------------|--------|------|-----|-----|",
        "| 2 | 250.00 EUR | 250.00 EUR | 200.00 EUR | 300.00 EUR |",
        "",
        "No baseline: 2/10 observations.",
      ].join("\n")
    );
    expect(formatBucketSummary(summary, { median: 250, count: 2 }, 2, "EUR")).toMatch(
      /Baseline: \*\*250\.00 EUR\*\* over 2 observations\.$/
    );
  });

  it("lists claimed deals", () => {
    expect(formatClaimsTable([])).toBe("No deals notified yet.");

    const table = formatClaimsTable([{ ...deal, claimed_at: "2026-10-18T06:00:00.000Z" }]);
    expect(table.split("\n")[4]).toBe(
      "| 1 | CDG→NRT | 2026-11-05 → 2026-11-12 | **150.00 EUR** | 413.50 EUR | 63.7% | - | 2026-10-18 06:00 |"
    );
  });

  it("summarizes a cycle report with its failures", () => {
    const report: CycleReport = {
      started_at: "2026-10-18T06:00:00.000Z",
      finished_at: "2026-10-18T06:01:00.000Z",
      routes: 2,
      date_pairs: 3,
      fetched: 12,
      recorded: 11,
      rejected: 1,
      outcomes: { no_baseline: 5, price_above_cap: 4, insufficient_discount: 1, deal: 1 },
      notified: 1,
      already_claimed: 0,
      delivery_failures: 0,
      failed_routes: [{ route: "CDG→JFK", error: "Storage error during read bucket: disk I/O error" }],
      aborted: false,
    };

    expect(formatCycleReport(report)).toBe(
      [
        "## Scan cycle complete\n",
        "Routes: 2, date pairs: 3",
        "Fares fetched: 12, recorded: 11, rejected: 1",
        "Outcomes: 1 deals, 5 without baseline, 4 above cap, 1 insufficient discount",
        "Notified: 1, already claimed: 0, delivery failures: 0",
        "",
        "Failed routes:",
        "- CDG→JFK: Storage error during read bucket: disk I/O error",
      ].join("\n")
    );
  });
});
