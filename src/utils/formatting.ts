import type {
  BaselineStat,
  BucketSummary,
  ClaimedDeal,
  Deal,
  DetectorOutcome,
} from "../services/types.js";
import type { CycleReport } from "../services/scan-cycle.js";
import { daysBetween } from "./dates.js";

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function money(amount: number | null, currency: string): string {
  return amount === null ? "-" : `${amount.toFixed(2)} ${currency}`;
}

export function formatDealMessage(deal: Deal): string {
  const stay = daysBetween(deal.outbound_date, deal.return_date);
  const lines = [
    `✈️ Deal: ${deal.origin} → ${deal.destination}`,
    `Price: ${money(deal.observed_price, deal.currency)} (usual ~${money(deal.baseline_price, deal.currency)}, -${formatPercent(deal.discount_ratio)})`,
    `Dates: ${deal.outbound_date} → ${deal.return_date}${stay !== null ? ` (${stay} days)` : ""}`,
  ];
  if (deal.carrier) lines.push(`Carrier: ${deal.carrier}`);
  lines.push(`Based on ${deal.observation_count} observations`);
  return lines.join("\n");
}

export function formatOutcome(outcome: DetectorOutcome, currency: string): string {
  switch (outcome.kind) {
    case "no_baseline":
      return "No baseline yet: not enough observations in this month's bucket.";
    case "price_above_cap":
      return `Price above cap: ${money(outcome.price, currency)} > ${money(outcome.max_price, currency)}.`;
    case "insufficient_discount":
      return outcome.discount_ratio === null
        ? "Insufficient discount: baseline is not positive."
        : `Insufficient discount: ${formatPercent(outcome.discount_ratio)} below baseline.`;
    case "deal":
      return `**Deal**\n\n${formatDealMessage(outcome.deal)}`;
  }
}

export function formatBucketSummary(
  summary: BucketSummary,
  baseline: BaselineStat | null,
  minObservations: number,
  currency: string
): string {
  const { route, month, year } = summary;
  const lines: string[] = [];
  lines.push(`## ${route.origin} → ${route.destination}, ${year}-${String(month).padStart(2, "0")}\n`);
  lines.push("| Observations | Median | Mean | Min | Max |");
  lines.push("|--------------|--------|------|-----|-----|");
  lines.push(
    `| ${summary.count} | ${money(summary.median, currency)} | ${money(summary.mean, currency)} | ${money(summary.min, currency)} | ${money(summary.max, currency)} |`
  );
  lines.push("");
  lines.push(
    baseline
      ? `Baseline: **${money(baseline.median, currency)}** over ${baseline.count} observations.`
      : `No baseline: ${summary.count}/${minObservations} observations.`
  );
  return lines.join("\n");
}

export function formatClaimsTable(claims: ClaimedDeal[]): string {
  if (claims.length === 0) return "No deals notified yet.";

  const lines: string[] = [];
  lines.push(`Last **${claims.length}** notified deals:\n`);
  lines.push("| # | Route | Dates | Price | Baseline | Discount | Carrier | Notified |");
  lines.push("|---|-------|-------|-------|----------|----------|---------|----------|");

  for (let i = 0; i < claims.length; i++) {
    const c = claims[i];
    lines.push(
      `| ${i + 1} | ${c.origin}→${c.destination} | ${c.outbound_date} → ${c.return_date} | **${money(c.observed_price, c.currency)}** | ${money(c.baseline_price, c.currency)} | ${formatPercent(c.discount_ratio)} | ${c.carrier || "-"} | ${c.claimed_at.replace("T", " ").slice(0, 16)} |`
    );
  }

  return lines.join("\n");
}

export function formatCycleReport(report: CycleReport): string {
  const lines: string[] = [];
  lines.push(`## Scan cycle ${report.aborted ? "(aborted)" : "complete"}\n`);
  lines.push(`Routes: ${report.routes}, date pairs: ${report.date_pairs}`);
  lines.push(`Fares fetched: ${report.fetched}, recorded: ${report.recorded}, rejected: ${report.rejected}`);
  lines.push(
    `Outcomes: ${report.outcomes.deal} deals, ${report.outcomes.no_baseline} without baseline, ${report.outcomes.price_above_cap} above cap, ${report.outcomes.insufficient_discount} insufficient discount`
  );
  lines.push(
    `Notified: ${report.notified}, already claimed: ${report.already_claimed}, delivery failures: ${report.delivery_failures}`
  );
  if (report.failed_routes.length > 0) {
    lines.push("");
    lines.push("Failed routes:");
    for (const f of report.failed_routes) lines.push(`- ${f.route}: ${f.error}`);
  }
  return lines.join("\n");
}
