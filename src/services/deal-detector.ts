import { createHash } from "node:crypto";
import type { FareObservation } from "../providers/provider.js";
import type { BaselineStat, Deal, DetectorConfig, DetectorOutcome } from "./types.js";

type FingerprintFields = Pick<
  FareObservation,
  "origin" | "destination" | "outbound_date" | "return_date" | "price"
>;

/**
 * Deal identity. Price is fixed to cents so 149.9 and 149.90 collide;
 * carrier is deliberately left out.
 */
export function dealFingerprint(obs: FingerprintFields): string {
  const key = [
    obs.origin,
    obs.destination,
    obs.outbound_date,
    obs.return_date,
    obs.price.toFixed(2),
  ].join("|");
  return createHash("sha256").update(key).digest("hex");
}

/**
 * Classifies one observation against its bucket baseline.
 *
 * Checks run in a fixed order and the first failure wins:
 * no baseline, then the absolute price cap (`price <= max_price` passes),
 * then the relative discount (`discount_ratio >= discount_threshold` passes).
 * A zero or negative median cannot support a ratio and counts as an
 * insufficient discount.
 */
export function evaluate(
  observation: FareObservation,
  baseline: BaselineStat | null,
  config: DetectorConfig
): DetectorOutcome {
  if (baseline === null) return { kind: "no_baseline" };

  if (observation.price > config.max_price) {
    return { kind: "price_above_cap", price: observation.price, max_price: config.max_price };
  }

  if (baseline.median <= 0) {
    return { kind: "insufficient_discount", discount_ratio: null };
  }

  const discountRatio = 1 - observation.price / baseline.median;
  if (discountRatio < config.discount_threshold) {
    return { kind: "insufficient_discount", discount_ratio: discountRatio };
  }

  const deal: Deal = {
    fingerprint: dealFingerprint(observation),
    origin: observation.origin,
    destination: observation.destination,
    outbound_date: observation.outbound_date,
    return_date: observation.return_date,
    carrier: observation.carrier,
    currency: observation.currency,
    observed_price: observation.price,
    baseline_price: baseline.median,
    discount_ratio: discountRatio,
    observation_count: baseline.count,
  };
  return { kind: "deal", deal };
}

export interface Evaluated<T extends FareObservation = FareObservation> {
  observation: T;
  outcome: DetectorOutcome;
}

/** Runs `evaluate` over a batch, resolving each observation's baseline through `baselineFor`. */
export async function detectDeals<T extends FareObservation>(
  observations: readonly T[],
  baselineFor: (obs: T) => Promise<BaselineStat | null>,
  config: DetectorConfig
): Promise<Evaluated<T>[]> {
  const results: Evaluated<T>[] = [];
  for (const observation of observations) {
    const baseline = await baselineFor(observation);
    results.push({ observation, outcome: evaluate(observation, baseline, config) });
  }
  return results;
}

export function dealsOf(results: readonly Evaluated[]): Deal[] {
  const deals: Deal[] = [];
  for (const r of results) {
    if (r.outcome.kind === "deal") deals.push(r.outcome.deal);
  }
  return deals;
}
