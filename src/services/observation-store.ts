import { and, eq } from "drizzle-orm";
import type { FareDatabase } from "../db/client.js";
import { priceObservations } from "../db/schema.js";
import type { PriceObservationRow } from "../db/schema.js";
import { StorageError } from "../errors.js";
import type { FareObservationInput } from "../providers/provider.js";
import { monthBucket } from "../utils/dates.js";
import { validateObservation } from "./validation.js";
import type {
  BaselineStat,
  BucketSummary,
  ObservationStore,
  Route,
  StayBounds,
  StoredObservation,
} from "./types.js";

export interface ObservationStoreOptions extends StayBounds {
  min_observations: number;
  now?: () => Date;
}

/** Median of an unsorted list; null when empty. The input array is left untouched. */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export class SqliteObservationStore implements ObservationStore {
  private readonly db: FareDatabase;
  private readonly options: ObservationStoreOptions;
  private readonly now: () => Date;

  constructor(db: FareDatabase, options: ObservationStoreOptions) {
    this.db = db;
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  async record(input: FareObservationInput): Promise<StoredObservation> {
    const obs = validateObservation(input, this.options);
    const { month, year } = monthBucket(obs.outbound_date);

    let row: PriceObservationRow;
    try {
      row = this.db
        .insert(priceObservations)
        .values({
          origin: obs.origin,
          destination: obs.destination,
          outbound_date: obs.outbound_date,
          return_date: obs.return_date,
          stay_days: obs.stay_days,
          outbound_month: month,
          outbound_year: year,
          price: obs.price,
          currency: obs.currency,
          carrier: obs.carrier,
          observed_at: obs.observed_at ?? this.now().toISOString(),
        })
        .returning()
        .get();
    } catch (err) {
      throw new StorageError("record observation", err);
    }

    return row;
  }

  async baseline(route: Route, outboundMonth: number, outboundYear: number): Promise<BaselineStat | null> {
    const prices = this.bucketPrices(route, outboundMonth, outboundYear);
    if (prices.length < this.options.min_observations) return null;

    const value = median(prices);
    return value === null ? null : { median: value, count: prices.length };
  }

  async bucketSummary(route: Route, outboundMonth: number, outboundYear: number): Promise<BucketSummary> {
    const prices = this.bucketPrices(route, outboundMonth, outboundYear);
    const count = prices.length;

    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const p of prices) {
      sum += p;
      if (p < min) min = p;
      if (p > max) max = p;
    }

    return {
      route,
      month: outboundMonth,
      year: outboundYear,
      count,
      median: median(prices),
      mean: count > 0 ? sum / count : null,
      min: count > 0 ? min : null,
      max: count > 0 ? max : null,
    };
  }

  private bucketPrices(route: Route, month: number, year: number): number[] {
    try {
      return this.db
        .select({ price: priceObservations.price })
        .from(priceObservations)
        .where(
          and(
            eq(priceObservations.origin, route.origin),
            eq(priceObservations.destination, route.destination),
            eq(priceObservations.outbound_year, year),
            eq(priceObservations.outbound_month, month)
          )
        )
        .all()
        .map((r) => r.price);
    } catch (err) {
      throw new StorageError(`read bucket ${route.origin}-${route.destination} ${year}-${month}`, err);
    }
  }
}
