import type { FareObservation, FareObservationInput } from "../providers/provider.js";

export interface Route {
  origin: string;
  destination: string;
}

export interface StoredObservation extends FareObservation {
  id: number;
  stay_days: number;
  outbound_month: number;
  outbound_year: number;
  observed_at: string;
}

export interface BaselineStat {
  median: number;
  count: number;
}

export interface BucketSummary {
  route: Route;
  month: number;
  year: number;
  count: number;
  median: number | null;
  mean: number | null;
  min: number | null;
  max: number | null;
}

export interface StayBounds {
  min_stay_days: number;
  max_stay_days: number;
}

export interface DetectorConfig {
  max_price: number;
  discount_threshold: number; // ratio in [0, 1)
}

export interface Deal {
  fingerprint: string;
  origin: string;
  destination: string;
  outbound_date: string;
  return_date: string;
  carrier: string;
  currency: string;
  observed_price: number;
  baseline_price: number;
  discount_ratio: number;
  observation_count: number;
}

export type DetectorOutcome =
  | { kind: "no_baseline" }
  | { kind: "price_above_cap"; price: number; max_price: number }
  | { kind: "insufficient_discount"; discount_ratio: number | null }
  | { kind: "deal"; deal: Deal };

export type OutcomeKind = DetectorOutcome["kind"];

export type ClaimResult = "claimed" | "already_claimed";

export interface ClaimedDeal extends Deal {
  claimed_at: string;
}

export interface ObservationStore {
  record(observation: FareObservationInput): Promise<StoredObservation>;
  baseline(route: Route, outboundMonth: number, outboundYear: number): Promise<BaselineStat | null>;
  bucketSummary(route: Route, outboundMonth: number, outboundYear: number): Promise<BucketSummary>;
}

export interface DedupRegistry {
  isClaimed(fingerprint: string): Promise<boolean>;
  claim(fingerprint: string, snapshot: Deal): Promise<ClaimResult>;
  list(limit: number): Promise<ClaimedDeal[]>;
}

export interface NotificationSink {
  readonly name: string;
  send(deal: Deal): Promise<void>;
}
