import Bottleneck from "bottleneck";
import { DeliveryError, ValidationError, errorMessage } from "../errors.js";
import type { FareObservationInput, FareSource } from "../providers/provider.js";
import type { DatePair } from "../utils/dates.js";
import { monthBucket, parseIsoDate } from "../utils/dates.js";
import { dealsOf, detectDeals } from "./deal-detector.js";
import type {
  BaselineStat,
  Deal,
  DedupRegistry,
  DetectorConfig,
  NotificationSink,
  ObservationStore,
  OutcomeKind,
  Route,
  StoredObservation,
} from "./types.js";

export interface ScanCycleDeps {
  source: FareSource;
  store: ObservationStore;
  registry: DedupRegistry;
  sink: NotificationSink;
  detector: DetectorConfig;
  max_concurrent: number;
  now?: () => Date;
}

export interface CycleReport {
  started_at: string;
  finished_at: string;
  routes: number;
  date_pairs: number;
  fetched: number;
  recorded: number;
  rejected: number;
  outcomes: Record<OutcomeKind, number>;
  notified: number;
  already_claimed: number;
  delivery_failures: number;
  failed_routes: Array<{ route: string; error: string }>;
  aborted: boolean;
}

export function routeLabel(route: Route): string {
  return `${route.origin}→${route.destination}`;
}

/** The bucket a fare is recorded under: route plus outbound month. */
function bucketKey(fare: { origin: string; destination: string; outbound_date: string }): string {
  const { month, year } = monthBucket(fare.outbound_date);
  return `${fare.origin}|${fare.destination}|${year}-${month}`;
}

/** Every origin × destination pair, skipping same-airport routes. */
export function buildRoutes(origins: string[], destinations: string[]): Route[] {
  const routes: Route[] = [];
  for (const origin of origins) {
    for (const destination of destinations) {
      if (origin !== destination) routes.push({ origin, destination });
    }
  }
  return routes;
}

/**
 * One pass over the configured routes: fetch, record, evaluate, notify, claim.
 *
 * Routes run in parallel up to `max_concurrent`; date pairs inside a route
 * run one after another so each baseline lookup sees the route's earlier
 * writes. A deal is claimed only after the sink confirms delivery, so a
 * failed send is retried by the next cycle.
 */
export class ScanCycle {
  private readonly deps: ScanCycleDeps;
  private readonly now: () => Date;

  constructor(deps: ScanCycleDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  async run(routes: Route[], pairs: DatePair[], signal?: AbortSignal): Promise<CycleReport> {
    const report: CycleReport = {
      started_at: this.now().toISOString(),
      finished_at: "",
      routes: routes.length,
      date_pairs: pairs.length,
      fetched: 0,
      recorded: 0,
      rejected: 0,
      outcomes: { no_baseline: 0, price_above_cap: 0, insufficient_discount: 0, deal: 0 },
      notified: 0,
      already_claimed: 0,
      delivery_failures: 0,
      failed_routes: [],
      aborted: false,
    };
    // fingerprints already attempted this cycle, delivered or not
    const attempted = new Set<string>();

    const limiter = new Bottleneck({ maxConcurrent: Math.max(1, this.deps.max_concurrent) });

    console.error(`[scan] cycle start: ${routes.length} routes × ${pairs.length} date pairs`);

    await Promise.all(
      routes.map((route) =>
        limiter.schedule(async () => {
          if (signal?.aborted) {
            report.aborted = true;
            return;
          }
          try {
            await this.scanRoute(route, pairs, report, attempted, signal);
          } catch (err) {
            report.failed_routes.push({ route: routeLabel(route), error: errorMessage(err) });
            console.error(`[scan] ${routeLabel(route)} skipped: ${errorMessage(err)}`);
          }
        })
      )
    );

    report.finished_at = this.now().toISOString();
    console.error(
      `[scan] cycle done: ${report.recorded} recorded, ${report.outcomes.deal} deals, ${report.notified} notified, ${report.failed_routes.length} failed routes`
    );
    return report;
  }

  private async scanRoute(
    route: Route,
    pairs: DatePair[],
    report: CycleReport,
    attempted: Set<string>,
    signal?: AbortSignal
  ): Promise<void> {
    const { source, store, detector } = this.deps;
    let routeDeals = 0;

    for (const pair of pairs) {
      if (signal?.aborted) {
        report.aborted = true;
        return;
      }

      let fares: FareObservationInput[];
      try {
        fares = await source.searchRoundTrips({ ...route, ...pair });
      } catch (err) {
        report.failed_routes.push({
          route: `${routeLabel(route)} ${pair.outbound_date}/${pair.return_date}`,
          error: errorMessage(err),
        });
        console.error(`[scan] ${routeLabel(route)} ${pair.outbound_date}: ${source.name} error: ${errorMessage(err)}`);
        continue;
      }
      report.fetched += fares.length;
      if (fares.length === 0) continue;

      // Baselines are taken before this batch is written: fares are judged against prior history.
      const baselines = await this.batchBaselines(fares);

      const recorded: StoredObservation[] = [];
      for (const fare of fares) {
        try {
          recorded.push(await store.record(fare));
          report.recorded++;
        } catch (err) {
          if (!(err instanceof ValidationError)) throw err;
          report.rejected++;
          console.error(`[scan] ${routeLabel(route)} rejected fare: ${err.issues.join("; ")}`);
        }
      }

      const results = await detectDeals(
        recorded,
        async (obs) => baselines.get(bucketKey(obs)) ?? null,
        detector
      );
      for (const { outcome } of results) report.outcomes[outcome.kind]++;

      for (const deal of dealsOf(results)) {
        if (attempted.has(deal.fingerprint)) continue;
        attempted.add(deal.fingerprint);
        if (await this.notify(deal, report)) routeDeals++;
      }
    }

    console.error(`[scan] ${routeLabel(route)}: ${routeDeals} deals notified`);
  }

  /**
   * Baseline for every bucket the batch touches. Fares dated outside the
   * queried month are judged against their own month. Fares with an
   * unreadable date are skipped here and rejected by `record`.
   */
  private async batchBaselines(fares: FareObservationInput[]): Promise<Map<string, BaselineStat | null>> {
    const baselines = new Map<string, BaselineStat | null>();
    for (const fare of fares) {
      if (parseIsoDate(fare.outbound_date) === null) continue;
      const key = bucketKey(fare);
      if (baselines.has(key)) continue;
      const { month, year } = monthBucket(fare.outbound_date);
      baselines.set(key, await this.deps.store.baseline(fare, month, year));
    }
    return baselines;
  }

  /** Returns true when this call delivered and claimed the deal. */
  private async notify(deal: Deal, report: CycleReport): Promise<boolean> {
    const { registry, sink } = this.deps;

    if (await registry.isClaimed(deal.fingerprint)) {
      report.already_claimed++;
      return false;
    }

    try {
      await sink.send(deal);
    } catch (err) {
      const failure = err instanceof DeliveryError ? err : new DeliveryError(sink.name, errorMessage(err), err);
      report.delivery_failures++;
      console.error(`[scan] ${routeLabel(deal)} ${deal.outbound_date}: ${failure.message}, will retry next cycle`);
      return false;
    }

    const result = await registry.claim(deal.fingerprint, deal);
    if (result === "already_claimed") {
      report.already_claimed++;
      return false;
    }
    report.notified++;
    return true;
  }
}
