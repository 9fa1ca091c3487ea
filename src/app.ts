import type { AppConfig } from "./config.js";
import { openDatabase } from "./db/client.js";
import { LogSink } from "./notifiers/log.js";
import { TelegramSink } from "./notifiers/telegram.js";
import { AmadeusFareSource } from "./providers/amadeus.js";
import type { FareSource } from "./providers/provider.js";
import { SqliteDedupRegistry } from "./services/dedup-registry.js";
import { SqliteObservationStore } from "./services/observation-store.js";
import { ScanCycle, buildRoutes } from "./services/scan-cycle.js";
import type { CycleReport } from "./services/scan-cycle.js";
import type { DedupRegistry, DetectorConfig, NotificationSink, ObservationStore } from "./services/types.js";
import { formatIsoDate, generateDatePairs } from "./utils/dates.js";

export interface App {
  config: AppConfig;
  store: ObservationStore;
  registry: DedupRegistry;
  detector: DetectorConfig;
  source: FareSource;
  sink: NotificationSink;
  runCycle(signal?: AbortSignal): Promise<CycleReport>;
  /** Aborts cycles in flight, waits for them to stop, then closes the database. */
  shutdown(): Promise<void>;
  close(): void;
}

export interface AppOverrides {
  source?: FareSource;
  sink?: NotificationSink;
  now?: () => Date;
}

function defaultSink(config: AppConfig): NotificationSink {
  const telegram = new TelegramSink(config.telegram.bot_token, config.telegram.chat_id);
  if (telegram.isAvailable()) return telegram;
  console.error("[app] no Telegram credentials, deals will be written to the log");
  return new LogSink();
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const now = overrides.now ?? (() => new Date());
  const handle = openDatabase(config.db_path);

  const store = new SqliteObservationStore(handle.db, {
    min_observations: config.min_observations,
    min_stay_days: config.min_stay_days,
    max_stay_days: config.max_stay_days,
    now,
  });
  const registry = new SqliteDedupRegistry(handle.db, now);
  const detector: DetectorConfig = {
    max_price: config.max_price,
    discount_threshold: config.discount_threshold,
  };
  const source =
    overrides.source ??
    new AmadeusFareSource({ ...config.amadeus, currency: config.currency, now });
  const sink = overrides.sink ?? defaultSink(config);

  const cycle = new ScanCycle({
    source,
    store,
    registry,
    sink,
    detector,
    max_concurrent: config.max_concurrent,
    now,
  });

  const stopping = new AbortController();
  const inFlight = new Set<Promise<CycleReport>>();

  return {
    config,
    store,
    registry,
    detector,
    source,
    sink,
    async runCycle(signal?: AbortSignal): Promise<CycleReport> {
      if (!source.isAvailable()) {
        throw new Error(`Fare source "${source.name}" is not configured`);
      }
      const routes = buildRoutes(config.origins, config.destinations);
      const pairs = generateDatePairs(formatIsoDate(now().getTime()), config);

      const controller = new AbortController();
      const abort = () => controller.abort();
      stopping.signal.addEventListener("abort", abort);
      signal?.addEventListener("abort", abort);
      if (stopping.signal.aborted || signal?.aborted) abort();

      const run = cycle.run(routes, pairs, controller.signal);
      inFlight.add(run);
      try {
        return await run;
      } finally {
        inFlight.delete(run);
        stopping.signal.removeEventListener("abort", abort);
        signal?.removeEventListener("abort", abort);
      }
    },
    async shutdown(): Promise<void> {
      stopping.abort();
      await Promise.allSettled([...inFlight]);
      handle.close();
    },
    close: () => handle.close(),
  };
}
