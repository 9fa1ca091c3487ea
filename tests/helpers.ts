import { openDatabase } from "../src/db/client.js";
import type { DatabaseHandle } from "../src/db/client.js";
import { DeliveryError } from "../src/errors.js";
import type { FareObservation, FareObservationInput, FareQuery, FareSource } from "../src/providers/provider.js";
import { SqliteObservationStore } from "../src/services/observation-store.js";
import type { ObservationStoreOptions } from "../src/services/observation-store.js";
import type { Deal, NotificationSink } from "../src/services/types.js";

export const NRT_HISTORY = [400, 420, 410, 405, 415, 430, 408, 412, 418, 422];

export function fare(overrides: Partial<FareObservationInput> = {}): FareObservationInput {
  return {
    origin: "CDG",
    destination: "NRT",
    outbound_date: "2026-11-05",
    return_date: "2026-11-12",
    price: 400,
    currency: "EUR",
    carrier: "AF",
    observed_at: "2026-10-01T08:00:00.000Z",
    ...overrides,
  };
}

/** An already-validated observation, as `evaluate` receives it. */
export function observation(overrides: Partial<FareObservation> = {}): FareObservation {
  return {
    origin: "CDG",
    destination: "NRT",
    outbound_date: "2026-11-05",
    return_date: "2026-11-12",
    price: 400,
    currency: "EUR",
    carrier: "AF",
    ...overrides,
  };
}

export function memoryStore(
  options: Partial<ObservationStoreOptions> = {}
): { handle: DatabaseHandle; store: SqliteObservationStore } {
  const handle = openDatabase(":memory:");
  const store = new SqliteObservationStore(handle.db, {
    min_observations: 10,
    min_stay_days: 3,
    max_stay_days: 14,
    ...options,
  });
  return { handle, store };
}

export async function seed(
  store: SqliteObservationStore,
  prices: number[],
  overrides: Partial<FareObservationInput> = {}
): Promise<void> {
  for (const price of prices) {
    await store.record(fare({ ...overrides, price }));
  }
}

type Scripted = number[] | Error;

/** Fare source answering from a script keyed by `ORIGIN-DEST outbound/return`. */
export class ScriptedFareSource implements FareSource {
  readonly name = "scripted";
  readonly queries: FareQuery[] = [];
  private readonly script = new Map<string, Scripted>();
  private readonly extra = new Map<string, FareObservationInput[]>();

  static key(q: FareQuery): string {
    return `${q.origin}-${q.destination} ${q.outbound_date}/${q.return_date}`;
  }

  set(query: FareQuery, answer: Scripted): this {
    this.script.set(ScriptedFareSource.key(query), answer);
    return this;
  }

  /** Raw fares returned as-is, for malformed input. */
  setRaw(query: FareQuery, fares: FareObservationInput[]): this {
    this.extra.set(ScriptedFareSource.key(query), fares);
    return this;
  }

  isAvailable(): boolean {
    return true;
  }

  async searchRoundTrips(query: FareQuery): Promise<FareObservationInput[]> {
    this.queries.push(query);
    const key = ScriptedFareSource.key(query);
    const raw = this.extra.get(key);
    if (raw) return raw;

    const answer = this.script.get(key);
    if (answer === undefined) return [];
    if (answer instanceof Error) throw answer;
    return answer.map((price) =>
      fare({
        origin: query.origin,
        destination: query.destination,
        outbound_date: query.outbound_date,
        return_date: query.return_date,
        price,
      })
    );
  }
}

export class RecordingSink implements NotificationSink {
  readonly name = "recording";
  readonly sent: Deal[] = [];
  failuresLeft = 0;

  async send(deal: Deal): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new DeliveryError(this.name, "mailbox unavailable");
    }
    this.sent.push(deal);
  }
}
