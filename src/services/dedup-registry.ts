import { desc, eq } from "drizzle-orm";
import type { FareDatabase } from "../db/client.js";
import { claimedDeals } from "../db/schema.js";
import { StorageError } from "../errors.js";
import type { ClaimedDeal, ClaimResult, Deal, DedupRegistry } from "./types.js";

/**
 * Fingerprints of deals that were already delivered. A claim is a single
 * insert that the primary key turns into a no-op for repeats, so two
 * concurrent claims of one fingerprint can't both win.
 */
export class SqliteDedupRegistry implements DedupRegistry {
  private readonly db: FareDatabase;
  private readonly now: () => Date;

  constructor(db: FareDatabase, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  async isClaimed(fingerprint: string): Promise<boolean> {
    try {
      const row = this.db
        .select({ fingerprint: claimedDeals.fingerprint })
        .from(claimedDeals)
        .where(eq(claimedDeals.fingerprint, fingerprint))
        .get();
      return row !== undefined;
    } catch (err) {
      throw new StorageError("check claim", err);
    }
  }

  async claim(fingerprint: string, snapshot: Deal): Promise<ClaimResult> {
    try {
      const result = this.db
        .insert(claimedDeals)
        .values({
          fingerprint,
          origin: snapshot.origin,
          destination: snapshot.destination,
          outbound_date: snapshot.outbound_date,
          return_date: snapshot.return_date,
          carrier: snapshot.carrier,
          currency: snapshot.currency,
          observed_price: snapshot.observed_price,
          baseline_price: snapshot.baseline_price,
          discount_ratio: snapshot.discount_ratio,
          observation_count: snapshot.observation_count,
          claimed_at: this.now().toISOString(),
        })
        .onConflictDoNothing({ target: claimedDeals.fingerprint })
        .run();
      return result.changes === 1 ? "claimed" : "already_claimed";
    } catch (err) {
      throw new StorageError("claim deal", err);
    }
  }

  async list(limit: number): Promise<ClaimedDeal[]> {
    try {
      return this.db
        .select()
        .from(claimedDeals)
        .orderBy(desc(claimedDeals.claimed_at), desc(claimedDeals.fingerprint))
        .limit(limit)
        .all();
    } catch (err) {
      throw new StorageError("list claims", err);
    }
  }
}
