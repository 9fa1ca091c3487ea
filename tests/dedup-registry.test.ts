import { afterEach, describe, expect, it } from "vitest";
import { openDatabase } from "../src/db/client.js";
import type { DatabaseHandle } from "../src/db/client.js";
import { StorageError } from "../src/errors.js";
import { dealFingerprint } from "../src/services/deal-detector.js";
import { SqliteDedupRegistry } from "../src/services/dedup-registry.js";
import type { Deal } from "../src/services/types.js";

function deal(price: number, overrides: Partial<Deal> = {}): Deal {
  const base = {
    origin: "CDG",
    destination: "NRT",
    outbound_date: "2026-11-05",
    return_date: "2026-11-12",
    price,
  };
  return {
    fingerprint: dealFingerprint(base),
    origin: base.origin,
    destination: base.destination,
    outbound_date: base.outbound_date,
    return_date: base.return_date,
    carrier: "AF",
    currency: "EUR",
    observed_price: price,
    baseline_price: 413.5,
    discount_ratio: 1 - price / 413.5,
    observation_count: 10,
    ...overrides,
  };
}

/** Clock that advances one minute per call. */
function tickingClock(start: string): () => Date {
  let t = new Date(start).getTime();
  return () => {
    const d = new Date(t);
    t += 60_000;
    return d;
  };
}

describe("SqliteDedupRegistry", () => {
  let handle: DatabaseHandle;

  afterEach(() => {
    handle.close();
  });

  function setup(now?: () => Date): SqliteDedupRegistry {
    handle = openDatabase(":memory:");
    return new SqliteDedupRegistry(handle.db, now);
  }

  it("claims a fingerprint once", async () => {
    const registry = setup();
    const d = deal(150);

    expect(await registry.isClaimed(d.fingerprint)).toBe(false);
    expect(await registry.claim(d.fingerprint, d)).toBe("claimed");
    expect(await registry.isClaimed(d.fingerprint)).toBe(true);
    expect(await registry.claim(d.fingerprint, d)).toBe("already_claimed");
  });

  it("lets exactly one of several concurrent claims win", async () => {
    const registry = setup();
    const d = deal(150);

    const results = await Promise.all(
      Array.from({ length: 5 }, () => registry.claim(d.fingerprint, d))
    );

    expect(results.filter((r) => r === "claimed")).toHaveLength(1);
    expect(results.filter((r) => r === "already_claimed")).toHaveLength(4);
  });

  it("keeps the first snapshot when a repeat claim carries different details", async () => {
    const registry = setup();
    const d = deal(150);
    await registry.claim(d.fingerprint, d);
    await registry.claim(d.fingerprint, { ...d, carrier: "JL" });

    const [row] = await registry.list(10);
    expect(row.carrier).toBe("AF");
  });

  it("lists claims newest first with their snapshot", async () => {
    const registry = setup(tickingClock("2026-10-18T06:00:00.000Z"));
    const first = deal(150);
    const second = deal(140);
    await registry.claim(first.fingerprint, first);
    await registry.claim(second.fingerprint, second);

    const claims = await registry.list(10);
    expect(claims.map((c) => c.observed_price)).toEqual([140, 150]);
    expect(claims[0]).toEqual({ ...second, claimed_at: "2026-10-18T06:01:00.000Z" });

    expect(await registry.list(1)).toHaveLength(1);
  });

  it("surfaces database failures as StorageError", async () => {
    const registry = setup();
    const d = deal(150);
    handle.close();
    handle = openDatabase(":memory:");

    await expect(registry.isClaimed(d.fingerprint)).rejects.toBeInstanceOf(StorageError);
    await expect(registry.claim(d.fingerprint, d)).rejects.toBeInstanceOf(StorageError);
  });
});
