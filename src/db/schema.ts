import { sqliteTable, text, real, integer, index } from "drizzle-orm/sqlite-core";

/**
 * Append-only fare history. Rows are never updated or deleted by the app;
 * the bucket index backs every baseline lookup.
 */
export const priceObservations = sqliteTable(
  "price_observations",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    origin: text("origin").notNull(),
    destination: text("destination").notNull(),
    outbound_date: text("outbound_date").notNull(),
    return_date: text("return_date").notNull(),
    stay_days: integer("stay_days").notNull(),
    outbound_month: integer("outbound_month").notNull(),
    outbound_year: integer("outbound_year").notNull(),
    price: real("price").notNull(),
    currency: text("currency").notNull(),
    carrier: text("carrier").notNull(),
    observed_at: text("observed_at").notNull(),
  },
  (table) => ({
    bucket_idx: index("idx_price_obs_bucket").on(
      table.origin,
      table.destination,
      table.outbound_year,
      table.outbound_month
    ),
  })
);

/** One row per notified deal, keyed by fingerprint. */
export const claimedDeals = sqliteTable("claimed_deals", {
  fingerprint: text("fingerprint").primaryKey(),
  origin: text("origin").notNull(),
  destination: text("destination").notNull(),
  outbound_date: text("outbound_date").notNull(),
  return_date: text("return_date").notNull(),
  carrier: text("carrier").notNull(),
  currency: text("currency").notNull(),
  observed_price: real("observed_price").notNull(),
  baseline_price: real("baseline_price").notNull(),
  discount_ratio: real("discount_ratio").notNull(),
  observation_count: integer("observation_count").notNull(),
  claimed_at: text("claimed_at").notNull(),
});

export type PriceObservationRow = typeof priceObservations.$inferSelect;
export type ClaimedDealRow = typeof claimedDeals.$inferSelect;
