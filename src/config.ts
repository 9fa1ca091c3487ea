import { config as loadEnv } from "dotenv";
import { z } from "zod";

/** A variable set to an empty value (`MAX_PRICE=`) falls back to its default. */
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);

const csvCodes = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim().toUpperCase())
        .filter((s) => s.length > 0)
    )
    .pipe(z.array(z.string().regex(/^[A-Z]{3}$/, "IATA codes must be 3 letters")).min(1));

const int = (fallback: number) => z.coerce.number().int().default(fallback);

export const envSchema = z
  .object({
    SCAN_ORIGINS: blankAsUnset(csvCodes("CDG")),
    SCAN_DESTINATIONS: blankAsUnset(csvCodes("NRT,JFK,BCN,LIS,ATH")),
    MAX_PRICE: blankAsUnset(z.coerce.number().nonnegative().default(200)),
    DISCOUNT_THRESHOLD: blankAsUnset(z.coerce.number().min(0).lt(1).default(0.5)),
    MIN_OBSERVATIONS: blankAsUnset(int(10).pipe(z.number().positive())),
    MIN_STAY_DAYS: blankAsUnset(int(3).pipe(z.number().positive())),
    MAX_STAY_DAYS: blankAsUnset(int(14).pipe(z.number().positive())),
    STAY_DAYS_STEP: blankAsUnset(int(1).pipe(z.number().positive())),
    MIN_DAYS_FROM_NOW: blankAsUnset(int(7).pipe(z.number().nonnegative())),
    MAX_DAYS_FROM_NOW: blankAsUnset(int(120).pipe(z.number().nonnegative())),
    DATE_STEP_DAYS: blankAsUnset(int(7).pipe(z.number().positive())),
    MAX_CONCURRENT: blankAsUnset(int(4).pipe(z.number().positive())),
    CURRENCY: blankAsUnset(z.string().length(3).default("EUR")),
    DB_PATH: blankAsUnset(z.string().min(1).default("flights.db")),
    AMADEUS_CLIENT_ID: z.string().default(""),
    AMADEUS_CLIENT_SECRET: z.string().default(""),
    AMADEUS_BASE_URL: blankAsUnset(z.string().url().default("https://test.api.amadeus.com")),
    TELEGRAM_BOT_TOKEN: z.string().default(""),
    TELEGRAM_CHAT_ID: z.string().default(""),
  })
  .refine((e) => e.MIN_STAY_DAYS <= e.MAX_STAY_DAYS, {
    message: "MIN_STAY_DAYS must not exceed MAX_STAY_DAYS",
    path: ["MIN_STAY_DAYS"],
  })
  .refine((e) => e.MIN_DAYS_FROM_NOW <= e.MAX_DAYS_FROM_NOW, {
    message: "MIN_DAYS_FROM_NOW must not exceed MAX_DAYS_FROM_NOW",
    path: ["MIN_DAYS_FROM_NOW"],
  });

export interface AppConfig {
  origins: string[];
  destinations: string[];
  max_price: number;
  discount_threshold: number;
  min_observations: number;
  min_stay_days: number;
  max_stay_days: number;
  stay_days_step: number;
  min_days_from_now: number;
  max_days_from_now: number;
  date_step_days: number;
  max_concurrent: number;
  currency: string;
  db_path: string;
  amadeus: { client_id: string; client_secret: string; base_url: string };
  telegram: { bot_token: string; chat_id: string };
}

/** Builds the config from an env record; throws with every invalid variable listed. */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const e = parsed.data;
  return {
    origins: e.SCAN_ORIGINS,
    destinations: e.SCAN_DESTINATIONS,
    max_price: e.MAX_PRICE,
    discount_threshold: e.DISCOUNT_THRESHOLD,
    min_observations: e.MIN_OBSERVATIONS,
    min_stay_days: e.MIN_STAY_DAYS,
    max_stay_days: e.MAX_STAY_DAYS,
    stay_days_step: e.STAY_DAYS_STEP,
    min_days_from_now: e.MIN_DAYS_FROM_NOW,
    max_days_from_now: e.MAX_DAYS_FROM_NOW,
    date_step_days: e.DATE_STEP_DAYS,
    max_concurrent: e.MAX_CONCURRENT,
    currency: e.CURRENCY.toUpperCase(),
    db_path: e.DB_PATH,
    amadeus: {
      client_id: e.AMADEUS_CLIENT_ID,
      client_secret: e.AMADEUS_CLIENT_SECRET,
      base_url: e.AMADEUS_BASE_URL,
    },
    telegram: { bot_token: e.TELEGRAM_BOT_TOKEN, chat_id: e.TELEGRAM_CHAT_ID },
  };
}

export function loadConfig(): AppConfig {
  loadEnv();
  return parseConfig(process.env);
}
