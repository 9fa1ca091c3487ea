const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a `YYYY-MM-DD` calendar date to UTC midnight in ms.
 * Returns null for malformed strings and dates that don't exist (2025-02-30).
 */
export function parseIsoDate(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const d = new Date(ms);
  if (
    d.getUTCFullYear() !== year ||
    d.getUTCMonth() !== month - 1 ||
    d.getUTCDate() !== day
  ) {
    return null;
  }
  return ms;
}

export function formatIsoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number | null {
  const a = parseIsoDate(from);
  const b = parseIsoDate(to);
  if (a === null || b === null) return null;
  return Math.round((b - a) / DAY_MS);
}

export function addDays(date: string, days: number): string {
  const ms = parseIsoDate(date);
  if (ms === null) throw new RangeError(`Not a calendar date: ${date}`);
  return formatIsoDate(ms + days * DAY_MS);
}

/** Outbound month (1-12) and year used as the baseline bucket. */
export function monthBucket(date: string): { month: number; year: number } {
  const ms = parseIsoDate(date);
  if (ms === null) throw new RangeError(`Not a calendar date: ${date}`);
  const d = new Date(ms);
  return { month: d.getUTCMonth() + 1, year: d.getUTCFullYear() };
}

export interface DatePairWindow {
  min_days_from_now: number;
  max_days_from_now: number;
  date_step_days: number;
  min_stay_days: number;
  max_stay_days: number;
  stay_days_step: number;
}

export interface DatePair {
  outbound_date: string;
  return_date: string;
}

/**
 * One outbound date every `date_step_days` inside the horizon, each paired
 * with every stay length in range. Return dates past the horizon are dropped.
 */
export function generateDatePairs(today: string, window: DatePairWindow): DatePair[] {
  const pairs: DatePair[] = [];
  const horizon = addDays(today, window.max_days_from_now);
  const step = Math.max(1, window.date_step_days);
  const stayStep = Math.max(1, window.stay_days_step);

  for (
    let offset = window.min_days_from_now;
    offset <= window.max_days_from_now;
    offset += step
  ) {
    const outbound = addDays(today, offset);
    for (let stay = window.min_stay_days; stay <= window.max_stay_days; stay += stayStep) {
      const ret = addDays(outbound, stay);
      if (ret > horizon) break;
      pairs.push({ outbound_date: outbound, return_date: ret });
    }
  }

  return pairs;
}
