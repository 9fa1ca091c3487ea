import { fareObservationSchema } from "../providers/provider.js";
import type { FareObservation, FareObservationInput } from "../providers/provider.js";
import { ValidationError } from "../errors.js";
import { daysBetween, parseIsoDate } from "../utils/dates.js";
import type { StayBounds } from "./types.js";

export interface ValidObservation extends FareObservation {
  stay_days: number;
}

/**
 * Checks shape, calendar dates, date order and stay length.
 * Throws ValidationError listing every problem found.
 */
export function validateObservation(
  input: FareObservationInput,
  bounds: StayBounds
): ValidObservation {
  const parsed = fareObservationSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "observation"}: ${i.message}`)
    );
  }

  const obs = parsed.data;
  const issues: string[] = [];

  if (parseIsoDate(obs.outbound_date) === null) {
    issues.push(`outbound_date: ${obs.outbound_date} is not a calendar date`);
  }
  if (parseIsoDate(obs.return_date) === null) {
    issues.push(`return_date: ${obs.return_date} is not a calendar date`);
  }

  const stay = daysBetween(obs.outbound_date, obs.return_date);
  if (stay !== null) {
    if (stay <= 0) {
      issues.push("return_date must be after outbound_date");
    } else if (stay < bounds.min_stay_days || stay > bounds.max_stay_days) {
      issues.push(
        `stay of ${stay} days outside [${bounds.min_stay_days}, ${bounds.max_stay_days}]`
      );
    }
  }

  if (issues.length > 0 || stay === null) {
    throw new ValidationError(issues);
  }

  return { ...obs, stay_days: stay };
}
