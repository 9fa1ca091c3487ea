import { z } from "zod";
import type { App } from "../app.js";
import { evaluate } from "../services/deal-detector.js";
import { validateObservation } from "../services/validation.js";
import { monthBucket } from "../utils/dates.js";
import { formatOutcome } from "../utils/formatting.js";

export const evaluateSchema = z.object({
  origin: z.string().describe("IATA code of the departure airport"),
  destination: z.string().describe("IATA code of the arrival airport"),
  outbound_date: z.string().describe("Outbound date YYYY-MM-DD"),
  return_date: z.string().describe("Return date YYYY-MM-DD"),
  price: z.number().describe("Round-trip price in the reference currency"),
  carrier: z.string().optional().describe("Airline, informational only"),
});

export type EvaluateInput = z.infer<typeof evaluateSchema>;

/** Dry run: judges a hypothetical fare against today's baseline without recording or claiming it. */
export async function handleEvaluate(input: EvaluateInput, app: App): Promise<string> {
  const observation = validateObservation(
    {
      ...input,
      origin: input.origin.toUpperCase(),
      destination: input.destination.toUpperCase(),
      currency: app.config.currency,
    },
    app.config
  );

  const { month, year } = monthBucket(observation.outbound_date);
  const baseline = await app.store.baseline(observation, month, year);
  const outcome = evaluate(observation, baseline, app.detector);

  const lines = [formatOutcome(outcome, app.config.currency)];
  if (outcome.kind === "deal" && (await app.registry.isClaimed(outcome.deal.fingerprint))) {
    lines.push("", "This exact fare was already notified.");
  }
  return lines.join("\n");
}
