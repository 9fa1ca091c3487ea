import { z } from "zod";
import type { App } from "../app.js";
import { formatBucketSummary } from "../utils/formatting.js";

export const baselineSchema = z.object({
  origin: z.string().length(3).describe("IATA code of the departure airport, e.g. CDG"),
  destination: z.string().length(3).describe("IATA code of the arrival airport, e.g. NRT"),
  month: z.number().int().min(1).max(12).describe("Outbound month 1-12"),
  year: z.number().int().min(2000).max(2100).describe("Outbound year"),
});

export type BaselineInput = z.infer<typeof baselineSchema>;

export async function handleBaseline(input: BaselineInput, app: App): Promise<string> {
  const route = {
    origin: input.origin.toUpperCase(),
    destination: input.destination.toUpperCase(),
  };
  const [summary, baseline] = await Promise.all([
    app.store.bucketSummary(route, input.month, input.year),
    app.store.baseline(route, input.month, input.year),
  ]);

  return formatBucketSummary(summary, baseline, app.config.min_observations, app.config.currency);
}
