import { z } from "zod";
import type { App } from "../app.js";
import { formatClaimsTable } from "../utils/formatting.js";

export const listDealsSchema = z.object({
  limit: z.number().int().min(1).max(200).default(20).describe("How many recent deals to show"),
});

export type ListDealsInput = z.infer<typeof listDealsSchema>;

export async function handleListDeals(input: ListDealsInput, app: App): Promise<string> {
  const claims = await app.registry.list(input.limit);
  return formatClaimsTable(claims);
}
