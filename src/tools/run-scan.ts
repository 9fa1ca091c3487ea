import { z } from "zod";
import type { App } from "../app.js";
import { formatCycleReport } from "../utils/formatting.js";

export const runScanSchema = z.object({
  timeout_seconds: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Stop scheduling new routes after this many seconds"),
});

export type RunScanInput = z.infer<typeof runScanSchema>;

export async function handleRunScan(input: RunScanInput, app: App): Promise<string> {
  const signal =
    input.timeout_seconds !== undefined
      ? AbortSignal.timeout(input.timeout_seconds * 1000)
      : undefined;
  const report = await app.runCycle(signal);
  return formatCycleReport(report);
}
