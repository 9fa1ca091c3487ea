import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { formatCycleReport } from "./utils/formatting.js";

/** Runs one scan cycle and exits. Scheduling is left to cron or whatever calls this. */
async function main() {
  const app = createApp(loadConfig());

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("Stopping after the routes already in flight...");
    controller.abort();
  });

  try {
    const report = await app.runCycle(controller.signal);
    console.log(formatCycleReport(report));

    const allFailed = report.routes > 0 && report.failed_routes.length >= report.routes &&
      report.recorded === 0;
    process.exitCode = allFailed ? 1 : 0;
  } finally {
    app.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
