#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createApp } from "./app.js";
import type { App } from "./app.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { baselineSchema, handleBaseline } from "./tools/get-baseline.js";
import { evaluateSchema, handleEvaluate } from "./tools/evaluate-fare.js";
import { listDealsSchema, handleListDeals } from "./tools/list-deals.js";
import { runScanSchema, handleRunScan } from "./tools/run-scan.js";

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

async function respond(label: string, run: () => Promise<string>): Promise<ToolResult> {
  try {
    const text = await run();
    return { content: [{ type: "text", text }] };
  } catch (err) {
    return {
      content: [{ type: "text", text: `Error ${label}: ${errorMessage(err)}` }],
      isError: true,
    };
  }
}

function createServer(app: App): McpServer {
  const server = new McpServer({
    name: "fare-deal-watcher",
    version: "1.0.0",
  });

  server.tool(
    "get_baseline",
    "Show the price history of a route for one outbound month: observation count, median, mean, min and max, and whether enough history exists to judge deals.",
    baselineSchema.shape,
    async (input) => respond("reading baseline", () => handleBaseline(input, app))
  );

  server.tool(
    "evaluate_fare",
    "Check whether a round-trip fare would count as a deal against the route's current baseline. Nothing is recorded or notified.",
    evaluateSchema.shape,
    async (input) => respond("evaluating fare", () => handleEvaluate(input, app))
  );

  server.tool(
    "list_claimed_deals",
    "List the most recently notified deals with their price, baseline and discount.",
    listDealsSchema.shape,
    async (input) => respond("listing deals", () => handleListDeals(input, app))
  );

  server.tool(
    "run_scan_cycle",
    "Run one scan cycle now: fetch fares for every configured route, record them, and notify new deals.",
    runScanSchema.shape,
    async (input) => respond("running scan", () => handleRunScan(input, app))
  );

  return server;
}

async function main() {
  const app = createApp(loadConfig());
  const server = createServer(app);

  process.once("SIGINT", () => {
    console.error("Stopping after the routes already in flight...");
    app.shutdown().then(
      () => process.exit(0),
      (err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      }
    );
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Fare deal watcher MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
