#!/usr/bin/env tsx
/**
 * Traditional mode: every tool of every configured MCP server is sent to
 * the model on every turn.
 *
 * Usage: npm run traditional [-- --query "..."] [-- --max-turns N]
 */
import { runTraditional } from "../core/strategies/traditional.js";
import { bootstrap, exitOnError, runStrategyCli } from "./shared.js";

async function main() {
  const ctx = bootstrap("traditional");
  await runStrategyCli(ctx, runTraditional);
}

main().catch(exitOnError);
