#!/usr/bin/env tsx
/**
 * Code mode: the model gets a single run_code tool and calls MCP tools
 * through the generated registry wrappers from its own JavaScript.
 *
 * Usage: npm run code-mode [-- --query "..."]
 * Requires: npm run build-registry -- --code
 */
import { runCodeMode } from "../core/strategies/code-mode.js";
import { bootstrap, ensureRegistry, exitOnError, runStrategyCli } from "./shared.js";

async function main() {
  const ctx = bootstrap("code-mode");
  if (!(await ensureRegistry(ctx, "wrappers"))) {
    process.exitCode = 1;
    return;
  }
  await runStrategyCli(ctx, runCodeMode);
}

main().catch(exitOnError);
