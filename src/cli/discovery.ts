#!/usr/bin/env tsx
/**
 * Discovery mode: the model picks a server and a tool from the registry,
 * then answers with only that tool in context.
 *
 * Usage: npm run discovery [-- --query "..."]
 * Requires: npm run build-registry
 */
import { runDiscovery } from "../core/strategies/discovery.js";
import { bootstrap, ensureRegistry, exitOnError, runStrategyCli } from "./shared.js";

async function main() {
  const ctx = bootstrap("discovery");
  if (!(await ensureRegistry(ctx, "descriptors"))) {
    process.exitCode = 1;
    return;
  }
  await runStrategyCli(ctx, runDiscovery);
}

main().catch(exitOnError);
