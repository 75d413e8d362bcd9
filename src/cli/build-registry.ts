#!/usr/bin/env tsx
/**
 * Rebuild the on-disk tool registry from the configured MCP servers.
 * The registry directory is deleted and recreated.
 *
 * Usage:
 *   npm run build-registry              # descriptors and index.json per server
 *   npm run build-registry -- --code    # plus wrapper modules for code mode
 */
import { buildRegistry, type RegistryBuildReport } from "../registry/builder.js";
import { bootstrap, exitOnError } from "./shared.js";

function printReport(report: RegistryBuildReport): void {
  console.log(`\nRegistry built at ${report.root}`);
  for (const server of report.servers) {
    const detail = server.status === "built" ? `${server.toolCount} tools` : server.error ?? "";
    console.log(`  ${server.status.padEnd(7)} ${server.name}  ${detail}`);
  }
  console.log(`Total tools: ${report.toolCount}`);
}

async function main() {
  const { config, logger, args } = bootstrap("build-registry");

  const report = await buildRegistry({
    root: config.registry.root,
    servers: config.mcp.servers,
    wrappers: args.code,
    logger,
  });

  printReport(report);
}

main().catch(exitOnError);
