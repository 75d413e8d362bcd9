#!/usr/bin/env tsx
/**
 * Run all three strategies on the same query and compare token usage.
 * Rebuilds the registry (with wrappers) first, then shares one set of MCP
 * connections across the three runs.
 *
 * Usage: npm run compare [-- --query "..."]
 */
import { withSessions } from "../integrations/mcp/session-table.js";
import { buildRegistry } from "../registry/builder.js";
import { createProvider } from "../core/llm/openai-compat.js";
import { formatComparison } from "../core/report.js";
import { runCodeMode } from "../core/strategies/code-mode.js";
import { runDiscovery } from "../core/strategies/discovery.js";
import { runTraditional } from "../core/strategies/traditional.js";
import type { AgentRunResult, StrategyOptions } from "../core/strategies/common.js";
import { bootstrap, exitOnError, printResult } from "./shared.js";

const STRATEGIES: Array<(options: StrategyOptions) => Promise<AgentRunResult>> = [
  runTraditional,
  runDiscovery,
  runCodeMode,
];

async function main() {
  const { config, logger, args } = bootstrap("compare");
  const provider = createProvider(config.llm);

  const report = await buildRegistry({
    root: config.registry.root,
    servers: config.mcp.servers,
    wrappers: true,
    logger,
  });
  logger.info({ toolCount: report.toolCount }, "Registry ready");

  const results = await withSessions(config.mcp.servers, logger, async (sessions) => {
    const collected: AgentRunResult[] = [];
    for (const strategy of STRATEGIES) {
      const result = await strategy({ provider, config, sessions, logger, query: args.query });
      printResult(result);
      collected.push(result);
    }
    return collected;
  });

  console.log(`\n${formatComparison(results)}`);
}

main().catch(exitOnError);
