import { loadConfig, type AppConfig } from "../utils/config.js";
import { loadEnvFile } from "../utils/env.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { withSessions } from "../integrations/mcp/session-table.js";
import { RegistryStore } from "../registry/store.js";
import { createProvider } from "../core/llm/openai-compat.js";
import { formatRunSummary } from "../core/report.js";
import type { AgentRunResult, StrategyOptions } from "../core/strategies/common.js";

export interface CliArgs {
  query?: string;
  maxTurns?: number;
  code: boolean;
}

export function parseArgs(argv = process.argv.slice(2)): CliArgs {
  const args: CliArgs = { code: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--query":
      case "-q":
        args.query = requireValue(arg, argv[++i]);
        break;
      case "--max-turns": {
        const value = Number(requireValue(arg, argv[++i]));
        if (!Number.isInteger(value) || value < 1) {
          throw new Error(`--max-turns expects a positive integer`);
        }
        args.maxTurns = value;
        break;
      }
      case "--code":
        args.code = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

export interface CliContext {
  config: AppConfig;
  logger: Logger;
  args: CliArgs;
}

/** .env, config and logger, in that order. */
export function bootstrap(name: string): CliContext {
  loadEnvFile();
  const args = parseArgs();
  const config = loadConfig();
  const logger = createLogger(name);
  return { config, logger, args };
}

/**
 * Check that the registry was built; code mode also needs the generated
 * wrapper modules. Logs and returns false when it is missing.
 */
export async function ensureRegistry(
  ctx: CliContext,
  needs: "descriptors" | "wrappers"
): Promise<boolean> {
  const store = new RegistryStore(ctx.config.registry.root);
  const flag = needs === "wrappers" ? " -- --code" : "";

  if (!(await store.exists()) || (await store.listServers()).length === 0) {
    ctx.logger.error(
      { root: store.root },
      `Registry not found. Run 'npm run build-registry${flag}' first.`
    );
    return false;
  }
  if (needs === "wrappers" && !(await store.hasEntryModules())) {
    ctx.logger.error(
      { root: store.root },
      `Registry has no code-mode wrappers. Run 'npm run build-registry${flag}' first.`
    );
    return false;
  }
  return true;
}

/** Connect the configured servers, run one strategy and print its summary. */
export async function runStrategyCli(
  ctx: CliContext,
  run: (options: StrategyOptions) => Promise<AgentRunResult>
): Promise<AgentRunResult> {
  const provider = createProvider(ctx.config.llm);

  const result = await withSessions(ctx.config.mcp.servers, ctx.logger, (sessions) =>
    run({
      provider,
      config: ctx.config,
      sessions,
      logger: ctx.logger,
      query: ctx.args.query,
      maxTurns: ctx.args.maxTurns,
    })
  );

  printResult(result);
  return result;
}

export function printResult(result: AgentRunResult): void {
  console.log(`\nUSER: ${result.query}`);
  console.log(`AGENT: ${result.finalAnswer ?? "(no answer)"}\n`);
  console.log(formatRunSummary(result));
}

export function exitOnError(err: unknown): void {
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
