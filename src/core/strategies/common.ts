import type { AppConfig } from "../../utils/config.js";
import type { Logger } from "../../utils/logger.js";
import type { McpSessionTable } from "../../integrations/mcp/session-table.js";
import { McpBridge } from "../../integrations/mcp/bridge.js";
import { TurnBudget, type AgentChat, type AgentLoopStopReason } from "../agent-loop.js";
import type { LLMMessage, LLMProvider } from "../llm/provider.js";
import { RunUsageTracker, type TokenCounters, type TurnUsageRecord } from "../llm/usage.js";
import type { AgentMode } from "../run-context.js";

export interface StrategyOptions {
  provider: LLMProvider;
  config: AppConfig;
  sessions: McpSessionTable;
  logger: Logger;
  /** Defaults to agent.query from the config. */
  query?: string;
  /** Defaults to agent.max_turns for the mode. */
  maxTurns?: number;
}

export type AgentStopReason = AgentLoopStopReason | "discovery_failed";

export interface AgentRunResult {
  runId: string;
  mode: AgentMode;
  query: string;
  model: string;
  finalAnswer: string | null;
  stopReason: AgentStopReason;
  chatRequests: number;
  maxTurns: number;
  toolCallCount: number;
  /** Tool definitions sent with the main loop's requests. */
  toolsInContext: number;
  usage: TokenCounters;
  turns: TurnUsageRecord[];
  estimatedCost: number | null;
  /** Discovery only: the server and tool the model picked. */
  selection?: { serverName: string; toolName: string };
  transcript: LLMMessage[];
}

export interface StrategyRun {
  chat: AgentChat;
  bridge: McpBridge;
  query: string;
  logger: Logger;
}

/** Per-run chat plumbing: a fresh budget, usage tracker and bridge. */
export function prepareRun(options: StrategyOptions, mode: AgentMode): StrategyRun {
  const { config, logger } = options;
  const maxTurns = options.maxTurns ?? config.agent.max_turns[mode];

  return {
    chat: {
      provider: options.provider,
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.max_response_tokens,
      budget: new TurnBudget(maxTurns),
      usage: new RunUsageTracker(config.llm.cost_per_million_tokens, logger),
      logger,
    },
    bridge: new McpBridge(options.sessions, logger),
    query: options.query ?? config.agent.query,
    logger,
  };
}

export function buildRunResult(
  run: StrategyRun,
  ids: { runId: string; mode: AgentMode },
  outcome: {
    finalAnswer: string | null;
    stopReason: AgentStopReason;
    toolCallCount: number;
    toolsInContext: number;
    transcript: LLMMessage[];
    selection?: { serverName: string; toolName: string };
  }
): AgentRunResult {
  const { chat } = run;
  return {
    runId: ids.runId,
    mode: ids.mode,
    query: run.query,
    model: chat.model,
    finalAnswer: outcome.finalAnswer,
    stopReason: outcome.stopReason,
    chatRequests: chat.budget.consumed,
    maxTurns: chat.budget.max,
    toolCallCount: outcome.toolCallCount,
    toolsInContext: outcome.toolsInContext,
    usage: chat.usage.getCounters(),
    turns: chat.usage.getRecords(),
    estimatedCost: chat.usage.getEstimatedCost(),
    selection: outcome.selection,
    transcript: outcome.transcript,
  };
}
