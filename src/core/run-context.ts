/**
 * Run context using AsyncLocalStorage.
 * Propagates the run id and strategy through the async call stack so every
 * log line of an agent run can be correlated.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { generateRunId } from "../utils/id.js";

export type AgentMode = "traditional" | "discovery" | "code";

export interface RunContext {
  runId: string;
  mode: AgentMode;
}

const runContext = new AsyncLocalStorage<RunContext>();

export function withRunContext<T>(
  ctx: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return runContext.run(ctx, fn);
}

export function getRunContext(): RunContext | undefined {
  return runContext.getStore();
}

export function createRunContext(mode: AgentMode): RunContext {
  return { runId: generateRunId(), mode };
}
