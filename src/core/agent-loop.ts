import type { Logger } from "../utils/logger.js";
import type {
  LLMMessage,
  LLMProvider,
  LLMResponse,
  LLMToolCall,
  LLMToolDefinition,
} from "./llm/provider.js";
import type { RunUsageTracker } from "./llm/usage.js";

/**
 * Upper bound on chat requests for one run. Shared by every stage of a
 * strategy so sub-dialogs count against the same limit as the main loop.
 */
export class TurnBudget {
  private used = 0;

  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new Error(`Turn budget must be a positive integer, got ${max}`);
    }
  }

  tryConsume(): boolean {
    if (this.used >= this.max) return false;
    this.used++;
    return true;
  }

  get consumed(): number {
    return this.used;
  }

  get remaining(): number {
    return this.max - this.used;
  }
}

/** Everything needed to send a chat request on behalf of one run. */
export interface AgentChat {
  provider: LLMProvider;
  model: string;
  temperature?: number;
  maxTokens?: number;
  budget: TurnBudget;
  usage: RunUsageTracker;
  logger: Logger;
}

/**
 * Send one chat request if the budget allows it, recording its usage.
 * Returns null when the budget is spent. Endpoint errors propagate.
 */
export async function requestChat(
  chat: AgentChat,
  label: string,
  messages: LLMMessage[],
  tools?: LLMToolDefinition[]
): Promise<LLMResponse | null> {
  if (!chat.budget.tryConsume()) {
    return null;
  }

  const response = await chat.provider.chat({
    model: chat.model,
    messages: [...messages],
    tools: tools && tools.length > 0 ? tools : undefined,
    maxTokens: chat.maxTokens,
    temperature: chat.temperature,
  });
  chat.usage.track(label, chat.model, response.usage);
  return response;
}

/** Executes one validated tool call and returns the tool-message text. */
export type ToolExecutor = (call: LLMToolCall) => Promise<string>;

export type AgentLoopStopReason = "final_answer" | "max_turns";

export interface AgentLoopOptions {
  chat: AgentChat;
  /** Conversation so far; appended to in place. */
  messages: LLMMessage[];
  tools: LLMToolDefinition[];
  executeToolCall: ToolExecutor;
  label?: string;
}

export interface AgentLoopResult {
  finalAnswer: string | null;
  stopReason: AgentLoopStopReason;
  toolCallCount: number;
}

/**
 * awaiting_model_response → dispatching_calls → awaiting_model_response,
 * until the model answers without tool calls or the budget runs out.
 * Tool calls are executed one at a time; every failure is returned to the
 * model as an "Error: ..." tool result.
 */
export async function runAgentLoop(options: AgentLoopOptions): Promise<AgentLoopResult> {
  const { chat, messages, tools, executeToolCall, label = "agent" } = options;
  const offered = new Set(tools.map((t) => t.name));
  let toolCallCount = 0;
  let lastText: string | null = null;

  for (;;) {
    const response = await requestChat(chat, label, messages, tools);
    if (!response) {
      chat.logger.warn(
        { maxTurns: chat.budget.max, toolCallCount },
        "Turn budget exhausted before a final answer"
      );
      return { finalAnswer: lastText, stopReason: "max_turns", toolCallCount };
    }

    lastText = response.text ?? lastText;

    if (response.toolCalls.length === 0) {
      messages.push({ role: "assistant", content: response.text });
      return { finalAnswer: response.text ?? "", stopReason: "final_answer", toolCallCount };
    }

    messages.push({ role: "assistant", content: response.text, toolCalls: response.toolCalls });

    for (const call of response.toolCalls) {
      toolCallCount++;
      const content = await executeOne(call, offered, executeToolCall, chat.logger);
      messages.push({ role: "tool", toolCallId: call.id, content });
    }
  }
}

async function executeOne(
  call: LLMToolCall,
  offered: Set<string>,
  execute: ToolExecutor,
  logger: Logger
): Promise<string> {
  if (!offered.has(call.name)) {
    logger.warn({ tool: call.name }, "Model requested a tool that was not offered");
    return `Error: Unknown tool '${call.name}'`;
  }

  if (call.parseError) {
    logger.warn({ tool: call.name, error: call.parseError }, "Tool call arguments did not parse");
    return `Error: Invalid arguments for '${call.name}': ${call.parseError}`;
  }

  logger.info({ tool: call.name }, "Calling tool");
  logger.debug({ tool: call.name, args: call.input }, "Tool arguments");
  try {
    const result = await execute(call);
    logger.debug({ tool: call.name, result: result.slice(0, 200) }, "Tool result");
    return result;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ tool: call.name, error: message }, "Tool execution error");
    return `Error: Tool '${call.name}' failed: ${message}`;
  }
}
