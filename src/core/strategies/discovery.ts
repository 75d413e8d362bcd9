import { formatToolResult } from "../../integrations/mcp/bridge.js";
import { namespacedToolName, toLLMTool } from "../../integrations/mcp/schema-mapper.js";
import { RegistryStore } from "../../registry/store.js";
import { estimateTokens } from "../../utils/text.js";
import { requestChat, runAgentLoop } from "../agent-loop.js";
import type { LLMMessage } from "../llm/provider.js";
import { createRunContext, withRunContext } from "../run-context.js";
import {
  buildRunResult,
  prepareRun,
  type AgentRunResult,
  type StrategyOptions,
  type StrategyRun,
} from "./common.js";
import {
  DISCOVERY_AGENT_PROMPT,
  DISCOVERY_SERVER_PROMPT,
  DISCOVERY_TOOL_PROMPT,
  formatServerList,
  formatToolList,
} from "./prompts.js";

/**
 * Map a free-form pick ("`time`", "Time.", "I would use the time server")
 * onto one of the candidates. Exact matches win, then the longest candidate
 * mentioned as a whole word.
 */
export function resolveChoice(answer: string | null, candidates: string[]): string | null {
  if (!answer) return null;

  const cleaned = answer
    .trim()
    .replace(/^[\s"'`*]+|[\s"'`*.!]+$/g, "")
    .toLowerCase();

  const exact = candidates.find((c) => c.toLowerCase() === cleaned);
  if (exact) return exact;

  const text = answer.toLowerCase();
  const byLength = [...candidates].sort((a, b) => b.length - a.length);
  for (const candidate of byLength) {
    const escaped = candidate.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    if (new RegExp(`(^|[^a-z0-9_-])${escaped}($|[^a-z0-9_-])`).test(text)) {
      return candidate;
    }
  }
  return null;
}

type Pick =
  | { kind: "picked"; value: string }
  | { kind: "unresolved"; answer: string | null }
  | { kind: "budget" };

async function pick(
  run: StrategyRun,
  label: string,
  systemPrompt: string,
  listing: string,
  question: string,
  candidates: string[],
  transcript: LLMMessage[]
): Promise<Pick> {
  const messages: LLMMessage[] = [
    { role: "system", content: systemPrompt },
    { role: "user", content: `User query: ${run.query}\n\n${listing}\n\n${question}` },
  ];
  run.logger.info({ stage: label, estimatedTokens: estimateTokens(listing) }, "Model sees listing");

  const response = await requestChat(run.chat, label, messages);
  transcript.push(...messages);
  if (!response) return { kind: "budget" };
  transcript.push({ role: "assistant", content: response.text });

  const value = resolveChoice(response.text, candidates);
  run.logger.info({ stage: label, answer: response.text, resolved: value }, "Model picked");
  return value ? { kind: "picked", value } : { kind: "unresolved", answer: response.text };
}

/**
 * Discovery mode: the model picks a server, then a tool, from the registry
 * before the main loop runs with that single tool in context. Both picks
 * count against the run's turn budget.
 */
export function runDiscovery(options: StrategyOptions): Promise<AgentRunResult> {
  const ctx = createRunContext("discovery");

  return withRunContext(ctx, async () => {
    const run = prepareRun(options, "discovery");
    const store = new RegistryStore(options.config.registry.root);
    const transcript: LLMMessage[] = [];

    const stop = (stopReason: "discovery_failed" | "max_turns", finalAnswer: string | null) =>
      buildRunResult(run, ctx, {
        finalAnswer,
        stopReason,
        toolCallCount: 0,
        toolsInContext: 0,
        transcript,
      });

    const indexes = await store.readIndexes();
    if (indexes.length === 0) {
      run.logger.error({ root: store.root }, "Registry has no servers to discover");
      return stop("discovery_failed", null);
    }

    const server = await pick(
      run,
      "discover_server",
      DISCOVERY_SERVER_PROMPT,
      formatServerList(indexes),
      "Which server should I use?",
      indexes.map((i) => i.serverName),
      transcript
    );
    if (server.kind === "budget") return stop("max_turns", null);
    if (server.kind === "unresolved") {
      run.logger.warn({ answer: server.answer }, "Model picked no known server");
      return stop("discovery_failed", server.answer);
    }

    const index = await store.readIndex(server.value);
    const tool = await pick(
      run,
      "discover_tool",
      DISCOVERY_TOOL_PROMPT,
      formatToolList(index.toolNames),
      "Which tool should I use?",
      index.toolNames,
      transcript
    );
    if (tool.kind === "budget") return stop("max_turns", null);
    if (tool.kind === "unresolved") {
      run.logger.warn({ server: server.value, answer: tool.answer }, "Model picked no known tool");
      return stop("discovery_failed", tool.answer);
    }

    const descriptor = await store.readTool(server.value, tool.value);
    const definition = toLLMTool(descriptor, namespacedToolName(descriptor.serverName, descriptor.toolName));
    run.logger.info(
      { server: descriptor.serverName, tool: descriptor.toolName },
      "Discovered tool loaded into context"
    );

    const messages: LLMMessage[] = [
      { role: "system", content: DISCOVERY_AGENT_PROMPT },
      { role: "user", content: run.query },
    ];

    const outcome = await runAgentLoop({
      chat: run.chat,
      messages,
      tools: [definition],
      label: "discovery",
      executeToolCall: async (call) =>
        formatToolResult(
          await run.bridge.dispatch(descriptor.serverName, descriptor.toolName, call.input)
        ),
    });

    return buildRunResult(run, ctx, {
      ...outcome,
      toolsInContext: 1,
      selection: { serverName: descriptor.serverName, toolName: descriptor.toolName },
      transcript: [...transcript, ...messages],
    });
  });
}
