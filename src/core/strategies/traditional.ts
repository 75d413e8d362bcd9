import type { ToolDescriptor } from "../../integrations/mcp/types.js";
import { formatToolResult } from "../../integrations/mcp/bridge.js";
import { namespacedToolName, toLLMTool } from "../../integrations/mcp/schema-mapper.js";
import { runAgentLoop } from "../agent-loop.js";
import type { LLMMessage, LLMToolDefinition } from "../llm/provider.js";
import { createRunContext, withRunContext } from "../run-context.js";
import { buildRunResult, prepareRun, type AgentRunResult, type StrategyOptions } from "./common.js";
import { TRADITIONAL_SYSTEM_PROMPT } from "./prompts.js";

interface OfferedTools {
  definitions: LLMToolDefinition[];
  lookup: Map<string, ToolDescriptor>;
}

/**
 * Offer every tool of every connected server as `<server>_<tool>`.
 * Names clipped or sanitised into a collision get a numeric suffix.
 */
export function offerAllTools(descriptors: ToolDescriptor[]): OfferedTools {
  const definitions: LLMToolDefinition[] = [];
  const lookup = new Map<string, ToolDescriptor>();

  for (const descriptor of descriptors) {
    const base = namespacedToolName(descriptor.serverName, descriptor.toolName);
    let name = base;
    for (let n = 2; lookup.has(name); n++) {
      const suffix = `_${n}`;
      name = `${base.slice(0, 64 - suffix.length)}${suffix}`;
    }
    lookup.set(name, descriptor);
    definitions.push(toLLMTool(descriptor, name));
  }

  return { definitions, lookup };
}

/** Traditional mode: all tools in context on every turn. */
export function runTraditional(options: StrategyOptions): Promise<AgentRunResult> {
  const ctx = createRunContext("traditional");

  return withRunContext(ctx, async () => {
    const run = prepareRun(options, "traditional");
    const { definitions, lookup } = offerAllTools(options.sessions.getAllTools());

    run.logger.info(
      { servers: options.sessions.getServerNames(), toolsInContext: definitions.length },
      "Loaded all tools into context"
    );

    const messages: LLMMessage[] = [
      { role: "system", content: TRADITIONAL_SYSTEM_PROMPT },
      { role: "user", content: run.query },
    ];

    const outcome = await runAgentLoop({
      chat: run.chat,
      messages,
      tools: definitions,
      label: "traditional",
      executeToolCall: async (call) => {
        const descriptor = lookup.get(call.name);
        if (!descriptor) {
          return `Error: Unknown tool '${call.name}'`;
        }
        const result = await run.bridge.dispatch(descriptor.serverName, descriptor.toolName, call.input);
        return formatToolResult(result);
      },
    });

    return buildRunResult(run, ctx, {
      ...outcome,
      toolsInContext: definitions.length,
      transcript: messages,
    });
  });
}
