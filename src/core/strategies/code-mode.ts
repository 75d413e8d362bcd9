import { CodeRuntime } from "../code-runtime.js";
import { runAgentLoop } from "../agent-loop.js";
import type { LLMMessage, LLMToolDefinition } from "../llm/provider.js";
import { createRunContext, withRunContext } from "../run-context.js";
import { buildRunResult, prepareRun, type AgentRunResult, type StrategyOptions } from "./common.js";
import { CODE_MODE_SYSTEM_PROMPT, CODE_MODE_USER_SUFFIX } from "./prompts.js";

export const RUN_CODE_TOOL: LLMToolDefinition = {
  name: "run_code",
  description:
    "Executes JavaScript against the MCP tool registry. Use listDir/readFile to explore it and require() to load tool wrappers.",
  input_schema: {
    type: "object",
    properties: { code: { type: "string", description: "JavaScript to run; return a value to see it." } },
    required: ["code"],
  },
};

/** Text inside the first <Answer></Answer> pair, else the whole text. */
export function extractAnswer(text: string | null): string | null {
  if (text === null) return null;
  const match = /<Answer>([\s\S]*?)<\/Answer>/i.exec(text);
  return match?.[1] !== undefined ? match[1].trim() : text;
}

/**
 * Code mode: a single run_code tool; the model finds the real tools by
 * exploring the registry's generated wrappers from its own code.
 */
export function runCodeMode(options: StrategyOptions): Promise<AgentRunResult> {
  const ctx = createRunContext("code");

  return withRunContext(ctx, async () => {
    const run = prepareRun(options, "code");
    const runtime = new CodeRuntime({
      registryRoot: options.config.registry.root,
      callTool: (serverName, toolName, args) => run.bridge.dispatch(serverName, toolName, args),
      timeoutMs: options.config.agent.code_timeout_ms,
      logger: run.logger,
    });

    const messages: LLMMessage[] = [
      { role: "system", content: CODE_MODE_SYSTEM_PROMPT },
      { role: "user", content: `${run.query}\n\n${CODE_MODE_USER_SUFFIX}` },
    ];

    const outcome = await runAgentLoop({
      chat: run.chat,
      messages,
      tools: [RUN_CODE_TOOL],
      label: "code",
      executeToolCall: async (call) => {
        const code = call.input.code;
        if (typeof code !== "string") {
          throw new Error("run_code expects a string 'code' argument");
        }
        run.logger.debug({ code }, "Model wrote code");
        return runtime.execute(code);
      },
    });

    return buildRunResult(run, ctx, {
      ...outcome,
      finalAnswer: extractAnswer(outcome.finalAnswer),
      toolsInContext: 1,
      transcript: messages,
    });
  });
}
