import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LLMResponse, LLMToolCall } from "../../src/core/llm/provider.js";
import { parseConfig, type AppConfig, type McpServerConfig } from "../../src/utils/config.js";

export function createTextResponse(
  text: string | null,
  usage: { inputTokens: number | null; outputTokens: number | null } = {
    inputTokens: 100,
    outputTokens: 50,
  }
): LLMResponse {
  return {
    text,
    toolCalls: [],
    stopReason: "end_turn",
    usage,
    model: "mock-model",
    provider: "mock",
  };
}

export function createToolUseResponse(
  toolCalls: LLMToolCall[],
  text: string | null = null
): LLMResponse {
  return {
    text,
    toolCalls,
    stopReason: "tool_use",
    usage: { inputTokens: 150, outputTokens: 75 },
    model: "mock-model",
    provider: "mock",
  };
}

let callCounter = 0;

export function createToolCall(
  name: string,
  input: Record<string, unknown> = {},
  id?: string
): LLMToolCall {
  return {
    id: id ?? `call_${++callCounter}`,
    name,
    input,
    rawArguments: JSON.stringify(input),
  };
}

export function createServerConfig(overrides: Partial<McpServerConfig> = {}): McpServerConfig {
  return {
    enabled: true,
    command: "node",
    args: [],
    timeout_ms: 5000,
    tool_blocklist: [],
    ...overrides,
  };
}

/** Defaults plus the given sections, validated like a loaded file. */
export function createTestConfig(raw: Record<string, unknown> = {}): AppConfig {
  return parseConfig({ llm: { model: "mock-model" }, ...raw });
}

export async function createTempDir(prefix = "mcp-bench-"): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}
