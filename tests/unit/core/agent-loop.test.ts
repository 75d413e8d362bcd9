import { describe, it, expect, vi } from "vitest";
import {
  TurnBudget,
  runAgentLoop,
  type AgentChat,
  type ToolExecutor,
} from "../../../src/core/agent-loop.js";
import type { LLMMessage, LLMToolDefinition } from "../../../src/core/llm/provider.js";
import { RunUsageTracker } from "../../../src/core/llm/usage.js";
import { chatParams, createMockLogger, createMockProvider } from "../../helpers/mocks.js";
import {
  createTextResponse,
  createToolCall,
  createToolUseResponse,
} from "../../helpers/fixtures.js";

const ECHO_TOOL: LLMToolDefinition = {
  name: "echo",
  description: "Echo text",
  input_schema: { type: "object", properties: { text: { type: "string" } } },
};

function createChat(provider: ReturnType<typeof createMockProvider>, maxTurns = 5): AgentChat {
  const logger = createMockLogger();
  return {
    provider,
    model: "mock-model",
    budget: new TurnBudget(maxTurns),
    usage: new RunUsageTracker(undefined, logger),
    logger,
  };
}

function conversation(): LLMMessage[] {
  return [
    { role: "system", content: "system prompt" },
    { role: "user", content: "say hi" },
  ];
}

describe("TurnBudget", () => {
  it("allows exactly max requests", () => {
    const budget = new TurnBudget(2);
    expect([budget.tryConsume(), budget.tryConsume(), budget.tryConsume()]).toEqual([
      true,
      true,
      false,
    ]);
    expect(budget.consumed).toBe(2);
    expect(budget.remaining).toBe(0);
  });

  it("rejects budgets below one", () => {
    expect(() => new TurnBudget(0)).toThrow("Turn budget must be a positive integer, got 0");
    expect(() => new TurnBudget(1.5)).toThrow();
  });
});

describe("runAgentLoop", () => {
  it("ends with the first answer that requests no tools", async () => {
    const provider = createMockProvider({ responses: [createTextResponse("hello")] });
    const messages = conversation();
    const execute = vi.fn<ToolExecutor>();

    const result = await runAgentLoop({
      chat: createChat(provider),
      messages,
      tools: [ECHO_TOOL],
      executeToolCall: execute,
    });

    expect(result).toEqual({ finalAnswer: "hello", stopReason: "final_answer", toolCallCount: 0 });
    expect(provider.chatMock).toHaveBeenCalledTimes(1);
    expect(execute).not.toHaveBeenCalled();
    expect(messages.at(-1)).toEqual({ role: "assistant", content: "hello" });
  });

  it("dispatches requested calls and feeds results back", async () => {
    const call = createToolCall("echo", { text: "hi" }, "call_1");
    const provider = createMockProvider({
      responses: [createToolUseResponse([call]), createTextResponse("hi")],
    });
    const messages = conversation();
    const execute = vi.fn<ToolExecutor>(async (c) => String(c.input.text));

    const result = await runAgentLoop({
      chat: createChat(provider),
      messages,
      tools: [ECHO_TOOL],
      executeToolCall: execute,
    });

    expect(result).toEqual({ finalAnswer: "hi", stopReason: "final_answer", toolCallCount: 1 });
    expect(provider.chatMock).toHaveBeenCalledTimes(2);
    expect(execute).toHaveBeenCalledWith(call);

    expect(chatParams(provider, 1).messages.slice(2)).toEqual([
      { role: "assistant", content: null, toolCalls: [call] },
      { role: "tool", toolCallId: "call_1", content: "hi" },
    ]);
    expect(chatParams(provider, 0).messages).toHaveLength(2);
  });

  it("logs tool arguments only at debug level", async () => {
    const call = createToolCall("echo", { text: "secret source" }, "call_1");
    const provider = createMockProvider({
      responses: [createToolUseResponse([call]), createTextResponse("done")],
    });
    const chat = createChat(provider);

    await runAgentLoop({
      chat,
      messages: conversation(),
      tools: [ECHO_TOOL],
      executeToolCall: async () => "ok",
    });

    expect(chat.logger.info).toHaveBeenCalledWith({ tool: "echo" }, "Calling tool");
    expect(chat.logger.debug).toHaveBeenCalledWith(
      { tool: "echo", args: { text: "secret source" } },
      "Tool arguments"
    );
    expect(chat.logger.info).not.toHaveBeenCalledWith(
      expect.objectContaining({ args: expect.anything() }),
      expect.anything()
    );
  });

  it("issues at most max-turns requests however many calls are requested", async () => {
    const provider = createMockProvider();
    provider.chatMock.mockImplementation(async () =>
      createToolUseResponse(
        [createToolCall("echo", { text: "a" }), createToolCall("echo", { text: "b" })],
        "still working"
      )
    );
    const chat = createChat(provider, 3);

    const result = await runAgentLoop({
      chat,
      messages: conversation(),
      tools: [ECHO_TOOL],
      executeToolCall: async () => "ok",
    });

    expect(provider.chatMock).toHaveBeenCalledTimes(3);
    expect(result).toEqual({
      finalAnswer: "still working",
      stopReason: "max_turns",
      toolCallCount: 6,
    });
    expect(chat.logger.warn).toHaveBeenCalledWith(
      { maxTurns: 3, toolCallCount: 6 },
      "Turn budget exhausted before a final answer"
    );
  });

  it("answers calls to tools that were not offered with an error", async () => {
    const provider = createMockProvider({
      responses: [createToolUseResponse([createToolCall("rm_rf", {}, "call_x")]), createTextResponse("ok")],
    });
    const messages = conversation();
    const execute = vi.fn<ToolExecutor>();

    await runAgentLoop({ chat: createChat(provider), messages, tools: [ECHO_TOOL], executeToolCall: execute });

    expect(execute).not.toHaveBeenCalled();
    expect(messages[3]).toEqual({ role: "tool", toolCallId: "call_x", content: "Error: Unknown tool 'rm_rf'" });
  });

  it("answers unparseable arguments with an error", async () => {
    const provider = createMockProvider({
      responses: [
        createToolUseResponse([
          { id: "call_bad", name: "echo", input: {}, rawArguments: "{oops", parseError: "Unexpected token" },
        ]),
        createTextResponse("ok"),
      ],
    });
    const messages = conversation();
    const execute = vi.fn<ToolExecutor>();

    await runAgentLoop({ chat: createChat(provider), messages, tools: [ECHO_TOOL], executeToolCall: execute });

    expect(execute).not.toHaveBeenCalled();
    expect(messages[3]).toEqual({
      role: "tool",
      toolCallId: "call_bad",
      content: "Error: Invalid arguments for 'echo': Unexpected token",
    });
  });

  it("turns executor failures into tool results", async () => {
    const provider = createMockProvider({
      responses: [createToolUseResponse([createToolCall("echo", {}, "call_e")]), createTextResponse("sorry")],
    });
    const messages = conversation();

    const result = await runAgentLoop({
      chat: createChat(provider),
      messages,
      tools: [ECHO_TOOL],
      executeToolCall: async () => {
        throw new Error("boom");
      },
    });

    expect(result.finalAnswer).toBe("sorry");
    expect(messages[3]).toEqual({ role: "tool", toolCallId: "call_e", content: "Error: Tool 'echo' failed: boom" });
  });

  it("propagates chat endpoint failures", async () => {
    const provider = createMockProvider();
    provider.chatMock.mockRejectedValueOnce(new Error("502 Bad Gateway"));

    await expect(
      runAgentLoop({
        chat: createChat(provider),
        messages: conversation(),
        tools: [ECHO_TOOL],
        executeToolCall: async () => "",
      })
    ).rejects.toThrow("502 Bad Gateway");
  });

  it("sends no tool list when none are offered", async () => {
    const provider = createMockProvider({ responses: [createTextResponse("plain")] });

    await runAgentLoop({
      chat: createChat(provider),
      messages: conversation(),
      tools: [],
      executeToolCall: async () => "",
    });

    expect(chatParams(provider, 0).tools).toBeUndefined();
    expect(chatParams(provider, 0).model).toBe("mock-model");
  });

  it("accumulates token usage per request", async () => {
    const provider = createMockProvider({
      responses: [createToolUseResponse([createToolCall("echo", { text: "x" })]), createTextResponse("x")],
    });
    const chat = createChat(provider);

    await runAgentLoop({ chat, messages: conversation(), tools: [ECHO_TOOL], executeToolCall: async () => "x" });

    expect(chat.usage.getCounters()).toEqual({ promptTokens: 250, completionTokens: 125 });
    expect(chat.usage.getRecords().map((r) => r.turn)).toEqual([1, 2]);
  });
});
