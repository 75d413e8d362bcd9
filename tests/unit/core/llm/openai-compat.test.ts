import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  OpenAICompatProvider,
  createProvider,
  parseToolCall,
} from "../../../../src/core/llm/openai-compat.js";
import { parseConfig } from "../../../../src/utils/config.js";

const mocks = vi.hoisted(() => ({
  create: vi.fn(),
  construct: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: mocks.create } };
    constructor(options: unknown) {
      mocks.construct(options);
    }
  },
}));

function completion(message: Record<string, unknown>, extra: Record<string, unknown> = {}) {
  return {
    id: "chatcmpl-1",
    model: "gpt-4o-mini",
    choices: [{ index: 0, finish_reason: "stop", message: { role: "assistant", ...message } }],
    usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 },
    ...extra,
  };
}

describe("OpenAICompatProvider", () => {
  let provider: OpenAICompatProvider;

  beforeEach(() => {
    mocks.create.mockReset();
    mocks.construct.mockReset();
    provider = new OpenAICompatProvider({ name: "openai", apiKey: "test-key" });
  });

  it("maps messages and tools onto the chat completions request", async () => {
    mocks.create.mockResolvedValueOnce(completion({ content: "done" }));

    await provider.chat({
      model: "gpt-4o-mini",
      temperature: 0,
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "hi" },
        {
          role: "assistant",
          content: null,
          toolCalls: [{ id: "call_1", name: "time_now", input: {}, rawArguments: "{}" }],
        },
        { role: "tool", toolCallId: "call_1", content: "noon" },
      ],
      tools: [
        {
          name: "time_now",
          description: "Current time",
          input_schema: { type: "object", properties: {} },
        },
      ],
    });

    expect(mocks.create).toHaveBeenCalledWith(
      {
        model: "gpt-4o-mini",
        max_tokens: 4096,
        temperature: 0,
        messages: [
          { role: "system", content: "sys" },
          { role: "user", content: "hi" },
          {
            role: "assistant",
            content: null,
            tool_calls: [
              { id: "call_1", type: "function", function: { name: "time_now", arguments: "{}" } },
            ],
          },
          { role: "tool", tool_call_id: "call_1", content: "noon" },
        ],
        tools: [
          {
            type: "function",
            function: {
              name: "time_now",
              description: "Current time",
              parameters: { type: "object", properties: {} },
            },
          },
        ],
      },
      { signal: undefined }
    );
  });

  it("omits tools and temperature when not given", async () => {
    mocks.create.mockResolvedValueOnce(completion({ content: "ok" }));

    await provider.chat({ model: "m", messages: [{ role: "user", content: "hi" }], maxTokens: 100 });

    expect(mocks.create.mock.calls[0]?.[0]).toEqual({
      model: "m",
      max_tokens: 100,
      messages: [{ role: "user", content: "hi" }],
    });
  });

  it("returns text and usage", async () => {
    mocks.create.mockResolvedValueOnce(completion({ content: "Hello" }));

    const response = await provider.chat({ model: "m", messages: [] });

    expect(response).toEqual({
      text: "Hello",
      toolCalls: [],
      stopReason: "end_turn",
      usage: { inputTokens: 120, outputTokens: 30 },
      model: "gpt-4o-mini",
      provider: "openai",
    });
  });

  it("parses tool calls from the response", async () => {
    mocks.create.mockResolvedValueOnce(
      completion({
        content: null,
        tool_calls: [
          {
            id: "call_9",
            type: "function",
            function: { name: "echo_echo", arguments: '{"text":"hi"}' },
          },
        ],
      })
    );

    const response = await provider.chat({ model: "m", messages: [] });

    expect(response.stopReason).toBe("tool_use");
    expect(response.toolCalls).toEqual([
      { id: "call_9", name: "echo_echo", input: { text: "hi" }, rawArguments: '{"text":"hi"}' },
    ]);
  });

  it("reports missing usage as null and maps length stops", async () => {
    mocks.create.mockResolvedValueOnce({
      id: "chatcmpl-2",
      model: "",
      choices: [{ index: 0, finish_reason: "length", message: { role: "assistant", content: "cut" } }],
    });

    const response = await provider.chat({ model: "local-model", messages: [] });

    expect(response.usage).toEqual({ inputTokens: null, outputTokens: null });
    expect(response.stopReason).toBe("max_tokens");
    expect(response.model).toBe("local-model");
  });

  it("propagates endpoint errors", async () => {
    mocks.create.mockRejectedValueOnce(new Error("429 rate limited"));

    await expect(provider.chat({ model: "m", messages: [] })).rejects.toThrow("429 rate limited");
  });
});

describe("parseToolCall", () => {
  it("treats empty arguments as an empty object", () => {
    expect(parseToolCall("c", "t", "  ")).toEqual({ id: "c", name: "t", input: {}, rawArguments: "  " });
  });

  it("keeps non-object JSON with a parse error", () => {
    expect(parseToolCall("c", "t", "[1]")).toEqual({
      id: "c",
      name: "t",
      input: {},
      rawArguments: "[1]",
      parseError: "arguments must be a JSON object",
    });
  });

  it("keeps malformed JSON with the parser's message", () => {
    const call = parseToolCall("c", "t", '{"text": ');

    expect(call.input).toEqual({});
    expect(call.rawArguments).toBe('{"text": ');
    expect(call.parseError).toEqual(expect.any(String));
  });
});

describe("createProvider", () => {
  beforeEach(() => {
    mocks.construct.mockReset();
  });

  it("requires an API key", () => {
    expect(() => createProvider(parseConfig({}).llm)).toThrow(
      "No API key configured: set OPENAI_API_KEY or llm.api_key"
    );
  });

  it("passes the key and base URL to the client", () => {
    const provider = createProvider(
      parseConfig({ llm: { api_key: "test-key", base_url: "http://localhost:8080/v1" } }).llm
    );

    expect(provider.name).toBe("openai");
    expect(mocks.construct).toHaveBeenCalledWith({
      apiKey: "test-key",
      baseURL: "http://localhost:8080/v1",
      defaultHeaders: undefined,
    });
  });
});
