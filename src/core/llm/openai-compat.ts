import OpenAI from "openai";
import type {
  LLMProvider,
  LLMChatParams,
  LLMMessage,
  LLMResponse,
  LLMToolCall,
  LLMToolDefinition,
} from "./provider.js";
import type { LLMConfig } from "../../utils/config.js";

export interface OpenAICompatConfig {
  baseURL?: string;
  apiKey: string;
  name: string;
  defaultHeaders?: Record<string, string>;
}

export class OpenAICompatProvider implements LLMProvider {
  readonly name: string;
  private client: OpenAI;

  constructor(config: OpenAICompatConfig) {
    this.name = config.name;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      defaultHeaders: config.defaultHeaders,
    });
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const tools = params.tools?.map((t) => this.toOpenAITool(t));

    const requestParams: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: params.model,
      messages: params.messages.map((m) => this.toOpenAIMessage(m)),
      max_tokens: params.maxTokens ?? 4096,
      ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
      ...(tools && tools.length > 0 ? { tools } : {}),
    };

    const response = await this.client.chat.completions.create(requestParams, {
      signal: params.signal,
    });

    return this.toResponse(response, params.model);
  }

  private toOpenAIMessage(message: LLMMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };

      case "user":
        return { role: "user", content: message.content };

      case "assistant":
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: "assistant",
            content: message.content,
            tool_calls: message.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.name, arguments: tc.rawArguments },
            })),
          };
        }
        return { role: "assistant", content: message.content ?? "" };

      case "tool":
        return {
          role: "tool",
          tool_call_id: message.toolCallId,
          content: message.content,
        };
    }
  }

  private toOpenAITool(tool: LLMToolDefinition): OpenAI.ChatCompletionTool {
    return {
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.input_schema,
      },
    };
  }

  private toResponse(response: OpenAI.ChatCompletion, model: string): LLMResponse {
    const choice = response.choices[0];
    const message = choice?.message;

    const toolCalls: LLMToolCall[] = [];

    for (const tc of message?.tool_calls ?? []) {
      if (tc.type !== "function") continue;
      toolCalls.push(parseToolCall(tc.id, tc.function.name, tc.function.arguments));
    }

    return {
      text: message?.content ?? null,
      toolCalls,
      stopReason: toolCalls.length > 0 ? "tool_use" : this.mapStopReason(choice?.finish_reason),
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? null,
        outputTokens: response.usage?.completion_tokens ?? null,
      },
      model: response.model || model,
      provider: this.name,
    };
  }

  private mapStopReason(
    reason: string | null | undefined
  ): "end_turn" | "tool_use" | "max_tokens" {
    switch (reason) {
      case "tool_calls":
        return "tool_use";
      case "length":
        return "max_tokens";
      default:
        return "end_turn";
    }
  }
}

/** Parse a function call's argument string; malformed arguments are kept, not thrown. */
export function parseToolCall(id: string, name: string, rawArguments: string): LLMToolCall {
  const source = rawArguments.trim() === "" ? "{}" : rawArguments;
  try {
    const parsed: unknown = JSON.parse(source);
    if (isRecord(parsed)) {
      return { id, name, input: parsed, rawArguments };
    }
    return { id, name, input: {}, rawArguments, parseError: "arguments must be a JSON object" };
  } catch (err) {
    return {
      id,
      name,
      input: {},
      rawArguments,
      parseError: err instanceof Error ? err.message : String(err),
    };
  }
}

/** Build the chat provider from the llm config section. */
export function createProvider(config: LLMConfig): OpenAICompatProvider {
  if (!config.api_key) {
    throw new Error("No API key configured: set OPENAI_API_KEY or llm.api_key");
  }
  return new OpenAICompatProvider({
    name: "openai",
    apiKey: config.api_key,
    baseURL: config.base_url,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
