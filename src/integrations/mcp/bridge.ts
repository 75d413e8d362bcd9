import type { Logger } from "../../utils/logger.js";
import type { McpSessionTable } from "./session-table.js";
import type { McpContentItem } from "./types.js";

/**
 * Translates (server, tool, arguments) into a live MCP call and a
 * normalized result. dispatch() never rejects: an unavailable server or a
 * failing call resolves to an "Error: ..." string the model can read.
 */
export class McpBridge {
  private sessions: McpSessionTable;
  private logger: Logger;
  private calls = 0;

  constructor(sessions: McpSessionTable, logger: Logger) {
    this.sessions = sessions;
    this.logger = logger;
  }

  async dispatch(
    serverName: string,
    toolName: string,
    args: Record<string, unknown> = {}
  ): Promise<unknown> {
    const client = this.sessions.getClient(serverName);
    if (!client) {
      this.logger.warn({ server: serverName, tool: toolName }, "Dispatch to unconnected server");
      return `Error: Server '${serverName}' is not connected.`;
    }

    this.calls++;
    this.logger.debug({ server: serverName, tool: toolName, args }, "Dispatching MCP tool call");

    try {
      const result = await client.callTool(toolName, args);
      if (result.isError) {
        this.logger.info({ server: serverName, tool: toolName }, "MCP tool reported an error");
      }
      return normalizeContent(result.content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(
        { server: serverName, tool: toolName, error: message },
        "MCP tool call failed"
      );
      return `Error: Tool '${toolName}' on server '${serverName}' failed: ${message}`;
    }
  }

  /** Number of calls forwarded to a live server. */
  getCallCount(): number {
    return this.calls;
  }
}

/**
 * Unwrap a tools/call content list to its first text item, promoting JSON
 * objects and arrays to structured values. Lists without text fall back to
 * a short description of their items.
 */
export function normalizeContent(content: McpContentItem[]): unknown {
  for (const item of content) {
    if (item.type === "text") {
      return normalizeText(item.text);
    }
  }
  return content.map(describeContentItem).join("\n");
}

export function normalizeText(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    return text;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return text;
  }
}

function describeContentItem(item: McpContentItem): string {
  const kind: string = item.type;
  switch (item.type) {
    case "text":
      return item.text;
    case "image":
      return `[Image: ${item.mimeType}]`;
    case "audio":
      return `[Audio: ${item.mimeType}]`;
    case "resource":
      if ("text" in item.resource && typeof item.resource.text === "string") {
        return item.resource.text;
      }
      return `[Binary resource: ${item.resource.mimeType ?? "unknown"}]`;
    default:
      return `[${kind} content]`;
  }
}

/** Render a dispatch result as tool-message text. */
export function formatToolResult(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}
