import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/** One item of a tools/call content list (text, image, audio, resource, ...). */
export type McpContentItem = CallToolResult["content"][number];

/** Result from an MCP tool call, envelope intact. */
export interface McpToolCallResult {
  content: McpContentItem[];
  isError: boolean;
}

/** A tool as listed by a server, in the shape persisted to the registry. */
export interface ToolDescriptor {
  serverName: string;
  toolName: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/** Per-server listing used for two-stage discovery. */
export interface ServerIndex {
  serverName: string;
  description: string;
  toolNames: string[];
  /** Tool name → file stem of its descriptor and wrapper. */
  toolFiles: Record<string, string>;
}
