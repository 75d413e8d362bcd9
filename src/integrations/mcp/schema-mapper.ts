import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { LLMToolDefinition } from "../../core/llm/provider.js";
import type { McpServerConfig } from "../../utils/config.js";
import type { ToolDescriptor } from "./types.js";

const NO_DESCRIPTION = "No description provided.";

/**
 * Map a listed MCP tool to a registry descriptor.
 * The schema is deep-cloned so the descriptor never aliases SDK objects.
 */
export function toToolDescriptor(tool: Tool, serverName: string): ToolDescriptor {
  const inputSchema: Record<string, unknown> = JSON.parse(
    JSON.stringify(tool.inputSchema)
  );

  return {
    serverName,
    toolName: tool.name,
    description: tool.description?.trim() || NO_DESCRIPTION,
    inputSchema,
  };
}

/** Offer a descriptor to the chat model under the given function name. */
export function toLLMTool(descriptor: ToolDescriptor, name = descriptor.toolName): LLMToolDefinition {
  return {
    name,
    description: descriptor.description,
    input_schema: descriptor.inputSchema,
  };
}

/**
 * Build a chat-API-safe function name for a server tool: `<server>_<tool>`
 * restricted to [A-Za-z0-9_-] and 64 characters.
 */
export function namespacedToolName(serverName: string, toolName: string): string {
  return `${serverName}_${toolName}`.replace(/[^A-Za-z0-9_-]/g, "_").slice(0, 64);
}

/**
 * Filter MCP tools based on allowlist/blocklist configuration.
 */
export function filterMcpTools(
  tools: Tool[],
  config: Pick<McpServerConfig, "tool_allowlist" | "tool_blocklist">
): Tool[] {
  return tools.filter((tool) => {
    // Check blocklist first
    if (config.tool_blocklist.includes(tool.name)) {
      return false;
    }

    // Check allowlist if configured
    if (config.tool_allowlist && config.tool_allowlist.length > 0) {
      return config.tool_allowlist.includes(tool.name);
    }

    return true;
  });
}
