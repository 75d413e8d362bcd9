import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { McpServerConfig } from "../../utils/config.js";
import type { McpContentItem, McpToolCallResult } from "./types.js";

export type TransportFactory = (serverName: string, config: McpServerConfig) => Transport;

/** Spawn the server as a subprocess speaking MCP over stdio. */
export const createStdioTransport: TransportFactory = (_serverName, config) =>
  new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: { ...inheritedEnv(), ...config.env },
    stderr: "ignore",
  });

export class McpClientWrapper {
  readonly serverName: string;
  private client: Client;
  private transport?: Transport;
  private config: McpServerConfig;
  private createTransport: TransportFactory;
  private connected = false;

  constructor(
    serverName: string,
    config: McpServerConfig,
    createTransport: TransportFactory = createStdioTransport
  ) {
    this.serverName = serverName;
    this.config = config;
    this.createTransport = createTransport;
    this.client = new Client(
      {
        name: "mcp-context-bench",
        version: "1.0.0",
      },
      {
        capabilities: {},
      }
    );
  }

  /** Start the server and run the initialize handshake, bounded by timeout_ms. */
  async connect(): Promise<void> {
    this.transport = this.createTransport(this.serverName, this.config);
    await this.client.connect(this.transport, { timeout: this.config.timeout_ms });
    this.connected = true;
  }

  /** Disconnect and terminate the subprocess. */
  async disconnect(): Promise<void> {
    this.connected = false;
    try {
      await this.client.close();
    } finally {
      if (this.transport) {
        await this.transport.close();
        this.transport = undefined;
      }
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** List available tools from the MCP server. */
  async listTools(): Promise<Tool[]> {
    const response = await this.client.listTools(undefined, {
      timeout: this.config.timeout_ms,
    });
    return response.tools;
  }

  /** Call an MCP tool. Only bounded by tool_timeout_ms when it is configured. */
  async callTool(
    toolName: string,
    args: Record<string, unknown>
  ): Promise<McpToolCallResult> {
    const raw = await this.client.callTool(
      { name: toolName, arguments: args },
      undefined,
      this.config.tool_timeout_ms !== undefined
        ? { timeout: this.config.tool_timeout_ms }
        : undefined
    );

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Malformed tools/call response from ${this.serverName}`);
    }

    const content: McpContentItem[] = parsed.data.content;
    return {
      content,
      isError: parsed.data.isError ?? false,
    };
  }
}

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}
