import type { McpServerConfig } from "../../utils/config.js";
import type { Logger } from "../../utils/logger.js";
import { McpClientWrapper, createStdioTransport, type TransportFactory } from "./client.js";
import { commandExists } from "./command.js";
import { filterMcpTools, toToolDescriptor } from "./schema-mapper.js";
import type { ToolDescriptor } from "./types.js";

interface SessionState {
  client: McpClientWrapper;
  tools: ToolDescriptor[];
}

export type ServerConnectStatus = "connected" | "skipped" | "failed";

export interface ServerConnectResult {
  name: string;
  status: ServerConnectStatus;
  toolCount: number;
  error?: string;
}

export interface SessionTableOptions {
  createTransport?: TransportFactory;
  /** Launch-command probe; the default searches PATH. */
  commandExists?: (command: string) => boolean;
}

/**
 * Live MCP connections for one run, keyed by server name.
 * Constructed explicitly and passed to the bridge and strategies; every
 * connection it opens is closed by closeAll().
 */
export class McpSessionTable {
  private sessions = new Map<string, SessionState>();
  private logger: Logger;
  private createTransport: TransportFactory;
  private probeCommand: (command: string) => boolean;

  constructor(logger: Logger, options: SessionTableOptions = {}) {
    this.logger = logger;
    this.createTransport = options.createTransport ?? createStdioTransport;
    this.probeCommand = options.commandExists ?? ((command) => commandExists(command));
  }

  /**
   * Connect to every enabled server concurrently and list its tools.
   * Unavailable servers are logged and skipped; this never rejects.
   */
  async connectAll(servers: Record<string, McpServerConfig>): Promise<ServerConnectResult[]> {
    const outcomes = await Promise.all(
      Object.entries(servers).map(([serverName, config]) =>
        this.connectServer(serverName, config)
      )
    );

    // Registered after the fan-out so lookup order follows config order
    for (const outcome of outcomes) {
      if (outcome.state) {
        this.sessions.set(outcome.result.name, outcome.state);
      }
    }
    return outcomes.map((o) => o.result);
  }

  private async connectServer(
    serverName: string,
    config: McpServerConfig
  ): Promise<{ result: ServerConnectResult; state?: SessionState }> {
    if (!config.enabled) {
      this.logger.info({ server: serverName }, "MCP server disabled, skipping");
      return { result: { name: serverName, status: "skipped", toolCount: 0, error: "disabled" } };
    }

    if (!this.probeCommand(config.command)) {
      this.logger.warn(
        { server: serverName, command: config.command },
        "Launch command not found, skipping MCP server"
      );
      return {
        result: {
          name: serverName,
          status: "skipped",
          toolCount: 0,
          error: `${config.command} not found`,
        },
      };
    }

    const client = new McpClientWrapper(serverName, config, this.createTransport);

    try {
      await client.connect();
      const allTools = await client.listTools();
      const tools = filterMcpTools(allTools, config).map((tool) =>
        toToolDescriptor(tool, serverName)
      );

      this.logger.info(
        { server: serverName, totalTools: allTools.length, filteredTools: tools.length },
        "MCP server connected and tools discovered"
      );

      return {
        result: { name: serverName, status: "connected", toolCount: tools.length },
        state: { client, tools },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ server: serverName, error: message }, "Failed to connect to MCP server");
      await this.safeDisconnect(serverName, client);
      return { result: { name: serverName, status: "failed", toolCount: 0, error: message } };
    }
  }

  getClient(serverName: string): McpClientWrapper | undefined {
    return this.sessions.get(serverName)?.client;
  }

  has(serverName: string): boolean {
    return this.sessions.has(serverName);
  }

  /** Connected server names, in connection-config order. */
  getServerNames(): string[] {
    return Array.from(this.sessions.keys());
  }

  getTools(serverName: string): ToolDescriptor[] {
    return this.sessions.get(serverName)?.tools ?? [];
  }

  getAllTools(): ToolDescriptor[] {
    return Array.from(this.sessions.values()).flatMap((s) => s.tools);
  }

  /** Close every connection and terminate its subprocess. */
  async closeAll(): Promise<void> {
    const sessions = Array.from(this.sessions.entries());
    this.sessions.clear();

    await Promise.all(
      sessions.map(([serverName, state]) => this.safeDisconnect(serverName, state.client))
    );

    if (sessions.length > 0) {
      this.logger.debug({ servers: sessions.map(([name]) => name) }, "MCP sessions closed");
    }
  }

  private async safeDisconnect(serverName: string, client: McpClientWrapper): Promise<void> {
    try {
      await client.disconnect();
    } catch (err) {
      this.logger.warn(
        { server: serverName, error: err instanceof Error ? err.message : String(err) },
        "Failed to disconnect MCP server"
      );
    }
  }
}

/**
 * Run `fn` with a session table connected to `servers`; the table is closed
 * when `fn` settles, including when it throws.
 */
export async function withSessions<T>(
  servers: Record<string, McpServerConfig>,
  logger: Logger,
  fn: (sessions: McpSessionTable, results: ServerConnectResult[]) => Promise<T>,
  options?: SessionTableOptions
): Promise<T> {
  const sessions = new McpSessionTable(logger, options);
  try {
    const results = await sessions.connectAll(servers);
    return await fn(sessions, results);
  } finally {
    await sessions.closeAll();
  }
}
