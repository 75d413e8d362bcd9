import { mkdir, rm, writeFile } from "node:fs/promises";
import { join, parse, resolve } from "node:path";
import type { McpServerConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import {
  withSessions,
  type ServerConnectResult,
  type SessionTableOptions,
} from "../integrations/mcp/session-table.js";
import type { ServerIndex, ToolDescriptor } from "../integrations/mcp/types.js";
import {
  ENTRY_MODULE_FILE,
  INDEX_FILE,
  README_FILE,
  descriptorToFile,
  indexToFile,
  assignToolFiles,
  serializeJson,
  toolFileOf,
} from "./format.js";
import {
  generateServerEntry,
  generateServerReadme,
  generateToolWrapper,
  wrapperFileName,
} from "./wrapper-generator.js";

export interface BuildRegistryOptions {
  root: string;
  servers: Record<string, McpServerConfig>;
  /** Also write wrapper modules, index.js and INDEX.md for code mode. */
  wrappers?: boolean;
  logger: Logger;
  sessionOptions?: SessionTableOptions;
}

export interface ServerBuildResult {
  name: string;
  status: "built" | "skipped" | "failed";
  toolCount: number;
  error?: string;
}

export interface RegistryBuildReport {
  root: string;
  servers: ServerBuildResult[];
  toolCount: number;
}

/**
 * Recreate the registry from live servers. Destructive: the root directory
 * is deleted first. Servers that cannot be started or listed are skipped
 * and leave no directory behind.
 */
export async function buildRegistry(options: BuildRegistryOptions): Promise<RegistryBuildReport> {
  const { logger, servers, wrappers = false } = options;
  const root = resolve(options.root);

  assertSafeRoot(root);

  logger.info({ root, wrappers }, "Building tool registry");
  await rm(root, { recursive: true, force: true });
  await mkdir(root, { recursive: true });

  const results = await withSessions(
    servers,
    logger,
    async (sessions, connectResults) => {
      const built: ServerBuildResult[] = [];
      for (const connect of connectResults) {
        if (connect.status !== "connected") {
          built.push(fromConnectResult(connect));
          continue;
        }

        const tools = sessions.getTools(connect.name);
        const toolNames = tools.map((t) => t.toolName);
        const index: ServerIndex = {
          serverName: connect.name,
          description:
            servers[connect.name]?.description ?? `Official tools for ${connect.name}.`,
          toolNames,
          toolFiles: assignToolFiles(toolNames),
        };

        try {
          await writeServer(root, index, tools, wrappers);
          logger.info({ server: connect.name, toolCount: tools.length }, "Registry entries written");
          built.push({ name: connect.name, status: "built", toolCount: tools.length });
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ server: connect.name, error: message }, "Failed to write registry entries");
          await rm(join(root, connect.name), { recursive: true, force: true });
          built.push({ name: connect.name, status: "failed", toolCount: 0, error: message });
        }
      }
      return built;
    },
    options.sessionOptions
  );

  const toolCount = results.reduce((sum, r) => sum + r.toolCount, 0);
  logger.info(
    {
      built: results.filter((r) => r.status === "built").length,
      skipped: results.filter((r) => r.status === "skipped").length,
      failed: results.filter((r) => r.status === "failed").length,
      toolCount,
    },
    "Registry build complete"
  );

  return { root, servers: results, toolCount };
}

async function writeServer(
  root: string,
  index: ServerIndex,
  tools: ToolDescriptor[],
  wrappers: boolean
): Promise<void> {
  const serverDir = join(root, index.serverName);
  await mkdir(serverDir, { recursive: true });

  for (const tool of tools) {
    const stem = toolFileOf(index, tool.toolName);
    await writeFile(join(serverDir, `${stem}.json`), serializeJson(descriptorToFile(tool)));
    if (wrappers) {
      await writeFile(join(serverDir, wrapperFileName(index, tool.toolName)), generateToolWrapper(tool));
    }
  }

  await writeFile(join(serverDir, INDEX_FILE), serializeJson(indexToFile(index)));

  if (wrappers) {
    await writeFile(join(serverDir, ENTRY_MODULE_FILE), generateServerEntry(index));
    await writeFile(join(serverDir, README_FILE), generateServerReadme(index, tools));
  }
}

function fromConnectResult(connect: ServerConnectResult): ServerBuildResult {
  return {
    name: connect.name,
    status: connect.status === "failed" ? "failed" : "skipped",
    toolCount: 0,
    error: connect.error,
  };
}

/** Refuse to wipe the filesystem root or the working directory. */
function assertSafeRoot(root: string): void {
  if (root === parse(root).root || root === resolve(process.cwd())) {
    throw new Error(`Refusing to use ${root} as registry root: it would be deleted`);
  }
}
