import { readFile, readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { z } from "zod";
import type { ServerIndex, ToolDescriptor } from "../integrations/mcp/types.js";
import {
  ENTRY_MODULE_FILE,
  INDEX_FILE,
  ServerIndexFileSchema,
  ToolDescriptorFileSchema,
  descriptorFromFile,
  indexFromFile,
  toolFileOf,
} from "./format.js";

/**
 * Read-only view of an on-disk tool registry:
 * `<root>/<server>/index.json` plus `<root>/<server>/<tool>.json`.
 */
export class RegistryStore {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.root)).isDirectory();
    } catch {
      return false;
    }
  }

  /** Server directories that carry an index, sorted by name. */
  async listServers(): Promise<string[]> {
    const entries = await readdir(this.root, { withFileTypes: true });
    const servers: string[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      try {
        if ((await stat(join(this.root, entry.name, INDEX_FILE))).isFile()) {
          servers.push(entry.name);
        }
      } catch {
        // directory without an index is not a server
      }
    }
    return servers.sort();
  }

  /** True when at least one server carries a generated entry module. */
  async hasEntryModules(): Promise<boolean> {
    for (const server of await this.listServers()) {
      try {
        if ((await stat(join(this.root, server, ENTRY_MODULE_FILE))).isFile()) return true;
      } catch {
        // descriptors only
      }
    }
    return false;
  }

  async readIndex(serverName: string): Promise<ServerIndex> {
    const file = await this.readJson(join(serverName, INDEX_FILE), ServerIndexFileSchema);
    return indexFromFile(file);
  }

  async readIndexes(): Promise<ServerIndex[]> {
    const servers = await this.listServers();
    return Promise.all(servers.map((s) => this.readIndex(s)));
  }

  /** Read a descriptor through the file stem its server index recorded. */
  async readTool(serverName: string, toolName: string): Promise<ToolDescriptor> {
    return this.readToolOf(await this.readIndex(serverName), toolName);
  }

  /** Every descriptor of every server, in index order. */
  async readAllTools(): Promise<ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    for (const index of await this.readIndexes()) {
      for (const toolName of index.toolNames) {
        tools.push(await this.readToolOf(index, toolName));
      }
    }
    return tools;
  }

  private async readToolOf(index: ServerIndex, toolName: string): Promise<ToolDescriptor> {
    const file = await this.readJson(
      join(index.serverName, `${toolFileOf(index, toolName)}.json`),
      ToolDescriptorFileSchema
    );
    return descriptorFromFile(file);
  }

  private async readJson<T>(relativePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const path = join(this.root, relativePath);
    let data: unknown;
    try {
      data = JSON.parse(await readFile(path, "utf-8"));
    } catch (err) {
      throw new Error(
        `Cannot read registry file ${path}: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Malformed registry file ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}
