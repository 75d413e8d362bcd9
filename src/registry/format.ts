import { z } from "zod";
import type { ServerIndex, ToolDescriptor } from "../integrations/mcp/types.js";

export const INDEX_FILE = "index.json";
export const ENTRY_MODULE_FILE = "index.js";
export const README_FILE = "INDEX.md";

export const ToolDescriptorFileSchema = z.object({
  server_name: z.string(),
  tool_name: z.string(),
  description: z.string(),
  input_schema: z.record(z.unknown()),
});

const FileStemSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+$/, "file stems may only use letters, digits, _, . and -")
  .refine((stem) => !/^\.+$/.test(stem), "file stems cannot be dot names");

export const ServerIndexFileSchema = z
  .object({
    server_name: z.string(),
    description: z.string(),
    tool_names: z.array(z.string()),
    tool_files: z.record(FileStemSchema),
  })
  .superRefine((file, ctx) => {
    for (const toolName of file.tool_names) {
      if (!Object.hasOwn(file.tool_files, toolName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tool_files"],
          message: `no file recorded for tool ${toolName}`,
        });
      }
    }
  });

export type ToolDescriptorFile = z.infer<typeof ToolDescriptorFileSchema>;
export type ServerIndexFile = z.infer<typeof ServerIndexFileSchema>;

/** File stem for a tool; characters outside [A-Za-z0-9_.-] become "_". */
export function toolFileStem(toolName: string): string {
  const stem = toolName.replace(/[^A-Za-z0-9_.-]/g, "_");
  // Keep stems clear of the per-server index files and of "." / ".."
  if (stem === "index" || stem === "INDEX" || /^\.+$/.test(stem)) {
    return `_${stem}`;
  }
  return stem;
}

/**
 * One file stem per tool. Names that sanitise to the same stem, compared
 * case-insensitively, get a `_2`, `_3`... suffix in listing order.
 */
export function assignToolFiles(toolNames: string[]): Record<string, string> {
  const files: Record<string, string> = {};
  const used = new Set<string>();
  for (const toolName of toolNames) {
    const base = toolFileStem(toolName);
    let stem = base;
    for (let n = 2; used.has(stem.toLowerCase()); n++) {
      stem = `${base}_${n}`;
    }
    used.add(stem.toLowerCase());
    files[toolName] = stem;
  }
  return files;
}

/** The file stem a server index recorded for one of its tools. */
export function toolFileOf(index: ServerIndex, toolName: string): string {
  const stem = Object.hasOwn(index.toolFiles, toolName) ? index.toolFiles[toolName] : undefined;
  if (stem === undefined) {
    throw new Error(`Server index for ${index.serverName} lists no tool named ${toolName}`);
  }
  return stem;
}

export function descriptorToFile(descriptor: ToolDescriptor): ToolDescriptorFile {
  return {
    server_name: descriptor.serverName,
    tool_name: descriptor.toolName,
    description: descriptor.description,
    input_schema: descriptor.inputSchema,
  };
}

export function descriptorFromFile(file: ToolDescriptorFile): ToolDescriptor {
  return {
    serverName: file.server_name,
    toolName: file.tool_name,
    description: file.description,
    inputSchema: file.input_schema,
  };
}

export function indexToFile(index: ServerIndex): ServerIndexFile {
  return {
    server_name: index.serverName,
    description: index.description,
    tool_names: index.toolNames,
    tool_files: index.toolFiles,
  };
}

export function indexFromFile(file: ServerIndexFile): ServerIndex {
  return {
    serverName: file.server_name,
    description: file.description,
    toolNames: file.tool_names,
    toolFiles: file.tool_files,
  };
}

/** Stable on-disk JSON: 2-space indent, trailing newline. */
export function serializeJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
