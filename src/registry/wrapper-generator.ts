/**
 * Generates the code-mode registry: one CommonJS-style module per tool whose
 * exported function forwards to the bridge, plus a per-server entry module
 * and a short INDEX.md listing.
 *
 * The modules are loaded by the code runtime, which provides `module`,
 * `exports`, `require` and the `callMcpTool` bridge. Schemas are rendered as
 * JSDoc only; arguments are not validated.
 */
import type { ServerIndex, ToolDescriptor } from "../integrations/mcp/types.js";
import { toolFileOf } from "./format.js";

const RESERVED_WORDS = new Set([
  "arguments", "await", "break", "case", "catch", "class", "const", "continue",
  "debugger", "default", "delete", "do", "else", "enum", "eval", "export",
  "extends", "false", "finally", "for", "function", "if", "implements",
  "import", "in", "instanceof", "interface", "let", "new", "null", "package",
  "private", "protected", "public", "return", "static", "super", "switch",
  "this", "throw", "true", "try", "typeof", "var", "void", "while", "with",
  "yield",
]);

/** Turn a tool name into a usable function binding. */
export function toIdentifier(name: string): string {
  let ident = name.replace(/[^A-Za-z0-9_$]/g, "_");
  if (ident === "" || /^[0-9]/.test(ident) || RESERVED_WORDS.has(ident)) {
    ident = `_${ident}`;
  }
  return ident;
}

export function wrapperFileName(index: ServerIndex, toolName: string): string {
  return `${toolFileOf(index, toolName)}.js`;
}

export function generateToolWrapper(descriptor: ToolDescriptor): string {
  const fn = toIdentifier(descriptor.toolName);
  const lines = [
    `// Wrapper for MCP tool ${descriptor.serverName}/${descriptor.toolName}`,
    "/**",
    ...docLines(descriptor.description),
    " *",
    ...paramDocLines(descriptor.inputSchema),
    " * @returns {Promise<unknown>} parsed JSON when the tool returns JSON, else text",
    " */",
    `async function ${fn}(args = {}) {`,
    `  return callMcpTool(${JSON.stringify(descriptor.serverName)}, ${JSON.stringify(descriptor.toolName)}, args);`,
    "}",
    "",
    `module.exports = { ${JSON.stringify(descriptor.toolName)}: ${fn} };`,
    "",
  ];
  return lines.join("\n");
}

/** Entry module re-exporting every tool of a server. */
export function generateServerEntry(index: ServerIndex): string {
  const lines = [
    `// Tools of the ${index.serverName} MCP server`,
    "module.exports = {",
    ...index.toolNames.map(
      (toolName) => `  ...require(${JSON.stringify(`./${wrapperFileName(index, toolName)}`)}),`
    ),
    "};",
    "",
  ];
  return lines.join("\n");
}

/** Lightweight listing: tool names and descriptions, no schemas. */
export function generateServerReadme(index: ServerIndex, descriptors: ToolDescriptor[]): string {
  const byName = new Map(descriptors.map((d) => [d.toolName, d]));
  const lines = [`# ${index.serverName.toUpperCase()} Server Tools`, "", index.description, ""];
  for (const toolName of index.toolNames) {
    const description = byName.get(toolName)?.description ?? "";
    lines.push(`- **${toolName}** (\`${wrapperFileName(index, toolName)}\`): ${firstLine(description)}`);
  }
  lines.push("");
  return lines.join("\n");
}

function paramDocLines(schema: Record<string, unknown>): string[] {
  const properties = asRecord(schema.properties);
  const required = Array.isArray(schema.required)
    ? schema.required.filter((r): r is string => typeof r === "string")
    : [];

  const lines = [" * @param {object} [args]"];
  for (const [name, raw] of Object.entries(properties ?? {})) {
    const prop: Record<string, unknown> = asRecord(raw) ?? {};
    const type = describeType(prop.type);
    const key = required.includes(name) ? `args.${name}` : `[args.${name}]`;
    const description = typeof prop.description === "string" ? ` - ${firstLine(prop.description)}` : "";
    lines.push(` * @param {${type}} ${key}${description}`.replace(/\*\//g, "*\\/"));
  }
  return lines;
}

function describeType(type: unknown): string {
  if (typeof type === "string") return type;
  if (Array.isArray(type)) {
    const names = type.filter((t): t is string => typeof t === "string");
    if (names.length > 0) return names.join("|");
  }
  return "*";
}

function docLines(text: string): string[] {
  return text
    .replace(/\*\//g, "*\\/")
    .split("\n")
    .map((line) => ` * ${line}`.trimEnd());
}

function firstLine(text: string): string {
  return text.split("\n")[0]?.trim() ?? "";
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
