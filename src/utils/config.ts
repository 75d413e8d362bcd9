import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";

export const DEFAULT_MODEL = "gpt-4o-mini";

const McpServerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  command: z.string(),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
  description: z.string().optional(),
  timeout_ms: z.number().default(30000),
  tool_timeout_ms: z.number().optional(),
  tool_allowlist: z.array(z.string()).optional(),
  tool_blocklist: z.array(z.string()).default([]),
});

const McpConfigSchema = z.object({
  servers: z
    .record(
      z.string().regex(/^[A-Za-z0-9_-]+$/, "server names may only use letters, digits, _ and -"),
      McpServerConfigSchema
    )
    .default({}),
});

const LLMConfigSchema = z.object({
  base_url: z.string().optional(),
  api_key: z.string().optional(),
  model: z.string().default(DEFAULT_MODEL),
  temperature: z.number().min(0).max(2).default(0),
  max_response_tokens: z.number().int().positive().default(4096),
  cost_per_million_tokens: z
    .record(z.object({ input: z.number(), output: z.number() }))
    .optional(),
});

const MaxTurnsSchema = z.object({
  traditional: z.number().int().positive().default(15),
  discovery: z.number().int().positive().default(5),
  code: z.number().int().positive().default(8),
});

const AgentConfigSchema = z.object({
  query: z.string().default("What time is it in Amsterdam right now?"),
  max_turns: MaxTurnsSchema.default({}),
  code_timeout_ms: z.number().int().positive().default(30000),
});

const AppConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  registry: z.object({ root: z.string().default("./servers") }).default({}),
  agent: AgentConfigSchema.default({}),
  mcp: McpConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type McpConfig = z.infer<typeof McpConfigSchema>;
export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const loaded: unknown = yaml.load(readFileSync(path, "utf-8"));
    if (loaded !== undefined && loaded !== null) {
      if (!isRecord(loaded)) {
        throw new Error(`Configuration file ${path} must contain a mapping`);
      }
      rawConfig = loaded;
    }
  }

  applyEnvOverrides(rawConfig);

  return parseConfig(rawConfig, path);
}

/** Validate a raw config object and fill in defaults. */
export function parseConfig(raw: unknown, source = "<inline>"): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration in ${source}: ${issues}`);
  }
  return parsed.data;
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  const llm = ensureObject(config, "llm");
  const registry = ensureObject(config, "registry");

  if (process.env.OPENAI_API_KEY) llm.api_key = process.env.OPENAI_API_KEY;
  if (process.env.OPENAI_API_BASE) llm.base_url = process.env.OPENAI_API_BASE;
  if (process.env.OPENAI_MODEL) llm.model = process.env.OPENAI_MODEL;

  if (process.env.REGISTRY_ROOT) registry.root = process.env.REGISTRY_ROOT;
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
