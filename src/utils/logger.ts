/**
 * Structured logging with credential redaction and run context.
 *
 * Redaction policy:
 * - API keys, tokens and passwords are never logged
 * - Tool results and generated code are only logged at DEBUG
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";
import { getRunContext } from "../core/run-context.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "mcp-bench",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "apiKey",
        "api_key",
        "token",
        "password",
        "authorization",
        "*.apiKey",
        "*.api_key",
        "*.token",
        "*.password",
        "*.authorization",
        "env.*",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getRunContext();
      if (ctx) {
        return { runId: ctx.runId, mode: ctx.mode };
      }
      return {};
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;
