/**
 * Structured logging for the routing pipeline and the HTTP layer.
 *
 * Every line is a single JSON object written by pino. Pipeline code calls the
 * `logDebug`/`logInfo`/`logWarn`/`logError` helpers with a short snake_case
 * message and a context object; the HTTP layer may use `getLogger()` directly.
 *
 * Environment Variables:
 * - LOG_LEVEL: Minimum level (debug, info, warn, error, silent). Default: "info"
 * - ROUTER_DEBUG_LOGGING: "1" or "true" enables debug lines. Default: disabled
 * - ROUTER_LOG_USER_CONTENT: "1" or "true" logs query text (truncated).
 *   Default: disabled (only the length is logged)
 *
 * SAFETY CONSTRAINTS:
 * - Never log API keys or secrets
 * - Never log full document or page bodies (snippets only, truncated)
 * - Truncate LLM prompts/responses
 * - User query content is redacted by default
 */

import pino, { type Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string;
  conversationId?: string;
  stage?: string;
  [key: string]: unknown;
}

const CONFIGURABLE_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
type ConfiguredLevel = (typeof CONFIGURABLE_LEVELS)[number];

function isEnabledFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function resolveConfiguredLevel(raw: string | undefined): ConfiguredLevel {
  const match = CONFIGURABLE_LEVELS.find((level) => level === raw);
  return match ?? "info";
}

const CONFIGURED_LEVEL = resolveConfiguredLevel(process.env.LOG_LEVEL);

const DEBUG_ENABLED = isEnabledFlag(process.env.ROUTER_DEBUG_LOGGING);

const LOG_USER_CONTENT_ENABLED = isEnabledFlag(process.env.ROUTER_LOG_USER_CONTENT);

let rootLogger: Logger | null = null;

/**
 * Shared pino instance. Debug lines pass only when ROUTER_DEBUG_LOGGING is set,
 * so the effective level never drops below "info" otherwise.
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    const level =
      CONFIGURED_LEVEL === "debug" && !DEBUG_ENABLED ? "info" : CONFIGURED_LEVEL;
    rootLogger = pino({
      level,
      base: undefined,
      messageKey: "message",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    });
  }
  return rootLogger;
}

export function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (level === "debug" && !DEBUG_ENABLED) return;
  getLogger()[level](context, message);
}

export const logDebug = (msg: string, ctx?: LogContext) => log("debug", msg, ctx);

export const logInfo = (msg: string, ctx?: LogContext) => log("info", msg, ctx);

export const logWarn = (msg: string, ctx?: LogContext) => log("warn", msg, ctx);

export const logError = (msg: string, ctx?: LogContext) => log("error", msg, ctx);

/**
 * Truncate long strings so a single log entry stays small.
 */
export function truncate(text: string | undefined | null, maxLen = 1000): string | undefined {
  if (!text) return undefined;
  return text.length > maxLen ? text.slice(0, maxLen) + "…[truncated]" : text;
}

/**
 * Redact user-provided content unless ROUTER_LOG_USER_CONTENT is enabled.
 */
export function sanitizeUserContent(content: string | undefined | null, maxLen = 100): string | undefined {
  if (!content) return undefined;

  if (LOG_USER_CONTENT_ENABLED) {
    return truncate(content, maxLen);
  }

  return `[redacted, length=${content.length}]`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
