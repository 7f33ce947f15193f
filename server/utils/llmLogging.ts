/**
 * LLM Call Logging Utilities
 *
 * Structured debug logging for every generation and embedding call.
 * Prompts and responses are truncated; user prompts go through
 * sanitizeUserContent so query text stays redacted by default.
 */

import { logDebug, truncate, sanitizeUserContent, type LogContext } from "./logger";

export interface LlmLogParams {
  requestId?: string;
  conversationId?: string;
  stage: string;
  model: string;
  systemPrompt?: string;
  userPrompt?: string;
  temperature?: number;
  extra?: Record<string, unknown>;
}

export function logLlmRequest(params: LlmLogParams): void {
  const { requestId, conversationId, stage, model, systemPrompt, userPrompt, temperature, extra } = params;

  const context: LogContext = {
    requestId,
    conversationId,
    stage,
    model,
    temperature,
    ...extra,
  };

  if (systemPrompt) {
    context.systemPrompt = truncate(systemPrompt, 800);
  }
  if (userPrompt) {
    context.userPrompt = sanitizeUserContent(userPrompt, 400);
  }

  logDebug("llm_request", context);
}

export interface LlmResponseLogParams {
  requestId?: string;
  conversationId?: string;
  stage: string;
  model: string;
  responseText?: string;
  durationMs?: number;
  extra?: Record<string, unknown>;
}

export function logLlmResponse(params: LlmResponseLogParams): void {
  const { requestId, conversationId, stage, model, responseText, durationMs, extra } = params;

  const context: LogContext = {
    requestId,
    conversationId,
    stage,
    model,
    durationMs,
    ...extra,
  };

  if (responseText) {
    context.responseSnippet = truncate(responseText, 1500);
    context.responseLength = responseText.length;
  }

  logDebug("llm_response", context);
}

export function logLlmError(params: {
  requestId?: string;
  conversationId?: string;
  stage: string;
  model: string;
  error: unknown;
}): void {
  const { requestId, conversationId, stage, model, error } = params;

  logDebug("llm_error", {
    requestId,
    conversationId,
    stage,
    model,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack?.slice(0, 500) : undefined,
  });
}
