import { logError } from "./logger";
import { GenerationUnavailableError } from "../routing/errors";

interface ApiErrorShape {
  message?: unknown;
  status?: unknown;
  code?: unknown;
  error?: ApiErrorShape;
}

function asErrorShape(error: unknown): ApiErrorShape | null {
  if (typeof error !== "object" || error === null) return null;
  return error;
}

function messageOf(shape: ApiErrorShape | null | undefined): string {
  return typeof shape?.message === "string" ? shape.message : "";
}

export function isQuotaError(error: unknown): boolean {
  if (!error) return false;

  const shape = asErrorShape(error);
  const message = messageOf(shape) || String(error);
  const nested = shape?.error;

  const hasQuotaInMessage = message.includes("quota") || message.includes("RESOURCE_EXHAUSTED");
  const hasQuotaStatus = shape?.status === "RESOURCE_EXHAUSTED" || shape?.status === 429;
  const hasQuotaCode = shape?.code === 429;

  const hasNestedQuotaCode = nested?.code === 429;
  const hasNestedQuotaStatus = nested?.status === "RESOURCE_EXHAUSTED";
  const nestedMessage = messageOf(nested);
  const hasNestedQuotaMessage = nestedMessage.includes("quota") || nestedMessage.includes("RESOURCE_EXHAUSTED");

  return (
    hasQuotaInMessage ||
    hasQuotaStatus ||
    hasQuotaCode ||
    hasNestedQuotaCode ||
    hasNestedQuotaStatus ||
    hasNestedQuotaMessage
  );
}

/**
 * Rejected credentials. Retrying on another model cannot help.
 */
export function isAuthError(error: unknown): boolean {
  const shape = asErrorShape(error);
  if (!shape) return false;

  const statusCodes = [shape.status, shape.code, shape.error?.code, shape.error?.status];
  if (statusCodes.some((s) => s === 401 || s === 403 || s === "UNAUTHENTICATED" || s === "PERMISSION_DENIED")) {
    return true;
  }

  const message = messageOf(shape);
  return message.includes("API key not valid") || message.includes("API_KEY_INVALID");
}

/**
 * Map errors that make the generation capability unusable to
 * GenerationUnavailableError; everything else is rethrown as-is.
 */
export function handleGeminiError(
  error: unknown,
  context: { requestId?: string; conversationId?: string; stage: string }
): never {
  const message = error instanceof Error ? error.message : String(error);

  if (isQuotaError(error) || isAuthError(error)) {
    logError("gemini_unavailable", {
      requestId: context.requestId,
      conversationId: context.conversationId,
      stage: context.stage,
      quota: isQuotaError(error),
      error: message,
    });
    throw new GenerationUnavailableError(message, { cause: error });
  }

  throw error;
}

export function getGenerationUnavailableMessage(): string {
  return "The assistant has temporarily reached its usage limit and cannot generate new answers right now. Please try again in a few minutes or contact your administrator if the issue persists.";
}
