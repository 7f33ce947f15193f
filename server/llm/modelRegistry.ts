/**
 * Model Registry - Centralized model selection for the routing pipeline
 *
 * - Fast model for the sufficiency check (a short, deterministic verdict)
 * - Higher-quality model for final synthesis
 * - Dedicated embedding model for dense retrieval and reranking
 * - A degraded model used as the retry target when a call fails
 */

import { GenerationUnavailableError } from "../routing/errors";

export type ModelStage =
  | 'sufficiency'
  | 'synthesis'
  | 'embedding'
  | 'degraded';

export interface ModelSelection {
  model: string;
  fromEnv: boolean;
}

const MODELS = {
  FAST: 'gemini-2.5-flash',
  HIGH_QUALITY: 'gemini-2.5-pro',
  EMBEDDING: 'text-embedding-004',
} as const;

const ENV_OVERRIDES: Record<ModelStage, string> = {
  sufficiency: 'MODEL_SUFFICIENCY',
  synthesis: 'MODEL_SYNTHESIS',
  embedding: 'MODEL_EMBEDDING',
  degraded: 'MODEL_DEGRADED',
};

const DEFAULT_MODELS: Record<ModelStage, string> = {
  sufficiency: MODELS.FAST,
  synthesis: MODELS.HIGH_QUALITY,
  embedding: MODELS.EMBEDDING,
  degraded: MODELS.FAST,
};

function getEnvOverride(stage: ModelStage): string | undefined {
  const envKey = ENV_OVERRIDES[stage];
  return process.env[envKey];
}

/**
 * Get the model for a pipeline stage
 */
export function getModelForStage(stage: ModelStage): ModelSelection {
  const envOverride = getEnvOverride(stage);
  if (envOverride) {
    return { model: envOverride, fromEnv: true };
  }

  return { model: DEFAULT_MODELS[stage], fromEnv: false };
}

/**
 * Get the fallback model for retry scenarios
 */
export function getFallbackModel(): string {
  return getModelForStage('degraded').model;
}

/**
 * Retry configuration for LLM calls
 */
export interface RetryConfig {
  maxRetries: number;
  retryDelayMs: number;
  useFallbackOnRetry: boolean;
  /**
   * Return false to rethrow immediately without another attempt.
   */
  shouldRetry: (error: unknown) => boolean;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 1,
  retryDelayMs: 500,
  useFallbackOnRetry: true,
  shouldRetry: (error) => !(error instanceof GenerationUnavailableError),
};

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wrapper for LLM calls with automatic retry and fallback.
 * An aborted signal stops further attempts and the last error is rethrown.
 *
 * @param fn - Function that makes the LLM call, receives model name as parameter
 */
export async function withModelFallback<T>(
  fn: (model: string) => Promise<T>,
  stage: ModelStage,
  config: Partial<RetryConfig> = {},
  signal?: AbortSignal
): Promise<{ result: T; modelUsed: string; didFallback: boolean }> {
  const { maxRetries, retryDelayMs, useFallbackOnRetry, shouldRetry } = { ...DEFAULT_RETRY_CONFIG, ...config };

  const { model: primaryModel } = getModelForStage(stage);

  let attempt = 0;
  let currentModel = primaryModel;
  let didFallback = false;

  for (;;) {
    try {
      const result = await fn(currentModel);
      return { result, modelUsed: currentModel, didFallback };
    } catch (error) {
      attempt++;

      if (attempt > maxRetries || signal?.aborted || !shouldRetry(error)) {
        throw error;
      }

      // Switch to fallback model on retry if configured
      if (useFallbackOnRetry && currentModel !== getFallbackModel()) {
        currentModel = getFallbackModel();
        didFallback = true;
      }

      // Brief delay before retry
      await delay(retryDelayMs, signal);
    }
  }
}
