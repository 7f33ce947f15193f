/**
 * Gemini-backed generation and embedding capabilities.
 *
 * Both go through @google/genai with the request's AbortSignal forwarded as
 * `config.abortSignal`. Quota and credential failures surface as
 * GenerationUnavailableError (see handleGeminiError); other failures get one
 * retry on the degraded model.
 */

import { GoogleGenAI } from "@google/genai";
import { logLlmRequest, logLlmResponse, logLlmError } from "../utils/llmLogging";
import { handleGeminiError } from "../utils/geminiErrors";
import { withModelFallback, type ModelStage } from "./modelRegistry";
import type {
  EmbeddingService,
  GenerationCapability,
  GenerationRequest,
  GenerationStage,
} from "../routing/types";

const STAGE_MODELS: Record<GenerationStage, ModelStage> = {
  sufficiency: "sufficiency",
  synthesis: "synthesis",
};

export function createGeminiClient(apiKey: string): GoogleGenAI {
  return new GoogleGenAI({ apiKey });
}

export class GeminiGeneration implements GenerationCapability {
  constructor(private readonly ai: GoogleGenAI) {}

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const { stage, systemInstruction, prompt, temperature, maxOutputTokens, logContext } = request;

    const callModel = async (model: string): Promise<string> => {
      logLlmRequest({
        requestId: logContext?.requestId,
        conversationId: logContext?.conversationId,
        stage,
        model,
        systemPrompt: systemInstruction,
        userPrompt: prompt,
        temperature,
      });

      const startTime = Date.now();

      try {
        const response = await this.ai.models.generateContent({
          model,
          contents: [{ role: "user", parts: [{ text: prompt }] }],
          config: {
            systemInstruction,
            temperature,
            maxOutputTokens,
            abortSignal: signal,
          },
        });

        const responseText = response.text || "";

        logLlmResponse({
          requestId: logContext?.requestId,
          conversationId: logContext?.conversationId,
          stage,
          model,
          responseText,
          durationMs: Date.now() - startTime,
        });

        return responseText;
      } catch (error) {
        logLlmError({
          requestId: logContext?.requestId,
          conversationId: logContext?.conversationId,
          stage,
          model,
          error,
        });
        return handleGeminiError(error, {
          requestId: logContext?.requestId,
          conversationId: logContext?.conversationId,
          stage,
        });
      }
    };

    const { result } = await withModelFallback(callModel, STAGE_MODELS[stage], {}, signal);
    return result;
  }
}

export class GeminiEmbeddings implements EmbeddingService {
  constructor(private readonly ai: GoogleGenAI) {}

  async encode(text: string, signal?: AbortSignal): Promise<number[]> {
    const { result } = await withModelFallback(
      async (model) => {
        try {
          const response = await this.ai.models.embedContent({
            model,
            contents: text,
            config: { abortSignal: signal },
          });

          const values = response.embeddings?.[0]?.values;
          if (!values || values.length === 0) {
            throw new Error("Embedding response contained no values");
          }
          return values;
        } catch (error) {
          return handleGeminiError(error, { stage: "embedding" });
        }
      },
      "embedding",
      // The degraded model is a generation model and cannot embed.
      { useFallbackOnRetry: false },
      signal
    );
    return result;
  }
}
