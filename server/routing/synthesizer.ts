/**
 * Answer Synthesizer
 *
 * Final generation call of a routed query. The prompt depends on the planned
 * response mode:
 * - grounded_in_docs: numbered local excerpts, answer from them only
 * - grounded_in_web: local excerpts plus web pages; the model opens its reply
 *   with WEB_NOT_USED_MARKER when no web page is relevant
 * - internal_llm_weights: no evidence block, answer from general knowledge
 *
 * A failed or timed-out call yields COULD_NOT_COMPLETE_RESPONSE instead of
 * throwing.
 */

import { logDebug, logWarn, errorMessage } from "../utils/logger";
import { runWithTimeout } from "../utils/timeout";
import { routingConfig } from "./routingConfig";
import { cleanModelOutput } from "./sufficiencyGate";
import { GenerationUnavailableError, QueryAbortedError } from "./errors";
import type {
  EvidenceItem,
  GenerationCapability,
  PipelineLogContext,
  Query,
  ResponseMode,
} from "./types";

export const WEB_NOT_USED_MARKER = "[[WEB_NOT_USED]]";

export const NO_EVIDENCE_RESPONSE =
  "I couldn't find information about this in the documents available to this conversation. Enable web search to look beyond them, or attach a document that covers this topic.";

export const COULD_NOT_COMPLETE_RESPONSE =
  "I wasn't able to complete an answer to this question right now. Please try again in a moment.";

export type SynthesisMode = Exclude<ResponseMode, "no_evidence_found">;

const BASE_RULES = `RULES:
- Be direct and concise.
- Do not invent facts, figures or quotations.
- Cite sources inline by their number, e.g. [1], only for claims they support.`;

function buildSystemPrompt(mode: SynthesisMode): string {
  switch (mode) {
    case "grounded_in_docs":
      return `You answer questions using ONLY the numbered document excerpts provided.

${BASE_RULES}
- If the excerpts do not cover part of the question, say so plainly.`;
    case "grounded_in_web":
      return `You answer questions using the numbered sources provided. LOCAL sources come from the user's documents; WEB sources were fetched from the internet for this question.

${BASE_RULES}
- Prefer WEB sources where the LOCAL ones are silent.
- If none of the WEB sources is relevant to the question, begin your reply with ${WEB_NOT_USED_MARKER} on its own line and then answer from general knowledge without citations.`;
    case "internal_llm_weights":
      return `You answer questions from your general knowledge. No documents or web sources are available for this question.

RULES:
- Be direct and concise.
- Do not claim to have read any document or web page.`;
  }
}

function formatSource(item: EvidenceItem, index: number): string {
  const kind = item.sourceKind === "live-web" ? "WEB" : "LOCAL";
  const label = [item.title, item.url].filter(Boolean).join(" - ");
  return `[${index + 1}] ${kind}${label ? ` ${label}` : ""}\n${item.text.trim()}`;
}

export function buildSynthesisPrompt(queryText: string, mode: SynthesisMode, evidence: readonly EvidenceItem[]): string {
  if (mode === "internal_llm_weights" || evidence.length === 0) {
    return `USER QUESTION: ${queryText}`;
  }

  return `SOURCES:
${evidence.map(formatSource).join("\n\n")}

USER QUESTION: ${queryText}`;
}

export interface InterpretedSynthesis {
  answerText: string;
  webNotUsed: boolean;
}

/**
 * Strip reasoning blocks and, when allowed, a leading WEB_NOT_USED_MARKER.
 */
export function interpretSynthesisOutput(raw: string, allowWebNotUsed: boolean): InterpretedSynthesis {
  const cleaned = cleanModelOutput(raw);

  if (allowWebNotUsed && cleaned.startsWith(WEB_NOT_USED_MARKER)) {
    return { answerText: cleaned.slice(WEB_NOT_USED_MARKER.length).trim(), webNotUsed: true };
  }

  return { answerText: cleaned, webNotUsed: false };
}

export type SynthesisOutcome =
  | { status: "answered"; answerText: string; webNotUsed: boolean }
  | { status: "failed"; answerText: string; reason: string };

export interface SynthesizeOptions {
  generation: GenerationCapability;
  signal?: AbortSignal;
  timeoutMs?: number;
  temperature?: number;
  maxOutputTokens?: number;
  logContext?: PipelineLogContext;
}

export async function synthesize(
  query: Query,
  mode: SynthesisMode,
  evidence: readonly EvidenceItem[],
  options: SynthesizeOptions
): Promise<SynthesisOutcome> {
  const {
    generation,
    signal,
    logContext,
    timeoutMs = routingConfig.GENERATION_TIMEOUT_MS,
    temperature = routingConfig.SYNTHESIS_TEMPERATURE,
    maxOutputTokens = routingConfig.SYNTHESIS_MAX_OUTPUT_TOKENS,
  } = options;
  const startTime = Date.now();

  let raw: string;
  try {
    raw = await runWithTimeout("synthesis", timeoutMs, signal, (callSignal) =>
      generation.generate(
        {
          stage: "synthesis",
          systemInstruction: buildSystemPrompt(mode),
          prompt: buildSynthesisPrompt(query.queryText, mode, evidence),
          temperature,
          maxOutputTokens,
          logContext,
        },
        callSignal
      )
    );
  } catch (error) {
    if (error instanceof QueryAbortedError || error instanceof GenerationUnavailableError) {
      throw error;
    }
    logWarn("synthesis_failed", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "synthesis",
      mode,
      error: errorMessage(error),
    });
    return { status: "failed", answerText: COULD_NOT_COMPLETE_RESPONSE, reason: errorMessage(error) };
  }

  const { answerText, webNotUsed } = interpretSynthesisOutput(raw, mode === "grounded_in_web");

  if (answerText.length === 0) {
    logWarn("synthesis_failed", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "synthesis",
      mode,
      error: "empty answer",
    });
    return { status: "failed", answerText: COULD_NOT_COMPLETE_RESPONSE, reason: "empty answer" };
  }

  logDebug("synthesis_complete", {
    requestId: logContext?.requestId,
    conversationId: logContext?.conversationId,
    stage: "synthesis",
    mode,
    evidenceCount: evidence.length,
    webNotUsed,
    answerLength: answerText.length,
    durationMs: Date.now() - startTime,
  });

  return { status: "answered", answerText, webNotUsed };
}
