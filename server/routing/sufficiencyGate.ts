/**
 * Knowledge Sufficiency Gate
 *
 * Asks the generation capability, once, whether the fused local evidence is
 * enough to answer the query. The model must reply with the sentinel
 * SUFFICIENT or with {"action": "search", "query": "<terms>"}; anything else
 * is treated as SUFFICIENT (fail-closed to local evidence).
 */

import { z } from "zod";
import { logDebug, logWarn, errorMessage } from "../utils/logger";
import { runWithTimeout } from "../utils/timeout";
import { routingConfig } from "./routingConfig";
import { GenerationUnavailableError, QueryAbortedError } from "./errors";
import type {
  EvidenceItem,
  GenerationCapability,
  PipelineLogContext,
  Query,
  RoutingDecision,
} from "./types";

export const SUFFICIENT_SENTINEL = "SUFFICIENT";

const searchRequestSchema = z.object({
  action: z.literal("search"),
  query: z.string().trim().min(1),
});

const SUFFICIENCY_SYSTEM_PROMPT = `You decide whether retrieved document excerpts are enough to answer a user's question.

TASK:
Read the question and the numbered excerpts. Decide if the excerpts contain the information needed for a complete, accurate answer.

OUTPUT FORMAT (exactly one of):
- The single word ${SUFFICIENT_SENTINEL} if the excerpts are enough.
- JSON only: {"action": "search", "query": "<short web search query>"} if they are not.

CONSTRAINTS:
- Do not answer the question.
- The search query should name the missing facts, in a few keywords.
- No other text.`;

export interface SerializeOptions {
  itemCharLimit?: number;
  totalCharLimit?: number;
}

function clip(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Numbered evidence block for the prompt. Each item is clipped to the
 * per-item budget; items stop once the total budget is spent.
 */
export function serializeEvidence(evidence: readonly EvidenceItem[], options: SerializeOptions = {}): string {
  const {
    itemCharLimit = routingConfig.EVALUATOR_ITEM_CHARS,
    totalCharLimit = routingConfig.EVALUATOR_TOTAL_CHARS,
  } = options;

  const blocks: string[] = [];
  let used = 0;

  for (const [index, item] of evidence.entries()) {
    const label = item.title ? ` (${item.title})` : "";
    const block = `[${index + 1}]${label}\n${clip(item.text.trim(), itemCharLimit)}`;
    if (blocks.length > 0 && used + block.length > totalCharLimit) break;
    blocks.push(clip(block, totalCharLimit));
    used += block.length;
  }

  return blocks.join("\n\n");
}

/**
 * Remove reasoning blocks and markdown fences some models wrap output in.
 */
export function cleanModelOutput(raw: string): string {
  return raw
    .replace(/<think>[\s\S]*?<\/think>/gi, "")
    .replace(/<think>[\s\S]*$/i, "")
    .replace(/```json\n?/g, "")
    .replace(/```\n?/g, "")
    .trim();
}

/**
 * First balanced {...} in `text`, honouring string literals, or null.
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

function parseSearchRequest(candidate: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  const result = searchRequestSchema.safeParse(parsed);
  return result.success ? result.data.query : null;
}

interface DecodedResponse {
  decision: RoutingDecision;
  malformed: boolean;
}

function decode(raw: string): DecodedResponse {
  const cleaned = cleanModelOutput(raw);

  if (/^sufficient\.?$/i.test(cleaned)) {
    return { decision: { kind: "local" }, malformed: false };
  }

  const direct = parseSearchRequest(cleaned);
  if (direct) {
    return { decision: { kind: "search_requested", queryTerms: direct }, malformed: false };
  }

  const embedded = extractFirstJsonObject(cleaned);
  const fromProse = embedded ? parseSearchRequest(embedded) : null;
  if (fromProse) {
    return { decision: { kind: "search_requested", queryTerms: fromProse }, malformed: false };
  }

  return { decision: { kind: "local" }, malformed: true };
}

/**
 * Strict decode of the evaluator's reply. Never throws.
 */
export function decodeSufficiencyResponse(raw: string): RoutingDecision {
  return decode(raw).decision;
}

export interface EvaluateOptions {
  generation: GenerationCapability;
  signal?: AbortSignal;
  timeoutMs?: number;
  temperature?: number;
  serialize?: SerializeOptions;
  logContext?: PipelineLogContext;
}

/**
 * Evaluate fused evidence for a query and return exactly one decision.
 *
 * Empty evidence is NoEvidence without a model call. A failed or timed-out
 * call is Local; only caller abort and an unusable generation capability
 * propagate.
 */
export async function evaluate(
  query: Query,
  fusedEvidence: readonly EvidenceItem[],
  options: EvaluateOptions
): Promise<RoutingDecision> {
  const {
    generation,
    signal,
    logContext,
    serialize,
    timeoutMs = routingConfig.GENERATION_TIMEOUT_MS,
    temperature = routingConfig.EVALUATOR_TEMPERATURE,
  } = options;

  if (fusedEvidence.length === 0) {
    logDebug("sufficiency_skipped", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "sufficiency",
      reason: "empty_evidence",
    });
    return { kind: "no_evidence" };
  }

  const prompt = `USER QUESTION: "${query.queryText}"

EXCERPTS:
${serializeEvidence(fusedEvidence, serialize)}

Reply with ${SUFFICIENT_SENTINEL} or the search JSON only.`;

  let raw: string;
  try {
    raw = await runWithTimeout("sufficiency", timeoutMs, signal, (callSignal) =>
      generation.generate(
        {
          stage: "sufficiency",
          systemInstruction: SUFFICIENCY_SYSTEM_PROMPT,
          prompt,
          temperature,
          logContext,
        },
        callSignal
      )
    );
  } catch (error) {
    if (error instanceof QueryAbortedError || error instanceof GenerationUnavailableError) {
      throw error;
    }
    logWarn("sufficiency_call_failed", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "sufficiency",
      fallback: "local",
      error: errorMessage(error),
    });
    return { kind: "local" };
  }

  const { decision, malformed } = decode(raw);

  if (malformed) {
    logWarn("sufficiency_malformed_output", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "sufficiency",
      fallback: "local",
      responseSnippet: raw.slice(0, 200),
    });
  }

  logDebug("sufficiency_result", {
    requestId: logContext?.requestId,
    conversationId: logContext?.conversationId,
    stage: "sufficiency",
    decision: decision.kind,
    evidenceCount: fusedEvidence.length,
    responseLength: raw.length,
  });

  return decision;
}
