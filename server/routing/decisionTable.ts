/**
 * Routing decision table.
 *
 * Pure functions, one per branching point of the orchestrator. First match
 * wins in each; none performs I/O.
 */

import type {
  ConversationScope,
  Query,
  ResolvedScope,
  ResponseMode,
  RoutingDecision,
  WebBatch,
} from "./types";

export function resolveScope(query: Query, conversationDocumentIds: ConversationScope): ResolvedScope {
  const explicit = query.explicitDocumentId?.trim();
  if (explicit) {
    return { source: "explicit_document", documentIds: [explicit] };
  }
  if (conversationDocumentIds.length > 0) {
    return { source: "conversation", documentIds: Array.from(new Set(conversationDocumentIds)) };
  }
  return { source: "none", documentIds: [] };
}

export type ScopePlan =
  | { action: "retrieve_local" }
  | { action: "synthesize_internal"; mode: "internal_llm_weights" }
  | { action: "search_web"; queryTerms: string };

export function planAfterScope(scope: ResolvedScope, query: Query): ScopePlan {
  if (scope.documentIds.length > 0) {
    return { action: "retrieve_local" };
  }
  if (!query.webFallbackEnabled) {
    return { action: "synthesize_internal", mode: "internal_llm_weights" };
  }
  return { action: "search_web", queryTerms: query.queryText };
}

export type EvaluationPlan =
  | { action: "synthesize_local"; mode: "grounded_in_docs" }
  | { action: "refuse"; mode: "no_evidence_found" }
  | { action: "search_web"; queryTerms: string };

export function planAfterEvaluation(decision: RoutingDecision, query: Query): EvaluationPlan {
  switch (decision.kind) {
    case "local":
      return { action: "synthesize_local", mode: "grounded_in_docs" };
    case "search_requested":
      return query.webFallbackEnabled
        ? { action: "search_web", queryTerms: decision.queryTerms }
        : { action: "refuse", mode: "no_evidence_found" };
    case "no_evidence":
      return query.webFallbackEnabled
        ? { action: "search_web", queryTerms: query.queryText }
        : { action: "refuse", mode: "no_evidence_found" };
  }
}

export type WebPlan =
  | { action: "synthesize_web"; mode: "grounded_in_web" }
  | { action: "synthesize_internal"; mode: "internal_llm_weights"; reason: "no_results" | "failed" };

export function planAfterWeb(batch: WebBatch): WebPlan {
  switch (batch.status) {
    case "ok":
      return { action: "synthesize_web", mode: "grounded_in_web" };
    case "no_results":
      return { action: "synthesize_internal", mode: "internal_llm_weights", reason: "no_results" };
    case "failed":
      return { action: "synthesize_internal", mode: "internal_llm_weights", reason: "failed" };
  }
}

export interface SynthesisSignal {
  /**
   * Synthesis reported that none of the web sources was relevant.
   */
  webNotUsed: boolean;
}

export function resolveFinalMode(planned: ResponseMode, signal: SynthesisSignal): ResponseMode {
  if (planned === "grounded_in_web" && signal.webNotUsed) {
    return "internal_llm_weights";
  }
  return planned;
}
