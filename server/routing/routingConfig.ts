/**
 * Routing pipeline configuration.
 * Centralized tuning for retrieval, evaluation, web fallback and timeouts.
 */

export const routingConfig = {
  /**
   * Smoothing constant k in the Reciprocal Rank Fusion term 1 / (k + rank).
   */
  RRF_K: 60,

  /**
   * Results requested from each index, and the size of the candidate set
   * handed to the reranker. Fused output never exceeds this.
   */
  CANDIDATE_POOL: 20,

  /**
   * Evidence items kept after fusion (and reranking).
   */
  FUSION_TOP_N: 8,

  // =====================================================
  // SUFFICIENCY EVALUATOR
  // =====================================================

  /**
   * Characters of each evidence item shown to the evaluator.
   */
  EVALUATOR_ITEM_CHARS: 600,

  /**
   * Total evidence characters in the evaluator prompt.
   */
  EVALUATOR_TOTAL_CHARS: 4000,

  EVALUATOR_TEMPERATURE: 0,

  // =====================================================
  // WEB BREAKOUT
  // =====================================================

  WEB_MAX_RESULTS: 2,

  /**
   * Enforced per source so one page cannot crowd out the other.
   */
  WEB_PER_SOURCE_CHAR_LIMIT: 1000,

  // =====================================================
  // SYNTHESIS
  // =====================================================

  SYNTHESIS_TEMPERATURE: 0.3,
  SYNTHESIS_MAX_OUTPUT_TOKENS: 1024,

  // =====================================================
  // TIMEOUTS (per call)
  // =====================================================

  EMBEDDING_TIMEOUT_MS: 10_000,
  SEARCH_TIMEOUT_MS: 8_000,
  FETCH_TIMEOUT_MS: 6_000,
  GENERATION_TIMEOUT_MS: 60_000,
};

export type RoutingConfig = typeof routingConfig;

export function resolveRoutingConfig(overrides: Partial<RoutingConfig> = {}): RoutingConfig {
  return { ...routingConfig, ...overrides };
}
