/**
 * Evidence Fusion Engine
 *
 * Runs dense and lexical retrieval over the scoped documents in parallel,
 * merges the two rankings with Reciprocal Rank Fusion, optionally reranks the
 * fused candidate set, and returns a deduplicated top-N list of evidence.
 *
 * Key features:
 * - Parallel execution using Promise.all
 * - Lexical index missing or failing degrades to dense-only (and vice versa)
 * - Two-stage retrieve-then-rerank: RRF picks candidates, reranker orders them
 * - Deterministic tie-breaking (best rank, then sourceId)
 */

import { logDebug, logWarn, errorMessage } from "../utils/logger";
import { routingConfig } from "./routingConfig";
import { QueryAbortedError } from "./errors";
import { runWithTimeout } from "../utils/timeout";
import type {
  ConversationScope,
  DenseIndex,
  EvidenceItem,
  FusedResultSet,
  IndexHit,
  LexicalIndex,
  PipelineLogContext,
  Reranker,
} from "./types";

export interface FusionDependencies {
  denseIndex: DenseIndex;
  lexicalIndex?: LexicalIndex | null;
  reranker?: Reranker | null;
}

export interface FuseOptions {
  queryText: string;
  /**
   * Null when the query could not be embedded; fusion then runs lexical-only.
   */
  queryVector: readonly number[] | null;
  candidatePool: number;
  scope: ConversationScope;
  topN?: number;
  rrfK?: number;
  rerankTimeoutMs?: number;
  signal?: AbortSignal;
  logContext?: PipelineLogContext;
}

/**
 * One fused candidate before it becomes an EvidenceItem.
 */
export interface RankedCandidate {
  sourceId: string;
  hit: IndexHit;
  score: number;
  bestRank: number;
  denseRank: number | null;
  lexicalRank: number | null;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Reciprocal Rank Fusion over any number of ranked lists.
 *
 * An item at 1-indexed rank r contributes 1 / (k + r); contributions from
 * every list it appears in are summed. A sourceId repeated inside one list
 * only counts at its first position. The first two lists are reported as
 * dense and lexical ranks on the candidate.
 */
export function reciprocalRankFuse(
  lists: ReadonlyArray<ReadonlyArray<IndexHit>>,
  k: number = routingConfig.RRF_K
): RankedCandidate[] {
  const candidates = new Map<string, RankedCandidate>();

  lists.forEach((list, listIndex) => {
    const seenInList = new Set<string>();
    let rank = 0;

    for (const hit of list) {
      if (seenInList.has(hit.sourceId)) continue;
      seenInList.add(hit.sourceId);
      rank += 1;

      const contribution = 1 / (k + rank);
      const existing = candidates.get(hit.sourceId);

      if (existing) {
        existing.score += contribution;
        existing.bestRank = Math.min(existing.bestRank, rank);
        if (listIndex === 0) existing.denseRank = rank;
        if (listIndex === 1) existing.lexicalRank = rank;
      } else {
        candidates.set(hit.sourceId, {
          sourceId: hit.sourceId,
          hit,
          score: contribution,
          bestRank: rank,
          denseRank: listIndex === 0 ? rank : null,
          lexicalRank: listIndex === 1 ? rank : null,
        });
      }
    }
  });

  return Array.from(candidates.values()).sort(
    (a, b) => b.score - a.score || a.bestRank - b.bestRank || compareIds(a.sourceId, b.sourceId)
  );
}

async function searchDense(
  deps: FusionDependencies,
  options: FuseOptions,
  limit: number
): Promise<IndexHit[]> {
  const { queryVector, scope, logContext } = options;
  if (!queryVector) return [];

  try {
    const hits = await deps.denseIndex.search(queryVector, limit, { documentIds: scope });
    return hits.slice(0, limit);
  } catch (error) {
    logWarn("fusion_dense_degraded", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "evidenceFusion",
      reason: "dense_index_error",
      error: errorMessage(error),
    });
    return [];
  }
}

async function searchLexical(
  deps: FusionDependencies,
  options: FuseOptions,
  limit: number
): Promise<IndexHit[]> {
  const { queryText, scope, logContext } = options;

  if (!deps.lexicalIndex) {
    logDebug("fusion_lexical_skipped", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "evidenceFusion",
      reason: "no_lexical_index_configured",
    });
    return [];
  }

  try {
    const hits = await deps.lexicalIndex.search(queryText, limit, { documentIds: scope });
    if (hits === null) {
      logWarn("fusion_lexical_degraded", {
        requestId: logContext?.requestId,
        conversationId: logContext?.conversationId,
        stage: "evidenceFusion",
        reason: "no_index_for_scope",
        scopeSize: scope.length,
      });
      return [];
    }
    return hits.slice(0, limit);
  } catch (error) {
    logWarn("fusion_lexical_degraded", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "evidenceFusion",
      reason: "lexical_index_error",
      error: errorMessage(error),
    });
    return [];
  }
}

/**
 * Reorder candidates by reranker score. Ties keep their RRF order.
 * Returns null when the reranker fails so the caller keeps RRF order.
 */
async function rerankCandidates(
  reranker: Reranker,
  queryText: string,
  candidates: RankedCandidate[],
  options: FuseOptions
): Promise<RankedCandidate[] | null> {
  const { signal, logContext, rerankTimeoutMs = routingConfig.EMBEDDING_TIMEOUT_MS } = options;

  try {
    const scores = await Promise.all(
      candidates.map((candidate) =>
        runWithTimeout("rerank", rerankTimeoutMs, signal, (callSignal) =>
          reranker.score(queryText, candidate.hit.text, callSignal)
        )
      )
    );

    return candidates
      .map((candidate, index) => ({ candidate, index, rerankScore: scores[index] ?? 0 }))
      .sort((a, b) => b.rerankScore - a.rerankScore || a.index - b.index)
      .map(({ candidate, rerankScore }) => ({ ...candidate, score: rerankScore }));
  } catch (error) {
    if (signal?.aborted) {
      throw new QueryAbortedError("evidenceFusion");
    }
    logWarn("fusion_rerank_degraded", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "evidenceFusion",
      reason: "reranker_error",
      error: errorMessage(error),
    });
    return null;
  }
}

function toEvidenceItem(candidate: RankedCandidate, position: number): EvidenceItem {
  const { hit } = candidate;
  return Object.freeze({
    sourceId: candidate.sourceId,
    sourceKind: "local-file" as const,
    text: hit.text,
    originRank: position + 1,
    score: candidate.score,
    title: hit.metadata.title || hit.metadata.documentId,
  });
}

/**
 * Main fusion entry point.
 *
 * Retrieves from both indices within `scope`, fuses with RRF, reranks when a
 * reranker is configured, and returns at most min(topN, candidatePool) items.
 * Index failures never reach the caller.
 */
export async function fuse(options: FuseOptions, deps: FusionDependencies): Promise<FusedResultSet> {
  const {
    queryText,
    scope,
    signal,
    logContext,
    rrfK = routingConfig.RRF_K,
    topN = routingConfig.FUSION_TOP_N,
  } = options;

  const candidatePool = Math.max(1, Math.floor(options.candidatePool));
  const startTime = Date.now();

  if (scope.length === 0) {
    return [];
  }

  const [denseHits, lexicalHits] = await Promise.all([
    searchDense(deps, options, candidatePool),
    searchLexical(deps, options, candidatePool),
  ]);

  if (signal?.aborted) {
    throw new QueryAbortedError("evidenceFusion");
  }

  const fused = reciprocalRankFuse([denseHits, lexicalHits], rrfK)
    .filter((candidate) => candidate.hit.text.trim().length > 0)
    .slice(0, candidatePool);

  let ordered = fused;
  let reranked = false;
  if (deps.reranker && fused.length > 0) {
    const rerankResult = await rerankCandidates(deps.reranker, queryText, fused, options);
    if (rerankResult) {
      ordered = rerankResult;
      reranked = true;
    }
  }

  const limit = Math.min(Math.max(1, topN), candidatePool);
  const evidence = ordered.slice(0, limit).map(toEvidenceItem);

  logDebug("fusion_complete", {
    requestId: logContext?.requestId,
    conversationId: logContext?.conversationId,
    stage: "evidenceFusion",
    denseCount: denseHits.length,
    lexicalCount: lexicalHits.length,
    fusedCount: fused.length,
    returnedCount: evidence.length,
    reranked,
    durationMs: Date.now() - startTime,
  });

  return evidence;
}
