/**
 * Routing Orchestrator
 *
 * Main entry point of the confidence-gated retrieval pipeline:
 * 1. Scope resolution - explicit document, else the conversation's documents
 * 2. Local retrieval - dense + lexical fusion over the scope
 * 3. Sufficiency check - one generation call decides Local / Search / NoEvidence
 * 4. Web fallback - only when the caller enabled it
 * 5. Synthesis - one generation call over the final evidence set
 *
 * Local evidence is always retrieved and evaluated before any network call
 * when the scope names a document; the web toggle only permits escalation.
 */

import { logInfo, logWarn, errorMessage, sanitizeUserContent } from "../utils/logger";
import { runWithTimeout } from "../utils/timeout";
import { resolveRoutingConfig, type RoutingConfig } from "./routingConfig";
import { QueryAbortedError, throwIfAborted } from "./errors";
import { fuse } from "./evidenceFusion";
import { evaluate } from "./sufficiencyGate";
import { webBreakoutSearch } from "./webBreakout";
import {
  planAfterEvaluation,
  planAfterScope,
  planAfterWeb,
  resolveFinalMode,
  resolveScope,
} from "./decisionTable";
import { NO_EVIDENCE_RESPONSE, synthesize, type SynthesisMode } from "./synthesizer";
import { buildCitedSources, mergeEvidence } from "./sources";
import { buildNotices } from "./notices";
import { RoutingTrace } from "./routingTrace";
import type {
  ConversationScopeStore,
  DenseIndex,
  EmbeddingService,
  EvidenceItem,
  GenerationCapability,
  LexicalIndex,
  PageExtractor,
  PipelineLogContext,
  Query,
  QueryStatus,
  ResolvedScope,
  ResponseMode,
  Reranker,
  RoutedResponse,
  WebSearchProvider,
} from "./types";

export interface RoutingDependencies {
  generation: GenerationCapability;
  embeddings: EmbeddingService;
  denseIndex: DenseIndex;
  lexicalIndex?: LexicalIndex | null;
  reranker?: Reranker | null;
  searchProvider: WebSearchProvider;
  pageExtractor: PageExtractor;
  scopeStore: ConversationScopeStore;
}

export interface RouteQueryOptions {
  signal?: AbortSignal;
  logContext?: PipelineLogContext;
  config?: Partial<RoutingConfig>;
}

interface PipelineContext {
  query: Query;
  deps: RoutingDependencies;
  config: RoutingConfig;
  trace: RoutingTrace;
  signal?: AbortSignal;
  logContext: PipelineLogContext;
}

interface SynthesisPlan {
  mode: SynthesisMode;
  evidence: readonly EvidenceItem[];
  webAttemptFailed: boolean;
}

async function resolveQueryScope(ctx: PipelineContext): Promise<ResolvedScope> {
  const { query, deps } = ctx;
  const conversationDocs = query.explicitDocumentId?.trim()
    ? []
    : await deps.scopeStore.getDocumentIds(query.conversationId);
  return resolveScope(query, conversationDocs);
}

/**
 * Embed the query for dense retrieval. Any failure other than caller abort
 * is a retrieval failure: fusion then runs lexical-only.
 */
async function embedQuery(ctx: PipelineContext): Promise<number[] | null> {
  const { query, deps, config, signal, logContext } = ctx;
  try {
    return await runWithTimeout("embedding", config.EMBEDDING_TIMEOUT_MS, signal, (callSignal) =>
      deps.embeddings.encode(query.queryText, callSignal)
    );
  } catch (error) {
    if (error instanceof QueryAbortedError) throw error;
    logWarn("query_embedding_failed", {
      requestId: logContext.requestId,
      conversationId: logContext.conversationId,
      stage: "local_retrieval",
      fallback: "lexical_only",
      error: errorMessage(error),
    });
    return null;
  }
}

async function retrieveLocal(ctx: PipelineContext, scope: ResolvedScope): Promise<readonly EvidenceItem[]> {
  const { query, deps, config, signal, logContext, trace } = ctx;
  trace.enter("local_retrieval", { scopeSource: scope.source, scopeSize: scope.documentIds.length });

  const queryVector = await embedQuery(ctx);
  const evidence = await fuse(
    {
      queryText: query.queryText,
      queryVector,
      candidatePool: config.CANDIDATE_POOL,
      scope: scope.documentIds,
      topN: config.FUSION_TOP_N,
      rrfK: config.RRF_K,
      rerankTimeoutMs: config.EMBEDDING_TIMEOUT_MS,
      signal,
      logContext,
    },
    {
      denseIndex: deps.denseIndex,
      lexicalIndex: deps.lexicalIndex,
      reranker: deps.reranker,
    }
  );

  trace.annotate({ evidenceCount: evidence.length, denseUsed: queryVector !== null });
  return evidence;
}

async function runWebFallback(
  ctx: PipelineContext,
  queryTerms: string,
  localEvidence: readonly EvidenceItem[]
): Promise<SynthesisPlan> {
  const { deps, config, signal, logContext, trace } = ctx;
  trace.enter("web_fallback", { usedRawQuery: queryTerms === ctx.query.queryText });

  const batch = await webBreakoutSearch(queryTerms, deps, {
    maxResults: config.WEB_MAX_RESULTS,
    perSourceCharLimit: config.WEB_PER_SOURCE_CHAR_LIMIT,
    searchTimeoutMs: config.SEARCH_TIMEOUT_MS,
    fetchTimeoutMs: config.FETCH_TIMEOUT_MS,
    signal,
    logContext,
  });

  trace.annotate({
    batchStatus: batch.status,
    webResultCount: batch.status === "ok" ? batch.results.length : 0,
  });

  const webPlan = planAfterWeb(batch);
  if (webPlan.action === "synthesize_web" && batch.status === "ok") {
    return {
      mode: webPlan.mode,
      evidence: mergeEvidence(localEvidence, batch.results),
      webAttemptFailed: false,
    };
  }

  return { mode: "internal_llm_weights", evidence: [], webAttemptFailed: true };
}

/**
 * Everything up to synthesis. Returns null when the query is refused.
 */
async function planSynthesis(ctx: PipelineContext): Promise<SynthesisPlan | null> {
  const { query, deps, config, signal, logContext, trace } = ctx;

  trace.enter("scope_resolution");
  const scope = await resolveQueryScope(ctx);
  const scopePlan = planAfterScope(scope, query);
  trace.annotate({ scopeSource: scope.source, scopeSize: scope.documentIds.length, plan: scopePlan.action });
  throwIfAborted(signal, "scope_resolution");

  switch (scopePlan.action) {
    case "synthesize_internal":
      return { mode: scopePlan.mode, evidence: [], webAttemptFailed: false };
    case "search_web":
      return runWebFallback(ctx, scopePlan.queryTerms, []);
    case "retrieve_local":
      break;
  }

  const localEvidence = await retrieveLocal(ctx, scope);

  trace.enter("sufficiency_check");
  const decision = await evaluate(query, localEvidence, {
    generation: deps.generation,
    signal,
    timeoutMs: config.GENERATION_TIMEOUT_MS,
    temperature: config.EVALUATOR_TEMPERATURE,
    serialize: {
      itemCharLimit: config.EVALUATOR_ITEM_CHARS,
      totalCharLimit: config.EVALUATOR_TOTAL_CHARS,
    },
    logContext,
  });
  const evaluationPlan = planAfterEvaluation(decision, query);
  trace.annotate({ decision: decision.kind, plan: evaluationPlan.action });

  switch (evaluationPlan.action) {
    case "synthesize_local":
      return { mode: evaluationPlan.mode, evidence: localEvidence, webAttemptFailed: false };
    case "refuse":
      return null;
    case "search_web":
      return runWebFallback(ctx, evaluationPlan.queryTerms, localEvidence);
  }
}

function buildResponse(
  ctx: PipelineContext,
  fields: { answerText: string; mode: ResponseMode; status: QueryStatus; evidence: readonly EvidenceItem[]; webAttemptFailed: boolean }
): RoutedResponse {
  const citedSources = fields.status === "answered" ? buildCitedSources(fields.evidence, fields.mode) : [];
  return {
    answerText: fields.answerText,
    responseMode: fields.mode,
    citedSources,
    status: fields.status,
    notices: buildNotices({
      mode: fields.mode,
      status: fields.status,
      citedCount: citedSources.length,
      webAttemptFailed: fields.webAttemptFailed,
    }),
    trace: ctx.trace.finish(),
  };
}

async function runPipeline(ctx: PipelineContext): Promise<RoutedResponse> {
  const { query, deps, config, signal, logContext, trace } = ctx;

  const plan = await planSynthesis(ctx);

  if (!plan) {
    return buildResponse(ctx, {
      answerText: NO_EVIDENCE_RESPONSE,
      mode: "no_evidence_found",
      status: "refused",
      evidence: [],
      webAttemptFailed: false,
    });
  }

  trace.enter("synthesis", { plannedMode: plan.mode, evidenceCount: plan.evidence.length });
  const outcome = await synthesize(query, plan.mode, plan.evidence, {
    generation: deps.generation,
    signal,
    timeoutMs: config.GENERATION_TIMEOUT_MS,
    temperature: config.SYNTHESIS_TEMPERATURE,
    maxOutputTokens: config.SYNTHESIS_MAX_OUTPUT_TOKENS,
    logContext,
  });

  if (outcome.status === "failed") {
    trace.annotate({ synthesisFailed: true });
    return buildResponse(ctx, {
      answerText: outcome.answerText,
      mode: plan.mode,
      status: "failed",
      evidence: plan.evidence,
      webAttemptFailed: plan.webAttemptFailed,
    });
  }

  const mode = resolveFinalMode(plan.mode, { webNotUsed: outcome.webNotUsed });
  trace.annotate({ finalMode: mode });

  return buildResponse(ctx, {
    answerText: outcome.answerText,
    mode,
    status: "answered",
    evidence: plan.evidence,
    webAttemptFailed: plan.webAttemptFailed,
  });
}

/**
 * Route one query through the pipeline.
 *
 * Rejects only with QueryAbortedError (caller abort) or
 * GenerationUnavailableError (no generation possible); every other failure
 * is folded into the response.
 */
export async function routeQuery(
  query: Query,
  deps: RoutingDependencies,
  options: RouteQueryOptions = {}
): Promise<RoutedResponse> {
  const { signal } = options;
  const logContext: PipelineLogContext = options.logContext ?? {
    requestId: "unknown",
    conversationId: query.conversationId,
  };
  const config = resolveRoutingConfig(options.config);
  const startTime = Date.now();

  throwIfAborted(signal, "start");

  logInfo("routing_start", {
    requestId: logContext.requestId,
    conversationId: logContext.conversationId,
    stage: "orchestrator",
    query: sanitizeUserContent(query.queryText),
    hasExplicitDocument: Boolean(query.explicitDocumentId),
    webFallbackEnabled: query.webFallbackEnabled,
  });

  const ctx: PipelineContext = {
    query,
    deps,
    config,
    trace: new RoutingTrace(),
    signal,
    logContext,
  };

  const response = await runPipeline(ctx);

  logInfo("routing_complete", {
    requestId: logContext.requestId,
    conversationId: logContext.conversationId,
    stage: "orchestrator",
    responseMode: response.responseMode,
    status: response.status,
    citedCount: response.citedSources.length,
    states: response.trace.map((step) => step.state).join(">"),
    durationMs: Date.now() - startTime,
  });

  return response;
}
