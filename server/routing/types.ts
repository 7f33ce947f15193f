import type { ResponseNotice } from "@shared/responseNotices";

// =====================================================
// QUERY + SCOPE
// =====================================================

export interface Query {
  readonly queryText: string;
  readonly explicitDocumentId?: string;
  readonly conversationId: string;
  readonly webFallbackEnabled: boolean;
}

/**
 * Document ids a retrieval may touch. Empty means general chat.
 */
export type ConversationScope = readonly string[];

export type ScopeSource = "explicit_document" | "conversation" | "none";

export interface ResolvedScope {
  source: ScopeSource;
  documentIds: ConversationScope;
}

// =====================================================
// EVIDENCE
// =====================================================

export type SourceKind = "local-file" | "live-web";

export interface EvidenceItem {
  readonly sourceId: string;
  readonly sourceKind: SourceKind;
  readonly text: string;
  readonly originRank: number;
  readonly score: number;
  readonly title?: string;
  readonly url?: string;
}

/**
 * Rank-ordered, no duplicate sourceId, never longer than the candidate pool.
 */
export type FusedResultSet = readonly EvidenceItem[];

export type RoutingDecision =
  | { kind: "local" }
  | { kind: "search_requested"; queryTerms: string }
  | { kind: "no_evidence" };

export interface WebSearchResult {
  title: string;
  url: string;
  extractedText: string;
  charCount: number;
}

export type WebBatch =
  | { status: "ok"; results: WebSearchResult[] }
  | { status: "no_results" }
  | { status: "failed"; reason: string };

export type ResponseMode =
  | "grounded_in_docs"
  | "grounded_in_web"
  | "internal_llm_weights"
  | "no_evidence_found";

// =====================================================
// COLLABORATORS
// =====================================================

export interface ChunkMetadata {
  documentId: string;
  title?: string;
  chunkIndex?: number;
}

export interface IndexHit {
  sourceId: string;
  score: number;
  text: string;
  metadata: ChunkMetadata;
}

export interface IndexFilters {
  documentIds: ConversationScope;
}

export interface EmbeddingService {
  encode(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface DenseIndex {
  search(vector: readonly number[], limit: number, filters: IndexFilters): Promise<IndexHit[]>;
}

export interface LexicalIndex {
  /**
   * Resolves null when no lexical index is built for the requested scope.
   */
  search(text: string, limit: number, filters: IndexFilters): Promise<IndexHit[] | null>;
}

export interface Reranker {
  score(query: string, passage: string, signal?: AbortSignal): Promise<number>;
}

export interface WebSearchHit {
  title: string;
  url: string;
}

export interface WebSearchProvider {
  search(text: string, maxResults: number, signal?: AbortSignal): Promise<WebSearchHit[]>;
}

export interface PageExtractor {
  extract(url: string, signal?: AbortSignal): Promise<string | null>;
}

export type GenerationStage = "sufficiency" | "synthesis";

export interface GenerationRequest {
  stage: GenerationStage;
  systemInstruction: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  logContext?: PipelineLogContext;
}

/**
 * Output is untrusted text; callers validate it.
 */
export interface GenerationCapability {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

export interface ConversationScopeStore {
  getDocumentIds(conversationId: string): Promise<string[]>;
}

// =====================================================
// RESPONSE
// =====================================================

export interface CitedSource {
  title?: string;
  url?: string;
  sourceKind: SourceKind;
}

export type QueryStatus = "answered" | "refused" | "failed";

export type RoutingState =
  | "scope_resolution"
  | "local_retrieval"
  | "sufficiency_check"
  | "web_fallback"
  | "synthesis"
  | "done";

export interface TraceStep {
  state: RoutingState;
  durationMs: number;
  detail?: Record<string, string | number | boolean>;
}

export interface RoutedResponse {
  answerText: string;
  responseMode: ResponseMode;
  citedSources: CitedSource[];
  status: QueryStatus;
  notices: ResponseNotice[];
  trace: TraceStep[];
}

/**
 * Logging context passed through the pipeline for request correlation
 */
export interface PipelineLogContext {
  requestId: string;
  conversationId?: string;
}
