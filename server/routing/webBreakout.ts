/**
 * Web Breakout Agent
 *
 * One search call, the first `maxResults` hits, each fetched and extracted
 * concurrently under its own timeout. A failed source is dropped; the batch
 * fails only when the provider fails or no source survives.
 */

import { logDebug, logWarn, errorMessage } from "../utils/logger";
import { runWithTimeout } from "../utils/timeout";
import { routingConfig } from "./routingConfig";
import { QueryAbortedError } from "./errors";
import type {
  PageExtractor,
  PipelineLogContext,
  WebBatch,
  WebSearchHit,
  WebSearchProvider,
  WebSearchResult,
} from "./types";

export const TRUNCATION_MARKER = " [truncated]";

export interface TruncatedText {
  text: string;
  /**
   * Length of the kept source text, excluding the marker.
   */
  charCount: number;
  truncated: boolean;
}

export function truncateForSource(text: string, limit: number): TruncatedText {
  if (text.length <= limit) {
    return { text, charCount: text.length, truncated: false };
  }
  const kept = text.slice(0, limit);
  return { text: kept + TRUNCATION_MARKER, charCount: kept.length, truncated: true };
}

export interface WebBreakoutDependencies {
  searchProvider: WebSearchProvider;
  pageExtractor: PageExtractor;
}

export interface WebBreakoutOptions {
  maxResults?: number;
  perSourceCharLimit?: number;
  searchTimeoutMs?: number;
  fetchTimeoutMs?: number;
  signal?: AbortSignal;
  logContext?: PipelineLogContext;
}

function isHttpUrl(raw: string): boolean {
  try {
    const { protocol } = new URL(raw);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

async function fetchSource(
  hit: WebSearchHit,
  deps: WebBreakoutDependencies,
  perSourceCharLimit: number,
  fetchTimeoutMs: number,
  signal: AbortSignal | undefined
): Promise<WebSearchResult> {
  if (!isHttpUrl(hit.url)) {
    throw new Error("not an http(s) URL");
  }

  const extracted = await runWithTimeout("page_fetch", fetchTimeoutMs, signal, (callSignal) =>
    deps.pageExtractor.extract(hit.url, callSignal)
  );

  const cleaned = extracted?.trim() ?? "";
  if (cleaned.length === 0) {
    throw new Error("empty extraction");
  }

  const { text, charCount } = truncateForSource(cleaned, perSourceCharLimit);
  return { title: hit.title.trim() || hit.url, url: hit.url, extractedText: text, charCount };
}

/**
 * Search the web for `queryTerms` and return a finite batch of extracted
 * sources. Only caller abort is thrown; every other failure is a batch status.
 */
export async function webBreakoutSearch(
  queryTerms: string,
  deps: WebBreakoutDependencies,
  options: WebBreakoutOptions = {}
): Promise<WebBatch> {
  const {
    maxResults = routingConfig.WEB_MAX_RESULTS,
    perSourceCharLimit = routingConfig.WEB_PER_SOURCE_CHAR_LIMIT,
    searchTimeoutMs = routingConfig.SEARCH_TIMEOUT_MS,
    fetchTimeoutMs = routingConfig.FETCH_TIMEOUT_MS,
    signal,
    logContext,
  } = options;

  const startTime = Date.now();

  let hits: WebSearchHit[];
  try {
    hits = await runWithTimeout("web_search", searchTimeoutMs, signal, (callSignal) =>
      deps.searchProvider.search(queryTerms, maxResults, callSignal)
    );
  } catch (error) {
    if (error instanceof QueryAbortedError) throw error;
    logWarn("web_search_failed", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "webBreakout",
      error: errorMessage(error),
    });
    return { status: "failed", reason: `search provider error: ${errorMessage(error)}` };
  }

  const selected = hits.slice(0, maxResults);

  if (selected.length === 0) {
    logDebug("web_search_no_results", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "webBreakout",
    });
    return { status: "no_results" };
  }

  const settled = await Promise.allSettled(
    selected.map((hit) => fetchSource(hit, deps, perSourceCharLimit, fetchTimeoutMs, signal))
  );

  if (signal?.aborted) {
    throw new QueryAbortedError("webBreakout");
  }

  const results: WebSearchResult[] = [];
  settled.forEach((outcome, index) => {
    if (outcome.status === "fulfilled") {
      results.push(outcome.value);
      return;
    }
    logWarn("web_fetch_failed", {
      requestId: logContext?.requestId,
      conversationId: logContext?.conversationId,
      stage: "webBreakout",
      url: selected[index]?.url,
      error: errorMessage(outcome.reason),
    });
  });

  logDebug("web_breakout_complete", {
    requestId: logContext?.requestId,
    conversationId: logContext?.conversationId,
    stage: "webBreakout",
    selectedCount: selected.length,
    extractedCount: results.length,
    durationMs: Date.now() - startTime,
  });

  if (results.length === 0) {
    return { status: "failed", reason: "all page fetches failed" };
  }

  return { status: "ok", results };
}
