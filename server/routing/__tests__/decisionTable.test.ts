import { describe, it, expect } from "vitest";
import {
  planAfterEvaluation,
  planAfterScope,
  planAfterWeb,
  resolveFinalMode,
  resolveScope,
} from "../decisionTable";
import type { Query } from "../types";

function query(overrides: Partial<Query> = {}): Query {
  return { queryText: "raw question", conversationId: "conv-1", webFallbackEnabled: false, ...overrides };
}

describe("resolveScope", () => {
  it("uses only the explicit document even when the conversation has others", () => {
    expect(resolveScope(query({ explicitDocumentId: "doc-b" }), ["doc-a", "doc-b", "doc-c"])).toEqual({
      source: "explicit_document",
      documentIds: ["doc-b"],
    });
  });

  it("falls back to the conversation's documents, deduplicated", () => {
    expect(resolveScope(query(), ["doc-a", "doc-b", "doc-a"])).toEqual({
      source: "conversation",
      documentIds: ["doc-a", "doc-b"],
    });
  });

  it("ignores a blank explicit document id", () => {
    expect(resolveScope(query({ explicitDocumentId: "  " }), [])).toEqual({ source: "none", documentIds: [] });
  });
});

describe("planAfterScope", () => {
  const none = { source: "none" as const, documentIds: [] };

  it("retrieves locally whenever documents are in scope, whatever the toggle", () => {
    const scope = { source: "conversation" as const, documentIds: ["doc-a"] };
    expect(planAfterScope(scope, query({ webFallbackEnabled: true }))).toEqual({ action: "retrieve_local" });
    expect(planAfterScope(scope, query())).toEqual({ action: "retrieve_local" });
  });

  it("goes to internal knowledge with no documents and fallback off", () => {
    expect(planAfterScope(none, query())).toEqual({ action: "synthesize_internal", mode: "internal_llm_weights" });
  });

  it("goes to the web with the raw query with no documents and fallback on", () => {
    expect(planAfterScope(none, query({ webFallbackEnabled: true }))).toEqual({
      action: "search_web",
      queryTerms: "raw question",
    });
  });
});

describe("planAfterEvaluation", () => {
  it("synthesizes from local evidence when sufficient", () => {
    expect(planAfterEvaluation({ kind: "local" }, query({ webFallbackEnabled: true }))).toEqual({
      action: "synthesize_local",
      mode: "grounded_in_docs",
    });
  });

  it("refuses insufficient or absent evidence when fallback is off", () => {
    const refusal = { action: "refuse", mode: "no_evidence_found" };
    expect(planAfterEvaluation({ kind: "search_requested", queryTerms: "x" }, query())).toEqual(refusal);
    expect(planAfterEvaluation({ kind: "no_evidence" }, query())).toEqual(refusal);
  });

  it("searches with the evaluator's terms when fallback is on", () => {
    expect(
      planAfterEvaluation({ kind: "search_requested", queryTerms: "better terms" }, query({ webFallbackEnabled: true }))
    ).toEqual({ action: "search_web", queryTerms: "better terms" });
  });

  it("searches with the raw query when the evaluator was skipped", () => {
    expect(planAfterEvaluation({ kind: "no_evidence" }, query({ webFallbackEnabled: true }))).toEqual({
      action: "search_web",
      queryTerms: "raw question",
    });
  });
});

describe("planAfterWeb", () => {
  it("grounds in the web on a successful batch", () => {
    const batch = {
      status: "ok" as const,
      results: [{ title: "t", url: "https://a.example.com/", extractedText: "x", charCount: 1 }],
    };
    expect(planAfterWeb(batch)).toEqual({ action: "synthesize_web", mode: "grounded_in_web" });
  });

  it("falls through to internal knowledge, never to a refusal", () => {
    expect(planAfterWeb({ status: "no_results" })).toEqual({
      action: "synthesize_internal",
      mode: "internal_llm_weights",
      reason: "no_results",
    });
    expect(planAfterWeb({ status: "failed", reason: "boom" })).toEqual({
      action: "synthesize_internal",
      mode: "internal_llm_weights",
      reason: "failed",
    });
  });
});

describe("resolveFinalMode", () => {
  it("downgrades a web-grounded answer that did not use the web", () => {
    expect(resolveFinalMode("grounded_in_web", { webNotUsed: true })).toBe("internal_llm_weights");
  });

  it("keeps every other planned mode", () => {
    expect(resolveFinalMode("grounded_in_web", { webNotUsed: false })).toBe("grounded_in_web");
    expect(resolveFinalMode("grounded_in_docs", { webNotUsed: true })).toBe("grounded_in_docs");
    expect(resolveFinalMode("internal_llm_weights", { webNotUsed: false })).toBe("internal_llm_weights");
  });
});
