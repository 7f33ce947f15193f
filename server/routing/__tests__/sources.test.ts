import { describe, it, expect } from "vitest";
import { buildCitedSources, mergeEvidence, webResultsToEvidence } from "../sources";
import { buildNotices } from "../notices";
import { NOTICE_CODES } from "@shared/responseNotices";
import type { EvidenceItem, WebSearchResult } from "../types";

const LOCAL: EvidenceItem[] = [
  { sourceId: "doc-a#0", sourceKind: "local-file", text: "a0", originRank: 1, score: 0.3, title: "Doc A" },
  { sourceId: "doc-a#1", sourceKind: "local-file", text: "a1", originRank: 2, score: 0.2, title: "Doc A" },
];

const WEB: WebSearchResult[] = [
  { title: "Page One", url: "https://one.example.com/", extractedText: "one", charCount: 3 },
  { title: "Page Two", url: "https://two.example.com/", extractedText: "two", charCount: 3 },
];

describe("webResultsToEvidence", () => {
  it("ranks web items after the local ones and keys them by URL", () => {
    const items = webResultsToEvidence(WEB, 2);

    expect(items.map((item) => [item.sourceId, item.originRank, item.sourceKind])).toEqual([
      ["https://one.example.com/", 3, "live-web"],
      ["https://two.example.com/", 4, "live-web"],
    ]);
    expect(Object.isFrozen(items[0])).toBe(true);
  });
});

describe("mergeEvidence", () => {
  it("appends web results and drops a repeated URL", () => {
    const again: WebSearchResult = { title: "Again", url: "https://one.example.com/", extractedText: "x", charCount: 1 };

    const merged = mergeEvidence(LOCAL, [...WEB, again]);

    expect(merged.map((item) => item.sourceId)).toEqual([
      "doc-a#0",
      "doc-a#1",
      "https://one.example.com/",
      "https://two.example.com/",
    ]);
  });
});

describe("buildCitedSources", () => {
  const evidence = mergeEvidence(LOCAL, WEB);

  it("cites only web pages for a web-grounded answer", () => {
    expect(buildCitedSources(evidence, "grounded_in_web")).toEqual([
      { title: "Page One", url: "https://one.example.com/", sourceKind: "live-web" },
      { title: "Page Two", url: "https://two.example.com/", sourceKind: "live-web" },
    ]);
  });

  it("cites each local document once for a document-grounded answer", () => {
    const docB: EvidenceItem = {
      sourceId: "doc-b#0",
      sourceKind: "local-file",
      text: "b0",
      originRank: 3,
      score: 0.1,
      title: "Doc B",
    };

    expect(buildCitedSources([...LOCAL, docB], "grounded_in_docs")).toEqual([
      { title: "Doc A", url: undefined, sourceKind: "local-file" },
      { title: "Doc B", url: undefined, sourceKind: "local-file" },
    ]);
  });

  it("cites nothing for ungrounded or refused answers", () => {
    expect(buildCitedSources(evidence, "internal_llm_weights")).toEqual([]);
    expect(buildCitedSources(evidence, "no_evidence_found")).toEqual([]);
  });
});

describe("buildNotices", () => {
  const codes = (input: Parameters<typeof buildNotices>[0]) => buildNotices(input).map((notice) => notice.code);

  it("labels each mode", () => {
    expect(codes({ mode: "grounded_in_docs", status: "answered", citedCount: 2, webAttemptFailed: false })).toEqual([
      NOTICE_CODES.DOCS_GROUNDED,
    ]);
    expect(codes({ mode: "grounded_in_web", status: "answered", citedCount: 1, webAttemptFailed: false })).toEqual([
      NOTICE_CODES.WEB_GROUNDED,
    ]);
    expect(codes({ mode: "no_evidence_found", status: "refused", citedCount: 0, webAttemptFailed: false })).toEqual([
      NOTICE_CODES.NO_EVIDENCE,
    ]);
  });

  it("explains a failed web attempt before the general-knowledge disclaimer", () => {
    expect(codes({ mode: "internal_llm_weights", status: "answered", citedCount: 0, webAttemptFailed: true })).toEqual([
      NOTICE_CODES.WEB_UNAVAILABLE,
      NOTICE_CODES.UNGROUNDED,
    ]);
  });

  it("reports only the processing error when synthesis failed", () => {
    expect(codes({ mode: "grounded_in_docs", status: "failed", citedCount: 0, webAttemptFailed: false })).toEqual([
      NOTICE_CODES.PROCESSING_ERROR,
    ]);
  });

  it("pluralizes the grounding message", () => {
    const [single] = buildNotices({ mode: "grounded_in_docs", status: "answered", citedCount: 1, webAttemptFailed: false });
    expect(single?.message).toBe("Based on 1 document in this conversation.");
  });
});
