import { describe, it, expect, vi } from "vitest";
import { fuse, reciprocalRankFuse, type FuseOptions } from "../evidenceFusion";
import type { IndexHit, LexicalIndex, Reranker } from "../types";

function hit(sourceId: string, text = `text of ${sourceId}`): IndexHit {
  return { sourceId, score: 1, text, metadata: { documentId: "doc-1", title: "Doc One" } };
}

function denseOf(hits: IndexHit[]) {
  return { search: vi.fn(async () => hits) };
}

function lexicalOf(hits: IndexHit[] | null) {
  return { search: vi.fn(async () => hits) };
}

function options(overrides: Partial<FuseOptions> = {}): FuseOptions {
  return {
    queryText: "query",
    queryVector: [1, 0, 0],
    candidatePool: 20,
    scope: ["doc-1"],
    ...overrides,
  };
}

describe("reciprocalRankFuse", () => {
  it("sums 1/(k+r) across lists and sorts by aggregate", () => {
    const fused = reciprocalRankFuse([
      [hit("a"), hit("b"), hit("c")],
      [hit("b"), hit("d")],
    ]);

    expect(fused.map((c) => c.sourceId)).toEqual(["b", "a", "d", "c"]);
    expect(fused[0]?.score).toBeCloseTo(1 / 62 + 1 / 61, 12);
    expect(fused[1]?.score).toBeCloseTo(1 / 61, 12);
    expect(fused[2]?.score).toBeCloseTo(1 / 62, 12);
    expect(fused[3]?.score).toBeCloseTo(1 / 63, 12);
    expect(fused[0]).toMatchObject({ denseRank: 2, lexicalRank: 1, bestRank: 1 });
  });

  it("counts a repeated sourceId only at its first position in a list", () => {
    const fused = reciprocalRankFuse([[hit("a"), hit("a"), hit("b")]]);

    expect(fused.map((c) => c.sourceId)).toEqual(["a", "b"]);
    expect(fused[0]?.score).toBeCloseTo(1 / 61, 12);
    expect(fused[1]?.score).toBeCloseTo(1 / 62, 12);
  });

  it("breaks score ties by best rank, then by sourceId", () => {
    // With k = 0: m and z score 1 at rank 1, a scores 1/2 + 1/2 at rank 2.
    const fused = reciprocalRankFuse(
      [
        [hit("z"), hit("a")],
        [hit("m"), hit("a")],
      ],
      0
    );

    expect(fused.map((c) => [c.sourceId, c.score])).toEqual([
      ["m", 1],
      ["z", 1],
      ["a", 1],
    ]);
  });
});

describe("fuse", () => {
  it("returns unique items bounded by the candidate pool", async () => {
    const dense = denseOf(Array.from({ length: 30 }, (_, i) => hit(`d${i % 12}`)));
    const lexical = lexicalOf([hit("d3"), hit("x1"), hit("x2")]);

    const result = await fuse(options({ candidatePool: 5, topN: 8 }), { denseIndex: dense, lexicalIndex: lexical });

    expect(result).toHaveLength(5);
    expect(new Set(result.map((item) => item.sourceId)).size).toBe(5);
    expect(result[0]?.sourceId).toBe("d3");
    expect(result.map((item) => item.originRank)).toEqual([1, 2, 3, 4, 5]);
  });

  it("truncates to topN", async () => {
    const dense = denseOf([hit("a"), hit("b"), hit("c"), hit("d")]);

    const result = await fuse(options({ topN: 2 }), { denseIndex: dense, lexicalIndex: null });

    expect(result.map((item) => item.sourceId)).toEqual(["a", "b"]);
  });

  it("passes the scope and pool to both indices", async () => {
    const dense = denseOf([]);
    const lexical = lexicalOf([]);

    await fuse(options({ candidatePool: 7, scope: ["doc-1", "doc-2"] }), { denseIndex: dense, lexicalIndex: lexical });

    expect(dense.search).toHaveBeenCalledWith([1, 0, 0], 7, { documentIds: ["doc-1", "doc-2"] });
    expect(lexical.search).toHaveBeenCalledWith("query", 7, { documentIds: ["doc-1", "doc-2"] });
  });

  it("degrades to dense-only when the lexical index has no index for the scope", async () => {
    const dense = denseOf([hit("a"), hit("b")]);

    const result = await fuse(options(), { denseIndex: dense, lexicalIndex: lexicalOf(null) });

    expect(result.map((item) => item.sourceId)).toEqual(["a", "b"]);
    expect(result[0]?.score).toBeCloseTo(1 / 61, 12);
  });

  it("degrades to dense-only when the lexical index throws", async () => {
    const lexical: LexicalIndex = {
      search: vi.fn(async () => {
        throw new Error("index offline");
      }),
    };

    const result = await fuse(options(), { denseIndex: denseOf([hit("a")]), lexicalIndex: lexical });

    expect(result.map((item) => item.sourceId)).toEqual(["a"]);
  });

  it("skips dense retrieval when there is no query vector", async () => {
    const dense = denseOf([hit("a")]);

    const result = await fuse(options({ queryVector: null }), { denseIndex: dense, lexicalIndex: lexicalOf([hit("b")]) });

    expect(dense.search).not.toHaveBeenCalled();
    expect(result.map((item) => item.sourceId)).toEqual(["b"]);
  });

  it("returns nothing for an empty scope without touching the indices", async () => {
    const dense = denseOf([hit("a")]);

    const result = await fuse(options({ scope: [] }), { denseIndex: dense });

    expect(result).toEqual([]);
    expect(dense.search).not.toHaveBeenCalled();
  });

  it("drops items whose text is blank", async () => {
    const dense = denseOf([hit("a", "   "), hit("b")]);

    const result = await fuse(options(), { denseIndex: dense });

    expect(result.map((item) => item.sourceId)).toEqual(["b"]);
    expect(result[0]?.originRank).toBe(1);
  });

  it("orders by reranker score, keeping fusion order on ties", async () => {
    const scores: Record<string, number> = { "text of a": 0.1, "text of b": 0.9, "text of c": 0.1 };
    const reranker: Reranker = { score: vi.fn(async (_q: string, passage: string) => scores[passage] ?? 0) };

    const result = await fuse(options(), {
      denseIndex: denseOf([hit("a"), hit("b"), hit("c")]),
      reranker,
    });

    expect(result.map((item) => [item.sourceId, item.score])).toEqual([
      ["b", 0.9],
      ["a", 0.1],
      ["c", 0.1],
    ]);
  });

  it("keeps fusion order when the reranker fails", async () => {
    const reranker: Reranker = {
      score: vi.fn(async () => {
        throw new Error("reranker down");
      }),
    };

    const result = await fuse(options(), { denseIndex: denseOf([hit("a"), hit("b")]), reranker });

    expect(result.map((item) => item.sourceId)).toEqual(["a", "b"]);
  });

  it("produces frozen local-file evidence titled from chunk metadata", async () => {
    const untitled: IndexHit = { sourceId: "u", score: 1, text: "body", metadata: { documentId: "doc-9" } };

    const result = await fuse(options(), { denseIndex: denseOf([hit("a"), untitled]) });

    expect(Object.isFrozen(result[0])).toBe(true);
    expect(result[0]).toMatchObject({ sourceKind: "local-file", title: "Doc One" });
    expect(result[1]?.title).toBe("doc-9");
  });
});
