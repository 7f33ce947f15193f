import { describe, it, expect } from "vitest";
import {
  COULD_NOT_COMPLETE_RESPONSE,
  WEB_NOT_USED_MARKER,
  buildSynthesisPrompt,
  interpretSynthesisOutput,
  synthesize,
} from "../synthesizer";
import { GenerationUnavailableError, QueryAbortedError } from "../errors";
import { FakeGeneration } from "./fakes";
import type { EvidenceItem, GenerationCapability, Query } from "../types";

const QUERY: Query = { queryText: "Why do cats nap?", conversationId: "conv-1", webFallbackEnabled: true };

const LOCAL: EvidenceItem = {
  sourceId: "doc-cats#0",
  sourceKind: "local-file",
  text: " Cats nap often. ",
  originRank: 1,
  score: 0.4,
  title: "Cat Care",
};

const WEB: EvidenceItem = {
  sourceId: "https://vet.example.com/naps",
  sourceKind: "live-web",
  text: "Napping conserves energy.",
  originRank: 2,
  score: 0,
  title: "Vet Notes",
  url: "https://vet.example.com/naps",
};

describe("buildSynthesisPrompt", () => {
  it("numbers local and web sources with their labels", () => {
    expect(buildSynthesisPrompt(QUERY.queryText, "grounded_in_web", [LOCAL, WEB])).toBe(
      "SOURCES:\n" +
        "[1] LOCAL Cat Care\nCats nap often.\n\n" +
        "[2] WEB Vet Notes - https://vet.example.com/naps\nNapping conserves energy.\n\n" +
        "USER QUESTION: Why do cats nap?"
    );
  });

  it("omits the sources block for internal knowledge", () => {
    expect(buildSynthesisPrompt(QUERY.queryText, "internal_llm_weights", [LOCAL])).toBe(
      "USER QUESTION: Why do cats nap?"
    );
  });
});

describe("interpretSynthesisOutput", () => {
  it("strips the marker when it is allowed", () => {
    expect(interpretSynthesisOutput(`${WEB_NOT_USED_MARKER}\nCats nap to save energy.`, true)).toEqual({
      answerText: "Cats nap to save energy.",
      webNotUsed: true,
    });
  });

  it("leaves the marker in place when it is not allowed", () => {
    expect(interpretSynthesisOutput(`${WEB_NOT_USED_MARKER} answer`, false)).toEqual({
      answerText: `${WEB_NOT_USED_MARKER} answer`,
      webNotUsed: false,
    });
  });

  it("drops reasoning blocks", () => {
    expect(interpretSynthesisOutput("<think>plan</think>\nThey nap [1].", false)).toEqual({
      answerText: "They nap [1].",
      webNotUsed: false,
    });
  });
});

describe("synthesize", () => {
  it("answers with one synthesis call", async () => {
    const generation = new FakeGeneration({ synthesis: "They nap to conserve energy [1]." });

    const outcome = await synthesize(QUERY, "grounded_in_docs", [LOCAL], { generation });

    expect(outcome).toEqual({ status: "answered", answerText: "They nap to conserve energy [1].", webNotUsed: false });
    expect(generation.callsFor("synthesis")).toHaveLength(1);
    expect(generation.requests[0]?.systemInstruction).toContain("ONLY the numbered document excerpts");
  });

  it("reports web-not-used only for web-grounded synthesis", async () => {
    const generation = new FakeGeneration({ synthesis: `${WEB_NOT_USED_MARKER}\nGeneral answer.` });

    const outcome = await synthesize(QUERY, "grounded_in_web", [LOCAL, WEB], { generation });

    expect(outcome).toEqual({ status: "answered", answerText: "General answer.", webNotUsed: true });
  });

  it("fails with a fixed message when the call errors", async () => {
    const generation = new FakeGeneration({ synthesis: new Error("500 Internal") });

    const outcome = await synthesize(QUERY, "grounded_in_docs", [LOCAL], { generation });

    expect(outcome).toEqual({ status: "failed", answerText: COULD_NOT_COMPLETE_RESPONSE, reason: "500 Internal" });
  });

  it("fails when the model returns nothing", async () => {
    const generation = new FakeGeneration({ synthesis: "<think>only reasoning</think>" });

    const outcome = await synthesize(QUERY, "internal_llm_weights", [], { generation });

    expect(outcome).toEqual({ status: "failed", answerText: COULD_NOT_COMPLETE_RESPONSE, reason: "empty answer" });
  });

  it("fails when the call times out", async () => {
    const generation: GenerationCapability = { generate: () => new Promise<string>(() => {}) };

    const outcome = await synthesize(QUERY, "internal_llm_weights", [], { generation, timeoutMs: 20 });

    expect(outcome.status).toBe("failed");
    expect(outcome.answerText).toBe(COULD_NOT_COMPLETE_RESPONSE);
  });

  it("propagates unavailable generation and caller abort", async () => {
    await expect(
      synthesize(QUERY, "grounded_in_docs", [LOCAL], {
        generation: new FakeGeneration({ synthesis: new GenerationUnavailableError() }),
      })
    ).rejects.toBeInstanceOf(GenerationUnavailableError);

    const controller = new AbortController();
    controller.abort();
    await expect(
      synthesize(QUERY, "grounded_in_docs", [LOCAL], {
        generation: new FakeGeneration({ synthesis: "unused" }),
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(QueryAbortedError);
  });
});
