import { resolve } from "node:path";

import { validateEnv, getEnvConfig } from "./config/env";
import { createApp } from "./app";
import { createGeminiClient, GeminiEmbeddings, GeminiGeneration } from "./llm/geminiClient";
import { buildCorpusIndices, readCorpusFile } from "./providers/corpusLoader";
import { DuckDuckGoSearchProvider } from "./providers/duckDuckGoSearch";
import { HtmlPageExtractor } from "./providers/pageExtractor";
import { EmbeddingReranker } from "./providers/embeddingReranker";
import { logInfo, logError, errorMessage } from "./utils/logger";

async function main(): Promise<void> {
  // Validate environment variables before anything else
  validateEnv();
  const env = getEnvConfig();

  const ai = createGeminiClient(env.GEMINI_API_KEY);
  const generation = new GeminiGeneration(ai);
  const embeddings = new GeminiEmbeddings(ai);

  const corpus = await readCorpusFile(resolve(process.cwd(), env.CORPUS_PATH));
  const { denseIndex, lexicalIndex, scopeStore } = await buildCorpusIndices(corpus, embeddings);

  const searchProvider = new DuckDuckGoSearchProvider();
  const pageExtractor = new HtmlPageExtractor();

  const app = createApp(() => ({
    generation,
    embeddings,
    denseIndex,
    lexicalIndex,
    reranker: new EmbeddingReranker(embeddings),
    searchProvider,
    pageExtractor,
    scopeStore,
  }));

  app.listen(env.PORT, "0.0.0.0", () => {
    logInfo("server_started", { port: env.PORT, host: "0.0.0.0", nodeEnv: env.NODE_ENV });
  });
}

main().catch((error: unknown) => {
  logError("startup_failed", { error: errorMessage(error) });
  process.exitCode = 1;
});
