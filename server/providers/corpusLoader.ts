/**
 * Loads the local corpus (documents, their chunks, and conversation
 * attachments) from a JSON file and builds the in-memory indices from it.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { logInfo } from "../utils/logger";
import { InMemoryDenseIndex, InMemoryLexicalIndex } from "./memoryIndex";
import { InMemoryConversationScopeStore } from "./conversationScopes";
import type { EmbeddingService } from "../routing/types";

const corpusDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1).optional(),
  chunks: z.array(z.string()).min(1),
});

const corpusConversationSchema = z.object({
  id: z.string().min(1),
  documentIds: z.array(z.string().min(1)),
});

export const corpusSchema = z.object({
  documents: z.array(corpusDocumentSchema),
  conversations: z.array(corpusConversationSchema).default([]),
});

export type Corpus = z.infer<typeof corpusSchema>;

export interface LoadedCorpus {
  denseIndex: InMemoryDenseIndex;
  lexicalIndex: InMemoryLexicalIndex;
  scopeStore: InMemoryConversationScopeStore;
}

export function parseCorpus(raw: unknown): Corpus {
  const result = corpusSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid corpus: ${issues}`);
  }

  const ids = new Set<string>();
  for (const doc of result.data.documents) {
    if (ids.has(doc.id)) {
      throw new Error(`Invalid corpus: duplicate document id "${doc.id}"`);
    }
    ids.add(doc.id);
  }

  return result.data;
}

export async function readCorpusFile(path: string): Promise<Corpus> {
  const contents = await readFile(path, "utf8");
  return parseCorpus(JSON.parse(contents));
}

/**
 * Chunk ids are `<documentId>#<chunkIndex>`. Every chunk is embedded once;
 * empty chunks are skipped.
 */
export async function buildCorpusIndices(corpus: Corpus, embeddings: EmbeddingService): Promise<LoadedCorpus> {
  const denseIndex = new InMemoryDenseIndex();
  const lexicalIndex = new InMemoryLexicalIndex();
  const scopeStore = new InMemoryConversationScopeStore();

  for (const doc of corpus.documents) {
    for (const [chunkIndex, text] of doc.chunks.entries()) {
      if (text.trim().length === 0) continue;

      const chunk = {
        sourceId: `${doc.id}#${chunkIndex}`,
        text,
        metadata: { documentId: doc.id, title: doc.title, chunkIndex },
      };
      const vector = await embeddings.encode(text);
      denseIndex.add({ ...chunk, vector });
      lexicalIndex.add(chunk);
    }
  }

  for (const conversation of corpus.conversations) {
    scopeStore.setDocuments(conversation.id, conversation.documentIds);
  }

  logInfo("corpus_indexed", {
    stage: "startup",
    documentCount: corpus.documents.length,
    chunkCount: denseIndex.size,
    conversationCount: corpus.conversations.length,
  });

  return { denseIndex, lexicalIndex, scopeStore };
}
