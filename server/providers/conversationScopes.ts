import type { ConversationScopeStore } from "../routing/types";

export class InMemoryConversationScopeStore implements ConversationScopeStore {
  private readonly documentsByConversation = new Map<string, string[]>();

  setDocuments(conversationId: string, documentIds: readonly string[]): void {
    this.documentsByConversation.set(conversationId, Array.from(new Set(documentIds)));
  }

  async getDocumentIds(conversationId: string): Promise<string[]> {
    return [...(this.documentsByConversation.get(conversationId) ?? [])];
  }
}
