export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface AiClient {
  /** Provider-qualified id of the embedding model, e.g. `openai:text-embedding-3-small`. */
  getEmbeddingModelId(): string;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
  generateAnswer(messages: ChatMessage[]): Promise<string>;
}
