import { type AppConfig, type ModelProvider, resolveEmbeddingModelId } from "../../config/env.js";
import { EmbeddingServiceError, GenerationServiceError } from "../../domain/errors.js";
import { ProviderRequestError } from "./http.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import type { AiClient, ChatMessage } from "./types.js";

/**
 * Routes embedding and generation calls to the configured providers and
 * turns every provider failure into the service's error taxonomy.
 */
export class DefaultAiClient implements AiClient {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly embeddingProvider: ModelProvider;

  private readonly generationProvider: ModelProvider;

  private readonly embeddingModelId: string;

  constructor(config: AppConfig) {
    this.openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      embeddingModel: config.openaiEmbeddingModel,
      chatModel: config.openaiChatModel,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      generationTimeoutMs: config.generationTimeoutMs,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      generationTimeoutMs: config.generationTimeoutMs,
    });
    this.embeddingProvider = config.embeddingProvider;
    this.generationProvider = config.generationProvider;
    this.embeddingModelId = resolveEmbeddingModelId(config);
  }

  getEmbeddingModelId(): string {
    return this.embeddingModelId;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    try {
      const vectors =
        this.embeddingProvider === "openai"
          ? await this.openAi.embedTexts(texts)
          : await this.ollama.embedTexts(texts);
      if (vectors.length !== texts.length) {
        throw new Error(`Embedding count mismatch (${vectors.length} != ${texts.length}).`);
      }
      return vectors;
    } catch (error) {
      throw new EmbeddingServiceError(
        error instanceof Error ? error.message : "Embedding request failed.",
        error instanceof ProviderRequestError && error.retryable,
        { cause: error },
      );
    }
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    return embedding;
  }

  async generateAnswer(messages: ChatMessage[]): Promise<string> {
    let answer: string;
    try {
      answer =
        this.generationProvider === "openai"
          ? await this.openAi.generateAnswer(messages)
          : await this.ollama.generateAnswer(messages);
    } catch (error) {
      throw new GenerationServiceError(
        error instanceof Error ? error.message : "Generation request failed.",
        error instanceof ProviderRequestError && error.retryable,
        { cause: error },
      );
    }

    if (!answer) {
      throw new GenerationServiceError("Generative model returned an empty answer.", false);
    }
    return answer;
  }
}
