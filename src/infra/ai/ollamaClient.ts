import { z } from "zod";
import type { ChatMessage } from "./types.js";
import { postJson } from "./http.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  embeddingTimeoutMs: number;
  generationTimeoutMs: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedOne(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async generateAnswer(messages: ChatMessage[]): Promise<string> {
    const raw = await postJson(
      `${this.options.baseUrl}/api/chat`,
      {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.1,
          top_p: 0.9,
        },
        messages,
      },
      { label: "Ollama chat", timeoutMs: this.options.generationTimeoutMs },
    );

    const data = chatResponseSchema.parse(raw);
    return data.message?.content?.trim() ?? "";
  }

  private async embedOne(text: string): Promise<number[]> {
    const raw = await postJson(
      `${this.options.baseUrl}/api/embeddings`,
      {
        model: this.options.embeddingModel,
        prompt: text,
      },
      { label: "Ollama embeddings", timeoutMs: this.options.embeddingTimeoutMs },
    );

    return embeddingsResponseSchema.parse(raw).embedding;
  }
}
