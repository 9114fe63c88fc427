import { z } from "zod";
import type { ChatMessage } from "./types.js";
import { postJson } from "./http.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  embeddingTimeoutMs: number;
  generationTimeoutMs: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export class OpenAiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const raw = await postJson(
      `${this.options.baseUrl}/embeddings`,
      {
        model: this.options.embeddingModel,
        input: texts,
      },
      {
        label: "OpenAI embeddings",
        timeoutMs: this.options.embeddingTimeoutMs,
        headers: this.authHeaders(),
      },
    );

    const data = embeddingResponseSchema.parse(raw);
    if (data.data.length !== texts.length) {
      throw new Error(
        `OpenAI embeddings returned ${data.data.length} vectors for ${texts.length} inputs.`,
      );
    }
    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async generateAnswer(messages: ChatMessage[]): Promise<string> {
    const raw = await postJson(
      `${this.options.baseUrl}/chat/completions`,
      {
        model: this.options.chatModel,
        temperature: 0.2,
        messages,
      },
      {
        label: "OpenAI chat",
        timeoutMs: this.options.generationTimeoutMs,
        headers: this.authHeaders(),
      },
    );

    const data = chatResponseSchema.parse(raw);
    return data.choices[0].message.content?.trim() ?? "";
  }

  private authHeaders(): Record<string, string> {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}
