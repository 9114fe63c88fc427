import type { RetryPolicy } from "../config/env.js";
import { GenerationServiceError, describeError } from "../domain/errors.js";
import type { Chunk, Reference } from "../domain/types.js";
import type { AiClient, ChatMessage } from "../infra/ai/types.js";
import { withRetry } from "../utils/retry.js";
import { collapseWhitespace, truncate } from "../utils/text.js";

export const NO_CONTEXT_ANSWER =
  "I couldn't find any relevant information in the documents to answer your question.";

export const FALLBACK_ANSWER =
  "Sorry, I couldn't generate an answer right now. Please try again in a moment.";

const PREVIEW_CHARS = 200;

const NOT_FOUND_PATTERN =
  /\b(?:could|can|did|do|was)(?:n['\u2019]t| ?not)\s+(?:find|locate)\b|\bunable to (?:find|locate)\b|\bno relevant information\b/i;

export interface SynthesizedAnswer {
  answer: string;
  references: Reference[];
  /** False when the fallback answer was returned instead of model output. */
  generated: boolean;
}

export interface AnswerSynthesizerOptions {
  retry: RetryPolicy;
}

export class AnswerSynthesizer {
  constructor(
    private readonly aiClient: AiClient,
    private readonly options: AnswerSynthesizerOptions,
  ) {}

  async answer(question: string, chunks: Chunk[]): Promise<SynthesizedAnswer> {
    if (chunks.length === 0) {
      return { answer: NO_CONTEXT_ANSWER, references: [], generated: false };
    }

    let answer: string;
    try {
      const raw = await withRetry(
        () => this.aiClient.generateAnswer(buildAnswerPrompt(question, chunks)),
        this.options.retry,
      );
      answer = normalizeModelOutput(raw);
      if (!answer) {
        throw new GenerationServiceError("Model output was empty after normalisation.", false);
      }
    } catch (error) {
      console.error(`Answer generation failed: ${describeError(error)}`);
      return { answer: FALLBACK_ANSWER, references: [], generated: false };
    }

    return { answer, references: resolveReferences(answer, chunks), generated: true };
  }
}

/**
 * References for a generated answer: the cited chunks, or every retrieved
 * chunk when nothing resolvable is cited. An answer saying the documents do
 * not contain the answer gets none.
 */
export function resolveReferences(answer: string, chunks: Chunk[]): Reference[] {
  const cited = extractCitedReferences(answer, chunks);
  if (cited.length > 0) {
    return cited;
  }
  return NOT_FOUND_PATTERN.test(answer) ? [] : referencesFromChunks(chunks);
}

export function buildAnswerPrompt(question: string, chunks: Chunk[]): ChatMessage[] {
  const contextBlock = chunks
    .map((chunk, idx) => `[${idx + 1}] ${describeSource(chunk)}\n${chunk.text}`)
    .join("\n\n---\n\n");

  return [
    {
      role: "system",
      content: [
        "You are a helpful assistant that answers questions using only the provided context.",
        "Cite the context blocks you used by their number in square brackets, like [1] or [2, 3].",
        "Format the answer with simple HTML tags (<p>, <b>, <ul>, <li>, <br>) and do not include <html>, <head> or <body> tags.",
        "If the context does not contain the answer, say that you could not find it in the documents.",
      ].join(" "),
    },
    {
      role: "user",
      content: `Context:\n${contextBlock}\n\nQuestion: ${question}`,
    },
  ];
}

/**
 * Removes wrappers models put around otherwise renderable output: a single
 * enclosing code fence, and document-level HTML tags.
 */
export function normalizeModelOutput(raw: string): string {
  let text = raw.trim();

  const fenced = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/.exec(text);
  if (fenced && !/^\s*```/m.test(fenced[1])) {
    text = fenced[1].trim();
  }

  return text
    .replace(/<!doctype[^>]*>/gi, "")
    .replace(/<head\b[^>]*>[\s\S]*?<\/head>/gi, "")
    .replace(/<\/?(?:html|body)\b[^>]*>/gi, "")
    .trim();
}

/**
 * Collects the references cited in `answer`, in order of first citation and
 * unique by (filename, page). Understands `[1]`, `[1, 3]` and
 * `[Source: name]` / `[Source: name, page 2]`. Citations that do not resolve
 * to one of `chunks` are dropped.
 */
export function extractCitedReferences(answer: string, chunks: Chunk[]): Reference[] {
  const references: Reference[] = [];
  const seen = new Set<string>();

  const add = (chunk: Chunk | undefined) => {
    if (!chunk) {
      return;
    }
    const key = referenceKey(chunk.filename, chunk.page);
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    references.push(toReference(chunk));
  };

  for (const match of answer.matchAll(/\[([^[\]\n]{1,200})\]/g)) {
    const body = match[1].trim();

    if (/^\d+(?:\s*,\s*\d+)*$/.test(body)) {
      for (const part of body.split(",")) {
        const position = Number(part.trim());
        add(position >= 1 ? chunks[position - 1] : undefined);
      }
      continue;
    }

    const named = /^source\s*:\s*(.+?)(?:\s*,\s*(?:page|p\.?)\s*(\d+))?$/i.exec(body);
    if (named) {
      const filename = named[1].trim();
      const page = named[2] === undefined ? null : Number(named[2]);
      add(
        chunks.find(
          (chunk) => chunk.filename === filename && (page === null || chunk.page === page),
        ),
      );
    }
  }

  return references;
}

export function referencesFromChunks(chunks: Chunk[]): Reference[] {
  const seen = new Set<string>();
  const references: Reference[] = [];
  for (const chunk of chunks) {
    const key = referenceKey(chunk.filename, chunk.page);
    if (!seen.has(key)) {
      seen.add(key);
      references.push(toReference(chunk));
    }
  }
  return references;
}

export function toReference(chunk: Chunk): Reference {
  const source = `/documents/${encodeURIComponent(chunk.filename)}`;
  const reference: Reference = {
    filename: chunk.filename,
    source: chunk.page === null ? source : `${source}#page=${chunk.page}`,
    preview: truncate(collapseWhitespace(chunk.text), PREVIEW_CHARS),
  };
  if (chunk.page !== null) {
    reference.page = chunk.page;
  }
  return reference;
}

function describeSource(chunk: Chunk): string {
  return chunk.page === null
    ? `source=${chunk.filename}`
    : `source=${chunk.filename} page=${chunk.page}`;
}

function referenceKey(filename: string, page: number | null): string {
  return `${filename}\u0000${page ?? ""}`;
}
