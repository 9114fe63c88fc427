import path from "node:path";
import { CorruptDocumentError, UnsupportedFormatError, describeError } from "../../domain/errors.js";
import type { Chunk, DocumentKind, StoredDocument } from "../../domain/types.js";
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  iterateChunks,
} from "../../pipelines/chunking.js";
import { normalizeLineEndings } from "../../utils/text.js";

const dynamicImport = new Function(
  "modulePath",
  "return import(modulePath)",
) as (modulePath: string) => Promise<unknown>;

const EXTENSION_KINDS: Record<string, DocumentKind> = {
  ".md": "text",
  ".txt": "text",
  ".pdf": "pdf",
};

export interface PageText {
  /** 1-based. */
  page: number;
  text: string;
}

export type PdfPageExtractor = (data: Buffer) => Promise<PageText[]>;

export interface DocumentLoaderOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  extractPdfPages?: PdfPageExtractor;
}

interface PdfParseV2Page {
  num?: number;
  text?: string;
}

interface PdfParseV2Result {
  text?: string;
  pages?: PdfParseV2Page[];
}

type PdfParseV2Ctor = new (input: { data: Buffer }) => {
  getText: () => Promise<PdfParseV2Result>;
  destroy?: () => Promise<void> | void;
};

export function isSupportedDocumentExtension(filename: string): boolean {
  return Object.hasOwn(EXTENSION_KINDS, path.extname(filename).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return Object.keys(EXTENSION_KINDS);
}

/**
 * Resolves the document kind from the filename, or throws
 * `UnsupportedFormatError`.
 */
export function resolveDocumentKind(filename: string): DocumentKind {
  const ext = path.extname(filename).toLowerCase();
  if (!Object.hasOwn(EXTENSION_KINDS, ext)) {
    throw new UnsupportedFormatError(ext, getSupportedDocumentExtensions());
  }
  return EXTENSION_KINDS[ext];
}

export class DocumentLoader {
  private readonly chunkSize: number;

  private readonly chunkOverlap: number;

  private readonly extractPdfPages: PdfPageExtractor;

  constructor(options: DocumentLoaderOptions = {}) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    this.extractPdfPages = options.extractPdfPages ?? extractPdfPagesWithLibrary;
  }

  /**
   * Extracts the document text up front and returns a chunk sequence that is
   * computed lazily; iterating it again starts over from the first chunk.
   */
  async load(document: StoredDocument): Promise<Iterable<Chunk>> {
    const pages = await this.extractPages(document);
    const { chunkSize, chunkOverlap } = this;
    const filename = document.filename;

    return {
      *[Symbol.iterator]() {
        let sequenceIndex = 0;
        for (const page of pages) {
          for (const piece of iterateChunks(page.text, chunkSize, chunkOverlap)) {
            yield {
              filename,
              page: page.page,
              sequenceIndex,
              text: piece.text,
            };
            sequenceIndex += 1;
          }
        }
      },
    };
  }

  private async extractPages(
    document: StoredDocument,
  ): Promise<Array<{ page: number | null; text: string }>> {
    if (document.kind === "text") {
      return [{ page: null, text: decodeUtf8(document.filename, document.content) }];
    }

    let pages: PageText[];
    try {
      pages = await this.extractPdfPages(document.content);
    } catch (error) {
      throw new CorruptDocumentError(
        document.filename,
        `PDF text extraction failed (${describeError(error)})`,
        { cause: error },
      );
    }

    const withText = pages
      .map((page) => ({ page: page.page, text: normalizeLineEndings(page.text) }))
      .filter((page) => page.text.trim().length > 0);
    if (withText.length === 0) {
      throw new CorruptDocumentError(document.filename, "PDF contains no extractable text");
    }
    return withText;
  }
}

function decodeUtf8(filename: string, content: Buffer): string {
  try {
    const decoded = new TextDecoder("utf-8", { fatal: true }).decode(content);
    return normalizeLineEndings(decoded);
  } catch (error) {
    throw new CorruptDocumentError(filename, "content is not valid UTF-8 text", {
      cause: error,
    });
  }
}

async function extractPdfPagesWithLibrary(data: Buffer): Promise<PageText[]> {
  const mod = await dynamicImport("pdf-parse");
  const ctor = resolvePdfParseV2Ctor(mod);
  if (!ctor) {
    throw new Error("Installed pdf-parse does not expose the PDFParse class.");
  }

  const parser = new ctor({ data });
  try {
    const parsed = await parser.getText();
    if (parsed.pages && parsed.pages.length > 0) {
      return parsed.pages.map((page, index) => ({
        page: page.num ?? index + 1,
        text: page.text ?? "",
      }));
    }
    return [{ page: 1, text: parsed.text ?? "" }];
  } finally {
    if (typeof parser.destroy === "function") {
      await parser.destroy();
    }
  }
}

function resolvePdfParseV2Ctor(mod: unknown): PdfParseV2Ctor | null {
  if (!mod || typeof mod !== "object") {
    return null;
  }

  const named = "PDFParse" in mod ? mod.PDFParse : undefined;
  if (typeof named === "function") {
    return named as PdfParseV2Ctor;
  }

  return null;
}
