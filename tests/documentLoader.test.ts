import { describe, expect, it } from "vitest";
import { CorruptDocumentError, UnsupportedFormatError } from "../src/domain/errors.js";
import {
  DocumentLoader,
  getSupportedDocumentExtensions,
  isSupportedDocumentExtension,
  resolveDocumentKind,
} from "../src/infra/parsers/documentLoader.js";
import { fakePdf, fakePdfExtractor } from "./helpers/fakes.js";

const loader = new DocumentLoader({
  chunkSize: 100,
  chunkOverlap: 10,
  extractPdfPages: fakePdfExtractor,
});

describe("documentLoader", () => {
  it("recognises text and pdf extensions case-insensitively", () => {
    expect(getSupportedDocumentExtensions()).toEqual([".md", ".txt", ".pdf"]);
    expect(isSupportedDocumentExtension("manual.PDF")).toBe(true);
    expect(isSupportedDocumentExtension("sheet.xlsx")).toBe(false);
    expect(resolveDocumentKind("notes.MD")).toBe("text");
    expect(resolveDocumentKind("policy.pdf")).toBe("pdf");
  });

  it("rejects unsupported extensions", () => {
    expect(() => resolveDocumentKind("sheet.xlsx")).toThrow(UnsupportedFormatError);
    expect(() => resolveDocumentKind("README")).toThrow("Unsupported file type: (none)");
  });

  it("loads text documents without page numbers", async () => {
    const chunks = [
      ...(await loader.load({
        filename: "notes.txt",
        kind: "text",
        content: Buffer.from("line 1\r\nline 2", "utf-8"),
      })),
    ];

    expect(chunks).toEqual([
      { filename: "notes.txt", page: null, sequenceIndex: 0, text: "line 1\nline 2" },
    ]);
  });

  it("tags pdf chunks with their page and numbers them across pages", async () => {
    const chunks = [
      ...(await loader.load({
        filename: "policy.pdf",
        kind: "pdf",
        content: fakePdf("Refunds are accepted.", "   ", "Shipping takes a week."),
      })),
    ];

    expect(chunks).toEqual([
      { filename: "policy.pdf", page: 1, sequenceIndex: 0, text: "Refunds are accepted." },
      { filename: "policy.pdf", page: 3, sequenceIndex: 1, text: "Shipping takes a week." },
    ]);
  });

  it("restarts the chunk sequence on each iteration", async () => {
    const chunks = await loader.load({
      filename: "long.md",
      kind: "text",
      content: Buffer.from("word ".repeat(60), "utf-8"),
    });

    const first = [...chunks];
    const second = [...chunks];
    expect(first.length).toBeGreaterThan(1);
    expect(second).toEqual(first);
  });

  it("reports invalid UTF-8 as a corrupt document", async () => {
    await expect(
      loader.load({ filename: "bad.txt", kind: "text", content: Buffer.from([0xff, 0xfe, 0xfd]) }),
    ).rejects.toThrow(CorruptDocumentError);
  });

  it("reports extraction failures as a corrupt document", async () => {
    await expect(
      loader.load({ filename: "broken.pdf", kind: "pdf", content: Buffer.from("BROKEN") }),
    ).rejects.toThrow("Could not read broken.pdf: PDF text extraction failed (bad xref table)");
  });

  it("rejects a pdf without any text", async () => {
    await expect(
      loader.load({ filename: "scan.pdf", kind: "pdf", content: fakePdf("", " \n ") }),
    ).rejects.toThrow("Could not read scan.pdf: PDF contains no extractable text");
  });
});
