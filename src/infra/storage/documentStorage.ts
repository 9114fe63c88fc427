import { type Dirent, promises as fs } from "node:fs";
import path from "node:path";
import { NotFoundError } from "../../domain/errors.js";
import type { DocumentListing, StoredDocument } from "../../domain/types.js";
import { resolveDocumentKind } from "../parsers/documentLoader.js";

const TEMP_SUFFIX = ".uploading";

/**
 * Flat directory of uploaded documents. Filenames passed in are expected to be
 * sanitised already; anything that would resolve outside the directory is
 * treated as absent.
 */
export class DocumentStorage {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  async list(): Promise<DocumentListing[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    } catch (error) {
      if (isFileMissing(error)) {
        return [];
      }
      throw error;
    }

    const listings: DocumentListing[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || entry.name.startsWith(".") || entry.name.endsWith(TEMP_SUFFIX)) {
        continue;
      }
      const stat = await fs.stat(path.join(this.rootDir, entry.name));
      listings.push({ filename: entry.name, size: stat.size });
    }

    return listings.sort((a, b) => a.filename.localeCompare(b.filename));
  }

  async exists(filename: string): Promise<boolean> {
    const target = this.resolve(filename);
    if (!target) {
      return false;
    }
    try {
      const stat = await fs.stat(target);
      return stat.isFile();
    } catch (error) {
      if (isFileMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async read(filename: string): Promise<Buffer> {
    const target = this.resolve(filename);
    if (!target) {
      throw new NotFoundError(filename);
    }
    try {
      return await fs.readFile(target);
    } catch (error) {
      if (isFileMissing(error)) {
        throw new NotFoundError(filename);
      }
      throw error;
    }
  }

  async load(filename: string): Promise<StoredDocument> {
    const content = await this.read(filename);
    return { filename, kind: resolveDocumentKind(filename), content };
  }

  /** Writes through a temp file and rename so readers never see a partial file. */
  async write(filename: string, content: Buffer): Promise<void> {
    const target = this.resolve(filename);
    if (!target) {
      throw new Error(`Refusing to write outside the documents directory: ${filename}`);
    }
    await this.initialize();
    const tempPath = `${target}${TEMP_SUFFIX}`;
    await fs.writeFile(tempPath, content);
    try {
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async remove(filename: string): Promise<void> {
    const target = this.resolve(filename);
    if (!target) {
      throw new NotFoundError(filename);
    }
    try {
      await fs.unlink(target);
    } catch (error) {
      if (isFileMissing(error)) {
        throw new NotFoundError(filename);
      }
      throw error;
    }
  }

  private resolve(filename: string): string | null {
    const target = path.resolve(this.rootDir, filename);
    if (path.dirname(target) !== this.rootDir) {
      return null;
    }
    return target;
  }
}

function isFileMissing(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return "code" in error && error.code === "ENOENT";
}
