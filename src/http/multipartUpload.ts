import type { IncomingMessage } from "node:http";
import busboy from "busboy";
import { InvalidRequestError, describeError } from "../domain/errors.js";

export interface UploadedFile {
  filename: string;
  content: Buffer;
}

export function isMultipartRequest(req: IncomingMessage): boolean {
  return (req.headers["content-type"] ?? "").toLowerCase().startsWith("multipart/form-data");
}

/**
 * Reads the file part of a `multipart/form-data` body, as sent by a browser
 * FormData upload. Only the first file is taken; plain fields are ignored.
 */
export function readMultipartFile(req: IncomingMessage, maxBytes: number): Promise<UploadedFile> {
  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: req.headers,
        defParamCharset: "utf8",
        limits: { files: 1, fileSize: maxBytes },
      });
    } catch (error) {
      reject(new InvalidRequestError(`Invalid multipart body: ${describeError(error)}`));
      return;
    }

    let file: UploadedFile | null = null;
    let tooLarge = false;

    parser.on("file", (_field, stream, info) => {
      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on("limit", () => {
        tooLarge = true;
      });
      stream.on("end", () => {
        file = { filename: info.filename, content: Buffer.concat(chunks) };
      });
    });

    parser.on("error", (error: unknown) => {
      reject(new InvalidRequestError(`Invalid multipart body: ${describeError(error)}`));
    });

    parser.on("close", () => {
      if (tooLarge) {
        reject(new InvalidRequestError("Uploaded file is too large."));
      } else if (!file) {
        reject(new InvalidRequestError("Multipart body has no file part."));
      } else {
        resolve(file);
      }
    });

    req.pipe(parser);
  });
}
