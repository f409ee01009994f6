import type { IncomingHttpHeaders } from "http";
import type { Readable } from "stream";
import busboy from "busboy";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { HttpError, toError } from "../utils/errors";
import type { UploadedFile } from "../utils/multipartReformer";

export function isMultipart(req: Request): boolean {
  return (req.headers["content-type"] ?? "")
    .toLowerCase()
    .startsWith("multipart/form-data");
}

function tooLarge(limit: number): HttpError {
  return new HttpError(413, `Request body exceeds the ${limit} byte limit`);
}

// Fails fast on a declared length; chunked bodies are metered in readMultipart.
export function rejectOversizedBody(uploadMaxSize: number): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > uploadMaxSize) {
      next(tooLarge(uploadMaxSize));
      return;
    }
    next();
  };
}

export type MultipartSource = Readable & { headers: IncomingHttpHeaders };

export interface ParsedMultipart {
  // Text fields with their wire names, in arrival order.
  fields: Array<[string, string]>;
  files: UploadedFile[];
}

/**
 * Reads a whole multipart body into memory. Field names are kept exactly as
 * sent (`tags[]`, `list[0]`), and repeated names stay repeated.
 *
 * Every byte read from `source` counts against `maxBytes`; past it the promise
 * rejects with a 413 and the rest of the body is drained unparsed. Malformed
 * bodies reject with a 400.
 */
export function readMultipart(
  source: MultipartSource,
  maxBytes: number
): Promise<ParsedMultipart> {
  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: source.headers,
        defParamCharset: "utf8",
        limits: { fieldNameSize: maxBytes, fieldSize: maxBytes },
      });
    } catch (err) {
      reject(new HttpError(400, toError(err).message));
      return;
    }

    const fields: Array<[string, string]> = [];
    const files: UploadedFile[] = [];
    let received = 0;
    let settled = false;

    function abort(error: Error) {
      if (settled) return;
      settled = true;
      source.off("data", countBytes);
      source.unpipe(parser);
      // Keep reading so the client finishes sending and gets the response.
      source.resume();
      reject(error);
    }

    function countBytes(chunk: Buffer) {
      received += chunk.length;
      if (received > maxBytes) abort(tooLarge(maxBytes));
    }

    parser.on("field", (name, value, info) => {
      if (info.nameTruncated || info.valueTruncated) {
        abort(tooLarge(maxBytes));
        return;
      }
      fields.push([name, value]);
    });

    parser.on("file", (fieldName, stream, info) => {
      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on("end", () => {
        files.push({
          fieldName,
          filename: info.filename,
          mimeType: info.mimeType,
          bytes: Buffer.concat(chunks),
        });
      });
    });

    parser.on("close", () => {
      if (settled) return;
      settled = true;
      resolve({ fields, files });
    });
    parser.on("error", (err) => abort(new HttpError(400, toError(err).message)));
    source.on("error", (err) => abort(toError(err)));

    source.on("data", countBytes);
    source.pipe(parser);
  });
}
