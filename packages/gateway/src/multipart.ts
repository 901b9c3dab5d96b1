/**
 * multipart/form-data parsing for the upload route, plus the request body
 * reader and download header helpers the server shares.
 *
 * The whole body is buffered before parsing; uploads are capped by the
 * relay's size limit.
 */

import type { IncomingMessage } from 'node:http';
import { PayloadTooLargeError } from '@codedrop/core';

export interface MultipartFile {
  field: string;
  filename: string;
  contentType?: string;
  data: Buffer;
}

export interface MultipartForm {
  fields: Map<string, string>;
  files: MultipartFile[];
}

/** Extract the boundary from a multipart/form-data Content-Type header. */
export function boundaryFrom(contentType: string | undefined): string | null {
  if (!contentType || !/^multipart\/form-data\b/i.test(contentType)) return null;
  const match = contentType.match(/;\s*boundary=(?:"([^"]+)"|([^;\s]+))/i);
  return match?.[1] ?? match?.[2] ?? null;
}

export function parseMultipart(body: Buffer, boundary: string): MultipartForm {
  const delimiter = Buffer.from(`--${boundary}`);
  const nextDelimiter = Buffer.from(`\r\n--${boundary}`);
  const fields = new Map<string, string>();
  const files: MultipartFile[] = [];

  let start = body.indexOf(delimiter);
  while (start !== -1) {
    const afterDelimiter = start + delimiter.length;
    // "--" after the delimiter closes the body.
    if (body[afterDelimiter] === 0x2d && body[afterDelimiter + 1] === 0x2d) break;

    const headersEnd = body.indexOf('\r\n\r\n', afterDelimiter);
    if (headersEnd === -1) break;
    const dataStart = headersEnd + 4;
    const dataEnd = body.indexOf(nextDelimiter, dataStart);
    if (dataEnd === -1) break;

    const headers = body.subarray(afterDelimiter, headersEnd).toString('utf-8');
    const data = body.subarray(dataStart, dataEnd);
    const name = headers.match(/;\s*name="([^"]*)"/i)?.[1];
    const rawFilename = headers.match(/;\s*filename="([^"]*)"/i)?.[1];
    const filename = rawFilename === undefined ? undefined : unescapeQuoted(rawFilename);

    if (name !== undefined) {
      if (filename !== undefined) {
        const contentType = headers.match(/content-type:\s*([^\r\n]+)/i)?.[1]?.trim();
        files.push({ field: name, filename, contentType, data: Buffer.from(data) });
      } else {
        fields.set(name, data.toString('utf-8'));
      }
    }

    start = dataEnd + 2;
  }

  return { fields, files };
}

/**
 * Undo the escapes the WHATWG form encoder applies inside quoted
 * parameters: `"` as %22, CR as %0D and LF as %0A. Other percent
 * sequences are left as sent.
 */
function unescapeQuoted(value: string): string {
  return value.replace(/%22/g, '"').replace(/%0D/gi, '\r').replace(/%0A/gi, '\n');
}

export interface BodyLimit {
  /** Limit reported to the client. */
  maxBytes: number;
  /** Extra bytes tolerated on top of `maxBytes` for framing. */
  overheadBytes?: number;
}

/**
 * Buffer a request body. Past the limit the rest of the body is drained
 * and discarded, then the promise rejects with PayloadTooLargeError.
 */
export function readBody(req: IncomingMessage, limit?: BodyLimit): Promise<Buffer> {
  const ceiling = limit ? limit.maxBytes + (limit.overheadBytes ?? 0) : Infinity;

  return new Promise<Buffer>((resolve, reject) => {
    let chunks: Buffer[] = [];
    let received = 0;
    req.on('data', (chunk: Buffer) => {
      received += chunk.length;
      if (received > ceiling) {
        chunks = [];
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (limit && received > ceiling) {
        reject(new PayloadTooLargeError(limit.maxBytes, { receivedBytes: received }));
        return;
      }
      resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

/** `Content-Disposition` for an attachment, with an RFC 5987 UTF-8 name. */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}
