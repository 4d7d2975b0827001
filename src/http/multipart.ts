import type { IncomingMessage } from 'node:http';

export interface ParsedMultipart {
  fields: Record<string, string>;
  file?: { filename: string; contentType: string; data: Buffer };
}

export class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

/** Read the whole request body, rejecting once it grows past `maxBytes`. */
export function readBody(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > maxBytes) {
        tooLarge = true;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!tooLarge) resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

/** Split a multipart/form-data body into fields and the first file part. */
export function parseMultipartBody(body: Buffer, boundary: string): ParsedMultipart {
  const bodyStr = body.toString('latin1');
  const parts = bodyStr.split(`--${boundary}`).filter((p) => p && p !== '--\r\n' && p !== '--');

  const fields: Record<string, string> = {};
  let file: ParsedMultipart['file'];

  for (const part of parts) {
    const headerEnd = part.indexOf('\r\n\r\n');
    if (headerEnd === -1) continue;

    const headers = part.slice(0, headerEnd);
    const content = part.slice(headerEnd + 4, part.endsWith('\r\n') ? part.length - 2 : part.length);

    const filename = headers.match(/filename="([^"]+)"/)?.[1];
    const name = headers.match(/name="([^"]+)"/)?.[1];
    const contentType = headers.match(/Content-Type:\s*(.+)/i)?.[1]?.trim();

    if (filename !== undefined && !file) {
      file = {
        filename,
        contentType: contentType ?? 'application/octet-stream',
        data: Buffer.from(content, 'latin1'),
      };
    } else if (name !== undefined && filename === undefined) {
      fields[name] = content.trim();
    }
  }
  return { fields, file };
}

export function multipartBoundary(contentType: string | undefined): string | null {
  const match = contentType?.match(/boundary=(?:"([^"]+)"|([^;]+))/i);
  return match?.[1] ?? match?.[2]?.trim() ?? null;
}
