import type { IncomingMessage, ServerResponse } from 'node:http';
import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { IFileStorage } from '../services/file-storage.js';

const CONTENT_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.pdf': 'application/pdf',
  '.txt': 'text/plain; charset=utf-8',
  '.json': 'application/json',
  '.mp4': 'video/mp4',
  '.mp3': 'audio/mpeg',
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

function notFound(res: ServerResponse) {
  res.writeHead(404, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ error: 'Not found' }));
}

/** GET /files/{key}: stream a file written by the local storage. */
export async function handleFileServe(storage: IFileStorage, req: IncomingMessage, res: ServerResponse) {
  try {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    let key: string;
    try {
      key = decodeURIComponent(url.pathname.slice('/files/'.length));
    } catch {
      notFound(res);
      return;
    }
    if (!key) {
      notFound(res);
      return;
    }

    const filePath = await storage.resolve(key);
    if (!filePath) {
      notFound(res);
      return;
    }

    const stat = await fs.promises.stat(filePath);
    const filename = path.basename(filePath);
    res.writeHead(200, {
      'Content-Type': contentTypeFor(filename),
      'Content-Length': stat.size.toString(),
      'Content-Disposition': `inline; filename="${filename}"`,
      'Cache-Control': 'public, max-age=86400',
    });
    if (req.method === 'HEAD') {
      res.end();
      return;
    }
    await pipeline(fs.createReadStream(filePath), res);
  } catch (err) {
    console.error('[files] serve error:', err);
    if (!res.headersSent) {
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Server error' }));
    } else {
      res.destroy();
    }
  }
}
