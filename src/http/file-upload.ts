import type { IncomingMessage, ServerResponse } from 'node:http';
import { TRPCError } from '@trpc/server';
import { bearerToken, verifyToken } from '../middleware/auth.js';
import type { AppServices } from '../services/container.js';
import { ExternalServiceError } from '../utils/errors.js';
import { multipartBoundary, parseMultipartBody, PayloadTooLargeError, readBody } from './multipart.js';

// Headroom for the multipart framing around the file part
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * POST /upload: store one file and hand back the attachment descriptor the
 * client passes to `messages.send`.
 */
export async function handleFileUpload(
  services: AppServices,
  req: IncomingMessage,
  res: ServerResponse,
  maxUploadBytes: number,
) {
  try {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      sendJson(res, 401, { error: 'Unauthorized' });
      return;
    }
    await verifyToken(services.store, token);

    const boundary = multipartBoundary(req.headers['content-type']);
    if (!boundary) {
      sendJson(res, 400, { error: 'Expected multipart/form-data' });
      return;
    }

    const body = await readBody(req, maxUploadBytes + MULTIPART_OVERHEAD_BYTES);
    const { file } = parseMultipartBody(body, boundary);
    if (!file) {
      sendJson(res, 400, { error: 'No file provided' });
      return;
    }
    if (file.data.length > maxUploadBytes) {
      sendJson(res, 413, { error: 'File too large' });
      return;
    }

    const stored = await services.fileStorage.upload(file.data, file.filename, file.contentType);
    sendJson(res, 201, {
      url: stored.url,
      filename: file.filename,
      size_bytes: stored.size,
      mime_type: stored.mimeType,
    });
  } catch (err) {
    if (err instanceof TRPCError && err.code === 'UNAUTHORIZED') {
      sendJson(res, 401, { error: 'Unauthorized' });
      return;
    }
    if (err instanceof PayloadTooLargeError) {
      sendJson(res, 413, { error: 'File too large' });
      return;
    }
    if (err instanceof ExternalServiceError) {
      console.error(`[upload] ${err.service} failure:`, err.message, err.cause ?? '');
      sendJson(res, 502, { error: 'Storage unavailable' });
      return;
    }
    console.error('[upload] error:', err);
    sendJson(res, 500, { error: 'Upload failed' });
  }
}
