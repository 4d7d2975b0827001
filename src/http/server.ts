import http from 'node:http';
import { createHTTPHandler } from '@trpc/server/adapters/standalone';
import type { Config } from '../config/index.js';
import type { AppServices } from '../services/container.js';
import { appRouter } from '../trpc/router.js';
import { contextFactory } from '../trpc/context.js';
import { handleFileUpload } from './file-upload.js';
import { handleFileServe } from './file-serve.js';
import { handleRest } from './rest.js';
import { setupMainWebSocket } from '../ws/main-ws.js';

export function createServer(services: AppServices, cfg: Pick<Config, 'MAX_UPLOAD_SIZE_BYTES' | 'HEARTBEAT_TIMEOUT_MS'>) {
  const trpcHandler = createHTTPHandler({
    router: appRouter,
    createContext: contextFactory(services),
    basePath: '/trpc/',
    onError({ error, path }) {
      console.error(`[trpc] ${path}:`, error.message, error.cause ?? '');
    },
  });

  const server = http.createServer(async (req, res) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, HEAD, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    try {
      if (url.pathname === '/health') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ status: 'ok' }));
        return;
      }

      if (url.pathname === '/upload' && req.method === 'POST') {
        await handleFileUpload(services, req, res, cfg.MAX_UPLOAD_SIZE_BYTES);
        return;
      }

      if (url.pathname.startsWith('/files/') && (req.method === 'GET' || req.method === 'HEAD')) {
        await handleFileServe(services.fileStorage, req, res);
        return;
      }

      if (url.pathname.startsWith('/trpc/')) {
        trpcHandler(req, res);
        return;
      }

      if (await handleRest(services, req, res, url)) return;

      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (err) {
      console.error(`[http] ${req.method} ${url.pathname} failed:`, err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Internal server error' }));
      }
    }
  });

  const mainWs = setupMainWebSocket(services, cfg.HEARTBEAT_TIMEOUT_MS);

  server.on('upgrade', (req, socket, head) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (url.pathname !== '/ws') {
      socket.destroy();
      return;
    }
    mainWs.handleUpgrade(req, socket, head).catch((err: unknown) => {
      console.error('[ws] upgrade failed:', err);
      if (socket.writable) socket.write('HTTP/1.1 500 Internal Server Error\r\nContent-Length: 0\r\n\r\n');
      socket.destroy();
    });
  });

  server.on('close', () => {
    mainWs.wss.close();
  });

  return server;
}
