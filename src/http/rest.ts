import type { IncomingMessage, ServerResponse } from 'node:http';
import { TRPCError } from '@trpc/server';
import { getHTTPStatusCodeFromError } from '@trpc/server/http';
import { ZodError } from 'zod/v4';
import { createCaller } from '../trpc/router.js';
import { resolveUser } from '../trpc/context.js';
import { createRoomInput, roomRefInput } from '../trpc/routers/rooms.js';
import { pageInput } from '../trpc/routers/pagination.js';
import {
  editMessageInput,
  listMessagesInput,
  messageRefInput,
  reactionInput,
  sendMessageInput,
} from '../trpc/routers/messages.js';
import { markReadInput } from '../trpc/routers/read-state.js';
import { updateProfileInput } from '../trpc/routers/auth.js';
import { channelTopicsInput } from '../trpc/routers/channels.js';
import { listUsersInput } from '../trpc/routers/users.js';
import type { AuthUser } from '../middleware/auth.js';
import type { AppServices } from '../services/container.js';
import { chatCodeOf } from '../utils/errors.js';
import { readBody, PayloadTooLargeError } from './multipart.js';

const MAX_JSON_BODY_BYTES = 1024 * 1024;

type Caller = ReturnType<typeof createCaller>;
type Method = 'GET' | 'POST' | 'PATCH' | 'DELETE';

interface RestRoute {
  method: Method;
  pattern: RegExp;
  params: string[];
  status?: number;
  handle(caller: Caller, input: Record<string, unknown>): Promise<unknown>;
}

export interface RestRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  body: unknown;
}

export interface RestResponse {
  status: number;
  body: unknown;
}

// REST facade over the tRPC procedures; inputs are validated with the same schemas
const routes: RestRoute[] = [
  {
    method: 'POST',
    pattern: /^\/rooms$/,
    params: [],
    status: 201,
    handle: (caller, input) => caller.rooms.create(createRoomInput.parse(input)),
  },
  {
    method: 'GET',
    pattern: /^\/rooms$/,
    params: [],
    handle: (caller, input) => caller.rooms.list(pageInput.parse(input)),
  },
  {
    method: 'GET',
    pattern: /^\/rooms\/([^/]+)$/,
    params: ['room_id'],
    handle: (caller, input) => caller.rooms.get(roomRefInput.parse(input)),
  },
  {
    method: 'DELETE',
    pattern: /^\/rooms\/([^/]+)$/,
    params: ['room_id'],
    handle: (caller, input) => caller.rooms.delete(roomRefInput.parse(input)),
  },
  {
    method: 'GET',
    pattern: /^\/rooms\/([^/]+)\/messages$/,
    params: ['room_id'],
    handle: (caller, input) => caller.messages.list(listMessagesInput.parse(input)),
  },
  {
    method: 'POST',
    pattern: /^\/rooms\/([^/]+)\/read$/,
    params: ['room_id'],
    handle: (caller, input) => caller.readState.markRead(markReadInput.parse(input)),
  },
  {
    method: 'POST',
    pattern: /^\/messages$/,
    params: [],
    status: 201,
    handle: (caller, input) => caller.messages.send(sendMessageInput.parse(input)),
  },
  {
    method: 'PATCH',
    pattern: /^\/messages\/([^/]+)$/,
    params: ['message_id'],
    handle: (caller, input) => caller.messages.update(editMessageInput.parse(input)),
  },
  {
    method: 'DELETE',
    pattern: /^\/messages\/([^/]+)$/,
    params: ['message_id'],
    handle: (caller, input) => caller.messages.delete(messageRefInput.parse(input)),
  },
  {
    method: 'POST',
    pattern: /^\/messages\/([^/]+)\/reactions$/,
    params: ['message_id'],
    status: 201,
    handle: (caller, input) => caller.messages.react(reactionInput.parse(input)),
  },
  {
    method: 'DELETE',
    pattern: /^\/messages\/([^/]+)\/reactions\/([^/]+)$/,
    params: ['message_id', 'emoji'],
    handle: (caller, input) => caller.messages.unreact(reactionInput.parse(input)),
  },
  {
    method: 'PATCH',
    pattern: /^\/me$/,
    params: [],
    handle: (caller, input) => caller.auth.updateProfile(updateProfileInput.parse(input)),
  },
  {
    method: 'GET',
    pattern: /^\/users$/,
    params: [],
    handle: (caller, input) => caller.users.list(listUsersInput.parse(input)),
  },
  {
    method: 'GET',
    pattern: /^\/channels\/([^/]+)\/topics$/,
    params: ['channel_id'],
    handle: (caller, input) => caller.channels.topics(channelTopicsInput.parse(input)),
  },
];

function errorBody(code: string, message: string, chatCode: number | null) {
  return { error: { code, message, chat_code: chatCode } };
}

function toRestError(err: unknown): RestResponse {
  if (err instanceof ZodError) {
    const message = err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
    return { status: 400, body: errorBody('BAD_REQUEST', message, null) };
  }
  if (err instanceof TRPCError) {
    return { status: getHTTPStatusCodeFromError(err), body: errorBody(err.code, err.message, chatCodeOf(err)) };
  }
  console.error('[rest] unhandled error:', err);
  return { status: 500, body: errorBody('INTERNAL_SERVER_ERROR', 'Internal server error', null) };
}

function bodyRecord(body: unknown): Record<string, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

function queryRecord(query: URLSearchParams): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const key of ['page', 'page_size']) {
    const value = query.get(key);
    if (value !== null) out[key] = Number(value);
  }
  const search = query.get('search');
  if (search !== null) out.search = search;
  const includeBots = query.get('include_bots');
  if (includeBots !== null) out.include_bots = includeBots === 'true' || includeBots === '1';
  return out;
}

/**
 * Route a REST request onto the matching procedure. Returns null when no
 * route matches the path.
 */
export async function dispatchRest(
  services: AppServices,
  user: AuthUser | null,
  req: RestRequest,
): Promise<RestResponse | null> {
  const pathname = req.pathname.replace(/\/+$/, '') || '/';
  const matching = routes.filter((r) => r.pattern.test(pathname));
  if (matching.length === 0) return null;

  const route = matching.find((r) => r.method === req.method);
  if (!route) {
    return { status: 405, body: errorBody('METHOD_NOT_SUPPORTED', `${req.method} not allowed on ${pathname}`, null) };
  }
  if (!user) {
    return { status: 401, body: errorBody('UNAUTHORIZED', 'Authentication required', null) };
  }

  const match = route.pattern.exec(pathname);
  const params: Record<string, string> = {};
  try {
    route.params.forEach((name, i) => {
      params[name] = decodeURIComponent(match?.[i + 1] ?? '');
    });
  } catch (err) {
    if (err instanceof URIError) {
      return { status: 400, body: errorBody('BAD_REQUEST', 'Malformed path parameter', null) };
    }
    throw err;
  }

  const input = { ...bodyRecord(req.body), ...queryRecord(req.query), ...params };
  try {
    const result = await route.handle(createCaller({ user, services }), input);
    return { status: route.status ?? 200, body: result };
  } catch (err) {
    return toRestError(err);
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/** Node adapter for `dispatchRest`. Returns false when the path is not a REST route. */
export async function handleRest(services: AppServices, req: IncomingMessage, res: ServerResponse, url: URL) {
  let body: unknown = undefined;
  if (req.method === 'POST' || req.method === 'PATCH') {
    try {
      const raw = await readBody(req, MAX_JSON_BODY_BYTES);
      body = raw.length > 0 ? JSON.parse(raw.toString('utf8')) : undefined;
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        sendJson(res, 413, errorBody('PAYLOAD_TOO_LARGE', err.message, null));
        return true;
      }
      if (err instanceof SyntaxError) {
        sendJson(res, 400, errorBody('PARSE_ERROR', 'Request body is not valid JSON', null));
        return true;
      }
      throw err;
    }
  }

  const user = await resolveUser(services, req);
  const result = await dispatchRest(services, user, {
    method: req.method ?? 'GET',
    pathname: url.pathname,
    query: url.searchParams,
    body,
  });
  if (!result) return false;
  sendJson(res, result.status, result.body);
  return true;
}
