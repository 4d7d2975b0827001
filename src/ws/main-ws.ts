import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type WebSocket } from 'ws';
import { TRPCError } from '@trpc/server';
import { WsCloseCode } from '../shared/events.js';
import type { AppServices } from '../services/container.js';
import { bearerToken, type AuthUser } from '../middleware/auth.js';
import { wsMessageSchema, roomRefSchema, sendMessageSchema, typingSchema, markAsReadSchema } from './schemas.js';

/**
 * Handle one client frame for an attached session. Bad payloads are answered
 * with an `error` event; unparsable JSON closes the socket.
 */
export async function handleClientFrame(services: AppServices, sessionId: string, raw: string): Promise<void> {
  const { dispatcher, presence } = services;
  const session = dispatcher.getSession(sessionId);
  if (!session) return;

  let frame: unknown;
  try {
    frame = JSON.parse(raw);
  } catch {
    session.ws.close(WsCloseCode.INVALID_PAYLOAD, 'Invalid JSON');
    return;
  }

  const parsed = wsMessageSchema.safeParse(frame);
  if (!parsed.success) {
    dispatcher.dispatchToSession(sessionId, 'error', { message: 'Invalid message envelope' });
    return;
  }
  const msg = parsed.data;
  const invalid = () => dispatcher.dispatchToSession(sessionId, 'error', { message: 'Invalid payload', event: msg.event });

  try {
    switch (msg.event) {
      case 'heartbeat': {
        presence.touch(sessionId);
        dispatcher.dispatchToSession(sessionId, 'heartbeat_ack', {});
        break;
      }

      case 'join_room': {
        const result = roomRefSchema.safeParse(msg.data);
        if (!result.success) return invalid();
        await presence.joinRoom(sessionId, result.data.room_id);
        break;
      }

      case 'leave_room': {
        const result = roomRefSchema.safeParse(msg.data);
        if (!result.success) return invalid();
        presence.leaveRoom(sessionId, result.data.room_id);
        break;
      }

      case 'send_message': {
        const result = sendMessageSchema.safeParse(msg.data);
        if (!result.success) return invalid();
        const { room_id, message_id } = result.data;
        const message = await services.messages.getMessage(message_id, session.userId);
        if (message.room_id !== room_id || message.sender.id !== session.userId) {
          dispatcher.dispatchToSession(sessionId, 'error', { message: 'Message not found in this room', event: msg.event });
          return;
        }
        dispatcher.dispatchToRoom(room_id, 'new_message', { room_id, message }, { excludeSessionId: sessionId });
        break;
      }

      case 'typing': {
        const result = typingSchema.safeParse(msg.data);
        if (!result.success) return invalid();
        const { room_id, is_typing } = result.data;
        if (!session.joinedRooms.has(room_id)) {
          dispatcher.dispatchToSession(sessionId, 'error', { message: 'Join the room first', event: msg.event });
          return;
        }
        if (is_typing && !services.typing.allowStart(session.userId, room_id)) return;
        dispatcher.dispatchToRoom(
          room_id,
          'user_typing',
          { room_id, user_id: session.userId, is_typing },
          { excludeUserId: session.userId },
        );
        break;
      }

      case 'mark_as_read': {
        const result = markAsReadSchema.safeParse(msg.data);
        if (!result.success) return invalid();
        await services.readState.markRead(result.data.room_id, session.userId, result.data.message_ids);
        break;
      }

      default: {
        dispatcher.dispatchToSession(sessionId, 'error', { message: `Unknown event: ${msg.event}`, event: msg.event });
      }
    }
  } catch (err) {
    if (err instanceof TRPCError) {
      dispatcher.dispatchToSession(sessionId, 'error', { message: err.message, event: msg.event });
      return;
    }
    console.error(`[ws] ${msg.event} handler error:`, err);
    dispatcher.dispatchToSession(sessionId, 'error', { message: 'Internal error', event: msg.event });
  }
}

function attachConnection(services: AppServices, ws: WebSocket, user: AuthUser, heartbeatTimeoutMs: number) {
  const { presence, dispatcher } = services;
  const ready = presence.register(user, ws);
  ready.catch((err: unknown) => {
    console.error('[ws] session setup failed:', err);
    ws.close(WsCloseCode.GOING_AWAY, 'Session setup failed');
  });

  // Frames from one socket are handled strictly in arrival order
  let queue: Promise<void> = Promise.resolve();
  ws.on('message', (raw) => {
    const text = raw.toString();
    queue = queue
      .then(() => ready)
      .then((sessionId) => handleClientFrame(services, sessionId, text))
      .catch((err: unknown) => {
        console.error('[ws] frame handling failed:', err);
      });
  });

  const heartbeatTimer = setInterval(() => {
    ready
      .then((sessionId) => {
        const session = dispatcher.getSession(sessionId);
        if (session && Date.now() - session.lastHeartbeat > heartbeatTimeoutMs) {
          ws.close(WsCloseCode.SESSION_TIMEOUT, 'Heartbeat timeout');
        }
      })
      .catch(() => clearInterval(heartbeatTimer));
  }, heartbeatTimeoutMs);

  ws.on('close', () => {
    clearInterval(heartbeatTimer);
    ready
      .then((sessionId) => presence.disconnect(sessionId))
      .then(() => {
        if (!presence.isOnline(user.id)) services.typing.forget(user.id);
      })
      .catch((err: unknown) => {
        console.error('[ws] disconnect cleanup failed:', err);
      });
  });

  ws.on('error', () => {
    ws.close();
  });
}

function rejectUpgrade(socket: Duplex, status: number, text: string) {
  socket.write(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

/** `/ws` endpoint. Clients authenticate during the upgrade with a bearer header or `?token=`. */
export function setupMainWebSocket(services: AppServices, heartbeatTimeoutMs: number) {
  const wss = new WebSocketServer({ noServer: true });

  async function handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const token = bearerToken(req.headers.authorization) ?? url.searchParams.get('token');
    if (!token) {
      rejectUpgrade(socket, 401, 'Unauthorized');
      return;
    }

    let user: AuthUser;
    try {
      user = await services.presence.authenticate(token);
    } catch (err) {
      if (err instanceof TRPCError && err.code === 'UNAUTHORIZED') {
        rejectUpgrade(socket, 401, 'Unauthorized');
        return;
      }
      throw err;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      attachConnection(services, ws, user, heartbeatTimeoutMs);
    });
  }

  return { wss, handleUpgrade };
}
