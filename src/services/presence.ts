import type { ChatStore } from './chat-store.js';
import type { IEventDispatcher, SocketLike } from '../ws/event-dispatcher.js';
import { verifyToken, type AuthUser } from '../middleware/auth.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';
import { generateId } from '../utils/ids.js';
import { WsCloseCode } from '../shared/events.js';

export interface PresenceDeps {
  store: ChatStore;
  dispatcher: IEventDispatcher;
}

/**
 * Tracks which users have live sessions and which rooms each session has
 * joined. One instance per process; state does not survive a restart.
 */
export class PresenceRegistry {
  constructor(private readonly deps: PresenceDeps) {}

  get dispatcher(): IEventDispatcher {
    return this.deps.dispatcher;
  }

  authenticate(token: string): Promise<AuthUser> {
    return verifyToken(this.deps.store, token);
  }

  async connect(token: string, socket: SocketLike): Promise<{ sessionId: string; user: AuthUser }> {
    const user = await this.authenticate(token);
    const sessionId = await this.register(user, socket);
    return { sessionId, user };
  }

  /** Attach an already authenticated socket. */
  async register(user: AuthUser, socket: SocketLike): Promise<string> {
    const { store, dispatcher } = this.deps;
    const at = new Date();
    if (!this.isOnline(user.id)) {
      await store.setUserOnline(user.id, true, at);
    }

    const sessionId = generateId();
    dispatcher.addSession(sessionId, user.id, socket);
    dispatcher.dispatchToSession(sessionId, 'connected', { session_id: sessionId, user_id: user.id });
    dispatcher.dispatchToAll(
      'user_status_change',
      { user_id: user.id, is_online: true, last_seen_at: at.toISOString() },
      { excludeSessionId: sessionId },
    );
    return sessionId;
  }

  async disconnect(sessionId: string): Promise<void> {
    const { store, dispatcher } = this.deps;
    const session = dispatcher.removeSession(sessionId);
    if (!session) return;
    if (this.isOnline(session.userId)) return;

    const at = new Date();
    await store.setUserOnline(session.userId, false, at);
    dispatcher.dispatchToAll('user_status_change', {
      user_id: session.userId,
      is_online: false,
      last_seen_at: at.toISOString(),
    });
  }

  /** Returns true when the session was not yet in the room. */
  async joinRoom(sessionId: string, roomId: string): Promise<boolean> {
    const { store, dispatcher } = this.deps;
    const session = dispatcher.getSession(sessionId);
    if (!session) throw new Error(`Unknown session ${sessionId}`);

    const membership = await store.getMembership(roomId, session.userId);
    if (!membership?.isActive) {
      throw chatError('FORBIDDEN', ChatErrorCode.NOT_A_MEMBER, 'Not a member of this room');
    }

    const wasActive = this.isActiveIn(session.userId, roomId);
    const changed = dispatcher.joinRoom(sessionId, roomId);
    dispatcher.dispatchToSession(sessionId, 'room_joined', { room_id: roomId });
    if (changed && !wasActive) {
      dispatcher.dispatchToRoom(
        roomId,
        'user_joined',
        { room_id: roomId, user_id: session.userId },
        { excludeUserId: session.userId },
      );
    }
    return changed;
  }

  /** Returns true when the session was in the room. */
  leaveRoom(sessionId: string, roomId: string): boolean {
    const { dispatcher } = this.deps;
    const session = dispatcher.getSession(sessionId);
    if (!session) return false;

    const changed = dispatcher.leaveRoom(sessionId, roomId);
    dispatcher.dispatchToSession(sessionId, 'room_left', { room_id: roomId });
    if (changed && !this.isActiveIn(session.userId, roomId)) {
      dispatcher.dispatchToRoom(roomId, 'user_left', { room_id: roomId, user_id: session.userId });
    }
    return changed;
  }

  /** Drop every session of a user from a room, e.g. after their membership ends. */
  evictFromRoom(userId: string, roomId: string): void {
    for (const session of this.deps.dispatcher.getSessionsByUser(userId)) {
      if (session.joinedRooms.has(roomId)) this.leaveRoom(session.sessionId, roomId);
    }
  }

  isActiveIn(userId: string, roomId: string): boolean {
    return this.deps.dispatcher.getSessionsByUser(userId).some((s) => s.joinedRooms.has(roomId));
  }

  isOnline(userId: string): boolean {
    return this.deps.dispatcher.getSessionsByUser(userId).length > 0;
  }

  touch(sessionId: string): void {
    const session = this.deps.dispatcher.getSession(sessionId);
    if (session) session.lastHeartbeat = Date.now();
  }

  /** Presence is per process, so nobody is online before the first connection. */
  async markAllOffline(): Promise<number> {
    const count = await this.deps.store.markAllUsersOffline(new Date());
    if (count > 0) console.log(`[presence] reset ${count} stale online flag(s)`);
    return count;
  }

  /**
   * Close every socket, then clear the online flags in one statement. The
   * per-socket close handlers find their sessions already gone.
   */
  async shutdown(): Promise<void> {
    this.deps.dispatcher.disconnectAll(WsCloseCode.SERVER_SHUTDOWN, 'Server shutting down');
    await this.deps.store.markAllUsersOffline(new Date());
  }
}
