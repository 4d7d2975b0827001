import type { ServerEventName, ServerEvents, WsMessage } from '../shared/events.js';

/** The part of a `ws` WebSocket the dispatcher needs; tests pass a fake. */
export interface SocketLike {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface WsSession {
  sessionId: string;
  userId: string;
  ws: SocketLike;
  joinedRooms: Set<string>;
  seq: number;
  lastHeartbeat: number;
}

export interface DispatchOptions {
  excludeSessionId?: string;
  excludeUserId?: string;
}

export interface IEventDispatcher {
  addSession(sessionId: string, userId: string, ws: SocketLike): WsSession;
  removeSession(sessionId: string): WsSession | undefined;
  /** Returns false when the session was already in the room. */
  joinRoom(sessionId: string, roomId: string): boolean;
  /** Returns false when the session was not in the room. */
  leaveRoom(sessionId: string, roomId: string): boolean;
  dispatchToRoom<E extends ServerEventName>(roomId: string, event: E, data: ServerEvents[E], opts?: DispatchOptions): void;
  dispatchToAll<E extends ServerEventName>(event: E, data: ServerEvents[E], opts?: DispatchOptions): void;
  dispatchToUser<E extends ServerEventName>(userId: string, event: E, data: ServerEvents[E]): void;
  dispatchToSession<E extends ServerEventName>(sessionId: string, event: E, data: ServerEvents[E]): void;
  disconnectAll(closeCode: number, reason: string): void;
  getSession(sessionId: string): WsSession | undefined;
  getSessionsByUser(userId: string): WsSession[];
  getSessionsInRoom(roomId: string): WsSession[];
}

export class MemoryEventDispatcher implements IEventDispatcher {
  private sessions = new Map<string, WsSession>();
  private userSessions = new Map<string, Set<string>>();
  private roomSessions = new Map<string, Set<string>>();

  addSession(sessionId: string, userId: string, ws: SocketLike): WsSession {
    const session: WsSession = {
      sessionId,
      userId,
      ws,
      joinedRooms: new Set(),
      seq: 0,
      lastHeartbeat: Date.now(),
    };
    this.sessions.set(sessionId, session);

    const userSet = this.userSessions.get(userId) ?? new Set();
    userSet.add(sessionId);
    this.userSessions.set(userId, userSet);

    return session;
  }

  removeSession(sessionId: string): WsSession | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;

    for (const roomId of session.joinedRooms) {
      this.unindex(roomId, sessionId);
    }

    this.sessions.delete(sessionId);
    const userSet = this.userSessions.get(session.userId);
    if (userSet) {
      userSet.delete(sessionId);
      if (userSet.size === 0) this.userSessions.delete(session.userId);
    }
    return session;
  }

  joinRoom(sessionId: string, roomId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session || session.joinedRooms.has(roomId)) return false;
    session.joinedRooms.add(roomId);
    let roomSet = this.roomSessions.get(roomId);
    if (!roomSet) {
      roomSet = new Set();
      this.roomSessions.set(roomId, roomSet);
    }
    roomSet.add(sessionId);
    return true;
  }

  leaveRoom(sessionId: string, roomId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session?.joinedRooms.delete(roomId)) return false;
    this.unindex(roomId, sessionId);
    return true;
  }

  private unindex(roomId: string, sessionId: string) {
    const roomSet = this.roomSessions.get(roomId);
    if (roomSet) {
      roomSet.delete(sessionId);
      if (roomSet.size === 0) this.roomSessions.delete(roomId);
    }
  }

  private send(session: WsSession, event: string, data: unknown) {
    session.seq++;
    const msg: WsMessage = { event, data, seq: session.seq };
    if (session.ws.readyState === session.ws.OPEN) {
      session.ws.send(JSON.stringify(msg));
    }
  }

  private excluded(session: WsSession, opts?: DispatchOptions): boolean {
    return session.sessionId === opts?.excludeSessionId || session.userId === opts?.excludeUserId;
  }

  dispatchToRoom<E extends ServerEventName>(roomId: string, event: E, data: ServerEvents[E], opts?: DispatchOptions) {
    const sessionIds = this.roomSessions.get(roomId);
    if (!sessionIds) return;
    for (const sid of sessionIds) {
      const session = this.sessions.get(sid);
      if (session && !this.excluded(session, opts)) {
        this.send(session, event, data);
      }
    }
  }

  dispatchToAll<E extends ServerEventName>(event: E, data: ServerEvents[E], opts?: DispatchOptions) {
    for (const session of this.sessions.values()) {
      if (!this.excluded(session, opts)) {
        this.send(session, event, data);
      }
    }
  }

  dispatchToUser<E extends ServerEventName>(userId: string, event: E, data: ServerEvents[E]) {
    for (const session of this.getSessionsByUser(userId)) {
      this.send(session, event, data);
    }
  }

  dispatchToSession<E extends ServerEventName>(sessionId: string, event: E, data: ServerEvents[E]) {
    const session = this.sessions.get(sessionId);
    if (session) this.send(session, event, data);
  }

  disconnectAll(closeCode: number, reason: string) {
    for (const session of [...this.sessions.values()]) {
      session.ws.close(closeCode, reason);
      this.removeSession(session.sessionId);
    }
  }

  getSession(sessionId: string): WsSession | undefined {
    return this.sessions.get(sessionId);
  }

  getSessionsByUser(userId: string): WsSession[] {
    return this.collect(this.userSessions.get(userId));
  }

  getSessionsInRoom(roomId: string): WsSession[] {
    return this.collect(this.roomSessions.get(roomId));
  }

  private collect(sessionIds: Set<string> | undefined): WsSession[] {
    if (!sessionIds) return [];
    const result: WsSession[] = [];
    for (const sid of sessionIds) {
      const session = this.sessions.get(sid);
      if (session) result.push(session);
    }
    return result;
  }
}
