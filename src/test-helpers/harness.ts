import { MemoryChatStore } from './memory-chat-store.js';
import { FakeSocket } from './fake-socket.js';
import { createServices, type AppServices } from '../services/container.js';
import type { IPushGateway, PushData } from '../services/notifications.js';
import type { IAgentRunner } from '../services/agent-bridge.js';
import type { RoomRecord, UserRecord } from '../services/chat-store.js';
import type { AuthUser } from '../middleware/auth.js';
import type { AgentType } from '../shared/bots.js';
import type { MemberRole, RoomType } from '../shared/types.js';
import { ExternalServiceError } from '../utils/errors.js';
import { generateId } from '../utils/ids.js';

export interface SentPush {
  token: string;
  title: string;
  body: string;
  data: PushData;
}

/** Records every send; tokens in `failing` reject, tokens in `refused` resolve false. */
export class RecordingPushGateway implements IPushGateway {
  readonly sent: SentPush[] = [];
  readonly failing = new Set<string>();
  readonly refused = new Set<string>();

  async send(token: string, title: string, body: string, data: PushData): Promise<boolean> {
    this.sent.push({ token, title, body, data });
    if (this.failing.has(token)) throw new ExternalServiceError('push', `gateway rejected ${token}`);
    return !this.refused.has(token);
  }
}

export class StubAgentRunner implements IAgentRunner {
  readonly calls: Array<{ prompt: string; userId: string; agentType: AgentType }> = [];
  reply: string | Error = 'Agent reply';

  async run(prompt: string, userId: string, agentType: AgentType): Promise<string> {
    this.calls.push({ prompt, userId, agentType });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export interface TestHarness {
  store: MemoryChatStore;
  services: AppServices;
  push: RecordingPushGateway;
  agent: StubAgentRunner;
  user(username: string, opts?: { displayName?: string; isAdmin?: boolean }): Promise<UserRecord>;
  room(
    type: RoomType,
    creator: UserRecord,
    members: UserRecord[],
    opts?: { name?: string; channelId?: string },
  ): Promise<RoomRecord>;
  connect(user: UserRecord): Promise<{ socket: FakeSocket; sessionId: string }>;
}

export function authUserOf(user: UserRecord): AuthUser {
  return { id: user.id, username: user.username, displayName: user.displayName, isAdmin: user.isAdmin };
}

/** Services over an in-memory store with recording push and stub agent doubles. */
export function createTestHarness(): TestHarness {
  const store = new MemoryChatStore();
  const push = new RecordingPushGateway();
  const agent = new StubAgentRunner();
  const services = createServices(
    store,
    { UPLOAD_DIR: './data/test-uploads', AGENT_TIMEOUT_MS: 1000 },
    { pushGateway: push, agentRunner: agent },
  );

  return {
    store,
    services,
    push,
    agent,

    user(username, opts = {}) {
      return store.createUser({
        id: generateId(),
        email: `${username}@example.test`,
        username,
        displayName: opts.displayName ?? null,
        passwordHash: null,
        isAdmin: opts.isAdmin ?? false,
      });
    },

    room(type, creator, members, opts = {}) {
      const roles: Array<{ userId: string; role: MemberRole }> = [
        { userId: creator.id, role: 'admin' },
        ...members.map((m) => ({ userId: m.id, role: 'member' as const })),
      ];
      return store.createRoom(
        {
          id: generateId(),
          type,
          name: opts.name ?? (type === 'direct' ? null : 'Test room'),
          description: null,
          channelId: opts.channelId ?? null,
          createdBy: creator.id,
        },
        roles,
      );
    },

    async connect(user) {
      const socket = new FakeSocket();
      const sessionId = await services.presence.register(authUserOf(user), socket);
      return { socket, sessionId };
    },
  };
}
