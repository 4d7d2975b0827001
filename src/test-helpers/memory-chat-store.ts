import type {
  AttachmentRecord,
  ChannelRecord,
  ChannelWithTopicCount,
  ChatStore,
  CreateMessageInput,
  CreatedMessage,
  MarkReadOutcome,
  MembershipRecord,
  MessageRecord,
  NewRoom,
  NewUser,
  PageRequest,
  PageResult,
  PushSubscriptionRecord,
  ReactionRecord,
  RoomRecord,
  RoomWithMembership,
  UserFilter,
  UserRecord,
  UserWithPassword,
} from '../services/chat-store.js';
import type { MemberRole, PushPlatform } from '../shared/types.js';
import { generateId } from '../utils/ids.js';

function stripPassword(user: UserWithPassword): UserRecord {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

/** In-process ChatStore for tests. Mirrors the constraints the SQL schema enforces. */
export class MemoryChatStore implements ChatStore {
  readonly users = new Map<string, UserWithPassword>();
  readonly channels = new Map<string, ChannelRecord>();
  readonly rooms = new Map<string, RoomRecord>();
  readonly memberships: MembershipRecord[] = [];
  readonly messages = new Map<string, MessageRecord>();
  readonly attachments: AttachmentRecord[] = [];
  readonly mentions: Array<{ messageId: string; userId: string }> = [];
  readonly reactions: ReactionRecord[] = [];
  readonly receipts: Array<{ messageId: string; userId: string; readAt: Date }> = [];
  readonly pushSubscriptions: PushSubscriptionRecord[] = [];

  // Monotonic clock so createdAt ordering is stable inside one test
  private tick = Date.UTC(2026, 0, 1);
  private now(): Date {
    this.tick += 1;
    return new Date(this.tick);
  }

  // ── Users ──

  async getUser(userId: string): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    return user ? stripPassword(user) : null;
  }

  async getUsers(userIds: string[]): Promise<UserRecord[]> {
    const result: UserRecord[] = [];
    for (const id of userIds) {
      const user = this.users.get(id);
      if (user) result.push(stripPassword(user));
    }
    return result;
  }

  async findUserForLogin(email: string): Promise<UserWithPassword | null> {
    for (const user of this.users.values()) {
      if (user.email === email) return { ...user };
    }
    return null;
  }

  async findUserByEmailOrUsername(email: string, username: string): Promise<UserRecord | null> {
    for (const user of this.users.values()) {
      if (user.email === email || user.username === username) return stripPassword(user);
    }
    return null;
  }

  async createUser(input: NewUser): Promise<UserRecord> {
    for (const user of this.users.values()) {
      if (user.email === input.email || user.username === input.username) {
        throw new Error('duplicate key value violates unique constraint');
      }
    }
    const user: UserWithPassword = {
      id: input.id,
      email: input.email,
      username: input.username,
      displayName: input.displayName,
      passwordHash: input.passwordHash,
      isActive: true,
      isAdmin: input.isAdmin ?? false,
      isBot: input.isBot ?? false,
      isOnline: false,
      lastSeenAt: null,
      createdAt: this.now(),
    };
    this.users.set(user.id, user);
    return stripPassword(user);
  }

  async upsertBotUsers(bots: Array<Pick<NewUser, 'id' | 'email' | 'username' | 'displayName'>>): Promise<void> {
    for (const bot of bots) {
      if (this.users.has(bot.id)) continue;
      await this.createUser({ ...bot, passwordHash: null, isBot: true });
    }
  }

  async setUserOnline(userId: string, isOnline: boolean, at: Date): Promise<void> {
    const user = this.users.get(userId);
    if (user) {
      user.isOnline = isOnline;
      user.lastSeenAt = at;
    }
  }

  async markAllUsersOffline(at: Date): Promise<number> {
    let changed = 0;
    for (const user of this.users.values()) {
      if (user.isOnline) {
        user.isOnline = false;
        user.lastSeenAt = at;
        changed++;
      }
    }
    return changed;
  }

  async listUsers(filter: UserFilter, page: PageRequest): Promise<PageResult<UserRecord>> {
    const needle = filter.search?.toLowerCase();
    const matches = [...this.users.values()]
      .filter((u) => u.isActive && u.id !== filter.excludeUserId && (filter.includeBots || !u.isBot))
      .filter(
        (u) =>
          !needle ||
          [u.email, u.username, u.displayName ?? ''].some((field) => field.toLowerCase().includes(needle)),
      )
      .sort((a, b) => (a.email < b.email ? -1 : a.email > b.email ? 1 : 0))
      .map(stripPassword);
    return { items: matches.slice(page.offset, page.offset + page.limit), total: matches.length };
  }

  async updateUser(userId: string, patch: Partial<Pick<UserRecord, 'displayName'>>): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    if (!user) return null;
    Object.assign(user, patch);
    return stripPassword(user);
  }

  // ── Channels ──

  async createChannel(input: Pick<ChannelRecord, 'id' | 'name' | 'description' | 'createdBy'>): Promise<ChannelRecord> {
    const at = this.now();
    const channel: ChannelRecord = { ...input, isActive: true, createdAt: at, updatedAt: at };
    this.channels.set(channel.id, channel);
    return { ...channel };
  }

  async getChannel(channelId: string): Promise<ChannelRecord | null> {
    const channel = this.channels.get(channelId);
    return channel ? { ...channel } : null;
  }

  async findChannelByName(name: string): Promise<ChannelRecord | null> {
    for (const channel of this.channels.values()) {
      if (channel.name === name) return { ...channel };
    }
    return null;
  }

  async listChannels(): Promise<ChannelWithTopicCount[]> {
    return [...this.channels.values()]
      .filter((c) => c.isActive)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((c) => ({
        ...c,
        topicCount: [...this.rooms.values()].filter((r) => r.channelId === c.id && r.isActive).length,
      }));
  }

  async updateChannel(
    channelId: string,
    patch: Partial<Pick<ChannelRecord, 'name' | 'description' | 'isActive'>>,
  ): Promise<ChannelRecord | null> {
    const channel = this.channels.get(channelId);
    if (!channel) return null;
    Object.assign(channel, patch, { updatedAt: this.now() });
    return { ...channel };
  }

  // ── Rooms & memberships ──

  async createRoom(room: NewRoom, members: Array<{ userId: string; role: MemberRole }>): Promise<RoomRecord> {
    const at = this.now();
    const record: RoomRecord = { ...room, isActive: true, createdAt: at, updatedAt: at };
    this.rooms.set(record.id, record);
    for (const m of members) {
      if (this.findMembership(record.id, m.userId)) continue;
      this.memberships.push({
        id: generateId(),
        roomId: record.id,
        userId: m.userId,
        role: m.role,
        isActive: true,
        lastReadAt: null,
        unreadCount: 0,
        joinedAt: at,
      });
    }
    return { ...record };
  }

  async getRoom(roomId: string): Promise<RoomRecord | null> {
    const room = this.rooms.get(roomId);
    return room ? { ...room } : null;
  }

  async findDirectRoom(userA: string, userB: string): Promise<RoomRecord | null> {
    for (const room of this.rooms.values()) {
      if (room.type !== 'direct' || !room.isActive) continue;
      const a = this.findMembership(room.id, userA);
      const b = this.findMembership(room.id, userB);
      if (a?.isActive && b?.isActive) return { ...room };
    }
    return null;
  }

  async listRoomsForUser(userId: string, page: PageRequest): Promise<PageResult<RoomWithMembership>> {
    const all: RoomWithMembership[] = [];
    for (const membership of this.memberships) {
      if (membership.userId !== userId || !membership.isActive) continue;
      const room = this.rooms.get(membership.roomId);
      if (room?.isActive) all.push({ room: { ...room }, membership: { ...membership } });
    }
    all.sort((a, b) => b.room.updatedAt.getTime() - a.room.updatedAt.getTime());
    return { items: all.slice(page.offset, page.offset + page.limit), total: all.length };
  }

  async listChannelTopicsForUser(
    channelId: string,
    userId: string,
    page: PageRequest,
  ): Promise<PageResult<RoomWithMembership>> {
    const all = await this.listRoomsForUser(userId, { offset: 0, limit: Number.MAX_SAFE_INTEGER });
    const topics = all.items.filter(({ room }) => room.type === 'topic' && room.channelId === channelId);
    return { items: topics.slice(page.offset, page.offset + page.limit), total: topics.length };
  }

  async updateRoom(roomId: string, patch: Partial<Pick<RoomRecord, 'name' | 'description'>>): Promise<RoomRecord | null> {
    const room = this.rooms.get(roomId);
    if (!room) return null;
    Object.assign(room, patch);
    return { ...room };
  }

  async deleteRoomCascade(roomId: string): Promise<boolean> {
    if (!this.rooms.has(roomId)) return false;
    const ids = new Set([...this.messages.values()].filter((m) => m.roomId === roomId).map((m) => m.id));
    const keep = <T extends { messageId: string }>(rows: T[]) => {
      const kept = rows.filter((r) => !ids.has(r.messageId));
      rows.splice(0, rows.length, ...kept);
    };
    keep(this.receipts);
    keep(this.reactions);
    keep(this.mentions);
    keep(this.attachments);
    for (const id of ids) this.messages.delete(id);
    const remaining = this.memberships.filter((m) => m.roomId !== roomId);
    this.memberships.splice(0, this.memberships.length, ...remaining);
    this.rooms.delete(roomId);
    return true;
  }

  async getMembership(roomId: string, userId: string): Promise<MembershipRecord | null> {
    const membership = this.findMembership(roomId, userId);
    return membership ? { ...membership } : null;
  }

  async listActiveMembers(roomId: string): Promise<MembershipRecord[]> {
    return this.memberships.filter((m) => m.roomId === roomId && m.isActive).map((m) => ({ ...m }));
  }

  async upsertMembership(roomId: string, userId: string, role: MemberRole, at: Date): Promise<MembershipRecord> {
    const existing = this.findMembership(roomId, userId);
    if (existing) {
      Object.assign(existing, { isActive: true, role, unreadCount: 0, lastReadAt: at, joinedAt: at });
      return { ...existing };
    }
    const membership: MembershipRecord = {
      id: generateId(),
      roomId,
      userId,
      role,
      isActive: true,
      lastReadAt: null,
      unreadCount: 0,
      joinedAt: at,
    };
    this.memberships.push(membership);
    return { ...membership };
  }

  async deactivateMembership(roomId: string, userId: string): Promise<boolean> {
    const membership = this.findMembership(roomId, userId);
    if (!membership?.isActive) return false;
    membership.isActive = false;
    return true;
  }

  async incrementUnread(roomId: string, userIds: string[]): Promise<void> {
    for (const userId of userIds) {
      const membership = this.findMembership(roomId, userId);
      if (membership?.isActive) membership.unreadCount += 1;
    }
  }

  // ── Messages ──

  async createMessage(input: CreateMessageInput): Promise<CreatedMessage> {
    const createdAt = this.now();
    const message: MessageRecord = {
      id: input.id,
      roomId: input.roomId,
      senderId: input.senderId,
      content: input.content,
      replyToId: input.replyToId,
      state: { kind: 'active' },
      createdAt,
    };
    this.messages.set(message.id, message);

    const attachmentRows = input.attachments.map((a) => ({ id: generateId(), messageId: message.id, ...a, createdAt }));
    this.attachments.push(...attachmentRows);

    const mentionUserIds = [...new Set(input.mentionUserIds)];
    for (const userId of mentionUserIds) this.mentions.push({ messageId: message.id, userId });

    if (input.advanceSenderReadState && input.senderId) {
      const membership = this.findMembership(input.roomId, input.senderId);
      if (membership) {
        membership.lastReadAt = createdAt;
        membership.unreadCount = 0;
      }
    }

    const room = this.rooms.get(input.roomId);
    if (room) room.updatedAt = createdAt;

    return { message: { ...message }, attachments: attachmentRows, mentionUserIds };
  }

  async getMessage(messageId: string): Promise<MessageRecord | null> {
    const message = this.messages.get(messageId);
    return message ? { ...message } : null;
  }

  async listMessages(roomId: string, page: PageRequest): Promise<PageResult<MessageRecord>> {
    const visible = [...this.messages.values()]
      .filter((m) => m.roomId === roomId && m.state.kind !== 'deleted')
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    const items = visible.slice(page.offset, page.offset + page.limit).reverse();
    return { items: items.map((m) => ({ ...m })), total: visible.length };
  }

  async editMessage(messageId: string, content: string, at: Date): Promise<MessageRecord | null> {
    const message = this.messages.get(messageId);
    if (!message || message.state.kind === 'deleted') return null;
    message.content = content;
    message.state = { kind: 'edited', editedAt: at };
    return { ...message };
  }

  async softDeleteMessage(messageId: string, at: Date): Promise<MessageRecord | null> {
    const message = this.messages.get(messageId);
    if (!message || message.state.kind === 'deleted') return null;
    message.state = { kind: 'deleted', deletedAt: at };
    return { ...message };
  }

  async listAttachments(messageIds: string[]): Promise<AttachmentRecord[]> {
    return this.attachments.filter((a) => messageIds.includes(a.messageId));
  }

  async listMentions(messageIds: string[]): Promise<Array<{ messageId: string; userId: string }>> {
    return this.mentions.filter((m) => messageIds.includes(m.messageId));
  }

  // ── Read state ──

  async markRead(roomId: string, userId: string, messageIds: string[], at: Date): Promise<MarkReadOutcome> {
    let inserted = 0;
    const readableIds: string[] = [];
    for (const id of new Set(messageIds)) {
      const message = this.messages.get(id);
      if (!message || message.roomId !== roomId || message.state.kind === 'deleted') continue;
      readableIds.push(id);
      if (this.receipts.some((r) => r.messageId === id && r.userId === userId)) continue;
      this.receipts.push({ messageId: id, userId, readAt: at });
      inserted++;
    }
    const membership = this.findMembership(roomId, userId);
    if (membership) {
      membership.lastReadAt = at;
      membership.unreadCount = 0;
    }
    return { readableIds, inserted };
  }

  async listReadMessageIds(userId: string, messageIds: string[]): Promise<string[]> {
    return this.receipts.filter((r) => r.userId === userId && messageIds.includes(r.messageId)).map((r) => r.messageId);
  }

  // ── Reactions ──

  async upsertReaction(messageId: string, userId: string, emoji: string): Promise<ReactionRecord> {
    const existing = this.reactions.find((r) => r.messageId === messageId && r.userId === userId);
    if (existing) {
      existing.emoji = emoji;
      existing.createdAt = this.now();
      return { ...existing };
    }
    const reaction: ReactionRecord = { id: generateId(), messageId, userId, emoji, createdAt: this.now() };
    this.reactions.push(reaction);
    return { ...reaction };
  }

  async deleteReaction(messageId: string, userId: string, emoji: string): Promise<boolean> {
    const index = this.reactions.findIndex((r) => r.messageId === messageId && r.userId === userId && r.emoji === emoji);
    if (index === -1) return false;
    this.reactions.splice(index, 1);
    return true;
  }

  async listReactions(messageIds: string[]): Promise<ReactionRecord[]> {
    return this.reactions.filter((r) => messageIds.includes(r.messageId)).map((r) => ({ ...r }));
  }

  // ── Push subscriptions ──

  async upsertPushSubscription(userId: string, token: string, platform: PushPlatform): Promise<PushSubscriptionRecord> {
    const existing = this.pushSubscriptions.find((s) => s.token === token);
    if (existing) {
      existing.userId = userId;
      existing.platform = platform;
      return { ...existing };
    }
    const sub: PushSubscriptionRecord = { id: generateId(), userId, token, platform, createdAt: this.now() };
    this.pushSubscriptions.push(sub);
    return { ...sub };
  }

  async deletePushSubscription(userId: string, token: string): Promise<boolean> {
    const index = this.pushSubscriptions.findIndex((s) => s.userId === userId && s.token === token);
    if (index === -1) return false;
    this.pushSubscriptions.splice(index, 1);
    return true;
  }

  async listPushSubscriptions(userId: string): Promise<PushSubscriptionRecord[]> {
    return this.pushSubscriptions.filter((s) => s.userId === userId).map((s) => ({ ...s }));
  }

  private findMembership(roomId: string, userId: string): MembershipRecord | undefined {
    return this.memberships.find((m) => m.roomId === roomId && m.userId === userId);
  }
}
