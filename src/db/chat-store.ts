import { and, asc, count, desc, eq, ilike, inArray, ne, or, sql, type SQL } from 'drizzle-orm';
import type { Db } from './index.js';
import {
  users,
  channels,
  rooms,
  roomMembers,
  messages,
  attachments,
  mentions,
  reactions,
  readReceipts,
  pushSubscriptions,
} from './schema/index.js';
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
  MessageState,
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

type MessageRow = typeof messages.$inferSelect;

export function toMessageRecord(row: MessageRow): MessageRecord {
  let state: MessageState = { kind: 'active' };
  if (row.status === 'deleted') {
    state = { kind: 'deleted', deletedAt: row.deletedAt ?? row.createdAt };
  } else if (row.status === 'edited') {
    state = { kind: 'edited', editedAt: row.editedAt ?? row.createdAt };
  }
  return {
    id: row.id,
    roomId: row.roomId,
    senderId: row.senderId,
    content: row.content,
    replyToId: row.replyToId,
    state,
    createdAt: row.createdAt,
  };
}

const userColumns = {
  id: users.id,
  email: users.email,
  username: users.username,
  displayName: users.displayName,
  isActive: users.isActive,
  isAdmin: users.isAdmin,
  isBot: users.isBot,
  isOnline: users.isOnline,
  lastSeenAt: users.lastSeenAt,
  createdAt: users.createdAt,
};

function firstOrThrow<T>(rows: T[], what: string): T {
  const [row] = rows;
  if (row === undefined) throw new Error(`${what} returned no row`);
  return row;
}

export class DrizzleChatStore implements ChatStore {
  constructor(private readonly db: Db) {}

  // ── Users ──

  async getUser(userId: string): Promise<UserRecord | null> {
    const [row] = await this.db.select(userColumns).from(users).where(eq(users.id, userId)).limit(1);
    return row ?? null;
  }

  async getUsers(userIds: string[]): Promise<UserRecord[]> {
    if (userIds.length === 0) return [];
    return this.db.select(userColumns).from(users).where(inArray(users.id, userIds));
  }

  async findUserForLogin(email: string): Promise<UserWithPassword | null> {
    const [row] = await this.db.select().from(users).where(eq(users.email, email)).limit(1);
    return row ?? null;
  }

  async findUserByEmailOrUsername(email: string, username: string): Promise<UserRecord | null> {
    const [row] = await this.db
      .select(userColumns)
      .from(users)
      .where(or(eq(users.email, email), eq(users.username, username)))
      .limit(1);
    return row ?? null;
  }

  async createUser(input: NewUser): Promise<UserRecord> {
    const rows = await this.db
      .insert(users)
      .values({
        id: input.id,
        email: input.email,
        username: input.username,
        displayName: input.displayName,
        passwordHash: input.passwordHash,
        isAdmin: input.isAdmin ?? false,
        isBot: input.isBot ?? false,
      })
      .returning(userColumns);
    return firstOrThrow(rows, 'createUser');
  }

  async upsertBotUsers(bots: Array<Pick<NewUser, 'id' | 'email' | 'username' | 'displayName'>>): Promise<void> {
    if (bots.length === 0) return;
    await this.db
      .insert(users)
      .values(bots.map((b) => ({ ...b, passwordHash: null, isBot: true })))
      .onConflictDoNothing();
  }

  async setUserOnline(userId: string, isOnline: boolean, at: Date): Promise<void> {
    await this.db.update(users).set({ isOnline, lastSeenAt: at }).where(eq(users.id, userId));
  }

  async markAllUsersOffline(at: Date): Promise<number> {
    const rows = await this.db
      .update(users)
      .set({ isOnline: false, lastSeenAt: at })
      .where(eq(users.isOnline, true))
      .returning({ id: users.id });
    return rows.length;
  }

  async listUsers(filter: UserFilter, page: PageRequest): Promise<PageResult<UserRecord>> {
    const pattern = filter.search ? `%${filter.search.replace(/[\\%_]/g, '\\$&')}%` : null;
    const where = and(
      eq(users.isActive, true),
      ne(users.id, filter.excludeUserId),
      filter.includeBots ? undefined : eq(users.isBot, false),
      pattern
        ? or(ilike(users.email, pattern), ilike(users.username, pattern), ilike(users.displayName, pattern))
        : undefined,
    );
    const [items, totals] = await Promise.all([
      this.db
        .select(userColumns)
        .from(users)
        .where(where)
        .orderBy(asc(users.email))
        .limit(page.limit)
        .offset(page.offset),
      this.db.select({ total: count() }).from(users).where(where),
    ]);
    return { items, total: totals[0]?.total ?? 0 };
  }

  async updateUser(userId: string, patch: Partial<Pick<UserRecord, 'displayName'>>): Promise<UserRecord | null> {
    if (Object.keys(patch).length === 0) return this.getUser(userId);
    const [row] = await this.db.update(users).set(patch).where(eq(users.id, userId)).returning(userColumns);
    return row ?? null;
  }

  // ── Channels ──

  async createChannel(input: Pick<ChannelRecord, 'id' | 'name' | 'description' | 'createdBy'>): Promise<ChannelRecord> {
    const rows = await this.db.insert(channels).values(input).returning();
    return firstOrThrow(rows, 'createChannel');
  }

  async getChannel(channelId: string): Promise<ChannelRecord | null> {
    const [row] = await this.db.select().from(channels).where(eq(channels.id, channelId)).limit(1);
    return row ?? null;
  }

  async findChannelByName(name: string): Promise<ChannelRecord | null> {
    const [row] = await this.db.select().from(channels).where(eq(channels.name, name)).limit(1);
    return row ?? null;
  }

  async listChannels(): Promise<ChannelWithTopicCount[]> {
    const rows = await this.db
      .select({ channel: channels, topicCount: count(rooms.id) })
      .from(channels)
      .leftJoin(rooms, and(eq(rooms.channelId, channels.id), eq(rooms.isActive, true)))
      .where(eq(channels.isActive, true))
      .groupBy(channels.id)
      .orderBy(asc(channels.name));
    return rows.map((r) => ({ ...r.channel, topicCount: r.topicCount }));
  }

  async updateChannel(
    channelId: string,
    patch: Partial<Pick<ChannelRecord, 'name' | 'description' | 'isActive'>>,
  ): Promise<ChannelRecord | null> {
    const [row] = await this.db
      .update(channels)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(channels.id, channelId))
      .returning();
    return row ?? null;
  }

  // ── Rooms & memberships ──

  async createRoom(room: NewRoom, members: Array<{ userId: string; role: MemberRole }>): Promise<RoomRecord> {
    return this.db.transaction(async (tx) => {
      const rows = await tx.insert(rooms).values(room).returning();
      const created = firstOrThrow(rows, 'createRoom');
      if (members.length > 0) {
        await tx
          .insert(roomMembers)
          .values(members.map((m) => ({ id: generateId(), roomId: created.id, userId: m.userId, role: m.role })))
          .onConflictDoNothing();
      }
      return created;
    });
  }

  async getRoom(roomId: string): Promise<RoomRecord | null> {
    const [row] = await this.db.select().from(rooms).where(eq(rooms.id, roomId)).limit(1);
    return row ?? null;
  }

  async findDirectRoom(userA: string, userB: string): Promise<RoomRecord | null> {
    const [row] = await this.db
      .select({ room: rooms })
      .from(rooms)
      .innerJoin(roomMembers, eq(roomMembers.roomId, rooms.id))
      .where(
        and(
          eq(rooms.type, 'direct'),
          eq(rooms.isActive, true),
          eq(roomMembers.isActive, true),
          inArray(roomMembers.userId, [userA, userB]),
        ),
      )
      .groupBy(rooms.id)
      .having(sql`count(distinct ${roomMembers.userId}) = 2`)
      .limit(1);
    return row?.room ?? null;
  }

  async listRoomsForUser(userId: string, page: PageRequest): Promise<PageResult<RoomWithMembership>> {
    return this.pageMemberRooms(
      and(eq(roomMembers.userId, userId), eq(roomMembers.isActive, true), eq(rooms.isActive, true)),
      page,
    );
  }

  async listChannelTopicsForUser(
    channelId: string,
    userId: string,
    page: PageRequest,
  ): Promise<PageResult<RoomWithMembership>> {
    return this.pageMemberRooms(
      and(
        eq(roomMembers.userId, userId),
        eq(roomMembers.isActive, true),
        eq(rooms.isActive, true),
        eq(rooms.type, 'topic'),
        eq(rooms.channelId, channelId),
      ),
      page,
    );
  }

  private async pageMemberRooms(where: SQL | undefined, page: PageRequest): Promise<PageResult<RoomWithMembership>> {
    const [items, totals] = await Promise.all([
      this.db
        .select({ room: rooms, membership: roomMembers })
        .from(roomMembers)
        .innerJoin(rooms, eq(rooms.id, roomMembers.roomId))
        .where(where)
        .orderBy(desc(rooms.updatedAt), desc(rooms.id))
        .limit(page.limit)
        .offset(page.offset),
      this.db
        .select({ total: count() })
        .from(roomMembers)
        .innerJoin(rooms, eq(rooms.id, roomMembers.roomId))
        .where(where),
    ]);
    return { items, total: totals[0]?.total ?? 0 };
  }

  async updateRoom(roomId: string, patch: Partial<Pick<RoomRecord, 'name' | 'description'>>): Promise<RoomRecord | null> {
    if (Object.keys(patch).length === 0) return this.getRoom(roomId);
    const [row] = await this.db.update(rooms).set(patch).where(eq(rooms.id, roomId)).returning();
    return row ?? null;
  }

  async deleteRoomCascade(roomId: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const roomMessageIds = tx.select({ id: messages.id }).from(messages).where(eq(messages.roomId, roomId));

      // Replies point inside the room; break them before the rows go
      await tx.update(messages).set({ replyToId: null }).where(eq(messages.roomId, roomId));
      await tx.delete(readReceipts).where(inArray(readReceipts.messageId, roomMessageIds));
      await tx.delete(reactions).where(inArray(reactions.messageId, roomMessageIds));
      await tx.delete(mentions).where(inArray(mentions.messageId, roomMessageIds));
      await tx.delete(attachments).where(inArray(attachments.messageId, roomMessageIds));
      await tx.delete(messages).where(eq(messages.roomId, roomId));
      await tx.delete(roomMembers).where(eq(roomMembers.roomId, roomId));
      const deleted = await tx.delete(rooms).where(eq(rooms.id, roomId)).returning({ id: rooms.id });
      return deleted.length > 0;
    });
  }

  async getMembership(roomId: string, userId: string): Promise<MembershipRecord | null> {
    const [row] = await this.db
      .select()
      .from(roomMembers)
      .where(and(eq(roomMembers.roomId, roomId), eq(roomMembers.userId, userId)))
      .limit(1);
    return row ?? null;
  }

  async listActiveMembers(roomId: string): Promise<MembershipRecord[]> {
    return this.db
      .select()
      .from(roomMembers)
      .where(and(eq(roomMembers.roomId, roomId), eq(roomMembers.isActive, true)))
      .orderBy(asc(roomMembers.joinedAt));
  }

  async upsertMembership(roomId: string, userId: string, role: MemberRole, at: Date): Promise<MembershipRecord> {
    const rows = await this.db
      .insert(roomMembers)
      .values({ id: generateId(), roomId, userId, role, joinedAt: at })
      .onConflictDoUpdate({
        target: [roomMembers.roomId, roomMembers.userId],
        set: { isActive: true, role, unreadCount: 0, lastReadAt: at, joinedAt: at },
      })
      .returning();
    return firstOrThrow(rows, 'upsertMembership');
  }

  async deactivateMembership(roomId: string, userId: string): Promise<boolean> {
    const rows = await this.db
      .update(roomMembers)
      .set({ isActive: false })
      .where(and(eq(roomMembers.roomId, roomId), eq(roomMembers.userId, userId), eq(roomMembers.isActive, true)))
      .returning({ id: roomMembers.id });
    return rows.length > 0;
  }

  async incrementUnread(roomId: string, userIds: string[]): Promise<void> {
    if (userIds.length === 0) return;
    await this.db
      .update(roomMembers)
      .set({ unreadCount: sql`${roomMembers.unreadCount} + 1` })
      .where(
        and(eq(roomMembers.roomId, roomId), inArray(roomMembers.userId, userIds), eq(roomMembers.isActive, true)),
      );
  }

  // ── Messages ──

  async createMessage(input: CreateMessageInput): Promise<CreatedMessage> {
    const mentionUserIds = [...new Set(input.mentionUserIds)];
    return this.db.transaction(async (tx) => {
      const rows = await tx
        .insert(messages)
        .values({
          id: input.id,
          roomId: input.roomId,
          senderId: input.senderId,
          content: input.content,
          replyToId: input.replyToId,
        })
        .returning();
      const row = firstOrThrow(rows, 'createMessage');

      let attachmentRows: AttachmentRecord[] = [];
      if (input.attachments.length > 0) {
        attachmentRows = await tx
          .insert(attachments)
          .values(input.attachments.map((a) => ({ id: generateId(), messageId: row.id, ...a })))
          .returning();
      }

      if (mentionUserIds.length > 0) {
        await tx
          .insert(mentions)
          .values(mentionUserIds.map((userId) => ({ messageId: row.id, userId })))
          .onConflictDoNothing();
      }

      if (input.advanceSenderReadState && input.senderId) {
        await tx
          .update(roomMembers)
          .set({ lastReadAt: row.createdAt, unreadCount: 0 })
          .where(and(eq(roomMembers.roomId, input.roomId), eq(roomMembers.userId, input.senderId)));
      }

      await tx.update(rooms).set({ updatedAt: row.createdAt }).where(eq(rooms.id, input.roomId));

      return { message: toMessageRecord(row), attachments: attachmentRows, mentionUserIds };
    });
  }

  async getMessage(messageId: string): Promise<MessageRecord | null> {
    const [row] = await this.db.select().from(messages).where(eq(messages.id, messageId)).limit(1);
    return row ? toMessageRecord(row) : null;
  }

  async listMessages(roomId: string, page: PageRequest): Promise<PageResult<MessageRecord>> {
    const where = and(eq(messages.roomId, roomId), ne(messages.status, 'deleted'));
    const [rows, totals] = await Promise.all([
      this.db
        .select()
        .from(messages)
        .where(where)
        .orderBy(desc(messages.createdAt), desc(messages.id))
        .limit(page.limit)
        .offset(page.offset),
      this.db.select({ total: count() }).from(messages).where(where),
    ]);
    return { items: rows.map(toMessageRecord).reverse(), total: totals[0]?.total ?? 0 };
  }

  async editMessage(messageId: string, content: string, at: Date): Promise<MessageRecord | null> {
    const [row] = await this.db
      .update(messages)
      .set({ content, status: 'edited', editedAt: at })
      .where(and(eq(messages.id, messageId), ne(messages.status, 'deleted')))
      .returning();
    return row ? toMessageRecord(row) : null;
  }

  async softDeleteMessage(messageId: string, at: Date): Promise<MessageRecord | null> {
    const [row] = await this.db
      .update(messages)
      .set({ status: 'deleted', deletedAt: at })
      .where(and(eq(messages.id, messageId), ne(messages.status, 'deleted')))
      .returning();
    return row ? toMessageRecord(row) : null;
  }

  async listAttachments(messageIds: string[]): Promise<AttachmentRecord[]> {
    if (messageIds.length === 0) return [];
    return this.db
      .select()
      .from(attachments)
      .where(inArray(attachments.messageId, messageIds))
      .orderBy(asc(attachments.createdAt));
  }

  async listMentions(messageIds: string[]): Promise<Array<{ messageId: string; userId: string }>> {
    if (messageIds.length === 0) return [];
    return this.db
      .select({ messageId: mentions.messageId, userId: mentions.userId })
      .from(mentions)
      .where(inArray(mentions.messageId, messageIds));
  }

  // ── Read state ──

  async markRead(roomId: string, userId: string, messageIds: string[], at: Date): Promise<MarkReadOutcome> {
    return this.db.transaction(async (tx) => {
      let inserted = 0;
      let readableIds: string[] = [];
      if (messageIds.length > 0) {
        const readable = await tx
          .select({ id: messages.id })
          .from(messages)
          .where(and(eq(messages.roomId, roomId), inArray(messages.id, messageIds), ne(messages.status, 'deleted')));
        const found = new Set(readable.map((m) => m.id));
        readableIds = messageIds.filter((id) => found.has(id));
        if (readable.length > 0) {
          const rows = await tx
            .insert(readReceipts)
            .values(readable.map((m) => ({ messageId: m.id, userId, readAt: at })))
            .onConflictDoNothing()
            .returning({ messageId: readReceipts.messageId });
          inserted = rows.length;
        }
      }
      await tx
        .update(roomMembers)
        .set({ lastReadAt: at, unreadCount: 0 })
        .where(and(eq(roomMembers.roomId, roomId), eq(roomMembers.userId, userId)));
      return { readableIds, inserted };
    });
  }

  async listReadMessageIds(userId: string, messageIds: string[]): Promise<string[]> {
    if (messageIds.length === 0) return [];
    const rows = await this.db
      .select({ messageId: readReceipts.messageId })
      .from(readReceipts)
      .where(and(eq(readReceipts.userId, userId), inArray(readReceipts.messageId, messageIds)));
    return rows.map((r) => r.messageId);
  }

  // ── Reactions ──

  async upsertReaction(messageId: string, userId: string, emoji: string): Promise<ReactionRecord> {
    const rows = await this.db
      .insert(reactions)
      .values({ id: generateId(), messageId, userId, emoji })
      .onConflictDoUpdate({
        target: [reactions.messageId, reactions.userId],
        set: { emoji, createdAt: new Date() },
      })
      .returning();
    return firstOrThrow(rows, 'upsertReaction');
  }

  async deleteReaction(messageId: string, userId: string, emoji: string): Promise<boolean> {
    const rows = await this.db
      .delete(reactions)
      .where(and(eq(reactions.messageId, messageId), eq(reactions.userId, userId), eq(reactions.emoji, emoji)))
      .returning({ id: reactions.id });
    return rows.length > 0;
  }

  async listReactions(messageIds: string[]): Promise<ReactionRecord[]> {
    if (messageIds.length === 0) return [];
    return this.db
      .select()
      .from(reactions)
      .where(inArray(reactions.messageId, messageIds))
      .orderBy(asc(reactions.createdAt));
  }

  // ── Push subscriptions ──

  async upsertPushSubscription(userId: string, token: string, platform: PushPlatform): Promise<PushSubscriptionRecord> {
    const rows = await this.db
      .insert(pushSubscriptions)
      .values({ id: generateId(), userId, token, platform })
      .onConflictDoUpdate({ target: pushSubscriptions.token, set: { userId, platform } })
      .returning();
    return firstOrThrow(rows, 'upsertPushSubscription');
  }

  async deletePushSubscription(userId: string, token: string): Promise<boolean> {
    const rows = await this.db
      .delete(pushSubscriptions)
      .where(and(eq(pushSubscriptions.userId, userId), eq(pushSubscriptions.token, token)))
      .returning({ id: pushSubscriptions.id });
    return rows.length > 0;
  }

  async listPushSubscriptions(userId: string): Promise<PushSubscriptionRecord[]> {
    return this.db
      .select()
      .from(pushSubscriptions)
      .where(eq(pushSubscriptions.userId, userId))
      .orderBy(asc(pushSubscriptions.createdAt));
  }
}
