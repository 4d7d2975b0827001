import type {
  users,
  channels,
  rooms,
  roomMembers,
  attachments,
  reactions,
  pushSubscriptions,
} from '../db/schema/index.js';
import type { PushPlatform, MemberRole } from '../shared/types.js';

export type UserRecord = Omit<typeof users.$inferSelect, 'passwordHash'>;
export type UserWithPassword = typeof users.$inferSelect;
export type NewUser = Pick<UserWithPassword, 'id' | 'email' | 'username' | 'displayName' | 'passwordHash'> & {
  isAdmin?: boolean;
  isBot?: boolean;
};
export type ChannelRecord = typeof channels.$inferSelect;
export type ChannelWithTopicCount = ChannelRecord & { topicCount: number };
export type RoomRecord = typeof rooms.$inferSelect;
export type NewRoom = Pick<RoomRecord, 'id' | 'type' | 'name' | 'description' | 'channelId' | 'createdBy'>;
export type MembershipRecord = typeof roomMembers.$inferSelect;
export type AttachmentRecord = typeof attachments.$inferSelect;
export type ReactionRecord = typeof reactions.$inferSelect;
export type PushSubscriptionRecord = typeof pushSubscriptions.$inferSelect;

/** Message lifecycle. Persisted as a status column plus the matching timestamp. */
export type MessageState =
  | { kind: 'active' }
  | { kind: 'edited'; editedAt: Date }
  | { kind: 'deleted'; deletedAt: Date };

export interface MessageRecord {
  id: string;
  roomId: string;
  senderId: string | null;
  content: string;
  replyToId: string | null;
  state: MessageState;
  createdAt: Date;
}

export interface AttachmentInput {
  url: string;
  filename: string;
  sizeBytes: number;
  mimeType: string;
}

export interface CreateMessageInput {
  id: string;
  roomId: string;
  senderId: string | null;
  content: string;
  replyToId: string | null;
  attachments: AttachmentInput[];
  mentionUserIds: string[];
  /** Advance the sender's own read marker to this message (sender is viewing the room). */
  advanceSenderReadState: boolean;
}

export interface CreatedMessage {
  message: MessageRecord;
  attachments: AttachmentRecord[];
  mentionUserIds: string[];
}

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface PageResult<T> {
  items: T[];
  total: number;
}

export interface RoomWithMembership {
  room: RoomRecord;
  membership: MembershipRecord;
}

export interface MarkReadOutcome {
  /** Requested ids that belong to the room and are not deleted, in request order. */
  readableIds: string[];
  /** Receipts written by this call. */
  inserted: number;
}

export interface UserFilter {
  excludeUserId: string;
  /** Case-insensitive substring of email, username or display name. */
  search?: string;
  includeBots: boolean;
}

export interface ChatStore {
  // Users
  getUser(userId: string): Promise<UserRecord | null>;
  getUsers(userIds: string[]): Promise<UserRecord[]>;
  findUserForLogin(email: string): Promise<UserWithPassword | null>;
  findUserByEmailOrUsername(email: string, username: string): Promise<UserRecord | null>;
  createUser(input: NewUser): Promise<UserRecord>;
  upsertBotUsers(bots: Array<Pick<NewUser, 'id' | 'email' | 'username' | 'displayName'>>): Promise<void>;
  setUserOnline(userId: string, isOnline: boolean, at: Date): Promise<void>;
  markAllUsersOffline(at: Date): Promise<number>;
  /** Active users matching the filter, ordered by email. */
  listUsers(filter: UserFilter, page: PageRequest): Promise<PageResult<UserRecord>>;
  updateUser(userId: string, patch: Partial<Pick<UserRecord, 'displayName'>>): Promise<UserRecord | null>;

  // Channels
  createChannel(input: Pick<ChannelRecord, 'id' | 'name' | 'description' | 'createdBy'>): Promise<ChannelRecord>;
  getChannel(channelId: string): Promise<ChannelRecord | null>;
  findChannelByName(name: string): Promise<ChannelRecord | null>;
  listChannels(): Promise<ChannelWithTopicCount[]>;
  updateChannel(
    channelId: string,
    patch: Partial<Pick<ChannelRecord, 'name' | 'description' | 'isActive'>>,
  ): Promise<ChannelRecord | null>;

  // Rooms & memberships
  createRoom(room: NewRoom, members: Array<{ userId: string; role: MemberRole }>): Promise<RoomRecord>;
  getRoom(roomId: string): Promise<RoomRecord | null>;
  findDirectRoom(userA: string, userB: string): Promise<RoomRecord | null>;
  listRoomsForUser(userId: string, page: PageRequest): Promise<PageResult<RoomWithMembership>>;
  /** Active topics of a channel the user is an active member of, newest activity first. */
  listChannelTopicsForUser(channelId: string, userId: string, page: PageRequest): Promise<PageResult<RoomWithMembership>>;
  updateRoom(roomId: string, patch: Partial<Pick<RoomRecord, 'name' | 'description'>>): Promise<RoomRecord | null>;
  /** Hard delete of a room and everything in it. */
  deleteRoomCascade(roomId: string): Promise<boolean>;
  getMembership(roomId: string, userId: string): Promise<MembershipRecord | null>;
  listActiveMembers(roomId: string): Promise<MembershipRecord[]>;
  /** Insert or reactivate a membership; a reactivated member starts with nothing unread. */
  upsertMembership(roomId: string, userId: string, role: MemberRole, at: Date): Promise<MembershipRecord>;
  deactivateMembership(roomId: string, userId: string): Promise<boolean>;
  /** Atomically add one to each listed member's unread counter. */
  incrementUnread(roomId: string, userIds: string[]): Promise<void>;

  // Messages
  /** Message, attachments, mentions, sender read state and room recency in one transaction. */
  createMessage(input: CreateMessageInput): Promise<CreatedMessage>;
  getMessage(messageId: string): Promise<MessageRecord | null>;
  listMessages(roomId: string, page: PageRequest): Promise<PageResult<MessageRecord>>;
  editMessage(messageId: string, content: string, at: Date): Promise<MessageRecord | null>;
  softDeleteMessage(messageId: string, at: Date): Promise<MessageRecord | null>;
  listAttachments(messageIds: string[]): Promise<AttachmentRecord[]>;
  listMentions(messageIds: string[]): Promise<Array<{ messageId: string; userId: string }>>;

  // Read state
  /** Receipts for unread, non-deleted messages of the room, then zero the counter. */
  markRead(roomId: string, userId: string, messageIds: string[], at: Date): Promise<MarkReadOutcome>;
  listReadMessageIds(userId: string, messageIds: string[]): Promise<string[]>;

  // Reactions
  upsertReaction(messageId: string, userId: string, emoji: string): Promise<ReactionRecord>;
  deleteReaction(messageId: string, userId: string, emoji: string): Promise<boolean>;
  listReactions(messageIds: string[]): Promise<ReactionRecord[]>;

  // Push subscriptions
  upsertPushSubscription(userId: string, token: string, platform: PushPlatform): Promise<PushSubscriptionRecord>;
  deletePushSubscription(userId: string, token: string): Promise<boolean>;
  listPushSubscriptions(userId: string): Promise<PushSubscriptionRecord[]>;
}
