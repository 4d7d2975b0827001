import type {
  PublicUser,
  Channel,
  Room,
  RoomSummary,
  RoomMember,
  Message,
  MessageSender,
  Attachment,
  ReactionGroup,
  PushSubscription,
} from '../shared/types.js';
import type {
  UserRecord,
  ChannelRecord,
  RoomRecord,
  MembershipRecord,
  MessageRecord,
  AttachmentRecord,
  PushSubscriptionRecord,
} from '../services/chat-store.js';

export function formatUser(row: UserRecord): PublicUser {
  return {
    id: row.id,
    username: row.username,
    display_name: row.displayName,
    email: row.email,
    is_bot: row.isBot,
    is_online: row.isOnline,
    last_seen_at: row.lastSeenAt?.toISOString() ?? null,
  };
}

export function formatChannel(row: ChannelRecord, topicCount?: number): Channel {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    created_by: row.createdBy,
    is_active: row.isActive,
    ...(topicCount !== undefined ? { topic_count: topicCount } : {}),
    created_at: row.createdAt.toISOString(),
  };
}

export function formatRoom(row: RoomRecord): Room {
  return {
    id: row.id,
    type: row.type,
    name: row.name,
    description: row.description,
    channel_id: row.channelId,
    created_by: row.createdBy,
    created_at: row.createdAt.toISOString(),
    updated_at: row.updatedAt.toISOString(),
  };
}

export function formatRoomSummary(room: RoomRecord, membership: MembershipRecord): RoomSummary {
  return {
    ...formatRoom(room),
    unread_count: membership.unreadCount,
    last_read_at: membership.lastReadAt?.toISOString() ?? null,
  };
}

export function formatRoomMember(membership: MembershipRecord, user: UserRecord | undefined, isOnline: boolean): RoomMember {
  return {
    user_id: membership.userId,
    username: user?.username ?? 'unknown',
    display_name: user?.displayName ?? null,
    role: membership.role,
    is_bot: user?.isBot ?? false,
    is_online: isOnline,
    joined_at: membership.joinedAt.toISOString(),
  };
}

export function formatSender(senderId: string | null, user: UserRecord | undefined): MessageSender {
  return {
    id: senderId,
    username: user?.username ?? null,
    display_name: user?.displayName ?? null,
    is_bot: user?.isBot ?? false,
  };
}

export function formatAttachment(row: AttachmentRecord): Attachment {
  return {
    id: row.id,
    url: row.url,
    filename: row.filename,
    size_bytes: row.sizeBytes,
    mime_type: row.mimeType,
  };
}

export function formatMessage(
  row: MessageRecord,
  sender: MessageSender,
  attachments: Attachment[],
  reactions: ReactionGroup[],
  mentions: string[],
  readByMe?: boolean,
): Message {
  const editedAt = row.state.kind === 'edited' ? row.state.editedAt.toISOString() : null;
  return {
    id: row.id,
    room_id: row.roomId,
    sender,
    content: row.content,
    reply_to_id: row.replyToId,
    is_edited: row.state.kind === 'edited',
    edited_at: editedAt,
    attachments,
    reactions,
    mentions,
    ...(readByMe !== undefined ? { read_by_me: readByMe } : {}),
    created_at: row.createdAt.toISOString(),
  };
}

export function formatPushSubscription(row: PushSubscriptionRecord): PushSubscription {
  return {
    id: row.id,
    token: row.token,
    platform: row.platform,
    created_at: row.createdAt.toISOString(),
  };
}
