/** API shapes returned by tRPC procedures, REST routes and socket events. */

export type RoomType = 'direct' | 'group' | 'topic';
export type MemberRole = 'admin' | 'member';
export type PushPlatform = 'fcm' | 'webpush';

export interface PublicUser {
  id: string;
  username: string;
  display_name: string | null;
  email: string;
  is_bot: boolean;
  is_online: boolean;
  last_seen_at: string | null;
}

export interface Channel {
  id: string;
  name: string;
  description: string | null;
  created_by: string;
  is_active: boolean;
  topic_count?: number;
  created_at: string;
}

export interface RoomMember {
  user_id: string;
  username: string;
  display_name: string | null;
  role: MemberRole;
  is_bot: boolean;
  is_online: boolean;
  joined_at: string;
}

export interface Room {
  id: string;
  type: RoomType;
  name: string | null;
  description: string | null;
  channel_id: string | null;
  created_by: string;
  created_at: string;
  updated_at: string;
}

export interface RoomSummary extends Room {
  unread_count: number;
  last_read_at: string | null;
}

export interface RoomDetail extends Room {
  members: RoomMember[];
}

export interface MessageSender {
  id: string | null;
  username: string | null;
  display_name: string | null;
  is_bot: boolean;
}

export interface Attachment {
  id: string;
  url: string;
  filename: string;
  size_bytes: number;
  mime_type: string;
}

export interface ReactionGroup {
  emoji: string;
  count: number;
  users: string[];
  me: boolean;
}

export interface Message {
  id: string;
  room_id: string;
  sender: MessageSender;
  content: string;
  reply_to_id: string | null;
  is_edited: boolean;
  edited_at: string | null;
  attachments: Attachment[];
  reactions: ReactionGroup[];
  mentions: string[];
  read_by_me?: boolean;
  created_at: string;
}

export interface MemberCandidate {
  user: PublicUser;
  is_member: boolean;
}

export interface Paginated<T> {
  items: T[];
  total: number;
  page: number;
  page_size: number;
  has_more: boolean;
}

export interface PushSubscription {
  id: string;
  token: string;
  platform: PushPlatform;
  created_at: string;
}

export interface UploadedFile {
  url: string;
  filename: string;
  size_bytes: number;
  mime_type: string;
}
