import type { Message, ReactionGroup } from './types.js';

/** Top-level socket frame. */
export interface WsMessage<E extends string = string, D = unknown> {
  event: E;
  data: D;
  seq?: number;
}

/** Payloads of every server → client event, keyed by event name. */
export interface ServerEvents {
  connected: { session_id: string; user_id: string };
  room_joined: { room_id: string };
  room_left: { room_id: string };
  user_joined: { room_id: string; user_id: string };
  user_left: { room_id: string; user_id: string };
  new_message: { room_id: string; message: Message };
  message_edited: {
    room_id: string;
    message_id: string;
    content: string;
    edited_by: string;
    edited_at: string;
  };
  message_deleted: { room_id: string; message_id: string; deleted_by: string };
  reaction_updated: {
    room_id: string;
    message_id: string;
    user_id: string;
    emoji: string;
    action: 'add' | 'remove';
    reactions: ReactionGroup[];
  };
  messages_read: { room_id: string; user_id: string; message_ids: string[]; read_at: string };
  user_typing: { room_id: string; user_id: string; is_typing: boolean };
  user_status_change: { user_id: string; is_online: boolean; last_seen_at: string };
  typing: { room_id: string; user_id: string; user_type: 'ai'; is_typing: boolean };
  ai_error: { room_id: string; agent_type: string; error: string; original_message_id: string };
  global_message_alert: {
    room_id: string;
    room_name: string | null;
    message_id: string;
    message_preview: string;
    sender_name: string;
  };
  room_deleted: { room_id: string };
  heartbeat_ack: Record<string, never>;
  error: { message: string; event?: string };
}

export type ServerEventName = keyof ServerEvents;

export const WsCloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INVALID_PAYLOAD: 4001,
  NOT_AUTHENTICATED: 4003,
  SESSION_TIMEOUT: 4009,
  SERVER_SHUTDOWN: 4010,
} as const;
