import { z } from 'zod/v4';

/** Top-level WS message envelope */
export const wsMessageSchema = z.object({
  event: z.string(),
  data: z.unknown(),
  seq: z.number().optional(),
});

/** join_room / leave_room payload */
export const roomRefSchema = z.object({
  room_id: z.string().uuid(),
});

/** send_message payload: announces a message already persisted over HTTP */
export const sendMessageSchema = z.object({
  room_id: z.string().uuid(),
  message_id: z.string().uuid(),
});

/** typing payload */
export const typingSchema = z.object({
  room_id: z.string().uuid(),
  is_typing: z.boolean(),
});

/** mark_as_read payload */
export const markAsReadSchema = z.object({
  room_id: z.string().uuid(),
  message_ids: z.array(z.string().uuid()).max(500).default([]),
});
