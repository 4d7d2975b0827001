import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { pageInput } from './pagination.js';

const attachmentInput = z.object({
  url: z.string().min(1).max(1024),
  filename: z.string().min(1).max(255),
  size_bytes: z.number().int().min(0),
  mime_type: z.string().min(1).max(100),
});

const emojiInput = z.string().min(1).max(64);

export const listMessagesInput = pageInput.extend({ room_id: z.string().uuid() });

export const sendMessageInput = z.object({
  room_id: z.string().uuid(),
  content: z.string().max(10_000).default(''),
  reply_to_id: z.string().uuid().nullable().optional(),
  attachments: z.array(attachmentInput).max(10).default([]),
});

export const editMessageInput = z.object({ message_id: z.string().uuid(), content: z.string().min(1).max(10_000) });

export const messageRefInput = z.object({ message_id: z.string().uuid() });

export const reactionInput = z.object({ message_id: z.string().uuid(), emoji: emojiInput });

export const messagesRouter = router({
  list: protectedProcedure
    .input(listMessagesInput)
    .query(async ({ ctx, input }) => {
      return ctx.services.messages.listMessages(input.room_id, ctx.user.id, input.page, input.page_size);
    }),

  send: protectedProcedure
    .input(sendMessageInput)
    .mutation(async ({ ctx, input }) => {
      return ctx.services.messages.postMessage({
        roomId: input.room_id,
        senderId: ctx.user.id,
        content: input.content,
        replyToId: input.reply_to_id,
        attachments: input.attachments.map((a) => ({
          url: a.url,
          filename: a.filename,
          sizeBytes: a.size_bytes,
          mimeType: a.mime_type,
        })),
      });
    }),

  update: protectedProcedure
    .input(editMessageInput)
    .mutation(async ({ ctx, input }) => {
      return ctx.services.messages.editMessage(input.message_id, ctx.user.id, input.content);
    }),

  delete: protectedProcedure.input(messageRefInput).mutation(async ({ ctx, input }) => {
    return ctx.services.messages.deleteMessage(input.message_id, ctx.user.id);
  }),

  react: protectedProcedure
    .input(reactionInput)
    .mutation(async ({ ctx, input }) => {
      return ctx.services.reactions.addReaction(input.message_id, ctx.user.id, input.emoji);
    }),

  unreact: protectedProcedure
    .input(reactionInput)
    .mutation(async ({ ctx, input }) => {
      return ctx.services.reactions.removeReaction(input.message_id, ctx.user.id, input.emoji);
    }),
});
