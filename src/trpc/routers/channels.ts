import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { pageInput } from './pagination.js';

export const channelTopicsInput = pageInput.extend({ channel_id: z.string().uuid() });

export const channelsRouter = router({
  list: protectedProcedure.query(async ({ ctx }) => {
    return ctx.services.channels.listChannels();
  }),

  create: protectedProcedure
    .input(
      z.object({
        name: z.string().min(1).max(100),
        description: z.string().max(1024).nullable().optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.services.channels.createChannel(ctx.user.id, input);
    }),

  update: protectedProcedure
    .input(
      z.object({
        channel_id: z.string().uuid(),
        name: z.string().min(1).max(100).optional(),
        description: z.string().max(1024).nullable().optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.services.channels.updateChannel(ctx.user.id, input.channel_id, {
        name: input.name,
        description: input.description,
      });
    }),

  topics: protectedProcedure.input(channelTopicsInput).query(async ({ ctx, input }) => {
    return ctx.services.channels.listTopics(input.channel_id, ctx.user.id, input.page, input.page_size);
  }),

  deactivate: protectedProcedure
    .input(z.object({ channel_id: z.string().uuid() }))
    .mutation(async ({ ctx, input }) => {
      return ctx.services.channels.deactivateChannel(ctx.user.id, input.channel_id);
    }),
});
