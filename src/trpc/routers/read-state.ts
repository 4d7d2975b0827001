import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';

export const markReadInput = z.object({
  room_id: z.string().uuid(),
  message_ids: z.array(z.string().uuid()).max(500).default([]),
});

export const readStateRouter = router({
  markRead: protectedProcedure
    .input(markReadInput)
    .mutation(async ({ ctx, input }) => {
      return ctx.services.readState.markRead(input.room_id, ctx.user.id, input.message_ids);
    }),
});
