import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { PUSH_PLATFORMS } from '../../db/schema/index.js';
import { formatPushSubscription } from '../../utils/format.js';

export const pushRouter = router({
  register: protectedProcedure
    .input(
      z.object({
        token: z.string().min(1).max(1024),
        platform: z.enum(PUSH_PLATFORMS).default('fcm'),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      // A token belongs to one device; re-registering moves it to the current user
      const sub = await ctx.services.store.upsertPushSubscription(ctx.user.id, input.token, input.platform);
      return formatPushSubscription(sub);
    }),

  remove: protectedProcedure
    .input(z.object({ token: z.string().min(1).max(1024) }))
    .mutation(async ({ ctx, input }) => {
      const removed = await ctx.services.store.deletePushSubscription(ctx.user.id, input.token);
      return { removed };
    }),

  list: protectedProcedure.query(async ({ ctx }) => {
    const subs = await ctx.services.store.listPushSubscriptions(ctx.user.id);
    return subs.map(formatPushSubscription);
  }),
});
