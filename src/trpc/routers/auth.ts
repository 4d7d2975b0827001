import { z } from 'zod/v4';
import { router, publicProcedure, protectedProcedure } from '../init.js';
import { registerLocal, loginLocal } from './local-auth.js';
import { signAccessToken } from '../../utils/jwt.js';
import { formatUser } from '../../utils/format.js';
import { requireUser } from '../../services/access.js';

export const updateProfileInput = z.object({
  display_name: z.string().max(100).nullable().optional(),
});

export const authRouter = router({
  register: publicProcedure
    .input(
      z.object({
        email: z.string().email().max(320),
        username: z
          .string()
          .min(3)
          .max(32)
          .regex(/^[a-zA-Z0-9_.-]+$/),
        password: z.string().min(8).max(128),
        display_name: z.string().max(100).optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      const user = await registerLocal(ctx.services.store, {
        email: input.email,
        username: input.username,
        password: input.password,
        displayName: input.display_name,
      });
      console.log(`[auth] registered ${user.username} (${user.id})`);
      return { token: await signAccessToken(user.id), user: formatUser(user) };
    }),

  login: publicProcedure
    .input(z.object({ email: z.string().min(1), password: z.string().min(1) }))
    .mutation(async ({ ctx, input }) => {
      const user = await loginLocal(ctx.services.store, input);
      return { token: await signAccessToken(user.id), user: formatUser(user) };
    }),

  me: protectedProcedure.query(async ({ ctx }) => {
    const user = await requireUser(ctx.services.store, ctx.user.id);
    return formatUser(user);
  }),

  updateProfile: protectedProcedure.input(updateProfileInput).mutation(async ({ ctx, input }) => {
    return ctx.services.users.updateProfile(ctx.user.id, { displayName: input.display_name });
  }),
});
