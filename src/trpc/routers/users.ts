import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { pageInput } from './pagination.js';

export const listUsersInput = pageInput.extend({
  search: z.string().max(100).optional(),
  include_bots: z.boolean().default(true),
});

export const usersRouter = router({
  list: protectedProcedure.input(listUsersInput).query(async ({ ctx, input }) => {
    return ctx.services.users.listUsers(
      ctx.user.id,
      { search: input.search, includeBots: input.include_bots },
      input.page,
      input.page_size,
    );
  }),
});
