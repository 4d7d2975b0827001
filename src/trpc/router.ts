import { router, publicProcedure, protectedProcedure, createCallerFactory } from './init.js';
import { authRouter } from './routers/auth.js';
import { channelsRouter } from './routers/channels.js';
import { roomsRouter } from './routers/rooms.js';
import { messagesRouter } from './routers/messages.js';
import { readStateRouter } from './routers/read-state.js';
import { pushRouter } from './routers/push.js';
import { usersRouter } from './routers/users.js';

export { router, publicProcedure, protectedProcedure };

export const appRouter = router({
  auth: authRouter,
  users: usersRouter,
  channels: channelsRouter,
  rooms: roomsRouter,
  messages: messagesRouter,
  readState: readStateRouter,
  push: pushRouter,
});

export type AppRouter = typeof appRouter;

export const createCaller = createCallerFactory(appRouter);
