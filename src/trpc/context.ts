import type { IncomingMessage } from 'node:http';
import { TRPCError } from '@trpc/server';
import { bearerToken, verifyToken, type AuthUser } from '../middleware/auth.js';
import type { AppServices } from '../services/container.js';

export interface Context {
  user: AuthUser | null;
  services: AppServices;
}

/** Resolve the caller from the Authorization header. A bad token means an anonymous caller. */
export async function resolveUser(services: AppServices, req: IncomingMessage): Promise<AuthUser | null> {
  const token = bearerToken(req.headers.authorization);
  if (!token) return null;
  try {
    return await verifyToken(services.store, token);
  } catch (err) {
    if (err instanceof TRPCError && err.code === 'UNAUTHORIZED') return null;
    throw err;
  }
}

export function contextFactory(services: AppServices) {
  return async ({ req }: { req: IncomingMessage }): Promise<Context> => ({
    user: await resolveUser(services, req),
    services,
  });
}
