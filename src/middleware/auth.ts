import type { ChatStore } from '../services/chat-store.js';
import { verifyAccessToken } from '../utils/jwt.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';

export interface AuthUser {
  id: string;
  username: string;
  displayName: string | null;
  isAdmin: boolean;
}

/** Extract the token from an `Authorization: Bearer <token>` header. */
export function bearerToken(header: string | undefined): string | null {
  if (!header?.startsWith('Bearer ')) return null;
  const token = header.slice(7).trim();
  return token.length > 0 ? token : null;
}

export async function verifyToken(store: ChatStore, token: string): Promise<AuthUser> {
  let userId: string;
  try {
    userId = (await verifyAccessToken(token)).sub;
  } catch {
    throw chatError('UNAUTHORIZED', ChatErrorCode.INVALID_TOKEN, 'Invalid or expired token');
  }

  const user = await store.getUser(userId);
  if (!user?.isActive) {
    throw chatError('UNAUTHORIZED', ChatErrorCode.INVALID_TOKEN, 'User not found or inactive');
  }
  return { id: user.id, username: user.username, displayName: user.displayName, isAdmin: user.isAdmin };
}
