import argon2 from 'argon2';
import type { ChatStore, UserRecord } from '../../services/chat-store.js';
import { generateId } from '../../utils/ids.js';
import { chatError, ChatErrorCode } from '../../utils/errors.js';

export async function registerLocal(
  store: ChatStore,
  input: { email: string; username: string; password: string; displayName?: string | null },
): Promise<UserRecord> {
  const email = input.email.trim().toLowerCase();
  const username = input.username.trim();

  const taken = await store.findUserByEmailOrUsername(email, username);
  if (taken) {
    throw chatError('CONFLICT', ChatErrorCode.ACCOUNT_EXISTS, 'Email or username already registered');
  }

  const hash = await argon2.hash(input.password);
  return store.createUser({
    id: generateId(),
    email,
    username,
    displayName: input.displayName?.trim() || null,
    passwordHash: hash,
  });
}

export async function loginLocal(store: ChatStore, input: { email: string; password: string }): Promise<UserRecord> {
  const user = await store.findUserForLogin(input.email.trim().toLowerCase());
  if (!user?.passwordHash || !user.isActive) {
    throw chatError('UNAUTHORIZED', ChatErrorCode.INVALID_CREDENTIALS, 'Invalid credentials');
  }

  const valid = await argon2.verify(user.passwordHash, input.password);
  if (!valid) {
    throw chatError('UNAUTHORIZED', ChatErrorCode.INVALID_CREDENTIALS, 'Invalid credentials');
  }

  const { passwordHash: _passwordHash, ...profile } = user;
  return profile;
}
