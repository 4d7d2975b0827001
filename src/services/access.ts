import type { ChatStore, MembershipRecord, RoomRecord, UserRecord } from './chat-store.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';

export async function requireRoom(store: ChatStore, roomId: string): Promise<RoomRecord> {
  const room = await store.getRoom(roomId);
  if (!room?.isActive) {
    throw chatError('NOT_FOUND', ChatErrorCode.ROOM_NOT_FOUND, 'Room not found');
  }
  return room;
}

export async function requireMember(store: ChatStore, roomId: string, userId: string): Promise<MembershipRecord> {
  const membership = await store.getMembership(roomId, userId);
  if (!membership?.isActive) {
    throw chatError('FORBIDDEN', ChatErrorCode.NOT_A_MEMBER, 'Not a member of this room');
  }
  return membership;
}

export async function requireUser(store: ChatStore, userId: string): Promise<UserRecord> {
  const user = await store.getUser(userId);
  if (!user?.isActive) {
    throw chatError('NOT_FOUND', ChatErrorCode.USER_NOT_FOUND, 'User not found');
  }
  return user;
}

export async function requireGlobalAdmin(store: ChatStore, userId: string): Promise<UserRecord> {
  const user = await requireUser(store, userId);
  if (!user.isAdmin) {
    throw chatError('FORBIDDEN', ChatErrorCode.ADMIN_REQUIRED, 'Administrator privileges required');
  }
  return user;
}

/** Room admins and global admins may manage a room. */
export async function requireRoomManager(store: ChatStore, roomId: string, userId: string): Promise<void> {
  const [membership, user] = await Promise.all([store.getMembership(roomId, userId), store.getUser(userId)]);
  if (user?.isAdmin) return;
  if (membership?.isActive && membership.role === 'admin') return;
  throw chatError('FORBIDDEN', ChatErrorCode.NOT_ROOM_ADMIN, 'Room admin privileges required');
}

export function displayName(user: Pick<UserRecord, 'displayName' | 'username'> | null | undefined): string {
  return user?.displayName ?? user?.username ?? 'Someone';
}
