import type { MemberCandidate, Paginated, Room, RoomDetail, RoomSummary, RoomType, MemberRole } from '../shared/types.js';
import type { ChatStore, RoomRecord } from './chat-store.js';
import type { PresenceRegistry } from './presence.js';
import { requireGlobalAdmin, requireRoom, requireRoomManager, requireUser } from './access.js';
import type { IEventDispatcher } from '../ws/event-dispatcher.js';
import { BOTS } from '../shared/bots.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';
import { generateId } from '../utils/ids.js';
import { formatRoom, formatRoomMember, formatRoomSummary, formatUser } from '../utils/format.js';
import { pageRequest, paginated } from '../utils/pagination.js';

export interface CreateRoomInput {
  type: RoomType;
  name?: string | null;
  description?: string | null;
  memberIds: string[];
  channelId?: string | null;
}

export interface RoomDeps {
  store: ChatStore;
  presence: PresenceRegistry;
  dispatcher: IEventDispatcher;
}

export class RoomService {
  constructor(private readonly deps: RoomDeps) {}

  async createRoom(creatorId: string, input: CreateRoomInput): Promise<RoomDetail> {
    const { store } = this.deps;
    await requireUser(store, creatorId);
    const others = [...new Set(input.memberIds)].filter((id) => id !== creatorId);
    const name = input.name?.trim() || null;
    const description = input.description?.trim() || null;

    const members: Array<{ userId: string; role: MemberRole }> = [{ userId: creatorId, role: 'admin' }];
    let channelId: string | null = null;

    switch (input.type) {
      case 'direct': {
        const [peerId] = others;
        if (others.length !== 1 || peerId === undefined) {
          throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_MEMBERS, 'A direct room needs exactly one other member');
        }
        await this.requireUsers([peerId]);
        const existing = await store.findDirectRoom(creatorId, peerId);
        if (existing) return this.getRoom(existing.id, creatorId);
        members.push({ userId: peerId, role: 'member' });
        break;
      }
      case 'group': {
        if (!name) {
          throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_ROOM, 'A group room needs a name');
        }
        await this.requireUsers(others);
        for (const id of others) members.push({ userId: id, role: 'member' });
        // Bots are only present when seeded
        const bots = await store.getUsers(BOTS.map((b) => b.id).filter((id) => !others.includes(id)));
        for (const bot of bots) members.push({ userId: bot.id, role: 'member' });
        break;
      }
      case 'topic': {
        await requireGlobalAdmin(store, creatorId);
        if (!name) {
          throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_ROOM, 'A topic needs a name');
        }
        const channel = input.channelId ? await store.getChannel(input.channelId) : null;
        if (!channel?.isActive) {
          throw chatError('NOT_FOUND', ChatErrorCode.CHANNEL_NOT_FOUND, 'Channel not found');
        }
        channelId = channel.id;
        await this.requireUsers(others);
        for (const id of others) members.push({ userId: id, role: 'member' });
        break;
      }
    }

    const room = await store.createRoom(
      { id: generateId(), type: input.type, name, description, channelId, createdBy: creatorId },
      members,
    );
    console.log(`[rooms] ${creatorId} created ${room.type} room ${room.id}`);
    return this.getRoom(room.id, creatorId);
  }

  async listRooms(userId: string, page: number, pageSize: number): Promise<Paginated<RoomSummary>> {
    const result = await this.deps.store.listRoomsForUser(userId, pageRequest(page, pageSize));
    const items = result.items.map(({ room, membership }) => formatRoomSummary(room, membership));
    return paginated(items, result.total, page, pageSize);
  }

  async getRoom(roomId: string, userId: string): Promise<RoomDetail> {
    const { store, presence } = this.deps;
    const room = await requireRoom(store, roomId);
    await this.requireViewer(room, userId);

    const memberships = await store.listActiveMembers(room.id);
    const users = await store.getUsers(memberships.map((m) => m.userId));
    const userMap = new Map(users.map((u) => [u.id, u]));
    return {
      ...formatRoom(room),
      members: memberships.map((m) => formatRoomMember(m, userMap.get(m.userId), presence.isOnline(m.userId))),
    };
  }

  async updateRoom(
    roomId: string,
    userId: string,
    patch: { name?: string; description?: string | null },
  ): Promise<Room> {
    const { store } = this.deps;
    const room = await requireRoom(store, roomId);
    await requireRoomManager(store, room.id, userId);

    const changes: { name?: string; description?: string | null } = {};
    if (patch.name !== undefined) {
      const name = patch.name.trim();
      if (!name) throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_ROOM, 'Room name cannot be empty');
      changes.name = name;
    }
    if (patch.description !== undefined) changes.description = patch.description?.trim() || null;

    const updated = await store.updateRoom(room.id, changes);
    if (!updated) throw chatError('NOT_FOUND', ChatErrorCode.ROOM_NOT_FOUND, 'Room not found');
    return formatRoom(updated);
  }

  async addMember(roomId: string, actorId: string, userId: string): Promise<{ success: true }> {
    const { store } = this.deps;
    const room = await requireRoom(store, roomId);
    this.requireMutableMembership(room);
    await requireRoomManager(store, room.id, actorId);
    await requireUser(store, userId);

    const existing = await store.getMembership(room.id, userId);
    if (!existing?.isActive) {
      await store.upsertMembership(room.id, userId, 'member', new Date());
    }
    return { success: true };
  }

  /** People a room manager can pick from, flagged with whether they already belong. */
  async listMemberCandidates(
    roomId: string,
    userId: string,
    search: string | undefined,
    page: number,
    pageSize: number,
  ): Promise<Paginated<MemberCandidate>> {
    const { store } = this.deps;
    const room = await requireRoom(store, roomId);
    await requireRoomManager(store, room.id, userId);

    const [result, members] = await Promise.all([
      store.listUsers(
        { excludeUserId: userId, search: search?.trim() || undefined, includeBots: false },
        pageRequest(page, pageSize),
      ),
      store.listActiveMembers(room.id),
    ]);
    const memberIds = new Set(members.map((m) => m.userId));
    const items = result.items.map((u) => ({ user: formatUser(u), is_member: memberIds.has(u.id) }));
    return paginated(items, result.total, page, pageSize);
  }

  async removeMember(roomId: string, actorId: string, userId: string): Promise<{ success: true }> {
    const { store, presence } = this.deps;
    const room = await requireRoom(store, roomId);
    this.requireMutableMembership(room);
    if (actorId !== userId) await requireRoomManager(store, room.id, actorId);

    const removed = await store.deactivateMembership(room.id, userId);
    if (!removed) {
      throw chatError('NOT_FOUND', ChatErrorCode.USER_NOT_FOUND, 'User is not a member of this room');
    }
    presence.evictFromRoom(userId, room.id);
    return { success: true };
  }

  /** Hard-deletes a topic and everything in it. */
  async deleteTopic(roomId: string, userId: string): Promise<{ success: true }> {
    const { store, dispatcher } = this.deps;
    await requireGlobalAdmin(store, userId);
    const room = await store.getRoom(roomId);
    if (!room) throw chatError('NOT_FOUND', ChatErrorCode.ROOM_NOT_FOUND, 'Room not found');
    if (room.type !== 'topic') {
      throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_ROOM, 'Only topics can be deleted');
    }

    await store.deleteRoomCascade(room.id);

    dispatcher.dispatchToRoom(room.id, 'room_deleted', { room_id: room.id });
    for (const session of dispatcher.getSessionsInRoom(room.id)) {
      dispatcher.leaveRoom(session.sessionId, room.id);
    }
    console.log(`[rooms] ${userId} deleted topic ${room.id}`);
    return { success: true };
  }

  private async requireViewer(room: RoomRecord, userId: string): Promise<void> {
    const { store } = this.deps;
    const [membership, user] = await Promise.all([store.getMembership(room.id, userId), store.getUser(userId)]);
    if (membership?.isActive || user?.isAdmin) return;
    throw chatError('FORBIDDEN', ChatErrorCode.NOT_A_MEMBER, 'Not a member of this room');
  }

  private requireMutableMembership(room: RoomRecord): void {
    if (room.type === 'direct') {
      throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_ROOM, 'Direct room membership cannot change');
    }
  }

  private async requireUsers(userIds: string[]): Promise<void> {
    if (userIds.length === 0) return;
    const found = await this.deps.store.getUsers(userIds);
    if (found.filter((u) => u.isActive).length !== userIds.length) {
      throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_MEMBERS, 'One or more members do not exist');
    }
  }
}
