import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestHarness, type TestHarness } from '../test-helpers/harness.js';
import type { UserRecord } from './chat-store.js';
import { BOTS } from '../shared/bots.js';
import { ChatErrorCode } from '../utils/errors.js';

describe('RoomService', () => {
  let h: TestHarness;
  let admin: UserRecord;
  let alice: UserRecord;
  let bob: UserRecord;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    h = createTestHarness();
    admin = await h.user('admin', { isAdmin: true });
    alice = await h.user('alice');
    bob = await h.user('bob');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createRoom', () => {
    it('returns the existing direct room for the same pair', async () => {
      const first = await h.services.rooms.createRoom(alice.id, { type: 'direct', memberIds: [bob.id] });
      const second = await h.services.rooms.createRoom(bob.id, { type: 'direct', memberIds: [alice.id] });

      expect(second.id).toBe(first.id);
      expect([...h.store.rooms.values()].filter((r) => r.type === 'direct')).toHaveLength(1);
      expect(first.members.map((m) => m.user_id).sort()).toEqual([alice.id, bob.id].sort());
    });

    it('requires exactly one other member for direct rooms', async () => {
      await expect(
        h.services.rooms.createRoom(alice.id, { type: 'direct', memberIds: [bob.id, admin.id] }),
      ).rejects.toMatchObject({ code: 'BAD_REQUEST', cause: { chatCode: ChatErrorCode.INVALID_MEMBERS } });
      await expect(
        h.services.rooms.createRoom(alice.id, { type: 'direct', memberIds: [alice.id] }),
      ).rejects.toMatchObject({ code: 'BAD_REQUEST' });
    });

    it('adds seeded bots to group rooms and makes the creator admin', async () => {
      await h.store.upsertBotUsers(
        BOTS.map((b) => ({ id: b.id, email: b.email, username: b.username, displayName: b.displayName })),
      );

      const room = await h.services.rooms.createRoom(alice.id, { type: 'group', name: ' Crew ', memberIds: [bob.id] });

      expect(room.name).toBe('Crew');
      expect(room.members).toHaveLength(5);
      expect(room.members.filter((m) => m.is_bot).map((m) => m.user_id).sort()).toEqual(BOTS.map((b) => b.id).sort());
      expect(room.members.find((m) => m.user_id === alice.id)?.role).toBe('admin');
      expect(room.members.find((m) => m.user_id === bob.id)?.role).toBe('member');
    });

    it('requires a name for group rooms', async () => {
      await expect(
        h.services.rooms.createRoom(alice.id, { type: 'group', name: '  ', memberIds: [bob.id] }),
      ).rejects.toMatchObject({ code: 'BAD_REQUEST', cause: { chatCode: ChatErrorCode.INVALID_ROOM } });
    });

    it('rejects unknown members', async () => {
      await expect(
        h.services.rooms.createRoom(alice.id, {
          type: 'group',
          name: 'Crew',
          memberIds: ['0190a000-0000-7000-8000-000000000000'],
        }),
      ).rejects.toMatchObject({ cause: { chatCode: ChatErrorCode.INVALID_MEMBERS } });
    });

    it('restricts topics to global admins and active channels', async () => {
      const channel = await h.services.channels.createChannel(admin.id, { name: 'general' });

      await expect(
        h.services.rooms.createRoom(alice.id, { type: 'topic', name: 'Q3', memberIds: [], channelId: channel.id }),
      ).rejects.toMatchObject({ code: 'FORBIDDEN', cause: { chatCode: ChatErrorCode.ADMIN_REQUIRED } });

      const topic = await h.services.rooms.createRoom(admin.id, {
        type: 'topic',
        name: 'Q3',
        memberIds: [alice.id],
        channelId: channel.id,
      });
      expect(topic.channel_id).toBe(channel.id);

      await h.services.channels.deactivateChannel(admin.id, channel.id);
      await expect(
        h.services.rooms.createRoom(admin.id, { type: 'topic', name: 'Q4', memberIds: [], channelId: channel.id }),
      ).rejects.toMatchObject({ code: 'NOT_FOUND', cause: { chatCode: ChatErrorCode.CHANNEL_NOT_FOUND } });
    });
  });

  describe('listRooms', () => {
    it('orders by recency and carries unread counts', async () => {
      const older = await h.room('group', alice, [bob], { name: 'Older' });
      const newer = await h.room('group', alice, [bob], { name: 'Newer' });
      await h.services.messages.postMessage({ roomId: older.id, senderId: alice.id, content: 'bump' });
      await h.services.tasks.drain();

      const page = await h.services.rooms.listRooms(bob.id, 1, 50);

      expect(page.items.map((r) => r.name)).toEqual(['Older', 'Newer']);
      expect(page.items[0]?.unread_count).toBe(1);
      expect(page.items[1]?.id).toBe(newer.id);
      expect(page).toMatchObject({ total: 2, page: 1, page_size: 50, has_more: false });
    });
  });

  describe('getRoom', () => {
    it('reports member presence', async () => {
      const room = await h.room('group', alice, [bob]);
      await h.connect(bob);

      const detail = await h.services.rooms.getRoom(room.id, alice.id);

      expect(detail.members.find((m) => m.user_id === bob.id)?.is_online).toBe(true);
      expect(detail.members.find((m) => m.user_id === alice.id)?.is_online).toBe(false);
    });

    it('lets global admins look at rooms they are not in', async () => {
      const room = await h.room('group', alice, [bob]);
      await expect(h.services.rooms.getRoom(room.id, admin.id)).resolves.toMatchObject({ id: room.id });
      const carol = await h.user('carol');
      await expect(h.services.rooms.getRoom(room.id, carol.id)).rejects.toMatchObject({ code: 'FORBIDDEN' });
    });
  });

  describe('membership changes', () => {
    it('lets room admins add and remove members', async () => {
      const room = await h.room('group', alice, [bob]);
      const carol = await h.user('carol');

      await h.services.rooms.addMember(room.id, alice.id, carol.id);
      expect((await h.store.getMembership(room.id, carol.id))?.isActive).toBe(true);

      await expect(h.services.rooms.addMember(room.id, bob.id, carol.id)).rejects.toMatchObject({
        code: 'FORBIDDEN',
        cause: { chatCode: ChatErrorCode.NOT_ROOM_ADMIN },
      });

      await h.services.rooms.removeMember(room.id, alice.id, carol.id);
      expect((await h.store.getMembership(room.id, carol.id))?.isActive).toBe(false);
    });

    it('resets unread state when a member is re-added', async () => {
      const room = await h.room('group', alice, [bob]);
      await h.store.incrementUnread(room.id, [bob.id]);
      await h.services.rooms.removeMember(room.id, bob.id, bob.id);
      await h.services.rooms.addMember(room.id, alice.id, bob.id);

      expect((await h.store.getMembership(room.id, bob.id))?.unreadCount).toBe(0);
    });

    it('drops the removed member out of the room broadcast', async () => {
      const room = await h.room('group', alice, [bob]);
      const b = await h.connect(bob);
      await h.services.presence.joinRoom(b.sessionId, room.id);

      await h.services.rooms.removeMember(room.id, alice.id, bob.id);

      expect(h.services.presence.isActiveIn(bob.id, room.id)).toBe(false);
      expect(b.socket.events('room_left')).toEqual([{ room_id: room.id }]);
    });

    it('keeps direct room membership fixed', async () => {
      const room = await h.room('direct', alice, [bob]);
      const carol = await h.user('carol');
      await expect(h.services.rooms.addMember(room.id, alice.id, carol.id)).rejects.toMatchObject({
        code: 'BAD_REQUEST',
      });
    });

    it('updates name and description for room admins', async () => {
      const room = await h.room('group', alice, [bob], { name: 'Old' });
      const updated = await h.services.rooms.updateRoom(room.id, alice.id, { name: ' New ', description: '' });
      expect(updated).toMatchObject({ name: 'New', description: null });
    });
  });

  describe('listMemberCandidates', () => {
    it('flags which people already belong', async () => {
      const room = await h.room('group', alice, [bob]);
      await h.user('carol');

      const page = await h.services.rooms.listMemberCandidates(room.id, alice.id, undefined, 1, 50);

      expect(page.items.map((c) => [c.user.username, c.is_member])).toEqual([
        ['admin', false],
        ['bob', true],
        ['carol', false],
      ]);
      expect(page.total).toBe(3);
    });

    it('filters by search', async () => {
      const room = await h.room('group', alice, [bob]);
      await h.user('carol');

      const page = await h.services.rooms.listMemberCandidates(room.id, alice.id, ' car ', 1, 50);

      expect(page.items.map((c) => c.user.username)).toEqual(['carol']);
    });

    it('is limited to room managers', async () => {
      const room = await h.room('group', alice, [bob]);
      await expect(h.services.rooms.listMemberCandidates(room.id, bob.id, undefined, 1, 50)).rejects.toMatchObject({
        code: 'FORBIDDEN',
        cause: { chatCode: ChatErrorCode.NOT_ROOM_ADMIN },
      });
    });
  });

  describe('deleteTopic', () => {
    it('removes the topic and everything in it', async () => {
      const channel = await h.services.channels.createChannel(admin.id, { name: 'eng' });
      const topic = await h.services.rooms.createRoom(admin.id, {
        type: 'topic',
        name: 'Incidents',
        memberIds: [alice.id, bob.id],
        channelId: channel.id,
      });
      const b = await h.connect(bob);
      await h.services.presence.joinRoom(b.sessionId, topic.id);

      const msg = await h.services.messages.postMessage({ roomId: topic.id, senderId: alice.id, content: 'hey @bob' });
      await h.services.reactions.addReaction(msg.id, bob.id, '👍');
      await h.services.readState.markRead(topic.id, bob.id, [msg.id]);
      await h.services.tasks.drain();

      await expect(h.services.rooms.deleteTopic(topic.id, admin.id)).resolves.toEqual({ success: true });

      expect([...h.store.messages.values()].filter((m) => m.roomId === topic.id)).toEqual([]);
      expect(h.store.mentions).toEqual([]);
      expect(h.store.reactions).toEqual([]);
      expect(h.store.receipts).toEqual([]);
      expect(h.store.memberships.filter((m) => m.roomId === topic.id)).toEqual([]);
      expect(b.socket.events('room_deleted')).toEqual([{ room_id: topic.id }]);
      expect(h.services.dispatcher.getSessionsInRoom(topic.id)).toEqual([]);
      await expect(h.services.rooms.getRoom(topic.id, admin.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('only deletes topics, and only for global admins', async () => {
      const group = await h.room('group', alice, [bob]);
      await expect(h.services.rooms.deleteTopic(group.id, admin.id)).rejects.toMatchObject({ code: 'BAD_REQUEST' });
      await expect(h.services.rooms.deleteTopic(group.id, alice.id)).rejects.toMatchObject({ code: 'FORBIDDEN' });
    });
  });
});
