import { beforeEach, describe, expect, it } from 'vitest';
import { createTestHarness, type TestHarness } from '../test-helpers/harness.js';
import type { RoomRecord, UserRecord } from './chat-store.js';

describe('ReadStateService.markRead', () => {
  let h: TestHarness;
  let alice: UserRecord;
  let bob: UserRecord;
  let room: RoomRecord;

  beforeEach(async () => {
    h = createTestHarness();
    alice = await h.user('alice');
    bob = await h.user('bob');
    room = await h.room('group', alice, [bob]);
  });

  it('is idempotent', async () => {
    const m1 = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'one' });
    const m2 = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'two' });
    await h.services.tasks.drain();
    expect((await h.store.getMembership(room.id, bob.id))?.unreadCount).toBe(2);

    const first = await h.services.readState.markRead(room.id, bob.id, [m1.id, m2.id]);
    const second = await h.services.readState.markRead(room.id, bob.id, [m1.id, m2.id, m1.id]);

    expect(first.marked).toBe(2);
    expect(second.marked).toBe(0);
    expect(h.store.receipts.filter((r) => r.userId === bob.id)).toHaveLength(2);
    expect((await h.store.getMembership(room.id, bob.id))?.unreadCount).toBe(0);
  });

  it('ignores ids that are unknown, deleted or from another room', async () => {
    const other = await h.room('group', alice, [bob]);
    const elsewhere = await h.services.messages.postMessage({ roomId: other.id, senderId: alice.id, content: 'x' });
    const deleted = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'y' });
    await h.services.messages.deleteMessage(deleted.id, alice.id);

    const result = await h.services.readState.markRead(room.id, bob.id, [
      elsewhere.id,
      deleted.id,
      '0190a000-0000-7000-8000-000000000000',
    ]);

    expect(result.marked).toBe(0);
    expect(h.store.receipts).toEqual([]);
  });

  it('tells the room only about ids that were readable, once each', async () => {
    const other = await h.room('group', alice, [bob]);
    const elsewhere = await h.services.messages.postMessage({ roomId: other.id, senderId: alice.id, content: 'x' });
    const message = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'hi' });
    await h.services.tasks.drain();
    const a = await h.connect(alice);
    await h.services.presence.joinRoom(a.sessionId, room.id);
    a.socket.clear();

    await h.services.readState.markRead(room.id, bob.id, [
      message.id,
      message.id,
      elsewhere.id,
      '0190a000-0000-7000-8000-000000000000',
    ]);

    expect(a.socket.events('messages_read')).toMatchObject([
      { room_id: room.id, user_id: bob.id, message_ids: [message.id] },
    ]);
  });

  it('clears the counter even with no ids', async () => {
    await h.store.incrementUnread(room.id, [bob.id]);
    await h.services.readState.markRead(room.id, bob.id, []);
    expect((await h.store.getMembership(room.id, bob.id))?.unreadCount).toBe(0);
  });

  it('requires membership', async () => {
    const carol = await h.user('carol');
    await expect(h.services.readState.markRead(room.id, carol.id, [])).rejects.toMatchObject({ code: 'FORBIDDEN' });
  });

  it('marks messages as read for the reader in listings', async () => {
    const message = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'read me' });
    await h.services.readState.markRead(room.id, bob.id, [message.id]);

    const page = await h.services.messages.listMessages(room.id, bob.id, 1, 50);
    expect(page.items[0]?.read_by_me).toBe(true);
  });
});
