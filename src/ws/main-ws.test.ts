import { beforeEach, describe, expect, it } from 'vitest';
import { handleClientFrame } from './main-ws.js';
import { createTestHarness, type TestHarness } from '../test-helpers/harness.js';
import type { FakeSocket } from '../test-helpers/fake-socket.js';
import type { RoomRecord, UserRecord } from '../services/chat-store.js';
import { WsCloseCode } from '../shared/events.js';

describe('handleClientFrame', () => {
  let h: TestHarness;
  let alice: UserRecord;
  let bob: UserRecord;
  let room: RoomRecord;
  let a: { socket: FakeSocket; sessionId: string };
  let b: { socket: FakeSocket; sessionId: string };

  function frame(sessionId: string, event: string, data: unknown) {
    return handleClientFrame(h.services, sessionId, JSON.stringify({ event, data }));
  }

  beforeEach(async () => {
    h = createTestHarness();
    alice = await h.user('alice');
    bob = await h.user('bob');
    room = await h.room('group', alice, [bob]);
    a = await h.connect(alice);
    b = await h.connect(bob);
    a.socket.clear();
    b.socket.clear();
  });

  it('acknowledges heartbeats', async () => {
    await frame(a.sessionId, 'heartbeat', {});
    expect(a.socket.events('heartbeat_ack')).toEqual([{}]);
  });

  it('closes the socket on unparsable JSON', async () => {
    await handleClientFrame(h.services, a.sessionId, '{not json');
    expect(a.socket.closedWith).toEqual({ code: WsCloseCode.INVALID_PAYLOAD, reason: 'Invalid JSON' });
  });

  it('answers malformed envelopes and payloads with errors', async () => {
    await handleClientFrame(h.services, a.sessionId, JSON.stringify({ data: {} }));
    await frame(a.sessionId, 'join_room', { room_id: 'nope' });
    await frame(a.sessionId, 'dance', {});

    expect(a.socket.events('error')).toEqual([
      { message: 'Invalid message envelope' },
      { message: 'Invalid payload', event: 'join_room' },
      { message: 'Unknown event: dance', event: 'dance' },
    ]);
    expect(a.socket.closedWith).toBeNull();
  });

  it('joins rooms and reports refusals', async () => {
    const other = await h.room('group', bob, []);

    await frame(a.sessionId, 'join_room', { room_id: room.id });
    await frame(a.sessionId, 'join_room', { room_id: other.id });

    expect(a.socket.events('room_joined')).toEqual([{ room_id: room.id }]);
    expect(a.socket.events('error')).toEqual([{ message: 'Not a member of this room', event: 'join_room' }]);
  });

  it('leaves rooms', async () => {
    await frame(a.sessionId, 'join_room', { room_id: room.id });
    await frame(a.sessionId, 'leave_room', { room_id: room.id });
    expect(h.services.presence.isActiveIn(alice.id, room.id)).toBe(false);
  });

  describe('typing', () => {
    it('requires joining the room first', async () => {
      await frame(a.sessionId, 'typing', { room_id: room.id, is_typing: true });
      expect(a.socket.events('error')).toEqual([{ message: 'Join the room first', event: 'typing' }]);
    });

    it('throttles typing starts but always forwards stops', async () => {
      await frame(a.sessionId, 'join_room', { room_id: room.id });
      await frame(b.sessionId, 'join_room', { room_id: room.id });
      a.socket.clear();
      b.socket.clear();

      await frame(a.sessionId, 'typing', { room_id: room.id, is_typing: true });
      await frame(a.sessionId, 'typing', { room_id: room.id, is_typing: true });
      await frame(a.sessionId, 'typing', { room_id: room.id, is_typing: false });

      expect(b.socket.events('user_typing')).toEqual([
        { room_id: room.id, user_id: alice.id, is_typing: true },
        { room_id: room.id, user_id: alice.id, is_typing: false },
      ]);
      expect(a.socket.events('user_typing')).toEqual([]);
    });
  });

  describe('send_message', () => {
    it('relays a stored message to the room except the sending session', async () => {
      const a2 = await h.connect(alice);
      for (const s of [a, a2, b]) await frame(s.sessionId, 'join_room', { room_id: room.id });
      const message = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'hello' });
      await h.services.tasks.drain();
      for (const s of [a, a2, b]) s.socket.clear();

      await frame(a.sessionId, 'send_message', { room_id: room.id, message_id: message.id });

      expect(a.socket.eventNames()).toEqual([]);
      expect(a2.socket.eventNames()).toEqual(['new_message']);
      expect(b.socket.events('new_message')).toMatchObject([
        { room_id: room.id, message: { id: message.id, content: 'hello', sender: { id: alice.id } } },
      ]);
    });

    it('refuses to relay another user\'s message', async () => {
      const message = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'hello' });
      await h.services.tasks.drain();

      await frame(b.sessionId, 'send_message', { room_id: room.id, message_id: message.id });

      expect(b.socket.events('error')).toEqual([{ message: 'Message not found in this room', event: 'send_message' }]);
    });
  });

  it('marks messages read and tells the room', async () => {
    await frame(a.sessionId, 'join_room', { room_id: room.id });
    const message = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'hello' });
    await h.services.tasks.drain();
    a.socket.clear();

    await frame(b.sessionId, 'mark_as_read', { room_id: room.id, message_ids: [message.id] });

    expect(a.socket.events('messages_read')).toMatchObject([
      { room_id: room.id, user_id: bob.id, message_ids: [message.id] },
    ]);
    expect((await h.store.getMembership(room.id, bob.id))?.unreadCount).toBe(0);
  });
});
