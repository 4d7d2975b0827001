import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { dispatchRest, type RestRequest } from './rest.js';
import { authUserOf, createTestHarness, type TestHarness } from '../test-helpers/harness.js';
import type { RoomRecord, UserRecord } from '../services/chat-store.js';
import type { AuthUser } from '../middleware/auth.js';

function request(method: string, path: string, body?: unknown): RestRequest {
  const url = new URL(path, 'http://localhost');
  return { method, pathname: url.pathname, query: url.searchParams, body };
}

describe('dispatchRest', () => {
  let h: TestHarness;
  let alice: UserRecord;
  let bob: UserRecord;
  let room: RoomRecord;
  let asAlice: AuthUser;
  let asBob: AuthUser;

  beforeEach(async () => {
    h = createTestHarness();
    alice = await h.user('alice');
    bob = await h.user('bob');
    room = await h.room('group', alice, [bob]);
    asAlice = authUserOf(alice);
    asBob = authUserOf(bob);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns null for paths it does not serve', async () => {
    expect(await dispatchRest(h.services, asAlice, request('GET', '/nothing/here'))).toBeNull();
  });

  it('rejects anonymous callers', async () => {
    const res = await dispatchRest(h.services, null, request('GET', '/rooms'));
    expect(res).toEqual({
      status: 401,
      body: { error: { code: 'UNAUTHORIZED', message: 'Authentication required', chat_code: null } },
    });
  });

  it('rejects unsupported methods on known paths', async () => {
    const res = await dispatchRest(h.services, asAlice, request('PUT', '/rooms'));
    expect(res?.status).toBe(405);
    expect(res?.body).toEqual({
      error: { code: 'METHOD_NOT_SUPPORTED', message: 'PUT not allowed on /rooms', chat_code: null },
    });
  });

  it('creates rooms with 201', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const res = await dispatchRest(
      h.services,
      asAlice,
      request('POST', '/rooms', { type: 'group', name: 'Design', member_ids: [bob.id] }),
    );
    expect(res?.status).toBe(201);
    expect(res?.body).toMatchObject({ type: 'group', name: 'Design' });
  });

  it('lists rooms, ignoring a trailing slash', async () => {
    const res = await dispatchRest(h.services, asAlice, request('GET', '/rooms/'));
    expect(res?.status).toBe(200);
    expect(res?.body).toMatchObject({ total: 1, page: 1, page_size: 50, has_more: false });
  });

  it('pages messages from the query string', async () => {
    for (const content of ['one', 'two', 'three']) {
      await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content });
    }
    await h.services.tasks.drain();

    const res = await dispatchRest(
      h.services,
      asBob,
      request('GET', `/rooms/${room.id}/messages?page=2&page_size=1`),
    );

    expect(res?.status).toBe(200);
    expect(res?.body).toMatchObject({ total: 3, page: 2, page_size: 1, has_more: true });
  });

  it('maps chat errors to their HTTP status and chat code', async () => {
    const res = await dispatchRest(h.services, asAlice, request('POST', '/messages', { room_id: room.id, content: '   ' }));
    expect(res).toEqual({
      status: 400,
      body: {
        error: { code: 'BAD_REQUEST', message: 'Message must have content or attachments', chat_code: 3000 },
      },
    });
  });

  it('maps membership failures to 403', async () => {
    const carol = await h.user('carol');
    const res = await dispatchRest(h.services, authUserOf(carol), request('GET', `/rooms/${room.id}/messages`));
    expect(res?.status).toBe(403);
    expect(res?.body).toMatchObject({ error: { code: 'FORBIDDEN', chat_code: 2000 } });
  });

  it('reports invalid input as 400 without a chat code', async () => {
    const res = await dispatchRest(h.services, asAlice, request('GET', '/rooms/not-a-uuid'));
    expect(res?.status).toBe(400);
    expect(res?.body).toMatchObject({ error: { code: 'BAD_REQUEST', chat_code: null } });
  });

  it('rejects malformed percent-encoding in path parameters', async () => {
    const res = await dispatchRest(h.services, asAlice, request('GET', '/rooms/%E0%A4%A'));
    expect(res).toEqual({
      status: 400,
      body: { error: { code: 'BAD_REQUEST', message: 'Malformed path parameter', chat_code: null } },
    });
  });

  it('decodes the emoji when removing a reaction', async () => {
    const message = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'hi' });
    await h.services.tasks.drain();
    await h.services.reactions.addReaction(message.id, bob.id, '👍');

    const res = await dispatchRest(
      h.services,
      asBob,
      request('DELETE', `/messages/${message.id}/reactions/${encodeURIComponent('👍')}`),
    );

    expect(res).toEqual({ status: 200, body: { message_id: message.id, reactions: [], removed: true } });
  });

  it('updates the caller profile', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const res = await dispatchRest(h.services, asAlice, request('PATCH', '/me', { display_name: 'Alice' }));
    expect(res?.status).toBe(200);
    expect(res?.body).toMatchObject({ id: alice.id, display_name: 'Alice' });
  });

  it('searches the user directory from the query string', async () => {
    const res = await dispatchRest(h.services, asAlice, request('GET', '/users?search=BO&include_bots=false'));
    expect(res?.status).toBe(200);
    expect(res?.body).toMatchObject({ total: 1, items: [{ id: bob.id, username: 'bob' }] });
  });

  it('lists channel topics', async () => {
    const admin = await h.user('admin', { isAdmin: true });
    const channel = await h.services.channels.createChannel(admin.id, { name: 'design' });
    const topic = await h.room('topic', admin, [bob], { name: 'Icons', channelId: channel.id });

    const res = await dispatchRest(h.services, asBob, request('GET', `/channels/${channel.id}/topics`));

    expect(res?.status).toBe(200);
    expect(res?.body).toMatchObject({ total: 1, items: [{ id: topic.id, name: 'Icons', unread_count: 0 }] });
  });

  it('marks messages read', async () => {
    const message = await h.services.messages.postMessage({ roomId: room.id, senderId: alice.id, content: 'hi' });
    await h.services.tasks.drain();

    const res = await dispatchRest(
      h.services,
      asBob,
      request('POST', `/rooms/${room.id}/read`, { message_ids: [message.id] }),
    );

    expect(res?.status).toBe(200);
    expect(res?.body).toMatchObject({ room_id: room.id, marked: 1 });
    expect((await h.store.getMembership(room.id, bob.id))?.unreadCount).toBe(0);
  });
});
