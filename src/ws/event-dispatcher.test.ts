import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryEventDispatcher } from './event-dispatcher.js';
import { FakeSocket } from '../test-helpers/fake-socket.js';

describe('MemoryEventDispatcher', () => {
  let dispatcher: MemoryEventDispatcher;
  let a1: FakeSocket;
  let a2: FakeSocket;
  let b: FakeSocket;

  beforeEach(() => {
    dispatcher = new MemoryEventDispatcher();
    a1 = new FakeSocket();
    a2 = new FakeSocket();
    b = new FakeSocket();
    dispatcher.addSession('a1', 'alice', a1);
    dispatcher.addSession('a2', 'alice', a2);
    dispatcher.addSession('b', 'bob', b);
  });

  it('numbers frames per session', () => {
    dispatcher.dispatchToSession('a1', 'heartbeat_ack', {});
    dispatcher.dispatchToAll('heartbeat_ack', {});
    expect(a1.frames.map((f) => f.seq)).toEqual([1, 2]);
    expect(b.frames.map((f) => f.seq)).toEqual([1]);
  });

  it('delivers room events to joined sessions only, honouring exclusions', () => {
    dispatcher.joinRoom('a1', 'r1');
    dispatcher.joinRoom('b', 'r1');

    dispatcher.dispatchToRoom('r1', 'room_joined', { room_id: 'r1' });
    dispatcher.dispatchToRoom('r1', 'user_left', { room_id: 'r1', user_id: 'x' }, { excludeUserId: 'bob' });
    dispatcher.dispatchToRoom('r1', 'user_joined', { room_id: 'r1', user_id: 'x' }, { excludeSessionId: 'a1' });

    expect(a1.eventNames()).toEqual(['room_joined', 'user_left']);
    expect(a2.eventNames()).toEqual([]);
    expect(b.eventNames()).toEqual(['room_joined', 'user_joined']);
  });

  it('reaches every session of a user', () => {
    dispatcher.dispatchToUser('alice', 'heartbeat_ack', {});
    expect([a1.frames.length, a2.frames.length, b.frames.length]).toEqual([1, 1, 0]);
  });

  it('skips sockets that are no longer open', () => {
    a1.readyState = 3;
    dispatcher.dispatchToUser('alice', 'heartbeat_ack', {});
    expect(a1.frames).toEqual([]);
    expect(a2.frames).toHaveLength(1);
  });

  it('reports join and leave transitions', () => {
    expect(dispatcher.joinRoom('a1', 'r1')).toBe(true);
    expect(dispatcher.joinRoom('a1', 'r1')).toBe(false);
    expect(dispatcher.leaveRoom('a1', 'r1')).toBe(true);
    expect(dispatcher.leaveRoom('a1', 'r1')).toBe(false);
    expect(dispatcher.getSessionsInRoom('r1')).toEqual([]);
  });

  it('removes sessions from every index', () => {
    dispatcher.joinRoom('a1', 'r1');
    dispatcher.removeSession('a1');
    expect(dispatcher.getSession('a1')).toBeUndefined();
    expect(dispatcher.getSessionsByUser('alice').map((s) => s.sessionId)).toEqual(['a2']);
    expect(dispatcher.getSessionsInRoom('r1')).toEqual([]);
  });

  it('closes everything on disconnectAll', () => {
    dispatcher.disconnectAll(4010, 'bye');
    expect(a1.closedWith).toEqual({ code: 4010, reason: 'bye' });
    expect(b.closedWith).toEqual({ code: 4010, reason: 'bye' });
    expect(dispatcher.getSessionsByUser('alice')).toEqual([]);
  });
});
