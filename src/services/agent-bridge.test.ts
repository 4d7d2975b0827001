import { afterEach, describe, expect, it, vi } from 'vitest';
import { AgentBridge, detectAgentMention, HttpAgentRunner, UnconfiguredAgentRunner } from './agent-bridge.js';
import { MemoryEventDispatcher } from '../ws/event-dispatcher.js';
import { FakeSocket } from '../test-helpers/fake-socket.js';
import { StubAgentRunner } from '../test-helpers/harness.js';
import { GENERAL_AI_BOT } from '../shared/bots.js';
import { ExternalServiceError } from '../utils/errors.js';

describe('detectAgentMention', () => {
  it.each([
    ['@emailAi draft a reply to this', 'emailAi', 'draft a reply to this'],
    ['@email ai draft it', 'emailAi', 'draft it'],
    ['  @SEARCHAI   where is the doc  ', 'searchAi', 'where is the doc'],
    ['@search ai where', 'searchAi', 'where'],
    ['@general what day is it', 'general', 'what day is it'],
    ['@general line one\nline two', 'general', 'line one\nline two'],
  ])('parses %j', (content, agentType, prompt) => {
    expect(detectAgentMention(content)).toEqual({ agentType, prompt });
  });

  it.each([
    'hello @emailAi draft',
    '@emailAi',
    '@emailAi   ',
    '@emailAidraft',
    '@marketingAi write copy',
    '',
  ])('ignores %j', (content) => {
    expect(detectAgentMention(content)).toBeNull();
  });
});

describe('HttpAgentRunner', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the prompt and returns the response text', async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) =>
        new Response(JSON.stringify({ response: 'done' }), { status: 200 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const runner = new HttpAgentRunner('http://agents.test/run', 5000);
    await expect(runner.run('summarize', 'user-1', 'general')).resolves.toBe('done');

    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('http://agents.test/run');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ prompt: 'summarize', user_id: 'user-1', agent_type: 'general' });
  });

  it('wraps failures as external service errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('nope', { status: 503 })),
    );
    const runner = new HttpAgentRunner('http://agents.test/run', 5000);
    await expect(runner.run('x', 'user-1', 'general')).rejects.toMatchObject({
      name: 'ExternalServiceError',
      service: 'agent',
      message: 'Agent runner responded 503',
    });
  });

  it('rejects unexpected bodies', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ text: 'wrong key' }), { status: 200 })),
    );
    const runner = new HttpAgentRunner('http://agents.test/run', 5000);
    await expect(runner.run('x', 'user-1', 'general')).rejects.toBeInstanceOf(ExternalServiceError);
  });
});

describe('AgentBridge.reply', () => {
  const trigger = { roomId: 'room-1', messageId: 'msg-1', senderId: 'user-1' };
  const mention = { agentType: 'general' as const, prompt: 'hello' };

  function setup() {
    const dispatcher = new MemoryEventDispatcher();
    const socket = new FakeSocket();
    dispatcher.addSession('s1', 'user-1', socket);
    dispatcher.joinRoom('s1', 'room-1');
    return { dispatcher, socket };
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the trimmed answer between typing indicators', async () => {
    const { dispatcher, socket } = setup();
    const runner = new StubAgentRunner();
    runner.reply = '  answer  ';
    const post = vi.fn(async () => undefined);

    const ok = await new AgentBridge(runner, dispatcher).reply(trigger, mention, post);

    expect(ok).toBe(true);
    expect(post).toHaveBeenCalledWith('room-1', 'general', 'answer', 'msg-1');
    expect(socket.eventNames()).toEqual(['typing', 'typing']);
    expect(socket.events('typing')).toEqual([
      { room_id: 'room-1', user_id: GENERAL_AI_BOT.id, user_type: 'ai', is_typing: true },
      { room_id: 'room-1', user_id: GENERAL_AI_BOT.id, user_type: 'ai', is_typing: false },
    ]);
  });

  it('treats an empty answer as a failure', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { dispatcher, socket } = setup();
    const runner = new StubAgentRunner();
    runner.reply = '   ';
    const post = vi.fn(async () => undefined);

    const ok = await new AgentBridge(runner, dispatcher).reply(trigger, mention, post);

    expect(ok).toBe(false);
    expect(post).not.toHaveBeenCalled();
    expect(socket.events('ai_error')).toEqual([
      { room_id: 'room-1', agent_type: 'general', error: 'Agent returned an empty response', original_message_id: 'msg-1' },
    ]);
  });

  it('reports an unconfigured runner', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { dispatcher, socket } = setup();

    const ok = await new AgentBridge(new UnconfiguredAgentRunner(), dispatcher).reply(trigger, mention, async () => {});

    expect(ok).toBe(false);
    expect(socket.eventNames()).toEqual(['typing', 'typing', 'ai_error']);
  });
});
