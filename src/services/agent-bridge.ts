import { z } from 'zod/v4';
import type { IEventDispatcher } from '../ws/event-dispatcher.js';
import { botForAgent, type AgentType } from '../shared/bots.js';
import { ExternalServiceError } from '../utils/errors.js';

export interface AgentMention {
  agentType: AgentType;
  prompt: string;
}

const AGENT_NAMES: Record<string, AgentType> = {
  emailai: 'emailAi',
  searchai: 'searchAi',
  general: 'general',
};

// `@emailAi`, `@email ai` and `@EMAILAI` all address the same agent
const AGENT_MENTION_PATTERN = /^@(email ?ai|search ?ai|general)\s+([\s\S]+)$/i;

export function detectAgentMention(content: string): AgentMention | null {
  const match = AGENT_MENTION_PATTERN.exec(content.trim());
  if (!match) return null;
  const [, name, rest] = match;
  if (name === undefined || rest === undefined) return null;

  const agentType = AGENT_NAMES[name.replace(/\s+/g, '').toLowerCase()];
  const prompt = rest.trim();
  if (!agentType || prompt.length === 0) return null;
  return { agentType, prompt };
}

export interface IAgentRunner {
  run(prompt: string, userId: string, agentType: AgentType): Promise<string>;
}

const agentResponseSchema = z.object({
  response: z.string(),
});

export class HttpAgentRunner implements IAgentRunner {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
  ) {}

  async run(prompt: string, userId: string, agentType: AgentType): Promise<string> {
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ prompt, user_id: userId, agent_type: agentType }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ExternalServiceError('agent', 'Agent runner unreachable', { cause: err });
    }

    if (!res.ok) {
      throw new ExternalServiceError('agent', `Agent runner responded ${res.status}`);
    }

    const parsed = agentResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ExternalServiceError('agent', 'Agent runner returned an unexpected body');
    }
    return parsed.data.response;
  }
}

export class UnconfiguredAgentRunner implements IAgentRunner {
  async run(): Promise<string> {
    throw new ExternalServiceError('agent', 'No agent runner is configured');
  }
}

export interface AgentTrigger {
  roomId: string;
  messageId: string;
  senderId: string;
}

/** Persists a bot reply through the regular message path. */
export type PostBotReply = (roomId: string, agentType: AgentType, content: string, replyToId: string) => Promise<unknown>;

export class AgentBridge {
  constructor(
    private readonly runner: IAgentRunner,
    private readonly dispatcher: IEventDispatcher,
  ) {}

  /** Never throws: a failed run is reported to the room as `ai_error`. */
  async reply(trigger: AgentTrigger, mention: AgentMention, post: PostBotReply): Promise<boolean> {
    const bot = botForAgent(mention.agentType);
    this.setTyping(trigger.roomId, bot.id, true);

    try {
      const text = (await this.runner.run(mention.prompt, trigger.senderId, mention.agentType)).trim();
      if (text.length === 0) {
        throw new ExternalServiceError('agent', 'Agent returned an empty response');
      }
      await post(trigger.roomId, mention.agentType, text, trigger.messageId);
      this.setTyping(trigger.roomId, bot.id, false);
      return true;
    } catch (err) {
      this.setTyping(trigger.roomId, bot.id, false);
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[agent] ${mention.agentType} reply to ${trigger.messageId} failed:`, message);
      this.dispatcher.dispatchToRoom(trigger.roomId, 'ai_error', {
        room_id: trigger.roomId,
        agent_type: mention.agentType,
        error: message,
        original_message_id: trigger.messageId,
      });
      return false;
    }
  }

  private setTyping(roomId: string, botId: string, isTyping: boolean) {
    this.dispatcher.dispatchToRoom(roomId, 'typing', {
      room_id: roomId,
      user_id: botId,
      user_type: 'ai',
      is_typing: isTyping,
    });
  }
}
