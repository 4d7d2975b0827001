import type { ReactionGroup } from '../shared/types.js';
import type { ChatStore, MessageRecord } from './chat-store.js';
import { requireMember } from './access.js';
import type { IEventDispatcher } from '../ws/event-dispatcher.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';
import { groupReactions } from '../utils/message-helpers.js';

export interface ReactionResult {
  message_id: string;
  reactions: ReactionGroup[];
}

/** One reaction per user per message; reacting again with another emoji replaces it. */
export class ReactionService {
  constructor(
    private readonly store: ChatStore,
    private readonly dispatcher: IEventDispatcher,
  ) {}

  async addReaction(messageId: string, userId: string, emoji: string): Promise<ReactionResult> {
    const message = await this.requireReactable(messageId, userId);
    await this.store.upsertReaction(messageId, userId, emoji);
    return this.publish(message, userId, emoji, 'add');
  }

  async removeReaction(messageId: string, userId: string, emoji: string): Promise<ReactionResult & { removed: boolean }> {
    const message = await this.requireReactable(messageId, userId);
    const removed = await this.store.deleteReaction(messageId, userId, emoji);
    if (!removed) {
      const rows = await this.store.listReactions([messageId]);
      return { message_id: messageId, reactions: groupReactions(rows, userId), removed };
    }
    return { ...(await this.publish(message, userId, emoji, 'remove')), removed };
  }

  private async requireReactable(messageId: string, userId: string): Promise<MessageRecord> {
    const message = await this.store.getMessage(messageId);
    if (!message || message.state.kind === 'deleted') {
      throw chatError('NOT_FOUND', ChatErrorCode.MESSAGE_NOT_FOUND, 'Message not found');
    }
    await requireMember(this.store, message.roomId, userId);
    return message;
  }

  private async publish(
    message: MessageRecord,
    userId: string,
    emoji: string,
    action: 'add' | 'remove',
  ): Promise<ReactionResult> {
    const rows = await this.store.listReactions([message.id]);
    // `me` is per viewer; the broadcast copy is computed for the actor
    const reactions = groupReactions(rows, userId);
    this.dispatcher.dispatchToRoom(message.roomId, 'reaction_updated', {
      room_id: message.roomId,
      message_id: message.id,
      user_id: userId,
      emoji,
      action,
      reactions,
    });
    return { message_id: message.id, reactions };
  }
}
