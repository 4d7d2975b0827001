import type { ChatStore } from './chat-store.js';
import { requireMember } from './access.js';
import type { IEventDispatcher } from '../ws/event-dispatcher.js';

export interface MarkReadResult {
  room_id: string;
  marked: number;
  read_at: string;
}

export class ReadStateService {
  constructor(
    private readonly store: ChatStore,
    private readonly dispatcher: IEventDispatcher,
  ) {}

  /**
   * Record receipts for the given messages and clear the room's unread
   * counter. Safe to repeat: existing receipts are left alone.
   */
  async markRead(roomId: string, userId: string, messageIds: string[]): Promise<MarkReadResult> {
    await requireMember(this.store, roomId, userId);

    const at = new Date();
    const { readableIds, inserted } = await this.store.markRead(roomId, userId, [...new Set(messageIds)], at);

    this.dispatcher.dispatchToRoom(
      roomId,
      'messages_read',
      { room_id: roomId, user_id: userId, message_ids: readableIds, read_at: at.toISOString() },
      { excludeUserId: userId },
    );
    return { room_id: roomId, marked: inserted, read_at: at.toISOString() };
  }
}
