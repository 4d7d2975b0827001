import type { ChatStore, MessageRecord } from './chat-store.js';
import type { PresenceRegistry } from './presence.js';
import { buildMessageNotification, type NotificationService } from './notifications.js';
import type { IEventDispatcher } from '../ws/event-dispatcher.js';
import { previewText } from '../utils/message-helpers.js';

export interface UnreadDeps {
  store: ChatStore;
  presence: PresenceRegistry;
  notifications: NotificationService;
  dispatcher: IEventDispatcher;
}

export interface PostedMessage {
  message: MessageRecord;
  senderName: string;
  roomName: string | null;
  mentionUserIds: string[];
  hasAttachments: boolean;
}

export interface AccountingResult {
  /** Members whose unread counter went up. */
  incremented: string[];
  /** Members for whom push delivery was attempted. */
  notified: string[];
}

/**
 * Decides who has to be told about a new message once it is committed.
 * Members viewing the room see it live; everyone else gets a counter bump
 * and a push to each of their devices.
 */
export class UnreadAccounting {
  constructor(private readonly deps: UnreadDeps) {}

  async accountForMessage(posted: PostedMessage): Promise<AccountingResult> {
    const { store, presence, notifications, dispatcher } = this.deps;
    const { message } = posted;

    const members = await store.listActiveMembers(message.roomId);
    const otherIds = members.map((m) => m.userId).filter((id) => id !== message.senderId);
    const recipients = (await store.getUsers(otherIds)).filter((u) => u.isActive && !u.isBot);
    if (recipients.length === 0) return { incremented: [], notified: [] };

    const preview = previewText(message.content, posted.hasAttachments);
    for (const r of recipients) {
      dispatcher.dispatchToUser(r.id, 'global_message_alert', {
        room_id: message.roomId,
        room_name: posted.roomName,
        message_id: message.id,
        message_preview: preview,
        sender_name: posted.senderName,
      });
    }

    const away = recipients.filter((r) => !presence.isActiveIn(r.id, message.roomId)).map((r) => r.id);
    if (away.length === 0) return { incremented: [], notified: [] };

    await store.incrementUnread(message.roomId, away);

    const mentioned = new Set(posted.mentionUserIds);
    const results = await Promise.allSettled(
      away.map((userId) =>
        notifications.notifyUser(
          userId,
          buildMessageNotification({
            roomId: message.roomId,
            roomName: posted.roomName ?? 'Direct message',
            messageId: message.id,
            senderId: message.senderId ?? '',
            senderName: posted.senderName,
            preview,
            mentioned: mentioned.has(userId),
          }),
        ),
      ),
    );

    const notified: string[] = [];
    results.forEach((r, i) => {
      const userId = away[i];
      if (userId === undefined) return;
      if (r.status === 'fulfilled') {
        notified.push(userId);
      } else {
        console.error(`[notify] notifying ${userId} failed:`, r.reason);
      }
    });
    return { incremented: away, notified };
  }
}
