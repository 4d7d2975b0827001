import type { ChatStore } from './chat-store.js';
import { ExternalServiceError } from '../utils/errors.js';

export type PushData = Record<string, string>;

export interface IPushGateway {
  /** Deliver one notification to one device token. Resolves false when the gateway refuses it. */
  send(token: string, title: string, body: string, data: PushData): Promise<boolean>;
}

/**
 * Posts notifications as JSON to a push relay that fronts FCM / WebPush.
 */
export class HttpPushGateway implements IPushGateway {
  constructor(
    private readonly url: string,
    private readonly apiKey?: string,
  ) {}

  async send(token: string, title: string, body: string, data: PushData): Promise<boolean> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ token, notification: { title, body }, data }),
      });
    } catch (err) {
      throw new ExternalServiceError('push', 'Push gateway unreachable', { cause: err });
    }
    return res.ok;
  }
}

/** Default gateway when none is configured: notifications are logged only. */
export class LogPushGateway implements IPushGateway {
  async send(token: string, title: string, body: string): Promise<boolean> {
    console.log(`[notify] ${token.slice(0, 8)}… ${title}: ${body}`);
    return true;
  }
}

export interface PushNotification {
  title: string;
  body: string;
  data: PushData;
}

export interface NewMessageNotice {
  roomId: string;
  roomName: string;
  messageId: string;
  senderId: string;
  senderName: string;
  preview: string;
  mentioned: boolean;
}

export function buildMessageNotification(notice: NewMessageNotice): PushNotification {
  return {
    title: notice.mentioned ? `${notice.senderName} mentioned you` : `New message from ${notice.senderName}`,
    body: `${notice.roomName}: ${notice.preview}`,
    data: {
      type: notice.mentioned ? 'mention' : 'new_message',
      room_id: notice.roomId,
      message_id: notice.messageId,
      sender_id: notice.senderId,
      sender_name: notice.senderName,
    },
  };
}

export class NotificationService {
  constructor(
    private readonly store: ChatStore,
    private readonly gateway: IPushGateway,
  ) {}

  /**
   * Send to every subscription of the user independently. Returns how many
   * sends the gateway accepted; failures are logged and never thrown.
   */
  async notifyUser(userId: string, notification: PushNotification): Promise<number> {
    const subs = await this.store.listPushSubscriptions(userId);
    if (subs.length === 0) return 0;

    const results = await Promise.allSettled(
      subs.map((s) => this.gateway.send(s.token, notification.title, notification.body, notification.data)),
    );

    let delivered = 0;
    results.forEach((r, i) => {
      if (r.status === 'fulfilled' && r.value) {
        delivered++;
        return;
      }
      const reason = r.status === 'rejected' ? r.reason : 'rejected by gateway';
      console.error(`[notify] push to ${userId} (subscription ${subs[i]?.id ?? '?'}) failed:`, reason);
    });
    return delivered;
  }
}
