import type { Message, Paginated } from '../shared/types.js';
import type { AttachmentInput, ChatStore, MessageRecord, RoomRecord } from './chat-store.js';
import type { PresenceRegistry } from './presence.js';
import type { ITaskQueue } from './task-queue.js';
import type { UnreadAccounting } from './unread.js';
import { detectAgentMention, type AgentBridge } from './agent-bridge.js';
import { displayName, requireMember, requireRoom } from './access.js';
import type { IEventDispatcher } from '../ws/event-dispatcher.js';
import { botForAgent, type AgentType } from '../shared/bots.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';
import { generateId } from '../utils/ids.js';
import { resolveMentions } from '../utils/mentions.js';
import { formatAttachment, formatMessage, formatSender } from '../utils/format.js';
import { hydrateMessages } from '../utils/message-helpers.js';
import { pageRequest, paginated } from '../utils/pagination.js';

export interface MessageDeps {
  store: ChatStore;
  presence: PresenceRegistry;
  dispatcher: IEventDispatcher;
  tasks: ITaskQueue;
  unread: UnreadAccounting;
  agents: AgentBridge;
}

export interface PostMessageInput {
  roomId: string;
  senderId: string;
  content: string;
  replyToId?: string | null;
  attachments?: AttachmentInput[];
}

export class MessageService {
  constructor(private readonly deps: MessageDeps) {}

  async postMessage(input: PostMessageInput): Promise<Message> {
    const { store, presence } = this.deps;
    const room = await requireRoom(store, input.roomId);
    await requireMember(store, room.id, input.senderId);

    const attachments = input.attachments ?? [];
    const content = input.content.trim();
    if (content.length === 0 && attachments.length === 0) {
      throw chatError('BAD_REQUEST', ChatErrorCode.EMPTY_MESSAGE, 'Message must have content or attachments');
    }

    const replyToId = input.replyToId ?? null;
    if (replyToId) {
      const parent = await store.getMessage(replyToId);
      if (!parent || parent.roomId !== room.id) {
        throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_REPLY, 'Reply target is not a message in this room');
      }
    }

    const message = await this.persist(room, input.senderId, content, replyToId, attachments, {
      advanceSenderReadState: presence.isActiveIn(input.senderId, room.id),
    });

    const mention = detectAgentMention(content);
    if (mention) {
      const trigger = { roomId: room.id, messageId: message.id, senderId: input.senderId };
      this.deps.tasks.enqueue(`agent-reply:${mention.agentType}`, async () => {
        await this.deps.agents.reply(trigger, mention, (roomId, agentType, text, replyTo) =>
          this.postBotMessage(roomId, agentType, text, replyTo),
        );
      });
    }

    return message;
  }

  /** Author a message as one of the reserved bots. No membership check. */
  async postBotMessage(roomId: string, agentType: AgentType, content: string, replyToId: string | null): Promise<Message> {
    const room = await requireRoom(this.deps.store, roomId);
    const bot = botForAgent(agentType);
    return this.persist(room, bot.id, content.trim(), replyToId, [], { advanceSenderReadState: false });
  }

  private async persist(
    room: RoomRecord,
    senderId: string,
    content: string,
    replyToId: string | null,
    attachments: AttachmentInput[],
    opts: { advanceSenderReadState: boolean },
  ): Promise<Message> {
    const { store, dispatcher, tasks, unread } = this.deps;

    const members = await store.listActiveMembers(room.id);
    const candidates = await store.getUsers(members.map((m) => m.userId));
    const mentionUserIds = resolveMentions(content, candidates);

    const created = await store.createMessage({
      id: generateId(),
      roomId: room.id,
      senderId,
      content,
      replyToId,
      attachments,
      mentionUserIds,
      advanceSenderReadState: opts.advanceSenderReadState,
    });

    const senderUser = candidates.find((u) => u.id === senderId) ?? (await store.getUser(senderId)) ?? undefined;
    const message = formatMessage(
      created.message,
      formatSender(senderId, senderUser),
      created.attachments.map(formatAttachment),
      [],
      created.mentionUserIds,
      true,
    );

    const senderName = displayName(senderUser);
    tasks.enqueue('message-fan-out', async () => {
      dispatcher.dispatchToRoom(room.id, 'new_message', { room_id: room.id, message });
      await unread.accountForMessage({
        message: created.message,
        senderName,
        roomName: room.name,
        mentionUserIds: created.mentionUserIds,
        hasAttachments: created.attachments.length > 0,
      });
    });

    return message;
  }

  async editMessage(messageId: string, userId: string, content: string): Promise<Message> {
    const { store, dispatcher } = this.deps;
    const existing = await this.requireLiveMessage(messageId);
    await requireMember(store, existing.roomId, userId);
    if (existing.senderId !== userId) {
      throw chatError('FORBIDDEN', ChatErrorCode.NOT_MESSAGE_SENDER, 'Only the sender can edit this message');
    }

    const trimmed = content.trim();
    if (trimmed.length === 0) {
      throw chatError('BAD_REQUEST', ChatErrorCode.EMPTY_MESSAGE, 'Message content cannot be empty');
    }

    const at = new Date();
    const updated = await store.editMessage(messageId, trimmed, at);
    if (!updated) {
      throw chatError('NOT_FOUND', ChatErrorCode.MESSAGE_NOT_FOUND, 'Message not found');
    }

    dispatcher.dispatchToRoom(updated.roomId, 'message_edited', {
      room_id: updated.roomId,
      message_id: updated.id,
      content: updated.content,
      edited_by: userId,
      edited_at: at.toISOString(),
    });

    return this.hydrateOne(userId, updated);
  }

  async deleteMessage(messageId: string, userId: string): Promise<{ success: true }> {
    const { store, dispatcher } = this.deps;
    const existing = await this.requireLiveMessage(messageId);
    await requireRoom(store, existing.roomId);

    const [membership, user] = await Promise.all([store.getMembership(existing.roomId, userId), store.getUser(userId)]);
    const member = membership?.isActive === true;
    if (existing.senderId === userId) {
      // Senders must still belong to the room unless they are global admins
      if (!member && !user?.isAdmin) {
        throw chatError('FORBIDDEN', ChatErrorCode.NOT_A_MEMBER, 'Not a member of this room');
      }
    } else if (!(member && membership?.role === 'admin') && !user?.isAdmin) {
      throw chatError('FORBIDDEN', ChatErrorCode.NOT_MESSAGE_SENDER, 'Not allowed to delete this message');
    }

    const deleted = await store.softDeleteMessage(messageId, new Date());
    if (!deleted) {
      throw chatError('NOT_FOUND', ChatErrorCode.MESSAGE_NOT_FOUND, 'Message not found');
    }

    dispatcher.dispatchToRoom(deleted.roomId, 'message_deleted', {
      room_id: deleted.roomId,
      message_id: deleted.id,
      deleted_by: userId,
    });
    return { success: true };
  }

  async listMessages(roomId: string, userId: string, page: number, pageSize: number): Promise<Paginated<Message>> {
    const { store } = this.deps;
    await requireRoom(store, roomId);
    await requireMember(store, roomId, userId);

    const result = await store.listMessages(roomId, pageRequest(page, pageSize));
    const items = await hydrateMessages(store, userId, result.items);
    return paginated(items, result.total, page, pageSize);
  }

  /** A persisted, non-deleted message the caller may see. */
  async getMessage(messageId: string, userId: string): Promise<Message> {
    const message = await this.requireLiveMessage(messageId);
    await requireMember(this.deps.store, message.roomId, userId);
    return this.hydrateOne(userId, message);
  }

  private async requireLiveMessage(messageId: string): Promise<MessageRecord> {
    const message = await this.deps.store.getMessage(messageId);
    if (!message || message.state.kind === 'deleted') {
      throw chatError('NOT_FOUND', ChatErrorCode.MESSAGE_NOT_FOUND, 'Message not found');
    }
    return message;
  }

  private async hydrateOne(userId: string, row: MessageRecord): Promise<Message> {
    const [message] = await hydrateMessages(this.deps.store, userId, [row]);
    if (!message) throw new Error(`Message ${row.id} could not be hydrated`);
    return message;
  }
}
