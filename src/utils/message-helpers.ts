import type { Message, ReactionGroup } from '../shared/types.js';
import type { ChatStore, MessageRecord } from '../services/chat-store.js';
import { formatAttachment, formatMessage, formatSender } from './format.js';

/** Group flat reaction rows into ReactionGroup[] with `me` flag */
export function groupReactions(
  reactionRows: { emoji: string; userId: string }[],
  currentUserId: string,
): ReactionGroup[] {
  const groups = new Map<string, { emoji: string; users: string[] }>();
  for (const r of reactionRows) {
    const g = groups.get(r.emoji) ?? { emoji: r.emoji, users: [] };
    g.users.push(r.userId);
    groups.set(r.emoji, g);
  }
  return [...groups.values()].map((g) => ({
    emoji: g.emoji,
    count: g.users.length,
    users: g.users,
    me: g.users.includes(currentUserId),
  }));
}

function byMessage<T extends { messageId: string }>(rows: T[]): Map<string, T[]> {
  const map = new Map<string, T[]>();
  for (const row of rows) {
    const arr = map.get(row.messageId) ?? [];
    arr.push(row);
    map.set(row.messageId, arr);
  }
  return map;
}

/**
 * Batch-load senders, attachments, reactions, mentions and the viewer's
 * receipts for a set of messages, then format them into the API shape.
 */
export async function hydrateMessages(
  store: ChatStore,
  currentUserId: string,
  rows: MessageRecord[],
): Promise<Message[]> {
  if (rows.length === 0) return [];

  const msgIds = rows.map((m) => m.id);
  const senderIds = [...new Set(rows.flatMap((m) => (m.senderId ? [m.senderId] : [])))];

  const [senders, attachmentRows, reactionRows, mentionRows, readIds] = await Promise.all([
    store.getUsers(senderIds),
    store.listAttachments(msgIds),
    store.listReactions(msgIds),
    store.listMentions(msgIds),
    store.listReadMessageIds(currentUserId, msgIds),
  ]);

  const senderMap = new Map(senders.map((u) => [u.id, u]));
  const attachmentsByMsg = byMessage(attachmentRows);
  const reactionsByMsg = byMessage(reactionRows);
  const mentionsByMsg = byMessage(mentionRows);
  const read = new Set(readIds);

  return rows.map((m) => {
    const sender = formatSender(m.senderId, m.senderId ? senderMap.get(m.senderId) : undefined);
    return formatMessage(
      m,
      sender,
      (attachmentsByMsg.get(m.id) ?? []).map(formatAttachment),
      groupReactions(reactionsByMsg.get(m.id) ?? [], currentUserId),
      (mentionsByMsg.get(m.id) ?? []).map((r) => r.userId),
      m.senderId === currentUserId || read.has(m.id),
    );
  });
}

const PREVIEW_LENGTH = 100;

/** Short notification text for a message body. */
export function previewText(content: string, hasAttachments = false): string {
  const trimmed = content.trim();
  if (trimmed.length === 0) return hasAttachments ? 'Sent an attachment' : '';
  // Count code points so an emoji at the cut is never split
  const chars = [...trimmed];
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join('')}...` : trimmed;
}
