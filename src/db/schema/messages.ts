import { pgTable, uuid, varchar, text, timestamp, index, type AnyPgColumn } from 'drizzle-orm/pg-core';
import { rooms } from './rooms.js';
import { users } from './users.js';

export const MESSAGE_STATUSES = ['active', 'edited', 'deleted'] as const;

export const messages = pgTable(
  'messages',
  {
    id: uuid('id').primaryKey(),
    roomId: uuid('room_id')
      .notNull()
      .references(() => rooms.id),
    // Null only for system-authored rows; bot replies carry the bot's reserved id
    senderId: uuid('sender_id').references(() => users.id),
    content: text('content').notNull(),
    replyToId: uuid('reply_to_id').references((): AnyPgColumn => messages.id),
    status: varchar('status', { length: 10, enum: MESSAGE_STATUSES }).notNull().default('active'),
    editedAt: timestamp('edited_at', { withTimezone: true }),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_messages_room').on(table.roomId, table.createdAt),
    index('idx_messages_reply').on(table.replyToId),
  ],
);
