import { pgTable, uuid, varchar, timestamp, index, unique } from 'drizzle-orm/pg-core';
import { messages } from './messages.js';
import { users } from './users.js';

export const reactions = pgTable(
  'reactions',
  {
    id: uuid('id').primaryKey(),
    messageId: uuid('message_id')
      .notNull()
      .references(() => messages.id, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id),
    emoji: varchar('emoji', { length: 64 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  // One reaction per user per message: a new emoji replaces the old one
  (table) => [unique().on(table.messageId, table.userId), index('idx_reactions_message').on(table.messageId)],
);
