import { pgTable, uuid, varchar, text, boolean, timestamp, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';
import { channels } from './channels.js';

export const ROOM_TYPES = ['direct', 'group', 'topic'] as const;

export const rooms = pgTable(
  'rooms',
  {
    id: uuid('id').primaryKey(),
    type: varchar('type', { length: 10, enum: ROOM_TYPES }).notNull(),
    name: varchar('name', { length: 200 }),
    description: text('description'),
    channelId: uuid('channel_id').references(() => channels.id),
    createdBy: uuid('created_by')
      .notNull()
      .references(() => users.id),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    // Bumped on every new message; drives conversation-list ordering
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_rooms_channel').on(table.channelId),
    index('idx_rooms_updated').on(table.updatedAt),
  ],
);
