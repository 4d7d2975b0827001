import { pgTable, uuid, varchar, boolean, integer, timestamp, index, unique } from 'drizzle-orm/pg-core';
import { rooms } from './rooms.js';
import { users } from './users.js';

export const MEMBER_ROLES = ['admin', 'member'] as const;

export const roomMembers = pgTable(
  'room_members',
  {
    id: uuid('id').primaryKey(),
    roomId: uuid('room_id')
      .notNull()
      .references(() => rooms.id, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id),
    role: varchar('role', { length: 10, enum: MEMBER_ROLES }).notNull().default('member'),
    isActive: boolean('is_active').notNull().default(true),
    lastReadAt: timestamp('last_read_at', { withTimezone: true }),
    unreadCount: integer('unread_count').notNull().default(0),
    joinedAt: timestamp('joined_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique().on(table.roomId, table.userId),
    index('idx_room_members_user').on(table.userId, table.isActive),
  ],
);
