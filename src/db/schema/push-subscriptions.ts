import { pgTable, uuid, varchar, timestamp, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const PUSH_PLATFORMS = ['fcm', 'webpush'] as const;

export const pushSubscriptions = pgTable(
  'push_subscriptions',
  {
    id: uuid('id').primaryKey(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id),
    token: varchar('token', { length: 1024 }).notNull().unique(),
    platform: varchar('platform', { length: 10, enum: PUSH_PLATFORMS }).notNull().default('fcm'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_push_subscriptions_user').on(table.userId)],
);
