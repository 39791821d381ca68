import { pgTable, uuid, varchar, boolean, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `endpoints` table.
 *
 * `id` is assigned by the registry before insert, so every backend
 * produces ids the same way.
 */
export const endpoints = pgTable('endpoints', {
  id: uuid('id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  url: varchar('url', { length: 2048 }).notNull(),
  is_active: boolean('is_active').notNull().default(false),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_endpoints_is_active').on(table.is_active),
]);
