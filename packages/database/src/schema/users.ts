import { pgTable, serial, varchar, boolean, timestamp, index } from 'drizzle-orm/pg-core';
import { FIELD_LIMITS } from '@renewly/shared/constants';

/**
 * Users table
 *
 * Owned by account management. The billing engine only reads it to reject
 * subscriptions for unknown or deactivated users.
 */
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  email: varchar('email', { length: FIELD_LIMITS.EMAIL }).notNull().unique(),
  name: varchar('name', { length: FIELD_LIMITS.NAME }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  idxUserEmail: index('idx_user_email').on(table.email),
}));
