import { bigint, bigserial, index, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core';

// Constraint names are part of the contract: pg-errors.ts maps unique violations by name.
export const USERS_USERNAME_KEY = 'users_username_key';
export const USERS_EMAIL_KEY = 'users_email_key';

export const users = pgTable('users', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  username: varchar('username', { length: 64 }).notNull().unique(USERS_USERNAME_KEY),
  email: varchar('email', { length: 320 }).notNull().unique(USERS_EMAIL_KEY),
  passwordHash: text('password_hash').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const posts = pgTable(
  'posts',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    title: varchar('title', { length: 255 }).notNull(),
    content: text('content').notNull(),
    authorId: bigint('author_id', { mode: 'number' })
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    // Backs the (created_at DESC, id DESC) listing order.
    createdAtIdIdx: index('posts_created_at_id_idx').on(t.createdAt, t.id),
    authorIdIdx: index('posts_author_id_idx').on(t.authorId),
  }),
);

export type UserRow = typeof users.$inferSelect;
export type PostRow = typeof posts.$inferSelect;
