import { pgTable, uuid, text, integer, boolean, jsonb, timestamp, index } from 'drizzle-orm/pg-core';

export const reviews = pgTable(
  'reviews',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    caseId: text('case_id').notNull(),
    status: text('status').notNull(),
    reason: text('reason'),
    verdict: text('verdict'),
    verdictReason: text('verdict_reason'),
    rawReply: text('raw_reply'),
    entryCount: integer('entry_count').notNull().default(0),
    partial: boolean('partial').notNull().default(false),
    targets: text('targets').array().notNull().default([]),
    deliveries: jsonb('deliveries'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('reviews_case_id_idx').on(table.caseId)],
);

export type ReviewRow = typeof reviews.$inferSelect;
export type NewReviewRow = typeof reviews.$inferInsert;
