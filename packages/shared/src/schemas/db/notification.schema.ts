// ============================================================================
// Notification Routing — Drizzle DB Schema
// ============================================================================

import { sql } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  jsonb,
  index,
  unique,
} from 'drizzle-orm/pg-core';

// --- Notification Context JSONB Type ---

export interface NotificationContext {
  event_kind: string;
  source_entity_id: string | null;
  metadata: Record<string, unknown>;
}

// --- Notifications Table ---
// Append-mostly delivery history. sent_at is written once and never cleared.
// SILENT items are never stored here.

export const notifications = pgTable(
  'notifications',
  {
    notificationId: uuid('notification_id').primaryKey().defaultRandom(),
    priority: varchar('priority', { length: 10 }).notNull(),
    channel: varchar('channel', { length: 20 }).notNull(),
    message: text('message').notNull(),
    context: jsonb('context').notNull().$type<NotificationContext>(),
    scheduledFor: timestamp('scheduled_for', { withTimezone: true }),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('notifications_priority_scheduled_for_idx').on(
      table.priority,
      table.scheduledFor,
    ),
    index('notifications_pending_idx')
      .on(table.priority, table.createdAt)
      .where(sql`${table.sentAt} is null`),
  ],
);

// --- Dedup Ledger Table ---
// One row per (event_kind, source_entity_id). NULLS NOT DISTINCT makes a null
// source a single type-wide key (PostgreSQL 15+).

export const dedupLedger = pgTable(
  'dedup_ledger',
  {
    eventKind: varchar('event_kind', { length: 100 }).notNull(),
    sourceEntityId: varchar('source_entity_id', { length: 200 }),
    lastSentAt: timestamp('last_sent_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    unique('dedup_ledger_key_uq')
      .on(table.eventKind, table.sourceEntityId)
      .nullsNotDistinct(),
  ],
);

// --- Inferred Types ---

export type InsertNotification = typeof notifications.$inferInsert;
export type SelectNotification = typeof notifications.$inferSelect;

export type SelectDedupEntry = typeof dedupLedger.$inferSelect;
