import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import type { ConditionType, MetricSnapshot } from '../alerts/types.js';

// ---------------------------------------------------------------------------
// Alert records -- one row per monitored condition (identity)
// ---------------------------------------------------------------------------
export const alertRecords = sqliteTable('alert_records', {
  identity: text('identity').primaryKey(),
  type: text('type').$type<ConditionType>().notNull(),
  active: integer('active', { mode: 'boolean' }).notNull().default(false),
  firstTriggeredAt: integer('first_triggered_at'),   // Unix timestamp ms
  lastNotifiedAt: integer('last_notified_at'),       // Unix timestamp ms
  reminderCount: integer('reminder_count').notNull().default(0),
  lastValue: text('last_value', { mode: 'json' }).$type<MetricSnapshot>(),
  updatedAt: integer('updated_at').notNull(),
});

// ---------------------------------------------------------------------------
// Preferences -- key-value state for watchers (upsert semantics)
// ---------------------------------------------------------------------------
export const preferences = sqliteTable('preferences', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: text('updated_at').notNull().default(sql`(datetime('now'))`),
});
