import { pgTable, text, timestamp, bigint } from 'drizzle-orm/pg-core';

export const DEFAULT_EVENTS_TABLE = 'amplitude_events';

// Destination table name is configurable, so the table is built per name
export function eventsTable(name: string = DEFAULT_EVENTS_TABLE) {
  return pgTable(name, {
    uuid: text('uuid').primaryKey(),
    eventId: text('event_id').notNull(),
    userId: text('user_id').notNull(),
    deviceId: text('device_id').notNull(),
    eventType: text('event_type').notNull(),
    eventTime: text('event_time').notNull(),
    amplitudeId: text('amplitude_id').notNull(),
    platform: text('platform').notNull(),
    osName: text('os_name').notNull(),
    city: text('city').notNull(),
    country: text('country').notNull(),
    eventProperties: text('event_properties').notNull(),
    userProperties: text('user_properties').notNull(),
    extractedAt: timestamp('extracted_at', { withTimezone: true }).defaultNow(),
  });
}

export type EventsTable = ReturnType<typeof eventsTable>;

export const extractState = pgTable('extract_state', {
  destination: text('destination').primaryKey(),
  lastExportedEnd: text('last_exported_end'),
  eventCount: bigint('event_count', { mode: 'number' }).notNull().default(0),
  lastRun: timestamp('last_run', { withTimezone: true }),
});
