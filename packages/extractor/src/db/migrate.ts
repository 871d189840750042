import { sql } from 'drizzle-orm';
import pino from 'pino';
import { getDb } from './client';
import { DEFAULT_EVENTS_TABLE } from './schema';

const logger = pino();

/** Creates the events table and the extract_state table when missing. Idempotent. */
export async function ensureSchema(eventsTableName: string = DEFAULT_EVENTS_TABLE): Promise<void> {
  logger.info({ table: eventsTableName }, 'Ensuring warehouse tables');
  const db = getDb();

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS ${sql.identifier(eventsTableName)} (
      uuid text PRIMARY KEY,
      event_id text NOT NULL,
      user_id text NOT NULL,
      device_id text NOT NULL,
      event_type text NOT NULL,
      event_time text NOT NULL,
      amplitude_id text NOT NULL,
      platform text NOT NULL,
      os_name text NOT NULL,
      city text NOT NULL,
      country text NOT NULL,
      event_properties text NOT NULL,
      user_properties text NOT NULL,
      extracted_at timestamptz DEFAULT now()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS extract_state (
      destination text PRIMARY KEY,
      last_exported_end text,
      event_count bigint NOT NULL DEFAULT 0,
      last_run timestamptz
    )
  `);

  logger.info('Warehouse tables ready');
}
