import pino from 'pino';
import { getDb, type DrizzleDb } from './client';
import { eventsTable, type EventsTable } from './schema';
import type { EventRow, EventSink } from '../extraction/types';

const logger = pino();

const CHUNK_SIZE = 500;

type NewEventRow = EventsTable['$inferInsert'];

export function toInsertRow(row: EventRow): NewEventRow {
  return {
    uuid: row.uuid,
    eventId: row.event_id,
    userId: row.user_id,
    deviceId: row.device_id,
    eventType: row.event_type,
    eventTime: row.event_time,
    amplitudeId: row.amplitude_id,
    platform: row.platform,
    osName: row.os_name,
    city: row.city,
    country: row.country,
    eventProperties: row.event_properties,
    userProperties: row.user_properties,
  };
}

/** Inserts flattened events into a Postgres table, skipping uuids already present. */
export class PostgresEventSink implements EventSink {
  private readonly table: EventsTable;

  constructor(
    readonly tableName: string,
    private readonly db: DrizzleDb = getDb(),
  ) {
    this.table = eventsTable(tableName);
  }

  async write(rows: EventRow[]): Promise<number> {
    if (rows.length === 0) return 0;
    let totalInserted = 0;

    for (let i = 0; i < rows.length; i += CHUNK_SIZE) {
      const chunk = rows.slice(i, i + CHUNK_SIZE).map(toInsertRow);

      // .returning() counts only rows that did not conflict
      const result = await this.db
        .insert(this.table)
        .values(chunk)
        .onConflictDoNothing()
        .returning({ uuid: this.table.uuid });

      totalInserted += result.length;
    }

    logger.debug({ table: this.tableName, rows: rows.length, inserted: totalInserted }, 'Rows written');
    return totalInserted;
  }
}
