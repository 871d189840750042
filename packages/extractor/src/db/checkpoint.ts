import { eq } from 'drizzle-orm';
import { getDb, type DrizzleDb } from './client';
import { extractState } from './schema';
import type { CheckpointStore, ExtractState } from '../extraction/types';

export class PostgresCheckpointStore implements CheckpointStore {
  constructor(private readonly db: DrizzleDb = getDb()) {}

  async load(destination: string): Promise<ExtractState | null> {
    const rows = await this.db.select().from(extractState).where(eq(extractState.destination, destination));
    const row = rows[0];
    if (!row) return null;
    return {
      lastExportedEnd: row.lastExportedEnd,
      eventCount: Number(row.eventCount),
      lastRun: row.lastRun,
    };
  }

  async save(destination: string, state: ExtractState): Promise<void> {
    const values = {
      lastExportedEnd: state.lastExportedEnd,
      eventCount: state.eventCount,
      lastRun: state.lastRun,
    };
    await this.db
      .insert(extractState)
      .values({ destination, ...values })
      .onConflictDoUpdate({ target: extractState.destination, set: values });
  }
}
