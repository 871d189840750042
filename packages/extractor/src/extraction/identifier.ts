import pino, { type Logger } from 'pino';
import type { AmplitudeClient } from '../api/client';
import { FieldNotFoundError } from '../api/errors';
import { sleep as defaultSleep } from '../api/retry';
import type { IdentificationRecord, JsonObject } from '../api/types';
import type { IdentifyJobConfig } from '../config';
import { toCell } from './flatten';
import { ProgressTracker } from './progress';
import type { IdentifyMapping, IdentifyResult, RowSource, SourceRow } from './types';

/** Identify API accepts at most this many records per request. */
export const MAX_IDENTIFY_CHUNK = 2000;

export interface IdentifyDeps {
  client: Pick<AmplitudeClient, 'updateUserProperties'>;
  source: RowSource;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function assertColumns(row: SourceRow, mapping: IdentifyMapping, sourceName: string): void {
  const required = [mapping.userIdColumn, ...mapping.propertyColumns];
  const missing = required.filter(column => !(column in row));
  if (missing.length > 0) {
    throw new FieldNotFoundError(`Column(s) ${missing.join(', ')} not found in ${sourceName}`, {
      field: missing[0],
      missing,
      available: Object.keys(row),
      suggestion: 'Check IDENTIFY_USER_ID_COLUMN and IDENTIFY_PROPERTY_COLUMNS',
    });
  }
}

/** Returns null for rows without a usable user id. */
export function toIdentification(row: SourceRow, mapping: IdentifyMapping): IdentificationRecord | null {
  const userId = toCell(row[mapping.userIdColumn]).trim();
  if (!userId) return null;

  const properties: JsonObject = {};
  for (const column of mapping.propertyColumns) {
    const value = row[column];
    if (value !== null && value !== undefined) properties[column] = value;
  }

  return { user_id: userId, user_properties: { [mapping.operation]: properties } };
}

/**
 * Sends one Identify call per chunk of source rows, pausing between chunks.
 * A failed chunk is logged and counted; the remaining chunks still go out.
 */
export async function runIdentify(deps: IdentifyDeps, job: IdentifyJobConfig): Promise<IdentifyResult> {
  const logger = deps.logger ?? pino();
  const sleep = deps.sleep ?? defaultSleep;
  const chunkSize = Math.min(Math.max(1, job.chunkSize), MAX_IDENTIFY_CHUNK);
  const tracker = new ProgressTracker(`Identify from ${deps.source.name}`, null, logger);

  const result: IdentifyResult = {
    rows: 0,
    records: 0,
    skippedRows: 0,
    chunks: 0,
    succeededChunks: 0,
    failedChunks: 0,
    failures: [],
  };
  let checked = false;

  logger.info({ source: deps.source.name, chunkSize, operation: job.operation }, 'Starting identify run');

  for await (const page of deps.source.pages(chunkSize)) {
    if (!checked && page.length > 0) {
      assertColumns(page[0], job, deps.source.name);
      checked = true;
    }

    const records: IdentificationRecord[] = [];
    for (const row of page) {
      const record = toIdentification(row, job);
      if (record) records.push(record);
      else result.skippedRows++;
    }
    result.rows += page.length;
    tracker.add(page.length);

    if (records.length === 0) continue;

    if (result.chunks > 0 && job.pauseMs > 0) await sleep(job.pauseMs);
    result.chunks++;
    const chunk = result.chunks;

    try {
      await deps.client.updateUserProperties(records);
      result.succeededChunks++;
      result.records += records.length;
      logger.info({ chunk, records: records.length }, 'Identify chunk sent');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result.failedChunks++;
      result.failures.push({ chunk, records: records.length, error: message });
      logger.error({ chunk, records: records.length, err }, 'Identify chunk failed, continuing');
    }
  }

  tracker.finish();
  logger.info(
    {
      rows: result.rows,
      records: result.records,
      skippedRows: result.skippedRows,
      succeededChunks: result.succeededChunks,
      failedChunks: result.failedChunks,
    },
    'Identify run complete',
  );
  return result;
}
