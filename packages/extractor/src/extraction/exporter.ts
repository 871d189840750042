import pino, { type Logger } from 'pino';
import type { AmplitudeClient } from '../api/client';
import type { ExportJobConfig } from '../config';
import { flattenEvent } from './flatten';
import { ProgressTracker } from './progress';
import {
  EVENT_COLUMNS,
  type CheckpointStore,
  type EventSink,
  type ExportSummary,
  type ManifestWriter,
} from './types';

const WRITE_BATCH = 10_000;

export interface ExportDeps {
  client: Pick<AmplitudeClient, 'readEventsExport'>;
  sink: EventSink;
  manifest: ManifestWriter;
  checkpoints: CheckpointStore;
  logger?: Logger;
  now?: () => Date;
}

/** Picks the window start, moving it to the last exported end on incremental runs. */
export async function resolveWindowStart(
  job: ExportJobConfig,
  checkpoints: CheckpointStore,
): Promise<string> {
  if (!job.incremental) return job.start;
  const state = await checkpoints.load(job.table);
  const lastEnd = state?.lastExportedEnd;
  return lastEnd && lastEnd > job.start ? lastEnd : job.start;
}

export async function runExport(deps: ExportDeps, job: ExportJobConfig): Promise<ExportSummary> {
  const logger = deps.logger ?? pino();
  const now = deps.now ?? (() => new Date());
  const end = job.end;
  const start = await resolveWindowStart(job, deps.checkpoints);

  if (job.incremental && start >= end) {
    logger.info({ start, end }, 'Nothing new to export since the last run');
    return { start, end, exported: 0, written: 0, skippedLines: 0, manifestPath: null };
  }

  logger.info({ start, end, table: job.table }, 'Exporting events');
  const result = await deps.client.readEventsExport(start, end);
  logger.info(
    { events: result.events.length, files: result.files, skippedLines: result.skippedLines },
    'Export downloaded',
  );

  let written = 0;
  let manifestPath: string | null = null;

  if (result.events.length === 0) {
    logger.warn({ start, end }, 'No events exported');
  } else {
    const rows = result.events.map(flattenEvent);
    const tracker = new ProgressTracker(`Writing ${job.table}`, rows.length, logger);
    for (let i = 0; i < rows.length; i += WRITE_BATCH) {
      const batch = rows.slice(i, i + WRITE_BATCH);
      written += await deps.sink.write(batch);
      tracker.add(batch.length);
    }
    tracker.finish();

    manifestPath = await deps.manifest.write({
      destination: job.table,
      columns: EVENT_COLUMNS,
      primary_key: ['uuid'],
      incremental: job.incremental,
      rows: rows.length,
      skipped_lines: result.skippedLines,
      export_window: { start, end },
      created_at: now().toISOString(),
    });
    logger.info({ manifestPath, written }, 'Events written');
  }

  await deps.checkpoints.save(job.table, {
    lastExportedEnd: end,
    eventCount: result.events.length,
    lastRun: now(),
  });
  logger.info({ lastExportedEnd: end, eventCount: result.events.length }, 'State updated');

  return {
    start,
    end,
    exported: result.events.length,
    written,
    skippedLines: result.skippedLines,
    manifestPath,
  };
}
