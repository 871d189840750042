import pino, { type Logger } from 'pino';
import { AmplitudeClient } from '../api/client';
import type { ClientConfig } from '../api/types';
import type { ExtractorConfig } from '../config';
import { PostgresCheckpointStore } from '../db/checkpoint';
import { getDb } from '../db/client';
import { FileManifestWriter } from '../db/manifest';
import { ensureSchema } from '../db/migrate';
import { PostgresRowSource } from '../db/source';
import { PostgresEventSink } from '../db/writer';
import { runExport } from './exporter';
import { runIdentify } from './identifier';
import type { ExportSummary, IdentifyResult } from './types';

export type ExtractorOutcome =
  | { mode: 'export'; summary: ExportSummary }
  | { mode: 'identify'; summary: IdentifyResult };

/** Wires the Postgres-backed sink, source and state store, then runs the configured mode. */
export async function runExtractor(
  config: ExtractorConfig,
  clientConfig: ClientConfig,
  logger: Logger = pino(),
): Promise<ExtractorOutcome> {
  const client = new AmplitudeClient({ ...clientConfig, logger: clientConfig.logger ?? logger });
  logger.info({ mode: config.mode, region: client.config.region }, 'Amplitude client initialized');

  try {
    const db = getDb(config.db);

    if (config.mode === 'export') {
      await ensureSchema(config.job.table);
      const summary = await runExport(
        {
          client,
          sink: new PostgresEventSink(config.job.table, db),
          manifest: new FileManifestWriter(config.job.manifestPath),
          checkpoints: new PostgresCheckpointStore(db),
          logger,
        },
        config.job,
      );
      return { mode: 'export', summary };
    }

    const summary = await runIdentify(
      {
        client,
        source: new PostgresRowSource(config.job.sourceTable, config.job.userIdColumn, db),
        logger,
      },
      config.job,
    );
    return { mode: 'identify', summary };
  } finally {
    client.close();
  }
}
