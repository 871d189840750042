export {
  AmplitudeClient,
  CLIENT_VERSION,
  ENDPOINTS,
  REGION_URLS,
  isValidExportTime,
  mapHttpError,
} from './api/client';
export type { EndpointSpec, Operation } from './api/client';
export * from './api/errors';
export { decodeExportArchive, isGzip, parseJsonLines, unwrapGzip } from './api/archive';
export { eventSchema, validateEvents } from './api/schemas';
export type * from './api/types';
export { loadClientConfig, loadExtractorConfig, IDENTIFY_OPERATIONS } from './config';
export type { DbConfig, ExportJobConfig, ExtractorConfig, IdentifyJobConfig, IdentifyOperation } from './config';
export { createLogger } from './logger';
export { flattenEvent } from './extraction/flatten';
export { runExport, resolveWindowStart } from './extraction/exporter';
export type { ExportDeps } from './extraction/exporter';
export { runIdentify, toIdentification, MAX_IDENTIFY_CHUNK } from './extraction/identifier';
export type { IdentifyDeps } from './extraction/identifier';
export { runExtractor } from './extraction/orchestrator';
export type { ExtractorOutcome } from './extraction/orchestrator';
export { EVENT_COLUMNS } from './extraction/types';
export type {
  CheckpointStore,
  EventRow,
  EventSink,
  ExportSummary,
  ExtractState,
  IdentifyResult,
  ManifestWriter,
  RowSource,
  TableManifest,
} from './extraction/types';
export { PostgresEventSink } from './db/writer';
export { PostgresCheckpointStore } from './db/checkpoint';
export { PostgresRowSource } from './db/source';
export { FileManifestWriter } from './db/manifest';
export { ensureSchema } from './db/migrate';
export { getDb, closeDb } from './db/client';
