import type { IdentifyOperation } from '../config';

export const EVENT_COLUMNS = [
  'uuid',
  'event_id',
  'user_id',
  'device_id',
  'event_type',
  'event_time',
  'amplitude_id',
  'platform',
  'os_name',
  'city',
  'country',
  'event_properties',
  'user_properties',
] as const;

export type EventColumn = (typeof EVENT_COLUMNS)[number];

/** One flattened export event; every cell is a string. */
export type EventRow = Record<EventColumn, string>;

export type SourceRow = Record<string, unknown>;

export interface EventSink {
  /** Returns the number of rows actually inserted. */
  write(rows: EventRow[]): Promise<number>;
}

export interface TableManifest {
  destination: string;
  columns: readonly string[];
  primary_key: string[];
  incremental: boolean;
  rows: number;
  skipped_lines: number;
  export_window: { start: string; end: string };
  created_at: string;
}

export interface ManifestWriter {
  write(manifest: TableManifest): Promise<string>;
}

export interface ExtractState {
  lastExportedEnd: string | null;
  eventCount: number;
  lastRun: Date | null;
}

export interface CheckpointStore {
  load(key: string): Promise<ExtractState | null>;
  save(key: string, state: ExtractState): Promise<void>;
}

export interface RowSource {
  readonly name: string;
  /** Yields rows page by page, in a stable order. */
  pages(pageSize: number): AsyncIterable<SourceRow[]>;
}

export interface ExportSummary {
  start: string;
  end: string;
  exported: number;
  written: number;
  skippedLines: number;
  manifestPath: string | null;
}

export interface IdentifyFailure {
  chunk: number;
  records: number;
  error: string;
}

export interface IdentifyResult {
  rows: number;
  records: number;
  skippedRows: number;
  chunks: number;
  succeededChunks: number;
  failedChunks: number;
  failures: IdentifyFailure[];
}

export interface IdentifyMapping {
  userIdColumn: string;
  propertyColumns: string[];
  operation: IdentifyOperation;
}
