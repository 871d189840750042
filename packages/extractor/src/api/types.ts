import type { AxiosAdapter } from 'axios';
import type { Logger } from 'pino';

export type Region = 'standard' | 'eu';

export type JsonObject = Record<string, unknown>;

export interface AmplitudeEvent {
  event_type: string;
  user_id?: string;
  device_id?: string;
  time?: number; // Unix ms
  event_properties?: JsonObject;
  user_properties?: JsonObject;
  [key: string]: unknown;
}

export interface IdentificationRecord {
  user_id?: string;
  device_id?: string;
  // Operation map, e.g. { $set: {...}, $add: {...} }
  user_properties?: Record<string, JsonObject>;
  groups?: JsonObject;
  [key: string]: unknown;
}

/** One line of an export archive. Shape is owned by Amplitude. */
export type EventRecord = JsonObject;

export interface ExportResult {
  events: EventRecord[];
  skippedLines: number;
  files: number;
}

export interface IngestResponse {
  code?: number;
  events_ingested: number;
  payload_size_bytes?: number;
  server_upload_time?: number;
  [key: string]: unknown;
}

export interface IdentifyResponse {
  success: true;
  statusCode: number;
}

export interface UserProfileOptions {
  getRecommendations?: boolean;
  getAmpProps?: boolean;
  getCohortIds?: boolean;
  getComputations?: boolean;
  recId?: string;
  recType?: string;
}

export interface UserProfileResponse {
  userData?: JsonObject | null;
  [key: string]: unknown;
}

export type PaginationStyle = 'none' | 'offset' | 'cursor' | 'page';

export interface DriverCapabilities {
  read: boolean;
  write: boolean;
  update: boolean;
  delete: boolean;
  batchOperations: boolean;
  streaming: boolean;
  pagination: PaginationStyle;
  queryLanguage: string | null;
  maxPageSize: number | null;
  supportsTransactions: boolean;
  supportsRelationships: boolean;
}

export interface FieldSchema {
  type: 'string' | 'integer' | 'object';
  required: boolean;
  nullable: boolean;
  description: string;
}

export interface RateLimitStatus {
  remaining: number | null;
  limit: number | null;
  resetAt: Date | null;
  retryAfter: number | null;
  note: string;
}

export interface ClientConfig {
  apiKey?: string;
  secretKey?: string;
  accessToken?: string;
  region?: Region;
  timeoutSeconds?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  debug?: boolean;
  logger?: Logger;
  adapter?: AxiosAdapter;
}

export type ResolvedClientConfig = Readonly<
  Required<Omit<ClientConfig, 'apiKey' | 'secretKey' | 'accessToken' | 'logger' | 'adapter'>> &
    Pick<ClientConfig, 'apiKey' | 'secretKey' | 'accessToken' | 'adapter'>
>;
