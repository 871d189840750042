import https from 'https';
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import type { Logger } from 'pino';
import { decodeExportArchive } from './archive';
import {
  AuthenticationError,
  ConnectionError,
  DriverError,
  ObjectNotFoundError,
  PayloadTooLargeError,
  QuerySyntaxError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from './errors';
import { headerValue, parseRetryAfter, sendWithRetry, type RetryPolicy } from './retry';
import { ingestResponseSchema, userProfileResponseSchema, validateEvents } from './schemas';
import { loadClientConfig } from '../config';
import { createLogger } from '../logger';
import type {
  AmplitudeEvent,
  ClientConfig,
  DriverCapabilities,
  ExportResult,
  FieldSchema,
  IdentificationRecord,
  IdentifyResponse,
  IngestResponse,
  RateLimitStatus,
  Region,
  ResolvedClientConfig,
  UserProfileOptions,
  UserProfileResponse,
} from './types';

export const CLIENT_VERSION = '1.0.0';

export type Operation = 'httpV2' | 'batch' | 'identify' | 'export' | 'profile';

export interface EndpointSpec {
  method: 'GET' | 'POST';
  auth: 'body' | 'form' | 'basic' | 'header';
  contentType?: 'application/json' | 'application/x-www-form-urlencoded';
  maxEvents?: number;
  maxPayloadBytes?: number;
  label: string;
}

const MiB = 1024 * 1024;

/** Auth placement and limits per operation. Fixed; callers cannot override. */
export const ENDPOINTS = {
  httpV2: {
    method: 'POST',
    auth: 'body',
    contentType: 'application/json',
    maxEvents: 2000,
    maxPayloadBytes: 1 * MiB,
    label: 'HTTP V2 API',
  },
  batch: {
    method: 'POST',
    auth: 'body',
    contentType: 'application/json',
    maxEvents: 2000,
    maxPayloadBytes: 20 * MiB,
    label: 'Batch Upload API',
  },
  identify: {
    method: 'POST',
    auth: 'form',
    contentType: 'application/x-www-form-urlencoded',
    label: 'Identify API',
  },
  export: {
    method: 'GET',
    auth: 'basic',
    label: 'Export API',
  },
  profile: {
    method: 'GET',
    auth: 'header',
    label: 'User Profile API',
  },
} as const satisfies Record<Operation, EndpointSpec>;

export const REGION_URLS: Readonly<Record<Region, Readonly<Record<Operation, string>>>> = {
  standard: {
    httpV2: 'https://api2.amplitude.com/2/httpapi',
    batch: 'https://api2.amplitude.com/batch',
    identify: 'https://api2.amplitude.com/identify',
    export: 'https://amplitude.com/api/2/export',
    profile: 'https://profile-api.amplitude.com/v1/userprofile',
  },
  eu: {
    httpV2: 'https://api.eu.amplitude.com/2/httpapi',
    batch: 'https://api.eu.amplitude.com/batch',
    identify: 'https://api.eu.amplitude.com/identify',
    export: 'https://analytics.eu.amplitude.com/api/2/export',
    profile: 'https://profile-api.amplitude.com/v1/userprofile',
  },
};

const CAPABILITIES: Readonly<DriverCapabilities> = Object.freeze({
  read: true,
  write: true,
  update: true,
  delete: false,
  batchOperations: true,
  streaming: false,
  pagination: 'none',
  queryLanguage: null,
  maxPageSize: 100, // User Profile API
  supportsTransactions: false,
  supportsRelationships: false,
});

const OBJECTS = ['events', 'users', 'cohorts', 'user_profile', 'recommendations'] as const;

const FIELD_SCHEMAS: Readonly<Record<string, Record<string, FieldSchema>>> = {
  events: {
    user_id: { type: 'string', required: false, nullable: false, description: 'Unique user identifier (minimum 5 characters)' },
    device_id: { type: 'string', required: false, nullable: false, description: 'Unique device identifier (minimum 5 characters)' },
    event_type: { type: 'string', required: true, nullable: false, description: 'Event type name' },
    time: { type: 'integer', required: false, nullable: true, description: 'Event time in milliseconds since epoch' },
    event_properties: { type: 'object', required: false, nullable: true, description: 'Event properties (max 40 layers deep)' },
    user_properties: { type: 'object', required: false, nullable: true, description: 'User properties' },
  },
  users: {
    user_id: { type: 'string', required: true, nullable: false, description: 'Unique user identifier' },
    device_id: { type: 'string', required: false, nullable: true, description: 'Device identifier' },
    user_properties: {
      type: 'object',
      required: false,
      nullable: true,
      description: 'User properties with support for $set, $add, $append operations',
    },
  },
};

/**
 * Export time format YYYYMMDDTHH: a real calendar date, a literal T, an hour 00-23.
 */
export function isValidExportTime(value: unknown): value is string {
  if (typeof value !== 'string' || value.length !== 11 || value[8] !== 'T') return false;
  const datePart = value.slice(0, 8);
  const hourPart = value.slice(9);
  if (!/^\d{8}$/.test(datePart) || !/^\d{2}$/.test(hourPart)) return false;

  const year = Number(datePart.slice(0, 4));
  const month = Number(datePart.slice(4, 6));
  const day = Number(datePart.slice(6, 8));
  const date = new Date(Date.UTC(year, month - 1, day));
  const isRealDate =
    year >= 1 &&
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day;

  return isRealDate && Number(hourPart) <= 23;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

function apiMessage(data: unknown): string {
  const text = bodyText(data);
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null) {
      const error = 'error' in parsed ? parsed.error : undefined;
      const message = 'message' in parsed ? parsed.message : undefined;
      const picked = error ?? message;
      if (picked !== undefined) return typeof picked === 'string' ? picked : JSON.stringify(picked);
      return 'Unknown error';
    }
  } catch {
    // not JSON, fall through to the raw body
  }
  return text.slice(0, 500);
}

/** Maps a non-2xx response onto the DriverError taxonomy. */
export function mapHttpError(response: AxiosResponse, context: string): DriverError {
  const status = response.status;
  const message = apiMessage(response.data);
  const details = { statusCode: status, context, apiResponse: message };

  if (status === 401) {
    return new AuthenticationError(`Authentication failed: ${message}`, {
      ...details,
      suggestion: 'Check your API key and secret key',
    });
  }
  if (status === 400) return new ValidationError(`Validation failed: ${message}`, details);
  if (status === 413) return new PayloadTooLargeError(`Request payload too large: ${message}`, details);
  if (status === 429) {
    const retryAfter = parseRetryAfter(headerValue(response.headers, 'retry-after')) ?? 60;
    return new RateLimitError(
      `API rate limit exceeded: ${message}. Retry after ${retryAfter} seconds.`,
      retryAfter,
      details,
    );
  }
  if (status >= 500) return new ConnectionError(`API server error: ${message}`, details);
  return new DriverError(`API request failed: ${message}`, details);
}

function parseJsonBody(data: unknown, label: string): unknown {
  try {
    return JSON.parse(bodyText(data));
  } catch (err) {
    throw new ConnectionError(`${label} returned invalid JSON`, {
      context: label,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

function keyPrefix(key: string | undefined): string {
  return key ? `${key.slice(0, 10)}...` : 'not set';
}

/**
 * Client for the five Amplitude APIs. Each one authenticates differently:
 * HTTP V2, Batch and Identify carry api_key in the body, Export uses basic
 * auth with the secret key, User Profile takes an `Api-Key` header.
 *
 * @example
 * ```typescript
 * const client = AmplitudeClient.fromEnv();
 * const { events } = await client.readEventsExport('20250101T00', '20250102T00');
 * client.close();
 * ```
 */
export class AmplitudeClient {
  readonly config: ResolvedClientConfig;
  readonly urls: Readonly<Record<Operation, string>>;
  private readonly logger: Logger;
  private readonly agent: https.Agent;
  private readonly http: AxiosInstance;
  private readonly retryPolicy: RetryPolicy;

  constructor(config: ClientConfig = {}) {
    if (!config.apiKey && !config.accessToken) {
      throw new AuthenticationError('API key or access token required', {
        suggestion: 'Set AMPLITUDE_API_KEY environment variable',
      });
    }

    this.config = Object.freeze({
      apiKey: config.apiKey,
      secretKey: config.secretKey,
      accessToken: config.accessToken,
      region: config.region ?? 'standard',
      timeoutSeconds: config.timeoutSeconds ?? 30,
      maxRetries: config.maxRetries ?? 3,
      retryBaseDelayMs: config.retryBaseDelayMs ?? 1000,
      debug: config.debug ?? false,
      adapter: config.adapter,
    });
    this.urls = REGION_URLS[this.config.region];
    this.logger = config.logger ?? createLogger(this.config.debug);
    this.retryPolicy = { maxRetries: this.config.maxRetries, baseDelayMs: this.config.retryBaseDelayMs };
    this.agent = new https.Agent({ keepAlive: true, maxSockets: 4 });
    this.http = axios.create({
      timeout: this.config.timeoutSeconds * 1000,
      headers: {
        Accept: 'application/json',
        'User-Agent': `amplitude-extractor/${CLIENT_VERSION}`,
      },
      httpsAgent: this.agent,
      // Status handling lives in sendWithRetry / mapHttpError
      validateStatus: () => true,
      ...(this.config.adapter ? { adapter: this.config.adapter } : {}),
    });

    this.logger.debug(
      {
        region: this.config.region,
        apiKey: keyPrefix(this.config.apiKey),
        secretKey: keyPrefix(this.config.secretKey),
      },
      'Amplitude client initialized',
    );
    if (!this.config.secretKey) {
      this.logger.debug('Secret key not set (required for Export API)');
    }
  }

  static fromEnv(overrides: ClientConfig = {}, env: NodeJS.ProcessEnv = process.env): AmplitudeClient {
    return new AmplitudeClient({ ...loadClientConfig(env), ...overrides });
  }

  getCapabilities(): Readonly<DriverCapabilities> {
    return CAPABILITIES;
  }

  listObjects(): string[] {
    return [...OBJECTS];
  }

  getFields(objectName: string): Record<string, FieldSchema> {
    const schema = FIELD_SCHEMAS[objectName];
    if (!schema) {
      const available = Object.keys(FIELD_SCHEMAS);
      throw new ObjectNotFoundError(
        `Object '${objectName}' not found. Available objects: ${available.join(', ')}`,
        { requested: objectName, available },
      );
    }
    return { ...schema };
  }

  async read(query: string): Promise<never> {
    throw new QuerySyntaxError('Amplitude does not support a query language', {
      query,
      suggestion: 'Use readEventsExport() or readUserProfile() instead',
    });
  }

  getRateLimitStatus(): RateLimitStatus {
    return {
      remaining: null,
      limit: null,
      resetAt: null,
      retryAfter: null,
      note: "Amplitude doesn't provide real-time rate limit headers",
    };
  }

  async writeEvents(events: readonly AmplitudeEvent[]): Promise<IngestResponse> {
    return this.ingest('httpV2', events);
  }

  async batchUploadEvents(events: readonly AmplitudeEvent[]): Promise<IngestResponse> {
    return this.ingest('batch', events);
  }

  async updateUserProperties(records: readonly IdentificationRecord[]): Promise<IdentifyResponse> {
    if (!Array.isArray(records) || records.length === 0) {
      throw new ValidationError('identification must be a non-empty list', {
        field: 'identification',
        provided: Array.isArray(records) ? 'empty array' : typeof records,
      });
    }
    const endpoint = ENDPOINTS.identify;
    const form = new URLSearchParams({
      api_key: this.requireApiKey(endpoint.label),
      identification: JSON.stringify(records),
    });

    this.logger.debug({ url: this.urls.identify, records: records.length }, `[${endpoint.label}] POST`);
    const response = await this.send(
      {
        method: endpoint.method,
        url: this.urls.identify,
        data: form.toString(),
        headers: { 'Content-Type': endpoint.contentType },
        responseType: 'text',
      },
      'updating user properties via Identify API',
    );
    this.logger.debug({ records: records.length }, `[${endpoint.label}] Updated user records`);

    return { success: true, statusCode: response.status };
  }

  async readUserProfile(
    userId?: string,
    deviceId?: string,
    options: UserProfileOptions = {},
  ): Promise<UserProfileResponse> {
    if (!userId && !deviceId) {
      throw new ValidationError('user_id or device_id is required', {
        suggestion: 'Provide at least user_id or device_id',
      });
    }
    const endpoint = ENDPOINTS.profile;
    const { getRecommendations = false, getAmpProps = true, getCohortIds = false, getComputations = false } = options;

    const params: Record<string, string> = {};
    if (userId) params.user_id = userId;
    if (deviceId) params.device_id = deviceId;
    if (getRecommendations) params.get_recs = 'true';
    if (options.recId) params.rec_id = options.recId;
    if (options.recType) params.rec_type = options.recType;
    if (getAmpProps) params.get_amp_props = 'true';
    if (getCohortIds) params.get_cohort_ids = 'true';
    if (getComputations) params.get_computations = 'true';

    const authorization = this.config.apiKey
      ? `Api-Key ${this.config.apiKey}`
      : `Bearer ${this.config.accessToken ?? ''}`;

    this.logger.debug({ url: this.urls.profile, params }, `[${endpoint.label}] GET`);
    const response = await this.send(
      {
        method: endpoint.method,
        url: this.urls.profile,
        params,
        headers: { Authorization: authorization },
        responseType: 'text',
      },
      'reading user profile',
    );

    const parsed = userProfileResponseSchema.safeParse(parseJsonBody(response.data, endpoint.label));
    if (!parsed.success) {
      throw new ConnectionError(`${endpoint.label} returned an unexpected body`, {
        context: endpoint.label,
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }

  async readEventsExport(start: string, end: string): Promise<ExportResult> {
    const endpoint = ENDPOINTS.export;
    const { apiKey, secretKey } = this.config;
    if (!apiKey || !secretKey) {
      throw new AuthenticationError(
        'Export API requires both API key and secret key. Set AMPLITUDE_API_KEY and AMPLITUDE_SECRET_KEY.',
        { apiKeySet: Boolean(apiKey), secretKeySet: Boolean(secretKey) },
      );
    }

    for (const [label, value] of [['start', start], ['end', end]] as const) {
      if (!isValidExportTime(value)) {
        throw new ValidationError(`Invalid ${label} time format. Expected YYYYMMDDTHH (e.g., 20250101T00)`, {
          field: label,
          provided: value,
          expectedFormat: 'YYYYMMDDTHH',
        });
      }
    }
    if (start > end) {
      throw new ValidationError('Export start must not be after end', { field: 'start', start, end });
    }

    this.logger.debug({ url: this.urls.export, start, end }, `[${endpoint.label}] GET`);
    const response = await this.send<ArrayBuffer>(
      {
        method: endpoint.method,
        url: this.urls.export,
        params: { start, end },
        auth: { username: apiKey, password: secretKey },
        responseType: 'arraybuffer',
      },
      'reading events from Export API',
      'Try with a smaller time range',
    );

    const result = await decodeExportArchive(Buffer.from(response.data), this.logger);
    this.logger.debug(
      { events: result.events.length, files: result.files, skippedLines: result.skippedLines },
      `[${endpoint.label}] Parsed events from archive`,
    );
    return result;
  }

  close(): void {
    this.agent.destroy();
    this.logger.debug('Session closed');
  }

  private async ingest(operation: 'httpV2' | 'batch', events: readonly AmplitudeEvent[]): Promise<IngestResponse> {
    const endpoint = ENDPOINTS[operation];
    if (!Array.isArray(events) || events.length === 0) {
      throw new ValidationError('events must be a non-empty list', {
        field: 'events',
        provided: Array.isArray(events) ? 'empty array' : typeof events,
      });
    }
    if (events.length > endpoint.maxEvents) {
      throw new ValidationError(
        `Batch exceeds ${endpoint.maxEvents.toLocaleString('en-US')} event limit (${events.length} events)`,
        {
          field: 'events',
          eventsCount: events.length,
          maxEvents: endpoint.maxEvents,
          suggestion: 'Split into multiple calls',
        },
      );
    }
    validateEvents(events);

    const payload = JSON.stringify({ api_key: this.requireApiKey(endpoint.label), events });
    const payloadBytes = Buffer.byteLength(payload, 'utf8');
    if (payloadBytes > endpoint.maxPayloadBytes) {
      throw new PayloadTooLargeError(
        `Payload exceeds ${endpoint.maxPayloadBytes / MiB}MB limit (${payloadBytes} bytes)`,
        {
          payloadSizeBytes: payloadBytes,
          maxSizeBytes: endpoint.maxPayloadBytes,
          eventsCount: events.length,
          suggestion:
            operation === 'httpV2'
              ? 'Reduce number of events or use batchUploadEvents() for larger payloads'
              : 'Reduce number of events',
        },
      );
    }

    this.logger.debug({ url: this.urls[operation], events: events.length, payloadBytes }, `[${endpoint.label}] POST`);
    const response = await this.send(
      {
        method: endpoint.method,
        url: this.urls[operation],
        data: payload,
        headers: { 'Content-Type': endpoint.contentType },
        responseType: 'text',
      },
      `writing events to ${endpoint.label}`,
    );

    const parsed = ingestResponseSchema.safeParse(parseJsonBody(response.data, endpoint.label));
    if (!parsed.success) {
      throw new ConnectionError(`${endpoint.label} response is missing events_ingested`, {
        context: endpoint.label,
        issues: parsed.error.issues,
      });
    }
    this.logger.debug({ ingested: parsed.data.events_ingested }, `[${endpoint.label}] Ingested events`);
    return parsed.data;
  }

  private requireApiKey(label: string): string {
    if (!this.config.apiKey) {
      throw new AuthenticationError(`${label} requires an API key`, {
        context: label,
        suggestion: 'Set AMPLITUDE_API_KEY; an access token alone is not accepted here',
      });
    }
    return this.config.apiKey;
  }

  private async send<T = unknown>(
    request: AxiosRequestConfig,
    context: string,
    timeoutSuggestion = 'Increase timeout',
  ): Promise<AxiosResponse<T>> {
    let response: AxiosResponse<T>;
    try {
      response = await sendWithRetry<T>(this.http, request, this.retryPolicy, this.logger);
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
        throw new TimeoutError(`Request timed out while ${context}`, {
          context,
          timeout: this.config.timeoutSeconds,
          suggestion: timeoutSuggestion,
        });
      }
      throw new ConnectionError(`Cannot reach Amplitude while ${context}: ${err instanceof Error ? err.message : String(err)}`, {
        context,
        url: request.url,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      const error = mapHttpError(response, context);
      this.logger.debug({ status: response.status, context }, error.message);
      throw error;
    }
    return response;
  }
}
