import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import type { Logger } from 'pino';

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export function headerValue(headers: object, name: string): unknown {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/** Parses a Retry-After header given in seconds. */
export function parseRetryAfter(header: unknown): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') return undefined;
  if (typeof header === 'string' && header.trim() === '') return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export function retryDelayMs(response: AxiosResponse, attempt: number, policy: RetryPolicy): number {
  if (response.status === 429) {
    const retryAfter = parseRetryAfter(headerValue(response.headers, 'retry-after'));
    if (retryAfter !== undefined) return retryAfter * 1000;
  }
  return policy.baseDelayMs * 2 ** attempt;
}

/**
 * Sends a request, retrying on RETRY_STATUSES with exponential backoff.
 * The instance must resolve every status (validateStatus: () => true); the
 * final response is returned as-is once retries run out.
 */
export async function sendWithRetry<T = unknown>(
  http: AxiosInstance,
  request: AxiosRequestConfig,
  policy: RetryPolicy,
  logger: Logger,
): Promise<AxiosResponse<T>> {
  for (let attempt = 0; ; attempt++) {
    const response = await http.request<T>(request);
    if (!RETRY_STATUSES.has(response.status) || attempt >= policy.maxRetries) {
      return response;
    }
    const waitMs = retryDelayMs(response, attempt, policy);
    logger.warn(
      { status: response.status, attempt: attempt + 1, maxRetries: policy.maxRetries, waitMs, url: request.url },
      'Retryable status, backing off',
    );
    await sleep(waitMs);
  }
}
