import { gzipSync } from 'zlib';
import JSZip from 'jszip';
import pino from 'pino';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { AmplitudeClient } from '../client';
import type { ClientConfig } from '../types';

export interface FakeReply {
  status: number;
  data?: string | Buffer;
  headers?: Record<string, string>;
}

export type ReplyFn = (config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

/**
 * In-process axios adapter. Replies are consumed in order; the last one
 * repeats once the list runs out.
 */
export function fakeTransport(...replies: Array<FakeReply | ReplyFn>) {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async config => {
    calls.push(config);
    const next = replies[Math.min(calls.length - 1, replies.length - 1)];
    const reply = typeof next === 'function' ? await next(config) : next;
    const response: AxiosResponse = {
      data: reply.data ?? '',
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
      request: {},
    };
    return response;
  };

  return { adapter, calls };
}

export const silentLogger = pino({ level: 'silent' });

export function makeClient(adapter: AxiosAdapter, config: ClientConfig = {}): AmplitudeClient {
  return new AmplitudeClient({
    apiKey: 'test-api-key',
    secretKey: 'test-secret',
    maxRetries: 0,
    retryBaseDelayMs: 0,
    logger: silentLogger,
    adapter,
    ...config,
  });
}

export const json = (value: unknown): string => JSON.stringify(value);

export async function buildZip(files: Record<string, string | Buffer>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}

export const gzip = (data: string | Buffer): Buffer => gzipSync(data);

export const jsonLines = (...records: unknown[]): string => records.map(r => JSON.stringify(r)).join('\n');
