import { gunzipSync } from 'zlib';
import JSZip from 'jszip';
import type { Logger } from 'pino';
import { ConnectionError } from './errors';
import { createLogger } from '../logger';
import type { EventRecord, ExportResult } from './types';

const defaultLogger = createLogger();

export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

/** Gunzips gzip input, returns anything else untouched. Safe to apply to either layer. */
export function unwrapGzip(bytes: Buffer): Buffer {
  return isGzip(bytes) ? gunzipSync(bytes) : bytes;
}

function isRecord(value: unknown): value is EventRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonLines(bytes: Buffer): { events: EventRecord[]; skipped: number } {
  const events: EventRecord[] = [];
  let skipped = 0;

  for (const raw of bytes.toString('utf8').split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) {
        events.push(parsed);
      } else {
        skipped++;
      }
    } catch {
      skipped++;
    }
  }

  return { events, skipped };
}

export async function decodeExportArchive(
  body: Buffer,
  logger: Logger = defaultLogger,
): Promise<ExportResult> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(unwrapGzip(body));
  } catch (err) {
    throw new ConnectionError('Export API returned invalid ZIP archive', {
      context: 'decoding export archive',
      bytes: body.length,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const members = Object.values(zip.files).filter(file => !file.dir);
  const events: EventRecord[] = [];
  let skippedLines = 0;

  for (const member of members) {
    let data: Buffer;
    try {
      data = unwrapGzip(await member.async('nodebuffer'));
    } catch (err) {
      throw new ConnectionError(`Export archive member ${member.name} is corrupt`, {
        context: 'decoding export archive',
        file: member.name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    const parsed = parseJsonLines(data);
    if (parsed.skipped > 0) {
      logger.warn({ file: member.name, skipped: parsed.skipped }, 'Skipped unparseable export lines');
    }
    for (const event of parsed.events) events.push(event);
    skippedLines += parsed.skipped;
  }

  return { events, skippedLines, files: members.length };
}
