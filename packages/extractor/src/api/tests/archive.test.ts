import { describe, it, expect } from 'vitest';
import { decodeExportArchive, isGzip, parseJsonLines, unwrapGzip } from '../archive';
import { ConnectionError } from '../errors';
import { buildZip, gzip, jsonLines, silentLogger } from './helpers';

describe('isGzip', () => {
  it('detects the gzip magic number', () => {
    expect(isGzip(gzip('hello'))).toBe(true);
    expect(isGzip(Buffer.from('PK\u0003\u0004'))).toBe(false);
    expect(isGzip(Buffer.from([0x1f]))).toBe(false);
  });
});

describe('unwrapGzip', () => {
  it('gunzips compressed input', () => {
    expect(unwrapGzip(gzip('{"a":1}')).toString('utf8')).toBe('{"a":1}');
  });

  it('returns plain input untouched', () => {
    const plain = Buffer.from('{"a":1}');
    expect(unwrapGzip(plain)).toBe(plain);
  });
});

describe('parseJsonLines', () => {
  it('skips blank lines without counting them', () => {
    const result = parseJsonLines(Buffer.from('{"n":1}\n\n   \n{"n":2}\n'));
    expect(result.events).toEqual([{ n: 1 }, { n: 2 }]);
    expect(result.skipped).toBe(0);
  });

  it('counts unparseable and non-object lines as skipped', () => {
    const result = parseJsonLines(Buffer.from('{"n":1}\nnot json\n[1,2]\n42\n{"n":2'));
    expect(result.events).toEqual([{ n: 1 }]);
    expect(result.skipped).toBe(4);
  });

  it('tolerates CRLF line endings', () => {
    const result = parseJsonLines(Buffer.from('{"n":1}\r\n{"n":2}\r\n'));
    expect(result.events).toEqual([{ n: 1 }, { n: 2 }]);
  });
});

describe('decodeExportArchive', () => {
  const first = { event_type: 'Login', user_id: 'user_0001' };
  const second = { event_type: 'Search', user_id: 'user_0002' };
  const third = { event_type: 'Logout', user_id: 'user_0003' };

  it('parses three lines in order and drops a trailing garbage line', async () => {
    const archive = await buildZip({
      '123/123_2025-01-01_0#0.json': `${jsonLines(first, second, third)}\nthis is not json`,
    });

    const result = await decodeExportArchive(archive, silentLogger);

    expect(result.events).toEqual([first, second, third]);
    expect(result.skippedLines).toBe(1);
    expect(result.files).toBe(1);
  });

  it('unwraps a gzip outer layer and gzip members', async () => {
    const archive = await buildZip({
      'a.json.gz': gzip(jsonLines(first, second)),
      'b.json': jsonLines(third),
    });

    const result = await decodeExportArchive(gzip(archive), silentLogger);

    expect(result.events).toEqual([first, second, third]);
    expect(result.skippedLines).toBe(0);
    expect(result.files).toBe(2);
  });

  it('ignores directory entries', async () => {
    const archive = await buildZip({ 'export/day1.json': jsonLines(first) });

    const result = await decodeExportArchive(archive, silentLogger);

    expect(result.files).toBe(1);
    expect(result.events).toEqual([first]);
  });

  it('returns no events for an empty archive', async () => {
    const result = await decodeExportArchive(await buildZip({}), silentLogger);
    expect(result).toEqual({ events: [], skippedLines: 0, files: 0 });
  });

  it('rejects a body that is not a ZIP with ConnectionError', async () => {
    await expect(decodeExportArchive(Buffer.from('<html>oops</html>'), silentLogger)).rejects.toBeInstanceOf(
      ConnectionError,
    );
  });

  it('rejects gzip that wraps something other than a ZIP', async () => {
    await expect(decodeExportArchive(gzip(jsonLines(first)), silentLogger)).rejects.toThrow(
      'Export API returned invalid ZIP archive',
    );
  });

  it('rejects a truncated outer gzip layer with ConnectionError', async () => {
    const archive = gzip(await buildZip({ 'day.json': jsonLines(first) }));

    await expect(decodeExportArchive(archive.subarray(0, 20), silentLogger)).rejects.toThrow(
      'Export API returned invalid ZIP archive',
    );
  });

  it('names the member whose gzip layer is corrupt', async () => {
    const archive = await buildZip({
      'good.json': jsonLines(first),
      'bad.json.gz': gzip(jsonLines(second, third)).subarray(0, 12),
    });

    const err = await decodeExportArchive(archive, silentLogger).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConnectionError);
    if (err instanceof ConnectionError) {
      expect(err.message).toBe('Export archive member bad.json.gz is corrupt');
      expect(err.details.file).toBe('bad.json.gz');
    }
  });
});
