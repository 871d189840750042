import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ManifestWriter, TableManifest } from '../extraction/types';

/** Writes the table manifest as pretty-printed JSON next to the run's other output. */
export class FileManifestWriter implements ManifestWriter {
  constructor(private readonly filePath: string) {}

  async write(manifest: TableManifest): Promise<string> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(manifest, null, 2) + '\n', 'utf8');
    return this.filePath;
  }
}
