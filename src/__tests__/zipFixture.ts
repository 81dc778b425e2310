import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';

import { createLogger, type Logger } from '../util/logger';

/** Archive entries in the order they should be listed; `null` content makes a directory entry. */
export type ZipEntries = Array<[name: string, content: string | Uint8Array | null]>;

export async function mkTmpDir(prefix = 'ypk-test-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeZip(dir: string, entries: ZipEntries, fileName = 'schemas.zip'): Promise<string> {
  const zip = new JSZip();
  for (const [name, content] of entries) {
    if (content === null) zip.folder(name);
    else zip.file(name, content);
  }
  const data = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  const zipPath = path.join(dir, fileName);
  await fs.writeFile(zipPath, data);
  return zipPath;
}

/**
 * Overwrite the stored (compressed) bytes of one entry with 0xff so that inflating
 * it fails while the archive's headers still load.
 */
export async function corruptZipEntry(zipPath: string, entryName: string): Promise<void> {
  const buf = await fs.readFile(zipPath);
  let offset = 0;
  while (offset + 30 <= buf.length && buf.readUInt32LE(offset) === 0x04034b50) {
    const compressedSize = buf.readUInt32LE(offset + 18);
    const nameLength = buf.readUInt16LE(offset + 26);
    const extraLength = buf.readUInt16LE(offset + 28);
    const name = buf.subarray(offset + 30, offset + 30 + nameLength).toString('utf8');
    const dataStart = offset + 30 + nameLength + extraLength;
    if (name === entryName) {
      buf.fill(0xff, dataStart, dataStart + compressedSize);
      await fs.writeFile(zipPath, buf);
      return;
    }
    offset = dataStart + compressedSize;
  }
  throw new Error(`entry not found: ${entryName}`);
}

export const FIXED_NOW = new Date('2024-01-01T00:00:00.000Z');

export function captureLogger(level: 'debug' | 'info' = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({ level, write: (line) => lines.push(line), now: () => FIXED_NOW });
  return { logger, lines };
}

export function logLine(level: 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR', message: string): string {
  return `2024-01-01T00:00:00.000Z - ${level} - ${message}`;
}
