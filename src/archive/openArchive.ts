import fs from 'node:fs/promises';
import JSZip from 'jszip';

import { ArchiveOpenError } from '../errors';

/**
 * Load a ZIP archive from disk. Any failure (missing file, a directory, not a ZIP)
 * becomes an {@link ArchiveOpenError}.
 */
export async function openArchive(archivePath: string): Promise<JSZip> {
  let data: Buffer;
  try {
    data = await fs.readFile(archivePath);
  } catch (e: unknown) {
    throw new ArchiveOpenError(archivePath, e);
  }

  try {
    const zip = new JSZip();
    return await zip.loadAsync(data);
  } catch (e: unknown) {
    throw new ArchiveOpenError(archivePath, e);
  }
}

/** Archive entries in listing order. */
export function archiveEntries(archive: JSZip): JSZip.JSZipObject[] {
  return Object.values(archive.files);
}
