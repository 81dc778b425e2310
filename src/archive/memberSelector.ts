import fs from 'node:fs/promises';
import path from 'node:path';
import type JSZip from 'jszip';

import { MemberReadError, describeError } from '../errors';
import { addFinding, type ExtractionReport } from '../report/extractionReport';
import { silentLogger, type Logger } from '../util/logger';
import { memberBaseName, resolveInside } from '../util/path';
import { archiveEntries } from './openArchive';

/**
 * Qualifying members are named `<version><separator><name><extension>`,
 * e.g. `2023-10-interfaces.yang`. `<version><extension>` alone does not qualify.
 */
export type MemberNamingConvention = {
  separator: string;
  extension: string;
};

export const DEFAULT_NAMING_CONVENTION: MemberNamingConvention = {
  separator: '-',
  extension: '.yang',
};

export type SelectedMember = {
  /** Path inside the archive. */
  name: string;
  /** Where the member's bytes were written in the scratch directory. */
  path: string;
};

export type SelectMembersOptions = {
  convention?: MemberNamingConvention;
  logger?: Logger;
  report?: ExtractionReport;
};

export function isSchemaMemberName(name: string, convention: MemberNamingConvention = DEFAULT_NAMING_CONVENTION): boolean {
  if (name.endsWith('/')) return false;
  if (!name.endsWith(convention.extension)) return false;
  const base = memberBaseName(name);
  const stem = base.slice(0, base.length - convention.extension.length);
  return stem.includes(convention.separator);
}

/** Names of qualifying members, in archive listing order. */
export function listSchemaMembers(archive: JSZip, convention: MemberNamingConvention = DEFAULT_NAMING_CONVENTION): string[] {
  return archiveEntries(archive)
    .filter((e) => !e.dir && isSchemaMemberName(e.name, convention))
    .map((e) => e.name);
}

async function writeMember(entry: JSZip.JSZipObject, scratchDir: string): Promise<string> {
  const target = resolveInside(scratchDir, entry.name);
  if (!target) throw new Error('member path escapes the extraction directory');
  const bytes = await entry.async('nodebuffer');
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, bytes);
  return target;
}

/**
 * Write every qualifying member under `scratchDir` and return them in listing order.
 * A member that cannot be inflated or written is logged and left out.
 */
export async function selectSchemaMembers(
  archive: JSZip,
  scratchDir: string,
  opts: SelectMembersOptions = {},
): Promise<SelectedMember[]> {
  const convention = opts.convention ?? DEFAULT_NAMING_CONVENTION;
  const logger = opts.logger ?? silentLogger;

  const entries = archiveEntries(archive);
  logger.debug(`All files in ZIP: ${JSON.stringify(entries.map((e) => e.name))}`);
  if (opts.report) opts.report.membersListed = entries.filter((e) => !e.dir).length;

  const selected: SelectedMember[] = [];
  for (const entry of entries) {
    if (entry.dir || !isSchemaMemberName(entry.name, convention)) continue;
    try {
      const filePath = await writeMember(entry, scratchDir);
      selected.push({ name: entry.name, path: filePath });
      logger.info(`Extracted: ${entry.name}`);
    } catch (e: unknown) {
      const err = new MemberReadError(entry.name, e);
      logger.error(`Error extracting ${entry.name}: ${describeError(e)}`);
      if (opts.report) {
        addFinding(opts.report, {
          kind: 'memberReadError',
          severity: 'error',
          message: err.message,
          location: { file: entry.name },
        });
      }
    }
  }

  if (opts.report) opts.report.membersSelected = selected.length;
  logger.info(`Total extracted YANG files: ${selected.length}`);
  return selected;
}

export type MemberSample = {
  name: string;
  /** Leading bytes of the member, decoded as UTF-8. */
  content: string;
};

/**
 * Leading bytes of the first non-directory member that has the schema extension,
 * whatever its name. Used to show what an archive holds when nothing qualified.
 */
export async function sampleMemberContent(
  archive: JSZip,
  convention: MemberNamingConvention = DEFAULT_NAMING_CONVENTION,
  maxBytes = 500,
): Promise<MemberSample | undefined> {
  const entry = archiveEntries(archive).find(
    (e) => !e.dir && !e.name.endsWith('/') && e.name.endsWith(convention.extension),
  );
  if (!entry) return undefined;
  const bytes = await entry.async('nodebuffer');
  return { name: entry.name, content: bytes.subarray(0, maxBytes).toString('utf8') };
}
