import path from 'node:path';
import fs from 'node:fs/promises';

import { openArchive, archiveEntries } from '../archive/openArchive';
import { DEFAULT_NAMING_CONVENTION, listSchemaMembers, type MemberNamingConvention } from '../archive/memberSelector';
import { stableStringify } from '../keys/deterministicJson';

export type MemberInventory = {
  schema: 'member-inventory-v1';
  archivePath: string;
  convention: MemberNamingConvention;
  /** Qualifying members, in archive listing order. */
  members: string[];
  /** Members with the schema extension that do not follow the naming convention. */
  skipped: string[];
};

/**
 * Which members of an archive would be processed, without extracting anything.
 */
export async function buildMemberInventory(
  archivePath: string,
  convention: MemberNamingConvention = DEFAULT_NAMING_CONVENTION,
): Promise<MemberInventory> {
  const archive = await openArchive(archivePath);
  const members = listSchemaMembers(archive, convention);
  const qualifying = new Set(members);
  const skipped = archiveEntries(archive)
    .filter((e) => !e.dir && e.name.endsWith(convention.extension) && !qualifying.has(e.name))
    .map((e) => e.name);

  return {
    schema: 'member-inventory-v1',
    archivePath: path.resolve(archivePath),
    convention,
    members,
    skipped,
  };
}

export function serializeMemberInventory(inv: MemberInventory): string {
  return stableStringify(inv);
}

export async function writeMemberInventoryFile(outFile: string, inv: MemberInventory): Promise<void> {
  const abs = path.resolve(outFile);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, serializeMemberInventory(inv), 'utf8');
}
