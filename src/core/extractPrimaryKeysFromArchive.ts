import type JSZip from 'jszip';

import { openArchive } from '../archive/openArchive';
import { withScratchDir } from '../archive/scratchDir';
import {
  DEFAULT_NAMING_CONVENTION,
  sampleMemberContent,
  selectSchemaMembers,
  type MemberNamingConvention,
} from '../archive/memberSelector';
import { describeError } from '../errors';
import { extractMemberKeys } from '../extract/extractKeyDeclarations';
import { formatPrimaryKey, mergePrimaryKeys, type PrimaryKeyMap } from '../keys/primaryKey';
import { addFinding, createEmptyReport, finalizeReport, type ExtractionReport } from '../report/extractionReport';
import { silentLogger, type Logger } from '../util/logger';
import { TOOL_NAME, VERSION } from '../version';

export type ExtractPrimaryKeysOptions = {
  convention?: MemberNamingConvention;
  logger?: Logger;
  /** Build an in-memory report of the run (returned finalized). */
  trackReport?: boolean;
  /** Where the run's scratch directory is created (default: the OS temp dir). */
  scratchParentDir?: string;
};

export type ExtractPrimaryKeysResult = {
  keys: PrimaryKeyMap;
  report?: ExtractionReport;
};

async function logNoMatches(
  archive: JSZip,
  convention: MemberNamingConvention,
  logger: Logger,
  report: ExtractionReport | undefined,
): Promise<void> {
  const pattern = `<version>${convention.separator}<yangTableName>${convention.extension}`;
  logger.warn(`No YANG files found matching the pattern ${pattern}`);
  if (report) {
    addFinding(report, {
      kind: 'noMatchingMembers',
      severity: 'warning',
      message: `No member matches ${pattern}`,
    });
  }

  try {
    const sample = await sampleMemberContent(archive, convention);
    if (!sample) return;
    logger.info(`Examining sample file: ${sample.name}`);
    logger.info(`Sample content: ${JSON.stringify(sample.content)}`);
  } catch (e: unknown) {
    logger.warn(`Could not read a sample member: ${describeError(e)}`);
  }
}

/**
 * Core library entrypoint: entity -> primary key for every qualifying member of a
 * ZIP archive.
 *
 * - Members are processed in archive listing order; a later member's key for an
 *   entity replaces an earlier one.
 * - A member that cannot be read contributes nothing; only a failure to open the
 *   archive rejects (with ArchiveOpenError).
 * - Extracted members live in a scratch directory removed before this resolves or rejects.
 */
export async function extractPrimaryKeysFromArchive(
  archivePath: string,
  opts: ExtractPrimaryKeysOptions = {},
): Promise<ExtractPrimaryKeysResult> {
  const logger = opts.logger ?? silentLogger;
  const convention = opts.convention ?? DEFAULT_NAMING_CONVENTION;
  const report = opts.trackReport
    ? createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, archivePath })
    : undefined;

  const keys: PrimaryKeyMap = new Map();
  // entity -> member whose key is currently held
  const sourceOf = new Map<string, string>();

  await withScratchDir(
    async (scratchDir) => {
      const archive = await openArchive(archivePath);
      const members = await selectSchemaMembers(archive, scratchDir, { convention, logger, report });
      if (members.length === 0) await logNoMatches(archive, convention, logger, report);

      for (const member of members) {
        logger.info(`Parsing: ${member.name}`);
        try {
          const memberKeys = await extractMemberKeys(member.path, { memberName: member.name, logger, report });
          mergePrimaryKeys(keys, memberKeys, ({ entity, previous, next }) => {
            const from = sourceOf.get(entity) ?? '?';
            const message =
              `Table ${entity}: key ${formatPrimaryKey(next)} from ${member.name} ` +
              `replaces ${formatPrimaryKey(previous)} from ${from}`;
            logger.warn(message);
            if (report) {
              addFinding(report, {
                kind: 'entityOverwritten',
                severity: 'warning',
                message,
                location: { file: member.name },
                tags: { entity, previousMember: from },
              });
            }
          });
          for (const entity of memberKeys.keys()) sourceOf.set(entity, member.name);
        } catch (e: unknown) {
          logger.error(`Error parsing ${member.name}: ${describeError(e)}`);
          if (report) {
            addFinding(report, {
              kind: 'memberReadError',
              severity: 'error',
              message: describeError(e),
              location: { file: member.name },
            });
          }
        }
      }
    },
    { parentDir: opts.scratchParentDir },
  );

  if (report) {
    report.entitiesTotal = keys.size;
    finalizeReport(report);
  }
  return { keys, report };
}
