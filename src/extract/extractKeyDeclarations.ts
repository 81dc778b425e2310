import fs from 'node:fs/promises';
import path from 'node:path';

import { MemberReadError, describeError } from '../errors';
import { parseKeyClause, formatPrimaryKey, type PrimaryKeyMap } from '../keys/primaryKey';
import { addFinding, incCount, type ExtractionReport } from '../report/extractionReport';
import { silentLogger, type Logger } from '../util/logger';
import { createLineIndex, scanListDeclarations } from './declarationScanner';

export type KeyAnomaly = {
  entity: string;
  /** 1-based line of the `list` keyword. */
  line: number;
  reason: 'noKeyClause' | 'emptyKeyClause';
};

export type KeyExtraction = {
  keys: PrimaryKeyMap;
  anomalies: KeyAnomaly[];
};

/**
 * Entity -> primary key for every list declaration with a key clause in `text`.
 * Keys are inserted in declaration order; a repeated entity name keeps the last key.
 */
export function extractKeyDeclarations(text: string): KeyExtraction {
  const { declarations, anomalies: scanAnomalies } = scanListDeclarations(text);
  const lineOf = createLineIndex(text);
  const keys: PrimaryKeyMap = new Map();
  const anomalies: KeyAnomaly[] = scanAnomalies.map((a) => ({
    entity: a.entity,
    line: lineOf(a.start),
    reason: a.reason,
  }));

  for (const d of declarations) {
    const key = parseKeyClause(d.keyClause);
    if (!key) {
      anomalies.push({ entity: d.entity, line: lineOf(d.start), reason: 'emptyKeyClause' });
      continue;
    }
    keys.set(d.entity, key);
  }

  anomalies.sort((a, b) => a.line - b.line || a.entity.localeCompare(b.entity));
  return { keys, anomalies };
}

/** UTF-8 decode; invalid byte sequences become U+FFFD instead of failing. */
export function decodeMemberText(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
}

export type ExtractMemberKeysOptions = {
  /** Name used in logs and report entries; defaults to the file's base name. */
  memberName?: string;
  logger?: Logger;
  report?: ExtractionReport;
};

/**
 * Read one extracted member from disk and extract its keys.
 * A read failure is logged and recorded; the member then contributes nothing.
 */
export async function extractMemberKeys(filePath: string, opts: ExtractMemberKeysOptions = {}): Promise<PrimaryKeyMap> {
  const logger = opts.logger ?? silentLogger;
  const memberName = opts.memberName ?? path.basename(filePath);

  let text: string;
  try {
    text = decodeMemberText(await fs.readFile(filePath));
  } catch (e: unknown) {
    const err = new MemberReadError(memberName, e);
    logger.error(`Error parsing ${filePath}: ${describeError(e)}`);
    if (opts.report) {
      addFinding(opts.report, {
        kind: 'memberReadError',
        severity: 'error',
        message: err.message,
        location: { file: memberName },
      });
    }
    return new Map();
  }

  const { keys, anomalies } = extractKeyDeclarations(text);
  for (const [entity, key] of keys) {
    logger.debug(`Found table: ${entity}, key(s): ${formatPrimaryKey(key)}`);
  }
  for (const a of anomalies) {
    logger.debug(`List ${a.entity} at ${memberName}:${a.line} has no usable key clause (${a.reason})`);
  }

  if (opts.report) {
    opts.report.membersProcessed++;
    incCount(opts.report.counts.entitiesByMember, memberName, keys.size);
    for (const a of anomalies) {
      addFinding(opts.report, {
        kind: 'listWithoutKey',
        severity: 'info',
        message: `list ${a.entity}: ${a.reason === 'noKeyClause' ? 'no key clause before the next block' : 'empty key clause'}`,
        location: { file: memberName, line: a.line },
      });
    }
  }

  logger.info(`Extracted ${keys.size} tables from ${path.basename(filePath)}`);
  return keys;
}
