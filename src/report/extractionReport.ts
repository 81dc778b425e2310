import { stableStringify } from '../keys/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** Archive member name (posix). */
  file: string;
  /** 1-based line number. */
  line?: number;
};

export type ReportFindingKind =
  | 'noMatchingMembers'
  | 'memberReadError'
  | 'entityOverwritten'
  | 'listWithoutKey';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
  tags?: Record<string, string>;
};

export type ExtractionReport = {
  schema: 'key-extraction-report-v1';
  tool: { name: string; version: string };
  archivePath: string;
  startedAtIso: string;
  finishedAtIso: string;
  /** Non-directory entries in the archive. */
  membersListed: number;
  /** Entries that matched the naming convention and were extracted. */
  membersSelected: number;
  /** Selected members whose text was scanned. */
  membersProcessed: number;
  /** Distinct entities in the final mapping. */
  entitiesTotal: number;
  counts: {
    entitiesByMember: Record<string, number>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  archivePath: string;
  startedAtIso?: string;
}): ExtractionReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'key-extraction-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    archivePath: args.archivePath,
    startedAtIso: now,
    finishedAtIso: now,
    membersListed: 0,
    membersSelected: 0,
    membersProcessed: 0,
    entitiesTotal: 0,
    counts: { entitiesByMember: {} },
    findings: [],
  };
}

export function finalizeReport(report: ExtractionReport, finishedAtIso?: string): ExtractionReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function addFinding(report: ExtractionReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}

export function serializeReport(report: ExtractionReport): string {
  return stableStringify(report);
}
