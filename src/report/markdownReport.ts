import type { ExtractionReport, ReportFinding } from './extractionReport';

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { file, line } = f.location;
  return line ? `${file}:${line}` : file;
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

export function reportToMarkdown(report: ExtractionReport): string {
  const lines: string[] = [];
  const byKind = countByKind(report.findings);

  lines.push(`# Key extraction report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Archive: \`${report.archivePath}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Members listed: **${report.membersListed}**`);
  lines.push(`- Members selected: **${report.membersSelected}**`);
  lines.push(`- Members processed: **${report.membersProcessed}**`);
  lines.push(`- Entities: **${report.entitiesTotal}**`);
  lines.push(`- Findings: **${report.findings.length}**`);
  lines.push('');

  lines.push(`## Entities by member`);
  lines.push('');
  lines.push(`| Member | Entities |`);
  lines.push(`|---|---:|`);
  const members = Object.keys(report.counts.entitiesByMember).sort((a, b) => a.localeCompare(b));
  for (const m of members) lines.push(`| ${escapeCell(m)} | ${report.counts.entitiesByMember[m]} |`);
  if (members.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const fk = Object.keys(byKind).sort((a, b) => a.localeCompare(b));
  for (const k of fk) lines.push(`| ${k} | ${byKind[k]} |`);
  if (fk.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${escapeCell(fmtLoc(f))} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
