import fs from 'node:fs/promises';
import path from 'node:path';

import { captureLogger, logLine, mkTmpDir } from '../../__tests__/zipFixture';
import { createEmptyReport } from '../../report/extractionReport';
import { decodeMemberText, extractKeyDeclarations, extractMemberKeys } from '../extractKeyDeclarations';

describe('extractKeyDeclarations', () => {
  test('single key yields a scalar field', () => {
    const { keys } = extractKeyDeclarations('list Foo { key "bar"; leaf bar { type string; } }');
    expect([...keys]).toEqual([['Foo', { kind: 'single', field: 'bar' }]]);
  });

  test('space-separated key yields ordered fields', () => {
    const { keys } = extractKeyDeclarations('list Foo { key "bar baz"; }');
    expect(keys.get('Foo')).toEqual({ kind: 'multiple', fields: ['bar', 'baz'] });
  });

  test('surrounding and repeated whitespace in the clause is ignored', () => {
    const { keys } = extractKeyDeclarations('list Foo { key "  b\ta  \n r "; }');
    expect(keys.get('Foo')).toEqual({ kind: 'multiple', fields: ['b', 'a', 'r'] });
    const single = extractKeyDeclarations('list Bar { key " id "; }');
    expect(single.keys.get('Bar')).toEqual({ kind: 'single', field: 'id' });
  });

  test('a repeated entity keeps the last key and its first position', () => {
    const text = ['list A { key "a"; }', 'list B { key "b1 b2"; }', 'list A { key "a2"; }'].join('\n');
    const { keys } = extractKeyDeclarations(text);
    expect([...keys]).toEqual([
      ['A', { kind: 'single', field: 'a2' }],
      ['B', { kind: 'multiple', fields: ['b1', 'b2'] }],
    ]);
  });

  test('reports lists without a usable key by line', () => {
    const text = [
      'module m {',
      '  list a {',
      '    container c { leaf x; }',
      '    key "id";',
      '  }',
      '  list b {',
      '    key "  ";',
      '  }',
      '}',
    ].join('\n');
    const { keys, anomalies } = extractKeyDeclarations(text);
    expect(keys.size).toBe(0);
    expect(anomalies).toEqual([
      { entity: 'a', line: 2, reason: 'noKeyClause' },
      { entity: 'b', line: 6, reason: 'emptyKeyClause' },
    ]);
  });
});

describe('extractKeyDeclarations on large modules', () => {
  test('many keyless leaf-lists stay linear', () => {
    const blocks = Array.from({ length: 20000 }, (_, i) => `  leaf-list tags${i} {\n    type string;\n  }`);
    const text = ['module big {', ...blocks, '  list item {', '    key "id";', '  }', '}'].join('\n');

    const started = Date.now();
    const { keys, anomalies } = extractKeyDeclarations(text);
    const elapsedMs = Date.now() - started;

    expect([...keys]).toEqual([['item', { kind: 'single', field: 'id' }]]);
    expect(anomalies).toHaveLength(20000);
    expect(anomalies[0]).toEqual({ entity: 'tags0', line: 2, reason: 'noKeyClause' });
    expect(anomalies[19999]).toEqual({ entity: 'tags19999', line: 59999, reason: 'noKeyClause' });
    expect(elapsedMs).toBeLessThan(5000);
  });
});

describe('decodeMemberText', () => {
  test('replaces invalid UTF-8 instead of failing', () => {
    const bytes = Buffer.concat([Buffer.from('list A { key "x', 'utf8'), Buffer.from([0xff]), Buffer.from('y"; }', 'utf8')]);
    const { keys } = extractKeyDeclarations(decodeMemberText(bytes));
    expect(keys.get('A')).toEqual({ kind: 'single', field: 'x�y' });
  });
});

describe('extractMemberKeys', () => {
  test('reads a member file and logs the table count', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, '2024-01-01-interfaces.yang');
    await fs.writeFile(file, 'list interface { key "name"; }', 'utf8');

    const { logger, lines } = captureLogger();
    const keys = await extractMemberKeys(file, { logger });

    expect([...keys]).toEqual([['interface', { kind: 'single', field: 'name' }]]);
    expect(lines).toEqual([
      logLine('DEBUG', 'Found table: interface, key(s): "name"'),
      logLine('INFO', 'Extracted 1 tables from 2024-01-01-interfaces.yang'),
    ]);
  });

  test('an unreadable member contributes nothing and is recorded', async () => {
    const dir = await mkTmpDir();
    const missing = path.join(dir, 'v1-missing.yang');
    const { logger, lines } = captureLogger();
    const report = createEmptyReport({ toolName: 't', toolVersion: '0', archivePath: 'a.zip' });

    const keys = await extractMemberKeys(missing, { memberName: 'v1-missing.yang', logger, report });

    expect(keys.size).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith(logLine('ERROR', `Error parsing ${missing}: `))).toBe(true);
    expect(report.membersProcessed).toBe(0);
    expect(report.findings.map((f) => [f.kind, f.location?.file])).toEqual([['memberReadError', 'v1-missing.yang']]);
  });

  test('records entity counts and keyless lists in the report', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'v1-routes.yang');
    await fs.writeFile(file, 'list route { key "prefix nh"; }\nleaf-list tags { type string; }\n', 'utf8');
    const report = createEmptyReport({ toolName: 't', toolVersion: '0', archivePath: 'a.zip' });

    await extractMemberKeys(file, { memberName: 'yang/v1-routes.yang', report });

    expect(report.membersProcessed).toBe(1);
    expect(report.counts.entitiesByMember).toEqual({ 'yang/v1-routes.yang': 1 });
    expect(report.findings).toEqual([
      {
        kind: 'listWithoutKey',
        severity: 'info',
        message: 'list tags: no key clause before the next block',
        location: { file: 'yang/v1-routes.yang', line: 2 },
      },
    ]);
  });
});
