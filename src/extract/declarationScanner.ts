/**
 * Shallow scanner for `list <name> { ... key "<fields>" ... }` declarations.
 *
 * The text is a flat character stream: there is no brace-depth tracking and no
 * awareness of comments or strings. The rules, applied at each occurrence of
 * `list` from the current position:
 *
 * 1. `list`, one or more whitespace, a name of word characters, optional
 *    whitespace, then `{`. Anything else fails the attempt.
 * 2. After that brace, every position up to the next `{` (or end of text) is
 *    tried for `key`, one or more whitespace, `"`, one or more non-quote
 *    characters, `"`. The first position that fits wins.
 * 3. On success scanning resumes after the closing quote; on failure it resumes
 *    one character after the `list` that failed.
 *
 * Known limitation: a list whose body opens a nested block (a `container`, a
 * `leaf` with a body, an inner `list`) before its key clause yields no key for
 * that list, and an inner list's key clause is attributed to whichever name
 * precedes the last brace before it. `leaf-list` and words that merely end in
 * `list` are matched like any other `list`.
 */

export type ListDeclaration = {
  entity: string;
  /** Raw text between the quotes of the key clause. */
  keyClause: string;
  /** Offset of the `list` keyword. */
  start: number;
  /** Offset just past the closing quote of the key clause. */
  end: number;
};

export type ListAnomaly = {
  entity: string;
  start: number;
  reason: 'noKeyClause';
};

export type ScanResult = {
  declarations: ListDeclaration[];
  anomalies: ListAnomaly[];
};

const LIST_KEYWORD = 'list';
const KEY_KEYWORD = 'key';

const WORD_CHAR = /^[\p{L}\p{N}_]$/u;

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function skipWhitespace(text: string, i: number): number {
  let j = i;
  while (j < text.length && isWhitespace(text[j])) j++;
  return j;
}

/** End offset of the run of word characters starting at `i` (code point aware). */
function skipWord(text: string, i: number): number {
  let j = i;
  while (j < text.length) {
    const cp = text.codePointAt(j);
    if (cp === undefined) break;
    const ch = String.fromCodePoint(cp);
    if (!WORD_CHAR.test(ch)) break;
    j += ch.length;
  }
  return j;
}

type KeyClauseMatch = { keyClause: string; end: number };

function matchKeyClauseAt(text: string, i: number): KeyClauseMatch | undefined {
  if (!text.startsWith(KEY_KEYWORD, i)) return undefined;
  const afterKeyword = i + KEY_KEYWORD.length;
  const quote = skipWhitespace(text, afterKeyword);
  if (quote === afterKeyword || text[quote] !== '"') return undefined;
  const close = text.indexOf('"', quote + 1);
  if (close < 0 || close === quote + 1) return undefined;
  return { keyClause: text.slice(quote + 1, close), end: close + 1 };
}

type AttemptResult =
  | { kind: 'declaration'; declaration: ListDeclaration }
  | { kind: 'anomaly'; anomaly: ListAnomaly }
  | { kind: 'none' };

function matchListAt(text: string, start: number): AttemptResult {
  const afterKeyword = start + LIST_KEYWORD.length;
  const nameStart = skipWhitespace(text, afterKeyword);
  if (nameStart === afterKeyword) return { kind: 'none' };

  const nameEnd = skipWord(text, nameStart);
  if (nameEnd === nameStart) return { kind: 'none' };
  const entity = text.slice(nameStart, nameEnd);

  const brace = skipWhitespace(text, nameEnd);
  if (text[brace] !== '{') return { kind: 'none' };

  for (let i = brace + 1; i < text.length && text[i] !== '{'; i++) {
    const clause = matchKeyClauseAt(text, i);
    if (clause) {
      return {
        kind: 'declaration',
        declaration: { entity, keyClause: clause.keyClause, start, end: clause.end },
      };
    }
  }
  return { kind: 'anomaly', anomaly: { entity, start, reason: 'noKeyClause' } };
}

export function scanListDeclarations(text: string): ScanResult {
  const declarations: ListDeclaration[] = [];
  const anomalies: ListAnomaly[] = [];

  let pos = 0;
  while (pos < text.length) {
    const start = text.indexOf(LIST_KEYWORD, pos);
    if (start < 0) break;

    const r = matchListAt(text, start);
    if (r.kind === 'declaration') {
      declarations.push(r.declaration);
      pos = r.declaration.end;
      continue;
    }
    if (r.kind === 'anomaly') anomalies.push(r.anomaly);
    pos = start + 1;
  }

  return { declarations, anomalies };
}

/**
 * Offset -> 1-based line lookup. Newline offsets are collected once; each lookup
 * is a binary search over them.
 */
export function createLineIndex(text: string): (offset: number) => number {
  const newlines: number[] = [];
  for (let i = text.indexOf('\n'); i >= 0; i = text.indexOf('\n', i + 1)) newlines.push(i);

  return (offset) => {
    // count of newlines strictly before `offset`
    let lo = 0;
    let hi = newlines.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (newlines[mid] < offset) lo = mid + 1;
      else hi = mid;
    }
    return lo + 1;
  };
}
