import path from 'node:path';

/** Normalize to posix-style path separators. */
export function toPosixPath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Last `/`-separated segment of an archive member name ('a/b/c.yang' -> 'c.yang').
 * ZIP names use `/` only; a backslash is an ordinary character here.
 */
export function memberBaseName(name: string): string {
  const idx = name.lastIndexOf('/');
  return idx < 0 ? name : name.slice(idx + 1);
}

/**
 * Resolve an archive member name under `root`. Returns undefined when the result
 * would land outside `root` (absolute names, `..` segments).
 */
export function resolveInside(root: string, memberName: string): string | undefined {
  const absRoot = path.resolve(root);
  const target = path.resolve(absRoot, toPosixPath(memberName).replace(/^\/+/, ''));
  const rel = path.relative(absRoot, target);
  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return undefined;
  return target;
}
