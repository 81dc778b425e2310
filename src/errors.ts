/** The archive is missing, unreadable, or not a ZIP. Aborts the run. */
export class ArchiveOpenError extends Error {
  constructor(
    public readonly archivePath: string,
    public readonly cause?: unknown,
  ) {
    super(`Cannot open archive '${archivePath}': ${describeError(cause)}`);
    this.name = 'ArchiveOpenError';
  }
}

/** One member could not be inflated, written or read. The run continues without it. */
export class MemberReadError extends Error {
  constructor(
    public readonly memberName: string,
    public readonly cause?: unknown,
  ) {
    super(`Cannot read member '${memberName}': ${describeError(cause)}`);
    this.name = 'MemberReadError';
  }
}

export function describeError(e: unknown): string {
  if (e === undefined) return 'unknown error';
  if (e instanceof Error) return e.message;
  return String(e);
}
