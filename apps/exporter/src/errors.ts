export type ExportErrorKind = 'QueryFailed' | 'WriteFailed';

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    readonly problems: string[],
    options?: { cause?: unknown },
  ) {
    super(`Invalid configuration:\n${problems.map((p) => `- ${p}`).join('\n')}`, options);
  }
}

export type DirectoryAttempt = { dir: string; reason: string };

/** No candidate base location could hold the output folder. Fatal at startup. */
export class DirectoryResolutionError extends Error {
  override readonly name = 'DirectoryResolutionError';

  constructor(
    readonly folderName: string,
    readonly attempts: DirectoryAttempt[],
  ) {
    const tried = attempts.map((a) => `${a.dir} (${a.reason})`).join('; ');
    super(`Unable to create output folder "${folderName}". Tried: ${tried || 'no candidate locations'}`);
  }
}

export class ConnectionError extends Error {
  override readonly name = 'ConnectionError';

  constructor(
    readonly target: string,
    cause: unknown,
  ) {
    super(`Database connection to ${target} failed: ${describeError(cause)}`, { cause });
  }
}

function operationOf(kind: ExportErrorKind): 'query' | 'write' {
  return kind === 'QueryFailed' ? 'query' : 'write';
}

export class ExportError extends Error {
  override readonly name = 'ExportError';

  constructor(
    readonly kind: ExportErrorKind,
    readonly table: string,
    cause: unknown,
  ) {
    super(`Export of ${table} failed during ${operationOf(kind)}: ${describeError(cause)}`, { cause });
  }

  get operation(): 'query' | 'write' {
    return operationOf(this.kind);
  }
}
