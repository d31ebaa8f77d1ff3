import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DirectoryResolutionError, describeError } from './errors.js';
import type { DirectoryAttempt } from './errors.js';

export type PathsHost = {
  homedir: () => string;
  cwd: () => string;
};

const nodeHost: PathsHost = {
  homedir: () => os.homedir(),
  cwd: () => process.cwd(),
};

function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Base locations to try, most preferred first: an explicit override, the
 * user's desktop (only when it already exists), the home directory, then the
 * working directory.
 */
export function candidateBaseDirs(baseDirOverride: string | null, host: PathsHost = nodeHost): string[] {
  const candidates: string[] = [];
  if (baseDirOverride) candidates.push(path.resolve(baseDirOverride));

  let home = '';
  try {
    home = host.homedir().trim();
  } catch {
    home = '';
  }

  if (home) {
    const desktop = path.join(home, 'Desktop');
    if (isDirectory(desktop)) candidates.push(desktop);
    candidates.push(home);
  }

  candidates.push(host.cwd());
  return [...new Set(candidates)];
}

export function resolveOutputDirectory(
  folderName: string,
  options: { baseDir?: string | null; host?: PathsHost } = {},
): string {
  const attempts: DirectoryAttempt[] = [];

  for (const base of candidateBaseDirs(options.baseDir ?? null, options.host)) {
    const dir = path.join(base, folderName);
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (error) {
      attempts.push({ dir, reason: describeError(error) });
      continue;
    }
    if (isDirectory(dir)) return dir;
    attempts.push({ dir, reason: 'not a directory' });
  }

  throw new DirectoryResolutionError(folderName, attempts);
}
