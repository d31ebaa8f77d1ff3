import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/** Loads repo-root and app-level `.env` files, for both tsx and built dist runs. */
export function loadLocalEnvFiles(): string[] {
  const candidates = [
    path.resolve(process.cwd(), '.env'),
    path.resolve(process.cwd(), 'apps/exporter/.env'),
    path.resolve(moduleDir, '../.env'),
    path.resolve(moduleDir, '../../../.env'),
    path.resolve(moduleDir, '../../../../.env'),
  ];

  const loaded: string[] = [];
  for (const envPath of new Set(candidates)) {
    if (!fs.existsSync(envPath)) continue;
    const result = dotenv.config({ path: envPath });
    if (result.error) throw result.error;
    loaded.push(envPath);
  }
  return loaded;
}
