import path from 'node:path';
import { exportTable } from './csv.js';
import type { ExportConnection } from './db.js';
import { ExportError } from './errors.js';
import type { Logger } from './logger.js';
import type { ExportJob, TableOutcome, TableSpec } from './types.js';

/**
 * Exports each table in order. A table that fails is logged and left out of
 * `exportedFiles`; the remaining tables still run.
 */
export async function exportAll(
  connection: ExportConnection,
  tables: readonly TableSpec[],
  outputDir: string,
  logger: Logger,
): Promise<ExportJob> {
  const startedAt = new Date();
  const outcomes: TableOutcome[] = [];

  for (const table of tables) {
    try {
      const result = await exportTable(connection, table, outputDir);
      outcomes.push({ table: table.name, status: 'exported', ...result });
      logger.debug({ table: table.name, rows: result.rowCount, file: result.filePath }, 'Table exported');
    } catch (error) {
      const exportError = error instanceof ExportError ? error : new ExportError('WriteFailed', table.name, error);
      outcomes.push({ table: table.name, status: 'failed', error: exportError });
      logger.error(
        { err: exportError.cause ?? exportError, table: table.name, operation: exportError.operation, kind: exportError.kind },
        `Export of ${table.name} failed; keeping its previous file`,
      );
    }
  }

  return {
    startedAt,
    finishedAt: new Date(),
    outputDir,
    outcomes,
    exportedFiles: outcomes.flatMap((o) => (o.status === 'exported' ? [o.filePath] : [])),
  };
}

export type ExportJobDeps = {
  connect: () => Promise<ExportConnection>;
  tables: readonly TableSpec[];
  outputDir: string;
  logger: Logger;
};

/** Opens one connection, exports every table through it and always closes it. */
export async function runExportJob(deps: ExportJobDeps): Promise<ExportJob> {
  const connection = await deps.connect();
  try {
    return await exportAll(connection, deps.tables, deps.outputDir, deps.logger);
  } finally {
    await connection.close();
  }
}

export function summarizeJob(job: ExportJob): {
  exported: number;
  total: number;
  outputDir: string;
  files: string[];
  failed: string[];
  elapsedMs: number;
} {
  return {
    exported: job.exportedFiles.length,
    total: job.outcomes.length,
    outputDir: job.outputDir,
    files: job.exportedFiles.map((filePath) => path.basename(filePath)),
    failed: job.outcomes.flatMap((o) => (o.status === 'failed' ? [o.table] : [])),
    elapsedMs: job.finishedAt.getTime() - job.startedAt.getTime(),
  };
}
