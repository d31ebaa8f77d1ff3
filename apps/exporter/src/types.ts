import type { ExportError } from './errors.js';

export type TableCategory = 'group' | 'individual';

export type TableSpec = {
  readonly name: string;
  readonly category: TableCategory;
  readonly columns: readonly string[];
};

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  charset: string;
  collation: string;
  connectTimeoutMs: number;
};

export type ExportSettings = {
  folderName: string;
  baseDir: string | null;
  tablesFile: string | null;
};

export type ScheduleSettings = {
  intervalMs: number;
  retryDelayMs: number;
};

export type AppConfig = {
  db: DbConfig;
  export: ExportSettings;
  schedule: ScheduleSettings;
  logLevel: string;
  nodeEnv: string;
};

export type TableExport = {
  filePath: string;
  rowCount: number;
};

export type TableOutcome =
  | ({ table: string; status: 'exported' } & TableExport)
  | { table: string; status: 'failed'; error: ExportError };

/** One pass over every configured table. */
export type ExportJob = {
  startedAt: Date;
  finishedAt: Date;
  outputDir: string;
  outcomes: TableOutcome[];
  exportedFiles: string[];
};
