import { runExportJob } from './batch.js';
import { loadConfig } from './config.js';
import { openConnection } from './db.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { resolveOutputDirectory } from './paths.js';
import type { PathsHost } from './paths.js';
import { loadTableSpecs } from './tables.js';
import type { AppConfig, ExportJob, TableSpec } from './types.js';

export type App = {
  config: AppConfig;
  logger: Logger;
  tables: readonly TableSpec[];
  outputDir: string;
  runJob: () => Promise<ExportJob>;
};

/**
 * Builds everything a run needs from the environment. Throws `ConfigError`
 * or `DirectoryResolutionError`; both are fatal at startup.
 */
export function createApp(env: NodeJS.ProcessEnv, options: { logger?: Logger; host?: PathsHost } = {}): App {
  const config = loadConfig(env);
  const logger = options.logger ?? createLogger({ level: config.logLevel, pretty: config.nodeEnv === 'development' });
  const tables = loadTableSpecs(config.export.tablesFile);
  const outputDir = resolveOutputDirectory(config.export.folderName, { baseDir: config.export.baseDir, host: options.host });

  return {
    config,
    logger,
    tables,
    outputDir,
    runJob: () =>
      runExportJob({
        connect: () => openConnection(config.db, logger),
        tables,
        outputDir,
        logger,
      }),
  };
}
