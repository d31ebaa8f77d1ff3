import { loadLocalEnvFiles } from './env.js';
import { createInterruptHandler, startApp } from './lifecycle.js';
import { Scheduler, formatDuration } from './scheduler.js';

loadLocalEnvFiles();

function exit(code: number): never {
  return process.exit(code);
}

const app = startApp(process.env, exit);
const { config, logger, tables, outputDir } = app;
const controller = new AbortController();

const onSignal = createInterruptHandler(controller, logger, exit);
process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

logger.info(
  {
    outputDir,
    tables: tables.map((t) => t.name),
    interval: formatDuration(config.schedule.intervalMs),
    database: config.db.database,
  },
  'Table exporter started',
);

const scheduler = new Scheduler(app.runJob, config.schedule, logger);

try {
  await scheduler.run(controller.signal);
} catch (error) {
  logger.fatal({ err: error }, 'Scheduler crashed');
  exit(1);
}
process.exitCode = 0;
