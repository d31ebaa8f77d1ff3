import { summarizeJob } from '../src/batch.js';
import { loadLocalEnvFiles } from '../src/env.js';
import { startApp } from '../src/lifecycle.js';

loadLocalEnvFiles();

function exit(code: number): never {
  return process.exit(code);
}

const app = startApp(process.env, exit);

const job = await app.runJob().catch((error: unknown) => {
  app.logger.fatal({ err: error }, 'Export failed');
  return exit(1);
});
const summary = summarizeJob(job);

// eslint-disable-next-line no-console
console.log(JSON.stringify(summary, null, 2));
process.exitCode = summary.failed.length > 0 ? 1 : 0;
