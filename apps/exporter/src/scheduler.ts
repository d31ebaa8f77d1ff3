import { setTimeout as delay } from 'node:timers/promises';
import { summarizeJob } from './batch.js';
import { ConnectionError } from './errors.js';
import type { Logger } from './logger.js';
import type { ExportJob, ScheduleSettings } from './types.js';

export type SchedulerState = 'idle' | 'running' | 'stopped';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) return;
    throw error;
  }
}

/**
 * Runs one export job immediately, then one per interval until the signal
 * aborts. A failed job is logged and retried after `retryDelayMs`; the loop
 * itself never exits on a job failure. The signal is only checked between
 * jobs and during the wait, so a job in flight always finishes first.
 */
export class Scheduler {
  private currentState: SchedulerState = 'idle';
  private consecutiveFailures = 0;

  constructor(
    private readonly runJob: () => Promise<ExportJob>,
    private readonly settings: ScheduleSettings,
    private readonly logger: Logger,
    private readonly sleep: Sleep = abortableSleep,
  ) {}

  get state(): SchedulerState {
    return this.currentState;
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const waitMs = await this.tick();
      if (signal.aborted) break;

      this.currentState = 'idle';
      this.logger.info({ nextRunAt: new Date(Date.now() + waitMs).toISOString() }, `Next export in ${formatDuration(waitMs)}`);
      await this.sleep(waitMs, signal);
    }

    this.currentState = 'stopped';
    this.logger.info('Scheduler stopped');
  }

  /** Runs a single job and returns how long to wait before the next one. */
  private async tick(): Promise<number> {
    this.currentState = 'running';
    try {
      const job = await this.runJob();
      this.consecutiveFailures = 0;
      const summary = summarizeJob(job);
      this.logger.info(summary, `Exported ${summary.exported} of ${summary.total} tables to ${summary.outputDir}`);
      return this.settings.intervalMs;
    } catch (error) {
      this.consecutiveFailures += 1;
      const operation = error instanceof ConnectionError ? 'connect' : 'job';
      this.logger.error(
        { err: error, operation, consecutiveFailures: this.consecutiveFailures },
        `Export job failed; retrying in ${formatDuration(this.settings.retryDelayMs)}`,
      );
      return this.settings.retryDelayMs;
    }
  }
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  if (seconds === 0) return `${minutes}m`;
  return `${minutes}m ${seconds}s`;
}
