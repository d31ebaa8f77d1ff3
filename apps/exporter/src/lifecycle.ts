import { createApp } from './app.js';
import type { App } from './app.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { PathsHost } from './paths.js';

export type Exit = (code: number) => never;

export const EXIT_STARTUP_FAILURE = 1;
export const EXIT_FORCED = 130;

/** Builds the app or logs why it could not start and exits with code 1. */
export function startApp(
  env: NodeJS.ProcessEnv,
  exit: Exit,
  options: { logger?: Logger; host?: PathsHost } = {},
): App {
  try {
    return createApp(env, options);
  } catch (error) {
    const logger = options.logger ?? createLogger({ level: 'info' });
    logger.fatal({ err: error }, 'Startup failed');
    return exit(EXIT_STARTUP_FAILURE);
  }
}

/**
 * The first interrupt aborts `controller` so the scheduler stops at its next
 * cancellation point; a second one exits immediately with code 130.
 */
export function createInterruptHandler(
  controller: AbortController,
  logger: Logger,
  exit: Exit,
): (signal: NodeJS.Signals) => void {
  return (signal) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, 'Second interrupt received; exiting immediately');
      return exit(EXIT_FORCED);
    }
    logger.info({ signal }, 'Interrupt received; stopping after the current step');
    controller.abort();
  };
}
