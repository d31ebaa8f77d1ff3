import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { ExportConnection } from './db.js';

export type LogRecord = { level: string; msg: string; [key: string]: unknown };

export function memoryLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write: (line: string) => {
        records.push(JSON.parse(line) as LogRecord);
      },
    },
  });
  return { logger, records };
}

type TableData = unknown[][] | Error;

/** In-process stand-in for a database connection, keyed by table name. */
export class FakeConnection implements ExportConnection {
  readonly queries: string[] = [];
  closeCalls = 0;

  constructor(private readonly tables: Record<string, TableData>) {}

  async query(sql: string): Promise<unknown[][]> {
    this.queries.push(sql);
    const match = /FROM `([^`]+)`/.exec(sql);
    const data = match ? this.tables[match[1]] : undefined;
    if (data === undefined) throw new Error(`Table '${match?.[1] ?? sql}' doesn't exist`);
    if (data instanceof Error) throw data;
    return data;
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}
