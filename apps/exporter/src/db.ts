import mysql from 'mysql2/promise';
import type { Connection, RowDataPacket } from 'mysql2/promise';
import { ConnectionError } from './errors.js';
import type { Logger } from './logger.js';
import type { DbConfig } from './types.js';

/** The single live handle a batch job reads through. */
export interface ExportConnection {
  /** Runs a read query and returns each row as an array, in SELECT-list order. */
  query(sql: string): Promise<unknown[][]>;
  /** Idempotent. */
  close(): Promise<void>;
}

export function describeTarget(config: Pick<DbConfig, 'host' | 'port' | 'database'>): string {
  return `${config.host}:${config.port}/${config.database}`;
}

class MysqlExportConnection implements ExportConnection {
  private closed = false;

  constructor(
    private readonly connection: Connection,
    private readonly logger: Logger,
  ) {}

  async query(sql: string): Promise<unknown[][]> {
    const [rows] = await this.connection.query<RowDataPacket[][]>({ sql, rowsAsArray: true });
    return rows;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.connection.end();
    } catch (error) {
      this.logger.warn({ err: error, operation: 'close' }, 'Graceful close failed; destroying connection');
      this.connection.destroy();
    }
  }
}

export async function openConnection(config: DbConfig, logger: Logger): Promise<ExportConnection> {
  const target = describeTarget(config);
  try {
    const connection = await mysql.createConnection({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      // mysql2 takes a collation name here and derives the character set from it.
      charset: config.collation || config.charset,
      connectTimeout: config.connectTimeoutMs,
      dateStrings: true,
      supportBigNumbers: true,
      bigNumberStrings: true,
    });
    logger.debug({ target }, 'Database connection opened');
    return new MysqlExportConnection(connection, logger.child({ target }));
  } catch (error) {
    throw new ConnectionError(target, error);
  }
}
