import mysql from 'mysql2/promise';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { openConnection } from './db.js';
import { ConnectionError } from './errors.js';
import { memoryLogger } from './testUtils.js';
import type { DbConfig } from './types.js';

vi.mock('mysql2/promise', () => ({
  default: { createConnection: vi.fn() },
}));

const createConnection = vi.mocked(mysql.createConnection);

const DB: DbConfig = {
  host: 'db.local',
  port: 3306,
  user: 'exporter',
  password: 'test-secret',
  database: 'sports_day',
  charset: 'utf8mb4',
  collation: 'utf8mb4_unicode_ci',
  connectTimeoutMs: 5_000,
};

function fakeMysqlConnection() {
  return {
    query: vi.fn(async () => [[['100m', 'Red']], []]),
    end: vi.fn(async () => undefined),
    destroy: vi.fn(),
  };
}

describe('openConnection', () => {
  beforeEach(() => {
    createConnection.mockReset();
  });

  it('connects with the configured collation and array rows', async () => {
    const raw = fakeMysqlConnection();
    createConnection.mockResolvedValue(raw as never);
    const { logger } = memoryLogger();

    const connection = await openConnection(DB, logger);
    const rows = await connection.query('SELECT `event_name`, `team_name` FROM `t_group`');

    expect(createConnection).toHaveBeenCalledWith(
      expect.objectContaining({
        host: 'db.local',
        port: 3306,
        user: 'exporter',
        password: 'test-secret',
        database: 'sports_day',
        charset: 'utf8mb4_unicode_ci',
        connectTimeout: 5_000,
        dateStrings: true,
      }),
    );
    expect(raw.query).toHaveBeenCalledWith({ sql: 'SELECT `event_name`, `team_name` FROM `t_group`', rowsAsArray: true });
    expect(rows).toEqual([['100m', 'Red']]);
  });

  it('falls back to the charset when no collation is set', async () => {
    createConnection.mockResolvedValue(fakeMysqlConnection() as never);
    const { logger } = memoryLogger();

    await openConnection({ ...DB, collation: '' }, logger);

    expect(createConnection).toHaveBeenCalledWith(expect.objectContaining({ charset: 'utf8mb4' }));
  });

  it('wraps handshake failures in ConnectionError', async () => {
    createConnection.mockRejectedValue(new Error("Access denied for user 'exporter'@'%'"));
    const { logger } = memoryLogger();

    const error = await openConnection(DB, logger).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      target: 'db.local:3306/sports_day',
      message: "Database connection to db.local:3306/sports_day failed: Access denied for user 'exporter'@'%'",
    });
  });

  it('closes only once', async () => {
    const raw = fakeMysqlConnection();
    createConnection.mockResolvedValue(raw as never);
    const { logger } = memoryLogger();

    const connection = await openConnection(DB, logger);
    await connection.close();
    await connection.close();

    expect(raw.end).toHaveBeenCalledTimes(1);
    expect(raw.destroy).not.toHaveBeenCalled();
  });

  it('destroys the socket when a graceful close fails', async () => {
    const raw = fakeMysqlConnection();
    raw.end.mockRejectedValue(new Error('Connection lost: The server closed the connection.'));
    createConnection.mockResolvedValue(raw as never);
    const { logger, records } = memoryLogger();

    const connection = await openConnection(DB, logger);
    await connection.close();

    expect(raw.destroy).toHaveBeenCalledTimes(1);
    expect(records.find((r) => r.level === 'warn')).toMatchObject({ operation: 'close', target: 'db.local:3306/sports_day' });
  });
});
