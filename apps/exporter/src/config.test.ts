import { describe, expect, it } from 'vitest';
import { MAX_MINUTES, loadConfig } from './config.js';
import { ConfigError } from './errors.js';

const REQUIRED = { DB_USER: 'exporter', DB_NAME: 'sports_day' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ ...REQUIRED });

    expect(config).toEqual({
      db: {
        host: 'localhost',
        port: 3306,
        user: 'exporter',
        password: '',
        database: 'sports_day',
        charset: 'utf8mb4',
        collation: 'utf8mb4_unicode_ci',
        connectTimeoutMs: 10_000,
      },
      export: { folderName: 'DatabaseExports', baseDir: null, tablesFile: null },
      schedule: { intervalMs: 300_000, retryDelayMs: 300_000 },
      logLevel: 'info',
      nodeEnv: 'production',
    });
  });

  it('reads every recognised option', () => {
    const config = loadConfig({
      ...REQUIRED,
      DB_HOST: 'db.school.lan',
      DB_PORT: '3307',
      DB_PASSWORD: 'test-secret',
      DB_CHARSET: 'latin1',
      DB_COLLATION: 'latin1_swedish_ci',
      DESKTOP_FOLDER_NAME: 'SportsDay',
      OUTPUT_BASE_DIR: '/srv/exports',
      INTERVAL_MINUTES: '0.5',
      RETRY_DELAY_MINUTES: '2',
      EXPORT_TABLES_FILE: './tables.json',
      LOG_LEVEL: 'debug',
    });

    expect(config.db).toMatchObject({ host: 'db.school.lan', port: 3307, password: 'test-secret', charset: 'latin1', collation: 'latin1_swedish_ci' });
    expect(config.export).toEqual({ folderName: 'SportsDay', baseDir: '/srv/exports', tablesFile: './tables.json' });
    expect(config.schedule).toEqual({ intervalMs: 30_000, retryDelayMs: 120_000 });
    expect(config.logLevel).toBe('debug');
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ ...REQUIRED, DB_HOST: '  ', INTERVAL_MINUTES: '' });

    expect(config.db.host).toBe('localhost');
    expect(config.schedule.intervalMs).toBe(300_000);
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ DB_NAME: 'sports_day', INTERVAL_MINUTES: '0', DESKTOP_FOLDER_NAME: '../escape' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const problems = caught instanceof ConfigError ? caught.problems : [];
    expect([...new Set(problems.map((p) => p.split(':')[0]))].sort()).toEqual([
      'DB_USER',
      'DESKTOP_FOLDER_NAME',
      'INTERVAL_MINUTES',
    ]);
  });

  it('accepts the longest interval a timer can wait', () => {
    const config = loadConfig({ ...REQUIRED, INTERVAL_MINUTES: String(MAX_MINUTES), RETRY_DELAY_MINUTES: '35791' });

    expect(MAX_MINUTES).toBe(35_791);
    expect(config.schedule).toEqual({ intervalMs: 2_147_460_000, retryDelayMs: 2_147_460_000 });
  });

  it.each([
    ['INTERVAL_MINUTES', '36000'],
    ['RETRY_DELAY_MINUTES', '35792'],
    ['INTERVAL_MINUTES', '0.000001'],
    ['RETRY_DELAY_MINUTES', '0.000001'],
  ])('rejects %s=%s, which a timer cannot wait for', (key, value) => {
    let caught: unknown;
    try {
      loadConfig({ ...REQUIRED, [key]: value });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const problems = caught instanceof ConfigError ? caught.problems : [];
    expect(problems.length).toBeGreaterThan(0);
    expect(problems.every((p) => p.startsWith(`${key}:`))).toBe(true);
  });

  it('keeps a whitespace-only password', () => {
    expect(loadConfig({ ...REQUIRED, DB_PASSWORD: '   ' }).db.password).toBe('   ');
    expect(loadConfig({ ...REQUIRED, DB_PASSWORD: '' }).db.password).toBe('');
  });
});
