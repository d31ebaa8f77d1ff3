import fs from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import mysql from 'mysql2';
import type { ExportConnection } from './db.js';
import { ExportError } from './errors.js';
import type { TableExport, TableSpec } from './types.js';

export const CSV_EXTENSION = '.csv';
const LINE_TERMINATOR = '\r\n';

export function buildSelectQuery(table: string, columns: readonly string[]): string {
  return mysql.format('SELECT ?? FROM ??', [[...columns], table]);
}

export function formatCell(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function escapeCsv(value: unknown): string {
  const text = formatCell(value);
  if (!/[",\n\r]/.test(text)) return text;
  return `"${text.replaceAll('"', '""')}"`;
}

export function toCsvLine(values: readonly unknown[]): string {
  return values.map(escapeCsv).join(',') + LINE_TERMINATOR;
}

export function outputPathFor(outputDir: string, table: string): string {
  return path.join(outputDir, `${table}${CSV_EXTENSION}`);
}

async function safeReplaceFile(tmpPath: string, finalPath: string): Promise<void> {
  try {
    await fs.promises.rename(tmpPath, finalPath);
  } catch (error) {
    const asErr = error as NodeJS.ErrnoException;
    if (asErr.code === 'EEXIST' || asErr.code === 'EPERM') {
      await fs.promises.rm(finalPath, { force: true });
      await fs.promises.rename(tmpPath, finalPath);
      return;
    }
    throw error;
  }
}

function* csvLines(columns: readonly string[], rows: readonly unknown[][]): Generator<string> {
  yield toCsvLine(columns);
  for (const row of rows) yield toCsvLine(row);
}

async function writeCsvFile(filePath: string, columns: readonly string[], rows: readonly unknown[][]): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await pipeline(Readable.from(csvLines(columns, rows)), fs.createWriteStream(tmpPath, { encoding: 'utf8' }));
    await safeReplaceFile(tmpPath, filePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Exports every row of `table` to `<outputDir>/<table>.csv`, replacing the
 * previous file. A failed export leaves the previous file untouched.
 */
export async function exportTable(
  connection: ExportConnection,
  table: Pick<TableSpec, 'name' | 'columns'>,
  outputDir: string,
): Promise<TableExport> {
  let rows: unknown[][];
  try {
    rows = await connection.query(buildSelectQuery(table.name, table.columns));
  } catch (error) {
    throw new ExportError('QueryFailed', table.name, error);
  }

  const filePath = outputPathFor(outputDir, table.name);
  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new ExportError('WriteFailed', table.name, error);
  }

  try {
    await writeCsvFile(filePath, table.columns, rows);
  } catch (error) {
    throw new ExportError('WriteFailed', table.name, error);
  }

  return { filePath, rowCount: rows.length };
}
