import fs from 'node:fs';
import { getTableConfig } from 'drizzle-orm/mysql-core';
import type { MySqlTable } from 'drizzle-orm/mysql-core';
import { z } from 'zod';
import { groupResults, individualResults } from '../drizzle/schema.js';
import { ConfigError, describeError } from './errors.js';
import type { TableCategory, TableSpec } from './types.js';

const IDENTIFIER = /^[A-Za-z0-9_$]+$/;

const IdentifierSchema = z.string().regex(IDENTIFIER, 'must contain only letters, digits, "_" or "$"');

const TableSpecSchema = z.object({
  name: IdentifierSchema,
  category: z.enum(['group', 'individual']),
  columns: z
    .array(IdentifierSchema)
    .min(1, 'at least one column is required')
    .refine((columns) => new Set(columns).size === columns.length, { message: 'columns must be unique' }),
});

const TableSpecListSchema = z
  .array(TableSpecSchema)
  .min(1, 'at least one table is required')
  .refine((tables) => new Set(tables.map((t) => t.name)).size === tables.length, {
    message: 'table names must be unique',
  });

function freezeSpec(spec: TableSpec): TableSpec {
  return Object.freeze({ ...spec, columns: Object.freeze([...spec.columns]) });
}

export function tableSpecFromSchema(table: MySqlTable, category: TableCategory): TableSpec {
  const config = getTableConfig(table);
  return freezeSpec({ name: config.name, category, columns: config.columns.map((column) => column.name) });
}

export const DEFAULT_TABLES: readonly TableSpec[] = Object.freeze([
  tableSpecFromSchema(groupResults, 'group'),
  tableSpecFromSchema(individualResults, 'individual'),
]);

export function parseTableSpecs(input: unknown, source = 'table specifications'): readonly TableSpec[] {
  const parsed = TableSpecListSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${source}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(problems, { cause: parsed.error });
  }
  return Object.freeze(parsed.data.map(freezeSpec));
}

export function loadTableSpecs(tablesFile: string | null): readonly TableSpec[] {
  if (!tablesFile) return DEFAULT_TABLES;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(tablesFile, 'utf8'));
  } catch (error) {
    throw new ConfigError([`EXPORT_TABLES_FILE: cannot read ${tablesFile}: ${describeError(error)}`], { cause: error });
  }
  return parseTableSpecs(raw, tablesFile);
}
