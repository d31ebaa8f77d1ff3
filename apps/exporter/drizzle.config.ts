import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

const host = process.env.DB_HOST?.trim() || 'localhost';
const port = Number(process.env.DB_PORT ?? 3306);
const database = process.env.DB_NAME?.trim();

if (!database) {
  throw new Error('Set DB_NAME (and DB_USER / DB_PASSWORD) before running drizzle-kit against a development database.');
}

export default defineConfig({
  schema: './drizzle/schema.ts',
  dialect: 'mysql',
  dbCredentials: {
    host,
    port,
    user: process.env.DB_USER?.trim(),
    password: process.env.DB_PASSWORD,
    database,
  },
});
