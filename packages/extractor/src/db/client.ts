import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import type { DbConfig } from '../config';
import * as schema from './schema';

export type DrizzleDb = ReturnType<typeof drizzle<typeof schema>>;

let pool: Pool | null = null;
let db: DrizzleDb | null = null;

export function getDb(config?: DbConfig): DrizzleDb {
  if (!db) {
    pool = new Pool({
      host: config?.host ?? process.env.DB_HOST ?? 'localhost',
      port: config?.port ?? Number(process.env.DB_PORT ?? 5432),
      user: config?.user ?? process.env.DB_USER ?? 'postgres',
      password: config?.password ?? process.env.DB_PASSWORD ?? 'postgres',
      database: config?.database ?? process.env.DB_NAME ?? 'warehouse',
      max: 4,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
    db = drizzle(pool, { schema });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
