// server/src/db/db.ts
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import pg from 'pg';
import { getConfig } from '../config/env';
import * as schema from './schema';

const { Pool } = pg;

export const pool = new Pool({
  connectionString: getConfig().databaseUrl,
  max: 10,
  idleTimeoutMillis: 30_000,
});

pool.on('error', (err) => {
  console.error('❌ Postgres pool error:', err);
});

export const db = drizzle(pool, { schema });

// Either `db` itself or the `tx` handed to db.transaction()
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;
