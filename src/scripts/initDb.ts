// server/src/scripts/initDb.ts
// Creates the tables and indexes from schema.sql. Safe to run more than once.
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { pool } from '../db/db';

const schemaPath = fileURLToPath(new URL('../db/schema.sql', import.meta.url));

async function main() {
  const sql = await readFile(schemaPath, 'utf8');
  console.log(`🗄️  Applying ${schemaPath}`);
  await pool.query(sql);
  console.log('✅ Database schema is up to date');
}

main()
  .catch((err: unknown) => {
    console.error('❌ Database init failed:', err);
    process.exitCode = 1;
  })
  .finally(() => pool.end());
