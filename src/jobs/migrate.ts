// src/jobs/migrate.ts
// Apply sql/schema.sql to DATABASE_URL

import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { closePool, getPool } from '../db';

// Source tree (src/jobs) or compiled tree (dist/src/jobs)
const SCHEMA_PATH = [
  path.resolve(__dirname, '../../sql/schema.sql'),
  path.resolve(__dirname, '../../../sql/schema.sql'),
].find((candidate) => fs.existsSync(candidate));

async function main() {
  if (!SCHEMA_PATH) {
    throw new Error('sql/schema.sql not found');
  }
  const sql = fs.readFileSync(SCHEMA_PATH, 'utf8');

  console.log(`Applying ${SCHEMA_PATH}...`);
  await getPool().query(sql);
  console.log('✅ Schema up to date');
}

main()
  .catch((e) => {
    console.error('Error:', e instanceof Error ? e.message : e);
    process.exitCode = 1;
  })
  .finally(() =>
    closePool().catch((e: unknown) => console.error('Pool shutdown failed:', e))
  );
