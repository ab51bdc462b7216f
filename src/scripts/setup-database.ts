/**
 * Database Setup Script
 * Applies db/schema.sql to DATABASE_URL
 */

import 'dotenv/config';
import { Pool } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';
import { loadConfig, maskDatabaseUrl } from '../config';

async function setupDatabase() {
  const config = loadConfig();
  console.log(`[Setup] Applying schema to ${maskDatabaseUrl(config.databaseUrl)}`);

  const pool = new Pool({ connectionString: config.databaseUrl });
  try {
    const schemaPath = join(__dirname, '../../db/schema.sql');
    // Strip a BOM some editors prepend
    const schema = readFileSync(schemaPath, 'utf-8').replace(/^\uFEFF/, '');

    // Execute as one script so $$...$$ function bodies survive
    await pool.query(schema);

    const tables = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);
    console.log('[Setup] Tables:', tables.rows.map((row) => row.table_name).join(', '));
    console.log('[Setup] Done. Next step: npm run seed');
  } finally {
    await pool.end();
  }
}

setupDatabase()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('[Setup] Failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
