/* eslint-disable no-console */
/**
 * Run outbox migrations.
 *
 * Executes SQL migration files from the migrations/ directory against the
 * customer database, in filename order, recording each applied file in
 * schema_migrations so a re-run skips it.
 *
 * Usage:
 *   npm run db:migrate
 *
 * Environment:
 *   DATABASE_URL
 */

import { config } from 'dotenv';
config();

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pkg from 'pg';
const { Pool } = pkg;

const MIGRATIONS_DIR = fileURLToPath(new URL('../migrations', import.meta.url));

function getConnectionString(): string {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error('Database not configured. Set DATABASE_URL.');
  }
  return url;
}

async function main(): Promise<void> {
  const connectionString = getConnectionString();

  // Mask password in log output
  const safeUrl = connectionString.replace(/:([^@/]+)@/, ':****@');
  console.log(`[migrate] Connecting to: ${safeUrl}`);

  const pool = new Pool({ connectionString });

  try {
    const files = fs
      .readdirSync(MIGRATIONS_DIR)
      .filter((f) => f.endsWith('.sql'))
      .sort();
    console.log(`[migrate] Found ${files.length} migration files`);

    await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        filename TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    for (const file of files) {
      const { rowCount } = await pool.query('SELECT 1 FROM schema_migrations WHERE filename = $1', [
        file,
      ]);
      if (rowCount && rowCount > 0) {
        console.log(`[migrate] Skipping (already applied): ${file}`);
        continue;
      }

      const sqlContent = fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf-8');

      console.log(`[migrate] Running: ${file}`);
      // One client per file so BEGIN/COMMIT bracket the same connection.
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(sqlContent);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await client.query('COMMIT');
        console.log(`[migrate] OK: ${file}`);
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          console.error('[migrate] ROLLBACK failed:', rollbackErr);
        });
        console.error(`[migrate] FAILED: ${file}`, err instanceof Error ? err.message : err);
        throw err;
      } finally {
        client.release();
      }
    }

    console.log('[migrate] All migrations completed successfully');
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('[migrate] Fatal error:', err);
  process.exit(1);
});
