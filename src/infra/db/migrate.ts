import dotenv from 'dotenv';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { logger } from '../logger.js';
import { createPool } from './pool.js';

dotenv.config();

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

const pool = createPool(process.env.DATABASE_URL);

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return { filename, version: parseInt(match[1], 10) };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(): Promise<number[]> {
  const result = await pool.query<{ version: number }>('SELECT version FROM schema_migrations ORDER BY version');
  return result.rows.map((row) => row.version);
}

async function applyMigration({ filename, version }: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    await client.query('COMMIT');
    logger.info({ version, filename }, 'Applied migration');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

async function migrate(): Promise<void> {
  try {
    await ensureMigrationsTable();
    const applied = await getAppliedMigrations();
    const pending = (await getMigrations()).filter((m) => !applied.includes(m.version));

    if (pending.length === 0) {
      logger.info('No pending migrations');
      return;
    }

    for (const migration of pending) {
      await applyMigration(migration);
    }
    logger.info({ count: pending.length }, 'Migrations applied');
  } catch (err) {
    logger.error({ err }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
