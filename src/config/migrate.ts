import fs from 'fs';
import path from 'path';
import { pool } from './database';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

async function migrate() {
  const migrationsDir = path.join(__dirname, '../../migrations');
  const files = fs.readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort();

  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  for (const file of files) {
    const applied = await pool.query('SELECT 1 FROM _migrations WHERE name = $1', [file]);
    if (applied.rows.length > 0) {
      logger.info('Skipping migration (already applied)', { file });
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
    logger.info('Running migration', { file });
    await pool.query(sql);
    await pool.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
    logger.info('Applied migration', { file });
  }

  logger.info('All migrations complete', { count: files.length });
  await pool.end();
}

migrate().catch((err) => {
  logger.error('Migration failed', { error: errorMessage(err) });
  process.exit(1);
});
