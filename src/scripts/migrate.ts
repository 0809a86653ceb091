import dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../config/app.config';
import { createPostgresDbAdapter } from '../adapters/db/postgres.adapter';
import { errorMessage, logger } from '../utils/logger';

dotenv.config();

/**
 * Applies sql/schema.sql. Every statement in it is idempotent, so this runs
 * on each deploy.
 */
async function migrate(): Promise<void> {
  const config = loadConfig();
  const schemaPath = join(process.cwd(), 'sql', 'schema.sql');
  const sql = readFileSync(schemaPath, 'utf8');
  const db = createPostgresDbAdapter(config.database);

  await db.connect();
  try {
    // No bound parameters: pg sends the file as one simple query
    await db.withTransaction((tx) => tx.query(sql, undefined, { operation: 'schema_migrate' }));
    logger.info('migrate:complete', { schemaPath });
  } finally {
    await db.disconnect();
  }
}

migrate().catch((error: unknown) => {
  logger.error('migrate:failed', { error: errorMessage(error) });
  process.exit(1);
});
