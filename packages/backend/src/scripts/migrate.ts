/**
 * Apply sql/schema.sql to DATABASE_URL. Every statement in the schema is
 * idempotent, so this runs on each deploy.
 *
 * Run with: npm run migrate --workspace=@slotkeeper/backend
 */

import fs from 'fs';
import path from 'path';
import { closeDatabase, pool } from '../utils/database';
import { logger } from '../utils/logger';

// Resolved from the backend package directory, like the projects file
const SCHEMA_FILE = path.resolve(process.cwd(), 'sql/schema.sql');

async function migrate(): Promise<void> {
  const sql = fs.readFileSync(SCHEMA_FILE, 'utf-8');
  const startTime = Date.now();

  await pool.query(sql);

  logger.info({ schemaFile: SCHEMA_FILE, durationMs: Date.now() - startTime }, 'Schema applied');
}

// Run if executed directly
if (require.main === module) {
  migrate()
    .then(() => closeDatabase())
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.fatal({ err }, 'Migration failed');
      process.exit(1);
    });
}

export { migrate };
