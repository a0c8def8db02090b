import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { migrate } from '../infra/db/migrate.js';
import { createPool } from '../infra/db/pool.js';
import { logger } from '../infra/logger.js';

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const pool = createPool(config.databaseUrl, logger);

  try {
    logger.info('Starting migrations...');
    const count = await migrate(pool);
    logger.info(count === 0 ? 'No pending migrations.' : 'All migrations applied successfully.', {
      applied: count,
    });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error('Migration failed', error instanceof Error ? error : { error: String(error) });
  process.exitCode = 1;
});
