/**
 * Database Migration Runner
 *
 * Applies the contract_documents migrations and exits.
 */

import { config, logger, createPool, runMigrations } from '@contract-pipeline/shared';

const pool = createPool(process.env.DATABASE_URL || config.databaseUrl);

async function main(): Promise<void> {
  try {
    logger.info('Running database migrations');
    const applied = await runMigrations(pool);
    logger.info('All migrations complete', { count: applied.length });
  } catch (error) {
    logger.error('Migration failed', error);
    throw error;
  } finally {
    await pool.end();
  }
}

main()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
