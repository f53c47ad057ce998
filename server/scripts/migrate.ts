// Applies pending migrations: npm run db:migrate
import { closeDb, getDb } from '../database/connection';
import { logger } from '../utils/logger';

async function main() {
  const [batch, applied] = await getDb().migrate.latest();
  if (applied.length === 0) {
    logger.info('Already up to date');
  } else {
    logger.info({ batch, applied }, `Applied ${applied.length} migration(s)`);
  }
}

main()
  .catch((err: unknown) => {
    logger.error({ err }, 'Migration failed');
    process.exitCode = 1;
  })
  .finally(() => closeDb());
