// Re-derives the due date of every auto-created debt from its sale date.
import { closeDb } from '../database/connection';
import { realignAutoDebtDueDates } from '../services/debt-sync.service';
import { logger } from '../utils/logger';

async function main() {
  const { processed, updated } = await realignAutoDebtDueDates();
  logger.info({ processed, updated }, `Updated ${updated} of ${processed} auto debt(s)`);
}

main()
  .catch((err: unknown) => {
    logger.error({ err }, 'Fixing auto debt due dates failed');
    process.exitCode = 1;
  })
  .finally(() => closeDb());
