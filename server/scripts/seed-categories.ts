// Creates the default categories that are missing. Safe to run repeatedly.
import { closeDb } from '../database/connection';
import { categoryService } from '../services/category.service';
import { logger } from '../utils/logger';

async function main() {
  const { created, existing } = await categoryService.ensureDefaultCategories();
  for (const name of created) logger.info(`Created category: ${name}`);
  logger.info({ created: created.length, existing: existing.length }, 'Default categories ensured');
}

main()
  .catch((err: unknown) => {
    logger.error({ err }, 'Seeding categories failed');
    process.exitCode = 1;
  })
  .finally(() => closeDb());
