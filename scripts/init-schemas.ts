import {
  closeDatabase,
  createDatabase,
  createLogger,
} from '@marketsync/process-lib';
import { sql } from 'drizzle-orm';

const schemas = ['integrations'];

const logger = createLogger('init-schemas');

async function initSchemas() {
  const db = createDatabase(process.env.DATABASE_URL);

  try {
    for (const schema of schemas) {
      await db.execute(
        sql`CREATE SCHEMA IF NOT EXISTS ${sql.identifier(schema)}`,
      );
      logger.info({ schema }, 'Created schema');
    }
  } finally {
    await closeDatabase();
  }

  logger.info('All schemas created. Run db:migrate next.');
}

initSchemas().catch((err: unknown) => {
  logger.error({ err }, 'Schema initialisation failed');
  process.exitCode = 1;
});
