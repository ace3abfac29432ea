import 'dotenv/config';
import { migrate } from 'drizzle-orm/neon-http/migrator';
import { createDatabase } from '../src/infrastructure/db/client.js';
import { logger } from '../src/infrastructure/logger.js';

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.fatal({ step: 'migration' }, 'DATABASE_URL is required to migrate the processed-documents table');
    process.exit(1);
  }

  logger.info('Starting database migration');

  try {
    await migrate(createDatabase(databaseUrl), { migrationsFolder: './db/migrations' });
    logger.info('Migrations applied successfully');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message, step: 'migration' }, 'Migration failed');
    process.exit(1);
  }
}

void main();
