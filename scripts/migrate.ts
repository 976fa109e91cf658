import 'dotenv/config';
import { migrate } from 'drizzle-orm/neon-http/migrator';
import { createDatabase } from '../src/infrastructure/db/client.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'migrate' });

async function main(): Promise<void> {
  const url = process.env.DATABASE_URL;
  if (!url) {
    log.error('DATABASE_URL environment variable is not set');
    process.exit(1);
  }

  log.info('Starting database migration');

  try {
    await migrate(createDatabase(url), { migrationsFolder: './db/migrations' });
    log.info('Migrations applied successfully');
  } catch (error) {
    log.error({ error: error instanceof Error ? error.message : String(error) }, 'Migration failed');
    process.exit(1);
  }
}

void main();
