import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { createLogger } from '@stockroom/config';
import { createMigrationClient } from './client.js';

const log = createLogger('db:migrate');

const migrationsFolder = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../drizzle');

async function main() {
  const { db, close } = createMigrationClient();
  try {
    log.info({ migrationsFolder }, 'Applying migrations');
    await migrate(db, { migrationsFolder });
    log.info('Migrations applied');
  } finally {
    await close();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Migration failed');
  process.exitCode = 1;
});
