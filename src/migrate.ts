import { Logger } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';

const MIGRATIONS_FOLDER = './drizzle';

async function runMigrations(): Promise<void> {
  const logger = new Logger('Migrations');
  const connectionString = process.env.DATABASE_URL;

  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }

  const client = postgres(connectionString, { max: 1 });
  try {
    logger.log(`Applying migrations from ${MIGRATIONS_FOLDER}`);
    await migrate(drizzle(client), { migrationsFolder: MIGRATIONS_FOLDER });
    logger.log('Database schema is up to date');
  } finally {
    await client.end();
  }
}

runMigrations().catch((error) => {
  console.error('[ERROR] Migration failed:', error);
  process.exit(1);
});
