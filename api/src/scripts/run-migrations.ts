/**
 * Applies the SQL migrations produced by `drizzle-kit generate`.
 * Runs with the compiled app, so neither drizzle-kit nor ts-node is needed
 * at runtime.
 */
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';

const logger = new Logger('Migrations');

async function runMigrations(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  const migrationsFolder = process.env.MIGRATIONS_DIR ?? './drizzle/migrations';

  // A single connection keeps the migration in one session
  const migrationClient = postgres(databaseUrl, { max: 1 });
  try {
    logger.log(`Applying migrations from ${migrationsFolder}`);
    await migrate(drizzle(migrationClient), { migrationsFolder });
    logger.log('Migrations complete');
  } finally {
    await migrationClient.end();
  }
}

runMigrations()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.error(
      'Migration failed:',
      error instanceof Error ? error.message : error,
    );
    process.exit(1);
  });
