import knexLib from 'knex';
import type { Knex } from 'knex';
import knexConfig from '../../knexfile.js';

const environment = process.env.NODE_ENV || 'development';
const config = knexConfig[environment];

if (!config) {
  throw new Error(`No database configuration found for environment: ${environment}`);
}

const db: Knex = knexLib(config);

/**
 * Verify the pool can reach PostgreSQL. Workers call this at startup and
 * exit when it fails.
 */
export async function checkDatabaseConnection(): Promise<boolean> {
  try {
    await db.raw('SELECT 1');
    console.log(`[Database] PostgreSQL connected (${environment})`);
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[Database] PostgreSQL connection failed:', message);
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  await db.destroy();
}

export default db;
