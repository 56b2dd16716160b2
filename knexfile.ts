import 'dotenv/config';
import type { Knex } from 'knex';

const baseConnection: Knex.PgConnectionConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: Number(process.env.DB_PORT) || 5432,
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  database: process.env.DB_NAME || 'hostel_maintenance',
};

const shared: Knex.Config = {
  client: 'pg',
  migrations: {
    directory: './src/database/migrations',
    extension: 'ts',
    tableName: 'knex_migrations',
  },
  seeds: {
    directory: './src/database/seeds',
    extension: 'ts',
  },
};

const config: Record<string, Knex.Config> = {
  development: {
    ...shared,
    connection: baseConnection,
    pool: { min: 1, max: 5 },
  },
  production: {
    ...shared,
    connection: process.env.DATABASE_URL
      ? { connectionString: process.env.DATABASE_URL, ssl: { rejectUnauthorized: false } }
      : baseConnection,
    pool: { min: 2, max: 20 },
  },
};

export default config;
