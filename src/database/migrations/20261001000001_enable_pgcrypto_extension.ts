import type { Knex } from 'knex';

/**
 * gen_random_uuid() for every primary key below
 */
export async function up(knex: Knex): Promise<void> {
  await knex.raw('CREATE EXTENSION IF NOT EXISTS "pgcrypto"');
  console.log('✅ pgcrypto extension enabled');
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw('DROP EXTENSION IF EXISTS "pgcrypto"');
}
