import type { Knex } from 'knex';

/**
 * Per-scope counters behind request, work order, certificate and schedule
 * numbers. Scopes look like `MNT:<hostel>:2026-10`.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_sequences', (table) => {
    table.string('scope', 128).primary();
    table.integer('value').notNullable().defaultTo(0);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_sequences');
}
