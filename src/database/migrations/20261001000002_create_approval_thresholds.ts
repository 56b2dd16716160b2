import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('approval_thresholds', (table) => {
    table.uuid('hostel_id').primary();
    table.decimal('auto_approve_below', 12, 2).notNullable().defaultTo(1000);
    table.decimal('supervisor_limit', 12, 2).notNullable().defaultTo(5000);
    table.decimal('admin_required_above', 12, 2).notNullable().defaultTo(5000);
    table.boolean('auto_approve_enabled').notNullable().defaultTo(true);
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).defaultTo(knex.fn.now());
  });

  await knex.schema.raw(`
    ALTER TABLE approval_thresholds
    ADD CONSTRAINT check_approval_thresholds_order
    CHECK (auto_approve_below <= supervisor_limit AND auto_approve_below <= admin_required_above);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('approval_thresholds');
}
