import type { Knex } from 'knex';

/**
 * Yearly spend allocation per hostel and category. `utilized_amount` grows
 * as actual costs are recorded against requests of that category.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_budgets', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.uuid('hostel_id').notNullable();
    table.string('category', 50).notNullable();
    table.integer('fiscal_year').notNullable();
    table.decimal('allocated_amount', 12, 2).notNullable();
    table.decimal('utilized_amount', 12, 2).notNullable().defaultTo(0);
    table.string('set_by', 64).notNullable();
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).defaultTo(knex.fn.now());

    table.unique(['hostel_id', 'category', 'fiscal_year']);
  });

  await knex.schema.raw(`
    ALTER TABLE maintenance_budgets
    ADD CONSTRAINT check_maintenance_budgets_allocated_positive
    CHECK (allocated_amount > 0);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_budgets');
}
