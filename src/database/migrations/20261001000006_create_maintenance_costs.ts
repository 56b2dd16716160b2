import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_costs', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('request_id')
      .notNullable()
      .unique()
      .references('id')
      .inTable('maintenance_requests')
      .onDelete('CASCADE');
    table.decimal('estimated_cost', 12, 2).notNullable().defaultTo(0);
    table.decimal('approved_cost', 12, 2).notNullable().defaultTo(0);
    table.decimal('actual_cost', 12, 2);
    // { materials, labor, vendor, other, tax }
    table.jsonb('components').notNullable();
    table.decimal('variance', 12, 2);
    table.decimal('variance_percentage', 8, 2);
    table.boolean('within_budget');
    table.timestamp('updated_at', { useTz: true }).defaultTo(knex.fn.now());
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_costs');
}
