import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_completions', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('request_id')
      .notNullable()
      .unique()
      .references('id')
      .inTable('maintenance_requests')
      .onDelete('CASCADE');
    table.string('completed_by', 64).notNullable();
    table.text('work_notes').notNullable();
    table.decimal('labor_hours', 8, 2).notNullable();
    table.decimal('labor_rate_per_hour', 10, 2);
    table.jsonb('components').notNullable();
    table.decimal('actual_cost', 12, 2).notNullable();
    table.jsonb('materials').notNullable().defaultTo('[]');
    table.timestamp('actual_start_date', { useTz: true });
    table.timestamp('actual_completion_date', { useTz: true }).notNullable();
    table.boolean('quality_verified').notNullable().defaultTo(false);
    table.string('quality_verified_by', 64);
    table.timestamp('quality_verified_at', { useTz: true });
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('maintenance_quality_checks', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('completion_id')
      .notNullable()
      .references('id')
      .inTable('maintenance_completions')
      .onDelete('CASCADE');
    table.uuid('request_id').notNullable().references('id').inTable('maintenance_requests').onDelete('CASCADE');
    table.string('checked_by', 64).notNullable();
    table.boolean('passed').notNullable();
    table.integer('overall_rating');
    table.jsonb('checklist').notNullable();
    table.boolean('rework_required').notNullable().defaultTo(false);
    table.text('rework_details');
    table.timestamp('rework_deadline', { useTz: true });
    table.text('notes');
    table.timestamp('checked_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('maintenance_certificates', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('completion_id')
      .notNullable()
      .unique()
      .references('id')
      .inTable('maintenance_completions')
      .onDelete('RESTRICT');
    table.uuid('request_id').notNullable().references('id').inTable('maintenance_requests').onDelete('RESTRICT');
    table.string('certificate_number', 32).notNullable().unique();
    table.string('work_title', 255).notNullable();
    table.string('work_category', 50).notNullable();
    table.string('completed_by', 64).notNullable();
    table.string('verified_by', 64).notNullable();
    table.string('approved_by', 64).notNullable();
    table.timestamp('work_start_date', { useTz: true }).notNullable();
    table.timestamp('completion_date', { useTz: true }).notNullable();
    table.timestamp('verification_date', { useTz: true }).notNullable();
    table.timestamp('issue_date', { useTz: true }).notNullable();
    table.decimal('labor_hours', 8, 2).notNullable();
    table.decimal('total_cost', 12, 2).notNullable();
    table.integer('quality_rating');
    table.boolean('warranty_applicable').notNullable().defaultTo(false);
    table.integer('warranty_period_months');
    table.text('warranty_terms');
    table.timestamp('warranty_valid_until', { useTz: true });
  });

  await knex.schema.raw(`
    CREATE INDEX idx_maintenance_quality_checks_completion ON maintenance_quality_checks(completion_id);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_certificates');
  await knex.schema.dropTableIfExists('maintenance_quality_checks');
  await knex.schema.dropTableIfExists('maintenance_completions');
}
