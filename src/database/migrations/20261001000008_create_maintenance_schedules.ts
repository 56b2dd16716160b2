import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_schedules', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.uuid('hostel_id').notNullable();
    table.string('schedule_code', 32).notNullable();
    table.string('title', 255).notNullable();
    table.text('description');
    table.string('category', 50).notNullable();
    table.string('recurrence', 20).notNullable();
    // { intervalDays?, anchorDayOfMonth? }
    table.jsonb('recurrence_config').notNullable().defaultTo('{}');
    table.timestamp('start_date', { useTz: true }).notNullable();
    table.timestamp('end_date', { useTz: true });
    table.timestamp('next_due_date', { useTz: true }).notNullable();
    table.timestamp('reminder_date', { useTz: true }).notNullable();
    table.string('assigned_to', 64);
    table.decimal('estimated_cost', 12, 2);
    table.boolean('auto_create_requests').notNullable().defaultTo(true);
    table.boolean('is_active').notNullable().defaultTo(true);
    table.integer('total_executions').notNullable().defaultTo(0);
    table.integer('successful_executions').notNullable().defaultTo(0);
    table.timestamp('last_completed_date', { useTz: true });
    table.timestamp('last_generated_due_date', { useTz: true });
    table.string('created_by', 64).notNullable();
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).defaultTo(knex.fn.now());

    table.unique(['hostel_id', 'schedule_code']);
  });

  await knex.schema.raw(`
    ALTER TABLE maintenance_schedules
    ADD CONSTRAINT check_maintenance_schedules_recurrence
    CHECK (recurrence IN ('daily', 'weekly', 'monthly', 'quarterly', 'semi_annual', 'annual', 'custom'));
  `);

  await knex.schema.raw(`
    CREATE INDEX idx_maintenance_schedules_due
    ON maintenance_schedules(next_due_date) WHERE is_active AND auto_create_requests;
  `);

  await knex.schema.createTable('maintenance_schedule_executions', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('schedule_id')
      .notNullable()
      .references('id')
      .inTable('maintenance_schedules')
      .onDelete('CASCADE');
    table.uuid('request_id').references('id').inTable('maintenance_requests').onDelete('SET NULL');
    table.timestamp('scheduled_date', { useTz: true }).notNullable();
    table.timestamp('execution_date', { useTz: true }).notNullable();
    table.string('executed_by', 64).notNullable();
    table.boolean('completed').notNullable();
    table.text('notes');
    table.decimal('actual_cost', 12, 2);
    table.integer('quality_rating');
    table.boolean('was_on_time').notNullable();
    table.integer('days_delayed').notNullable().defaultTo(0);
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
  });

  await knex.schema.alterTable('maintenance_requests', (table) => {
    table.foreign('schedule_id').references('id').inTable('maintenance_schedules').onDelete('SET NULL');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable('maintenance_requests', (table) => {
    table.dropForeign(['schedule_id']);
  });
  await knex.schema.dropTableIfExists('maintenance_schedule_executions');
  await knex.schema.dropTableIfExists('maintenance_schedules');
}
