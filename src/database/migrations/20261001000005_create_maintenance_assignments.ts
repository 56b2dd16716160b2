import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_assignments', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('request_id')
      .notNullable()
      .references('id')
      .inTable('maintenance_requests')
      .onDelete('CASCADE');
    table.string('kind', 10).notNullable();
    table.string('assignee_id', 64).notNullable();
    table.string('assigned_by', 64).notNullable();
    table.decimal('estimated_hours', 8, 2);
    table.decimal('actual_hours', 8, 2);
    table.decimal('quoted_amount', 12, 2);
    table.string('work_order_number', 32);
    table.timestamp('deadline', { useTz: true });
    table.text('instructions');
    table.jsonb('required_skills').notNullable().defaultTo('[]');
    table.boolean('is_active').notNullable().defaultTo(true);
    table.boolean('is_completed').notNullable().defaultTo(false);
    table.timestamp('started_at', { useTz: true });
    table.timestamp('completed_at', { useTz: true });
    table.integer('quality_rating');
    table.text('completion_notes');
    table.uuid('reassigned_from').references('id').inTable('maintenance_assignments').onDelete('SET NULL');
    table.text('reassignment_reason');
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
  });

  await knex.schema.raw(`
    ALTER TABLE maintenance_assignments
    ADD CONSTRAINT check_maintenance_assignments_kind
    CHECK (kind IN ('staff', 'vendor'));
  `);

  // One open assignment of each kind per request
  await knex.schema.raw(`
    CREATE UNIQUE INDEX idx_maintenance_assignments_one_active
    ON maintenance_assignments(request_id, kind) WHERE is_active AND NOT is_completed;
    CREATE INDEX idx_maintenance_assignments_workload
    ON maintenance_assignments(assignee_id) WHERE kind = 'staff' AND is_active AND NOT is_completed;
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_assignments');
}
