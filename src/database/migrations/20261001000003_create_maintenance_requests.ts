import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_requests', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('request_number', 32).notNullable().unique();
    table.uuid('hostel_id').notNullable();
    table.uuid('room_id');
    table.integer('floor');
    table.string('specific_area', 255);
    table.string('title', 255).notNullable();
    table.text('description').notNullable();
    table.string('category', 50).notNullable();
    table.string('priority', 20).notNullable().defaultTo('medium');
    table.string('issue_type', 20).notNullable().defaultTo('routine');
    table.string('status', 20).notNullable().defaultTo('pending');
    table.decimal('estimated_cost', 12, 2);
    table.boolean('requires_approval').notNullable().defaultTo(false);
    table.string('approval_level', 20).notNullable().defaultTo('auto');
    table.boolean('is_preventive').notNullable().defaultTo(false);
    table.uuid('schedule_id');
    table.string('requested_by', 64).notNullable();
    table.string('assigned_to', 64);
    table.string('assigned_by', 64);
    table.timestamp('deadline', { useTz: true });
    table.timestamp('assigned_at', { useTz: true });
    table.timestamp('started_at', { useTz: true });
    table.timestamp('completed_at', { useTz: true });
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).defaultTo(knex.fn.now());
    table.timestamp('deleted_at', { useTz: true });
  });

  await knex.schema.raw(`
    ALTER TABLE maintenance_requests
    ADD CONSTRAINT check_maintenance_requests_priority
    CHECK (priority IN ('low', 'medium', 'high', 'urgent', 'critical'));
  `);

  await knex.schema.raw(`
    ALTER TABLE maintenance_requests
    ADD CONSTRAINT check_maintenance_requests_status
    CHECK (status IN ('pending', 'approved', 'assigned', 'in_progress', 'on_hold', 'completed', 'cancelled', 'rejected'));
  `);

  await knex.schema.raw(`
    ALTER TABLE maintenance_requests
    ADD CONSTRAINT check_maintenance_requests_issue_type
    CHECK (issue_type IN ('routine', 'emergency', 'preventive', 'corrective', 'inspection'));
  `);

  await knex.schema.raw(`
    CREATE INDEX idx_maintenance_requests_hostel_status ON maintenance_requests(hostel_id, status);
    CREATE INDEX idx_maintenance_requests_priority ON maintenance_requests(priority);
    CREATE INDEX idx_maintenance_requests_assigned_to ON maintenance_requests(assigned_to);
    CREATE INDEX idx_maintenance_requests_deadline ON maintenance_requests(deadline) WHERE deadline IS NOT NULL;
    CREATE INDEX idx_maintenance_requests_created_at ON maintenance_requests(created_at);
    CREATE INDEX idx_maintenance_requests_deleted_at ON maintenance_requests(deleted_at) WHERE deleted_at IS NULL;
  `);

  await knex.schema.createTable('maintenance_status_history', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('request_id')
      .notNullable()
      .references('id')
      .inTable('maintenance_requests')
      .onDelete('CASCADE');
    table.string('from_status', 20);
    table.string('to_status', 20).notNullable();
    table.string('changed_by', 64).notNullable();
    table.text('notes');
    table.timestamp('changed_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.raw(`
    CREATE INDEX idx_maintenance_status_history_request ON maintenance_status_history(request_id, changed_at);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_status_history');
  await knex.schema.dropTableIfExists('maintenance_requests');
}
