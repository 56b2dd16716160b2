import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_approvals', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('request_id')
      .notNullable()
      .references('id')
      .inTable('maintenance_requests')
      .onDelete('CASCADE');
    table.string('requested_by', 64).notNullable();
    table.decimal('estimated_cost', 12, 2).notNullable();
    table.text('justification').notNullable();
    table.string('approval_level', 20).notNullable();
    // NULL while pending
    table.boolean('approved');
    table.decimal('approved_amount', 12, 2);
    table.text('conditions');
    table.text('decision_notes');
    table.string('decided_by', 64);
    table.timestamp('decided_at', { useTz: true });
    table.text('rejection_reason');
    table.boolean('allow_resubmission').notNullable().defaultTo(true);
    table.boolean('retroactive').notNullable().defaultTo(false);
    table.timestamp('requested_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('deadline', { useTz: true }).notNullable();
    table.boolean('escalated').notNullable().defaultTo(false);
    table.timestamp('escalated_at', { useTz: true });
    table.text('escalation_reason');
  });

  // At most one unresolved approval per request
  await knex.schema.raw(`
    CREATE UNIQUE INDEX idx_maintenance_approvals_one_open
    ON maintenance_approvals(request_id) WHERE approved IS NULL;
  `);

  await knex.schema.raw(`
    CREATE INDEX idx_maintenance_approvals_open_requested_at
    ON maintenance_approvals(requested_at) WHERE approved IS NULL;
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_approvals');
}
