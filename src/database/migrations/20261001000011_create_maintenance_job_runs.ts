import type { Knex } from 'knex';

/**
 * Runs of the preventive-maintenance scheduler. A row in `running` state
 * younger than the lock timeout keeps other workers from starting a run.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('maintenance_job_runs', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('job_type', 50).notNullable();
    table.string('status', 20).notNullable();
    table.timestamp('started_at', { useTz: true }).notNullable();
    table.timestamp('completed_at', { useTz: true });
    table.integer('requests_created').defaultTo(0);
    table.integer('schedules_skipped').defaultTo(0);
    table.integer('schedules_failed').defaultTo(0);
    table.integer('overdue_approvals').defaultTo(0);
    table.integer('overdue_schedules').defaultTo(0);
    table.integer('duration_ms').defaultTo(0);
    table.text('error_message');
    table.timestamp('created_at', { useTz: true }).defaultTo(knex.fn.now());
  });

  await knex.schema.raw(`
    CREATE INDEX idx_maintenance_job_runs_running
    ON maintenance_job_runs(job_type, status, started_at)
    WHERE status = 'running';
  `);

  await knex.schema.raw(`
    ALTER TABLE maintenance_job_runs
    ADD CONSTRAINT check_maintenance_job_runs_status
    CHECK (status IN ('running', 'completed', 'failed'));
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('maintenance_job_runs');
}
