import 'dotenv/config';
import crypto from 'crypto';
import db, { checkDatabaseConnection } from '../config/database.js';
import { MAINTENANCE_CONFIG } from '../config/maintenance_config.js';
import { closeRabbitMQ } from '../config/rabbitmq.js';
import { createMaintenanceServices } from '../services/maintenance/index.js';
import { RabbitMQMaintenancePublisher } from '../services/maintenance/queue/maintenance_event_publisher.js';

/**
 * Preventive Maintenance Scheduler Job
 *
 * One run per invocation, started by an external trigger (cron, a scheduled
 * container task). Turns due preventive schedules into maintenance requests,
 * then reports overdue approvals and overdue schedules.
 *
 * - Database lock row so only one run is live at a time
 * - Exit code 0 when the run succeeded or another run holds the lock
 * - Exit code 1 when the run or any schedule in it failed
 * - SIGTERM/SIGINT mark the live run failed before exiting
 */

const LOCK_TIMEOUT_MS = MAINTENANCE_CONFIG.SCHEDULER_LOCK_TIMEOUT_MS;
const JOB_TYPE = 'preventive_generation';

const publisher = new RabbitMQMaintenancePublisher();
const { engine, scheduler } = createMaintenanceServices(db, publisher);

let currentRunId: string | null = null;

interface RunStats {
  requestsCreated?: number;
  schedulesSkipped?: number;
  schedulesFailed?: number;
  overdueApprovals?: number;
  overdueSchedules?: number;
  durationMs?: number;
  errorMessage?: string;
}

/**
 * Returns the run id when the lock was taken, null if another run is live
 */
async function acquireRunLock(): Promise<string | null> {
  const running = await db('maintenance_job_runs')
    .where('job_type', JOB_TYPE)
    .where('status', 'running')
    .where('started_at', '>', new Date(Date.now() - LOCK_TIMEOUT_MS))
    .first();

  if (running) {
    console.log(`[Scheduler] ⏸️  Run already in progress (ID: ${running.id})`);
    return null;
  }

  const staleCount = await db('maintenance_job_runs')
    .where('job_type', JOB_TYPE)
    .where('status', 'running')
    .where('started_at', '<=', new Date(Date.now() - LOCK_TIMEOUT_MS))
    .update({
      status: 'failed',
      completed_at: new Date(),
      error_message: 'Run timed out (stale lock released)',
    });

  if (staleCount > 0) {
    console.log(`[Scheduler] 🧹 Released ${staleCount} stale lock(s)`);
  }

  const runId = crypto.randomUUID();
  await db('maintenance_job_runs').insert({
    id: runId,
    job_type: JOB_TYPE,
    status: 'running',
    started_at: new Date(),
  });
  return runId;
}

async function releaseRunLock(runId: string, success: boolean, stats: RunStats): Promise<void> {
  try {
    await db('maintenance_job_runs')
      .where('id', runId)
      .update({
        status: success ? 'completed' : 'failed',
        completed_at: new Date(),
        requests_created: stats.requestsCreated || 0,
        schedules_skipped: stats.schedulesSkipped || 0,
        schedules_failed: stats.schedulesFailed || 0,
        overdue_approvals: stats.overdueApprovals || 0,
        overdue_schedules: stats.overdueSchedules || 0,
        duration_ms: stats.durationMs || 0,
        error_message: stats.errorMessage,
      });
  } catch (error) {
    console.error('[Scheduler] ❌ Error releasing run lock:', error);
  }
}

/**
 * Returns true when the run succeeded or was skipped for a live lock
 */
async function runOnce(): Promise<boolean> {
  const startTime = Date.now();
  const runId = await acquireRunLock();
  if (!runId) {
    return true;
  }
  currentRunId = runId;

  try {
    const generation = await scheduler.generateDueRequests();
    const overdueApprovals = await engine.findOverdueApprovals();
    const overdueSchedules = await scheduler.findOverdueSchedules();
    const durationMs = Date.now() - startTime;

    if (overdueApprovals.length > 0) {
      console.warn(
        `[Scheduler] ⚠️  ${overdueApprovals.length} approvals waiting longer than ${engine.settings.overdueApprovalHours}h`
      );
    }

    const success = generation.failed.length === 0;
    await releaseRunLock(runId, success, {
      requestsCreated: generation.created.length,
      schedulesSkipped: generation.skipped,
      schedulesFailed: generation.failed.length,
      overdueApprovals: overdueApprovals.length,
      overdueSchedules: overdueSchedules.length,
      durationMs,
      errorMessage: success
        ? undefined
        : generation.failed.map((failure) => `${failure.scheduleId}: ${failure.error.message}`).join('; '),
    });

    console.log(`[Scheduler] ✅ Run finished in ${durationMs}ms`);
    return success;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error('[Scheduler] ❌ Run failed:', errorMessage);
    await releaseRunLock(runId, false, { durationMs: Date.now() - startTime, errorMessage });
    return false;
  } finally {
    currentRunId = null;
  }
}

async function closeConnections(): Promise<void> {
  try {
    await publisher.close();
    await closeRabbitMQ();
    await db.destroy();
    console.log('[Scheduler] 🔌 Connections closed');
  } catch (error) {
    console.error('[Scheduler] ❌ Error closing connections:', error);
  }
}

async function interrupt(signal: string): Promise<void> {
  console.log(`\n[Scheduler] 📴 Received ${signal}, stopping run...`);
  if (currentRunId) {
    await releaseRunLock(currentRunId, false, { errorMessage: `Interrupted by ${signal}` });
  }
  await closeConnections();
  process.exit(1);
}

async function main(): Promise<void> {
  console.log('[Scheduler] 🔄 Starting preventive maintenance run...');

  if (!(await checkDatabaseConnection())) {
    await closeConnections();
    process.exit(1);
  }

  process.on('SIGTERM', () => void interrupt('SIGTERM'));
  process.on('SIGINT', () => void interrupt('SIGINT'));

  const success = await runOnce();
  await closeConnections();
  process.exit(success ? 0 : 1);
}

main().catch(async (error) => {
  console.error('[Scheduler] ❌ Fatal error:', error);
  await closeConnections();
  process.exit(1);
});
