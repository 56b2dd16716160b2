/**
 * Maintenance Workflow - Main exports
 *
 * Usage:
 * ```typescript
 * import db from '../../config/database.js';
 * import { createMaintenanceServices, RabbitMQMaintenancePublisher } from './services/maintenance/index.js';
 *
 * const { engine, scheduler } = createMaintenanceServices(db, new RabbitMQMaintenancePublisher());
 *
 * const request = await engine.create({
 *   hostelId,
 *   title: 'Leaking tap',
 *   description: 'Tap in room 12 drips constantly',
 *   category: 'plumbing',
 *   requestedBy: staffId,
 *   estimatedCost: 250,
 * });
 * ```
 */

import type { Knex } from 'knex';
import { systemClock } from '../../utils/clock.js';
import type { MaintenanceEventPublisher } from './maintenance_events.js';
import { KnexMaintenanceStore } from './maintenance_knex_store.js';
import type { MaintenanceStore } from './maintenance_store.js';
import { MaintenanceWorkflowEngine, type WorkflowEngineOptions } from './maintenance_workflow_engine.js';
import { RecurrenceScheduler } from './recurrence_scheduler.js';

// Engine and components
export { MaintenanceWorkflowEngine } from './maintenance_workflow_engine.js';
export type { WorkflowEngineOptions, AssignmentOutcome, ApprovalOutcome } from './maintenance_workflow_engine.js';
export { RecurrenceScheduler, nextDueDate, reminderDateFor } from './recurrence_scheduler.js';
export type { GenerationResult, GenerationFailure } from './recurrence_scheduler.js';
export { requiredApprovalLevel } from './threshold_policy.js';
export { suggestAssignee } from './assignment_balancer.js';
export type { BalancerCandidate } from './assignment_balancer.js';
export { computeVariance, summarizeBudget } from './cost_ledger.js';
export { canTransition, TRANSITIONS, TERMINAL_STATUSES } from './maintenance_status.js';

// Persistence and events
export { KnexMaintenanceStore } from './maintenance_knex_store.js';
export type { MaintenanceStore, MaintenanceTransaction } from './maintenance_store.js';
export type { MaintenanceEvent, MaintenanceEventPublisher } from './maintenance_events.js';
export { RabbitMQMaintenancePublisher } from './queue/maintenance_event_publisher.js';

// Errors, schemas and types
export * from './maintenance_errors.js';
export * from './maintenance_schemas.js';
export * from './maintenance_types.js';

export interface MaintenanceServices {
  store: MaintenanceStore;
  engine: MaintenanceWorkflowEngine;
  scheduler: RecurrenceScheduler;
}

/**
 * Wire the engine and scheduler to PostgreSQL and an event publisher
 */
export function createMaintenanceServices(
  db: Knex,
  publisher: MaintenanceEventPublisher,
  options: WorkflowEngineOptions = {}
): MaintenanceServices {
  const store = new KnexMaintenanceStore(db);
  const clock = options.clock ?? systemClock;
  const engine = new MaintenanceWorkflowEngine(store, publisher, { ...options, clock });
  const scheduler = new RecurrenceScheduler(store, publisher, clock, engine.settings, engine);
  return { store, engine, scheduler };
}
