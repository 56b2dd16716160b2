import { fixedClock } from '../../../utils/clock.js';
import type { CreateRequestInput } from '../maintenance_schemas.js';
import { MaintenanceWorkflowEngine } from '../maintenance_workflow_engine.js';
import { RecurrenceScheduler } from '../recurrence_scheduler.js';
import { InMemoryMaintenanceStore, RecordingPublisher } from './in_memory_store.js';

export const HOSTEL_ID = 'hostel-1';

/** Thursday 15 October 2026, 09:00 local time */
export const START = new Date(2026, 9, 15, 9, 0, 0);

export function createHarness() {
  const clock = fixedClock(START);
  const store = new InMemoryMaintenanceStore();
  const publisher = new RecordingPublisher();
  const engine = new MaintenanceWorkflowEngine(store, publisher, { clock });
  const scheduler = new RecurrenceScheduler(store, publisher, clock, engine.settings, engine);
  return { clock, store, publisher, engine, scheduler };
}

export function requestInput(overrides: Partial<CreateRequestInput> = {}): CreateRequestInput {
  return {
    hostelId: HOSTEL_ID,
    title: 'Leaking tap',
    description: 'Tap in room 12 drips constantly',
    category: 'plumbing',
    requestedBy: 'staff-1',
    ...overrides,
  };
}
