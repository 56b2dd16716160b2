/**
 * Request lifecycle: the closed transition table and the single place a
 * request's status is written.
 */

import { InvalidTransitionError } from './maintenance_errors.js';
import type { MaintenanceTransaction, RecordPatch } from './maintenance_store.js';
import type { MaintenanceRequest, MaintenanceStatus } from './maintenance_types.js';

export const TRANSITIONS: Readonly<Record<MaintenanceStatus, readonly MaintenanceStatus[]>> = {
  pending: ['approved', 'assigned', 'rejected', 'cancelled'],
  approved: ['assigned', 'cancelled'],
  assigned: ['in_progress', 'on_hold', 'cancelled'],
  in_progress: ['completed', 'on_hold', 'cancelled'],
  on_hold: ['in_progress', 'cancelled'],
  completed: [],
  cancelled: [],
  rejected: [],
};

export const TERMINAL_STATUSES: readonly MaintenanceStatus[] = ['completed', 'cancelled', 'rejected'];

/** Statuses that may only be entered with an explanatory note */
export const NOTE_REQUIRED_STATUSES: readonly MaintenanceStatus[] = ['rejected', 'on_hold', 'cancelled'];

export function canTransition(from: MaintenanceStatus, to: MaintenanceStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  requestId: string,
  from: MaintenanceStatus,
  to: MaintenanceStatus
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(requestId, from, to);
  }
}

export interface StatusChange {
  to: MaintenanceStatus;
  actor: string;
  notes?: string | null;
  now: Date;
  /** Extra columns written together with the status */
  patch?: RecordPatch<MaintenanceRequest>;
}

/**
 * Validate the edge, write the new status with its timestamps, and append
 * history and audit rows. The caller holds the request row lock.
 */
export async function applyStatusChange(
  tx: MaintenanceTransaction,
  request: MaintenanceRequest,
  change: StatusChange
): Promise<MaintenanceRequest> {
  assertTransition(request.id, request.status, change.to);

  const stamps: RecordPatch<MaintenanceRequest> = {};
  if (change.to === 'in_progress' && request.startedAt === null) {
    stamps.startedAt = change.now;
  }
  if (change.to === 'completed') {
    stamps.completedAt = change.now;
  }

  const updated = await tx.requests.update(request.id, {
    ...change.patch,
    ...stamps,
    status: change.to,
    updatedAt: change.now,
  });

  await tx.history.append({
    requestId: request.id,
    fromStatus: request.status,
    toStatus: change.to,
    changedBy: change.actor,
    notes: change.notes ?? null,
    changedAt: change.now,
  });

  await tx.audit.record({
    actorId: change.actor,
    hostelId: request.hostelId,
    action: `STATUS_${change.to.toUpperCase()}`,
    entityType: 'maintenance_request',
    entityId: request.id,
    beforeState: { status: request.status },
    afterState: { status: change.to, notes: change.notes ?? null },
  });

  return updated;
}
