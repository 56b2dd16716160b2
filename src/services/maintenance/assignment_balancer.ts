/**
 * Assignment Balancer
 *
 * Picks the least-loaded eligible staff member and keeps the assignment
 * history for a request. An assignment row is never edited into a different
 * assignee: reassignment closes the current row and opens a new one.
 */

import {
  AlreadyProcessedError,
  MaintenanceNotFoundError,
  MaintenanceValidationError,
} from './maintenance_errors.js';
import { nextMonthlyNumber } from './maintenance_numbering.js';
import type { MaintenanceTransaction } from './maintenance_store.js';
import type { Assignment, AssignmentKind, MaintenanceRequest } from './maintenance_types.js';

export interface BalancerCandidate {
  assigneeId: string;
  skills: readonly string[];
  activeAssignments: number;
  outstandingHours: number;
}

export interface SuggestOptions {
  requiredSkills?: readonly string[];
  exclude?: readonly string[];
}

/**
 * Least-loaded eligible candidate, ordered by active assignments, then
 * outstanding hours, then id. Null when nobody qualifies.
 */
export function suggestAssignee(
  candidates: readonly BalancerCandidate[],
  options: SuggestOptions = {}
): BalancerCandidate | null {
  const required = options.requiredSkills ?? [];
  const excluded = new Set(options.exclude ?? []);

  const eligible = candidates.filter(
    (candidate) =>
      !excluded.has(candidate.assigneeId) &&
      required.every((skill) => candidate.skills.includes(skill))
  );

  eligible.sort(
    (a, b) =>
      a.activeAssignments - b.activeAssignments ||
      a.outstandingHours - b.outstandingHours ||
      a.assigneeId.localeCompare(b.assigneeId)
  );

  return eligible[0] ?? null;
}

export interface StaffAssignmentData {
  assigneeId: string;
  assignedBy: string;
  estimatedHours: number | null;
  deadline: Date | null;
  instructions: string | null;
  requiredSkills: string[];
}

export interface VendorAssignmentData {
  vendorId: string;
  assignedBy: string;
  quotedAmount: number;
  estimatedHours: number | null;
  deadline: Date | null;
  instructions: string | null;
}

export interface ReassignmentData {
  newAssigneeId: string;
  reassignedBy: string;
  reason: string;
  estimatedHours: number | null;
  deadline: Date | null;
}

export interface AssignmentCompletionData {
  actualHours: number;
  qualityRating: number | null;
  completionNotes: string | null;
}

export class AssignmentBalancer {
  async assignStaff(
    tx: MaintenanceTransaction,
    request: MaintenanceRequest,
    data: StaffAssignmentData,
    now: Date
  ): Promise<Assignment> {
    await this.assertNoActive(tx, request.id, 'staff');
    return tx.assignments.insert({
      requestId: request.id,
      kind: 'staff',
      assigneeId: data.assigneeId,
      assignedBy: data.assignedBy,
      estimatedHours: data.estimatedHours,
      actualHours: null,
      quotedAmount: null,
      workOrderNumber: null,
      deadline: data.deadline,
      instructions: data.instructions,
      requiredSkills: [...data.requiredSkills],
      isActive: true,
      isCompleted: false,
      startedAt: null,
      completedAt: null,
      qualityRating: null,
      completionNotes: null,
      reassignedFrom: null,
      reassignmentReason: null,
      createdAt: now,
    });
  }

  async assignVendor(
    tx: MaintenanceTransaction,
    request: MaintenanceRequest,
    data: VendorAssignmentData,
    now: Date
  ): Promise<Assignment> {
    await this.assertNoActive(tx, request.id, 'vendor');
    const workOrderNumber = await nextMonthlyNumber(tx, 'WO', 'global', now);
    return tx.assignments.insert({
      requestId: request.id,
      kind: 'vendor',
      assigneeId: data.vendorId,
      assignedBy: data.assignedBy,
      estimatedHours: data.estimatedHours,
      actualHours: null,
      quotedAmount: data.quotedAmount,
      workOrderNumber,
      deadline: data.deadline,
      instructions: data.instructions,
      requiredSkills: [],
      isActive: true,
      isCompleted: false,
      startedAt: null,
      completedAt: null,
      qualityRating: null,
      completionNotes: null,
      reassignedFrom: null,
      reassignmentReason: null,
      createdAt: now,
    });
  }

  /**
   * Deactivate the current assignment and open a replacement carrying the
   * same kind, instructions and skills.
   */
  async reassign(
    tx: MaintenanceTransaction,
    assignmentId: string,
    data: ReassignmentData,
    now: Date
  ): Promise<{ previous: Assignment; current: Assignment }> {
    const existing = await this.loadOpen(tx, assignmentId);

    if (existing.assigneeId === data.newAssigneeId) {
      throw new MaintenanceValidationError(
        `Assignment ${assignmentId} is already held by ${data.newAssigneeId}`
      );
    }

    const previous = await tx.assignments.updateIfActive(assignmentId, {
      isActive: false,
      reassignmentReason: data.reason,
    });
    if (!previous) {
      throw new AlreadyProcessedError('Assignment', assignmentId, 'is no longer active');
    }

    const current = await tx.assignments.insert({
      requestId: existing.requestId,
      kind: existing.kind,
      assigneeId: data.newAssigneeId,
      assignedBy: data.reassignedBy,
      estimatedHours: data.estimatedHours ?? existing.estimatedHours,
      actualHours: null,
      quotedAmount: existing.quotedAmount,
      workOrderNumber: existing.workOrderNumber,
      deadline: data.deadline ?? existing.deadline,
      instructions: existing.instructions,
      requiredSkills: [...existing.requiredSkills],
      isActive: true,
      isCompleted: false,
      startedAt: null,
      completedAt: null,
      qualityRating: null,
      completionNotes: null,
      reassignedFrom: existing.id,
      reassignmentReason: data.reason,
      createdAt: now,
    });

    return { previous, current };
  }

  async markStarted(
    tx: MaintenanceTransaction,
    assignmentId: string,
    now: Date
  ): Promise<Assignment> {
    const existing = await this.loadOpen(tx, assignmentId);
    if (existing.startedAt) {
      return existing;
    }
    const updated = await tx.assignments.updateIfActive(assignmentId, { startedAt: now });
    if (!updated) {
      throw new AlreadyProcessedError('Assignment', assignmentId, 'is no longer active');
    }
    return updated;
  }

  async completeAssignment(
    tx: MaintenanceTransaction,
    assignmentId: string,
    data: AssignmentCompletionData,
    now: Date
  ): Promise<Assignment> {
    await this.loadOpen(tx, assignmentId);
    const updated = await tx.assignments.updateIfActive(assignmentId, {
      isCompleted: true,
      isActive: false,
      completedAt: now,
      actualHours: data.actualHours,
      qualityRating: data.qualityRating,
      completionNotes: data.completionNotes,
    });
    if (!updated) {
      throw new AlreadyProcessedError('Assignment', assignmentId, 'is already completed or inactive');
    }
    return updated;
  }

  private async loadOpen(tx: MaintenanceTransaction, assignmentId: string): Promise<Assignment> {
    const assignment = await tx.assignments.findById(assignmentId, { lock: true });
    if (!assignment) {
      throw new MaintenanceNotFoundError('Assignment', assignmentId);
    }
    if (!assignment.isActive || assignment.isCompleted) {
      throw new AlreadyProcessedError('Assignment', assignmentId, 'is already completed or inactive');
    }
    return assignment;
  }

  private async assertNoActive(
    tx: MaintenanceTransaction,
    requestId: string,
    kind: AssignmentKind
  ): Promise<void> {
    const active = await tx.assignments.findActive(requestId, kind);
    if (active) {
      throw new MaintenanceValidationError(
        `Request ${requestId} already has an active ${kind} assignment (${active.id})`
      );
    }
  }
}
