/**
 * Approval Workflow
 *
 * Opens, resolves and escalates cost approvals. Resolution is a conditional
 * update on the unresolved row, so two concurrent decisions on the same
 * approval produce exactly one winner; the loser gets AlreadyProcessedError.
 */

import { addHours, subHours } from 'date-fns';
import type { MaintenanceSettings } from '../../config/maintenance_config.js';
import {
  AlreadyProcessedError,
  MaintenanceNotFoundError,
  MaintenanceValidationError,
} from './maintenance_errors.js';
import type { MaintenanceTransaction, RecordPatch } from './maintenance_store.js';
import { isHigherApprovalLevel, requiredApprovalLevel } from './threshold_policy.js';
import type { ApprovalLevel, ApprovalRecord, MaintenanceRequest } from './maintenance_types.js';

export interface OpenApprovalData {
  requestedBy: string;
  estimatedCost: number;
  justification: string | null;
  /** Computed from the hostel thresholds when omitted */
  level?: ApprovalLevel;
  retroactive?: boolean;
}

export interface ApprovalDecision {
  decidedBy: string;
  approvedAmount: number | null;
  conditions: string | null;
  notes: string | null;
}

export interface RejectionDecision {
  decidedBy: string;
  reason: string;
  allowResubmission: boolean;
}

export interface EscalationData {
  escalatedBy: string;
  toLevel: ApprovalLevel;
  reason: string;
}

type ApprovalSettings = Pick<MaintenanceSettings, 'approvalDeadlineHours' | 'defaultThresholds'>;

export class ApprovalWorkflow {
  constructor(private settings: ApprovalSettings) {}

  async open(
    tx: MaintenanceTransaction,
    request: MaintenanceRequest,
    data: OpenApprovalData,
    now: Date
  ): Promise<ApprovalRecord> {
    const existing = await tx.approvals.findOpenForRequest(request.id);
    if (existing) {
      throw new MaintenanceValidationError(
        `Request ${request.id} already has an open approval (${existing.id})`
      );
    }

    const level = data.level ?? (await this.levelFor(tx, request.hostelId, data.estimatedCost));
    if (level === 'auto') {
      throw new MaintenanceValidationError(
        `Request ${request.id} does not require approval at cost ${data.estimatedCost.toFixed(2)}`
      );
    }

    const approval = await tx.approvals.insert({
      requestId: request.id,
      requestedBy: data.requestedBy,
      estimatedCost: data.estimatedCost,
      justification: data.justification ?? `Approval required for ${request.title}`,
      approvalLevel: level,
      approved: null,
      approvedAmount: null,
      conditions: null,
      decisionNotes: null,
      decidedBy: null,
      decidedAt: null,
      rejectionReason: null,
      allowResubmission: true,
      retroactive: data.retroactive ?? false,
      requestedAt: now,
      deadline: addHours(now, this.settings.approvalDeadlineHours),
      escalated: false,
      escalatedAt: null,
      escalationReason: null,
    });

    await tx.audit.record({
      actorId: data.requestedBy,
      hostelId: request.hostelId,
      action: 'CREATE_MAINTENANCE_APPROVAL',
      entityType: 'maintenance_approval',
      entityId: approval.id,
      afterState: approval,
    });

    return approval;
  }

  async levelFor(
    tx: MaintenanceTransaction,
    hostelId: string,
    estimatedCost: number | null
  ): Promise<ApprovalLevel> {
    const config = await tx.thresholds.findByHostel(hostelId);
    return requiredApprovalLevel(config, estimatedCost, this.settings.defaultThresholds);
  }

  /**
   * Approve an open approval. The approved amount defaults to the amount
   * that was requested.
   */
  async approve(
    tx: MaintenanceTransaction,
    approvalId: string,
    decision: ApprovalDecision,
    now: Date
  ): Promise<ApprovalRecord> {
    const approval = await this.loadUnresolved(tx, approvalId);
    return this.resolve(tx, approval, decision.decidedBy, {
      approved: true,
      approvedAmount: decision.approvedAmount ?? approval.estimatedCost,
      conditions: decision.conditions,
      decisionNotes: decision.notes,
      decidedBy: decision.decidedBy,
      decidedAt: now,
    });
  }

  async reject(
    tx: MaintenanceTransaction,
    approvalId: string,
    decision: RejectionDecision,
    now: Date
  ): Promise<ApprovalRecord> {
    if (decision.reason.trim().length === 0) {
      throw new MaintenanceValidationError(`Rejecting approval ${approvalId} requires a reason`);
    }
    const approval = await this.loadUnresolved(tx, approvalId);
    return this.resolve(tx, approval, decision.decidedBy, {
      approved: false,
      rejectionReason: decision.reason,
      allowResubmission: decision.allowResubmission,
      decidedBy: decision.decidedBy,
      decidedAt: now,
    });
  }

  /**
   * Raise an unresolved approval to a strictly higher level. Allowed once;
   * the response deadline restarts.
   */
  async escalate(
    tx: MaintenanceTransaction,
    approvalId: string,
    data: EscalationData,
    now: Date
  ): Promise<ApprovalRecord> {
    const approval = await this.loadUnresolved(tx, approvalId);

    if (approval.escalated) {
      throw new AlreadyProcessedError('Approval', approvalId, 'has already been escalated');
    }
    if (!isHigherApprovalLevel(data.toLevel, approval.approvalLevel)) {
      throw new MaintenanceValidationError(
        `Approval ${approvalId} cannot be escalated from ${approval.approvalLevel} to ${data.toLevel}`
      );
    }

    const updated = await tx.approvals.updateIfOpen(approvalId, {
      approvalLevel: data.toLevel,
      escalated: true,
      escalatedAt: now,
      escalationReason: data.reason,
      deadline: addHours(now, this.settings.approvalDeadlineHours),
    });
    if (!updated) {
      throw new AlreadyProcessedError('Approval', approvalId, 'has already been resolved');
    }

    await tx.audit.record({
      actorId: data.escalatedBy,
      hostelId: null,
      action: 'ESCALATE_MAINTENANCE_APPROVAL',
      entityType: 'maintenance_approval',
      entityId: approvalId,
      beforeState: { approvalLevel: approval.approvalLevel },
      afterState: { approvalLevel: data.toLevel, reason: data.reason },
    });

    return updated;
  }

  /**
   * Close the request's unresolved approval when the request itself leaves
   * the workflow. Returns null when nothing was open.
   */
  async closeForRequest(
    tx: MaintenanceTransaction,
    request: MaintenanceRequest,
    actor: string,
    reason: string,
    now: Date
  ): Promise<ApprovalRecord | null> {
    const open = await tx.approvals.findOpenForRequest(request.id);
    if (!open) {
      return null;
    }

    const patch: RecordPatch<ApprovalRecord> = {
      approved: false,
      rejectionReason: reason,
      allowResubmission: false,
      decidedBy: actor,
      decidedAt: now,
    };
    const closed = await tx.approvals.updateIfOpen(open.id, patch);
    if (!closed) {
      throw new AlreadyProcessedError('Approval', open.id, 'has already been resolved');
    }

    await tx.audit.record({
      actorId: actor,
      hostelId: request.hostelId,
      action: 'CLOSE_MAINTENANCE_APPROVAL',
      entityType: 'maintenance_approval',
      entityId: open.id,
      beforeState: { approved: null },
      afterState: { ...patch, requestStatus: request.status },
    });

    return closed;
  }

  /**
   * Unresolved approvals requested more than `hours` ago
   */
  async findOverdue(
    tx: MaintenanceTransaction,
    now: Date,
    hours: number,
    hostelId?: string
  ): Promise<ApprovalRecord[]> {
    return tx.approvals.findOpen({ requestedBefore: subHours(now, hours), hostelId });
  }

  private async loadUnresolved(
    tx: MaintenanceTransaction,
    approvalId: string
  ): Promise<ApprovalRecord> {
    const approval = await tx.approvals.findById(approvalId, { lock: true });
    if (!approval) {
      throw new MaintenanceNotFoundError('Approval', approvalId);
    }
    if (approval.approved !== null) {
      throw new AlreadyProcessedError(
        'Approval',
        approvalId,
        `was already ${approval.approved ? 'approved' : 'rejected'}`
      );
    }
    return approval;
  }

  private async resolve(
    tx: MaintenanceTransaction,
    approval: ApprovalRecord,
    actor: string,
    patch: RecordPatch<ApprovalRecord>
  ): Promise<ApprovalRecord> {
    const resolved = await tx.approvals.updateIfOpen(approval.id, patch);
    if (!resolved) {
      throw new AlreadyProcessedError('Approval', approval.id, 'has already been resolved');
    }

    await tx.audit.record({
      actorId: actor,
      hostelId: null,
      action: resolved.approved ? 'APPROVE_MAINTENANCE_APPROVAL' : 'REJECT_MAINTENANCE_APPROVAL',
      entityType: 'maintenance_approval',
      entityId: approval.id,
      beforeState: { approved: null },
      afterState: patch,
    });

    return resolved;
  }
}
