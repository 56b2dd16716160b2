/**
 * Completion Recorder
 *
 * Records finished work: the completion itself with materials and costs,
 * quality checks against it, and the certificate that closes it.
 *
 * Rules:
 * - Work notes must reach the configured minimum length after trimming
 * - Every material line satisfies quantity x unit cost = total (within 0.01)
 * - Material lines sum to the materials component, labor hours x rate to the
 *   labor component, both within the cost tolerance
 * - A completion with a certificate accepts no further quality checks
 */

import { addDays, isBefore } from 'date-fns';
import type { MaintenanceSettings } from '../../config/maintenance_config.js';
import type { AssignmentBalancer } from './assignment_balancer.js';
import { roundMoney, type ActualCostResult, type CostLedger } from './cost_ledger.js';
import {
  AlreadyProcessedError,
  CostMismatchError,
  InconsistentQualityResultError,
  InvalidTransitionError,
  MaintenanceNotFoundError,
  MaintenanceValidationError,
} from './maintenance_errors.js';
import { nextMonthlyNumber } from './maintenance_numbering.js';
import { applyStatusChange } from './maintenance_status.js';
import type { MaintenanceTransaction } from './maintenance_store.js';
import type {
  Certificate,
  ChecklistResult,
  CompletionRecord,
  CostComponents,
  MaintenanceRequest,
  MaterialItem,
  QualityCheck,
} from './maintenance_types.js';

type CompletionSettings = Pick<
  MaintenanceSettings,
  'costTolerance' | 'materialLineTolerance' | 'minWorkNotesLength' | 'warrantyDaysPerMonth'
>;

export interface CompletionData {
  completedBy: string;
  workNotes: string;
  materials: MaterialItem[];
  laborHours: number;
  laborRatePerHour: number | null;
  components: CostComponents;
  actualCost: number;
  actualStartDate: Date | null;
  actualCompletionDate: Date;
}

export interface QualityCheckData {
  checkedBy: string;
  passed: boolean;
  overallRating: number | null;
  checklist: ChecklistResult[];
  reworkRequired: boolean;
  reworkDetails: string | null;
  reworkDeadline: Date | null;
  notes: string | null;
}

export interface CertificateData {
  verifiedBy: string;
  approvedBy: string;
  workStartDate: Date;
  completionDate: Date;
  verificationDate: Date;
  issueDate: Date;
  qualityRating: number | null;
  warrantyApplicable: boolean;
  warrantyPeriodMonths: number | null;
  warrantyTerms: string | null;
}

export interface CompletionResult {
  completion: CompletionRecord;
  request: MaintenanceRequest;
  cost: ActualCostResult;
}

export class CompletionRecorder {
  constructor(
    private settings: CompletionSettings,
    private costLedger: CostLedger,
    private balancer: AssignmentBalancer
  ) {}

  /**
   * Check notes, material lines and labor against the stated components
   */
  validateCompletion(requestId: string, data: CompletionData): void {
    const notes = data.workNotes.trim();
    if (notes.length < this.settings.minWorkNotesLength) {
      throw new MaintenanceValidationError(
        `Work notes for request ${requestId} must be at least ${this.settings.minWorkNotesLength} characters`
      );
    }

    for (const item of data.materials) {
      const expected = roundMoney(item.quantity * item.unitCost);
      if (roundMoney(Math.abs(expected - item.totalCost)) > this.settings.materialLineTolerance) {
        throw new CostMismatchError(
          requestId,
          expected,
          item.totalCost,
          `Material "${item.name}" total does not equal quantity x unit cost`
        );
      }
    }

    if (data.materials.length > 0) {
      const materialsTotal = roundMoney(data.materials.reduce((sum, item) => sum + item.totalCost, 0));
      if (roundMoney(Math.abs(materialsTotal - data.components.materials)) > this.settings.costTolerance) {
        throw new CostMismatchError(
          requestId,
          data.components.materials,
          materialsTotal,
          'Material lines do not sum to the materials cost'
        );
      }
    }

    if (data.laborRatePerHour !== null) {
      const laborTotal = roundMoney(data.laborHours * data.laborRatePerHour);
      if (roundMoney(Math.abs(laborTotal - data.components.labor)) > this.settings.costTolerance) {
        throw new CostMismatchError(
          requestId,
          data.components.labor,
          laborTotal,
          'Labor hours x rate do not equal the labor cost'
        );
      }
    }

    this.costLedger.assertComponentsMatch(requestId, data.actualCost, data.components);
  }

  /**
   * Record completion of an in-progress request. The caller holds the
   * request row lock.
   */
  async complete(
    tx: MaintenanceTransaction,
    request: MaintenanceRequest,
    data: CompletionData,
    now: Date
  ): Promise<CompletionResult> {
    this.validateCompletion(request.id, data);

    if (request.status !== 'in_progress') {
      throw new InvalidTransitionError(request.id, request.status, 'completed');
    }

    const existing = await tx.completions.findByRequest(request.id);
    if (existing) {
      throw new AlreadyProcessedError('Maintenance request', request.id, 'already has a completion record');
    }

    const completion = await tx.completions.insert({
      requestId: request.id,
      completedBy: data.completedBy,
      workNotes: data.workNotes.trim(),
      laborHours: data.laborHours,
      laborRatePerHour: data.laborRatePerHour,
      components: { ...data.components },
      actualCost: data.actualCost,
      materials: data.materials.map((item) => ({ ...item })),
      actualStartDate: data.actualStartDate ?? request.startedAt,
      actualCompletionDate: data.actualCompletionDate,
      qualityVerified: false,
      qualityVerifiedBy: null,
      qualityVerifiedAt: null,
      createdAt: now,
    });

    const cost = await this.costLedger.recordActual(
      tx,
      request.id,
      data.actualCost,
      data.components,
      now
    );

    const staff = await tx.assignments.findActive(request.id, 'staff');
    if (staff) {
      await this.balancer.completeAssignment(
        tx,
        staff.id,
        { actualHours: data.laborHours, qualityRating: null, completionNotes: completion.workNotes },
        now
      );
    }

    const updated = await applyStatusChange(tx, request, {
      to: 'completed',
      actor: data.completedBy,
      notes: 'Work completed',
      now,
    });

    return { completion, request: updated, cost };
  }

  async recordQualityCheck(
    tx: MaintenanceTransaction,
    completionId: string,
    data: QualityCheckData,
    now: Date
  ): Promise<QualityCheck> {
    const completion = await this.loadUnlocked(tx, completionId);

    const criticalFailure = data.checklist.find((item) => item.critical && item.status === 'fail');
    if (criticalFailure && data.passed) {
      throw new InconsistentQualityResultError(
        completionId,
        `critical item "${criticalFailure.description}" failed but the check is marked passed`
      );
    }

    if (data.reworkRequired) {
      if (data.passed) {
        throw new InconsistentQualityResultError(completionId, 'rework is required but the check is marked passed');
      }
      if (!data.reworkDetails || data.reworkDetails.trim().length === 0) {
        throw new MaintenanceValidationError(`Rework details are required for completion ${completionId}`);
      }
      if (!data.reworkDeadline) {
        throw new MaintenanceValidationError(`A rework deadline is required for completion ${completionId}`);
      }
      if (isBefore(data.reworkDeadline, now)) {
        throw new MaintenanceValidationError(`Rework deadline for completion ${completionId} is in the past`);
      }
    }

    const check = await tx.completions.insertQualityCheck({
      completionId,
      requestId: completion.requestId,
      checkedBy: data.checkedBy,
      passed: data.passed,
      overallRating: data.overallRating,
      checklist: data.checklist.map((item) => ({ ...item })),
      reworkRequired: data.reworkRequired,
      reworkDetails: data.reworkDetails,
      reworkDeadline: data.reworkDeadline,
      notes: data.notes,
      checkedAt: now,
    });

    await tx.completions.update(completionId, {
      qualityVerified: data.passed,
      qualityVerifiedBy: data.passed ? data.checkedBy : null,
      qualityVerifiedAt: data.passed ? now : null,
    });

    return check;
  }

  /**
   * Issue the single certificate for a completion, locking it
   */
  async issueCertificate(
    tx: MaintenanceTransaction,
    completionId: string,
    data: CertificateData
  ): Promise<Certificate> {
    const completion = await this.loadUnlocked(tx, completionId);

    const request = await tx.requests.findById(completion.requestId);
    if (!request) {
      throw new MaintenanceNotFoundError('Maintenance request', completion.requestId);
    }

    const ordered = [data.workStartDate, data.completionDate, data.verificationDate, data.issueDate];
    for (let i = 1; i < ordered.length; i++) {
      if (isBefore(ordered[i], ordered[i - 1])) {
        throw new MaintenanceValidationError(
          `Certificate dates for completion ${completionId} must satisfy work start <= completion <= verification <= issue`
        );
      }
    }

    let warrantyValidUntil: Date | null = null;
    if (data.warrantyApplicable) {
      if (!data.warrantyPeriodMonths || !data.warrantyTerms || data.warrantyTerms.trim().length === 0) {
        throw new MaintenanceValidationError(
          `Warranty period and terms are required for completion ${completionId}`
        );
      }
      warrantyValidUntil = addDays(
        data.completionDate,
        data.warrantyPeriodMonths * this.settings.warrantyDaysPerMonth
      );
    }

    const certificateNumber = await nextMonthlyNumber(tx, 'CERT', 'global', data.issueDate);

    const certificate = await tx.completions.insertCertificate({
      completionId,
      requestId: completion.requestId,
      certificateNumber,
      workTitle: request.title,
      workCategory: request.category,
      completedBy: completion.completedBy,
      verifiedBy: data.verifiedBy,
      approvedBy: data.approvedBy,
      workStartDate: data.workStartDate,
      completionDate: data.completionDate,
      verificationDate: data.verificationDate,
      issueDate: data.issueDate,
      laborHours: completion.laborHours,
      totalCost: completion.actualCost,
      qualityRating: data.qualityRating,
      warrantyApplicable: data.warrantyApplicable,
      warrantyPeriodMonths: data.warrantyApplicable ? data.warrantyPeriodMonths : null,
      warrantyTerms: data.warrantyApplicable ? data.warrantyTerms : null,
      warrantyValidUntil,
    });

    await tx.audit.record({
      actorId: data.approvedBy,
      hostelId: request.hostelId,
      action: 'ISSUE_MAINTENANCE_CERTIFICATE',
      entityType: 'maintenance_certificate',
      entityId: certificate.id,
      afterState: { certificateNumber, completionId },
    });

    return certificate;
  }

  private async loadUnlocked(
    tx: MaintenanceTransaction,
    completionId: string
  ): Promise<CompletionRecord> {
    const completion = await tx.completions.findById(completionId, { lock: true });
    if (!completion) {
      throw new MaintenanceNotFoundError('Completion', completionId);
    }
    const certificate = await tx.completions.findCertificate(completionId);
    if (certificate) {
      throw new AlreadyProcessedError(
        'Completion',
        completionId,
        `is locked by certificate ${certificate.certificateNumber}`
      );
    }
    return completion;
  }
}
