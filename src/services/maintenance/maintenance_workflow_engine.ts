/**
 * Maintenance Workflow Engine
 *
 * Entry point for every maintenance command. Each command runs in one store
 * transaction: the request row is locked first, components do their part,
 * and the domain events collected along the way are published only after
 * the transaction commits.
 */

import { subDays } from 'date-fns';
import {
  resolveMaintenanceSettings,
  type MaintenanceSettings,
} from '../../config/maintenance_config.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { ApprovalWorkflow } from './approval_workflow.js';
import { AssignmentBalancer, suggestAssignee, type BalancerCandidate } from './assignment_balancer.js';
import { CompletionRecorder } from './completion_recorder.js';
import { CostLedger, type ActualCostResult } from './cost_ledger.js';
import {
  InvalidTransitionError,
  MaintenanceNotFoundError,
  MaintenanceValidationError,
} from './maintenance_errors.js';
import {
  publishAll,
  type MaintenanceEvent,
  type MaintenanceEventPublisher,
} from './maintenance_events.js';
import { nextMonthlyNumber } from './maintenance_numbering.js';
import {
  ApproveInputSchema,
  AssignInputSchema,
  CategoryBudgetInputSchema,
  CertificateInputSchema,
  CompleteAssignmentInputSchema,
  CompleteInputSchema,
  CreateRequestInputSchema,
  EmergencyRequestInputSchema,
  EscalateInputSchema,
  parseInput,
  PreventiveRequestInputSchema,
  QualityCheckInputSchema,
  ReassignInputSchema,
  RecordActualCostInputSchema,
  RejectInputSchema,
  ThresholdConfigInputSchema,
  UpdateCostEstimateInputSchema,
  VendorAssignInputSchema,
  type ApproveInput,
  type AssignInput,
  type CategoryBudgetInput,
  type CertificateInput,
  type CompleteAssignmentInput,
  type CompleteInput,
  type CreateRequestInput,
  type EmergencyRequestInput,
  type EscalateInput,
  type PreventiveRequestInput,
  type QualityCheckInput,
  type ReassignInput,
  type RecordActualCostInput,
  type RejectInput,
  type ThresholdConfigInput,
  type UpdateCostEstimateInput,
  type VendorAssignInput,
} from './maintenance_schemas.js';
import {
  applyStatusChange,
  NOTE_REQUIRED_STATUSES,
  TERMINAL_STATUSES,
} from './maintenance_status.js';
import type { MaintenanceStore, MaintenanceTransaction } from './maintenance_store.js';
import {
  HIGH_PRIORITIES,
  type ApprovalRecord,
  type ApprovalThresholdConfig,
  type Assignment,
  type BottleneckFinding,
  type CategoryBudget,
  type CategoryBudgetStatus,
  type Certificate,
  type CompletionRecord,
  type CostRecord,
  type IssueType,
  type MaintenanceCategory,
  type MaintenancePriority,
  type MaintenanceRequest,
  type MaintenanceStatus,
  type QualityCheck,
  type StatusHistoryEntry,
} from './maintenance_types.js';
import type { PreventiveRequestSink } from './recurrence_scheduler.js';
import { isHigherApprovalLevel } from './threshold_policy.js';

export interface WorkflowEngineOptions {
  clock?: Clock;
  settings?: Partial<MaintenanceSettings>;
}

type RequestMode = 'standard' | 'emergency';

interface NewRequestData {
  hostelId: string;
  roomId: string | null;
  floor: number | null;
  specificArea: string | null;
  title: string;
  description: string;
  category: MaintenanceCategory;
  priority: MaintenancePriority;
  issueType: IssueType;
  estimatedCost: number | null;
  requestedBy: string;
  deadline: Date | null;
  justification: string | null;
  isPreventive: boolean;
  scheduleId: string | null;
}

export interface AssignmentOutcome {
  request: MaintenanceRequest;
  assignment: Assignment;
}

export interface ApprovalOutcome {
  request: MaintenanceRequest;
  approval: ApprovalRecord;
}

export class MaintenanceWorkflowEngine implements PreventiveRequestSink {
  readonly settings: MaintenanceSettings;
  private clock: Clock;
  private approvals: ApprovalWorkflow;
  private balancer = new AssignmentBalancer();
  private costLedger: CostLedger;
  private recorder: CompletionRecorder;

  constructor(
    private store: MaintenanceStore,
    private publisher: MaintenanceEventPublisher,
    options: WorkflowEngineOptions = {}
  ) {
    this.settings = resolveMaintenanceSettings(options.settings);
    this.clock = options.clock ?? systemClock;
    this.approvals = new ApprovalWorkflow(this.settings);
    this.costLedger = new CostLedger(this.settings);
    this.recorder = new CompletionRecorder(this.settings, this.costLedger, this.balancer);
  }

  // ==========================================================================
  // Request creation
  // ==========================================================================

  async create(input: CreateRequestInput): Promise<MaintenanceRequest> {
    const data = parseInput(CreateRequestInputSchema, input, 'maintenance request');
    return this.run((tx, events, now) =>
      this.createInTransaction(
        tx,
        { ...this.normalize(data), priority: data.priority, issueType: data.issueType },
        'standard',
        now,
        events
      )
    );
  }

  /**
   * Critical request that skips the approval gate. Costs at or above the
   * admin threshold get a retroactive admin approval for the record.
   */
  async createEmergency(input: EmergencyRequestInput): Promise<MaintenanceRequest> {
    const data = parseInput(EmergencyRequestInputSchema, input, 'emergency request');
    return this.run((tx, events, now) =>
      this.createInTransaction(
        tx,
        { ...this.normalize(data), priority: 'critical', issueType: 'emergency' },
        'emergency',
        now,
        events
      )
    );
  }

  async createPreventive(input: PreventiveRequestInput): Promise<MaintenanceRequest> {
    const data = parseInput(PreventiveRequestInputSchema, input, 'preventive request');
    return this.run(async (tx, events, now) => {
      const schedule = await tx.schedules.findById(data.scheduleId);
      if (!schedule) {
        throw new MaintenanceNotFoundError('Schedule', data.scheduleId);
      }
      return this.createPreventiveInTransaction(tx, data, now, events);
    });
  }

  async createPreventiveInTransaction(
    tx: MaintenanceTransaction,
    input: PreventiveRequestInput,
    now: Date,
    events: MaintenanceEvent[]
  ): Promise<MaintenanceRequest> {
    const data = parseInput(PreventiveRequestInputSchema, input, 'preventive request');
    return this.createInTransaction(
      tx,
      {
        ...this.normalize(data),
        priority: 'medium',
        issueType: 'preventive',
        isPreventive: true,
        scheduleId: data.scheduleId,
      },
      'standard',
      now,
      events
    );
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async transition(
    requestId: string,
    newStatus: MaintenanceStatus,
    actor: string,
    notes?: string | null
  ): Promise<MaintenanceRequest> {
    const trimmed = notes?.trim() ?? '';
    if (NOTE_REQUIRED_STATUSES.includes(newStatus) && trimmed.length === 0) {
      throw new MaintenanceValidationError(`Moving request ${requestId} to ${newStatus} requires notes`);
    }

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequest(tx, requestId);

      if (newStatus === 'approved' || newStatus === 'assigned') {
        await this.assertNoGatingApproval(tx, request);
      }
      if (newStatus === 'in_progress') {
        const staff = await tx.assignments.findActive(request.id, 'staff');
        if (staff) {
          await this.balancer.markStarted(tx, staff.id, now);
        }
      }

      const updated = await applyStatusChange(tx, request, {
        to: newStatus,
        actor,
        notes: trimmed.length > 0 ? trimmed : null,
        now,
      });
      events.push(this.statusChangedEvent(request, updated, actor, now));

      if (newStatus === 'cancelled' || newStatus === 'rejected') {
        const closed = await this.approvals.closeForRequest(tx, updated, actor, trimmed, now);
        if (closed) {
          events.push({
            type: 'approval.decided',
            occurredAt: now.toISOString(),
            hostelId: request.hostelId,
            approvalId: closed.id,
            requestId: request.id,
            approved: false,
            decidedBy: actor,
          });
        }
      }
      return updated;
    });
  }

  /**
   * Assign a staff member, picked by the balancer when no explicit assignee
   * is given
   */
  async assign(requestId: string, input: AssignInput): Promise<AssignmentOutcome> {
    const data = parseInput(AssignInputSchema, input, 'assignment');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequest(tx, requestId);
      if (request.status !== 'pending' && request.status !== 'approved') {
        throw new InvalidTransitionError(request.id, request.status, 'assigned');
      }
      await this.assertNoGatingApproval(tx, request);

      let assigneeId = data.assigneeId;
      if (assigneeId === undefined) {
        const workloads = await tx.assignments.workloadFor(
          data.candidates.map((candidate) => candidate.assigneeId)
        );
        const pool: BalancerCandidate[] = data.candidates.map((candidate) => {
          const load = workloads.find((workload) => workload.assigneeId === candidate.assigneeId);
          return {
            assigneeId: candidate.assigneeId,
            skills: candidate.skills,
            activeAssignments: load?.activeAssignments ?? 0,
            outstandingHours: load?.outstandingHours ?? 0,
          };
        });
        const chosen = suggestAssignee(pool, {
          requiredSkills: data.requiredSkills,
          exclude: data.exclude,
        });
        if (!chosen) {
          throw new MaintenanceValidationError(`No eligible assignee for request ${request.id}`);
        }
        assigneeId = chosen.assigneeId;
      }

      const deadline = data.deadline ?? request.deadline;
      const assignment = await this.balancer.assignStaff(
        tx,
        request,
        {
          assigneeId,
          assignedBy: data.assignedBy,
          estimatedHours: data.estimatedHours ?? null,
          deadline,
          instructions: data.instructions ?? null,
          requiredSkills: data.requiredSkills,
        },
        now
      );

      const updated = await applyStatusChange(tx, request, {
        to: 'assigned',
        actor: data.assignedBy,
        notes: `Assigned to ${assigneeId}`,
        now,
        patch: { assignedTo: assigneeId, assignedBy: data.assignedBy, assignedAt: now, deadline },
      });

      events.push(this.assignedEvent(updated, assignment, now));
      events.push(this.statusChangedEvent(request, updated, data.assignedBy, now));
      console.log(`[Maintenance] Request ${request.requestNumber} assigned to ${assigneeId}`);

      return { request: updated, assignment };
    });
  }

  /**
   * Hand work to an external vendor. Moves pending or approved requests to
   * assigned; work already underway keeps its status.
   */
  async assignVendor(requestId: string, input: VendorAssignInput): Promise<AssignmentOutcome> {
    const data = parseInput(VendorAssignInputSchema, input, 'vendor assignment');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequest(tx, requestId);
      if (TERMINAL_STATUSES.includes(request.status)) {
        throw new InvalidTransitionError(request.id, request.status, 'assigned');
      }
      await this.assertNoGatingApproval(tx, request);

      const deadline = data.deadline ?? request.deadline;
      const assignment = await this.balancer.assignVendor(
        tx,
        request,
        {
          vendorId: data.vendorId,
          assignedBy: data.assignedBy,
          quotedAmount: data.quotedAmount,
          estimatedHours: data.estimatedHours ?? null,
          deadline,
          instructions: data.instructions ?? null,
        },
        now
      );

      let updated = request;
      if (request.status === 'pending' || request.status === 'approved') {
        updated = await applyStatusChange(tx, request, {
          to: 'assigned',
          actor: data.assignedBy,
          notes: `Assigned to vendor ${data.vendorId} (${assignment.workOrderNumber})`,
          now,
          patch: { assignedBy: data.assignedBy, assignedAt: now, deadline },
        });
        events.push(this.statusChangedEvent(request, updated, data.assignedBy, now));
      }

      events.push(this.assignedEvent(updated, assignment, now));
      return { request: updated, assignment };
    });
  }

  async reassign(requestId: string, input: ReassignInput): Promise<AssignmentOutcome> {
    const data = parseInput(ReassignInputSchema, input, 'reassignment');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequest(tx, requestId);
      const current = await tx.assignments.findActive(request.id, 'staff');
      if (!current) {
        throw new MaintenanceValidationError(`Request ${request.id} has no active staff assignment to reassign`);
      }

      const { current: assignment } = await this.balancer.reassign(
        tx,
        current.id,
        {
          newAssigneeId: data.newAssigneeId,
          reassignedBy: data.reassignedBy,
          reason: data.reason,
          estimatedHours: data.estimatedHours ?? null,
          deadline: data.deadline ?? null,
        },
        now
      );

      const updated = await tx.requests.update(request.id, {
        assignedTo: data.newAssigneeId,
        assignedBy: data.reassignedBy,
        assignedAt: now,
        updatedAt: now,
      });

      await tx.audit.record({
        actorId: data.reassignedBy,
        hostelId: request.hostelId,
        action: 'REASSIGN_MAINTENANCE_REQUEST',
        entityType: 'maintenance_request',
        entityId: request.id,
        beforeState: { assignedTo: current.assigneeId },
        afterState: { assignedTo: data.newAssigneeId, reason: data.reason },
      });

      events.push(this.assignedEvent(updated, assignment, now));
      return { request: updated, assignment };
    });
  }

  async completeAssignment(assignmentId: string, input: CompleteAssignmentInput): Promise<Assignment> {
    const data = parseInput(CompleteAssignmentInputSchema, input, 'assignment completion');
    return this.run(async (tx, _events, now) => {
      const assignment = await tx.assignments.findById(assignmentId);
      if (!assignment) {
        throw new MaintenanceNotFoundError('Assignment', assignmentId);
      }
      await this.loadRequest(tx, assignment.requestId);
      return this.balancer.completeAssignment(
        tx,
        assignmentId,
        {
          actualHours: data.actualHours,
          qualityRating: data.qualityRating ?? null,
          completionNotes: data.completionNotes ?? null,
        },
        now
      );
    });
  }

  // ==========================================================================
  // Approvals
  // ==========================================================================

  async approve(approvalId: string, input: ApproveInput): Promise<ApprovalOutcome> {
    const data = parseInput(ApproveInputSchema, input, 'approval decision');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequestForApproval(tx, approvalId);
      const approval = await this.approvals.approve(
        tx,
        approvalId,
        {
          decidedBy: data.approvedBy,
          approvedAmount: data.approvedAmount ?? null,
          conditions: data.conditions ?? null,
          notes: data.notes ?? null,
        },
        now
      );

      await this.costLedger.recordApproved(tx, request.id, approval.approvedAmount ?? approval.estimatedCost, now);

      let updated = request;
      if (!approval.retroactive) {
        updated = await applyStatusChange(tx, request, {
          to: 'approved',
          actor: data.approvedBy,
          notes: data.notes ?? `Approved at ${approval.approvalLevel} level`,
          now,
        });
        events.push(this.statusChangedEvent(request, updated, data.approvedBy, now));
      }

      events.push({
        type: 'approval.decided',
        occurredAt: now.toISOString(),
        hostelId: request.hostelId,
        approvalId,
        requestId: request.id,
        approved: true,
        decidedBy: data.approvedBy,
      });

      return { request: updated, approval };
    });
  }

  async reject(approvalId: string, input: RejectInput): Promise<ApprovalOutcome> {
    const data = parseInput(RejectInputSchema, input, 'approval decision');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequestForApproval(tx, approvalId);
      const approval = await this.approvals.reject(
        tx,
        approvalId,
        { decidedBy: data.rejectedBy, reason: data.reason, allowResubmission: data.allowResubmission },
        now
      );

      let updated = request;
      if (!approval.retroactive) {
        updated = await applyStatusChange(tx, request, {
          to: 'rejected',
          actor: data.rejectedBy,
          notes: data.reason,
          now,
        });
        events.push(this.statusChangedEvent(request, updated, data.rejectedBy, now));
      }

      events.push({
        type: 'approval.decided',
        occurredAt: now.toISOString(),
        hostelId: request.hostelId,
        approvalId,
        requestId: request.id,
        approved: false,
        decidedBy: data.rejectedBy,
      });

      return { request: updated, approval };
    });
  }

  async escalate(approvalId: string, input: EscalateInput): Promise<ApprovalRecord> {
    const data = parseInput(EscalateInputSchema, input, 'escalation');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequestForApproval(tx, approvalId);
      const approval = await this.approvals.escalate(tx, approvalId, data, now);
      await tx.requests.update(request.id, { approvalLevel: approval.approvalLevel, updatedAt: now });

      events.push({
        type: 'approval.escalated',
        occurredAt: now.toISOString(),
        hostelId: request.hostelId,
        approvalId,
        requestId: request.id,
        level: approval.approvalLevel,
      });
      return approval;
    });
  }

  /**
   * Unresolved approvals older than `hours` (default from settings)
   */
  async findOverdueApprovals(
    hours: number = this.settings.overdueApprovalHours,
    hostelId?: string
  ): Promise<ApprovalRecord[]> {
    return this.store.transaction((tx) => this.approvals.findOverdue(tx, this.clock.now(), hours, hostelId));
  }

  async configureThresholds(input: ThresholdConfigInput, actor: string): Promise<ApprovalThresholdConfig> {
    const data = parseInput(ThresholdConfigInputSchema, input, 'approval thresholds');
    return this.run(async (tx) => {
      const before = await tx.thresholds.findByHostel(data.hostelId);
      const saved = await tx.thresholds.upsert(data);
      await tx.audit.record({
        actorId: actor,
        hostelId: data.hostelId,
        action: 'UPDATE_APPROVAL_THRESHOLDS',
        entityType: 'approval_thresholds',
        entityId: data.hostelId,
        beforeState: before,
        afterState: saved,
      });
      return saved;
    });
  }

  /**
   * Change the estimate of a pending request. A standard request's open
   * approval is raised when the new cost needs a higher level; an emergency
   * request gets its retroactive admin approval once the cost reaches the
   * admin threshold.
   */
  async updateCostEstimate(requestId: string, input: UpdateCostEstimateInput): Promise<MaintenanceRequest> {
    const data = parseInput(UpdateCostEstimateInputSchema, input, 'cost estimate');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequest(tx, requestId);
      if (request.status !== 'pending') {
        throw new MaintenanceValidationError(
          `Estimate of request ${request.id} can only change while pending (status: ${request.status})`
        );
      }

      const level = await this.approvals.levelFor(tx, request.hostelId, data.estimatedCost);
      const open = await tx.approvals.findOpenForRequest(request.id);
      let approvalLevel = request.approvalLevel;

      if (open) {
        const raise = !open.retroactive && isHigherApprovalLevel(level, open.approvalLevel);
        await tx.approvals.updateIfOpen(open.id, {
          estimatedCost: data.estimatedCost,
          ...(raise ? { approvalLevel: level } : {}),
        });
        if (raise) {
          approvalLevel = level;
        }
      } else if (request.issueType === 'emergency') {
        const thresholds = await this.thresholdsFor(tx, request.hostelId);
        if (data.estimatedCost >= thresholds.adminRequiredAbove) {
          const approval = await this.approvals.open(
            tx,
            request,
            {
              requestedBy: data.updatedBy,
              estimatedCost: data.estimatedCost,
              justification: data.justification ?? null,
              level: 'admin',
              retroactive: true,
            },
            now
          );
          events.push(this.approvalRequestedEvent(request, approval, now));
        }
      } else if (level !== 'auto') {
        const approval = await this.approvals.open(
          tx,
          request,
          {
            requestedBy: data.updatedBy,
            estimatedCost: data.estimatedCost,
            justification: data.justification ?? null,
            level,
          },
          now
        );
        approvalLevel = level;
        events.push(this.approvalRequestedEvent(request, approval, now));
      }

      await this.costLedger.recordEstimate(tx, request.id, data.estimatedCost, now);

      const updated = await tx.requests.update(request.id, {
        estimatedCost: data.estimatedCost,
        approvalLevel,
        requiresApproval: request.requiresApproval || approvalLevel !== 'auto',
        updatedAt: now,
      });

      await tx.audit.record({
        actorId: data.updatedBy,
        hostelId: request.hostelId,
        action: 'UPDATE_MAINTENANCE_ESTIMATE',
        entityType: 'maintenance_request',
        entityId: request.id,
        beforeState: { estimatedCost: request.estimatedCost, approvalLevel: request.approvalLevel },
        afterState: { estimatedCost: data.estimatedCost, approvalLevel },
      });

      return updated;
    });
  }

  // ==========================================================================
  // Costs and completion
  // ==========================================================================

  async recordActualCost(requestId: string, input: RecordActualCostInput): Promise<CostRecord> {
    const data = parseInput(RecordActualCostInputSchema, input, 'actual cost');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequest(tx, requestId);
      const result = await this.costLedger.recordActual(tx, request.id, data.actualCost, data.components, now);
      events.push(...this.costEvents(request, result, now));
      return result.record;
    });
  }

  async setCategoryBudget(input: CategoryBudgetInput): Promise<CategoryBudget> {
    const data = parseInput(CategoryBudgetInputSchema, input, 'category budget');
    return this.run(async (tx, _events, now) => {
      const before = await tx.budgets.find(data.hostelId, data.category, data.fiscalYear);
      const saved = await this.costLedger.setCategoryBudget(tx, data, now);
      await tx.audit.record({
        actorId: data.setBy,
        hostelId: data.hostelId,
        action: 'SET_MAINTENANCE_BUDGET',
        entityType: 'maintenance_budget',
        entityId: saved.id,
        beforeState: before,
        afterState: saved,
      });
      return saved;
    });
  }

  async getCategoryBudgetStatus(
    hostelId: string,
    category: MaintenanceCategory,
    fiscalYear: number
  ): Promise<CategoryBudgetStatus> {
    return this.store.transaction((tx) =>
      this.costLedger.getCategoryBudgetStatus(tx, hostelId, category, fiscalYear)
    );
  }

  async complete(
    requestId: string,
    input: CompleteInput
  ): Promise<{ request: MaintenanceRequest; completion: CompletionRecord }> {
    const data = parseInput(CompleteInputSchema, input, 'completion');

    return this.run(async (tx, events, now) => {
      const request = await this.loadRequest(tx, requestId);
      const result = await this.recorder.complete(
        tx,
        request,
        {
          completedBy: data.completedBy,
          workNotes: data.workNotes,
          materials: data.materials.map((item) => ({ ...item, supplier: item.supplier ?? null })),
          laborHours: data.laborHours,
          laborRatePerHour: data.laborRatePerHour ?? null,
          components: data.components,
          actualCost: data.actualCost,
          actualStartDate: data.actualStartDate ?? null,
          actualCompletionDate: data.actualCompletionDate ?? now,
        },
        now
      );

      events.push(this.statusChangedEvent(request, result.request, data.completedBy, now));
      events.push({
        type: 'completion.recorded',
        occurredAt: now.toISOString(),
        hostelId: request.hostelId,
        requestId: request.id,
        completionId: result.completion.id,
      });
      events.push(...this.costEvents(request, result.cost, now));

      console.log(`[Maintenance] Request ${request.requestNumber} completed`);
      return { request: result.request, completion: result.completion };
    });
  }

  async issueQualityCheck(completionId: string, input: QualityCheckInput): Promise<QualityCheck> {
    const data = parseInput(QualityCheckInputSchema, input, 'quality check');

    return this.run((tx, _events, now) =>
      this.recorder.recordQualityCheck(
        tx,
        completionId,
        {
          checkedBy: data.checkedBy,
          passed: data.passed,
          overallRating: data.overallRating ?? null,
          checklist: data.checklist.map((item) => ({ ...item, notes: item.notes ?? null })),
          reworkRequired: data.reworkRequired,
          reworkDetails: data.reworkDetails ?? null,
          reworkDeadline: data.reworkDeadline ?? null,
          notes: data.notes ?? null,
        },
        now
      )
    );
  }

  async issueCertificate(completionId: string, input: CertificateInput): Promise<Certificate> {
    const data = parseInput(CertificateInputSchema, input, 'certificate');

    return this.run(async (tx, events, now) => {
      const certificate = await this.recorder.issueCertificate(tx, completionId, {
        verifiedBy: data.verifiedBy,
        approvedBy: data.approvedBy,
        workStartDate: data.workStartDate,
        completionDate: data.completionDate,
        verificationDate: data.verificationDate,
        issueDate: data.issueDate ?? now,
        qualityRating: data.qualityRating ?? null,
        warrantyApplicable: data.warrantyApplicable,
        warrantyPeriodMonths: data.warrantyPeriodMonths ?? null,
        warrantyTerms: data.warrantyTerms ?? null,
      });

      const request = await this.loadRequest(tx, certificate.requestId, false);
      events.push({
        type: 'certificate.issued',
        occurredAt: now.toISOString(),
        hostelId: request.hostelId,
        requestId: certificate.requestId,
        certificateId: certificate.id,
        certificateNumber: certificate.certificateNumber,
      });
      return certificate;
    });
  }

  // ==========================================================================
  // Diagnostics and reads
  // ==========================================================================

  async detectBottlenecks(hostelId: string): Promise<BottleneckFinding[]> {
    const now = this.clock.now();

    return this.store.transaction(async (tx) => {
      const findings: BottleneckFinding[] = [];

      const unassigned = await tx.requests.countUnassigned(hostelId, {
        priorities: HIGH_PRIORITIES,
        statuses: ['pending', 'approved'],
        createdSince: subDays(now, this.settings.bottleneckLookbackDays),
      });
      if (unassigned > 0) {
        findings.push({
          type: 'unassigned_high_priority',
          count: unassigned,
          severity: 'high',
          description: `${unassigned} high-priority requests unassigned`,
        });
      }

      const overdue = await tx.requests.countPastDeadline(hostelId, {
        asOf: now,
        excludeStatuses: TERMINAL_STATUSES,
      });
      if (overdue > 0) {
        findings.push({
          type: 'overdue_requests',
          count: overdue,
          severity: 'critical',
          description: `${overdue} requests past deadline`,
        });
      }

      const stale = await tx.approvals.findOpen({
        hostelId,
        requestedBefore: subDays(now, this.settings.bottleneckApprovalAgeDays),
        retroactive: false,
      });
      const waiting = new Set(stale.map((approval) => approval.requestId)).size;
      if (waiting > 0) {
        findings.push({
          type: 'pending_approvals',
          count: waiting,
          severity: 'medium',
          description: `${waiting} requests awaiting approval >${this.settings.bottleneckApprovalAgeDays} days`,
        });
      }

      return findings;
    });
  }

  async softDelete(requestId: string, actor: string): Promise<void> {
    await this.run(async (tx, _events, now) => {
      const request = await this.loadRequest(tx, requestId);
      await tx.requests.update(request.id, { deletedAt: now, updatedAt: now });
      await tx.audit.record({
        actorId: actor,
        hostelId: request.hostelId,
        action: 'DELETE_MAINTENANCE_REQUEST',
        entityType: 'maintenance_request',
        entityId: request.id,
        beforeState: request,
      });
    });
  }

  async getRequest(requestId: string): Promise<MaintenanceRequest> {
    return this.store.transaction((tx) => this.loadRequest(tx, requestId, false));
  }

  async getStatusHistory(requestId: string): Promise<StatusHistoryEntry[]> {
    return this.store.transaction(async (tx) => {
      await this.loadRequest(tx, requestId, false);
      return tx.history.listForRequest(requestId);
    });
  }

  async getApprovals(requestId: string): Promise<ApprovalRecord[]> {
    return this.store.transaction(async (tx) => {
      await this.loadRequest(tx, requestId, false);
      return tx.approvals.listForRequest(requestId);
    });
  }

  async getAssignments(requestId: string): Promise<Assignment[]> {
    return this.store.transaction(async (tx) => {
      await this.loadRequest(tx, requestId, false);
      return tx.assignments.listForRequest(requestId);
    });
  }

  async getCostRecord(requestId: string): Promise<CostRecord | null> {
    return this.store.transaction(async (tx) => {
      await this.loadRequest(tx, requestId, false);
      return this.costLedger.getForRequest(tx, requestId);
    });
  }

  async getCompletion(requestId: string): Promise<CompletionRecord | null> {
    return this.store.transaction(async (tx) => {
      await this.loadRequest(tx, requestId, false);
      return tx.completions.findByRequest(requestId);
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async run<T>(
    work: (tx: MaintenanceTransaction, events: MaintenanceEvent[], now: Date) => Promise<T>
  ): Promise<T> {
    const events: MaintenanceEvent[] = [];
    const now = this.clock.now();
    const result = await this.store.transaction((tx) => {
      // A retried transaction starts from an empty event list
      events.length = 0;
      return work(tx, events, now);
    });
    await publishAll(this.publisher, events);
    return result;
  }

  private async createInTransaction(
    tx: MaintenanceTransaction,
    data: NewRequestData,
    mode: RequestMode,
    now: Date,
    events: MaintenanceEvent[]
  ): Promise<MaintenanceRequest> {
    const requestNumber = await nextMonthlyNumber(tx, 'MNT', data.hostelId, now);
    const thresholds = await this.thresholdsFor(tx, data.hostelId);
    const level = await this.approvals.levelFor(tx, data.hostelId, data.estimatedCost);
    const gated = mode === 'standard' && level !== 'auto';

    const created = await tx.requests.insert({
      requestNumber,
      hostelId: data.hostelId,
      roomId: data.roomId,
      floor: data.floor,
      specificArea: data.specificArea,
      title: data.title,
      description: data.description,
      category: data.category,
      priority: data.priority,
      issueType: data.issueType,
      status: 'pending',
      estimatedCost: data.estimatedCost,
      requiresApproval: gated,
      approvalLevel: level,
      isPreventive: data.isPreventive,
      scheduleId: data.scheduleId,
      requestedBy: data.requestedBy,
      assignedTo: null,
      assignedBy: null,
      deadline: data.deadline,
      assignedAt: null,
      startedAt: null,
      completedAt: null,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    });

    await tx.history.append({
      requestId: created.id,
      fromStatus: null,
      toStatus: 'pending',
      changedBy: data.requestedBy,
      notes: 'Request created',
      changedAt: now,
    });

    await tx.audit.record({
      actorId: data.requestedBy,
      hostelId: data.hostelId,
      action: 'CREATE_MAINTENANCE_REQUEST',
      entityType: 'maintenance_request',
      entityId: created.id,
      afterState: created,
    });

    if (data.estimatedCost !== null) {
      await this.costLedger.recordEstimate(tx, created.id, data.estimatedCost, now);
    }

    let request = created;
    const cost = data.estimatedCost ?? 0;

    if (mode === 'standard' && level === 'auto') {
      request = await applyStatusChange(tx, created, {
        to: 'approved',
        actor: data.requestedBy,
        notes: 'Auto-approved: estimated cost below approval threshold',
        now,
      });
      await this.costLedger.recordApproved(tx, created.id, cost, now);
    } else if (gated || cost >= thresholds.adminRequiredAbove) {
      const approval = await this.approvals.open(
        tx,
        created,
        {
          requestedBy: data.requestedBy,
          estimatedCost: cost,
          justification: data.justification,
          level: gated ? level : 'admin',
          retroactive: !gated,
        },
        now
      );
      events.push(this.approvalRequestedEvent(created, approval, now));
    }

    events.unshift({
      type: 'request.created',
      occurredAt: now.toISOString(),
      hostelId: request.hostelId,
      requestId: request.id,
      requestNumber,
      status: request.status,
      approvalLevel: level,
    });

    console.log(
      `[Maintenance] Created ${mode} request ${requestNumber} (${level} approval, status ${request.status})`
    );
    return request;
  }

  private normalize(data: {
    hostelId: string;
    roomId?: string | null;
    floor?: number | null;
    specificArea?: string | null;
    title: string;
    description: string;
    category: MaintenanceCategory;
    estimatedCost?: number | null;
    requestedBy: string;
    deadline?: Date | null;
    justification?: string | null;
  }): Omit<NewRequestData, 'priority' | 'issueType'> {
    return {
      hostelId: data.hostelId,
      roomId: data.roomId ?? null,
      floor: data.floor ?? null,
      specificArea: data.specificArea ?? null,
      title: data.title,
      description: data.description,
      category: data.category,
      estimatedCost: data.estimatedCost ?? null,
      requestedBy: data.requestedBy,
      deadline: data.deadline ?? null,
      justification: data.justification ?? null,
      isPreventive: false,
      scheduleId: null,
    };
  }

  private async thresholdsFor(
    tx: MaintenanceTransaction,
    hostelId: string
  ): Promise<Omit<ApprovalThresholdConfig, 'hostelId'>> {
    return (await tx.thresholds.findByHostel(hostelId)) ?? this.settings.defaultThresholds;
  }

  private async loadRequest(
    tx: MaintenanceTransaction,
    requestId: string,
    lock = true
  ): Promise<MaintenanceRequest> {
    const request = await tx.requests.findById(requestId, { lock });
    if (!request) {
      throw new MaintenanceNotFoundError('Maintenance request', requestId);
    }
    return request;
  }

  /**
   * Lock the request behind an approval before the approval itself, the
   * same order every other command takes
   */
  private async loadRequestForApproval(
    tx: MaintenanceTransaction,
    approvalId: string
  ): Promise<MaintenanceRequest> {
    const approval = await tx.approvals.findById(approvalId);
    if (!approval) {
      throw new MaintenanceNotFoundError('Approval', approvalId);
    }
    return this.loadRequest(tx, approval.requestId);
  }

  private async assertNoGatingApproval(
    tx: MaintenanceTransaction,
    request: MaintenanceRequest
  ): Promise<void> {
    const open = await tx.approvals.findOpenForRequest(request.id);
    if (open && !open.retroactive) {
      throw new MaintenanceValidationError(
        `Request ${request.id} is awaiting ${open.approvalLevel} approval (${open.id})`
      );
    }
  }

  private statusChangedEvent(
    before: MaintenanceRequest,
    after: MaintenanceRequest,
    actor: string,
    now: Date
  ): MaintenanceEvent {
    return {
      type: 'request.status_changed',
      occurredAt: now.toISOString(),
      hostelId: after.hostelId,
      requestId: after.id,
      from: before.status,
      to: after.status,
      changedBy: actor,
    };
  }

  private assignedEvent(request: MaintenanceRequest, assignment: Assignment, now: Date): MaintenanceEvent {
    return {
      type: 'request.assigned',
      occurredAt: now.toISOString(),
      hostelId: request.hostelId,
      requestId: request.id,
      assignmentId: assignment.id,
      assigneeId: assignment.assigneeId,
      kind: assignment.kind,
    };
  }

  private approvalRequestedEvent(
    request: MaintenanceRequest,
    approval: ApprovalRecord,
    now: Date
  ): MaintenanceEvent {
    return {
      type: 'approval.requested',
      occurredAt: now.toISOString(),
      hostelId: request.hostelId,
      approvalId: approval.id,
      requestId: request.id,
      level: approval.approvalLevel,
      retroactive: approval.retroactive,
    };
  }

  private costEvents(request: MaintenanceRequest, result: ActualCostResult, now: Date): MaintenanceEvent[] {
    const events: MaintenanceEvent[] = [];
    if (result.budgetExceeded) {
      events.push({
        type: 'cost.budget_exceeded',
        occurredAt: now.toISOString(),
        hostelId: request.hostelId,
        requestId: request.id,
        approvedCost: result.record.approvedCost,
        actualCost: result.record.actualCost ?? 0,
        variance: result.record.variance ?? 0,
      });
    }
    if (result.categoryBudget?.exceeded) {
      const { budget } = result.categoryBudget;
      events.push({
        type: 'cost.category_budget_exceeded',
        occurredAt: now.toISOString(),
        hostelId: request.hostelId,
        requestId: request.id,
        category: budget.category,
        fiscalYear: budget.fiscalYear,
        allocatedAmount: budget.allocatedAmount,
        utilizedAmount: budget.utilizedAmount,
      });
    }
    return events;
  }
}
