/**
 * PostgreSQL MaintenanceStore on knex.
 *
 * Each unit of work runs in `db.transaction`. Serialization failures and
 * deadlocks are retried with exponential backoff; every other error rolls
 * back and propagates.
 */

import type { Knex } from 'knex';
import { MAINTENANCE_CONFIG } from '../../config/maintenance_config.js';
import type {
  AuditEntry,
  MaintenanceStore,
  MaintenanceTransaction,
  OpenApprovalFilter,
} from './maintenance_store.js';
import type {
  ApprovalLevel,
  ApprovalRecord,
  ApprovalThresholdConfig,
  Assignment,
  AssignmentKind,
  CategoryBudget,
  Certificate,
  ChecklistResult,
  CompletionRecord,
  CostComponents,
  CostRecord,
  IssueType,
  MaintenanceCategory,
  MaintenancePriority,
  MaintenanceRequest,
  MaintenanceStatus,
  MaterialItem,
  QualityCheck,
  RecurrenceConfig,
  RecurrenceRule,
  Schedule,
  ScheduleExecution,
  StatusHistoryEntry,
} from './maintenance_types.js';

const TABLES = {
  requests: 'maintenance_requests',
  history: 'maintenance_status_history',
  approvals: 'maintenance_approvals',
  assignments: 'maintenance_assignments',
  costs: 'maintenance_costs',
  budgets: 'maintenance_budgets',
  completions: 'maintenance_completions',
  qualityChecks: 'maintenance_quality_checks',
  certificates: 'maintenance_certificates',
  schedules: 'maintenance_schedules',
  executions: 'maintenance_schedule_executions',
  thresholds: 'approval_thresholds',
  sequences: 'maintenance_sequences',
  audit: 'audit_logs',
} as const;

// PostgreSQL SQLSTATEs worth retrying
const RETRYABLE_CODES = new Set(['40001', '40P01']);

// ============================================================================
// Row shapes (numeric columns arrive from pg as strings)
// ============================================================================

type Numeric = string | number;

interface RequestRow {
  id: string;
  request_number: string;
  hostel_id: string;
  room_id: string | null;
  floor: number | null;
  specific_area: string | null;
  title: string;
  description: string;
  category: MaintenanceCategory;
  priority: MaintenancePriority;
  issue_type: IssueType;
  status: MaintenanceStatus;
  estimated_cost: Numeric | null;
  requires_approval: boolean;
  approval_level: ApprovalLevel;
  is_preventive: boolean;
  schedule_id: string | null;
  requested_by: string;
  assigned_to: string | null;
  assigned_by: string | null;
  deadline: Date | null;
  assigned_at: Date | null;
  started_at: Date | null;
  completed_at: Date | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

interface HistoryRow {
  id: string;
  request_id: string;
  from_status: MaintenanceStatus | null;
  to_status: MaintenanceStatus;
  changed_by: string;
  notes: string | null;
  changed_at: Date;
}

interface ApprovalRow {
  id: string;
  request_id: string;
  requested_by: string;
  estimated_cost: Numeric;
  justification: string;
  approval_level: ApprovalLevel;
  approved: boolean | null;
  approved_amount: Numeric | null;
  conditions: string | null;
  decision_notes: string | null;
  decided_by: string | null;
  decided_at: Date | null;
  rejection_reason: string | null;
  allow_resubmission: boolean;
  retroactive: boolean;
  requested_at: Date;
  deadline: Date;
  escalated: boolean;
  escalated_at: Date | null;
  escalation_reason: string | null;
}

interface AssignmentRow {
  id: string;
  request_id: string;
  kind: AssignmentKind;
  assignee_id: string;
  assigned_by: string;
  estimated_hours: Numeric | null;
  actual_hours: Numeric | null;
  quoted_amount: Numeric | null;
  work_order_number: string | null;
  deadline: Date | null;
  instructions: string | null;
  required_skills: string[];
  is_active: boolean;
  is_completed: boolean;
  started_at: Date | null;
  completed_at: Date | null;
  quality_rating: number | null;
  completion_notes: string | null;
  reassigned_from: string | null;
  reassignment_reason: string | null;
  created_at: Date;
}

interface WorkloadRow {
  assignee_id: string;
  active_assignments: Numeric;
  outstanding_hours: Numeric | null;
}

interface CostRow {
  id: string;
  request_id: string;
  estimated_cost: Numeric;
  approved_cost: Numeric;
  actual_cost: Numeric | null;
  components: CostComponents;
  variance: Numeric | null;
  variance_percentage: Numeric | null;
  within_budget: boolean | null;
  updated_at: Date;
}

interface CompletionRow {
  id: string;
  request_id: string;
  completed_by: string;
  work_notes: string;
  labor_hours: Numeric;
  labor_rate_per_hour: Numeric | null;
  components: CostComponents;
  actual_cost: Numeric;
  materials: MaterialItem[];
  actual_start_date: Date | null;
  actual_completion_date: Date;
  quality_verified: boolean;
  quality_verified_by: string | null;
  quality_verified_at: Date | null;
  created_at: Date;
}

interface QualityCheckRow {
  id: string;
  completion_id: string;
  request_id: string;
  checked_by: string;
  passed: boolean;
  overall_rating: number | null;
  checklist: ChecklistResult[];
  rework_required: boolean;
  rework_details: string | null;
  rework_deadline: Date | null;
  notes: string | null;
  checked_at: Date;
}

interface CertificateRow {
  id: string;
  completion_id: string;
  request_id: string;
  certificate_number: string;
  work_title: string;
  work_category: MaintenanceCategory;
  completed_by: string;
  verified_by: string;
  approved_by: string;
  work_start_date: Date;
  completion_date: Date;
  verification_date: Date;
  issue_date: Date;
  labor_hours: Numeric;
  total_cost: Numeric;
  quality_rating: number | null;
  warranty_applicable: boolean;
  warranty_period_months: number | null;
  warranty_terms: string | null;
  warranty_valid_until: Date | null;
}

interface ScheduleRow {
  id: string;
  hostel_id: string;
  schedule_code: string;
  title: string;
  description: string | null;
  category: MaintenanceCategory;
  recurrence: RecurrenceRule;
  recurrence_config: RecurrenceConfig | null;
  start_date: Date;
  end_date: Date | null;
  next_due_date: Date;
  reminder_date: Date;
  assigned_to: string | null;
  estimated_cost: Numeric | null;
  auto_create_requests: boolean;
  is_active: boolean;
  total_executions: number;
  successful_executions: number;
  last_completed_date: Date | null;
  last_generated_due_date: Date | null;
  created_by: string;
  created_at: Date;
  updated_at: Date;
}

interface ExecutionRow {
  id: string;
  schedule_id: string;
  request_id: string | null;
  scheduled_date: Date;
  execution_date: Date;
  executed_by: string;
  completed: boolean;
  notes: string | null;
  actual_cost: Numeric | null;
  quality_rating: number | null;
  was_on_time: boolean;
  days_delayed: number;
  created_at: Date;
}

interface BudgetRow {
  id: string;
  hostel_id: string;
  category: MaintenanceCategory;
  fiscal_year: number;
  allocated_amount: Numeric;
  utilized_amount: Numeric;
  set_by: string;
  created_at: Date;
  updated_at: Date;
}

interface ThresholdRow {
  hostel_id: string;
  auto_approve_below: Numeric;
  supervisor_limit: Numeric;
  admin_required_above: Numeric;
  auto_approve_enabled: boolean;
}

// ============================================================================
// Mapping helpers
// ============================================================================

const num = (value: Numeric): number => Number(value);
const numOrNull = (value: Numeric | null): number | null => (value === null ? null : Number(value));

const snakeCase = (key: string): string => key.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);

/**
 * Convert a camelCase record or patch to column values. JSON columns are
 * serialized so pg does not turn arrays into PostgreSQL arrays.
 */
function toColumns(values: object, jsonColumns: readonly string[] = []): Record<string, unknown> {
  const columns: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) continue;
    columns[snakeCase(key)] = jsonColumns.includes(key) && value !== null ? JSON.stringify(value) : value;
  }
  return columns;
}

function mapRequest(row: RequestRow): MaintenanceRequest {
  return {
    id: row.id,
    requestNumber: row.request_number,
    hostelId: row.hostel_id,
    roomId: row.room_id,
    floor: row.floor,
    specificArea: row.specific_area,
    title: row.title,
    description: row.description,
    category: row.category,
    priority: row.priority,
    issueType: row.issue_type,
    status: row.status,
    estimatedCost: numOrNull(row.estimated_cost),
    requiresApproval: row.requires_approval,
    approvalLevel: row.approval_level,
    isPreventive: row.is_preventive,
    scheduleId: row.schedule_id,
    requestedBy: row.requested_by,
    assignedTo: row.assigned_to,
    assignedBy: row.assigned_by,
    deadline: row.deadline,
    assignedAt: row.assigned_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

function mapHistory(row: HistoryRow): StatusHistoryEntry {
  return {
    id: row.id,
    requestId: row.request_id,
    fromStatus: row.from_status,
    toStatus: row.to_status,
    changedBy: row.changed_by,
    notes: row.notes,
    changedAt: row.changed_at,
  };
}

function mapApproval(row: ApprovalRow): ApprovalRecord {
  return {
    id: row.id,
    requestId: row.request_id,
    requestedBy: row.requested_by,
    estimatedCost: num(row.estimated_cost),
    justification: row.justification,
    approvalLevel: row.approval_level,
    approved: row.approved,
    approvedAmount: numOrNull(row.approved_amount),
    conditions: row.conditions,
    decisionNotes: row.decision_notes,
    decidedBy: row.decided_by,
    decidedAt: row.decided_at,
    rejectionReason: row.rejection_reason,
    allowResubmission: row.allow_resubmission,
    retroactive: row.retroactive,
    requestedAt: row.requested_at,
    deadline: row.deadline,
    escalated: row.escalated,
    escalatedAt: row.escalated_at,
    escalationReason: row.escalation_reason,
  };
}

function mapAssignment(row: AssignmentRow): Assignment {
  return {
    id: row.id,
    requestId: row.request_id,
    kind: row.kind,
    assigneeId: row.assignee_id,
    assignedBy: row.assigned_by,
    estimatedHours: numOrNull(row.estimated_hours),
    actualHours: numOrNull(row.actual_hours),
    quotedAmount: numOrNull(row.quoted_amount),
    workOrderNumber: row.work_order_number,
    deadline: row.deadline,
    instructions: row.instructions,
    requiredSkills: row.required_skills ?? [],
    isActive: row.is_active,
    isCompleted: row.is_completed,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    qualityRating: row.quality_rating,
    completionNotes: row.completion_notes,
    reassignedFrom: row.reassigned_from,
    reassignmentReason: row.reassignment_reason,
    createdAt: row.created_at,
  };
}

function mapComponents(components: CostComponents): CostComponents {
  return {
    materials: Number(components.materials),
    labor: Number(components.labor),
    vendor: Number(components.vendor),
    other: Number(components.other),
    tax: Number(components.tax),
  };
}

function mapCost(row: CostRow): CostRecord {
  return {
    id: row.id,
    requestId: row.request_id,
    estimatedCost: num(row.estimated_cost),
    approvedCost: num(row.approved_cost),
    actualCost: numOrNull(row.actual_cost),
    components: mapComponents(row.components),
    variance: numOrNull(row.variance),
    variancePercentage: numOrNull(row.variance_percentage),
    withinBudget: row.within_budget,
    updatedAt: row.updated_at,
  };
}

function mapCompletion(row: CompletionRow): CompletionRecord {
  return {
    id: row.id,
    requestId: row.request_id,
    completedBy: row.completed_by,
    workNotes: row.work_notes,
    laborHours: num(row.labor_hours),
    laborRatePerHour: numOrNull(row.labor_rate_per_hour),
    components: mapComponents(row.components),
    actualCost: num(row.actual_cost),
    materials: row.materials ?? [],
    actualStartDate: row.actual_start_date,
    actualCompletionDate: row.actual_completion_date,
    qualityVerified: row.quality_verified,
    qualityVerifiedBy: row.quality_verified_by,
    qualityVerifiedAt: row.quality_verified_at,
    createdAt: row.created_at,
  };
}

function mapQualityCheck(row: QualityCheckRow): QualityCheck {
  return {
    id: row.id,
    completionId: row.completion_id,
    requestId: row.request_id,
    checkedBy: row.checked_by,
    passed: row.passed,
    overallRating: row.overall_rating,
    checklist: row.checklist ?? [],
    reworkRequired: row.rework_required,
    reworkDetails: row.rework_details,
    reworkDeadline: row.rework_deadline,
    notes: row.notes,
    checkedAt: row.checked_at,
  };
}

function mapCertificate(row: CertificateRow): Certificate {
  return {
    id: row.id,
    completionId: row.completion_id,
    requestId: row.request_id,
    certificateNumber: row.certificate_number,
    workTitle: row.work_title,
    workCategory: row.work_category,
    completedBy: row.completed_by,
    verifiedBy: row.verified_by,
    approvedBy: row.approved_by,
    workStartDate: row.work_start_date,
    completionDate: row.completion_date,
    verificationDate: row.verification_date,
    issueDate: row.issue_date,
    laborHours: num(row.labor_hours),
    totalCost: num(row.total_cost),
    qualityRating: row.quality_rating,
    warrantyApplicable: row.warranty_applicable,
    warrantyPeriodMonths: row.warranty_period_months,
    warrantyTerms: row.warranty_terms,
    warrantyValidUntil: row.warranty_valid_until,
  };
}

function mapSchedule(row: ScheduleRow): Schedule {
  return {
    id: row.id,
    hostelId: row.hostel_id,
    scheduleCode: row.schedule_code,
    title: row.title,
    description: row.description,
    category: row.category,
    recurrence: row.recurrence,
    recurrenceConfig: row.recurrence_config ?? {},
    startDate: row.start_date,
    endDate: row.end_date,
    nextDueDate: row.next_due_date,
    reminderDate: row.reminder_date,
    assignedTo: row.assigned_to,
    estimatedCost: numOrNull(row.estimated_cost),
    autoCreateRequests: row.auto_create_requests,
    isActive: row.is_active,
    totalExecutions: row.total_executions,
    successfulExecutions: row.successful_executions,
    lastCompletedDate: row.last_completed_date,
    lastGeneratedDueDate: row.last_generated_due_date,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapExecution(row: ExecutionRow): ScheduleExecution {
  return {
    id: row.id,
    scheduleId: row.schedule_id,
    requestId: row.request_id,
    scheduledDate: row.scheduled_date,
    executionDate: row.execution_date,
    executedBy: row.executed_by,
    completed: row.completed,
    notes: row.notes,
    actualCost: numOrNull(row.actual_cost),
    qualityRating: row.quality_rating,
    wasOnTime: row.was_on_time,
    daysDelayed: row.days_delayed,
    createdAt: row.created_at,
  };
}

function mapBudget(row: BudgetRow): CategoryBudget {
  return {
    id: row.id,
    hostelId: row.hostel_id,
    category: row.category,
    fiscalYear: row.fiscal_year,
    allocatedAmount: num(row.allocated_amount),
    utilizedAmount: num(row.utilized_amount),
    setBy: row.set_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapThreshold(row: ThresholdRow): ApprovalThresholdConfig {
  return {
    hostelId: row.hostel_id,
    autoApproveBelow: num(row.auto_approve_below),
    supervisorLimit: num(row.supervisor_limit),
    adminRequiredAbove: num(row.admin_required_above),
    autoApproveEnabled: row.auto_approve_enabled,
  };
}

function requireRow<T>(row: T | undefined, entity: string, id: string): T {
  if (!row) {
    throw new Error(`${entity} ${id} does not exist`);
  }
  return row;
}

function isRetryable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && RETRYABLE_CODES.has(error.code);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ============================================================================
// Store
// ============================================================================

export class KnexMaintenanceStore implements MaintenanceStore {
  constructor(private db: Knex) {}

  async transaction<T>(work: (tx: MaintenanceTransaction) => Promise<T>): Promise<T> {
    let delay: number = MAINTENANCE_CONFIG.RETRY_INITIAL_DELAY_MS;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.db.transaction((trx) => work(this.createTransaction(trx)));
      } catch (error) {
        if (!isRetryable(error) || attempt > MAINTENANCE_CONFIG.TRANSACTION_MAX_RETRIES) {
          throw error;
        }
        console.warn(`[MaintenanceStore] Transaction conflict, retrying (attempt ${attempt}) in ${delay}ms`);
        await sleep(delay);
        delay *= MAINTENANCE_CONFIG.RETRY_BACKOFF_MULTIPLIER;
      }
    }
  }

  private createTransaction(trx: Knex.Transaction): MaintenanceTransaction {
    const liveRequests = () => trx(TABLES.requests).whereNull('deleted_at');

    return {
      requests: {
        insert: async (data) => {
          const [row]: RequestRow[] = await trx(TABLES.requests).insert(toColumns(data)).returning('*');
          return mapRequest(row);
        },
        findById: async (id, options = {}) => {
          const query = liveRequests().where('id', id);
          const row: RequestRow | undefined = await (options.lock ? query.forUpdate() : query).first();
          return row ? mapRequest(row) : null;
        },
        update: async (id, patch) => {
          const [row]: RequestRow[] = await trx(TABLES.requests)
            .where('id', id)
            .update(toColumns(patch))
            .returning('*');
          return mapRequest(requireRow(row, 'Request', id));
        },
        countUnassigned: async (hostelId, filter) => {
          const result = await liveRequests()
            .where('hostel_id', hostelId)
            .whereNull('assigned_to')
            .whereIn('priority', [...filter.priorities])
            .whereIn('status', [...filter.statuses])
            .where('created_at', '>=', filter.createdSince)
            .count('* as count')
            .first();
          return Number(result?.count ?? 0);
        },
        countPastDeadline: async (hostelId, filter) => {
          const result = await liveRequests()
            .where('hostel_id', hostelId)
            .whereNotNull('deadline')
            .where('deadline', '<', filter.asOf)
            .whereNotIn('status', [...filter.excludeStatuses])
            .count('* as count')
            .first();
          return Number(result?.count ?? 0);
        },
      },

      history: {
        append: async (entry) => {
          const [row]: HistoryRow[] = await trx(TABLES.history).insert(toColumns(entry)).returning('*');
          return mapHistory(row);
        },
        listForRequest: async (requestId) => {
          const rows: HistoryRow[] = await trx(TABLES.history)
            .where('request_id', requestId)
            .orderBy([{ column: 'changed_at' }, { column: 'id' }]);
          return rows.map(mapHistory);
        },
      },

      approvals: {
        insert: async (data) => {
          const [row]: ApprovalRow[] = await trx(TABLES.approvals).insert(toColumns(data)).returning('*');
          return mapApproval(row);
        },
        findById: async (id, options = {}) => {
          const query = trx(TABLES.approvals).where('id', id);
          const row: ApprovalRow | undefined = await (options.lock ? query.forUpdate() : query).first();
          return row ? mapApproval(row) : null;
        },
        findOpenForRequest: async (requestId) => {
          const row: ApprovalRow | undefined = await trx(TABLES.approvals)
            .where('request_id', requestId)
            .whereNull('approved')
            .first();
          return row ? mapApproval(row) : null;
        },
        listForRequest: async (requestId) => {
          const rows: ApprovalRow[] = await trx(TABLES.approvals)
            .where('request_id', requestId)
            .orderBy('requested_at');
          return rows.map(mapApproval);
        },
        findOpen: async (filter: OpenApprovalFilter) => {
          const query = trx(TABLES.approvals)
            .join(TABLES.requests, `${TABLES.requests}.id`, `${TABLES.approvals}.request_id`)
            .whereNull(`${TABLES.approvals}.approved`)
            .whereNull(`${TABLES.requests}.deleted_at`)
            .select(`${TABLES.approvals}.*`)
            .orderBy(`${TABLES.approvals}.requested_at`);
          if (filter.hostelId !== undefined) {
            query.where(`${TABLES.requests}.hostel_id`, filter.hostelId);
          }
          if (filter.requestedBefore) {
            query.where(`${TABLES.approvals}.requested_at`, '<', filter.requestedBefore);
          }
          if (filter.retroactive !== undefined) {
            query.where(`${TABLES.approvals}.retroactive`, filter.retroactive);
          }
          const rows: ApprovalRow[] = await query;
          return rows.map(mapApproval);
        },
        updateIfOpen: async (id, patch) => {
          const [row]: ApprovalRow[] = await trx(TABLES.approvals)
            .where('id', id)
            .whereNull('approved')
            .update(toColumns(patch))
            .returning('*');
          return row ? mapApproval(row) : null;
        },
      },

      assignments: {
        insert: async (data) => {
          const [row]: AssignmentRow[] = await trx(TABLES.assignments)
            .insert(toColumns(data, ['requiredSkills']))
            .returning('*');
          return mapAssignment(row);
        },
        findById: async (id, options = {}) => {
          const query = trx(TABLES.assignments).where('id', id);
          const row: AssignmentRow | undefined = await (options.lock ? query.forUpdate() : query).first();
          return row ? mapAssignment(row) : null;
        },
        findActive: async (requestId, kind) => {
          const row: AssignmentRow | undefined = await trx(TABLES.assignments)
            .where({ request_id: requestId, kind, is_active: true, is_completed: false })
            .first();
          return row ? mapAssignment(row) : null;
        },
        listForRequest: async (requestId) => {
          const rows: AssignmentRow[] = await trx(TABLES.assignments)
            .where('request_id', requestId)
            .orderBy('created_at');
          return rows.map(mapAssignment);
        },
        updateIfActive: async (id, patch) => {
          const [row]: AssignmentRow[] = await trx(TABLES.assignments)
            .where({ id, is_active: true, is_completed: false })
            .update(toColumns(patch, ['requiredSkills']))
            .returning('*');
          return row ? mapAssignment(row) : null;
        },
        workloadFor: async (assigneeIds) => {
          if (assigneeIds.length === 0) {
            return [];
          }
          const rows: WorkloadRow[] = await trx(TABLES.assignments)
            .where({ kind: 'staff', is_active: true, is_completed: false })
            .whereIn('assignee_id', [...assigneeIds])
            .groupBy('assignee_id')
            .select(
              'assignee_id',
              trx.raw('count(*) as active_assignments'),
              trx.raw('coalesce(sum(estimated_hours), 0) as outstanding_hours')
            );
          return assigneeIds.map((assigneeId) => {
            const row = rows.find((candidate) => candidate.assignee_id === assigneeId);
            return {
              assigneeId,
              activeAssignments: row ? Number(row.active_assignments) : 0,
              outstandingHours: row ? Number(row.outstanding_hours ?? 0) : 0,
            };
          });
        },
      },

      costs: {
        findByRequest: async (requestId, options = {}) => {
          const query = trx(TABLES.costs).where('request_id', requestId);
          const row: CostRow | undefined = await (options.lock ? query.forUpdate() : query).first();
          return row ? mapCost(row) : null;
        },
        insert: async (data) => {
          const [row]: CostRow[] = await trx(TABLES.costs).insert(toColumns(data, ['components'])).returning('*');
          return mapCost(row);
        },
        update: async (id, patch) => {
          const [row]: CostRow[] = await trx(TABLES.costs)
            .where('id', id)
            .update(toColumns(patch, ['components']))
            .returning('*');
          return mapCost(requireRow(row, 'Cost record', id));
        },
      },

      budgets: {
        find: async (hostelId, category, fiscalYear, options = {}) => {
          const query = trx(TABLES.budgets).where({ hostel_id: hostelId, category, fiscal_year: fiscalYear });
          const row: BudgetRow | undefined = await (options.lock ? query.forUpdate() : query).first();
          return row ? mapBudget(row) : null;
        },
        insert: async (data) => {
          const [row]: BudgetRow[] = await trx(TABLES.budgets).insert(toColumns(data)).returning('*');
          return mapBudget(row);
        },
        update: async (id, patch) => {
          const [row]: BudgetRow[] = await trx(TABLES.budgets)
            .where('id', id)
            .update(toColumns(patch))
            .returning('*');
          return mapBudget(requireRow(row, 'Budget', id));
        },
      },

      completions: {
        insert: async (data) => {
          const [row]: CompletionRow[] = await trx(TABLES.completions)
            .insert(toColumns(data, ['components', 'materials']))
            .returning('*');
          return mapCompletion(row);
        },
        findById: async (id, options = {}) => {
          const query = trx(TABLES.completions).where('id', id);
          const row: CompletionRow | undefined = await (options.lock ? query.forUpdate() : query).first();
          return row ? mapCompletion(row) : null;
        },
        findByRequest: async (requestId) => {
          const row: CompletionRow | undefined = await trx(TABLES.completions)
            .where('request_id', requestId)
            .first();
          return row ? mapCompletion(row) : null;
        },
        update: async (id, patch) => {
          const [row]: CompletionRow[] = await trx(TABLES.completions)
            .where('id', id)
            .update(toColumns(patch, ['components', 'materials']))
            .returning('*');
          return mapCompletion(requireRow(row, 'Completion', id));
        },
        insertQualityCheck: async (data) => {
          const [row]: QualityCheckRow[] = await trx(TABLES.qualityChecks)
            .insert(toColumns(data, ['checklist']))
            .returning('*');
          return mapQualityCheck(row);
        },
        listQualityChecks: async (completionId) => {
          const rows: QualityCheckRow[] = await trx(TABLES.qualityChecks)
            .where('completion_id', completionId)
            .orderBy('checked_at');
          return rows.map(mapQualityCheck);
        },
        insertCertificate: async (data) => {
          const [row]: CertificateRow[] = await trx(TABLES.certificates).insert(toColumns(data)).returning('*');
          return mapCertificate(row);
        },
        findCertificate: async (completionId) => {
          const row: CertificateRow | undefined = await trx(TABLES.certificates)
            .where('completion_id', completionId)
            .first();
          return row ? mapCertificate(row) : null;
        },
      },

      schedules: {
        insert: async (data) => {
          const [row]: ScheduleRow[] = await trx(TABLES.schedules)
            .insert(toColumns(data, ['recurrenceConfig']))
            .returning('*');
          return mapSchedule(row);
        },
        findById: async (id, options = {}) => {
          const query = trx(TABLES.schedules).where('id', id);
          const row: ScheduleRow | undefined = await (options.lock ? query.forUpdate() : query).first();
          return row ? mapSchedule(row) : null;
        },
        update: async (id, patch) => {
          const [row]: ScheduleRow[] = await trx(TABLES.schedules)
            .where('id', id)
            .update(toColumns(patch, ['recurrenceConfig']))
            .returning('*');
          return mapSchedule(requireRow(row, 'Schedule', id));
        },
        findDue: async (asOf) => {
          const rows: ScheduleRow[] = await trx(TABLES.schedules)
            .where({ is_active: true, auto_create_requests: true })
            .where('next_due_date', '<=', asOf)
            .orderBy('next_due_date');
          return rows.map(mapSchedule);
        },
        findOverdue: async (asOf, hostelId) => {
          const query = trx(TABLES.schedules).where('is_active', true).where('next_due_date', '<', asOf);
          if (hostelId !== undefined) {
            query.where('hostel_id', hostelId);
          }
          const rows: ScheduleRow[] = await query.orderBy('next_due_date');
          return rows.map(mapSchedule);
        },
        insertExecution: async (data) => {
          const [row]: ExecutionRow[] = await trx(TABLES.executions).insert(toColumns(data)).returning('*');
          return mapExecution(row);
        },
        listExecutions: async (scheduleId) => {
          const rows: ExecutionRow[] = await trx(TABLES.executions)
            .where('schedule_id', scheduleId)
            .orderBy('execution_date');
          return rows.map(mapExecution);
        },
      },

      thresholds: {
        findByHostel: async (hostelId) => {
          const row: ThresholdRow | undefined = await trx(TABLES.thresholds).where('hostel_id', hostelId).first();
          return row ? mapThreshold(row) : null;
        },
        upsert: async (config) => {
          const columns = { ...toColumns(config), updated_at: trx.fn.now() };
          const [row]: ThresholdRow[] = await trx(TABLES.thresholds)
            .insert(columns)
            .onConflict('hostel_id')
            .merge()
            .returning('*');
          return mapThreshold(row);
        },
      },

      sequences: {
        next: async (scope) => {
          const [row]: { value: Numeric }[] = await trx(TABLES.sequences)
            .insert({ scope, value: 1 })
            .onConflict('scope')
            .merge({ value: trx.raw(`${TABLES.sequences}.value + 1`) })
            .returning('value');
          return Number(row.value);
        },
      },

      audit: {
        record: async (entry: AuditEntry) => {
          await trx(TABLES.audit).insert({
            user_id: entry.actorId,
            hostel_id: entry.hostelId,
            action: entry.action,
            entity_type: entry.entityType,
            entity_id: entry.entityId,
            before_state: entry.beforeState ? JSON.stringify(entry.beforeState) : null,
            after_state: entry.afterState ? JSON.stringify(entry.afterState) : null,
          });
        },
      },
    };
  }
}
