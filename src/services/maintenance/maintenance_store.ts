/**
 * Maintenance Store
 *
 * Persistence seam for the workflow. Every state-changing operation runs
 * inside `transaction`; repositories reached through the transaction read
 * and write within that unit of work. `lock: true` on a lookup takes a row
 * lock for the rest of the transaction.
 *
 * Soft-deleted requests are invisible to every lookup here.
 */

import type {
  ApprovalRecord,
  ApprovalThresholdConfig,
  Assignment,
  AssigneeWorkload,
  AssignmentKind,
  CategoryBudget,
  Certificate,
  CompletionRecord,
  CostRecord,
  MaintenanceCategory,
  MaintenancePriority,
  MaintenanceRequest,
  MaintenanceStatus,
  QualityCheck,
  Schedule,
  ScheduleExecution,
  StatusHistoryEntry,
} from './maintenance_types.js';

export type NewRecord<T extends { id: string }> = Omit<T, 'id'>;
export type RecordPatch<T extends { id: string }> = Partial<Omit<T, 'id'>>;

export interface LookupOptions {
  lock?: boolean;
}

export interface RequestRepository {
  insert(data: NewRecord<MaintenanceRequest>): Promise<MaintenanceRequest>;
  findById(id: string, options?: LookupOptions): Promise<MaintenanceRequest | null>;
  update(id: string, patch: RecordPatch<MaintenanceRequest>): Promise<MaintenanceRequest>;
  countUnassigned(
    hostelId: string,
    filter: { priorities: readonly MaintenancePriority[]; statuses: readonly MaintenanceStatus[]; createdSince: Date }
  ): Promise<number>;
  countPastDeadline(
    hostelId: string,
    filter: { asOf: Date; excludeStatuses: readonly MaintenanceStatus[] }
  ): Promise<number>;
}

export interface StatusHistoryRepository {
  append(entry: NewRecord<StatusHistoryEntry>): Promise<StatusHistoryEntry>;
  listForRequest(requestId: string): Promise<StatusHistoryEntry[]>;
}

export interface OpenApprovalFilter {
  hostelId?: string;
  requestedBefore?: Date;
  retroactive?: boolean;
}

export interface ApprovalRepository {
  insert(data: NewRecord<ApprovalRecord>): Promise<ApprovalRecord>;
  findById(id: string, options?: LookupOptions): Promise<ApprovalRecord | null>;
  findOpenForRequest(requestId: string): Promise<ApprovalRecord | null>;
  listForRequest(requestId: string): Promise<ApprovalRecord[]>;
  findOpen(filter: OpenApprovalFilter): Promise<ApprovalRecord[]>;
  /**
   * Conditional update on `approved IS NULL`. Returns null when the approval
   * was already resolved.
   */
  updateIfOpen(id: string, patch: RecordPatch<ApprovalRecord>): Promise<ApprovalRecord | null>;
}

export interface AssignmentRepository {
  insert(data: NewRecord<Assignment>): Promise<Assignment>;
  findById(id: string, options?: LookupOptions): Promise<Assignment | null>;
  findActive(requestId: string, kind: AssignmentKind): Promise<Assignment | null>;
  listForRequest(requestId: string): Promise<Assignment[]>;
  /**
   * Conditional update on an active, non-completed row. Returns null when
   * the row was already closed.
   */
  updateIfActive(id: string, patch: RecordPatch<Assignment>): Promise<Assignment | null>;
  workloadFor(assigneeIds: readonly string[]): Promise<AssigneeWorkload[]>;
}

export interface CostRepository {
  findByRequest(requestId: string, options?: LookupOptions): Promise<CostRecord | null>;
  insert(data: NewRecord<CostRecord>): Promise<CostRecord>;
  update(id: string, patch: RecordPatch<CostRecord>): Promise<CostRecord>;
}

export interface BudgetRepository {
  find(
    hostelId: string,
    category: MaintenanceCategory,
    fiscalYear: number,
    options?: LookupOptions
  ): Promise<CategoryBudget | null>;
  insert(data: NewRecord<CategoryBudget>): Promise<CategoryBudget>;
  update(id: string, patch: RecordPatch<CategoryBudget>): Promise<CategoryBudget>;
}

export interface CompletionRepository {
  insert(data: NewRecord<CompletionRecord>): Promise<CompletionRecord>;
  findById(id: string, options?: LookupOptions): Promise<CompletionRecord | null>;
  findByRequest(requestId: string): Promise<CompletionRecord | null>;
  update(id: string, patch: RecordPatch<CompletionRecord>): Promise<CompletionRecord>;
  insertQualityCheck(data: NewRecord<QualityCheck>): Promise<QualityCheck>;
  listQualityChecks(completionId: string): Promise<QualityCheck[]>;
  insertCertificate(data: NewRecord<Certificate>): Promise<Certificate>;
  findCertificate(completionId: string): Promise<Certificate | null>;
}

export interface ScheduleRepository {
  insert(data: NewRecord<Schedule>): Promise<Schedule>;
  findById(id: string, options?: LookupOptions): Promise<Schedule | null>;
  update(id: string, patch: RecordPatch<Schedule>): Promise<Schedule>;
  /** Active, auto-creating schedules due on or before `asOf`, oldest first */
  findDue(asOf: Date): Promise<Schedule[]>;
  /** Active schedules whose due date is before `asOf`, oldest first */
  findOverdue(asOf: Date, hostelId?: string): Promise<Schedule[]>;
  insertExecution(data: NewRecord<ScheduleExecution>): Promise<ScheduleExecution>;
  listExecutions(scheduleId: string): Promise<ScheduleExecution[]>;
}

export interface ThresholdRepository {
  findByHostel(hostelId: string): Promise<ApprovalThresholdConfig | null>;
  upsert(config: ApprovalThresholdConfig): Promise<ApprovalThresholdConfig>;
}

export interface SequenceRepository {
  /** Atomically increments and returns the counter for `scope`, starting at 1 */
  next(scope: string): Promise<number>;
}

export interface AuditEntry {
  actorId: string | null;
  hostelId: string | null;
  action: string;
  entityType: string;
  entityId: string;
  beforeState?: object | null;
  afterState?: object | null;
}

export interface AuditRepository {
  record(entry: AuditEntry): Promise<void>;
}

export interface MaintenanceTransaction {
  requests: RequestRepository;
  history: StatusHistoryRepository;
  approvals: ApprovalRepository;
  assignments: AssignmentRepository;
  costs: CostRepository;
  budgets: BudgetRepository;
  completions: CompletionRepository;
  schedules: ScheduleRepository;
  thresholds: ThresholdRepository;
  sequences: SequenceRepository;
  audit: AuditRepository;
}

export interface MaintenanceStore {
  /**
   * Run `work` in one unit of work. Commits when it resolves, rolls back
   * when it throws.
   */
  transaction<T>(work: (tx: MaintenanceTransaction) => Promise<T>): Promise<T>;
}
