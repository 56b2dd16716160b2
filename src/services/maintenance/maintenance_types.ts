import { z } from 'zod';

// =============================================================================
// Enums
// =============================================================================

export const MaintenanceStatusSchema = z.enum([
  'pending',
  'approved',
  'assigned',
  'in_progress',
  'on_hold',
  'completed',
  'cancelled',
  'rejected',
]);
export type MaintenanceStatus = z.infer<typeof MaintenanceStatusSchema>;

export const MaintenanceCategorySchema = z.enum([
  'electrical',
  'plumbing',
  'carpentry',
  'painting',
  'cleaning',
  'hvac',
  'appliances',
  'security',
  'network',
  'other',
]);
export type MaintenanceCategory = z.infer<typeof MaintenanceCategorySchema>;

/**
 * Ordered from least to most urgent
 */
export const MaintenancePrioritySchema = z.enum(['low', 'medium', 'high', 'urgent', 'critical']);
export type MaintenancePriority = z.infer<typeof MaintenancePrioritySchema>;

export const HIGH_PRIORITIES: readonly MaintenancePriority[] = ['high', 'urgent', 'critical'];

export const IssueTypeSchema = z.enum(['routine', 'emergency', 'preventive', 'corrective', 'inspection']);
export type IssueType = z.infer<typeof IssueTypeSchema>;

/**
 * Ordered from least to most authority
 */
export const ApprovalLevelSchema = z.enum(['auto', 'supervisor', 'admin']);
export type ApprovalLevel = z.infer<typeof ApprovalLevelSchema>;

export const AssignmentKindSchema = z.enum(['staff', 'vendor']);
export type AssignmentKind = z.infer<typeof AssignmentKindSchema>;

export const RecurrenceRuleSchema = z.enum([
  'daily',
  'weekly',
  'monthly',
  'quarterly',
  'semi_annual',
  'annual',
  'custom',
]);
export type RecurrenceRule = z.infer<typeof RecurrenceRuleSchema>;

export const ChecklistStatusSchema = z.enum(['pass', 'fail', 'na', 'partial']);
export type ChecklistStatus = z.infer<typeof ChecklistStatusSchema>;

// =============================================================================
// Requests
// =============================================================================

export interface MaintenanceRequest {
  id: string;
  requestNumber: string;
  hostelId: string;
  roomId: string | null;
  floor: number | null;
  specificArea: string | null;
  title: string;
  description: string;
  category: MaintenanceCategory;
  priority: MaintenancePriority;
  issueType: IssueType;
  status: MaintenanceStatus;
  estimatedCost: number | null;
  requiresApproval: boolean;
  approvalLevel: ApprovalLevel;
  isPreventive: boolean;
  scheduleId: string | null;
  requestedBy: string;
  assignedTo: string | null;
  assignedBy: string | null;
  deadline: Date | null;
  assignedAt: Date | null;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface StatusHistoryEntry {
  id: string;
  requestId: string;
  fromStatus: MaintenanceStatus | null;
  toStatus: MaintenanceStatus;
  changedBy: string;
  notes: string | null;
  changedAt: Date;
}

export interface ApprovalThresholdConfig {
  hostelId: string;
  autoApproveBelow: number;
  supervisorLimit: number;
  adminRequiredAbove: number;
  autoApproveEnabled: boolean;
}

// =============================================================================
// Approvals
// =============================================================================

export interface ApprovalRecord {
  id: string;
  requestId: string;
  requestedBy: string;
  estimatedCost: number;
  justification: string;
  approvalLevel: ApprovalLevel;
  /** null while pending, true once approved, false once rejected */
  approved: boolean | null;
  approvedAmount: number | null;
  conditions: string | null;
  decisionNotes: string | null;
  decidedBy: string | null;
  decidedAt: Date | null;
  rejectionReason: string | null;
  allowResubmission: boolean;
  /** Recorded after the fact; does not hold the request in pending */
  retroactive: boolean;
  requestedAt: Date;
  deadline: Date;
  escalated: boolean;
  escalatedAt: Date | null;
  escalationReason: string | null;
}

// =============================================================================
// Assignments
// =============================================================================

export interface Assignment {
  id: string;
  requestId: string;
  kind: AssignmentKind;
  assigneeId: string;
  assignedBy: string;
  estimatedHours: number | null;
  actualHours: number | null;
  quotedAmount: number | null;
  workOrderNumber: string | null;
  deadline: Date | null;
  instructions: string | null;
  requiredSkills: string[];
  isActive: boolean;
  isCompleted: boolean;
  startedAt: Date | null;
  completedAt: Date | null;
  qualityRating: number | null;
  completionNotes: string | null;
  reassignedFrom: string | null;
  reassignmentReason: string | null;
  createdAt: Date;
}

export interface AssigneeWorkload {
  assigneeId: string;
  activeAssignments: number;
  outstandingHours: number;
}

// =============================================================================
// Costs
// =============================================================================

export interface CostComponents {
  materials: number;
  labor: number;
  vendor: number;
  other: number;
  tax: number;
}

export interface CostRecord {
  id: string;
  requestId: string;
  estimatedCost: number;
  approvedCost: number;
  actualCost: number | null;
  components: CostComponents;
  variance: number | null;
  variancePercentage: number | null;
  withinBudget: boolean | null;
  updatedAt: Date;
}

/** Yearly spend allocation for one category of one hostel */
export interface CategoryBudget {
  id: string;
  hostelId: string;
  category: MaintenanceCategory;
  fiscalYear: number;
  allocatedAmount: number;
  utilizedAmount: number;
  setBy: string;
  createdAt: Date;
  updatedAt: Date;
}

export type BudgetHealth = 'no_budget' | 'healthy' | 'warning' | 'critical' | 'exceeded';

export interface CategoryBudgetStatus {
  hostelId: string;
  category: MaintenanceCategory;
  fiscalYear: number;
  allocatedAmount: number;
  utilizedAmount: number;
  remainingAmount: number;
  utilizationPercentage: number;
  status: BudgetHealth;
}

// =============================================================================
// Completion
// =============================================================================

export interface MaterialItem {
  name: string;
  quantity: number;
  unit: string;
  unitCost: number;
  totalCost: number;
  supplier: string | null;
}

export interface ChecklistResult {
  description: string;
  status: ChecklistStatus;
  critical: boolean;
  notes: string | null;
}

export interface QualityCheck {
  id: string;
  completionId: string;
  requestId: string;
  checkedBy: string;
  passed: boolean;
  overallRating: number | null;
  checklist: ChecklistResult[];
  reworkRequired: boolean;
  reworkDetails: string | null;
  reworkDeadline: Date | null;
  notes: string | null;
  checkedAt: Date;
}

export interface Certificate {
  id: string;
  completionId: string;
  requestId: string;
  certificateNumber: string;
  workTitle: string;
  workCategory: MaintenanceCategory;
  completedBy: string;
  verifiedBy: string;
  approvedBy: string;
  workStartDate: Date;
  completionDate: Date;
  verificationDate: Date;
  issueDate: Date;
  laborHours: number;
  totalCost: number;
  qualityRating: number | null;
  warrantyApplicable: boolean;
  warrantyPeriodMonths: number | null;
  warrantyTerms: string | null;
  warrantyValidUntil: Date | null;
}

export interface CompletionRecord {
  id: string;
  requestId: string;
  completedBy: string;
  workNotes: string;
  laborHours: number;
  laborRatePerHour: number | null;
  components: CostComponents;
  actualCost: number;
  materials: MaterialItem[];
  actualStartDate: Date | null;
  actualCompletionDate: Date;
  qualityVerified: boolean;
  qualityVerifiedBy: string | null;
  qualityVerifiedAt: Date | null;
  createdAt: Date;
}

// =============================================================================
// Preventive schedules
// =============================================================================

export interface RecurrenceConfig {
  /** Days between occurrences for the custom rule */
  intervalDays?: number;
  /** Day of month restored after month arithmetic where the month allows it */
  anchorDayOfMonth?: number;
}

export interface Schedule {
  id: string;
  hostelId: string;
  scheduleCode: string;
  title: string;
  description: string | null;
  category: MaintenanceCategory;
  recurrence: RecurrenceRule;
  recurrenceConfig: RecurrenceConfig;
  startDate: Date;
  endDate: Date | null;
  nextDueDate: Date;
  /** When the upcoming run should be announced; precedes nextDueDate */
  reminderDate: Date;
  assignedTo: string | null;
  estimatedCost: number | null;
  autoCreateRequests: boolean;
  isActive: boolean;
  totalExecutions: number;
  successfulExecutions: number;
  lastCompletedDate: Date | null;
  lastGeneratedDueDate: Date | null;
  createdBy: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ScheduleExecution {
  id: string;
  scheduleId: string;
  requestId: string | null;
  scheduledDate: Date;
  executionDate: Date;
  executedBy: string;
  completed: boolean;
  notes: string | null;
  actualCost: number | null;
  qualityRating: number | null;
  wasOnTime: boolean;
  daysDelayed: number;
  createdAt: Date;
}

// =============================================================================
// Diagnostics
// =============================================================================

export type BottleneckType = 'unassigned_high_priority' | 'overdue_requests' | 'pending_approvals';

export interface BottleneckFinding {
  type: BottleneckType;
  count: number;
  severity: 'medium' | 'high' | 'critical';
  description: string;
}
