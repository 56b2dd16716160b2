/**
 * Maintenance Input Schemas
 *
 * Zod schemas for every command accepted by the workflow engine. Components
 * parse their input through `parseInput` so that malformed commands surface
 * as MaintenanceValidationError before any state is read.
 */

import { z } from 'zod';
import { MaintenanceValidationError } from './maintenance_errors.js';
import {
  ApprovalLevelSchema,
  ChecklistStatusSchema,
  IssueTypeSchema,
  MaintenanceCategorySchema,
  MaintenancePrioritySchema,
  RecurrenceRuleSchema,
} from './maintenance_types.js';

const IdSchema = z.string().min(1);
const MoneySchema = z.number().finite().nonnegative();
const OptionalText = (max: number) => z.string().trim().max(max).nullable().optional();

// =============================================================================
// Requests
// =============================================================================

export const CreateRequestInputSchema = z.object({
  hostelId: IdSchema,
  roomId: IdSchema.nullable().optional(),
  floor: z.number().int().nullable().optional(),
  specificArea: OptionalText(255),
  title: z.string().trim().min(3).max(255),
  description: z.string().trim().min(10).max(2000),
  category: MaintenanceCategorySchema,
  priority: MaintenancePrioritySchema.default('medium'),
  issueType: IssueTypeSchema.default('routine'),
  estimatedCost: MoneySchema.nullable().optional(),
  requestedBy: IdSchema,
  deadline: z.date().nullable().optional(),
  /** Carried onto the approval record when one is opened */
  justification: OptionalText(1000),
});
export type CreateRequestInput = z.input<typeof CreateRequestInputSchema>;

export const EmergencyRequestInputSchema = CreateRequestInputSchema.omit({
  priority: true,
  issueType: true,
});
export type EmergencyRequestInput = z.input<typeof EmergencyRequestInputSchema>;

export const PreventiveRequestInputSchema = CreateRequestInputSchema.omit({
  priority: true,
  issueType: true,
}).extend({
  scheduleId: IdSchema,
});
export type PreventiveRequestInput = z.input<typeof PreventiveRequestInputSchema>;

export const UpdateCostEstimateInputSchema = z.object({
  estimatedCost: MoneySchema,
  updatedBy: IdSchema,
  justification: OptionalText(1000),
});
export type UpdateCostEstimateInput = z.input<typeof UpdateCostEstimateInputSchema>;

export const ThresholdConfigInputSchema = z
  .object({
    hostelId: IdSchema,
    autoApproveBelow: MoneySchema,
    supervisorLimit: MoneySchema,
    adminRequiredAbove: MoneySchema,
    autoApproveEnabled: z.boolean().default(true),
  })
  .refine((input) => input.autoApproveBelow <= input.supervisorLimit, {
    message: 'autoApproveBelow must not exceed supervisorLimit',
    path: ['autoApproveBelow'],
  })
  .refine((input) => input.autoApproveBelow <= input.adminRequiredAbove, {
    message: 'autoApproveBelow must not exceed adminRequiredAbove',
    path: ['autoApproveBelow'],
  });
export type ThresholdConfigInput = z.input<typeof ThresholdConfigInputSchema>;

// =============================================================================
// Assignments
// =============================================================================

export const AssigneeCandidateSchema = z.object({
  assigneeId: IdSchema,
  skills: z.array(z.string().trim().min(1)).default([]),
});
export type AssigneeCandidate = z.output<typeof AssigneeCandidateSchema>;

export const AssignInputSchema = z
  .object({
    assignedBy: IdSchema,
    /** Explicit assignee; the balancer picks from candidates when absent */
    assigneeId: IdSchema.optional(),
    candidates: z.array(AssigneeCandidateSchema).default([]),
    requiredSkills: z.array(z.string().trim().min(1)).default([]),
    exclude: z.array(IdSchema).default([]),
    estimatedHours: z.number().positive().max(1000).nullable().optional(),
    deadline: z.date().nullable().optional(),
    instructions: OptionalText(2000),
  })
  .refine((input) => input.assigneeId !== undefined || input.candidates.length > 0, {
    message: 'Either assigneeId or a non-empty candidates list is required',
    path: ['candidates'],
  });
export type AssignInput = z.input<typeof AssignInputSchema>;

export const VendorAssignInputSchema = z.object({
  vendorId: IdSchema,
  assignedBy: IdSchema,
  quotedAmount: MoneySchema,
  estimatedHours: z.number().positive().max(1000).nullable().optional(),
  deadline: z.date().nullable().optional(),
  instructions: OptionalText(2000),
});
export type VendorAssignInput = z.input<typeof VendorAssignInputSchema>;

export const ReassignInputSchema = z.object({
  newAssigneeId: IdSchema,
  reassignedBy: IdSchema,
  reason: z.string().trim().min(5).max(500),
  estimatedHours: z.number().positive().max(1000).nullable().optional(),
  deadline: z.date().nullable().optional(),
});
export type ReassignInput = z.input<typeof ReassignInputSchema>;

export const CompleteAssignmentInputSchema = z.object({
  actualHours: z.number().nonnegative().max(1000),
  qualityRating: z.number().int().min(1).max(5).nullable().optional(),
  completionNotes: OptionalText(2000),
});
export type CompleteAssignmentInput = z.input<typeof CompleteAssignmentInputSchema>;

// =============================================================================
// Approvals
// =============================================================================

export const ApproveInputSchema = z.object({
  approvedBy: IdSchema,
  approvedAmount: MoneySchema.nullable().optional(),
  conditions: OptionalText(1000),
  notes: OptionalText(1000),
});
export type ApproveInput = z.input<typeof ApproveInputSchema>;

export const RejectInputSchema = z.object({
  rejectedBy: IdSchema,
  reason: z.string().trim().min(1, 'Rejection reason is required').max(1000),
  allowResubmission: z.boolean().default(true),
});
export type RejectInput = z.input<typeof RejectInputSchema>;

export const EscalateInputSchema = z.object({
  escalatedBy: IdSchema,
  toLevel: ApprovalLevelSchema,
  reason: z.string().trim().min(1, 'Escalation reason is required').max(500),
});
export type EscalateInput = z.input<typeof EscalateInputSchema>;

// =============================================================================
// Costs and completion
// =============================================================================

export const CostComponentsSchema = z.object({
  materials: MoneySchema.default(0),
  labor: MoneySchema.default(0),
  vendor: MoneySchema.default(0),
  other: MoneySchema.default(0),
  tax: MoneySchema.default(0),
});
export type CostComponentsInput = z.input<typeof CostComponentsSchema>;

export const RecordActualCostInputSchema = z.object({
  actualCost: MoneySchema,
  components: CostComponentsSchema.default({}),
});
export type RecordActualCostInput = z.input<typeof RecordActualCostInputSchema>;

export const CategoryBudgetInputSchema = z.object({
  hostelId: IdSchema,
  category: MaintenanceCategorySchema,
  fiscalYear: z.number().int().min(2000).max(2100),
  allocatedAmount: z.number().finite().positive(),
  setBy: IdSchema,
});
export type CategoryBudgetInput = z.input<typeof CategoryBudgetInputSchema>;

export const MaterialItemSchema = z.object({
  name: z.string().trim().min(2).max(255),
  quantity: z.number().positive(),
  unit: z.string().trim().min(1).max(20),
  unitCost: MoneySchema,
  totalCost: MoneySchema,
  supplier: OptionalText(255),
});
export type MaterialItemInput = z.input<typeof MaterialItemSchema>;

export const CompleteInputSchema = z.object({
  completedBy: IdSchema,
  workNotes: z.string().trim().max(2000),
  materials: z.array(MaterialItemSchema).max(100).default([]),
  laborHours: z.number().nonnegative().max(1000),
  laborRatePerHour: MoneySchema.nullable().optional(),
  components: CostComponentsSchema.default({}),
  actualCost: MoneySchema,
  actualStartDate: z.date().nullable().optional(),
  actualCompletionDate: z.date().optional(),
});
export type CompleteInput = z.input<typeof CompleteInputSchema>;

export const ChecklistItemSchema = z.object({
  description: z.string().trim().min(1).max(500),
  status: ChecklistStatusSchema,
  critical: z.boolean().default(false),
  notes: OptionalText(500),
});

export const QualityCheckInputSchema = z.object({
  checkedBy: IdSchema,
  passed: z.boolean(),
  overallRating: z.number().int().min(1).max(5).nullable().optional(),
  checklist: z.array(ChecklistItemSchema).min(1).max(50),
  reworkRequired: z.boolean().default(false),
  reworkDetails: OptionalText(1000),
  reworkDeadline: z.date().nullable().optional(),
  notes: OptionalText(1000),
});
export type QualityCheckInput = z.input<typeof QualityCheckInputSchema>;

export const CertificateInputSchema = z.object({
  verifiedBy: IdSchema,
  approvedBy: IdSchema,
  workStartDate: z.date(),
  completionDate: z.date(),
  verificationDate: z.date(),
  issueDate: z.date().optional(),
  qualityRating: z.number().int().min(1).max(5).nullable().optional(),
  warrantyApplicable: z.boolean().default(false),
  warrantyPeriodMonths: z.number().int().min(1).max(120).nullable().optional(),
  warrantyTerms: OptionalText(1000),
});
export type CertificateInput = z.input<typeof CertificateInputSchema>;

// =============================================================================
// Preventive schedules
// =============================================================================

export const RecurrenceConfigSchema = z.object({
  intervalDays: z.number().int().positive().max(3650).optional(),
  anchorDayOfMonth: z.number().int().min(1).max(31).optional(),
});

export const CreateScheduleInputSchema = z
  .object({
    hostelId: IdSchema,
    title: z.string().trim().min(3).max(255),
    description: OptionalText(2000),
    category: MaintenanceCategorySchema,
    recurrence: RecurrenceRuleSchema,
    recurrenceConfig: RecurrenceConfigSchema.default({}),
    startDate: z.date(),
    endDate: z.date().nullable().optional(),
    assignedTo: IdSchema.nullable().optional(),
    estimatedCost: MoneySchema.nullable().optional(),
    autoCreateRequests: z.boolean().default(true),
    createdBy: IdSchema,
  })
  .refine((input) => !input.endDate || input.endDate.getTime() >= input.startDate.getTime(), {
    message: 'endDate must not precede startDate',
    path: ['endDate'],
  });
export type CreateScheduleInput = z.input<typeof CreateScheduleInputSchema>;

export const RecordExecutionInputSchema = z.object({
  executionDate: z.date(),
  /** The due date this run answers; defaults to the schedule's current due date */
  scheduledDate: z.date().optional(),
  executedBy: IdSchema,
  completed: z.boolean(),
  requestId: IdSchema.nullable().optional(),
  notes: OptionalText(2000),
  actualCost: MoneySchema.nullable().optional(),
  qualityRating: z.number().int().min(1).max(5).nullable().optional(),
});
export type RecordExecutionInput = z.input<typeof RecordExecutionInputSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a command, raising MaintenanceValidationError with the zod issues
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
      .join('; ');
    throw new MaintenanceValidationError(`Invalid ${context}: ${summary}`, result.error.issues);
  }
  return result.data;
}
