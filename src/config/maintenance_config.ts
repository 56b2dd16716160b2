import dotenv from 'dotenv';
import { z } from 'zod';

/**
 * Maintenance Workflow Configuration
 *
 * Environment variables (all optional):
 * - MAINTENANCE_APPROVAL_DEADLINE_HOURS: Response window for a new approval (default: 48)
 * - MAINTENANCE_OVERDUE_APPROVAL_HOURS: Age at which an open approval is reported (default: 24)
 * - MAINTENANCE_COST_TOLERANCE: Allowed gap between cost components and totals (default: 1.00)
 * - MAINTENANCE_SCHEDULER_LOCK_TIMEOUT_MS: Age at which a scheduler lock is stale (default: 10 min)
 */

dotenv.config();

export interface ApprovalThresholdDefaults {
  autoApproveBelow: number;
  supervisorLimit: number;
  adminRequiredAbove: number;
  autoApproveEnabled: boolean;
}

export interface MaintenanceSettings {
  /** Hours until an open approval passes its response deadline */
  approvalDeadlineHours: number;
  /** Default age threshold for the overdue-approval query */
  overdueApprovalHours: number;
  /** Age in days after which a pending approval counts as a bottleneck */
  bottleneckApprovalAgeDays: number;
  /** Window in days for the unassigned high-priority bottleneck */
  bottleneckLookbackDays: number;
  /** Allowed difference between summed cost components and a stated total */
  costTolerance: number;
  /** Allowed difference between quantity x unit cost and a material line total */
  materialLineTolerance: number;
  /** Minimum length of completion work notes */
  minWorkNotesLength: number;
  /** Warranty months are converted to days at this rate */
  warrantyDaysPerMonth: number;
  /** Interval for custom recurrences without an explicit interval */
  customRecurrenceDefaultDays: number;
  /** Used when a hostel has no threshold configuration */
  defaultThresholds: ApprovalThresholdDefaults;
}

const EnvSchema = z.object({
  MAINTENANCE_APPROVAL_DEADLINE_HOURS: z.coerce.number().positive().default(48),
  MAINTENANCE_OVERDUE_APPROVAL_HOURS: z.coerce.number().positive().default(24),
  MAINTENANCE_COST_TOLERANCE: z.coerce.number().nonnegative().default(1),
  MAINTENANCE_SCHEDULER_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
});

const env = EnvSchema.parse(process.env);

export const MAINTENANCE_CONFIG = {
  // ============================================================================
  // Approval
  // ============================================================================

  APPROVAL_DEADLINE_HOURS: env.MAINTENANCE_APPROVAL_DEADLINE_HOURS,

  OVERDUE_APPROVAL_HOURS: env.MAINTENANCE_OVERDUE_APPROVAL_HOURS,

  BOTTLENECK_APPROVAL_AGE_DAYS: 3,

  BOTTLENECK_LOOKBACK_DAYS: 30,

  /** Fallback cutoffs when a hostel has no threshold row */
  DEFAULT_THRESHOLDS: {
    autoApproveBelow: 1000,
    supervisorLimit: 5000,
    adminRequiredAbove: 5000,
    autoApproveEnabled: true,
  },

  // ============================================================================
  // Cost reconciliation
  // ============================================================================

  /** Absorbs rounding between line items and stated totals */
  COST_TOLERANCE: env.MAINTENANCE_COST_TOLERANCE,

  MATERIAL_LINE_TOLERANCE: 0.01,

  // ============================================================================
  // Completion
  // ============================================================================

  MIN_WORK_NOTES_LENGTH: 20,

  WARRANTY_DAYS_PER_MONTH: 30,

  // ============================================================================
  // Preventive schedules
  // ============================================================================

  CUSTOM_RECURRENCE_DEFAULT_DAYS: 30,

  SCHEDULER_LOCK_TIMEOUT_MS: env.MAINTENANCE_SCHEDULER_LOCK_TIMEOUT_MS,

  // ============================================================================
  // Persistence retries (serialization failures / deadlocks only)
  // ============================================================================

  TRANSACTION_MAX_RETRIES: 3,

  RETRY_INITIAL_DELAY_MS: 50,

  RETRY_BACKOFF_MULTIPLIER: 2,
} as const;

export const DEFAULT_MAINTENANCE_SETTINGS: MaintenanceSettings = {
  approvalDeadlineHours: MAINTENANCE_CONFIG.APPROVAL_DEADLINE_HOURS,
  overdueApprovalHours: MAINTENANCE_CONFIG.OVERDUE_APPROVAL_HOURS,
  bottleneckApprovalAgeDays: MAINTENANCE_CONFIG.BOTTLENECK_APPROVAL_AGE_DAYS,
  bottleneckLookbackDays: MAINTENANCE_CONFIG.BOTTLENECK_LOOKBACK_DAYS,
  costTolerance: MAINTENANCE_CONFIG.COST_TOLERANCE,
  materialLineTolerance: MAINTENANCE_CONFIG.MATERIAL_LINE_TOLERANCE,
  minWorkNotesLength: MAINTENANCE_CONFIG.MIN_WORK_NOTES_LENGTH,
  warrantyDaysPerMonth: MAINTENANCE_CONFIG.WARRANTY_DAYS_PER_MONTH,
  customRecurrenceDefaultDays: MAINTENANCE_CONFIG.CUSTOM_RECURRENCE_DEFAULT_DAYS,
  defaultThresholds: { ...MAINTENANCE_CONFIG.DEFAULT_THRESHOLDS },
};

/**
 * Merge overrides onto the environment-derived settings
 */
export function resolveMaintenanceSettings(
  overrides: Partial<MaintenanceSettings> = {},
): MaintenanceSettings {
  return {
    ...DEFAULT_MAINTENANCE_SETTINGS,
    ...overrides,
    defaultThresholds: {
      ...DEFAULT_MAINTENANCE_SETTINGS.defaultThresholds,
      ...overrides.defaultThresholds,
    },
  };
}
