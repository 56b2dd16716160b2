/**
 * Threshold Policy
 *
 * Maps an estimated cost to the approval level it requires, using the
 * hostel's threshold configuration or the service defaults.
 */

import {
  DEFAULT_MAINTENANCE_SETTINGS,
  type ApprovalThresholdDefaults,
} from '../../config/maintenance_config.js';
import type { ApprovalLevel } from './maintenance_types.js';

const LEVEL_RANK: Record<ApprovalLevel, number> = {
  auto: 0,
  supervisor: 1,
  admin: 2,
};

/**
 * Required approval level for a cost. A missing estimate counts as 0.
 */
export function requiredApprovalLevel(
  config: ApprovalThresholdDefaults | null,
  estimatedCost: number | null,
  defaults: ApprovalThresholdDefaults = DEFAULT_MAINTENANCE_SETTINGS.defaultThresholds
): ApprovalLevel {
  const thresholds = config ?? defaults;
  const cost = estimatedCost ?? 0;

  if (thresholds.autoApproveEnabled && cost < thresholds.autoApproveBelow) {
    return 'auto';
  }
  if (cost < thresholds.supervisorLimit) {
    return 'supervisor';
  }
  if (cost >= thresholds.adminRequiredAbove) {
    return 'admin';
  }
  return 'supervisor';
}

export function compareApprovalLevels(a: ApprovalLevel, b: ApprovalLevel): number {
  return LEVEL_RANK[a] - LEVEL_RANK[b];
}

export function isHigherApprovalLevel(candidate: ApprovalLevel, current: ApprovalLevel): boolean {
  return compareApprovalLevels(candidate, current) > 0;
}
