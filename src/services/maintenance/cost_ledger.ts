/**
 * Cost Ledger
 *
 * Tracks estimated, approved and actual cost per request and computes
 * budget variance when actuals are recorded. Actual spend is also charged
 * against the hostel's yearly budget for the request's category; going over
 * that budget is reported, never refused.
 */

import { getYear } from 'date-fns';
import type { MaintenanceSettings } from '../../config/maintenance_config.js';
import { CostMismatchError, MaintenanceNotFoundError } from './maintenance_errors.js';
import type { MaintenanceTransaction } from './maintenance_store.js';
import type {
  BudgetHealth,
  CategoryBudget,
  CategoryBudgetStatus,
  CostComponents,
  CostRecord,
  MaintenanceCategory,
  MaintenanceRequest,
} from './maintenance_types.js';

export const EMPTY_COMPONENTS: CostComponents = {
  materials: 0,
  labor: 0,
  vendor: 0,
  other: 0,
  tax: 0,
};

export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function sumComponents(components: CostComponents): number {
  return roundMoney(
    components.materials + components.labor + components.vendor + components.other + components.tax
  );
}

export interface BudgetVariance {
  variance: number;
  variancePercentage: number;
  withinBudget: boolean;
}

export function computeVariance(approvedCost: number, actualCost: number): BudgetVariance {
  const variance = roundMoney(actualCost - approvedCost);
  return {
    variance,
    variancePercentage: approvedCost === 0 ? 0 : roundMoney((variance / approvedCost) * 100),
    withinBudget: actualCost <= approvedCost,
  };
}

/** Utilization percentages at which a category budget changes health */
const BUDGET_HEALTH_STEPS: ReadonlyArray<[number, BudgetHealth]> = [
  [100, 'exceeded'],
  [90, 'critical'],
  [75, 'warning'],
];

export function summarizeBudget(budget: CategoryBudget): CategoryBudgetStatus {
  const utilizationPercentage = roundMoney((budget.utilizedAmount / budget.allocatedAmount) * 100);
  const step = BUDGET_HEALTH_STEPS.find(([percentage]) => utilizationPercentage >= percentage);
  return {
    hostelId: budget.hostelId,
    category: budget.category,
    fiscalYear: budget.fiscalYear,
    allocatedAmount: budget.allocatedAmount,
    utilizedAmount: budget.utilizedAmount,
    remainingAmount: roundMoney(budget.allocatedAmount - budget.utilizedAmount),
    utilizationPercentage,
    status: step ? step[1] : 'healthy',
  };
}

export interface CategoryBudgetData {
  hostelId: string;
  category: MaintenanceCategory;
  fiscalYear: number;
  allocatedAmount: number;
  setBy: string;
}

export interface CategoryBudgetCharge {
  budget: CategoryBudget;
  charged: number;
  /** The charge was larger than what remained before it */
  exceeded: boolean;
}

export interface ActualCostResult {
  record: CostRecord;
  budgetExceeded: boolean;
  /** null when the hostel has no budget for the category that year */
  categoryBudget: CategoryBudgetCharge | null;
}

export class CostLedger {
  constructor(private settings: Pick<MaintenanceSettings, 'costTolerance'>) {}

  /**
   * Throws CostMismatchError when the components do not add up to `total`
   */
  assertComponentsMatch(entityId: string, total: number, components: CostComponents): void {
    const sum = sumComponents(components);
    if (roundMoney(Math.abs(sum - total)) > this.settings.costTolerance) {
      throw new CostMismatchError(entityId, total, sum, 'Cost components do not sum to the actual cost');
    }
  }

  async getForRequest(tx: MaintenanceTransaction, requestId: string): Promise<CostRecord | null> {
    return tx.costs.findByRequest(requestId);
  }

  /**
   * Keep the ledger's estimate in step with the request
   */
  async recordEstimate(
    tx: MaintenanceTransaction,
    requestId: string,
    estimatedCost: number,
    now: Date
  ): Promise<CostRecord> {
    const existing = await tx.costs.findByRequest(requestId, { lock: true });
    if (!existing) {
      return tx.costs.insert({
        requestId,
        estimatedCost,
        approvedCost: 0,
        actualCost: null,
        components: { ...EMPTY_COMPONENTS },
        variance: null,
        variancePercentage: null,
        withinBudget: null,
        updatedAt: now,
      });
    }
    return tx.costs.update(existing.id, { estimatedCost, updatedAt: now });
  }

  async recordApproved(
    tx: MaintenanceTransaction,
    requestId: string,
    approvedCost: number,
    now: Date
  ): Promise<CostRecord> {
    const existing = await tx.costs.findByRequest(requestId, { lock: true });
    if (!existing) {
      return tx.costs.insert({
        requestId,
        estimatedCost: approvedCost,
        approvedCost,
        actualCost: null,
        components: { ...EMPTY_COMPONENTS },
        variance: null,
        variancePercentage: null,
        withinBudget: null,
        updatedAt: now,
      });
    }
    return tx.costs.update(existing.id, { approvedCost, updatedAt: now });
  }

  /**
   * Record the actual spend and its breakdown. The approved budget comes from
   * the ledger, else the approved amount, else the request's estimate.
   */
  async recordActual(
    tx: MaintenanceTransaction,
    requestId: string,
    actualCost: number,
    components: CostComponents,
    now: Date
  ): Promise<ActualCostResult> {
    this.assertComponentsMatch(requestId, actualCost, components);

    const request = await tx.requests.findById(requestId);
    if (!request) {
      throw new MaintenanceNotFoundError('Maintenance request', requestId);
    }

    const existing = await tx.costs.findByRequest(requestId, { lock: true });
    const approvedCost =
      existing && existing.approvedCost > 0
        ? existing.approvedCost
        : await this.fallbackApprovedCost(tx, requestId, request.estimatedCost);

    const previousActual = existing?.actualCost ?? 0;
    const variance = computeVariance(approvedCost, actualCost);
    const values = {
      approvedCost,
      actualCost,
      components: { ...components },
      ...variance,
      updatedAt: now,
    };

    const record = existing
      ? await tx.costs.update(existing.id, values)
      : await tx.costs.insert({
          requestId,
          estimatedCost: request.estimatedCost ?? 0,
          ...values,
        });

    if (!variance.withinBudget) {
      console.warn(
        `[Maintenance] Request ${request.requestNumber} over budget by ${variance.variance.toFixed(2)}`
      );
    }

    const categoryBudget = await this.chargeCategoryBudget(
      tx,
      request,
      roundMoney(actualCost - previousActual),
      now
    );

    return { record, budgetExceeded: !variance.withinBudget, categoryBudget };
  }

  /**
   * Create or replace the allocation for a hostel, category and year. The
   * amount already spent is kept.
   */
  async setCategoryBudget(
    tx: MaintenanceTransaction,
    data: CategoryBudgetData,
    now: Date
  ): Promise<CategoryBudget> {
    const existing = await tx.budgets.find(data.hostelId, data.category, data.fiscalYear, { lock: true });
    if (existing) {
      return tx.budgets.update(existing.id, {
        allocatedAmount: data.allocatedAmount,
        setBy: data.setBy,
        updatedAt: now,
      });
    }
    return tx.budgets.insert({
      ...data,
      utilizedAmount: 0,
      createdAt: now,
      updatedAt: now,
    });
  }

  async getCategoryBudgetStatus(
    tx: MaintenanceTransaction,
    hostelId: string,
    category: MaintenanceCategory,
    fiscalYear: number
  ): Promise<CategoryBudgetStatus> {
    const budget = await tx.budgets.find(hostelId, category, fiscalYear);
    if (!budget) {
      return {
        hostelId,
        category,
        fiscalYear,
        allocatedAmount: 0,
        utilizedAmount: 0,
        remainingAmount: 0,
        utilizationPercentage: 0,
        status: 'no_budget',
      };
    }
    return summarizeBudget(budget);
  }

  /**
   * Move the category's utilization by `amount`, which is negative when a
   * recorded actual is revised down
   */
  private async chargeCategoryBudget(
    tx: MaintenanceTransaction,
    request: MaintenanceRequest,
    amount: number,
    now: Date
  ): Promise<CategoryBudgetCharge | null> {
    const fiscalYear = getYear(now);
    const budget = await tx.budgets.find(request.hostelId, request.category, fiscalYear, { lock: true });
    if (!budget) {
      return null;
    }

    const remaining = roundMoney(budget.allocatedAmount - budget.utilizedAmount);
    const exceeded = amount > 0 && amount > remaining;
    const updated = await tx.budgets.update(budget.id, {
      utilizedAmount: Math.max(0, roundMoney(budget.utilizedAmount + amount)),
      updatedAt: now,
    });

    if (exceeded) {
      console.warn(
        `[Maintenance] Request ${request.requestNumber} spend ${amount.toFixed(2)} exceeds remaining ` +
          `${request.category} budget ${remaining.toFixed(2)} for ${fiscalYear}`
      );
    }

    return { budget: updated, charged: amount, exceeded };
  }

  private async fallbackApprovedCost(
    tx: MaintenanceTransaction,
    requestId: string,
    estimatedCost: number | null
  ): Promise<number> {
    const approvals = await tx.approvals.listForRequest(requestId);
    const granted = approvals.filter((approval) => approval.approved === true && !approval.retroactive);
    const latest = granted[granted.length - 1];
    return latest?.approvedAmount ?? estimatedCost ?? 0;
  }
}
