import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CostLedger,
  EMPTY_COMPONENTS,
  computeVariance,
  roundMoney,
  sumComponents,
  summarizeBudget,
} from '../cost_ledger.js';
import { CostMismatchError, MaintenanceValidationError } from '../maintenance_errors.js';
import type { CategoryBudget } from '../maintenance_types.js';
import { createHarness, HOSTEL_ID, requestInput, START } from './fixtures.js';

describe('cost arithmetic', () => {
  it('should round to cents', () => {
    expect(roundMoney(234.55999999999995)).toBe(234.56);
    expect(roundMoney(-114.99999999999999)).toBe(-115);
  });

  it('should sum components to cents', () => {
    expect(sumComponents({ materials: 10.1, labor: 20.2, vendor: 0, other: 0, tax: 0.3 })).toBe(30.6);
    expect(sumComponents(EMPTY_COMPONENTS)).toBe(0);
  });

  it('should compute a negative variance when under budget', () => {
    expect(computeVariance(500, 385)).toEqual({
      variance: -115,
      variancePercentage: -23,
      withinBudget: true,
    });
  });

  it('should compute a percentage rounded to cents when over budget', () => {
    expect(computeVariance(1000, 1234.56)).toEqual({
      variance: 234.56,
      variancePercentage: 23.46,
      withinBudget: false,
    });
  });

  it('should report a zero percentage when nothing was approved', () => {
    expect(computeVariance(0, 100)).toEqual({
      variance: 100,
      variancePercentage: 0,
      withinBudget: false,
    });
  });

  it('should count spending exactly the approved amount as within budget', () => {
    expect(computeVariance(750, 750).withinBudget).toBe(true);
  });
});

describe('CostLedger.assertComponentsMatch', () => {
  const ledger = new CostLedger({ costTolerance: 1 });

  it('should accept components within the tolerance', () => {
    expect(() =>
      ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 99.5 })
    ).not.toThrow();
  });

  it('should reject components outside the tolerance', () => {
    expect(() => ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 98 })).toThrow(
      new CostMismatchError('req-1', 100, 98, 'Cost components do not sum to the actual cost')
    );
  });

  it('should accept a gap of exactly the tolerance either way', () => {
    expect(() => ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 101 })).not.toThrow();
    expect(() => ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 99 })).not.toThrow();
  });

  it('should reject a gap one cent past the tolerance either way', () => {
    expect(() => ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 101.01 })).toThrow(
      CostMismatchError
    );
    expect(() => ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 98.99 })).toThrow(
      CostMismatchError
    );
  });

  it('should raise a validation failure', () => {
    expect(() => ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 98 })).toThrow(
      MaintenanceValidationError
    );
  });

  it('should include the figures in the error message', () => {
    expect(() => ledger.assertComponentsMatch('req-1', 100, { ...EMPTY_COMPONENTS, labor: 98 })).toThrow(
      'Cost components do not sum to the actual cost for req-1: expected 100.00, got 98.00'
    );
  });
});

describe('summarizeBudget', () => {
  const budget = (utilizedAmount: number): CategoryBudget => ({
    id: 'bud-1',
    hostelId: HOSTEL_ID,
    category: 'plumbing',
    fiscalYear: 2026,
    allocatedAmount: 1000,
    utilizedAmount,
    setBy: 'manager-1',
    createdAt: START,
    updatedAt: START,
  });

  it('should grade utilization against the allocation', () => {
    expect(summarizeBudget(budget(500)).status).toBe('healthy');
    expect(summarizeBudget(budget(750)).status).toBe('warning');
    expect(summarizeBudget(budget(900)).status).toBe('critical');
    expect(summarizeBudget(budget(1000)).status).toBe('exceeded');
  });

  it('should report the remaining amount and percentage', () => {
    expect(summarizeBudget(budget(1100))).toEqual({
      hostelId: HOSTEL_ID,
      category: 'plumbing',
      fiscalYear: 2026,
      allocatedAmount: 1000,
      utilizedAmount: 1100,
      remainingAmount: -100,
      utilizationPercentage: 110,
      status: 'exceeded',
    });
  });
});

describe('category budgets', () => {
  let harness: ReturnType<typeof createHarness>;

  const plumbingBudget = (allocatedAmount: number) =>
    harness.engine.setCategoryBudget({
      hostelId: HOSTEL_ID,
      category: 'plumbing',
      fiscalYear: 2026,
      allocatedAmount,
      setBy: 'manager-1',
    });

  beforeEach(() => {
    harness = createHarness();
  });

  it('should report no budget until one is set', async () => {
    expect(await harness.engine.getCategoryBudgetStatus(HOSTEL_ID, 'plumbing', 2026)).toMatchObject({
      status: 'no_budget',
      allocatedAmount: 0,
      remainingAmount: 0,
    });
  });

  it('should charge actual spend to the category budget of the year', async () => {
    await plumbingBudget(1000);
    const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));

    await harness.engine.recordActualCost(request.id, { actualCost: 200, components: { labor: 200 } });

    expect(await harness.engine.getCategoryBudgetStatus(HOSTEL_ID, 'plumbing', 2026)).toMatchObject({
      utilizedAmount: 200,
      remainingAmount: 800,
      utilizationPercentage: 20,
      status: 'healthy',
    });
    expect((await harness.engine.getCategoryBudgetStatus(HOSTEL_ID, 'plumbing', 2027)).status).toBe('no_budget');
  });

  it('should charge only the difference when an actual is revised', async () => {
    await plumbingBudget(1000);
    const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));

    await harness.engine.recordActualCost(request.id, { actualCost: 200, components: { labor: 200 } });
    await harness.engine.recordActualCost(request.id, { actualCost: 150, components: { labor: 150 } });

    expect((await harness.engine.getCategoryBudgetStatus(HOSTEL_ID, 'plumbing', 2026)).utilizedAmount).toBe(150);
  });

  it('should warn and publish when spend exceeds what remains, without blocking it', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await plumbingBudget(1000);
    const first = await harness.engine.create(requestInput({ estimatedCost: 250 }));
    await harness.engine.recordActualCost(first.id, { actualCost: 200, components: { labor: 200 } });
    const second = await harness.engine.create(requestInput({ estimatedCost: 900 }));
    harness.publisher.events = [];

    const record = await harness.engine.recordActualCost(second.id, { actualCost: 900, components: { labor: 900 } });

    expect(record.actualCost).toBe(900);
    expect(harness.publisher.events).toEqual([
      {
        type: 'cost.category_budget_exceeded',
        occurredAt: START.toISOString(),
        hostelId: HOSTEL_ID,
        requestId: second.id,
        category: 'plumbing',
        fiscalYear: 2026,
        allocatedAmount: 1000,
        utilizedAmount: 1100,
      },
    ]);
    expect(warnSpy).toHaveBeenCalledWith(
      '[Maintenance] Request MNT-2026-10-0002 spend 900.00 exceeds remaining plumbing budget 800.00 for 2026'
    );
    expect((await harness.engine.getCategoryBudgetStatus(HOSTEL_ID, 'plumbing', 2026)).status).toBe('exceeded');
  });

  it('should keep spend already charged when the allocation changes', async () => {
    await plumbingBudget(1000);
    const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));
    await harness.engine.recordActualCost(request.id, { actualCost: 200, components: { labor: 200 } });

    const updated = await plumbingBudget(1500);

    expect(updated.allocatedAmount).toBe(1500);
    expect(updated.utilizedAmount).toBe(200);
    expect(harness.store.auditLog.filter((entry) => entry.action === 'SET_MAINTENANCE_BUDGET')).toHaveLength(2);
  });

  it('should require a positive allocation', async () => {
    await expect(plumbingBudget(0)).rejects.toBeInstanceOf(MaintenanceValidationError);
  });
});
