import { describe, it, expect, vi, beforeEach } from 'vitest';
import { subDays } from 'date-fns';
import {
  AlreadyProcessedError,
  CostMismatchError,
  InconsistentQualityResultError,
  InvalidTransitionError,
  MaintenanceValidationError,
} from '../maintenance_errors.js';
import type { CertificateInput, CompleteInput } from '../maintenance_schemas.js';
import { createHarness, requestInput, START } from './fixtures.js';

describe('completion recording', () => {
  let harness: ReturnType<typeof createHarness>;

  const completeInput = (overrides: Partial<CompleteInput> = {}): CompleteInput => ({
    completedBy: 'tech-a',
    workNotes: 'Replaced the washer and resealed the tap housing',
    materials: [{ name: 'Washer kit', quantity: 4, unit: 'pcs', unitCost: 12.5, totalCost: 50 }],
    laborHours: 3,
    laborRatePerHour: 100,
    components: { materials: 50, labor: 300, tax: 35 },
    actualCost: 385,
    ...overrides,
  });

  const certificateInput = (overrides: Partial<CertificateInput> = {}): CertificateInput => ({
    verifiedBy: 'supervisor-1',
    approvedBy: 'manager-1',
    workStartDate: new Date(2026, 9, 14),
    completionDate: new Date(2026, 9, 15),
    verificationDate: new Date(2026, 9, 16),
    issueDate: new Date(2026, 9, 17),
    ...overrides,
  });

  /** Approved at 500, assigned to tech-a for 3 hours and started */
  const startedRequest = async () => {
    const request = await harness.engine.create(requestInput({ estimatedCost: 500 }));
    await harness.engine.assign(request.id, { assignedBy: 'manager-1', assigneeId: 'tech-a', estimatedHours: 3 });
    await harness.engine.transition(request.id, 'in_progress', 'tech-a');
    return request;
  };

  const completedRequest = async () => {
    const request = await startedRequest();
    return harness.engine.complete(request.id, completeInput());
  };

  beforeEach(() => {
    harness = createHarness();
  });

  describe('complete', () => {
    it('should record the completion and its variance against the approved budget', async () => {
      const request = await startedRequest();
      harness.publisher.events = [];

      const { request: completed, completion } = await harness.engine.complete(request.id, completeInput());

      expect(completed.status).toBe('completed');
      expect(completed.completedAt).toEqual(START);
      expect(completion.actualStartDate).toEqual(START);
      expect(completion.qualityVerified).toBe(false);
      expect(completion.components).toEqual({ materials: 50, labor: 300, vendor: 0, other: 0, tax: 35 });

      const cost = await harness.engine.getCostRecord(request.id);
      expect(cost).toMatchObject({
        approvedCost: 500,
        actualCost: 385,
        variance: -115,
        variancePercentage: -23,
        withinBudget: true,
      });

      expect(harness.publisher.types()).toEqual(['request.status_changed', 'completion.recorded']);
    });

    it('should close the active staff assignment with the labor hours', async () => {
      const request = await startedRequest();
      await harness.engine.complete(request.id, completeInput());

      const [assignment] = await harness.engine.getAssignments(request.id);
      expect(assignment).toMatchObject({ isCompleted: true, isActive: false, actualHours: 3, completedAt: START });
    });

    it('should flag spending above the approved budget', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const request = await startedRequest();
      harness.publisher.events = [];

      await harness.engine.complete(
        request.id,
        completeInput({ materials: [], laborRatePerHour: null, components: { labor: 600 }, actualCost: 600 })
      );

      expect(harness.publisher.types()).toEqual([
        'request.status_changed',
        'completion.recorded',
        'cost.budget_exceeded',
      ]);
      expect((await harness.engine.getCostRecord(request.id))?.withinBudget).toBe(false);
      expect(warnSpy).toHaveBeenCalledWith('[Maintenance] Request MNT-2026-10-0001 over budget by 100.00');
    });

    it('should reject a material line whose total disagrees with quantity and unit cost', async () => {
      const request = await startedRequest();

      await expect(
        harness.engine.complete(
          request.id,
          completeInput({
            materials: [{ name: 'Pipe clamp', quantity: 3, unit: 'pcs', unitCost: 10, totalCost: 35 }],
            components: { materials: 35, labor: 300, tax: 50 },
          })
        )
      ).rejects.toBeInstanceOf(CostMismatchError);
      expect((await harness.engine.getRequest(request.id)).status).toBe('in_progress');
    });

    it('should accept material lines exactly one unit away from the materials cost', async () => {
      const request = await startedRequest();

      const { completion } = await harness.engine.complete(
        request.id,
        completeInput({ components: { materials: 51, labor: 300, tax: 34 } })
      );

      expect(completion.components.materials).toBe(51);
    });

    it('should reject material lines one cent further away as a validation failure', async () => {
      const request = await startedRequest();

      const attempt = harness.engine.complete(
        request.id,
        completeInput({ components: { materials: 51.01, labor: 300, tax: 33.99 } })
      );

      await expect(attempt).rejects.toThrow(
        `Material lines do not sum to the materials cost for ${request.id}: expected 51.01, got 50.00`
      );
      await expect(attempt).rejects.toBeInstanceOf(MaintenanceValidationError);
      await expect(attempt).rejects.toMatchObject({ code: 'COST_MISMATCH' });
    });

    it('should reject components that do not add up to the actual cost', async () => {
      const request = await startedRequest();

      await expect(harness.engine.complete(request.id, completeInput({ actualCost: 400 }))).rejects.toThrow(
        `Cost components do not sum to the actual cost for ${request.id}: expected 400.00, got 385.00`
      );
    });

    it('should require meaningful work notes', async () => {
      const request = await startedRequest();

      await expect(harness.engine.complete(request.id, completeInput({ workNotes: 'Fixed' }))).rejects.toBeInstanceOf(
        MaintenanceValidationError
      );
    });

    it('should only complete work in progress', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 500 }));
      await harness.engine.assign(request.id, { assignedBy: 'manager-1', assigneeId: 'tech-a' });

      await expect(harness.engine.complete(request.id, completeInput())).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
    });
  });

  describe('issueQualityCheck', () => {
    it('should verify the completion on a passing check', async () => {
      const { request, completion } = await completedRequest();

      const check = await harness.engine.issueQualityCheck(completion.id, {
        checkedBy: 'supervisor-1',
        passed: true,
        overallRating: 5,
        checklist: [{ description: 'No drips after 10 minutes', status: 'pass' }],
      });

      expect(check.requestId).toBe(request.id);
      expect(check.checklist).toEqual([
        { description: 'No drips after 10 minutes', status: 'pass', critical: false, notes: null },
      ]);
      expect(await harness.engine.getCompletion(request.id)).toMatchObject({
        qualityVerified: true,
        qualityVerifiedBy: 'supervisor-1',
        qualityVerifiedAt: START,
      });
    });

    it('should refuse a pass with a failed critical item', async () => {
      const { completion } = await completedRequest();

      await expect(
        harness.engine.issueQualityCheck(completion.id, {
          checkedBy: 'supervisor-1',
          passed: true,
          checklist: [{ description: 'Water pressure restored', status: 'fail', critical: true }],
        })
      ).rejects.toBeInstanceOf(InconsistentQualityResultError);
    });

    it('should treat an inconsistent result as a validation failure', async () => {
      const { completion } = await completedRequest();

      const attempt = harness.engine.issueQualityCheck(completion.id, {
        checkedBy: 'supervisor-1',
        passed: true,
        checklist: [{ description: 'Water pressure restored', status: 'fail', critical: true }],
      });

      await expect(attempt).rejects.toBeInstanceOf(MaintenanceValidationError);
      await expect(attempt).rejects.toMatchObject({ code: 'INCONSISTENT_QUALITY_RESULT' });
    });

    it('should refuse a pass that requires rework', async () => {
      const { completion } = await completedRequest();

      await expect(
        harness.engine.issueQualityCheck(completion.id, {
          checkedBy: 'supervisor-1',
          passed: true,
          checklist: [{ description: 'Sealant finish', status: 'partial' }],
          reworkRequired: true,
          reworkDetails: 'Redo the sealant bead',
          reworkDeadline: new Date(2026, 9, 20),
        })
      ).rejects.toThrow(
        `Quality check for completion ${completion.id}: rework is required but the check is marked passed`
      );
    });

    it('should require a future rework deadline', async () => {
      const { completion } = await completedRequest();

      await expect(
        harness.engine.issueQualityCheck(completion.id, {
          checkedBy: 'supervisor-1',
          passed: false,
          checklist: [{ description: 'Sealant finish', status: 'fail' }],
          reworkRequired: true,
          reworkDetails: 'Redo the sealant bead',
          reworkDeadline: subDays(START, 1),
        })
      ).rejects.toBeInstanceOf(MaintenanceValidationError);
    });

    it('should clear verification on a failed recheck', async () => {
      const { request, completion } = await completedRequest();
      await harness.engine.issueQualityCheck(completion.id, {
        checkedBy: 'supervisor-1',
        passed: true,
        checklist: [{ description: 'No drips', status: 'pass' }],
      });
      await harness.engine.issueQualityCheck(completion.id, {
        checkedBy: 'supervisor-2',
        passed: false,
        checklist: [{ description: 'No drips', status: 'fail' }],
      });

      expect(await harness.engine.getCompletion(request.id)).toMatchObject({
        qualityVerified: false,
        qualityVerifiedBy: null,
      });
    });
  });

  describe('issueCertificate', () => {
    it('should issue a numbered certificate with its warranty window', async () => {
      const { completion } = await completedRequest();

      const certificate = await harness.engine.issueCertificate(
        completion.id,
        certificateInput({ warrantyApplicable: true, warrantyPeriodMonths: 6, warrantyTerms: 'Parts and labour' })
      );

      expect(certificate.certificateNumber).toBe('CERT-2026-10-0001');
      expect(certificate.workTitle).toBe('Leaking tap');
      expect(certificate.totalCost).toBe(385);
      expect(certificate.laborHours).toBe(3);
      expect(certificate.warrantyValidUntil).toEqual(new Date(2027, 3, 13));
    });

    it('should leave warranty fields empty when no warranty applies', async () => {
      const { completion } = await completedRequest();
      const certificate = await harness.engine.issueCertificate(completion.id, certificateInput());

      expect(certificate.warrantyValidUntil).toBeNull();
      expect(certificate.warrantyPeriodMonths).toBeNull();
    });

    it('should lock the completion once certified', async () => {
      const { completion } = await completedRequest();
      await harness.engine.issueCertificate(completion.id, certificateInput());

      await expect(harness.engine.issueCertificate(completion.id, certificateInput())).rejects.toBeInstanceOf(
        AlreadyProcessedError
      );
      await expect(
        harness.engine.issueQualityCheck(completion.id, {
          checkedBy: 'supervisor-1',
          passed: true,
          checklist: [{ description: 'No drips', status: 'pass' }],
        })
      ).rejects.toBeInstanceOf(AlreadyProcessedError);
    });

    it('should require dates in order', async () => {
      const { completion } = await completedRequest();

      await expect(
        harness.engine.issueCertificate(completion.id, certificateInput({ completionDate: new Date(2026, 9, 13) }))
      ).rejects.toBeInstanceOf(MaintenanceValidationError);
    });

    it('should require terms for a warranty', async () => {
      const { completion } = await completedRequest();

      await expect(
        harness.engine.issueCertificate(
          completion.id,
          certificateInput({ warrantyApplicable: true, warrantyPeriodMonths: 12 })
        )
      ).rejects.toThrow(`Warranty period and terms are required for completion ${completion.id}`);
    });
  });
});
