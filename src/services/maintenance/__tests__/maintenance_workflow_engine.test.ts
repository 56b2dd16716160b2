import { describe, it, expect, vi, beforeEach } from 'vitest';
import { addDays, addHours } from 'date-fns';
import {
  AlreadyProcessedError,
  InvalidTransitionError,
  MaintenanceNotFoundError,
  MaintenanceValidationError,
} from '../maintenance_errors.js';
import { createHarness, HOSTEL_ID, requestInput, START } from './fixtures.js';

describe('MaintenanceWorkflowEngine', () => {
  let harness: ReturnType<typeof createHarness>;

  beforeEach(() => {
    harness = createHarness();
  });

  const openApprovalFor = async (requestId: string) => {
    const approvals = await harness.engine.getApprovals(requestId);
    const open = approvals.find((approval) => approval.approved === null);
    if (!open) {
      throw new Error(`No open approval for ${requestId}`);
    }
    return open;
  };

  // ==========================================================================
  // Creation
  // ==========================================================================

  describe('create', () => {
    it('should auto-approve a request below the approval threshold', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));

      expect(request.requestNumber).toBe('MNT-2026-10-0001');
      expect(request.status).toBe('approved');
      expect(request.approvalLevel).toBe('auto');
      expect(request.requiresApproval).toBe(false);

      const history = await harness.engine.getStatusHistory(request.id);
      expect(history.map((entry) => entry.notes)).toEqual([
        'Request created',
        'Auto-approved: estimated cost below approval threshold',
      ]);
      expect(harness.publisher.types()).toEqual(['request.created']);

      const cost = await harness.engine.getCostRecord(request.id);
      expect(cost?.estimatedCost).toBe(250);
      expect(cost?.approvedCost).toBe(250);
    });

    it('should number requests sequentially within the month', async () => {
      await harness.engine.create(requestInput({ estimatedCost: 100 }));
      const second = await harness.engine.create(requestInput({ estimatedCost: 100 }));
      expect(second.requestNumber).toBe('MNT-2026-10-0002');
    });

    it('should hold a costly request for supervisor approval', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));

      expect(request.status).toBe('pending');
      expect(request.approvalLevel).toBe('supervisor');
      expect(request.requiresApproval).toBe(true);

      const approval = await openApprovalFor(request.id);
      expect(approval.approvalLevel).toBe('supervisor');
      expect(approval.estimatedCost).toBe(2500);
      expect(approval.deadline).toEqual(addHours(START, 48));
      expect(approval.justification).toBe('Approval required for Leaking tap');
      expect(approval.retroactive).toBe(false);

      expect(harness.publisher.types()).toEqual(['request.created', 'approval.requested']);
    });

    it('should require admin approval at the admin threshold', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 5000 }));
      expect(request.approvalLevel).toBe('admin');
    });

    it('should follow hostel-specific thresholds', async () => {
      await harness.engine.configureThresholds(
        { hostelId: HOSTEL_ID, autoApproveBelow: 100, supervisorLimit: 500, adminRequiredAbove: 500 },
        'admin-1'
      );
      const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));
      expect(request.status).toBe('pending');
      expect(request.approvalLevel).toBe('supervisor');
    });

    it('should reject invalid input', async () => {
      await expect(harness.engine.create(requestInput({ title: 'ab' }))).rejects.toBeInstanceOf(
        MaintenanceValidationError
      );
      await expect(harness.engine.create(requestInput({ estimatedCost: -5 }))).rejects.toBeInstanceOf(
        MaintenanceValidationError
      );
      expect(harness.store.requestCount).toBe(0);
    });
  });

  describe('createEmergency', () => {
    it('should skip the gate and open a retroactive admin approval for large costs', async () => {
      const request = await harness.engine.createEmergency(requestInput({ estimatedCost: 8000 }));

      expect(request.priority).toBe('critical');
      expect(request.issueType).toBe('emergency');
      expect(request.status).toBe('pending');
      expect(request.requiresApproval).toBe(false);

      const approval = await openApprovalFor(request.id);
      expect(approval.approvalLevel).toBe('admin');
      expect(approval.retroactive).toBe(true);

      const { request: assigned } = await harness.engine.assign(request.id, {
        assignedBy: 'manager-1',
        assigneeId: 'tech-a',
      });
      expect(assigned.status).toBe('assigned');
    });

    it('should not open an approval for small emergency costs', async () => {
      const request = await harness.engine.createEmergency(requestInput({ estimatedCost: 300 }));
      expect(request.status).toBe('pending');
      expect(await harness.engine.getApprovals(request.id)).toEqual([]);
    });

    it('should leave the status alone when the retroactive approval is decided', async () => {
      const request = await harness.engine.createEmergency(requestInput({ estimatedCost: 8000 }));
      const approval = await openApprovalFor(request.id);

      const outcome = await harness.engine.approve(approval.id, { approvedBy: 'admin-1' });

      expect(outcome.approval.approved).toBe(true);
      expect(outcome.request.status).toBe('pending');
      expect((await harness.engine.getRequest(request.id)).status).toBe('pending');
    });
  });

  // ==========================================================================
  // Approvals
  // ==========================================================================

  describe('approvals', () => {
    it('should approve a gated request for the requested amount', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);

      const outcome = await harness.engine.approve(approval.id, { approvedBy: 'supervisor-1' });

      expect(outcome.request.status).toBe('approved');
      expect(outcome.approval.approvedAmount).toBe(2500);
      expect(outcome.approval.decidedBy).toBe('supervisor-1');
      expect(outcome.approval.decidedAt).toEqual(START);
      expect((await harness.engine.getCostRecord(request.id))?.approvedCost).toBe(2500);
    });

    it('should refuse a second decision on the same approval', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);
      await harness.engine.approve(approval.id, { approvedBy: 'supervisor-1' });

      await expect(harness.engine.approve(approval.id, { approvedBy: 'supervisor-2' })).rejects.toBeInstanceOf(
        AlreadyProcessedError
      );
      await expect(
        harness.engine.reject(approval.id, { rejectedBy: 'supervisor-2', reason: 'Too expensive' })
      ).rejects.toThrow(`Approval ${approval.id} was already approved`);
    });

    it('should let exactly one of two concurrent decisions win', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);

      const results = await Promise.allSettled([
        harness.engine.approve(approval.id, { approvedBy: 'supervisor-1' }),
        harness.engine.reject(approval.id, { rejectedBy: 'supervisor-2', reason: 'Too expensive' }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect((await harness.engine.getRequest(request.id)).status).toBe('approved');
    });

    it('should reject a request with the reason as its note', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);

      const outcome = await harness.engine.reject(approval.id, {
        rejectedBy: 'supervisor-1',
        reason: 'Replace the whole unit instead',
      });

      expect(outcome.request.status).toBe('rejected');
      expect(outcome.approval.rejectionReason).toBe('Replace the whole unit instead');
      const history = await harness.engine.getStatusHistory(request.id);
      expect(history[history.length - 1]).toMatchObject({
        fromStatus: 'pending',
        toStatus: 'rejected',
        notes: 'Replace the whole unit instead',
      });
    });

    it('should require a rejection reason', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);

      await expect(
        harness.engine.reject(approval.id, { rejectedBy: 'supervisor-1', reason: '   ' })
      ).rejects.toBeInstanceOf(MaintenanceValidationError);
    });

    it('should block assignment while a gating approval is open', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));

      await expect(
        harness.engine.assign(request.id, { assignedBy: 'manager-1', assigneeId: 'tech-a' })
      ).rejects.toThrow(/awaiting supervisor approval/);
      await expect(
        harness.engine.transition(request.id, 'approved', 'manager-1')
      ).rejects.toBeInstanceOf(MaintenanceValidationError);
    });

    it('should escalate once to a higher level', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);
      harness.clock.set(addHours(START, 10));

      const escalated = await harness.engine.escalate(approval.id, {
        escalatedBy: 'supervisor-1',
        toLevel: 'admin',
        reason: 'Needs capital budget',
      });

      expect(escalated.approvalLevel).toBe('admin');
      expect(escalated.escalated).toBe(true);
      expect(escalated.deadline).toEqual(addHours(START, 58));
      expect((await harness.engine.getRequest(request.id)).approvalLevel).toBe('admin');

      await expect(
        harness.engine.escalate(approval.id, { escalatedBy: 'admin-1', toLevel: 'admin', reason: 'Again' })
      ).rejects.toBeInstanceOf(AlreadyProcessedError);
    });

    it('should not escalate to the same or a lower level', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);

      await expect(
        harness.engine.escalate(approval.id, { escalatedBy: 'supervisor-1', toLevel: 'supervisor', reason: 'No' })
      ).rejects.toBeInstanceOf(MaintenanceValidationError);
    });

    it('should list approvals left open past the overdue window', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      await harness.engine.create(requestInput({ hostelId: 'hostel-2', estimatedCost: 2500 }));
      harness.clock.set(addHours(START, 25));

      const overdue = await harness.engine.findOverdueApprovals();
      expect(overdue).toHaveLength(2);

      const forHostel = await harness.engine.findOverdueApprovals(24, HOSTEL_ID);
      expect(forHostel.map((approval) => approval.requestId)).toEqual([request.id]);

      expect(await harness.engine.findOverdueApprovals(48)).toEqual([]);
    });
  });

  // ==========================================================================
  // Assignment
  // ==========================================================================

  describe('assign', () => {
    const approvedRequest = () => harness.engine.create(requestInput({ estimatedCost: 250 }));

    it('should assign an explicit assignee', async () => {
      const request = await approvedRequest();
      harness.publisher.events = [];

      const { request: assigned, assignment } = await harness.engine.assign(request.id, {
        assignedBy: 'manager-1',
        assigneeId: 'tech-a',
        estimatedHours: 2,
      });

      expect(assigned.status).toBe('assigned');
      expect(assigned.assignedTo).toBe('tech-a');
      expect(assigned.assignedAt).toEqual(START);
      expect(assignment).toMatchObject({ kind: 'staff', assigneeId: 'tech-a', isActive: true, isCompleted: false });
      expect(harness.publisher.types()).toEqual(['request.assigned', 'request.status_changed']);
    });

    it('should balance on active assignments, then outstanding hours', async () => {
      const first = await approvedRequest();
      await harness.engine.assign(first.id, { assignedBy: 'manager-1', assigneeId: 'tech-a', estimatedHours: 4 });

      const second = await approvedRequest();
      const byCount = await harness.engine.assign(second.id, {
        assignedBy: 'manager-1',
        candidates: [{ assigneeId: 'tech-a' }, { assigneeId: 'tech-b' }],
        estimatedHours: 2,
      });
      expect(byCount.assignment.assigneeId).toBe('tech-b');

      const third = await approvedRequest();
      const byHours = await harness.engine.assign(third.id, {
        assignedBy: 'manager-1',
        candidates: [{ assigneeId: 'tech-a' }, { assigneeId: 'tech-b' }],
      });
      expect(byHours.assignment.assigneeId).toBe('tech-b');
    });

    it('should honour required skills and exclusions', async () => {
      const plumbing = await approvedRequest();
      const skilled = await harness.engine.assign(plumbing.id, {
        assignedBy: 'manager-1',
        candidates: [
          { assigneeId: 'tech-a', skills: ['plumbing'] },
          { assigneeId: 'tech-b', skills: [] },
        ],
        requiredSkills: ['plumbing'],
      });
      expect(skilled.assignment.assigneeId).toBe('tech-a');
      expect(skilled.assignment.requiredSkills).toEqual(['plumbing']);

      const other = await approvedRequest();
      const excluded = await harness.engine.assign(other.id, {
        assignedBy: 'manager-1',
        candidates: [{ assigneeId: 'tech-c' }, { assigneeId: 'tech-d' }],
        exclude: ['tech-c'],
      });
      expect(excluded.assignment.assigneeId).toBe('tech-d');
    });

    it('should fail when no candidate qualifies', async () => {
      const request = await approvedRequest();
      await expect(
        harness.engine.assign(request.id, {
          assignedBy: 'manager-1',
          candidates: [{ assigneeId: 'tech-a', skills: ['plumbing'] }],
          requiredSkills: ['hvac'],
        })
      ).rejects.toThrow(`No eligible assignee for request ${request.id}`);
    });

    it('should require an assignee or candidates', async () => {
      const request = await approvedRequest();
      await expect(harness.engine.assign(request.id, { assignedBy: 'manager-1' })).rejects.toBeInstanceOf(
        MaintenanceValidationError
      );
    });

    it('should hand work to a vendor with a work order number', async () => {
      const request = await approvedRequest();

      const { request: assigned, assignment } = await harness.engine.assignVendor(request.id, {
        vendorId: 'vendor-1',
        assignedBy: 'manager-1',
        quotedAmount: 180,
      });

      expect(assigned.status).toBe('assigned');
      expect(assigned.assignedTo).toBeNull();
      expect(assignment).toMatchObject({
        kind: 'vendor',
        assigneeId: 'vendor-1',
        quotedAmount: 180,
        workOrderNumber: 'WO-2026-10-0001',
      });

      await expect(
        harness.engine.assignVendor(request.id, { vendorId: 'vendor-2', assignedBy: 'manager-1', quotedAmount: 150 })
      ).rejects.toBeInstanceOf(MaintenanceValidationError);
    });

    it('should reassign by closing the current assignment and opening a new one', async () => {
      const request = await approvedRequest();
      const { assignment: original } = await harness.engine.assign(request.id, {
        assignedBy: 'manager-1',
        assigneeId: 'tech-a',
        estimatedHours: 3,
      });

      const { request: updated, assignment } = await harness.engine.reassign(request.id, {
        newAssigneeId: 'tech-b',
        reassignedBy: 'manager-1',
        reason: 'Tech A is on leave',
      });

      expect(updated.assignedTo).toBe('tech-b');
      expect(updated.status).toBe('assigned');
      expect(assignment.reassignedFrom).toBe(original.id);
      expect(assignment.estimatedHours).toBe(3);

      const assignments = await harness.engine.getAssignments(request.id);
      expect(assignments.map((entry) => [entry.assigneeId, entry.isActive])).toEqual([
        ['tech-a', false],
        ['tech-b', true],
      ]);

      await expect(
        harness.engine.reassign(request.id, {
          newAssigneeId: 'tech-b',
          reassignedBy: 'manager-1',
          reason: 'Same person again',
        })
      ).rejects.toBeInstanceOf(MaintenanceValidationError);
    });

    it('should record hours when an assignment is completed', async () => {
      const request = await approvedRequest();
      const { assignment } = await harness.engine.assign(request.id, {
        assignedBy: 'manager-1',
        assigneeId: 'tech-a',
      });

      const completed = await harness.engine.completeAssignment(assignment.id, { actualHours: 1.5, qualityRating: 4 });

      expect(completed).toMatchObject({ isCompleted: true, isActive: false, actualHours: 1.5, qualityRating: 4 });
      await expect(
        harness.engine.completeAssignment(assignment.id, { actualHours: 2 })
      ).rejects.toBeInstanceOf(AlreadyProcessedError);
    });
  });

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  describe('transition', () => {
    it('should stamp the first start and keep it across holds', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));
      await harness.engine.assign(request.id, { assignedBy: 'manager-1', assigneeId: 'tech-a' });

      const started = await harness.engine.transition(request.id, 'in_progress', 'tech-a');
      expect(started.startedAt).toEqual(START);

      harness.clock.set(addHours(START, 2));
      await harness.engine.transition(request.id, 'on_hold', 'tech-a', 'Waiting for parts');
      harness.clock.set(addHours(START, 5));
      const resumed = await harness.engine.transition(request.id, 'in_progress', 'tech-a');

      expect(resumed.startedAt).toEqual(START);
      const [assignment] = await harness.engine.getAssignments(request.id);
      expect(assignment.startedAt).toEqual(START);
    });

    it('should require notes for holds and cancellations', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));
      await harness.engine.assign(request.id, { assignedBy: 'manager-1', assigneeId: 'tech-a' });

      await expect(harness.engine.transition(request.id, 'on_hold', 'tech-a')).rejects.toThrow(
        `Moving request ${request.id} to on_hold requires notes`
      );
      await expect(harness.engine.transition(request.id, 'cancelled', 'tech-a', '  ')).rejects.toBeInstanceOf(
        MaintenanceValidationError
      );
    });

    it('should refuse edges outside the lifecycle', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));

      await expect(harness.engine.transition(request.id, 'completed', 'tech-a')).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      expect((await harness.engine.getStatusHistory(request.id))).toHaveLength(2);
    });

    it('should cancel with an audit trail', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));
      const cancelled = await harness.engine.transition(request.id, 'cancelled', 'manager-1', 'Duplicate report');

      expect(cancelled.status).toBe('cancelled');
      expect(harness.store.auditLog.map((entry) => entry.action)).toContain('STATUS_CANCELLED');
    });

    it('should close the gating approval when a pending request is cancelled', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      const approval = await openApprovalFor(request.id);
      harness.publisher.events = [];

      await harness.engine.transition(request.id, 'cancelled', 'manager-1', 'Duplicate report');

      const [closed] = await harness.engine.getApprovals(request.id);
      expect(closed).toMatchObject({
        id: approval.id,
        approved: false,
        rejectionReason: 'Duplicate report',
        allowResubmission: false,
        decidedBy: 'manager-1',
        decidedAt: START,
      });
      expect(harness.store.auditLog.map((entry) => entry.action)).toContain('CLOSE_MAINTENANCE_APPROVAL');
      expect(harness.publisher.types()).toEqual(['request.status_changed', 'approval.decided']);

      harness.clock.set(addHours(START, 100));
      expect(await harness.engine.findOverdueApprovals()).toEqual([]);
      expect(await harness.engine.detectBottlenecks(HOSTEL_ID)).toEqual([]);
      await expect(harness.engine.approve(approval.id, { approvedBy: 'supervisor-1' })).rejects.toBeInstanceOf(
        AlreadyProcessedError
      );
    });

    it('should close the retroactive approval when an emergency is rejected', async () => {
      const request = await harness.engine.createEmergency(requestInput({ estimatedCost: 8000 }));

      await harness.engine.transition(request.id, 'rejected', 'admin-1', 'Not an emergency');

      const approvals = await harness.engine.getApprovals(request.id);
      expect(approvals.map((entry) => [entry.retroactive, entry.approved, entry.rejectionReason])).toEqual([
        [true, false, 'Not an emergency'],
      ]);
    });

    it('should fail for an unknown request', async () => {
      await expect(
        harness.engine.transition('missing-request', 'cancelled', 'manager-1', 'Duplicate report')
      ).rejects.toBeInstanceOf(MaintenanceNotFoundError);
    });
  });

  // ==========================================================================
  // Cost estimates
  // ==========================================================================

  describe('updateCostEstimate', () => {
    it('should only change the estimate of a pending request', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));

      await expect(
        harness.engine.updateCostEstimate(request.id, { estimatedCost: 400, updatedBy: 'manager-1' })
      ).rejects.toThrow(`Estimate of request ${request.id} can only change while pending (status: approved)`);
    });

    it('should raise the open approval when the new cost needs a higher level', async () => {
      const request = await harness.engine.create(requestInput({ estimatedCost: 2500 }));

      const updated = await harness.engine.updateCostEstimate(request.id, {
        estimatedCost: 6000,
        updatedBy: 'manager-1',
      });

      expect(updated.estimatedCost).toBe(6000);
      expect(updated.approvalLevel).toBe('admin');
      const approval = await openApprovalFor(request.id);
      expect(approval.approvalLevel).toBe('admin');
      expect(approval.estimatedCost).toBe(6000);
      expect((await harness.engine.getCostRecord(request.id))?.estimatedCost).toBe(6000);
    });

    it('should open a retroactive approval when an emergency estimate crosses the admin threshold', async () => {
      const request = await harness.engine.createEmergency(requestInput({ estimatedCost: 300 }));
      harness.publisher.events = [];

      await harness.engine.updateCostEstimate(request.id, { estimatedCost: 6000, updatedBy: 'manager-1' });

      const approval = await openApprovalFor(request.id);
      expect(approval.approvalLevel).toBe('admin');
      expect(approval.retroactive).toBe(true);
      expect(harness.publisher.types()).toEqual(['approval.requested']);
    });
  });

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  describe('detectBottlenecks', () => {
    it('should report unassigned urgent work, missed deadlines and stale approvals', async () => {
      await harness.engine.create(requestInput({ priority: 'high', estimatedCost: 250 }));
      await harness.engine.create(requestInput({ priority: 'urgent', estimatedCost: 250 }));
      await harness.engine.create(
        requestInput({ priority: 'low', estimatedCost: 250, deadline: new Date(2026, 9, 14) })
      );
      await harness.engine.create(requestInput({ estimatedCost: 2500 }));
      await harness.engine.create(requestInput({ hostelId: 'hostel-2', priority: 'high', estimatedCost: 2500 }));

      harness.clock.set(addDays(START, 4));

      expect(await harness.engine.detectBottlenecks(HOSTEL_ID)).toEqual([
        {
          type: 'unassigned_high_priority',
          count: 2,
          severity: 'high',
          description: '2 high-priority requests unassigned',
        },
        {
          type: 'overdue_requests',
          count: 1,
          severity: 'critical',
          description: '1 requests past deadline',
        },
        {
          type: 'pending_approvals',
          count: 1,
          severity: 'medium',
          description: '1 requests awaiting approval >3 days',
        },
      ]);
    });

    it('should report nothing for a quiet hostel', async () => {
      await harness.engine.create(requestInput({ estimatedCost: 250 }));
      expect(await harness.engine.detectBottlenecks(HOSTEL_ID)).toEqual([]);
    });
  });

  // ==========================================================================
  // Reads, deletion and publishing
  // ==========================================================================

  it('should hide soft-deleted requests', async () => {
    const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));

    await harness.engine.softDelete(request.id, 'admin-1');

    await expect(harness.engine.getRequest(request.id)).rejects.toBeInstanceOf(MaintenanceNotFoundError);
    const audit = harness.store.auditLog;
    expect(audit[audit.length - 1]).toMatchObject({
      action: 'DELETE_MAINTENANCE_REQUEST',
      entityId: request.id,
      actorId: 'admin-1',
    });
  });

  it('should keep the committed request when publishing fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    harness.publisher.failOn = 'request.created';

    const request = await harness.engine.create(requestInput({ estimatedCost: 250 }));

    expect((await harness.engine.getRequest(request.id)).status).toBe('approved');
    expect(harness.publisher.events).toEqual([]);
    expect(errorSpy).toHaveBeenCalledWith('[Maintenance] Failed to publish request.created:', expect.any(Error));
  });
});
