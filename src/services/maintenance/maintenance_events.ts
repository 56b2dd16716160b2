/**
 * Domain events emitted after a maintenance transaction commits.
 * Consumers (notifications, dashboards) subscribe through the broker.
 */

import type {
  ApprovalLevel,
  AssignmentKind,
  MaintenanceCategory,
  MaintenanceStatus,
} from './maintenance_types.js';

interface EventBase {
  occurredAt: string;
  hostelId: string;
}

export interface RequestCreatedEvent extends EventBase {
  type: 'request.created';
  requestId: string;
  requestNumber: string;
  status: MaintenanceStatus;
  approvalLevel: ApprovalLevel;
}

export interface RequestStatusChangedEvent extends EventBase {
  type: 'request.status_changed';
  requestId: string;
  from: MaintenanceStatus;
  to: MaintenanceStatus;
  changedBy: string;
}

export interface RequestAssignedEvent extends EventBase {
  type: 'request.assigned';
  requestId: string;
  assignmentId: string;
  assigneeId: string;
  kind: AssignmentKind;
}

export interface ApprovalRequestedEvent extends EventBase {
  type: 'approval.requested';
  approvalId: string;
  requestId: string;
  level: ApprovalLevel;
  retroactive: boolean;
}

export interface ApprovalDecidedEvent extends EventBase {
  type: 'approval.decided';
  approvalId: string;
  requestId: string;
  approved: boolean;
  decidedBy: string;
}

export interface ApprovalEscalatedEvent extends EventBase {
  type: 'approval.escalated';
  approvalId: string;
  requestId: string;
  level: ApprovalLevel;
}

export interface BudgetExceededEvent extends EventBase {
  type: 'cost.budget_exceeded';
  requestId: string;
  approvedCost: number;
  actualCost: number;
  variance: number;
}

export interface CategoryBudgetExceededEvent extends EventBase {
  type: 'cost.category_budget_exceeded';
  requestId: string;
  category: MaintenanceCategory;
  fiscalYear: number;
  allocatedAmount: number;
  utilizedAmount: number;
}

export interface CompletionRecordedEvent extends EventBase {
  type: 'completion.recorded';
  requestId: string;
  completionId: string;
}

export interface CertificateIssuedEvent extends EventBase {
  type: 'certificate.issued';
  requestId: string;
  certificateId: string;
  certificateNumber: string;
}

export interface ScheduleExecutionDueEvent extends EventBase {
  type: 'schedule.execution_due';
  scheduleId: string;
  requestId: string;
  dueDate: string;
}

export type MaintenanceEvent =
  | RequestCreatedEvent
  | RequestStatusChangedEvent
  | RequestAssignedEvent
  | ApprovalRequestedEvent
  | ApprovalDecidedEvent
  | ApprovalEscalatedEvent
  | BudgetExceededEvent
  | CategoryBudgetExceededEvent
  | CompletionRecordedEvent
  | CertificateIssuedEvent
  | ScheduleExecutionDueEvent;

export type MaintenanceEventType = MaintenanceEvent['type'];

export interface MaintenanceEventPublisher {
  publish(event: MaintenanceEvent): Promise<void>;
}

/**
 * Publish committed events in order. Failures are logged; the state change
 * they describe is already durable.
 */
export async function publishAll(
  publisher: MaintenanceEventPublisher,
  events: readonly MaintenanceEvent[]
): Promise<void> {
  for (const event of events) {
    try {
      await publisher.publish(event);
    } catch (error) {
      console.error(`[Maintenance] Failed to publish ${event.type}:`, error);
    }
  }
}
