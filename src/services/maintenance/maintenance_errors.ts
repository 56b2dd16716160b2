/**
 * Maintenance Error Classes
 *
 * Typed errors raised by the workflow engine and its components.
 */

import type { ZodIssue } from 'zod';
import type { MaintenanceStatus } from './maintenance_types.js';

export type MaintenanceErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'ALREADY_PROCESSED'
  | 'VALIDATION_FAILED'
  | 'COST_MISMATCH'
  | 'INCONSISTENT_QUALITY_RESULT';

/**
 * Base error class for maintenance workflow errors
 */
export class MaintenanceError extends Error {
  constructor(
    public code: MaintenanceErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'MaintenanceError';
  }
}

/**
 * Aggregate missing or soft-deleted
 */
export class MaintenanceNotFoundError extends MaintenanceError {
  constructor(
    public entity: string,
    public entityId: string
  ) {
    super('NOT_FOUND', `${entity} not found: ${entityId}`);
    this.name = 'MaintenanceNotFoundError';
  }
}

export class InvalidTransitionError extends MaintenanceError {
  constructor(
    public requestId: string,
    public from: MaintenanceStatus,
    public to: MaintenanceStatus
  ) {
    super('INVALID_TRANSITION', `Request ${requestId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Decision already recorded, or a completion already certified
 */
export class AlreadyProcessedError extends MaintenanceError {
  constructor(
    public entity: string,
    public entityId: string,
    detail: string
  ) {
    super('ALREADY_PROCESSED', `${entity} ${entityId} ${detail}`);
    this.name = 'AlreadyProcessedError';
  }
}

/**
 * Caller input rejected. Subclasses narrow the rule that failed and carry
 * their own code.
 */
export class MaintenanceValidationError extends MaintenanceError {
  constructor(
    message: string,
    public issues: ZodIssue[] = [],
    code: MaintenanceErrorCode = 'VALIDATION_FAILED'
  ) {
    super(code, message);
    this.name = 'MaintenanceValidationError';
  }
}

/**
 * Cost components disagree with a stated total
 */
export class CostMismatchError extends MaintenanceValidationError {
  constructor(
    public entityId: string,
    public expected: number,
    public actual: number,
    rule: string
  ) {
    super(
      `${rule} for ${entityId}: expected ${expected.toFixed(2)}, got ${actual.toFixed(2)}`,
      [],
      'COST_MISMATCH'
    );
    this.name = 'CostMismatchError';
  }
}

export class InconsistentQualityResultError extends MaintenanceValidationError {
  constructor(
    public completionId: string,
    message: string
  ) {
    super(`Quality check for completion ${completionId}: ${message}`, [], 'INCONSISTENT_QUALITY_RESULT');
    this.name = 'InconsistentQualityResultError';
  }
}
