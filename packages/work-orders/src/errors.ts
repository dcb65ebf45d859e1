import type { WorkOrderStatus } from './types.js';

export type WorkOrderErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE_TRANSITION'
  | 'INVALID_ASSIGNMENT'
  | 'CONCURRENT_MODIFICATION'
  | 'NO_CAPACITY_AVAILABLE'
  | 'VALIDATION_FAILED';

export abstract class WorkOrderError extends Error {
  abstract readonly code: WorkOrderErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type NotFoundResource = 'work_order' | 'task' | 'technician' | 'report';

export class NotFoundError extends WorkOrderError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly resource: NotFoundResource,
    readonly id: string
  ) {
    super(`${resource} ${id} not found`);
  }
}

/**
 * `to` is the status the action would have produced, or null for actions that do not move
 * the status (task and material mutations, detail edits).
 */
export class InvalidStateTransitionError extends WorkOrderError {
  readonly code = 'INVALID_STATE_TRANSITION';

  constructor(
    readonly from: WorkOrderStatus,
    readonly action: string,
    readonly to: WorkOrderStatus | null
  ) {
    super(
      to
        ? `cannot ${action} work order: ${from} -> ${to} is not allowed`
        : `cannot ${action} work order in status ${from}`
    );
  }
}

export class InvalidAssignmentError extends WorkOrderError {
  readonly code = 'INVALID_ASSIGNMENT';

  constructor(
    readonly technicianId: string,
    readonly reason: 'not_technician' | 'inactive' | 'unavailable'
  ) {
    super(`user ${technicianId} cannot be assigned: ${reason}`);
  }
}

export class ConcurrentModificationError extends WorkOrderError {
  readonly code = 'CONCURRENT_MODIFICATION';

  constructor(
    readonly workOrderId: string,
    readonly expectedVersion: number
  ) {
    super(`work_order ${workOrderId} was modified concurrently (expected version ${expectedVersion})`);
  }
}

export class NoCapacityAvailableError extends WorkOrderError {
  readonly code = 'NO_CAPACITY_AVAILABLE';

  constructor(readonly tenantId: string) {
    super(`no available technicians for tenant ${tenantId}`);
  }
}

export class ValidationFailedError extends WorkOrderError {
  readonly code = 'VALIDATION_FAILED';
}

/** Raised by stores when a generated number is already taken; the engine retries with a new one. */
export class DuplicateWorkOrderNumberError extends Error {
  constructor(readonly workOrderNumber: string) {
    super(`work order number ${workOrderNumber} already exists`);
    this.name = 'DuplicateWorkOrderNumberError';
  }
}

export const isWorkOrderError = (error: unknown): error is WorkOrderError => error instanceof WorkOrderError;
