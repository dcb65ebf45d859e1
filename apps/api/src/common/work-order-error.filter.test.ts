import { describe, expect, it } from 'vitest';
import {
  ConcurrentModificationError,
  InvalidAssignmentError,
  InvalidStateTransitionError,
  NoCapacityAvailableError,
  NotFoundError,
  ValidationFailedError
} from '@fmops/work-orders';
import { toErrorBody } from './work-order-error.filter.js';

describe('toErrorBody', () => {
  it('maps a rejected transition to 409 with its endpoints', () => {
    expect(toErrorBody(new InvalidStateTransitionError('completed', 'cancel', 'cancelled'))).toEqual({
      statusCode: 409,
      error: 'INVALID_STATE_TRANSITION',
      message: 'cannot cancel work order: completed -> cancelled is not allowed',
      details: { from: 'completed', action: 'cancel', to: 'cancelled' }
    });
  });

  it('maps a missing work order to 404', () => {
    expect(toErrorBody(new NotFoundError('work_order', 'wo-9'))).toEqual({
      statusCode: 404,
      error: 'NOT_FOUND',
      message: 'work_order wo-9 not found',
      details: { resource: 'work_order', id: 'wo-9' }
    });
  });

  it('maps an ineligible technician to 422', () => {
    expect(toErrorBody(new InvalidAssignmentError('user-7', 'inactive'))).toEqual({
      statusCode: 422,
      error: 'INVALID_ASSIGNMENT',
      message: 'user user-7 cannot be assigned: inactive',
      details: { technician_id: 'user-7', reason: 'inactive' }
    });
  });

  it.each([
    [new ConcurrentModificationError('wo-1', 3), 409],
    [new NoCapacityAvailableError('tenant-1'), 503],
    [new ValidationFailedError('percentage must be an integer between 0 and 100'), 400]
  ])('maps %s without details', (error, statusCode) => {
    const body = toErrorBody(error);
    expect(body.statusCode).toBe(statusCode);
    expect(body.details).toBeUndefined();
  });
});
