import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Inject } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import type { JsonValue, Logger } from '@fmops/common';
import {
  ConcurrentModificationError,
  InvalidAssignmentError,
  InvalidStateTransitionError,
  NoCapacityAvailableError,
  NotFoundError,
  ValidationFailedError,
  type WorkOrderError,
  type WorkOrderErrorCode
} from '@fmops/work-orders';

const STATUS_BY_CODE: Record<WorkOrderErrorCode, HttpStatus> = {
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INVALID_STATE_TRANSITION: HttpStatus.CONFLICT,
  CONCURRENT_MODIFICATION: HttpStatus.CONFLICT,
  INVALID_ASSIGNMENT: HttpStatus.UNPROCESSABLE_ENTITY,
  NO_CAPACITY_AVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  VALIDATION_FAILED: HttpStatus.BAD_REQUEST
};

export interface WorkOrderErrorBody {
  statusCode: number;
  error: WorkOrderErrorCode;
  message: string;
  details?: Record<string, JsonValue>;
}

const detailsOf = (error: WorkOrderError): Record<string, JsonValue> | undefined => {
  if (error instanceof InvalidStateTransitionError) {
    return { from: error.from, action: error.action, to: error.to };
  }
  if (error instanceof InvalidAssignmentError) {
    return { technician_id: error.technicianId, reason: error.reason };
  }
  if (error instanceof NotFoundError) {
    return { resource: error.resource, id: error.id };
  }
  return undefined;
};

export const toErrorBody = (error: WorkOrderError): WorkOrderErrorBody => {
  const details = detailsOf(error);
  return {
    statusCode: STATUS_BY_CODE[error.code],
    error: error.code,
    message: error.message,
    ...(details ? { details } : {})
  };
};

@Catch(
  NotFoundError,
  InvalidStateTransitionError,
  InvalidAssignmentError,
  ConcurrentModificationError,
  NoCapacityAvailableError,
  ValidationFailedError
)
export class WorkOrderErrorFilter implements ExceptionFilter<WorkOrderError> {
  constructor(@Inject('APP_LOGGER') private readonly logger: Logger) {}

  catch(error: WorkOrderError, host: ArgumentsHost): void {
    const body = toErrorBody(error);
    this.logger.warn('work_order_request_rejected', { code: body.error, message: body.message });
    void host.switchToHttp().getResponse<FastifyReply>().status(body.statusCode).send(body);
  }
}
