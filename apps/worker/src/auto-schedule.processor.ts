import type { Logger } from '@fmops/common';
import { NoCapacityAvailableError, type AutoScheduleReport, type WorkOrderEngine } from '@fmops/work-orders';

export const AUTO_SCHEDULE_QUEUE = 'work-order-auto-schedule';

export interface AutoSchedulePayload {
  tenantId: string;
  requestId: string;
}

export interface ProcessAutoScheduleJobParams {
  logger: Logger;
  payload: AutoSchedulePayload;
  engineFor: (tenantId: string) => WorkOrderEngine;
}

/**
 * Runs one scheduling pass for the payload's tenant. A tenant without available technicians
 * is logged and the job completes, so the repeat picks it up on the next tick.
 */
export const processAutoScheduleJob = async ({
  logger,
  payload,
  engineFor
}: ProcessAutoScheduleJobParams): Promise<AutoScheduleReport | null> => {
  const engine = engineFor(payload.tenantId);

  try {
    const report = await engine.runAutoSchedule({
      tenantId: payload.tenantId,
      actorUserId: null,
      requestId: payload.requestId
    });
    logger.info('auto_schedule_job_completed', {
      tenant_id: payload.tenantId,
      request_id: payload.requestId,
      considered: report.considered,
      assigned: report.assigned.length,
      failed: report.failures.length
    });
    return report;
  } catch (error) {
    if (error instanceof NoCapacityAvailableError) {
      logger.warn('auto_schedule_no_capacity', {
        tenant_id: payload.tenantId,
        request_id: payload.requestId
      });
      return null;
    }
    throw error;
  }
};
