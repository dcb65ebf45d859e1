import type { Logger } from '@fmops/common';
import { NoCapacityAvailableError, isWorkOrderError, type WorkOrderErrorCode } from '../errors.js';
import type { TechnicianDirectory, WorkOrderStore } from '../ports.js';
import { SCHEDULED_STATUSES } from '../state-machine.js';
import { WORK_ORDER_PRIORITIES, type WorkOrder, type WorkOrderContext } from '../types.js';
import { computeSlot, type Slot } from './slot.js';

export interface AutoScheduleAssignment {
  workOrderId: string;
  workOrderNumber: string;
  technicianId: string;
  scheduledStart: Date | null;
  scheduledEnd: Date | null;
}

export interface AutoScheduleFailure {
  workOrderId: string;
  technicianId: string;
  code: WorkOrderErrorCode;
  message: string;
}

export interface AutoScheduleReport {
  tenantId: string;
  runAt: Date;
  considered: number;
  assigned: AutoScheduleAssignment[];
  failures: AutoScheduleFailure[];
}

export type AssignWithSlot = (
  ctx: WorkOrderContext,
  workOrderId: string,
  technicianId: string,
  slot: Slot | null
) => Promise<WorkOrder>;

export interface AutoSchedulerDeps {
  store: WorkOrderStore;
  directory: TechnicianDirectory;
  logger: Logger;
  timezone: string;
  now: () => Date;
  assign: AssignWithSlot;
}

const priorityRank = (workOrder: WorkOrder): number => WORK_ORDER_PRIORITIES.indexOf(workOrder.priority);

/** Highest priority first, oldest first within a priority. */
export const orderForScheduling = (workOrders: readonly WorkOrder[]): WorkOrder[] =>
  [...workOrders].sort(
    (a, b) => priorityRank(a) - priorityRank(b) || a.createdAt.getTime() - b.createdAt.getTime()
  );

/**
 * Assigns every pending work order of the tenant round-robin over the available technicians
 * and books each unscheduled one into the technician's next working slot. Orders that already
 * carry a scheduled start keep their window. Orders that fail to assign are reported and left
 * pending.
 */
export const runAutoSchedule = async (deps: AutoSchedulerDeps, ctx: WorkOrderContext): Promise<AutoScheduleReport> => {
  const runAt = deps.now();
  const pending = orderForScheduling(await deps.store.list(ctx.tenantId, { statuses: ['pending'] }));
  const report: AutoScheduleReport = { tenantId: ctx.tenantId, runAt, considered: pending.length, assigned: [], failures: [] };

  if (pending.length === 0) {
    return report;
  }

  const technicians = await deps.directory.findAvailableTechnicians(ctx.tenantId);
  if (technicians.length === 0) {
    throw new NoCapacityAvailableError(ctx.tenantId);
  }

  const bookedUntil = new Map<string, Date | null>();
  const latestEndFor = async (technicianId: string): Promise<Date | null> => {
    if (!bookedUntil.has(technicianId)) {
      bookedUntil.set(
        technicianId,
        await deps.store.latestScheduledEnd(ctx.tenantId, technicianId, SCHEDULED_STATUSES)
      );
    }
    return bookedUntil.get(technicianId) ?? null;
  };

  for (const [index, workOrder] of pending.entries()) {
    const technician = technicians[index % technicians.length];
    if (!technician) {
      continue;
    }

    const slot =
      workOrder.scheduledStart === null
        ? computeSlot({
            latestEnd: await latestEndFor(technician.id),
            now: runAt,
            estimatedHours: workOrder.estimatedHours,
            timezone: deps.timezone
          })
        : null;

    try {
      const assigned = await deps.assign(ctx, workOrder.id, technician.id, slot);
      if (slot) {
        bookedUntil.set(technician.id, slot.end);
      }
      report.assigned.push({
        workOrderId: assigned.id,
        workOrderNumber: assigned.workOrderNumber,
        technicianId: technician.id,
        scheduledStart: assigned.scheduledStart,
        scheduledEnd: assigned.scheduledEnd
      });
    } catch (error) {
      if (!isWorkOrderError(error)) {
        throw error;
      }
      deps.logger.warn('auto_schedule_assignment_failed', {
        tenant_id: ctx.tenantId,
        work_order_id: workOrder.id,
        technician_id: technician.id,
        code: error.code
      });
      report.failures.push({
        workOrderId: workOrder.id,
        technicianId: technician.id,
        code: error.code,
        message: error.message
      });
    }
  }

  return report;
};
