import { DateTime } from 'luxon';
import { roundHours, roundMoney } from './cost-aggregator.js';
import { isFinalStatus } from './state-machine.js';
import type { WorkOrder, WorkOrderStatus } from './types.js';

export interface WorkOrderStatistics {
  total: number;
  byStatus: Record<WorkOrderStatus, number>;
  pending: number;
  inProgress: number;
  completed: number;
  verified: number;
  overdue: number;
  averageCompletion: number;
  costThisMonth: number;
  createdLast7Days: number;
}

export interface TechnicianPerformance {
  technicianId: string;
  from: Date;
  to: Date;
  totalAssigned: number;
  completed: number;
  inProgress: number;
  completionRate: number;
  averageCompletionHours: number;
  totalHoursWorked: number;
}

const DONE: ReadonlySet<WorkOrderStatus> = new Set<WorkOrderStatus>(['completed', 'verified']);
const PROGRESSED: ReadonlySet<WorkOrderStatus> = new Set<WorkOrderStatus>(['in_progress', 'completed', 'verified']);

export const isOverdue = (workOrder: WorkOrder, now: Date): boolean =>
  workOrder.scheduledEnd !== null &&
  workOrder.scheduledEnd.getTime() < now.getTime() &&
  !isFinalStatus(workOrder.status);

export const isHighPriorityOpen = (workOrder: WorkOrder): boolean =>
  (workOrder.priority === 'emergency' || workOrder.priority === 'high') && !isFinalStatus(workOrder.status);

const average = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

export const computeStatistics = (
  workOrders: readonly WorkOrder[],
  now: Date,
  timezone: string
): WorkOrderStatistics => {
  const byStatus: Record<WorkOrderStatus, number> = {
    pending: 0,
    assigned: 0,
    in_progress: 0,
    on_hold: 0,
    completed: 0,
    verified: 0,
    cancelled: 0
  };
  for (const workOrder of workOrders) {
    byStatus[workOrder.status] += 1;
  }

  const monthStart = DateTime.fromJSDate(now, { zone: timezone }).startOf('month').toMillis();
  const weekAgo = now.getTime() - 7 * 24 * 3_600_000;

  const costThisMonth = workOrders
    .filter(
      (workOrder) =>
        DONE.has(workOrder.status) &&
        workOrder.actualEnd !== null &&
        workOrder.actualEnd.getTime() >= monthStart &&
        workOrder.actualEnd.getTime() <= now.getTime()
    )
    .reduce((sum, workOrder) => sum + workOrder.totalCost, 0);

  return {
    total: workOrders.length,
    byStatus,
    pending: byStatus.pending,
    inProgress: byStatus.in_progress,
    completed: byStatus.completed,
    verified: byStatus.verified,
    overdue: workOrders.filter((workOrder) => isOverdue(workOrder, now)).length,
    averageCompletion: roundHours(
      average(
        workOrders
          .filter((workOrder) => PROGRESSED.has(workOrder.status))
          .map((workOrder) => workOrder.completionPercentage)
      )
    ),
    costThisMonth: roundMoney(costThisMonth),
    createdLast7Days: workOrders.filter((workOrder) => workOrder.createdAt.getTime() >= weekAgo).length
  };
};

/** `workOrders` are the technician's orders created inside the reporting window. */
export const computeTechnicianPerformance = (
  technicianId: string,
  workOrders: readonly WorkOrder[],
  from: Date,
  to: Date
): TechnicianPerformance => {
  const completed = workOrders.filter((workOrder) => DONE.has(workOrder.status));
  const hours = (list: readonly WorkOrder[]): number[] =>
    list.flatMap((workOrder) => (workOrder.actualHours === null ? [] : [workOrder.actualHours]));

  return {
    technicianId,
    from,
    to,
    totalAssigned: workOrders.length,
    completed: completed.length,
    inProgress: workOrders.filter((workOrder) => workOrder.status === 'in_progress').length,
    completionRate: workOrders.length === 0 ? 0 : roundHours((completed.length * 100) / workOrders.length),
    averageCompletionHours: roundHours(average(hours(completed))),
    totalHoursWorked: roundHours(hours(workOrders).reduce((sum, value) => sum + value, 0))
  };
};
