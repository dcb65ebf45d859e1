import { recompute, roundHours, roundMoney } from './cost-aggregator.js';
import { InvalidAssignmentError, InvalidStateTransitionError, ValidationFailedError } from './errors.js';
import type { Technician, WorkOrder, WorkOrderMaterial, WorkOrderStatus, WorkOrderTask } from './types.js';

export const WORK_ORDER_ACTIONS = ['assign', 'start', 'hold', 'resume', 'complete', 'verify', 'cancel'] as const;

export type WorkOrderAction = (typeof WORK_ORDER_ACTIONS)[number];

export const WORK_ORDER_TRANSITIONS: Readonly<
  Record<WorkOrderAction, Readonly<Partial<Record<WorkOrderStatus, WorkOrderStatus>>>>
> = {
  assign: { pending: 'assigned', assigned: 'assigned' },
  start: { assigned: 'in_progress' },
  hold: { in_progress: 'on_hold' },
  resume: { on_hold: 'in_progress' },
  complete: { in_progress: 'completed' },
  verify: { completed: 'verified' },
  cancel: {
    pending: 'cancelled',
    assigned: 'cancelled',
    in_progress: 'cancelled',
    on_hold: 'cancelled'
  }
};

const ACTION_TARGET: Readonly<Record<WorkOrderAction, WorkOrderStatus>> = {
  assign: 'assigned',
  start: 'in_progress',
  hold: 'on_hold',
  resume: 'in_progress',
  complete: 'completed',
  verify: 'verified',
  cancel: 'cancelled'
};

export type ProgressBand = 'none' | 'partial' | 'full';

/**
 * Status reached by a manual progress update. `null` rows reject every update.
 */
export const PROGRESS_TRANSITIONS: Readonly<
  Record<WorkOrderStatus, Readonly<Record<ProgressBand, WorkOrderStatus>> | null>
> = {
  pending: { none: 'pending', partial: 'in_progress', full: 'completed' },
  assigned: { none: 'assigned', partial: 'in_progress', full: 'completed' },
  in_progress: { none: 'in_progress', partial: 'in_progress', full: 'completed' },
  on_hold: { none: 'on_hold', partial: 'in_progress', full: 'completed' },
  completed: null,
  verified: null,
  cancelled: null
};

const FINAL_STATUSES: ReadonlySet<WorkOrderStatus> = new Set<WorkOrderStatus>(['completed', 'verified', 'cancelled']);

// Statuses that hold a technician's time.
export const SCHEDULED_STATUSES: readonly WorkOrderStatus[] = ['assigned', 'in_progress', 'on_hold'];

export const isFinalStatus = (status: WorkOrderStatus): boolean => FINAL_STATUSES.has(status);

export const resolveTransition = (from: WorkOrderStatus, action: WorkOrderAction): WorkOrderStatus => {
  const to = WORK_ORDER_TRANSITIONS[action][from];
  if (!to) {
    throw new InvalidStateTransitionError(from, action, ACTION_TARGET[action]);
  }
  return to;
};

export const canTransition = (from: WorkOrderStatus, action: WorkOrderAction): boolean =>
  WORK_ORDER_TRANSITIONS[action][from] !== undefined;

/** Guards mutations that do not move the status (tasks, materials, detail edits). */
export const assertMutable = (workOrder: WorkOrder, action: string): void => {
  if (isFinalStatus(workOrder.status)) {
    throw new InvalidStateTransitionError(workOrder.status, action, null);
  }
};

export const derivePercentage = (tasks: readonly WorkOrderTask[]): number | null => {
  if (tasks.length === 0) {
    return null;
  }
  const completed = tasks.filter((task) => task.status === 'completed').length;
  return Math.floor((completed * 100) / tasks.length);
};

export const progressLabel = (percentage: number): string => {
  if (percentage <= 0) return 'Not Started';
  if (percentage < 25) return 'Just Started';
  if (percentage < 50) return 'In Progress';
  if (percentage < 75) return 'Half Done';
  if (percentage < 100) return 'Almost Complete';
  return 'Completed';
};

const appendNote = (existing: string | null, note: string, now: Date): string => {
  const line = `[${now.toISOString()}] ${note}`;
  return existing ? `${existing}\n${line}` : line;
};

const requireReason = (reason: string, action: string): string => {
  const trimmed = reason.trim();
  if (trimmed.length === 0) {
    throw new ValidationFailedError(`${action} requires a reason`);
  }
  return trimmed;
};

export const assertAssignable = (technician: Technician): void => {
  if (technician.role !== 'technician') {
    throw new InvalidAssignmentError(technician.id, 'not_technician');
  }
  if (!technician.active) {
    throw new InvalidAssignmentError(technician.id, 'inactive');
  }
  if (!technician.available) {
    throw new InvalidAssignmentError(technician.id, 'unavailable');
  }
};

export interface AssignEffect {
  technician: Technician;
  assignedById: string | null;
  now: Date;
}

export const applyAssign = (workOrder: WorkOrder, effect: AssignEffect): WorkOrder => {
  const status = resolveTransition(workOrder.status, 'assign');
  assertAssignable(effect.technician);
  return {
    ...workOrder,
    status,
    assignedToId: effect.technician.id,
    assignedById: effect.assignedById,
    assignedAt: effect.now,
    updatedAt: effect.now
  };
};

export const applyStart = (workOrder: WorkOrder, effect: { technicianId: string | null; now: Date }): WorkOrder => {
  const status = resolveTransition(workOrder.status, 'start');
  return {
    ...workOrder,
    status,
    actualStart: workOrder.actualStart ?? effect.now,
    startedById: effect.technicianId ?? workOrder.assignedToId,
    updatedAt: effect.now
  };
};

export const applyHold = (workOrder: WorkOrder, effect: { reason: string; now: Date }): WorkOrder => {
  const status = resolveTransition(workOrder.status, 'hold');
  const reason = requireReason(effect.reason, 'hold');
  return {
    ...workOrder,
    status,
    holdReason: reason,
    updatedAt: effect.now
  };
};

export const applyResume = (workOrder: WorkOrder, effect: { now: Date }): WorkOrder => {
  const status = resolveTransition(workOrder.status, 'resume');
  return {
    ...workOrder,
    status,
    holdReason: null,
    updatedAt: effect.now
  };
};

export interface CompletionEffect {
  now: Date;
  actualHours?: number;
  completionNotes?: string;
  signatureReference?: string;
  hourlyRate: number | null;
}

const completionEffects = (
  workOrder: WorkOrder,
  materials: readonly WorkOrderMaterial[],
  effect: CompletionEffect
): WorkOrder => {
  const actualStart = workOrder.actualStart ?? effect.now;
  const actualHours =
    effect.actualHours ?? roundHours((effect.now.getTime() - actualStart.getTime()) / 3_600_000);
  const laborCost = effect.hourlyRate === null ? workOrder.laborCost : roundMoney(actualHours * effect.hourlyRate);

  return recompute(
    {
      ...workOrder,
      status: 'completed',
      completionPercentage: 100,
      actualStart,
      actualEnd: effect.now,
      actualHours,
      laborCost,
      holdReason: null,
      completionNotes: effect.completionNotes ?? workOrder.completionNotes,
      signatureReference: effect.signatureReference ?? workOrder.signatureReference,
      updatedAt: effect.now
    },
    materials
  );
};

export const applyComplete = (
  workOrder: WorkOrder,
  materials: readonly WorkOrderMaterial[],
  effect: CompletionEffect
): WorkOrder => {
  resolveTransition(workOrder.status, 'complete');
  return completionEffects(workOrder, materials, effect);
};

export const applyVerify = (workOrder: WorkOrder, effect: { verifiedById: string | null; now: Date }): WorkOrder => {
  const status = resolveTransition(workOrder.status, 'verify');
  return {
    ...workOrder,
    status,
    verifiedAt: effect.now,
    verifiedById: effect.verifiedById,
    updatedAt: effect.now
  };
};

export const applyCancel = (workOrder: WorkOrder, effect: { reason: string; now: Date }): WorkOrder => {
  const status = resolveTransition(workOrder.status, 'cancel');
  const reason = requireReason(effect.reason, 'cancel');
  return {
    ...workOrder,
    status,
    cancellationReason: reason,
    actualEnd: effect.now,
    updatedAt: effect.now
  };
};

export interface ProgressEffect {
  percentage?: number;
  notes?: string;
  actualHours?: number;
  hasTasks: boolean;
  hourlyRate: number | null;
  now: Date;
}

const bandFor = (percentage: number): ProgressBand => {
  if (percentage >= 100) return 'full';
  if (percentage > 0) return 'partial';
  return 'none';
};

/**
 * Manual progress update. A positive percentage starts the work order, 100 completes it;
 * see PROGRESS_TRANSITIONS. Orders with tasks derive their percentage from the tasks only.
 */
export const applyProgress = (
  workOrder: WorkOrder,
  materials: readonly WorkOrderMaterial[],
  effect: ProgressEffect
): WorkOrder => {
  const band = effect.percentage === undefined ? 'none' : bandFor(effect.percentage);
  const rules = PROGRESS_TRANSITIONS[workOrder.status];
  if (!rules) {
    const attempted = band === 'full' ? 'completed' : band === 'partial' ? 'in_progress' : workOrder.status;
    throw new InvalidStateTransitionError(workOrder.status, 'update progress', attempted);
  }

  if (effect.percentage !== undefined) {
    if (!Number.isInteger(effect.percentage) || effect.percentage < 0 || effect.percentage > 100) {
      throw new ValidationFailedError('completion percentage must be an integer between 0 and 100');
    }
    if (effect.hasTasks) {
      throw new ValidationFailedError('completion percentage is derived from tasks for this work order');
    }
  }

  const next: WorkOrder = {
    ...workOrder,
    completionPercentage: effect.percentage ?? workOrder.completionPercentage,
    completionNotes: effect.notes ? appendNote(workOrder.completionNotes, effect.notes, effect.now) : workOrder.completionNotes,
    actualHours: effect.actualHours ?? workOrder.actualHours,
    updatedAt: effect.now
  };

  const status = rules[band];
  if (status === 'completed') {
    return completionEffects(next, materials, {
      now: effect.now,
      actualHours: next.actualHours ?? undefined,
      hourlyRate: effect.hourlyRate
    });
  }
  if (status === 'in_progress' && workOrder.status !== 'in_progress') {
    return {
      ...next,
      status,
      actualStart: workOrder.actualStart ?? effect.now,
      holdReason: null
    };
  }
  return next;
};
