import { randomUUID } from 'node:crypto';
import type { Logger } from '@fmops/common';
import { recompute } from './cost-aggregator.js';
import { DuplicateWorkOrderNumberError, InvalidStateTransitionError, NotFoundError, ValidationFailedError } from './errors.js';
import { addMaterial as addMaterialEntry } from './material-ledger.js';
import { MAX_NUMBER_ATTEMPTS, generateWorkOrderNumber, type SuffixSource } from './numbering.js';
import type {
  Page,
  PageRequest,
  ReportLookup,
  TechnicianDirectory,
  WorkOrderChange,
  WorkOrderFilter,
  WorkOrderStore
} from './ports.js';
import { runAutoSchedule as runScheduler, type AutoScheduleReport } from './scheduling/auto-scheduler.js';
import { reportWindow, type Slot } from './scheduling/slot.js';
import {
  applyAssign,
  applyCancel,
  applyComplete,
  applyHold,
  applyProgress,
  applyResume,
  applyStart,
  applyVerify,
  assertMutable
} from './state-machine.js';
import {
  computeStatistics,
  computeTechnicianPerformance,
  type TechnicianPerformance,
  type WorkOrderStatistics
} from './statistics.js';
import { addTask as addTaskEntry, setTaskCompletion } from './task-ledger.js';
import {
  WORK_ORDER_STATUSES,
  type ReportPriority,
  type Technician,
  type WorkOrder,
  type WorkOrderAggregate,
  type WorkOrderContext,
  type WorkOrderMaterial,
  type WorkOrderPriority,
  type WorkOrderTask
} from './types.js';

export interface WorkOrderEngineDeps {
  store: WorkOrderStore;
  directory: TechnicianDirectory;
  reports: ReportLookup;
  logger: Logger;
  timezone?: string;
  numberPrefix?: string;
  now?: () => Date;
  newId?: () => string;
  nextSuffix?: SuffixSource;
}

export interface CreateWorkOrderInput {
  title: string;
  description?: string | null;
  category?: string | null;
  locationDetails?: string | null;
  priority?: WorkOrderPriority;
  schoolId?: string | null;
  reportId?: string | null;
  scheduledStart?: Date | null;
  scheduledEnd?: Date | null;
  estimatedHours?: number | null;
  assignedToId?: string | null;
}

export interface CreateFromReportInput {
  assignedToId?: string | null;
  estimatedHours?: number | null;
  category?: string | null;
}

export type UpdateWorkOrderInput = Partial<
  Pick<
    CreateWorkOrderInput,
    | 'title'
    | 'description'
    | 'category'
    | 'locationDetails'
    | 'priority'
    | 'scheduledStart'
    | 'scheduledEnd'
    | 'estimatedHours'
  >
>;

export interface ProgressInput {
  percentage?: number;
  notes?: string;
  actualHours?: number;
}

export interface CompleteInput {
  actualHours?: number;
  completionNotes?: string;
  signatureReference?: string;
}

export interface MaterialEntryInput {
  itemReference: string;
  quantity: number;
  unitCost: number;
}

const REPORT_PRIORITY: Readonly<Record<ReportPriority, WorkOrderPriority>> = {
  critical: 'emergency',
  urgent: 'high',
  high: 'high',
  medium: 'medium',
  low: 'low'
};

const OPEN_STATUSES = WORK_ORDER_STATUSES.filter(
  (status) => status !== 'completed' && status !== 'verified' && status !== 'cancelled'
);

const assertSchedule = (start: Date | null, end: Date | null): void => {
  if (start && end && end.getTime() < start.getTime()) {
    throw new ValidationFailedError('scheduled end must not be before scheduled start');
  }
};

const assertHours = (hours: number | null | undefined, field: string): void => {
  if (hours !== null && hours !== undefined && (!Number.isFinite(hours) || hours < 0)) {
    throw new ValidationFailedError(`${field} must be zero or positive`);
  }
};

const requireTitle = (title: string): string => {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationFailedError('title is required');
  }
  return trimmed;
};

/**
 * Work order lifecycle operations for one deployment. Every call is scoped to `ctx.tenantId`;
 * mutations load the aggregate, apply a pure transition and save it against the loaded version.
 */
export class WorkOrderEngine {
  private readonly store: WorkOrderStore;
  private readonly directory: TechnicianDirectory;
  private readonly reports: ReportLookup;
  private readonly logger: Logger;
  private readonly timezone: string;
  private readonly numberPrefix: string;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly nextSuffix: SuffixSource | undefined;

  constructor(deps: WorkOrderEngineDeps) {
    this.store = deps.store;
    this.directory = deps.directory;
    this.reports = deps.reports;
    this.logger = deps.logger;
    this.timezone = deps.timezone ?? 'UTC';
    this.numberPrefix = deps.numberPrefix ?? 'WO';
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
    this.nextSuffix = deps.nextSuffix;
  }

  async create(ctx: WorkOrderContext, input: CreateWorkOrderInput): Promise<WorkOrderAggregate> {
    const title = requireTitle(input.title);
    const scheduledStart = input.scheduledStart ?? null;
    const scheduledEnd = input.scheduledEnd ?? null;
    assertSchedule(scheduledStart, scheduledEnd);
    assertHours(input.estimatedHours, 'estimated hours');

    const now = this.now();
    const assignee = input.assignedToId ? await this.requireTechnician(ctx, input.assignedToId) : null;

    for (let attempt = 1; attempt <= MAX_NUMBER_ATTEMPTS; attempt += 1) {
      const workOrderNumber = generateWorkOrderNumber(this.numberPrefix, now, this.timezone, this.nextSuffix);
      if (await this.store.numberExists(ctx.tenantId, workOrderNumber)) {
        continue;
      }

      const draft: WorkOrder = {
        id: this.newId(),
        tenantId: ctx.tenantId,
        workOrderNumber,
        title,
        description: input.description ?? null,
        category: input.category ?? null,
        locationDetails: input.locationDetails ?? null,
        priority: input.priority ?? 'medium',
        status: 'pending',
        completionPercentage: 0,
        reportId: input.reportId ?? null,
        schoolId: input.schoolId ?? null,
        assignedToId: null,
        assignedById: null,
        assignedAt: null,
        startedById: null,
        scheduledStart,
        scheduledEnd,
        actualStart: null,
        actualEnd: null,
        estimatedHours: input.estimatedHours ?? null,
        actualHours: null,
        laborCost: 0,
        materialCost: 0,
        totalCost: 0,
        holdReason: null,
        cancellationReason: null,
        completionNotes: null,
        signatureReference: null,
        verifiedAt: null,
        verifiedById: null,
        createdById: ctx.actorUserId,
        createdAt: now,
        updatedAt: now,
        deletedAt: null,
        version: 1
      };
      const workOrder = assignee
        ? applyAssign(draft, { technician: assignee, assignedById: ctx.actorUserId, now })
        : draft;
      const aggregate: WorkOrderAggregate = { workOrder, tasks: [], materials: [] };

      try {
        await this.store.insert(aggregate);
      } catch (error) {
        if (error instanceof DuplicateWorkOrderNumberError) {
          this.logger.debug('work_order_number_collision', { tenant_id: ctx.tenantId, work_order_number: workOrderNumber });
          continue;
        }
        throw error;
      }

      this.logger.info('work_order_created', {
        tenant_id: ctx.tenantId,
        work_order_id: workOrder.id,
        work_order_number: workOrderNumber,
        status: workOrder.status
      });
      return aggregate;
    }

    throw new Error(`could not allocate a unique work order number after ${MAX_NUMBER_ATTEMPTS} attempts`);
  }

  async createFromReport(
    ctx: WorkOrderContext,
    reportId: string,
    input: CreateFromReportInput = {}
  ): Promise<WorkOrderAggregate> {
    const report = await this.reports.getReport(ctx.tenantId, reportId);
    if (!report) {
      throw new NotFoundError('report', reportId);
    }
    const window = report.scheduledDate ? reportWindow(report.scheduledDate, this.timezone) : null;

    return this.create(ctx, {
      title: report.title,
      description: report.description,
      category: input.category ?? null,
      priority: report.priority ? REPORT_PRIORITY[report.priority] : 'medium',
      schoolId: report.schoolId,
      reportId: report.id,
      scheduledStart: window?.start ?? null,
      scheduledEnd: window?.end ?? null,
      estimatedHours: input.estimatedHours ?? null,
      assignedToId: input.assignedToId ?? null
    });
  }

  async update(ctx: WorkOrderContext, workOrderId: string, input: UpdateWorkOrderInput): Promise<WorkOrderAggregate> {
    return this.mutate(ctx, workOrderId, 'work_order_updated', (aggregate) => {
      const current = aggregate.workOrder;
      assertMutable(current, 'update');
      assertHours(input.estimatedHours, 'estimated hours');

      const next: WorkOrder = {
        ...current,
        title: input.title === undefined ? current.title : requireTitle(input.title),
        description: input.description === undefined ? current.description : input.description,
        category: input.category === undefined ? current.category : input.category,
        locationDetails: input.locationDetails === undefined ? current.locationDetails : input.locationDetails,
        priority: input.priority ?? current.priority,
        scheduledStart: input.scheduledStart === undefined ? current.scheduledStart : input.scheduledStart,
        scheduledEnd: input.scheduledEnd === undefined ? current.scheduledEnd : input.scheduledEnd,
        estimatedHours: input.estimatedHours === undefined ? current.estimatedHours : input.estimatedHours,
        updatedAt: this.now()
      };
      assertSchedule(next.scheduledStart, next.scheduledEnd);
      return { workOrder: next };
    });
  }

  async softDelete(ctx: WorkOrderContext, workOrderId: string): Promise<WorkOrder> {
    const deleted = await this.mutate(ctx, workOrderId, 'work_order_deleted', (aggregate) => {
      const now = this.now();
      return { workOrder: { ...aggregate.workOrder, deletedAt: now, updatedAt: now } };
    });
    return deleted.workOrder;
  }

  async assign(ctx: WorkOrderContext, workOrderId: string, technicianId: string): Promise<WorkOrderAggregate> {
    return this.mutate(ctx, workOrderId, 'work_order_assigned', async (aggregate) => {
      const technician = await this.requireTechnician(ctx, technicianId);
      return {
        workOrder: applyAssign(aggregate.workOrder, {
          technician,
          assignedById: ctx.actorUserId,
          now: this.now()
        })
      };
    });
  }

  async startWork(ctx: WorkOrderContext, workOrderId: string, technicianId?: string): Promise<WorkOrderAggregate> {
    return this.mutate(ctx, workOrderId, 'work_order_started', (aggregate) => ({
      workOrder: applyStart(aggregate.workOrder, {
        technicianId: technicianId ?? ctx.actorUserId,
        now: this.now()
      })
    }));
  }

  async updateProgress(ctx: WorkOrderContext, workOrderId: string, input: ProgressInput): Promise<WorkOrderAggregate> {
    assertHours(input.actualHours, 'actual hours');
    return this.mutate(ctx, workOrderId, 'work_order_progress_updated', async (aggregate) => ({
      workOrder: applyProgress(aggregate.workOrder, aggregate.materials, {
        percentage: input.percentage,
        notes: input.notes,
        actualHours: input.actualHours,
        hasTasks: aggregate.tasks.length > 0,
        hourlyRate: await this.hourlyRateOf(ctx, aggregate.workOrder),
        now: this.now()
      })
    }));
  }

  async hold(ctx: WorkOrderContext, workOrderId: string, reason: string): Promise<WorkOrderAggregate> {
    return this.mutate(ctx, workOrderId, 'work_order_held', (aggregate) => ({
      workOrder: applyHold(aggregate.workOrder, { reason, now: this.now() })
    }));
  }

  async resume(ctx: WorkOrderContext, workOrderId: string): Promise<WorkOrderAggregate> {
    return this.mutate(ctx, workOrderId, 'work_order_resumed', (aggregate) => ({
      workOrder: applyResume(aggregate.workOrder, { now: this.now() })
    }));
  }

  async complete(ctx: WorkOrderContext, workOrderId: string, input: CompleteInput = {}): Promise<WorkOrderAggregate> {
    assertHours(input.actualHours, 'actual hours');
    return this.mutate(ctx, workOrderId, 'work_order_completed', async (aggregate) => ({
      workOrder: applyComplete(aggregate.workOrder, aggregate.materials, {
        ...input,
        hourlyRate: await this.hourlyRateOf(ctx, aggregate.workOrder),
        now: this.now()
      })
    }));
  }

  async verify(ctx: WorkOrderContext, workOrderId: string): Promise<WorkOrderAggregate> {
    return this.mutate(ctx, workOrderId, 'work_order_verified', (aggregate) => ({
      workOrder: applyVerify(aggregate.workOrder, { verifiedById: ctx.actorUserId, now: this.now() })
    }));
  }

  async cancel(ctx: WorkOrderContext, workOrderId: string, reason: string): Promise<WorkOrderAggregate> {
    return this.mutate(ctx, workOrderId, 'work_order_cancelled', (aggregate) => ({
      workOrder: applyCancel(aggregate.workOrder, { reason, now: this.now() })
    }));
  }

  async addTask(
    ctx: WorkOrderContext,
    workOrderId: string,
    description: string
  ): Promise<{ workOrder: WorkOrder; task: WorkOrderTask }> {
    const taskId = this.newId();
    const result = await this.mutate(ctx, workOrderId, 'work_order_task_added', (aggregate) => {
      const { aggregate: next, task } = addTaskEntry(aggregate, { id: taskId, description, now: this.now() });
      return { workOrder: next.workOrder, upsertTasks: [task] };
    });
    return { workOrder: result.workOrder, task: entryById(result.tasks, taskId) };
  }

  async updateTaskStatus(
    ctx: WorkOrderContext,
    taskId: string,
    completed: boolean
  ): Promise<{ workOrder: WorkOrder; task: WorkOrderTask }> {
    const workOrderId = await this.store.findTaskOwner(ctx.tenantId, taskId);
    if (!workOrderId) {
      throw new NotFoundError('task', taskId);
    }

    const result = await this.mutate(ctx, workOrderId, 'work_order_task_updated', (aggregate) => {
      const { aggregate: next, task } = setTaskCompletion(aggregate, { taskId, completed, now: this.now() });
      return { workOrder: next.workOrder, upsertTasks: [task] };
    });
    return { workOrder: result.workOrder, task: entryById(result.tasks, taskId) };
  }

  async addMaterial(
    ctx: WorkOrderContext,
    workOrderId: string,
    input: MaterialEntryInput
  ): Promise<{ workOrder: WorkOrder; material: WorkOrderMaterial }> {
    const materialId = this.newId();
    const result = await this.mutate(ctx, workOrderId, 'work_order_material_added', (aggregate) => {
      const { aggregate: next, material } = addMaterialEntry(aggregate, { ...input, id: materialId, now: this.now() });
      return { workOrder: next.workOrder, insertMaterials: [material] };
    });
    return { workOrder: result.workOrder, material: entryById(result.materials, materialId) };
  }

  async runAutoSchedule(ctx: WorkOrderContext): Promise<AutoScheduleReport> {
    const report = await runScheduler(
      {
        store: this.store,
        directory: this.directory,
        logger: this.logger,
        timezone: this.timezone,
        now: this.now,
        assign: (scope, workOrderId, technicianId, slot) => this.assignSlot(scope, workOrderId, technicianId, slot)
      },
      ctx
    );

    this.logger.info('auto_schedule_completed', {
      tenant_id: ctx.tenantId,
      considered: report.considered,
      assigned: report.assigned.length,
      failed: report.failures.length
    });
    return report;
  }

  async getById(ctx: WorkOrderContext, workOrderId: string): Promise<WorkOrderAggregate> {
    return this.load(ctx, workOrderId);
  }

  async list(ctx: WorkOrderContext, filter: WorkOrderFilter, request: PageRequest): Promise<Page<WorkOrder>> {
    if (!Number.isInteger(request.page) || request.page < 1 || !Number.isInteger(request.pageSize) || request.pageSize < 1) {
      throw new ValidationFailedError('page and page size must be positive integers');
    }
    return this.store.page(ctx.tenantId, filter, request);
  }

  async listByAssignee(ctx: WorkOrderContext, technicianId: string): Promise<WorkOrder[]> {
    return this.store.list(ctx.tenantId, { assignedToId: technicianId });
  }

  async listBySchool(ctx: WorkOrderContext, schoolId: string): Promise<WorkOrder[]> {
    return this.store.list(ctx.tenantId, { schoolId });
  }

  async listOverdue(ctx: WorkOrderContext): Promise<WorkOrder[]> {
    return this.store.list(ctx.tenantId, { statuses: OPEN_STATUSES, scheduledEndBefore: this.now() });
  }

  async listHighPriorityPending(ctx: WorkOrderContext): Promise<WorkOrder[]> {
    return this.store.list(ctx.tenantId, { statuses: OPEN_STATUSES, priorities: ['emergency', 'high'] });
  }

  async search(ctx: WorkOrderContext, term: string): Promise<WorkOrder[]> {
    const trimmed = term.trim();
    if (trimmed.length === 0) {
      throw new ValidationFailedError('search term is required');
    }
    return this.store.list(ctx.tenantId, { search: trimmed });
  }

  async getStatistics(ctx: WorkOrderContext): Promise<WorkOrderStatistics> {
    return computeStatistics(await this.store.list(ctx.tenantId, {}), this.now(), this.timezone);
  }

  async getTechnicianPerformance(
    ctx: WorkOrderContext,
    technicianId: string,
    from: Date,
    to: Date
  ): Promise<TechnicianPerformance> {
    if (to.getTime() < from.getTime()) {
      throw new ValidationFailedError('performance window end must not be before its start');
    }
    await this.requireTechnician(ctx, technicianId);
    const workOrders = await this.store.list(ctx.tenantId, {
      assignedToId: technicianId,
      createdFrom: from,
      createdTo: to
    });
    return computeTechnicianPerformance(technicianId, workOrders, from, to);
  }

  private async assignSlot(
    ctx: WorkOrderContext,
    workOrderId: string,
    technicianId: string,
    slot: Slot | null
  ): Promise<WorkOrder> {
    const result = await this.mutate(ctx, workOrderId, 'work_order_auto_assigned', async (aggregate) => {
      if (aggregate.workOrder.status !== 'pending') {
        throw new InvalidStateTransitionError(aggregate.workOrder.status, 'auto-assign', 'assigned');
      }
      const technician = await this.requireTechnician(ctx, technicianId);
      const assigned = applyAssign(aggregate.workOrder, {
        technician,
        assignedById: ctx.actorUserId,
        now: this.now()
      });
      if (!slot || assigned.scheduledStart !== null) {
        return { workOrder: assigned };
      }
      return { workOrder: { ...assigned, scheduledStart: slot.start, scheduledEnd: slot.end } };
    });
    return result.workOrder;
  }

  private async load(ctx: WorkOrderContext, workOrderId: string): Promise<WorkOrderAggregate> {
    const aggregate = await this.store.load(ctx.tenantId, workOrderId);
    if (!aggregate) {
      throw new NotFoundError('work_order', workOrderId);
    }
    return aggregate;
  }

  private async mutate(
    ctx: WorkOrderContext,
    workOrderId: string,
    event: string,
    apply: (aggregate: WorkOrderAggregate) => WorkOrderChange | Promise<WorkOrderChange>
  ): Promise<WorkOrderAggregate> {
    const aggregate = await this.load(ctx, workOrderId);
    const change = await apply(aggregate);
    const tasks = mergeTasks(aggregate.tasks, change.upsertTasks ?? []);
    const materials = [...aggregate.materials, ...(change.insertMaterials ?? [])];
    const saved = await this.store.save(
      { ...change, workOrder: recompute(change.workOrder, materials) },
      aggregate.workOrder.version
    );

    this.logger.info(event, {
      tenant_id: ctx.tenantId,
      work_order_id: saved.id,
      status: saved.status,
      version: saved.version,
      ...(ctx.requestId ? { request_id: ctx.requestId } : {})
    });
    return { workOrder: saved, tasks, materials };
  }

  private async requireTechnician(ctx: WorkOrderContext, technicianId: string): Promise<Technician> {
    const technician = await this.directory.getTechnician(ctx.tenantId, technicianId);
    if (!technician) {
      throw new NotFoundError('technician', technicianId);
    }
    return technician;
  }

  private async hourlyRateOf(ctx: WorkOrderContext, workOrder: WorkOrder): Promise<number | null> {
    if (!workOrder.assignedToId) {
      return null;
    }
    const technician = await this.directory.getTechnician(ctx.tenantId, workOrder.assignedToId);
    return technician?.hourlyRate ?? null;
  }
}

const mergeTasks = (tasks: readonly WorkOrderTask[], upserts: readonly WorkOrderTask[]): WorkOrderTask[] => {
  const byId = new Map(tasks.map((task) => [task.id, task]));
  for (const task of upserts) {
    byId.set(task.id, task);
  }
  return [...byId.values()];
};

const entryById = <T extends { id: string }>(entries: readonly T[], id: string): T => {
  const entry = entries.find((candidate) => candidate.id === id);
  if (!entry) {
    throw new Error(`ledger entry ${id} missing after save`);
  }
  return entry;
};
