import {
  ConcurrentModificationError,
  DuplicateWorkOrderNumberError,
  type Page,
  type PageRequest,
  type WorkOrder,
  type WorkOrderAggregate,
  type WorkOrderChange,
  type WorkOrderFilter,
  type WorkOrderMaterial,
  type WorkOrderStatus,
  type WorkOrderStore,
  type WorkOrderTask
} from '@fmops/work-orders';
import { withTxContext, type RequestDbContext, type SqlClient, type TxPool } from './tx.js';
import {
  nullableNumber,
  nullableText,
  nullableTimestamp,
  number,
  oneOf,
  priority,
  status,
  text,
  timestamp,
  type Row
} from './rows.js';

type ColumnValue = string | number | Date | null;

// Persisted fields of a work order, in column order. `id`, `tenant_id` and `version` are handled apart.
const WORK_ORDER_COLUMNS = {
  work_order_number: (w: WorkOrder): ColumnValue => w.workOrderNumber,
  title: (w: WorkOrder): ColumnValue => w.title,
  description: (w: WorkOrder): ColumnValue => w.description,
  category: (w: WorkOrder): ColumnValue => w.category,
  location_details: (w: WorkOrder): ColumnValue => w.locationDetails,
  priority: (w: WorkOrder): ColumnValue => w.priority,
  status: (w: WorkOrder): ColumnValue => w.status,
  completion_percentage: (w: WorkOrder): ColumnValue => w.completionPercentage,
  report_id: (w: WorkOrder): ColumnValue => w.reportId,
  school_id: (w: WorkOrder): ColumnValue => w.schoolId,
  assigned_to_id: (w: WorkOrder): ColumnValue => w.assignedToId,
  assigned_by_id: (w: WorkOrder): ColumnValue => w.assignedById,
  assigned_at: (w: WorkOrder): ColumnValue => w.assignedAt,
  started_by_id: (w: WorkOrder): ColumnValue => w.startedById,
  scheduled_start: (w: WorkOrder): ColumnValue => w.scheduledStart,
  scheduled_end: (w: WorkOrder): ColumnValue => w.scheduledEnd,
  actual_start: (w: WorkOrder): ColumnValue => w.actualStart,
  actual_end: (w: WorkOrder): ColumnValue => w.actualEnd,
  estimated_hours: (w: WorkOrder): ColumnValue => w.estimatedHours,
  actual_hours: (w: WorkOrder): ColumnValue => w.actualHours,
  labor_cost: (w: WorkOrder): ColumnValue => w.laborCost,
  material_cost: (w: WorkOrder): ColumnValue => w.materialCost,
  total_cost: (w: WorkOrder): ColumnValue => w.totalCost,
  hold_reason: (w: WorkOrder): ColumnValue => w.holdReason,
  cancellation_reason: (w: WorkOrder): ColumnValue => w.cancellationReason,
  completion_notes: (w: WorkOrder): ColumnValue => w.completionNotes,
  signature_reference: (w: WorkOrder): ColumnValue => w.signatureReference,
  verified_at: (w: WorkOrder): ColumnValue => w.verifiedAt,
  verified_by_id: (w: WorkOrder): ColumnValue => w.verifiedById,
  created_by_id: (w: WorkOrder): ColumnValue => w.createdById,
  created_at: (w: WorkOrder): ColumnValue => w.createdAt,
  updated_at: (w: WorkOrder): ColumnValue => w.updatedAt,
  deleted_at: (w: WorkOrder): ColumnValue => w.deletedAt
} satisfies Record<string, (w: WorkOrder) => ColumnValue>;

const COLUMN_NAMES = Object.keys(WORK_ORDER_COLUMNS);
const columnValues = (workOrder: WorkOrder): ColumnValue[] =>
  Object.values(WORK_ORDER_COLUMNS).map((read) => read(workOrder));

const UNIQUE_VIOLATION = '23505';

const PRIORITY_RANK_SQL = `CASE priority WHEN 'emergency' THEN 0 WHEN 'high' THEN 1 WHEN 'medium' THEN 2 ELSE 3 END`;

const SORT_SQL: Record<NonNullable<PageRequest['sort']>, string> = {
  createdAt: 'created_at',
  scheduledStart: 'scheduled_start',
  priority: PRIORITY_RANK_SQL
};

export const rowToWorkOrder = (row: Row): WorkOrder => ({
  id: text(row, 'id'),
  tenantId: text(row, 'tenant_id'),
  workOrderNumber: text(row, 'work_order_number'),
  title: text(row, 'title'),
  description: nullableText(row, 'description'),
  category: nullableText(row, 'category'),
  locationDetails: nullableText(row, 'location_details'),
  priority: priority(row, 'priority'),
  status: status(row, 'status'),
  completionPercentage: number(row, 'completion_percentage'),
  reportId: nullableText(row, 'report_id'),
  schoolId: nullableText(row, 'school_id'),
  assignedToId: nullableText(row, 'assigned_to_id'),
  assignedById: nullableText(row, 'assigned_by_id'),
  assignedAt: nullableTimestamp(row, 'assigned_at'),
  startedById: nullableText(row, 'started_by_id'),
  scheduledStart: nullableTimestamp(row, 'scheduled_start'),
  scheduledEnd: nullableTimestamp(row, 'scheduled_end'),
  actualStart: nullableTimestamp(row, 'actual_start'),
  actualEnd: nullableTimestamp(row, 'actual_end'),
  estimatedHours: nullableNumber(row, 'estimated_hours'),
  actualHours: nullableNumber(row, 'actual_hours'),
  laborCost: number(row, 'labor_cost'),
  materialCost: number(row, 'material_cost'),
  totalCost: number(row, 'total_cost'),
  holdReason: nullableText(row, 'hold_reason'),
  cancellationReason: nullableText(row, 'cancellation_reason'),
  completionNotes: nullableText(row, 'completion_notes'),
  signatureReference: nullableText(row, 'signature_reference'),
  verifiedAt: nullableTimestamp(row, 'verified_at'),
  verifiedById: nullableText(row, 'verified_by_id'),
  createdById: nullableText(row, 'created_by_id'),
  createdAt: timestamp(row, 'created_at'),
  updatedAt: timestamp(row, 'updated_at'),
  deletedAt: nullableTimestamp(row, 'deleted_at'),
  version: number(row, 'version')
});

export const rowToTask = (row: Row): WorkOrderTask => ({
  id: text(row, 'id'),
  workOrderId: text(row, 'work_order_id'),
  description: text(row, 'description'),
  status: oneOf(row, 'status', ['pending', 'completed'] as const),
  completedAt: nullableTimestamp(row, 'completed_at'),
  createdAt: timestamp(row, 'created_at')
});

export const rowToMaterial = (row: Row): WorkOrderMaterial => ({
  id: text(row, 'id'),
  workOrderId: text(row, 'work_order_id'),
  itemReference: text(row, 'item_reference'),
  quantity: number(row, 'quantity'),
  unitCost: number(row, 'unit_cost'),
  totalCost: number(row, 'total_cost'),
  createdAt: timestamp(row, 'created_at')
});

const escapeLike = (term: string): string => term.replace(/[\\%_]/g, (match) => `\\${match}`);

/** WHERE clause for a filter; `$1` is always the tenant id. */
export const buildWhere = (tenantId: string, filter: WorkOrderFilter): { clause: string; values: unknown[] } => {
  const values: unknown[] = [tenantId];
  const conditions = ['tenant_id = $1', 'deleted_at IS NULL'];
  const bind = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  if (filter.statuses) conditions.push(`status = ANY(${bind([...filter.statuses])})`);
  if (filter.priorities) conditions.push(`priority = ANY(${bind([...filter.priorities])})`);
  if (filter.assignedToId) conditions.push(`assigned_to_id = ${bind(filter.assignedToId)}`);
  if (filter.schoolId) conditions.push(`school_id = ${bind(filter.schoolId)}`);
  if (filter.scheduledEndBefore) conditions.push(`scheduled_end < ${bind(filter.scheduledEndBefore)}`);
  if (filter.createdFrom) conditions.push(`created_at >= ${bind(filter.createdFrom)}`);
  if (filter.createdTo) conditions.push(`created_at <= ${bind(filter.createdTo)}`);
  if (filter.search) {
    const pattern = bind(`%${escapeLike(filter.search)}%`);
    conditions.push(`(title ILIKE ${pattern} OR description ILIKE ${pattern} OR work_order_number ILIKE ${pattern})`);
  }

  return { clause: conditions.join(' AND '), values };
};

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;

const insertTask = async (tx: SqlClient, tenantId: string, task: WorkOrderTask): Promise<void> => {
  await tx.query(
    `INSERT INTO work_order_tasks (id, tenant_id, work_order_id, description, status, completed_at, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     ON CONFLICT (id) DO UPDATE SET description = EXCLUDED.description, status = EXCLUDED.status, completed_at = EXCLUDED.completed_at`,
    [task.id, tenantId, task.workOrderId, task.description, task.status, task.completedAt, task.createdAt]
  );
};

const insertMaterial = async (tx: SqlClient, tenantId: string, material: WorkOrderMaterial): Promise<void> => {
  await tx.query(
    `INSERT INTO work_order_materials (id, tenant_id, work_order_id, item_reference, quantity, unit_cost, total_cost, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
    [
      material.id,
      tenantId,
      material.workOrderId,
      material.itemReference,
      material.quantity,
      material.unitCost,
      material.totalCost,
      material.createdAt
    ]
  );
};

/** Postgres-backed store. Each call runs in its own transaction under the request's RLS context. */
export class PgWorkOrderStore implements WorkOrderStore {
  constructor(
    private readonly pool: TxPool,
    private readonly context: RequestDbContext
  ) {}

  async load(tenantId: string, workOrderId: string): Promise<WorkOrderAggregate | null> {
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        'SELECT * FROM work_orders WHERE tenant_id = $1 AND id = $2 AND deleted_at IS NULL',
        [tenantId, workOrderId]
      );
      const row = result.rows[0];
      if (!row) {
        return null;
      }
      const tasks = await tx.query(
        'SELECT * FROM work_order_tasks WHERE tenant_id = $1 AND work_order_id = $2 ORDER BY created_at, id',
        [tenantId, workOrderId]
      );
      const materials = await tx.query(
        'SELECT * FROM work_order_materials WHERE tenant_id = $1 AND work_order_id = $2 ORDER BY created_at, id',
        [tenantId, workOrderId]
      );
      return {
        workOrder: rowToWorkOrder(row),
        tasks: tasks.rows.map(rowToTask),
        materials: materials.rows.map(rowToMaterial)
      };
    });
  }

  async findTaskOwner(tenantId: string, taskId: string): Promise<string | null> {
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        `SELECT t.work_order_id FROM work_order_tasks t
         JOIN work_orders w ON w.id = t.work_order_id
         WHERE t.tenant_id = $1 AND t.id = $2 AND w.deleted_at IS NULL`,
        [tenantId, taskId]
      );
      const row = result.rows[0];
      return row ? text(row, 'work_order_id') : null;
    });
  }

  async numberExists(tenantId: string, workOrderNumber: string): Promise<boolean> {
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        'SELECT 1 FROM work_orders WHERE tenant_id = $1 AND work_order_number = $2',
        [tenantId, workOrderNumber]
      );
      return result.rows.length > 0;
    });
  }

  async insert(aggregate: WorkOrderAggregate): Promise<void> {
    const { workOrder } = aggregate;
    const columns = ['id', 'tenant_id', 'version', ...COLUMN_NAMES];
    const values = [workOrder.id, workOrder.tenantId, workOrder.version, ...columnValues(workOrder)];
    const placeholders = values.map((_, index) => `$${index + 1}`).join(', ');

    try {
      await withTxContext(this.pool, this.context, async (tx) => {
        await tx.query(`INSERT INTO work_orders (${columns.join(', ')}) VALUES (${placeholders})`, values);
        for (const task of aggregate.tasks) {
          await insertTask(tx, workOrder.tenantId, task);
        }
        for (const material of aggregate.materials) {
          await insertMaterial(tx, workOrder.tenantId, material);
        }
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateWorkOrderNumberError(workOrder.workOrderNumber);
      }
      throw error;
    }
  }

  async save(change: WorkOrderChange, expectedVersion: number): Promise<WorkOrder> {
    const { workOrder } = change;
    const values: unknown[] = [workOrder.tenantId, workOrder.id, expectedVersion, ...columnValues(workOrder)];
    // work_order_number and created_at never change after insert
    const assignments = COLUMN_NAMES.map((column, index) => ({ column, placeholder: `$${index + 4}` }))
      .filter(({ column }) => column !== 'work_order_number' && column !== 'created_at')
      .map(({ column, placeholder }) => `${column} = ${placeholder}`);

    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        `UPDATE work_orders SET ${assignments.join(', ')}, version = version + 1
         WHERE tenant_id = $1 AND id = $2 AND version = $3 AND deleted_at IS NULL
         RETURNING *`,
        values
      );
      const row = result.rows[0];
      if (!row) {
        throw new ConcurrentModificationError(workOrder.id, expectedVersion);
      }
      for (const task of change.upsertTasks ?? []) {
        await insertTask(tx, workOrder.tenantId, task);
      }
      for (const material of change.insertMaterials ?? []) {
        await insertMaterial(tx, workOrder.tenantId, material);
      }
      return rowToWorkOrder(row);
    });
  }

  async list(tenantId: string, filter: WorkOrderFilter): Promise<WorkOrder[]> {
    const { clause, values } = buildWhere(tenantId, filter);
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(`SELECT * FROM work_orders WHERE ${clause} ORDER BY created_at, id`, values);
      return result.rows.map(rowToWorkOrder);
    });
  }

  async page(tenantId: string, filter: WorkOrderFilter, request: PageRequest): Promise<Page<WorkOrder>> {
    const { clause, values } = buildWhere(tenantId, filter);
    const order = `${SORT_SQL[request.sort ?? 'createdAt']} ${request.direction === 'asc' ? 'ASC' : 'DESC'}`;
    const limit = `$${values.length + 1}`;
    const offset = `$${values.length + 2}`;

    return withTxContext(this.pool, this.context, async (tx) => {
      const count = await tx.query(`SELECT COUNT(*) AS total FROM work_orders WHERE ${clause}`, values);
      const rows = await tx.query(
        `SELECT * FROM work_orders WHERE ${clause} ORDER BY ${order} NULLS LAST, id LIMIT ${limit} OFFSET ${offset}`,
        [...values, request.pageSize, (request.page - 1) * request.pageSize]
      );
      const totalRow = count.rows[0];
      return {
        items: rows.rows.map(rowToWorkOrder),
        total: totalRow ? number(totalRow, 'total') : 0,
        page: request.page,
        pageSize: request.pageSize
      };
    });
  }

  async latestScheduledEnd(
    tenantId: string,
    technicianId: string,
    statuses: readonly WorkOrderStatus[]
  ): Promise<Date | null> {
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        `SELECT MAX(scheduled_end) AS latest FROM work_orders
         WHERE tenant_id = $1 AND assigned_to_id = $2 AND status = ANY($3) AND deleted_at IS NULL`,
        [tenantId, technicianId, [...statuses]]
      );
      const row = result.rows[0];
      return row ? nullableTimestamp(row, 'latest') : null;
    });
  }
}
