import type {
  Report,
  Technician,
  WorkOrder,
  WorkOrderAggregate,
  WorkOrderMaterial,
  WorkOrderPriority,
  WorkOrderStatus,
  WorkOrderTask
} from './types.js';

export interface WorkOrderFilter {
  statuses?: readonly WorkOrderStatus[];
  priorities?: readonly WorkOrderPriority[];
  assignedToId?: string;
  schoolId?: string;
  // Matches title, description or number, case-insensitive.
  search?: string;
  scheduledEndBefore?: Date;
  createdFrom?: Date;
  createdTo?: Date;
}

export type WorkOrderSortField = 'createdAt' | 'scheduledStart' | 'priority';

export interface PageRequest {
  page: number;
  pageSize: number;
  sort?: WorkOrderSortField;
  direction?: 'asc' | 'desc';
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}

/**
 * Entries written together with a work order update. Tasks are inserted or replaced by id,
 * materials are append-only.
 */
export interface WorkOrderChange {
  workOrder: WorkOrder;
  upsertTasks?: WorkOrderTask[];
  insertMaterials?: WorkOrderMaterial[];
}

export interface WorkOrderStore {
  /** Soft-deleted rows are not returned. */
  load(tenantId: string, workOrderId: string): Promise<WorkOrderAggregate | null>;
  findTaskOwner(tenantId: string, taskId: string): Promise<string | null>;
  numberExists(tenantId: string, workOrderNumber: string): Promise<boolean>;
  /** Throws DuplicateWorkOrderNumberError when the number is taken. */
  insert(aggregate: WorkOrderAggregate): Promise<void>;
  /**
   * Persists the change only if the stored version still equals `expectedVersion`, bumping it by
   * one. Throws ConcurrentModificationError otherwise.
   */
  save(change: WorkOrderChange, expectedVersion: number): Promise<WorkOrder>;
  list(tenantId: string, filter: WorkOrderFilter): Promise<WorkOrder[]>;
  page(tenantId: string, filter: WorkOrderFilter, request: PageRequest): Promise<Page<WorkOrder>>;
  latestScheduledEnd(
    tenantId: string,
    technicianId: string,
    statuses: readonly WorkOrderStatus[]
  ): Promise<Date | null>;
}

export interface TechnicianDirectory {
  findAvailableTechnicians(tenantId: string): Promise<Technician[]>;
  getTechnician(tenantId: string, technicianId: string): Promise<Technician | null>;
}

export interface ReportLookup {
  getReport(tenantId: string, reportId: string): Promise<Report | null>;
}
