export const WORK_ORDER_STATUSES = [
  'pending',
  'assigned',
  'in_progress',
  'on_hold',
  'completed',
  'verified',
  'cancelled'
] as const;

export type WorkOrderStatus = (typeof WORK_ORDER_STATUSES)[number];

// Highest first.
export const WORK_ORDER_PRIORITIES = ['emergency', 'high', 'medium', 'low'] as const;

export type WorkOrderPriority = (typeof WORK_ORDER_PRIORITIES)[number];

export type TaskStatus = 'pending' | 'completed';

export interface WorkOrderTask {
  id: string;
  workOrderId: string;
  description: string;
  status: TaskStatus;
  completedAt: Date | null;
  createdAt: Date;
}

export interface WorkOrderMaterial {
  id: string;
  workOrderId: string;
  itemReference: string;
  quantity: number;
  unitCost: number;
  totalCost: number;
  createdAt: Date;
}

export interface WorkOrder {
  id: string;
  tenantId: string;
  workOrderNumber: string;
  title: string;
  description: string | null;
  category: string | null;
  locationDetails: string | null;
  priority: WorkOrderPriority;
  status: WorkOrderStatus;
  completionPercentage: number;
  reportId: string | null;
  schoolId: string | null;
  assignedToId: string | null;
  assignedById: string | null;
  assignedAt: Date | null;
  startedById: string | null;
  scheduledStart: Date | null;
  scheduledEnd: Date | null;
  actualStart: Date | null;
  actualEnd: Date | null;
  estimatedHours: number | null;
  actualHours: number | null;
  laborCost: number;
  materialCost: number;
  totalCost: number;
  holdReason: string | null;
  cancellationReason: string | null;
  completionNotes: string | null;
  signatureReference: string | null;
  verifiedAt: Date | null;
  verifiedById: string | null;
  createdById: string | null;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
  version: number;
}

/** A work order together with the entries it owns. */
export interface WorkOrderAggregate {
  workOrder: WorkOrder;
  tasks: WorkOrderTask[];
  materials: WorkOrderMaterial[];
}

export type TechnicianRole = 'technician' | 'supervisor' | 'admin' | 'viewer';

export interface Technician {
  id: string;
  name: string | null;
  role: TechnicianRole;
  active: boolean;
  available: boolean;
  hourlyRate: number | null;
}

export type ReportPriority = 'critical' | 'urgent' | 'high' | 'medium' | 'low';

export interface Report {
  id: string;
  tenantId: string;
  title: string;
  description: string | null;
  schoolId: string | null;
  priority: ReportPriority | null;
  // YYYY-MM-DD
  scheduledDate: string | null;
}

/** Who is acting and on whose behalf. Every operation is scoped by `tenantId`. */
export interface WorkOrderContext {
  tenantId: string;
  actorUserId: string | null;
  requestId?: string;
}
