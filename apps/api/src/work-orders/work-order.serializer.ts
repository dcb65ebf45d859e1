import {
  progressLabel,
  type AutoScheduleReport,
  type Page,
  type TechnicianPerformance,
  type WorkOrder,
  type WorkOrderAggregate,
  type WorkOrderMaterial,
  type WorkOrderStatistics,
  type WorkOrderTask
} from '@fmops/work-orders';

const iso = (value: Date | null): string | null => (value ? value.toISOString() : null);

export const serializeWorkOrder = (workOrder: WorkOrder) => ({
  id: workOrder.id,
  work_order_number: workOrder.workOrderNumber,
  title: workOrder.title,
  description: workOrder.description,
  category: workOrder.category,
  location_details: workOrder.locationDetails,
  priority: workOrder.priority,
  status: workOrder.status,
  completion_percentage: workOrder.completionPercentage,
  progress_label: progressLabel(workOrder.completionPercentage),
  report_id: workOrder.reportId,
  school_id: workOrder.schoolId,
  assigned_to_id: workOrder.assignedToId,
  assigned_by_id: workOrder.assignedById,
  assigned_at: iso(workOrder.assignedAt),
  started_by_id: workOrder.startedById,
  scheduled_start: iso(workOrder.scheduledStart),
  scheduled_end: iso(workOrder.scheduledEnd),
  actual_start: iso(workOrder.actualStart),
  actual_end: iso(workOrder.actualEnd),
  estimated_hours: workOrder.estimatedHours,
  actual_hours: workOrder.actualHours,
  labor_cost: workOrder.laborCost,
  material_cost: workOrder.materialCost,
  total_cost: workOrder.totalCost,
  hold_reason: workOrder.holdReason,
  cancellation_reason: workOrder.cancellationReason,
  completion_notes: workOrder.completionNotes,
  signature_reference: workOrder.signatureReference,
  verified_at: iso(workOrder.verifiedAt),
  verified_by_id: workOrder.verifiedById,
  created_by_id: workOrder.createdById,
  created_at: workOrder.createdAt.toISOString(),
  updated_at: workOrder.updatedAt.toISOString(),
  version: workOrder.version
});

export const serializeTask = (task: WorkOrderTask) => ({
  id: task.id,
  work_order_id: task.workOrderId,
  description: task.description,
  status: task.status,
  completed_at: iso(task.completedAt),
  created_at: task.createdAt.toISOString()
});

export const serializeMaterial = (material: WorkOrderMaterial) => ({
  id: material.id,
  work_order_id: material.workOrderId,
  item_reference: material.itemReference,
  quantity: material.quantity,
  unit_cost: material.unitCost,
  total_cost: material.totalCost,
  created_at: material.createdAt.toISOString()
});

export const serializeAggregate = (aggregate: WorkOrderAggregate) => ({
  ...serializeWorkOrder(aggregate.workOrder),
  tasks: aggregate.tasks.map(serializeTask),
  materials: aggregate.materials.map(serializeMaterial)
});

export const serializePage = (page: Page<WorkOrder>) => ({
  items: page.items.map(serializeWorkOrder),
  total: page.total,
  page: page.page,
  page_size: page.pageSize
});

export const serializeStatistics = (statistics: WorkOrderStatistics) => ({
  total: statistics.total,
  by_status: statistics.byStatus,
  pending: statistics.pending,
  in_progress: statistics.inProgress,
  completed: statistics.completed,
  verified: statistics.verified,
  overdue: statistics.overdue,
  average_completion: statistics.averageCompletion,
  cost_this_month: statistics.costThisMonth,
  created_last_7_days: statistics.createdLast7Days
});

export const serializePerformance = (performance: TechnicianPerformance) => ({
  technician_id: performance.technicianId,
  from: performance.from.toISOString(),
  to: performance.to.toISOString(),
  total_assigned: performance.totalAssigned,
  completed: performance.completed,
  in_progress: performance.inProgress,
  completion_rate: performance.completionRate,
  average_completion_hours: performance.averageCompletionHours,
  total_hours_worked: performance.totalHoursWorked
});

export const serializeScheduleReport = (report: AutoScheduleReport) => ({
  tenant_id: report.tenantId,
  run_at: report.runAt.toISOString(),
  considered: report.considered,
  assigned: report.assigned.map((assignment) => ({
    work_order_id: assignment.workOrderId,
    work_order_number: assignment.workOrderNumber,
    technician_id: assignment.technicianId,
    scheduled_start: iso(assignment.scheduledStart),
    scheduled_end: iso(assignment.scheduledEnd)
  })),
  failures: report.failures.map((failure) => ({
    work_order_id: failure.workOrderId,
    technician_id: failure.technicianId,
    code: failure.code,
    message: failure.message
  }))
});
