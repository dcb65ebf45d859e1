import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Patch,
  Post,
  Query
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import type { z } from 'zod';
import type { JwtClaims } from '@fmops/auth';
import {
  SoftDeleteResponseSchema,
  TechnicianPerformanceQuerySchema,
  UuidSchema,
  WorkOrderAssignSchema,
  WorkOrderCompleteSchema,
  WorkOrderCreateSchema,
  WorkOrderFromReportSchema,
  WorkOrderListQuerySchema,
  WorkOrderMaterialCreateSchema,
  WorkOrderProgressSchema,
  WorkOrderReasonSchema,
  WorkOrderSearchQuerySchema,
  WorkOrderStartSchema,
  WorkOrderTaskCreateSchema,
  WorkOrderTaskUpdateSchema,
  WorkOrderUpdateSchema,
  type WorkOrderListQuery
} from '@fmops/contracts';
import type { PageRequest, WorkOrderFilter, WorkOrderSortField } from '@fmops/work-orders';
import { Claims } from '../auth/claims.decorator.js';
import { RequireCapabilities } from '../auth/public.decorator.js';
import { Capabilities } from '../auth/rbac.js';
import { RequestId } from '../common/request-id.decorator.js';
import {
  serializeAggregate,
  serializeMaterial,
  serializePage,
  serializePerformance,
  serializeScheduleReport,
  serializeStatistics,
  serializeTask,
  serializeWorkOrder
} from './work-order.serializer.js';
import { WorkOrdersService } from './work-orders.service.js';

export const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestException(parsed.error.flatten());
  }
  return parsed.data;
};

const parseId = (value: string): string => parseOrThrow(UuidSchema, value);

const SORT_FIELDS: Record<WorkOrderListQuery['sort'], WorkOrderSortField> = {
  created_at: 'createdAt',
  scheduled_start: 'scheduledStart',
  priority: 'priority'
};

export const toListRequest = (query: WorkOrderListQuery): { filter: WorkOrderFilter; page: PageRequest } => ({
  filter: {
    ...(query.status ? { statuses: query.status } : {}),
    ...(query.priority ? { priorities: query.priority } : {}),
    ...(query.assigned_to_id ? { assignedToId: query.assigned_to_id } : {}),
    ...(query.school_id ? { schoolId: query.school_id } : {}),
    ...(query.search ? { search: query.search } : {})
  },
  page: {
    page: query.page,
    pageSize: query.page_size,
    sort: SORT_FIELDS[query.sort],
    direction: query.direction
  }
});

@ApiTags('work-orders')
@ApiBearerAuth()
@Controller()
export class WorkOrdersController {
  constructor(@Inject(WorkOrdersService) private readonly workOrders: WorkOrdersService) {}

  @Post('work-orders')
  @RequireCapabilities(Capabilities.workOrdersWrite)
  async create(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Body() body: unknown) {
    const input = parseOrThrow(WorkOrderCreateSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const created = await engine.create(ctx, {
      title: input.title,
      description: input.description,
      category: input.category,
      locationDetails: input.location_details,
      priority: input.priority,
      schoolId: input.school_id,
      reportId: input.report_id,
      scheduledStart: input.scheduled_start,
      scheduledEnd: input.scheduled_end,
      estimatedHours: input.estimated_hours,
      assignedToId: input.assigned_to_id
    });
    return serializeAggregate(created);
  }

  @Post('reports/:reportId/work-orders')
  @RequireCapabilities(Capabilities.workOrdersWrite)
  async createFromReport(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('reportId') reportId: string,
    @Body() body: unknown
  ) {
    const input = parseOrThrow(WorkOrderFromReportSchema, body ?? {});
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const created = await engine.createFromReport(ctx, parseId(reportId), {
      assignedToId: input.assigned_to_id,
      estimatedHours: input.estimated_hours,
      category: input.category
    });
    return serializeAggregate(created);
  }

  @Get('work-orders')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async list(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Query() query: unknown) {
    const { filter, page } = toListRequest(parseOrThrow(WorkOrderListQuerySchema, query));
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializePage(await engine.list(ctx, filter, page));
  }

  @Get('work-orders/search')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async search(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Query() query: unknown) {
    const { q } = parseOrThrow(WorkOrderSearchQuerySchema, query);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return (await engine.search(ctx, q)).map(serializeWorkOrder);
  }

  @Get('work-orders/overdue')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async listOverdue(@Claims() claims: JwtClaims, @RequestId() requestId: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return (await engine.listOverdue(ctx)).map(serializeWorkOrder);
  }

  @Get('work-orders/high-priority')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async listHighPriority(@Claims() claims: JwtClaims, @RequestId() requestId: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return (await engine.listHighPriorityPending(ctx)).map(serializeWorkOrder);
  }

  @Get('work-orders/statistics')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async statistics(@Claims() claims: JwtClaims, @RequestId() requestId: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeStatistics(await engine.getStatistics(ctx));
  }

  @Post('work-orders/auto-schedule')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersSchedule)
  async autoSchedule(@Claims() claims: JwtClaims, @RequestId() requestId: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeScheduleReport(await engine.runAutoSchedule(ctx));
  }

  @Get('technicians/:technicianId/work-orders')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async listByAssignee(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('technicianId') technicianId: string
  ) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return (await engine.listByAssignee(ctx, parseId(technicianId))).map(serializeWorkOrder);
  }

  @Get('technicians/:technicianId/performance')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async performance(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('technicianId') technicianId: string,
    @Query() query: unknown
  ) {
    const { from, to } = parseOrThrow(TechnicianPerformanceQuerySchema, query);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializePerformance(await engine.getTechnicianPerformance(ctx, parseId(technicianId), from, to));
  }

  @Get('schools/:schoolId/work-orders')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async listBySchool(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Param('schoolId') schoolId: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return (await engine.listBySchool(ctx, parseId(schoolId))).map(serializeWorkOrder);
  }

  @Get('work-orders/:id')
  @RequireCapabilities(Capabilities.workOrdersRead)
  async getById(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Param('id') id: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeAggregate(await engine.getById(ctx, parseId(id)));
  }

  @Patch('work-orders/:id')
  @RequireCapabilities(Capabilities.workOrdersWrite)
  async update(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const input = parseOrThrow(WorkOrderUpdateSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const updated = await engine.update(ctx, parseId(id), {
      title: input.title,
      description: input.description,
      category: input.category,
      locationDetails: input.location_details,
      priority: input.priority,
      scheduledStart: input.scheduled_start,
      scheduledEnd: input.scheduled_end,
      estimatedHours: input.estimated_hours
    });
    return serializeAggregate(updated);
  }

  @Delete('work-orders/:id')
  @RequireCapabilities(Capabilities.workOrdersAdmin)
  async remove(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Param('id') id: string) {
    const workOrderId = parseId(id);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const deleted = await engine.softDelete(ctx, workOrderId);
    return SoftDeleteResponseSchema.parse({ id: deleted.id, deleted_at: deleted.deletedAt?.toISOString() });
  }

  @Post('work-orders/:id/assign')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersWrite)
  async assign(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const input = parseOrThrow(WorkOrderAssignSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeAggregate(await engine.assign(ctx, parseId(id), input.technician_id));
  }

  @Post('work-orders/:id/start')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async start(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const input = parseOrThrow(WorkOrderStartSchema, body ?? {});
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeAggregate(await engine.startWork(ctx, parseId(id), input.technician_id));
  }

  @Post('work-orders/:id/progress')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async progress(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const input = parseOrThrow(WorkOrderProgressSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const updated = await engine.updateProgress(ctx, parseId(id), {
      percentage: input.completion_percentage,
      notes: input.notes,
      actualHours: input.actual_hours
    });
    return serializeAggregate(updated);
  }

  @Post('work-orders/:id/hold')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async hold(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const { reason } = parseOrThrow(WorkOrderReasonSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeAggregate(await engine.hold(ctx, parseId(id), reason));
  }

  @Post('work-orders/:id/resume')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async resume(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Param('id') id: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeAggregate(await engine.resume(ctx, parseId(id)));
  }

  @Post('work-orders/:id/complete')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async complete(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const input = parseOrThrow(WorkOrderCompleteSchema, body ?? {});
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const completed = await engine.complete(ctx, parseId(id), {
      actualHours: input.actual_hours,
      completionNotes: input.completion_notes,
      signatureReference: input.signature_reference
    });
    return serializeAggregate(completed);
  }

  @Post('work-orders/:id/verify')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersVerify)
  async verify(@Claims() claims: JwtClaims, @RequestId() requestId: string, @Param('id') id: string) {
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeAggregate(await engine.verify(ctx, parseId(id)));
  }

  @Post('work-orders/:id/cancel')
  @HttpCode(HttpStatus.OK)
  @RequireCapabilities(Capabilities.workOrdersWrite)
  async cancel(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const { reason } = parseOrThrow(WorkOrderReasonSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    return serializeAggregate(await engine.cancel(ctx, parseId(id), reason));
  }

  @Post('work-orders/:id/tasks')
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async addTask(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const { description } = parseOrThrow(WorkOrderTaskCreateSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const { workOrder, task } = await engine.addTask(ctx, parseId(id), description);
    return { work_order: serializeWorkOrder(workOrder), task: serializeTask(task) };
  }

  @Patch('work-order-tasks/:taskId')
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async updateTask(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('taskId') taskId: string,
    @Body() body: unknown
  ) {
    const { completed } = parseOrThrow(WorkOrderTaskUpdateSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const { workOrder, task } = await engine.updateTaskStatus(ctx, parseId(taskId), completed);
    return { work_order: serializeWorkOrder(workOrder), task: serializeTask(task) };
  }

  @Post('work-orders/:id/materials')
  @RequireCapabilities(Capabilities.workOrdersExecute)
  async addMaterial(
    @Claims() claims: JwtClaims,
    @RequestId() requestId: string,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const input = parseOrThrow(WorkOrderMaterialCreateSchema, body);
    const { engine, ctx } = this.workOrders.forRequest(claims, requestId);
    const { workOrder, material } = await engine.addMaterial(ctx, parseId(id), {
      itemReference: input.item_reference,
      quantity: input.quantity,
      unitCost: input.unit_cost
    });
    return { work_order: serializeWorkOrder(workOrder), material: serializeMaterial(material) };
  }
}
