import { z } from 'zod';

export const UuidSchema = z.string().uuid();
export const DateTimeSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const WorkOrderPrioritySchema = z.enum(['emergency', 'high', 'medium', 'low']);
export const WorkOrderStatusSchema = z.enum([
  'pending',
  'assigned',
  'in_progress',
  'on_hold',
  'completed',
  'verified',
  'cancelled'
]);

const HoursSchema = z.number().finite().nonnegative();
const OptionalText = z.string().trim().min(1).max(4000);

export const SoftDeleteResponseSchema = z.object({
  id: UuidSchema,
  deleted_at: z.string().datetime()
});

export const WorkOrderCreateSchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    description: OptionalText.optional(),
    category: z.string().trim().min(1).max(100).optional(),
    location_details: OptionalText.optional(),
    priority: WorkOrderPrioritySchema.default('medium'),
    school_id: UuidSchema.optional(),
    report_id: UuidSchema.optional(),
    scheduled_start: DateTimeSchema.optional(),
    scheduled_end: DateTimeSchema.optional(),
    estimated_hours: HoursSchema.optional(),
    assigned_to_id: UuidSchema.optional()
  })
  .strict();

export const WorkOrderFromReportSchema = z
  .object({
    assigned_to_id: UuidSchema.optional(),
    estimated_hours: HoursSchema.optional(),
    category: z.string().trim().min(1).max(100).optional()
  })
  .strict();

export const WorkOrderUpdateSchema = z
  .object({
    title: z.string().trim().min(1).max(200).optional(),
    description: OptionalText.nullable().optional(),
    category: z.string().trim().min(1).max(100).nullable().optional(),
    location_details: OptionalText.nullable().optional(),
    priority: WorkOrderPrioritySchema.optional(),
    scheduled_start: DateTimeSchema.nullable().optional(),
    scheduled_end: DateTimeSchema.nullable().optional(),
    estimated_hours: HoursSchema.nullable().optional()
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, { message: 'at least one field is required' });

export const WorkOrderAssignSchema = z.object({
  technician_id: UuidSchema
});

export const WorkOrderStartSchema = z.object({
  technician_id: UuidSchema.optional()
});

export const WorkOrderProgressSchema = z
  .object({
    completion_percentage: z.number().int().min(0).max(100).optional(),
    notes: OptionalText.optional(),
    actual_hours: HoursSchema.optional()
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, { message: 'at least one field is required' });

export const WorkOrderReasonSchema = z.object({
  reason: z.string().trim().min(1).max(1000)
});

export const WorkOrderCompleteSchema = z
  .object({
    actual_hours: HoursSchema.optional(),
    completion_notes: OptionalText.optional(),
    signature_reference: z.string().trim().min(1).max(500).optional()
  })
  .strict();

export const WorkOrderTaskCreateSchema = z.object({
  description: z.string().trim().min(1).max(500)
});

export const WorkOrderTaskUpdateSchema = z.object({
  completed: z.boolean()
});

export const WorkOrderMaterialCreateSchema = z.object({
  item_reference: z.string().trim().min(1).max(200),
  quantity: z
    .number()
    .finite()
    .refine((value) => value !== 0, { message: 'quantity must not be zero' }),
  unit_cost: z.number().finite().nonnegative()
});

const csvOf = <T extends z.ZodTypeAny>(item: T) =>
  z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
    .pipe(z.array(item).min(1));

export const WorkOrderListQuerySchema = z.object({
  status: csvOf(WorkOrderStatusSchema).optional(),
  priority: csvOf(WorkOrderPrioritySchema).optional(),
  assigned_to_id: UuidSchema.optional(),
  school_id: UuidSchema.optional(),
  search: z.string().trim().min(1).optional(),
  page: z.coerce.number().int().positive().default(1),
  page_size: z.coerce.number().int().positive().max(100).default(20),
  sort: z.enum(['created_at', 'scheduled_start', 'priority']).default('created_at'),
  direction: z.enum(['asc', 'desc']).default('desc')
});

export const WorkOrderSearchQuerySchema = z.object({
  q: z.string().trim().min(1)
});

export const TechnicianPerformanceQuerySchema = z
  .object({
    from: DateTimeSchema,
    to: DateTimeSchema
  })
  .refine((value) => value.from.getTime() <= value.to.getTime(), { message: 'from must not be after to' });

export type WorkOrderCreate = z.infer<typeof WorkOrderCreateSchema>;
export type WorkOrderFromReport = z.infer<typeof WorkOrderFromReportSchema>;
export type WorkOrderUpdate = z.infer<typeof WorkOrderUpdateSchema>;
export type WorkOrderAssign = z.infer<typeof WorkOrderAssignSchema>;
export type WorkOrderStart = z.infer<typeof WorkOrderStartSchema>;
export type WorkOrderProgress = z.infer<typeof WorkOrderProgressSchema>;
export type WorkOrderReason = z.infer<typeof WorkOrderReasonSchema>;
export type WorkOrderComplete = z.infer<typeof WorkOrderCompleteSchema>;
export type WorkOrderTaskCreate = z.infer<typeof WorkOrderTaskCreateSchema>;
export type WorkOrderTaskUpdate = z.infer<typeof WorkOrderTaskUpdateSchema>;
export type WorkOrderMaterialCreate = z.infer<typeof WorkOrderMaterialCreateSchema>;
export type WorkOrderListQuery = z.infer<typeof WorkOrderListQuerySchema>;
export type TechnicianPerformanceQuery = z.infer<typeof TechnicianPerformanceQuerySchema>;
