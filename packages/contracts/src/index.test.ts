import { describe, expect, it } from 'vitest';
import {
  TechnicianPerformanceQuerySchema,
  WorkOrderCreateSchema,
  WorkOrderListQuerySchema,
  WorkOrderMaterialCreateSchema,
  WorkOrderProgressSchema,
  WorkOrderUpdateSchema
} from './index.js';

describe('work order contracts', () => {
  it('defaults the priority and parses timestamps', () => {
    const parsed = WorkOrderCreateSchema.parse({
      title: ' Broken radiator ',
      scheduled_start: '2025-03-06T08:00:00Z'
    });

    expect(parsed.title).toBe('Broken radiator');
    expect(parsed.priority).toBe('medium');
    expect(parsed.scheduled_start).toEqual(new Date('2025-03-06T08:00:00.000Z'));
  });

  it('rejects unknown fields on create', () => {
    expect(WorkOrderCreateSchema.safeParse({ title: 'x', status: 'verified' }).success).toBe(false);
  });

  it('requires at least one field on update and progress', () => {
    expect(WorkOrderUpdateSchema.safeParse({}).success).toBe(false);
    expect(WorkOrderProgressSchema.safeParse({}).success).toBe(false);
    expect(WorkOrderUpdateSchema.parse({ description: null })).toEqual({ description: null });
  });

  it('bounds the completion percentage', () => {
    expect(WorkOrderProgressSchema.safeParse({ completion_percentage: 101 }).success).toBe(false);
    expect(WorkOrderProgressSchema.safeParse({ completion_percentage: 55 }).success).toBe(true);
  });

  it('accepts negative material corrections but not zero', () => {
    expect(WorkOrderMaterialCreateSchema.safeParse({ item_reference: 'PIPE', quantity: -2, unit_cost: 3 }).success).toBe(true);
    expect(WorkOrderMaterialCreateSchema.safeParse({ item_reference: 'PIPE', quantity: 0, unit_cost: 3 }).success).toBe(false);
  });

  it('parses list queries from strings', () => {
    expect(WorkOrderListQuerySchema.parse({ status: 'pending, assigned', page: '2' })).toEqual({
      status: ['pending', 'assigned'],
      page: 2,
      page_size: 20,
      sort: 'created_at',
      direction: 'desc'
    });
    expect(WorkOrderListQuerySchema.safeParse({ status: 'done' }).success).toBe(false);
  });

  it('orders the performance window', () => {
    expect(
      TechnicianPerformanceQuerySchema.safeParse({ from: '2025-03-31T00:00:00Z', to: '2025-03-01T00:00:00Z' }).success
    ).toBe(false);
  });
});
