import { describe, expect, it } from 'vitest';
import { workOrderFixture } from '@fmops/work-orders/testing';
import { serializeAggregate, serializePage, serializeWorkOrder } from './work-order.serializer.js';

describe('work order serializer', () => {
  it('writes snake_case fields with ISO timestamps and a progress label', () => {
    const body = serializeWorkOrder(
      workOrderFixture({
        status: 'in_progress',
        completionPercentage: 60,
        actualStart: new Date('2025-03-03T10:00:00.000Z'),
        laborCost: 80,
        materialCost: 15,
        totalCost: 95
      })
    );

    expect(body).toMatchObject({
      id: 'wo-1',
      work_order_number: 'WO-20250303-0001',
      status: 'in_progress',
      completion_percentage: 60,
      progress_label: 'Half Done',
      actual_start: '2025-03-03T10:00:00.000Z',
      actual_end: null,
      total_cost: 95,
      created_at: '2025-03-03T08:00:00.000Z',
      version: 1
    });
    expect(body).not.toHaveProperty('tenant_id');
  });

  it('nests tasks and materials under the order', () => {
    const body = serializeAggregate({
      workOrder: workOrderFixture(),
      tasks: [
        {
          id: 'task-1',
          workOrderId: 'wo-1',
          description: 'Isolate circuit',
          status: 'completed',
          completedAt: new Date('2025-03-03T09:30:00.000Z'),
          createdAt: new Date('2025-03-03T08:05:00.000Z')
        }
      ],
      materials: []
    });

    expect(body.tasks).toEqual([
      {
        id: 'task-1',
        work_order_id: 'wo-1',
        description: 'Isolate circuit',
        status: 'completed',
        completed_at: '2025-03-03T09:30:00.000Z',
        created_at: '2025-03-03T08:05:00.000Z'
      }
    ]);
    expect(body.materials).toEqual([]);
  });

  it('renames page metadata', () => {
    expect(serializePage({ items: [], total: 41, page: 3, pageSize: 20 })).toEqual({
      items: [],
      total: 41,
      page: 3,
      page_size: 20
    });
  });
});
