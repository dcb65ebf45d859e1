import { describe, expect, it } from 'vitest';
import { computeStatistics, computeTechnicianPerformance, isHighPriorityOpen, isOverdue } from './statistics.js';
import { workOrderFixture } from './testing/index.js';

const NOW = new Date('2025-03-20T12:00:00.000Z');

describe('computeStatistics', () => {
  const orders = [
    workOrderFixture({ id: '1', status: 'pending', createdAt: new Date('2025-03-18T08:00:00.000Z') }),
    workOrderFixture({
      id: '2',
      status: 'in_progress',
      completionPercentage: 40,
      scheduledEnd: new Date('2025-03-19T17:00:00.000Z')
    }),
    workOrderFixture({
      id: '3',
      status: 'completed',
      completionPercentage: 100,
      totalCost: 120.5,
      actualEnd: new Date('2025-03-10T10:00:00.000Z')
    }),
    workOrderFixture({
      id: '4',
      status: 'verified',
      completionPercentage: 100,
      totalCost: 79.5,
      actualEnd: new Date('2025-03-02T10:00:00.000Z')
    }),
    workOrderFixture({
      id: '5',
      status: 'completed',
      completionPercentage: 100,
      totalCost: 999,
      actualEnd: new Date('2025-02-27T10:00:00.000Z')
    }),
    workOrderFixture({
      id: '6',
      status: 'cancelled',
      scheduledEnd: new Date('2025-03-01T17:00:00.000Z'),
      actualEnd: new Date('2025-03-01T17:00:00.000Z')
    })
  ];

  it('summarises the tenant', () => {
    const statistics = computeStatistics(orders, NOW, 'UTC');

    expect(statistics).toEqual({
      total: 6,
      byStatus: { pending: 1, assigned: 0, in_progress: 1, on_hold: 0, completed: 2, verified: 1, cancelled: 1 },
      pending: 1,
      inProgress: 1,
      completed: 2,
      verified: 1,
      overdue: 1,
      averageCompletion: 85,
      costThisMonth: 200,
      createdLast7Days: 1
    });
  });

  it('returns zeros for an empty tenant', () => {
    expect(computeStatistics([], NOW, 'UTC')).toMatchObject({ total: 0, averageCompletion: 0, costThisMonth: 0 });
  });
});

describe('predicates', () => {
  it('treats only open orders as overdue', () => {
    const scheduledEnd = new Date('2025-03-19T00:00:00.000Z');
    expect(isOverdue(workOrderFixture({ status: 'on_hold', scheduledEnd }), NOW)).toBe(true);
    expect(isOverdue(workOrderFixture({ status: 'verified', scheduledEnd }), NOW)).toBe(false);
    expect(isOverdue(workOrderFixture({ status: 'pending', scheduledEnd: null }), NOW)).toBe(false);
  });

  it('flags open emergency and high orders', () => {
    expect(isHighPriorityOpen(workOrderFixture({ priority: 'emergency' }))).toBe(true);
    expect(isHighPriorityOpen(workOrderFixture({ priority: 'high', status: 'completed' }))).toBe(false);
    expect(isHighPriorityOpen(workOrderFixture({ priority: 'medium' }))).toBe(false);
  });
});

describe('computeTechnicianPerformance', () => {
  it('rates completed work', () => {
    const from = new Date('2025-03-01T00:00:00.000Z');
    const to = new Date('2025-03-31T00:00:00.000Z');
    const performance = computeTechnicianPerformance(
      'tech-1',
      [
        workOrderFixture({ id: '1', status: 'completed', actualHours: 2 }),
        workOrderFixture({ id: '2', status: 'verified', actualHours: 3.5 }),
        workOrderFixture({ id: '3', status: 'in_progress', actualHours: 1 })
      ],
      from,
      to
    );

    expect(performance).toEqual({
      technicianId: 'tech-1',
      from,
      to,
      totalAssigned: 3,
      completed: 2,
      inProgress: 1,
      completionRate: 66.67,
      averageCompletionHours: 2.75,
      totalHoursWorked: 6.5
    });
  });
});
