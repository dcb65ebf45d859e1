import { createJsonLogger } from '@fmops/common';
import { describe, expect, it } from 'vitest';
import { NoCapacityAvailableError } from '../errors.js';
import type { TechnicianDirectory } from '../ports.js';
import {
  InMemoryReportLookup,
  InMemoryTechnicianDirectory,
  InMemoryWorkOrderStore,
  technician,
  workOrderFixture
} from '../testing/index.js';
import type { WorkOrderContext } from '../types.js';
import { WorkOrderEngine } from '../work-order.engine.js';
import { orderForScheduling } from './auto-scheduler.js';

const ctx: WorkOrderContext = { tenantId: 'tenant-1', actorUserId: null };
const RUN_AT = new Date('2025-03-05T09:00:00.000Z');

const engineWith = (store: InMemoryWorkOrderStore, directory: TechnicianDirectory) =>
  new WorkOrderEngine({
    store,
    directory,
    reports: new InMemoryReportLookup(),
    logger: createJsonLogger({ level: 'silent' }),
    now: () => RUN_AT
  });

const seedPending = (store: InMemoryWorkOrderStore, count: number) => {
  for (let index = 0; index < count; index += 1) {
    store.seed({
      workOrder: workOrderFixture({
        id: `wo-${index + 1}`,
        workOrderNumber: `WO-20250305-${String(index + 1).padStart(4, '0')}`,
        createdAt: new Date(Date.UTC(2025, 2, 4, 8, index))
      }),
      tasks: [],
      materials: []
    });
  }
};

describe('orderForScheduling', () => {
  it('orders by priority then age', () => {
    const ordered = orderForScheduling([
      workOrderFixture({ id: 'low-old', priority: 'low', createdAt: new Date('2025-03-01T00:00:00Z') }),
      workOrderFixture({ id: 'high-new', priority: 'high', createdAt: new Date('2025-03-04T00:00:00Z') }),
      workOrderFixture({ id: 'emergency', priority: 'emergency', createdAt: new Date('2025-03-04T00:00:00Z') }),
      workOrderFixture({ id: 'high-old', priority: 'high', createdAt: new Date('2025-03-02T00:00:00Z') })
    ]);

    expect(ordered.map((workOrder) => workOrder.id)).toEqual(['emergency', 'high-old', 'high-new', 'low-old']);
  });
});

describe('runAutoSchedule', () => {
  it('spreads orders round-robin across technicians', async () => {
    const store = new InMemoryWorkOrderStore();
    seedPending(store, 7);
    const directory = new InMemoryTechnicianDirectory([technician('a'), technician('b'), technician('c')]);

    const report = await engineWith(store, directory).runAutoSchedule(ctx);

    expect(report.considered).toBe(7);
    expect(report.failures).toEqual([]);
    expect(report.assigned.map((entry) => entry.technicianId)).toEqual(['a', 'b', 'c', 'a', 'b', 'c', 'a']);
    const counts = ['a', 'b', 'c'].map(
      (id) => report.assigned.filter((entry) => entry.technicianId === id).length
    );
    expect(Math.max(...counts) - Math.min(...counts)).toBeLessThanOrEqual(1);
  });

  it('books consecutive slots for the same technician', async () => {
    const store = new InMemoryWorkOrderStore();
    seedPending(store, 2);
    const directory = new InMemoryTechnicianDirectory([technician('a')]);

    const report = await engineWith(store, directory).runAutoSchedule(ctx);

    expect(report.assigned.map((entry) => [entry.scheduledStart?.toISOString(), entry.scheduledEnd?.toISOString()])).toEqual([
      ['2025-03-05T09:30:00.000Z', '2025-03-05T11:30:00.000Z'],
      ['2025-03-05T12:00:00.000Z', '2025-03-05T14:00:00.000Z']
    ]);
    expect(store.peek('wo-2')?.workOrder).toMatchObject({
      status: 'assigned',
      assignedToId: 'a',
      scheduledStart: new Date('2025-03-05T12:00:00.000Z')
    });
  });

  it('queues behind work the technician already holds', async () => {
    const store = new InMemoryWorkOrderStore();
    store.seed({
      workOrder: workOrderFixture({
        id: 'busy',
        workOrderNumber: 'WO-20250305-9999',
        status: 'in_progress',
        assignedToId: 'a',
        scheduledEnd: new Date('2025-03-05T15:00:00.000Z')
      }),
      tasks: [],
      materials: []
    });
    seedPending(store, 1);

    const report = await engineWith(store, new InMemoryTechnicianDirectory([technician('a')])).runAutoSchedule(ctx);

    expect(report.assigned[0]?.scheduledStart?.toISOString()).toBe('2025-03-05T15:30:00.000Z');
  });

  it('keeps the window of an order that is already scheduled', async () => {
    const store = new InMemoryWorkOrderStore();
    const window = { start: new Date('2025-03-20T10:00:00.000Z'), end: new Date('2025-03-20T17:00:00.000Z') };
    store.seed({
      workOrder: workOrderFixture({ id: 'booked', scheduledStart: window.start, scheduledEnd: window.end }),
      tasks: [],
      materials: []
    });

    const report = await engineWith(store, new InMemoryTechnicianDirectory([technician('a')])).runAutoSchedule(ctx);

    expect(report.assigned).toEqual([
      {
        workOrderId: 'booked',
        workOrderNumber: 'WO-20250303-0001',
        technicianId: 'a',
        scheduledStart: window.start,
        scheduledEnd: window.end
      }
    ]);
    expect(store.peek('booked')?.workOrder).toMatchObject({
      status: 'assigned',
      assignedToId: 'a',
      scheduledStart: window.start,
      scheduledEnd: window.end
    });
  });

  it('is idempotent once everything is assigned', async () => {
    const store = new InMemoryWorkOrderStore();
    seedPending(store, 3);
    const engine = engineWith(store, new InMemoryTechnicianDirectory([technician('a'), technician('b')]));

    await engine.runAutoSchedule(ctx);
    const before = await store.list('tenant-1', {});
    const second = await engine.runAutoSchedule(ctx);

    expect(second).toMatchObject({ considered: 0, assigned: [], failures: [] });
    expect(await store.list('tenant-1', {})).toEqual(before);
  });

  it('fails without mutation when nobody is available', async () => {
    const store = new InMemoryWorkOrderStore();
    seedPending(store, 2);
    const engine = engineWith(store, new InMemoryTechnicianDirectory([technician('a', { available: false })]));

    await expect(engine.runAutoSchedule(ctx)).rejects.toEqual(new NoCapacityAvailableError('tenant-1'));
    expect((await store.list('tenant-1', { statuses: ['pending'] })).length).toBe(2);
  });

  it('collects assignment failures and leaves those orders pending', async () => {
    const store = new InMemoryWorkOrderStore();
    seedPending(store, 2);
    const directory: TechnicianDirectory = {
      findAvailableTechnicians: async () => [technician('a'), technician('b')],
      getTechnician: async (_tenantId, id) => (id === 'b' ? technician('b', { available: false }) : technician(id))
    };

    const report = await engineWith(store, directory).runAutoSchedule(ctx);

    expect(report.assigned.map((entry) => entry.workOrderId)).toEqual(['wo-1']);
    expect(report.failures).toEqual([
      {
        workOrderId: 'wo-2',
        technicianId: 'b',
        code: 'INVALID_ASSIGNMENT',
        message: 'user b cannot be assigned: unavailable'
      }
    ]);
    expect(store.peek('wo-2')?.workOrder.status).toBe('pending');
  });
});
