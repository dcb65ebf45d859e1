import { describe, expect, it } from 'vitest';
import { InvalidStateTransitionError, NotFoundError, ValidationFailedError } from './errors.js';
import { addTask, setTaskCompletion } from './task-ledger.js';
import { workOrderFixture } from './testing/index.js';
import type { WorkOrder, WorkOrderAggregate } from './types.js';

const NOW = new Date('2025-03-05T12:00:00.000Z');

const empty = (overrides: Partial<WorkOrder> = {}): WorkOrderAggregate => ({
  workOrder: workOrderFixture({ status: 'in_progress', ...overrides }),
  tasks: [],
  materials: []
});

describe('task ledger', () => {
  it('adds pending tasks and recomputes the percentage', () => {
    let aggregate = empty();
    aggregate = addTask(aggregate, { id: 't-1', description: 'Isolate circuit', now: NOW }).aggregate;
    const { aggregate: next, task } = addTask(aggregate, { id: 't-2', description: ' Swap fitting ', now: NOW });

    expect(task).toMatchObject({ id: 't-2', status: 'pending', description: 'Swap fitting', completedAt: null });
    expect(next.tasks.map((entry) => entry.id)).toEqual(['t-1', 't-2']);
    expect(next.workOrder.completionPercentage).toBe(0);
  });

  it('toggles completion and keeps the percentage in step', () => {
    let aggregate = empty();
    for (const id of ['t-1', 't-2', 't-3']) {
      aggregate = addTask(aggregate, { id, description: id, now: NOW }).aggregate;
    }

    aggregate = setTaskCompletion(aggregate, { taskId: 't-1', completed: true, now: NOW }).aggregate;
    expect(aggregate.workOrder.completionPercentage).toBe(33);

    const completed = setTaskCompletion(aggregate, { taskId: 't-2', completed: true, now: NOW });
    expect(completed.task).toMatchObject({ status: 'completed', completedAt: NOW });
    expect(completed.aggregate.workOrder.completionPercentage).toBe(66);

    const reopened = setTaskCompletion(completed.aggregate, { taskId: 't-2', completed: false, now: NOW });
    expect(reopened.task).toMatchObject({ status: 'pending', completedAt: null });
    expect(reopened.aggregate.workOrder.completionPercentage).toBe(33);
  });

  it('adding a task lowers the percentage', () => {
    let aggregate = addTask(empty(), { id: 't-1', description: 'a', now: NOW }).aggregate;
    aggregate = setTaskCompletion(aggregate, { taskId: 't-1', completed: true, now: NOW }).aggregate;
    expect(aggregate.workOrder.completionPercentage).toBe(100);

    aggregate = addTask(aggregate, { id: 't-2', description: 'b', now: NOW }).aggregate;
    expect(aggregate.workOrder.completionPercentage).toBe(50);
  });

  it('rejects blank descriptions and unknown tasks', () => {
    expect(() => addTask(empty(), { id: 't-1', description: ' ', now: NOW })).toThrow(ValidationFailedError);
    expect(() => setTaskCompletion(empty(), { taskId: 'missing', completed: true, now: NOW })).toThrow(NotFoundError);
  });

  it.each(['completed', 'verified', 'cancelled'] as const)('leaves %s orders untouched', (status) => {
    expect(() => addTask(empty({ status }), { id: 't-1', description: 'late', now: NOW })).toThrow(
      InvalidStateTransitionError
    );
  });
});
