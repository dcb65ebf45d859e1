import { NotFoundError, ValidationFailedError } from './errors.js';
import { assertMutable, derivePercentage } from './state-machine.js';
import type { WorkOrderAggregate, WorkOrderTask } from './types.js';

export interface TaskMutation {
  aggregate: WorkOrderAggregate;
  task: WorkOrderTask;
}

export const addTask = (
  aggregate: WorkOrderAggregate,
  input: { id: string; description: string; now: Date }
): TaskMutation => {
  assertMutable(aggregate.workOrder, 'add task to');
  const description = input.description.trim();
  if (description.length === 0) {
    throw new ValidationFailedError('task description is required');
  }

  const task: WorkOrderTask = {
    id: input.id,
    workOrderId: aggregate.workOrder.id,
    description,
    status: 'pending',
    completedAt: null,
    createdAt: input.now
  };
  const tasks = [...aggregate.tasks, task];

  return {
    task,
    aggregate: {
      ...aggregate,
      tasks,
      workOrder: {
        ...aggregate.workOrder,
        completionPercentage: derivePercentage(tasks) ?? aggregate.workOrder.completionPercentage,
        updatedAt: input.now
      }
    }
  };
};

export const setTaskCompletion = (
  aggregate: WorkOrderAggregate,
  input: { taskId: string; completed: boolean; now: Date }
): TaskMutation => {
  assertMutable(aggregate.workOrder, 'update task of');
  const current = aggregate.tasks.find((task) => task.id === input.taskId);
  if (!current) {
    throw new NotFoundError('task', input.taskId);
  }

  const task: WorkOrderTask = input.completed
    ? { ...current, status: 'completed', completedAt: current.completedAt ?? input.now }
    : { ...current, status: 'pending', completedAt: null };
  const tasks = aggregate.tasks.map((entry) => (entry.id === task.id ? task : entry));

  return {
    task,
    aggregate: {
      ...aggregate,
      tasks,
      workOrder: {
        ...aggregate.workOrder,
        completionPercentage: derivePercentage(tasks) ?? aggregate.workOrder.completionPercentage,
        updatedAt: input.now
      }
    }
  };
};
