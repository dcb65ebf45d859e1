import { materialLineTotal, recompute } from './cost-aggregator.js';
import { ValidationFailedError } from './errors.js';
import { assertMutable } from './state-machine.js';
import type { WorkOrderAggregate, WorkOrderMaterial } from './types.js';

export interface MaterialInput {
  id: string;
  itemReference: string;
  // Negative quantities record corrections.
  quantity: number;
  unitCost: number;
  now: Date;
}

export const addMaterial = (
  aggregate: WorkOrderAggregate,
  input: MaterialInput
): { aggregate: WorkOrderAggregate; material: WorkOrderMaterial } => {
  assertMutable(aggregate.workOrder, 'add material to');
  const itemReference = input.itemReference.trim();
  if (itemReference.length === 0) {
    throw new ValidationFailedError('material item reference is required');
  }
  if (!Number.isFinite(input.quantity) || input.quantity === 0) {
    throw new ValidationFailedError('material quantity must be a non-zero number');
  }
  if (!Number.isFinite(input.unitCost) || input.unitCost < 0) {
    throw new ValidationFailedError('material unit cost must be zero or positive');
  }

  const material: WorkOrderMaterial = {
    id: input.id,
    workOrderId: aggregate.workOrder.id,
    itemReference,
    quantity: input.quantity,
    unitCost: input.unitCost,
    totalCost: materialLineTotal(input.quantity, input.unitCost),
    createdAt: input.now
  };
  const materials = [...aggregate.materials, material];

  return {
    material,
    aggregate: {
      ...aggregate,
      materials,
      workOrder: recompute({ ...aggregate.workOrder, updatedAt: input.now }, materials)
    }
  };
};
