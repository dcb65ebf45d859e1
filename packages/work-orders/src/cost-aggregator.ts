import type { WorkOrder, WorkOrderMaterial } from './types.js';

export const roundMoney = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

export const roundHours = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

export const materialLineTotal = (quantity: number, unitCost: number): number => roundMoney(quantity * unitCost);

/**
 * Recomputes the cost roll-up of a work order from its labor cost and material entries.
 * Fixed-cost terms would be added here.
 */
export const recompute = (workOrder: WorkOrder, materials: readonly WorkOrderMaterial[]): WorkOrder => {
  const materialCost = roundMoney(materials.reduce((sum, material) => sum + material.totalCost, 0));
  return {
    ...workOrder,
    materialCost,
    totalCost: roundMoney(workOrder.laborCost + materialCost)
  };
};
