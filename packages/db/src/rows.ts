import {
  WORK_ORDER_PRIORITIES,
  WORK_ORDER_STATUSES,
  type WorkOrderPriority,
  type WorkOrderStatus
} from '@fmops/work-orders';

export type Row = Record<string, unknown>;

export class RowShapeError extends Error {
  constructor(column: string, expected: string) {
    super(`column ${column} is not ${expected}`);
    this.name = 'RowShapeError';
  }
}

export const text = (row: Row, column: string): string => {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new RowShapeError(column, 'text');
  }
  return value;
};

export const nullableText = (row: Row, column: string): string | null =>
  row[column] === null || row[column] === undefined ? null : text(row, column);

// numeric columns arrive as strings
export const number = (row: Row, column: string): number => {
  const value = row[column];
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new RowShapeError(column, 'numeric');
  }
  return parsed;
};

export const nullableNumber = (row: Row, column: string): number | null =>
  row[column] === null || row[column] === undefined ? null : number(row, column);

export const timestamp = (row: Row, column: string): Date => {
  const value = row[column];
  if (!(value instanceof Date)) {
    throw new RowShapeError(column, 'a timestamp');
  }
  return value;
};

export const nullableTimestamp = (row: Row, column: string): Date | null =>
  row[column] === null || row[column] === undefined ? null : timestamp(row, column);

export const bool = (row: Row, column: string): boolean => {
  const value = row[column];
  if (typeof value !== 'boolean') {
    throw new RowShapeError(column, 'boolean');
  }
  return value;
};

export const oneOf = <T extends string>(row: Row, column: string, allowed: readonly T[]): T => {
  const value = text(row, column);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new RowShapeError(column, `one of ${allowed.join(', ')}`);
  }
  return match;
};

export const status = (row: Row, column: string): WorkOrderStatus => oneOf(row, column, WORK_ORDER_STATUSES);

export const priority = (row: Row, column: string): WorkOrderPriority => oneOf(row, column, WORK_ORDER_PRIORITIES);
