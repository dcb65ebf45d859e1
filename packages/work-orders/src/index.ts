export * from './types.js';
export * from './errors.js';
export * from './ports.js';
export * from './cost-aggregator.js';
export * from './state-machine.js';
export * from './task-ledger.js';
export * from './material-ledger.js';
export * from './numbering.js';
export * from './statistics.js';
export * from './scheduling/slot.js';
export * from './scheduling/auto-scheduler.js';
export * from './work-order.engine.js';
