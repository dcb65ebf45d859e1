export * from './tx.js';
export * from './rows.js';
export * from './work-order.store.js';
export * from './technician.directory.js';
export * from './report.lookup.js';
