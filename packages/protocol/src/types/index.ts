// Re-export all protocol types

export * from './common.js';
export * from './employees.js';
export * from './revisions.js';
