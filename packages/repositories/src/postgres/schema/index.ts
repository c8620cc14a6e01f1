// Re-export all schema tables
export * from './employees.js';
export * from './revisions.js';
