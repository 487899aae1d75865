export * from './backend.js';
export * from './fields.js';
export * from './supplement.js';
