export * from './fields.js';
export * from './redact.js';
