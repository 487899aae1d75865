/**
 * @lazypull/core
 *
 * Backend model, error taxonomy, field descriptors and the secret-filtering
 * serializer, image reference parsing.
 */

// Model
export * from './model/index.js';

// Redaction
export * from './redact/index.js';

// Image references
export * from './image/index.js';

// Errors
export * from './errors/index.js';
