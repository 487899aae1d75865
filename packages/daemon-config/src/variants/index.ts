import type { FuseDaemonConfig } from './fuse.js';
import type { FscacheDaemonConfig } from './fscache.js';

export { FuseDaemonConfig } from './fuse.js';
export { FscacheDaemonConfig } from './fscache.js';
export type { DaemonConfigContract } from './types.js';
export * from './schema.js';

/** Every supported driver variant, discriminated by `driver` */
export type DaemonConfig = FuseDaemonConfig | FscacheDaemonConfig;
