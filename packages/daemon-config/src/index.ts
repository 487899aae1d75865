/**
 * @lazypull/daemon-config
 *
 * Driver-specific daemon configurations, their factory and the
 * supplementation of registry, mirror and credential data at mount time.
 */

// Drivers and variants
export { FsDrivers, parseFsDriver, type FsDriver } from './driver.js';
export * from './variants/index.js';

// Factory and output
export { createDaemonConfig } from './factory.js';
export { writeDaemonConfig } from './writer.js';

// Supplementation
export {
  supplementDaemonConfig,
  DaemonConfigSupplementer,
  type SupplementDeps,
  type SupplementerOptions,
} from './supplement.js';
export {
  MirrorsDirectory,
  mirrorsFileSchema,
  MIRRORS_FILE,
  DEFAULT_HOST_DIR,
} from './mirrors/directory.js';
export { ExclusiveLock } from './mirrors/lock.js';
export {
  convertToVpcHost,
  canonicalRegistryHost,
  resolveRegistryHost,
  defaultHostPolicy,
  DEFAULT_REGISTRY_API_HOST,
  type RegistryHostPolicy,
} from './registry/host-policy.js';

// Credentials
export { PassKeyChain, type KeychainProvider } from './auth/keychain.js';
export {
  LabelKeychainProvider,
  DockerConfigKeychainProvider,
  ChainKeychainProvider,
  type DockerConfigKeychainProviderConfig,
} from './auth/providers.js';

// Settings
export {
  DEFAULT_SETTINGS,
  SETTINGS_ENV,
  settingsFromEnv,
  mergeSettings,
  resolveSupplementSettings,
  type SupplementSettings,
  type ResolvedSupplementSettings,
} from './settings.js';

// Re-export core for convenience
export * from '@lazypull/core';
