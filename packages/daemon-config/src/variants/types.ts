/**
 * Daemon Configuration Contract
 *
 * Implemented by every driver variant. Mutation happens only through
 * supplement(), fillAuth() and updateMirrors(), all driven by the
 * supplementer while it holds the mirrors directory lock.
 */

import type { RedactedMap, StorageBackend } from '@lazypull/core';
import type { PassKeyChain } from '../auth/keychain.js';
import type { MirrorsDirectory } from '../mirrors/directory.js';
import type { FsDriver } from '../driver.js';

export interface DaemonConfigContract {
  readonly driver: FsDriver;

  /** Store registry host/repository and request parameters */
  supplement(host: string, repo: string, snapshotId: string, params: Record<string, string>): void;

  /** Write keychain credentials to the backend, unless the keychain is empty */
  fillAuth(keychain: PassKeyChain): void;

  storageBackend(): StorageBackend;

  /**
   * Replace the backend mirrors with the definitions found for registryHost.
   * Nothing changes when loading fails or finds no definitions.
   */
  updateMirrors(mirrors: MirrorsDirectory, registryHost: string): Promise<void>;

  /** Full JSON including credentials, only for the daemon's own config file */
  dumpString(): string;

  /** Secret-free form for logs and diagnostics */
  redact(): RedactedMap;
}
