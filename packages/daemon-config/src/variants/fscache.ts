/**
 * Fscache daemon configuration
 *
 * The daemon reads this shape per bootstrap: the backend is carried inline
 * in `config` and the envelope is keyed by the snapshot id.
 */

import {
  redact,
  SupplementParams,
  type BackendConfig,
  type RedactedMap,
  type StorageBackend,
} from '@lazypull/core';
import type { PassKeyChain } from '../auth/keychain.js';
import type { MirrorsDirectory } from '../mirrors/directory.js';
import { FsDrivers } from '../driver.js';
import { dumpJson } from './dump.js';
import { fscacheDaemonConfigFields, type FscacheDaemonConfigData } from './schema.js';
import type { DaemonConfigContract } from './types.js';

export class FscacheDaemonConfig implements DaemonConfigContract {
  readonly driver = FsDrivers.FSCACHE;

  constructor(readonly data: FscacheDaemonConfigData) {}

  private get backend(): BackendConfig {
    return this.data.config.backend_config;
  }

  supplement(host: string, repo: string, snapshotId: string, params: Record<string, string>): void {
    this.backend.host = host;
    this.backend.repo = repo;
    this.data.id = snapshotId;
    this.data.config.id = snapshotId;

    const bootstrap = params[SupplementParams.BOOTSTRAP];
    if (bootstrap) {
      this.data.config.metadata_path = bootstrap;
    }
    const workDir = params[SupplementParams.WORK_DIR];
    if (workDir) {
      this.data.config.cache_config.work_dir = workDir;
    }
  }

  fillAuth(keychain: PassKeyChain): void {
    if (!keychain.isEmpty()) {
      this.backend.auth = keychain.toBase64();
    }
  }

  storageBackend(): StorageBackend {
    return {
      type: this.data.config.backend_type,
      config: this.backend,
    };
  }

  async updateMirrors(mirrors: MirrorsDirectory, registryHost: string): Promise<void> {
    const loaded = await mirrors.load(registryHost);
    if (loaded.length > 0) {
      this.backend.mirrors = loaded;
    }
  }

  dumpString(): string {
    return dumpJson(this.data);
  }

  redact(): RedactedMap {
    return redact(this.data, fscacheDaemonConfigFields);
  }
}
