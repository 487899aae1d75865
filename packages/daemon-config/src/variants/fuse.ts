/**
 * FUSE daemon configuration
 *
 * The backend and cache policy live in a single `device` section.
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
import { fuseDaemonConfigFields, type FuseDaemonConfigData } from './schema.js';
import type { DaemonConfigContract } from './types.js';

export class FuseDaemonConfig implements DaemonConfigContract {
  readonly driver = FsDrivers.FUSEDEV;

  constructor(readonly data: FuseDaemonConfigData) {}

  private get backend(): BackendConfig {
    return this.data.device.backend.config;
  }

  supplement(host: string, repo: string, _snapshotId: string, params: Record<string, string>): void {
    this.backend.host = host;
    this.backend.repo = repo;

    const workDir = params[SupplementParams.WORK_DIR];
    if (workDir) {
      this.data.device.cache.config.work_dir = workDir;
    }
  }

  fillAuth(keychain: PassKeyChain): void {
    if (!keychain.isEmpty()) {
      this.backend.auth = keychain.toBase64();
    }
  }

  storageBackend(): StorageBackend {
    return {
      type: this.data.device.backend.type,
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
    return redact(this.data, fuseDaemonConfigFields);
  }
}
