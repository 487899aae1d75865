/**
 * Supplementation Settings
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { UnsupportedDriverError } from '@lazypull/core';
import { FsDrivers, parseFsDriver, type FsDriver } from './driver.js';

export interface SupplementSettings {
  fsDriver?: string;
  /** Daemon config template (JSON) */
  templatePath?: string;
  /** Root of per-registry mirror definitions; '' disables mirrors */
  mirrorsConfigDir?: string;
  /** Directory holding docker's config.json */
  dockerConfigDir?: string;
}

export interface ResolvedSupplementSettings {
  fsDriver: FsDriver;
  templatePath: string;
  mirrorsConfigDir: string;
  dockerConfigDir: string;
}

// ========== Defaults ==========

export const DEFAULT_SETTINGS = {
  fsDriver: FsDrivers.FUSEDEV,
  templatePath: '/etc/lazypull/daemon-config.json',
  mirrorsConfigDir: '/etc/lazypull/mirrors.d',
  dockerConfigDir: join(homedir(), '.docker'),
} as const;

export const SETTINGS_ENV = {
  fsDriver: 'LAZYPULL_FS_DRIVER',
  templatePath: 'LAZYPULL_TEMPLATE',
  mirrorsConfigDir: 'LAZYPULL_MIRRORS_DIR',
  dockerConfigDir: 'DOCKER_CONFIG',
} as const;

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): SupplementSettings {
  return {
    fsDriver: env[SETTINGS_ENV.fsDriver],
    templatePath: env[SETTINGS_ENV.templatePath],
    mirrorsConfigDir: env[SETTINGS_ENV.mirrorsConfigDir],
    dockerConfigDir: env[SETTINGS_ENV.dockerConfigDir],
  };
}

/**
 * Merge settings layers, later ones win for every field they define
 */
export function mergeSettings(...layers: SupplementSettings[]): SupplementSettings {
  const merged: SupplementSettings = {};
  for (const layer of layers) {
    merged.fsDriver = layer.fsDriver ?? merged.fsDriver;
    merged.templatePath = layer.templatePath ?? merged.templatePath;
    merged.mirrorsConfigDir = layer.mirrorsConfigDir ?? merged.mirrorsConfigDir;
    merged.dockerConfigDir = layer.dockerConfigDir ?? merged.dockerConfigDir;
  }
  return merged;
}

export function resolveSupplementSettings(settings: SupplementSettings = {}): ResolvedSupplementSettings {
  const driver = settings.fsDriver ?? DEFAULT_SETTINGS.fsDriver;
  const fsDriver = parseFsDriver(driver);
  if (fsDriver === undefined) {
    throw new UnsupportedDriverError(driver);
  }

  return {
    fsDriver,
    templatePath: settings.templatePath ?? DEFAULT_SETTINGS.templatePath,
    mirrorsConfigDir: settings.mirrorsConfigDir ?? DEFAULT_SETTINGS.mirrorsConfigDir,
    dockerConfigDir: settings.dockerConfigDir ?? DEFAULT_SETTINGS.dockerConfigDir,
  };
}
