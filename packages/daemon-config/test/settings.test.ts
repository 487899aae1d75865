/**
 * Settings Tests
 */

import { describe, it, expect } from 'vitest';
import { UnsupportedDriverError } from '@lazypull/core';
import {
  DEFAULT_SETTINGS,
  mergeSettings,
  resolveSupplementSettings,
  settingsFromEnv,
} from '../src/settings.js';

describe('resolveSupplementSettings', () => {
  it('should apply defaults', () => {
    expect(resolveSupplementSettings()).toEqual({
      fsDriver: 'fusedev',
      templatePath: '/etc/lazypull/daemon-config.json',
      mirrorsConfigDir: '/etc/lazypull/mirrors.d',
      dockerConfigDir: DEFAULT_SETTINGS.dockerConfigDir,
    });
  });

  it('should keep an empty mirrors dir', () => {
    expect(resolveSupplementSettings({ mirrorsConfigDir: '' }).mirrorsConfigDir).toBe('');
  });

  it('should reject an unknown driver', () => {
    expect(() => resolveSupplementSettings({ fsDriver: 'nodev' })).toThrow(UnsupportedDriverError);
  });
});

describe('settingsFromEnv', () => {
  it('should read the environment', () => {
    expect(
      settingsFromEnv({
        LAZYPULL_FS_DRIVER: 'fscache',
        LAZYPULL_TEMPLATE: '/t.json',
        LAZYPULL_MIRRORS_DIR: '/m',
        DOCKER_CONFIG: '/d',
      }),
    ).toEqual({
      fsDriver: 'fscache',
      templatePath: '/t.json',
      mirrorsConfigDir: '/m',
      dockerConfigDir: '/d',
    });
  });
});

describe('mergeSettings', () => {
  it('should let later layers win only where they define a value', () => {
    expect(
      mergeSettings(
        { fsDriver: 'fscache', templatePath: '/env.json' },
        { templatePath: '/cli.json', mirrorsConfigDir: undefined },
      ),
    ).toEqual({
      fsDriver: 'fscache',
      templatePath: '/cli.json',
      mirrorsConfigDir: undefined,
      dockerConfigDir: undefined,
    });
  });
});
