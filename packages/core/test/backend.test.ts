/**
 * Backend Model Tests
 */

import { describe, it, expect } from 'vitest';
import {
  BackendTypes,
  parseBackendType,
  backendConfigSchema,
  deviceConfigSchema,
  SnapshotSupplementInfo,
  Labels,
} from '../src/model/index.js';

describe('parseBackendType', () => {
  it('should accept the three known kinds', () => {
    expect(parseBackendType('localfs')).toBe(BackendTypes.LOCALFS);
    expect(parseBackendType('oss')).toBe(BackendTypes.OSS);
    expect(parseBackendType('registry')).toBe(BackendTypes.REGISTRY);
  });

  it('should return undefined for anything else', () => {
    expect(parseBackendType('nfs')).toBeUndefined();
    expect(parseBackendType('Registry')).toBeUndefined();
  });
});

describe('schemas', () => {
  it('should preserve mirror order', () => {
    const config = backendConfigSchema.parse({
      mirrors: [{ host: 'c' }, { host: 'a' }, { host: 'c' }],
    });

    expect(config.mirrors?.map((m) => m.host)).toEqual(['c', 'a', 'c']);
  });

  it('should fill device defaults', () => {
    const device = deviceConfigSchema.parse({ backend: { type: 'localfs' } });

    expect(device.backend.config.readahead).toBe(false);
    expect(device.cache).toEqual({
      type: '',
      config: { work_dir: '', disable_indexed_map: false },
    });
  });

  it('should keep an unknown backend type string', () => {
    expect(deviceConfigSchema.parse({ backend: { type: 'nfs' } }).backend.type).toBe('nfs');
  });

  it('should reject a failure limit out of range', () => {
    expect(() => backendConfigSchema.parse({ mirrors: [{ failure_limit: 300 }] })).toThrow();
  });
});

describe('SnapshotSupplementInfo', () => {
  it('should read the VPC flag from labels', () => {
    const vpc = new SnapshotSupplementInfo({
      imageId: 'busybox',
      snapshotId: 'snap-1',
      labels: { [Labels.VPC_REGISTRY]: 'true' },
    });
    const plain = new SnapshotSupplementInfo({ imageId: 'busybox', snapshotId: 'snap-2' });

    expect(vpc.isVpcRegistry()).toBe(true);
    expect(plain.isVpcRegistry()).toBe(false);
    expect(plain.getLabels()).toEqual({});
    expect(plain.getParams()).toEqual({});
  });

  it('should return copies of labels and params', () => {
    const info = new SnapshotSupplementInfo({
      imageId: 'busybox',
      snapshotId: 'snap-1',
      params: { bootstrap: '/b' },
    });

    info.getParams().bootstrap = '/changed';
    expect(info.getParams()).toEqual({ bootstrap: '/b' });
  });
});
