/**
 * Daemon Config Factory Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { TemplateLoadError, UnsupportedDriverError } from '@lazypull/core';
import { createDaemonConfig } from '../src/factory.js';
import { FscacheDaemonConfig, FuseDaemonConfig } from '../src/variants/index.js';
import { fixture, loadFixture, makeTempDir } from './helpers.js';

describe('createDaemonConfig', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await makeTempDir('factory');
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('drivers', () => {
    it('should build a fuse config for fusedev', async () => {
      const config = await loadFixture('fusedev', 'fusedev-registry.json');

      expect(config).toBeInstanceOf(FuseDaemonConfig);
      expect(config.driver).toBe('fusedev');
    });

    it('should build an fscache config for fscache', async () => {
      const config = await loadFixture('fscache', 'fscache-registry.json');

      expect(config).toBeInstanceOf(FscacheDaemonConfig);
      expect(config.driver).toBe('fscache');
    });

    it('should reject an unknown driver before reading the template', async () => {
      await expect(createDaemonConfig('blockdev', join(testDir, 'missing.json'))).rejects.toBeInstanceOf(
        UnsupportedDriverError,
      );
    });
  });

  describe('storage backends', () => {
    it.each([
      ['fusedev-registry.json', 'registry'],
      ['fusedev-localfs.json', 'localfs'],
      ['fusedev-oss.json', 'oss'],
    ])('should report the configured type of %s', async (name, type) => {
      const config = await loadFixture('fusedev', name);
      const backend = config.storageBackend();

      expect(backend.type).toBe(type);
      expect(backend.config).toBeDefined();
    });

    it('should expose the populated payload of each kind', async () => {
      const localfs = (await loadFixture('fusedev', 'fusedev-localfs.json')).storageBackend().config;
      const oss = (await loadFixture('fusedev', 'fusedev-oss.json')).storageBackend().config;
      const registry = (await loadFixture('fscache', 'fscache-registry.json')).storageBackend();

      expect(localfs.dir).toBe('/var/lib/lazypull/blobs');
      expect(localfs.readahead).toBe(true);
      expect(oss.bucket_name).toBe('images');
      expect(registry.type).toBe('registry');
      expect(registry.config.scheme).toBe('https');
    });
  });

  describe('template errors', () => {
    it('should fail on a missing file', async () => {
      const templatePath = join(testDir, 'missing.json');

      const error = await createDaemonConfig('fusedev', templatePath).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TemplateLoadError);
      if (error instanceof TemplateLoadError) {
        expect(error.templatePath).toBe(templatePath);
      }
    });

    it('should fail on invalid JSON', async () => {
      const templatePath = join(testDir, 'broken.json');
      await writeFile(templatePath, '{"device": ');

      await expect(createDaemonConfig('fusedev', templatePath)).rejects.toBeInstanceOf(TemplateLoadError);
    });

    it('should fail when the template does not match the driver shape', async () => {
      await expect(createDaemonConfig('fusedev', fixture('fscache-registry.json'))).rejects.toThrow(
        'device: Required',
      );
    });

    it('should name the offending field', async () => {
      const templatePath = join(testDir, 'bad-mirror.json');
      await writeFile(
        templatePath,
        JSON.stringify({
          device: { backend: { type: 'registry', config: { mirrors: [{ failure_limit: 'many' }] } } },
        }),
      );

      await expect(createDaemonConfig('fusedev', templatePath)).rejects.toThrow(
        'device.backend.config.mirrors.0.failure_limit',
      );
    });
  });
});
