import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { createDaemonConfig } from '../src/factory.js';
import { FscacheDaemonConfig, FuseDaemonConfig, type DaemonConfig } from '../src/variants/index.js';

export const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');

export function fixture(name: string): string {
  return join(FIXTURES_DIR, name);
}

export function loadFixture(driver: string, name: string): Promise<DaemonConfig> {
  return createDaemonConfig(driver, fixture(name));
}

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `lazypull-${prefix}-`));
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(value));
}

export async function loadFuse(name = 'fusedev-registry.json'): Promise<FuseDaemonConfig> {
  const config = await loadFixture('fusedev', name);
  if (!(config instanceof FuseDaemonConfig)) {
    throw new Error(`expected a fuse config from ${name}`);
  }
  return config;
}

export async function loadFscache(name = 'fscache-registry.json'): Promise<FscacheDaemonConfig> {
  const config = await loadFixture('fscache', name);
  if (!(config instanceof FscacheDaemonConfig)) {
    throw new Error(`expected an fscache config from ${name}`);
  }
  return config;
}
