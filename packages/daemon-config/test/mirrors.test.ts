/**
 * Mirrors Directory and Lock Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MirrorsDirectory, DEFAULT_HOST_DIR, MIRRORS_FILE } from '../src/mirrors/directory.js';
import { ExclusiveLock } from '../src/mirrors/lock.js';
import { makeTempDir, writeJson } from './helpers.js';

describe('MirrorsDirectory', () => {
  let testDir: string;
  let mirrors: MirrorsDirectory;

  beforeEach(async () => {
    testDir = await makeTempDir('mirrors');
    mirrors = new MirrorsDirectory(testDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load the definitions of the registry host', async () => {
    await writeJson(join(testDir, 'index.docker.io', MIRRORS_FILE), {
      mirrors: [
        {
          host: 'https://mirror.example.com',
          headers: { 'X-Registry': 'hub' },
          health_check_interval: 5,
          failure_limit: 3,
          ping_url: 'https://mirror.example.com/v2',
        },
      ],
    });

    expect(await mirrors.load('index.docker.io')).toEqual([
      {
        host: 'https://mirror.example.com',
        headers: { 'X-Registry': 'hub' },
        health_check_interval: 5,
        failure_limit: 3,
        ping_url: 'https://mirror.example.com/v2',
      },
    ]);
  });

  it('should fall back to the default entry', async () => {
    await writeJson(join(testDir, DEFAULT_HOST_DIR, MIRRORS_FILE), {
      mirrors: [{ host: 'https://any.example.com' }],
    });

    expect(await mirrors.load('ghcr.io')).toEqual([{ host: 'https://any.example.com' }]);
  });

  it('should prefer the host entry over the default', async () => {
    await writeJson(join(testDir, DEFAULT_HOST_DIR, MIRRORS_FILE), { mirrors: [{ host: 'default' }] });
    await writeJson(join(testDir, 'ghcr.io', MIRRORS_FILE), { mirrors: [{ host: 'specific' }] });

    expect(await mirrors.load('ghcr.io')).toEqual([{ host: 'specific' }]);
  });

  it('should return nothing when no entry exists', async () => {
    expect(await mirrors.load('ghcr.io')).toEqual([]);
  });

  it('should return nothing for a disabled directory', async () => {
    expect(await new MirrorsDirectory('').load('ghcr.io')).toEqual([]);
  });

  it('should return nothing when the directory itself is missing', async () => {
    expect(await new MirrorsDirectory(join(testDir, 'absent')).load('ghcr.io')).toEqual([]);
  });

  it('should reject a file failing validation', async () => {
    await writeJson(join(testDir, 'ghcr.io', MIRRORS_FILE), { mirrors: [{ host: 42 }] });

    await expect(mirrors.load('ghcr.io')).rejects.toThrow('mirrors.0.host');
  });

  it('should reject an unreadable entry', async () => {
    // A directory where the file should be fails with EISDIR
    await mkdir(join(testDir, 'ghcr.io', MIRRORS_FILE), { recursive: true });

    await expect(mirrors.load('ghcr.io')).rejects.toThrow();
  });

  it('should reject a file without a mirrors list', async () => {
    await mkdir(join(testDir, 'ghcr.io'), { recursive: true });
    await writeFile(join(testDir, 'ghcr.io', MIRRORS_FILE), '{}');

    await expect(mirrors.load('ghcr.io')).rejects.toThrow('mirrors: Required');
  });
});

describe('ExclusiveLock', () => {
  const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

  it('should run critical sections one at a time in call order', async () => {
    const lock = new ExclusiveLock();
    const events: string[] = [];
    let active = 0;
    let maxActive = 0;

    const task = (name: string, ms: number) =>
      lock.runExclusive(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        events.push(`start:${name}`);
        await delay(ms);
        events.push(`end:${name}`);
        active--;
        return name;
      });

    const results = await Promise.all([task('a', 20), task('b', 1), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(maxActive).toBe(1);
    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  });

  it('should release after a rejection', async () => {
    const lock = new ExclusiveLock();

    await expect(lock.runExclusive(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(lock.isLocked).toBe(false);
    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });

  it('should report whether it is held', async () => {
    const lock = new ExclusiveLock();
    let observed = false;

    await lock.runExclusive(async () => {
      observed = lock.isLocked;
    });

    expect(observed).toBe(true);
    expect(lock.isLocked).toBe(false);
  });
});
