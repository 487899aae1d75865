/**
 * Mirrors Directory
 *
 * Per-registry mirror definitions on disk:
 *
 *   <dir>/<registry host>/mirrors.json
 *   <dir>/_default/mirrors.json      (used when the host has none)
 *
 * Each file is `{ "mirrors": [...] }`, listed in fallback priority order.
 * The handle also owns the lock that serializes daemon config
 * supplementation.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { mirrorConfigSchema, type MirrorConfig } from '@lazypull/core';
import { isNotFoundError } from '../utils/fs.js';
import { ExclusiveLock } from './lock.js';

export const MIRRORS_FILE = 'mirrors.json';
export const DEFAULT_HOST_DIR = '_default';

export const mirrorsFileSchema = z.object({
  mirrors: z.array(mirrorConfigSchema),
});

export class MirrorsDirectory {
  private readonly lock = new ExclusiveLock();

  /** An empty path disables mirror lookup */
  constructor(readonly path: string) {}

  get isLocked(): boolean {
    return this.lock.isLocked;
  }

  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  /**
   * Mirror definitions for registryHost, in file order. Returns an empty
   * list when neither the host nor the default entry exists; throws on an
   * unreadable or malformed file.
   */
  async load(registryHost: string): Promise<MirrorConfig[]> {
    if (this.path === '') {
      return [];
    }

    for (const hostDir of [registryHost, DEFAULT_HOST_DIR]) {
      const filePath = join(this.path, hostDir, MIRRORS_FILE);
      let raw: string;
      try {
        raw = await readFile(filePath, 'utf-8');
      } catch (error) {
        if (isNotFoundError(error)) {
          continue;
        }
        throw error;
      }
      return this.parse(filePath, raw);
    }

    return [];
  }

  private parse(filePath: string, raw: string): MirrorConfig[] {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = mirrorsFileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid mirrors file ${filePath}: ${issues}`);
    }
    return result.data.mirrors;
  }
}
