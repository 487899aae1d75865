/**
 * Daemon configuration factory
 */

import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import { TemplateLoadError, UnsupportedDriverError } from '@lazypull/core';
import { FsDrivers, parseFsDriver } from './driver.js';
import {
  FscacheDaemonConfig,
  FuseDaemonConfig,
  fscacheDaemonConfigSchema,
  fuseDaemonConfigSchema,
  type DaemonConfig,
} from './variants/index.js';

/**
 * Build the configuration variant of `driver` from a JSON template.
 * The driver is checked before the template is read.
 */
export async function createDaemonConfig(driver: string, templatePath: string): Promise<DaemonConfig> {
  const fsDriver = parseFsDriver(driver);
  if (fsDriver === undefined) {
    throw new UnsupportedDriverError(driver);
  }

  const template = await readTemplate(templatePath);

  switch (fsDriver) {
    case FsDrivers.FUSEDEV:
      return new FuseDaemonConfig(parseTemplate(fuseDaemonConfigSchema, template, templatePath));
    case FsDrivers.FSCACHE:
      return new FscacheDaemonConfig(parseTemplate(fscacheDaemonConfigSchema, template, templatePath));
    default: {
      const unreachable: never = fsDriver;
      throw new UnsupportedDriverError(unreachable);
    }
  }
}

async function readTemplate(templatePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(templatePath, 'utf-8');
  } catch (error) {
    throw new TemplateLoadError(templatePath, error, 'Check that the template file exists and is readable');
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new TemplateLoadError(templatePath, error, 'The template must be a JSON document');
  }
}

function parseTemplate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  template: unknown,
  templatePath: string,
): T {
  const result = schema.safeParse(template);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new TemplateLoadError(templatePath, new Error(issues));
  }
  return result.data;
}
