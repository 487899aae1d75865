/**
 * Template schemas and field descriptors of the two driver variants
 */

import { z } from 'zod';
import {
  backendConfigFields,
  backendConfigSchema,
  deviceConfigFields,
  deviceConfigSchema,
  field,
  ref,
  struct,
  type FieldSchema,
} from '@lazypull/core';

export const fsPrefetchSchema = z.object({
  enable: z.boolean().default(false),
  prefetch_all: z.boolean().default(false),
  threads_count: z.number().int().default(0),
  merging_size: z.number().int().default(0),
  bandwidth_rate: z.number().int().default(0),
});

export type FsPrefetchConfig = z.infer<typeof fsPrefetchSchema>;

export const fuseDaemonConfigSchema = z.object({
  device: deviceConfigSchema,
  mode: z.string().optional(),
  digest_validate: z.boolean().default(false),
  iostats_files: z.boolean().optional(),
  enable_xattr: z.boolean().optional(),
  access_pattern: z.boolean().optional(),
  latest_read_files: z.boolean().optional(),
  amplify_io: z.number().int().optional(),
  fs_prefetch: fsPrefetchSchema.optional(),
});

export type FuseDaemonConfigData = z.infer<typeof fuseDaemonConfigSchema>;

export const fscacheDaemonConfigSchema = z.object({
  type: z.string().default('bootstrap'),
  id: z.string().default(''),
  domain_id: z.string().default(''),
  config: z.object({
    id: z.string().default(''),
    backend_type: z.string(),
    backend_config: backendConfigSchema.default({}),
    cache_type: z.string().default(''),
    cache_config: z
      .object({
        work_dir: z.string().default(''),
      })
      .default({}),
    metadata_path: z.string().default(''),
  }),
  fs_prefetch: fsPrefetchSchema.optional(),
});

export type FscacheDaemonConfigData = z.infer<typeof fscacheDaemonConfigSchema>;

const omitEmpty = { omitEmpty: true };

export const fsPrefetchFields: FieldSchema<FsPrefetchConfig> = (p) => [
  field('enable', p.enable),
  field('prefetch_all', p.prefetch_all),
  field('threads_count', p.threads_count),
  field('merging_size', p.merging_size),
  field('bandwidth_rate', p.bandwidth_rate),
];

export const fuseDaemonConfigFields: FieldSchema<FuseDaemonConfigData> = (c) => [
  struct('device', c.device, deviceConfigFields),
  field('mode', c.mode, omitEmpty),
  field('digest_validate', c.digest_validate),
  field('iostats_files', c.iostats_files, omitEmpty),
  field('enable_xattr', c.enable_xattr, omitEmpty),
  field('access_pattern', c.access_pattern, omitEmpty),
  field('latest_read_files', c.latest_read_files, omitEmpty),
  field('amplify_io', c.amplify_io, omitEmpty),
  ref('fs_prefetch', c.fs_prefetch, fsPrefetchFields, omitEmpty),
];

export const fscacheDaemonConfigFields: FieldSchema<FscacheDaemonConfigData> = (c) => [
  field('type', c.type),
  field('id', c.id),
  field('domain_id', c.domain_id),
  struct('config', c.config, (inner) => [
    field('id', inner.id),
    field('backend_type', inner.backend_type),
    struct('backend_config', inner.backend_config, backendConfigFields),
    field('cache_type', inner.cache_type),
    struct('cache_config', inner.cache_config, (cache) => [field('work_dir', cache.work_dir)]),
    field('metadata_path', inner.metadata_path),
  ]),
  ref('fs_prefetch', c.fs_prefetch, fsPrefetchFields, omitEmpty),
];
