/**
 * Storage Backend Model
 *
 * Wire shapes of the backend section of a daemon configuration. Keys are
 * kept in the daemon's snake_case so a parsed template dumps back unchanged.
 */

import { z } from 'zod';

export const BackendTypes = {
  LOCALFS: 'localfs',
  OSS: 'oss',
  REGISTRY: 'registry',
} as const;

export type BackendType = typeof BackendTypes[keyof typeof BackendTypes];

const BACKEND_TYPES: readonly string[] = Object.values(BackendTypes);

/**
 * Narrow a template's backend `type` string. Returns undefined for kinds
 * this library does not know.
 */
export function parseBackendType(value: string): BackendType | undefined {
  return isBackendType(value) ? value : undefined;
}

function isBackendType(value: string): value is BackendType {
  return BACKEND_TYPES.includes(value);
}

export const mirrorConfigSchema = z.object({
  host: z.string().optional(),
  headers: z.record(z.string()).optional(),
  health_check_interval: z.number().int().optional(),
  failure_limit: z.number().int().min(0).max(255).optional(),
  ping_url: z.string().optional(),
});

export type MirrorConfig = z.infer<typeof mirrorConfigSchema>;

export const proxyConfigSchema = z.object({
  url: z.string().optional(),
  fallback: z.boolean().default(false),
  ping_url: z.string().optional(),
  check_interval: z.number().int().optional(),
  use_http: z.boolean().optional(),
});

export type ProxyConfig = z.infer<typeof proxyConfigSchema>;

export const backendConfigSchema = z.object({
  // localfs
  blob_file: z.string().optional(),
  dir: z.string().optional(),
  readahead: z.boolean().default(false),
  readahead_sec: z.number().int().optional(),

  // registry
  host: z.string().optional(),
  repo: z.string().optional(),
  auth: z.string().optional(),
  registry_token: z.string().optional(),
  blob_url_scheme: z.string().optional(),
  blob_redirected_host: z.string().optional(),
  mirrors: z.array(mirrorConfigSchema).optional(),

  // oss
  endpoint: z.string().optional(),
  access_key_id: z.string().optional(),
  access_key_secret: z.string().optional(),
  bucket_name: z.string().optional(),
  object_prefix: z.string().optional(),

  // registry and oss
  scheme: z.string().optional(),
  skip_verify: z.boolean().optional(),

  // all backends
  proxy: proxyConfigSchema.optional(),
  timeout: z.number().int().optional(),
  connect_timeout: z.number().int().optional(),
  retry_limit: z.number().int().optional(),
});

export type BackendConfig = z.infer<typeof backendConfigSchema>;

export const cacheConfigSchema = z.object({
  type: z.string().default(''),
  compressed: z.boolean().optional(),
  config: z
    .object({
      work_dir: z.string().default(''),
      disable_indexed_map: z.boolean().default(false),
    })
    .default({}),
});

export type CacheConfig = z.infer<typeof cacheConfigSchema>;

export const deviceConfigSchema = z.object({
  backend: z.object({
    // Kept as a free string: an unknown kind must survive loading so that
    // supplementation can reject it by name.
    type: z.string(),
    config: backendConfigSchema.default({}),
  }),
  cache: cacheConfigSchema.default({}),
});

export type DeviceConfig = z.infer<typeof deviceConfigSchema>;

/**
 * Backend introspection result shared by every driver variant
 */
export interface StorageBackend {
  type: string;
  config: BackendConfig;
}
