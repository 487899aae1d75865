/**
 * Field schemas of the backend model, used by the redactor.
 */

import { field, list, ref, struct, type FieldSchema } from '../redact/fields.js';
import type {
  BackendConfig,
  CacheConfig,
  DeviceConfig,
  MirrorConfig,
  ProxyConfig,
} from './backend.js';

const omitEmpty = { omitEmpty: true };
const secret = { secret: true, omitEmpty: true };

export const mirrorConfigFields: FieldSchema<MirrorConfig> = (m) => [
  field('host', m.host, omitEmpty),
  field('headers', m.headers, omitEmpty),
  field('health_check_interval', m.health_check_interval, omitEmpty),
  field('failure_limit', m.failure_limit, omitEmpty),
  field('ping_url', m.ping_url, omitEmpty),
];

export const proxyConfigFields: FieldSchema<ProxyConfig> = (p) => [
  field('url', p.url, omitEmpty),
  field('fallback', p.fallback),
  field('ping_url', p.ping_url, omitEmpty),
  field('check_interval', p.check_interval, omitEmpty),
  field('use_http', p.use_http, omitEmpty),
];

export const backendConfigFields: FieldSchema<BackendConfig> = (b) => [
  field('blob_file', b.blob_file, omitEmpty),
  field('dir', b.dir, omitEmpty),
  field('readahead', b.readahead),
  field('readahead_sec', b.readahead_sec, omitEmpty),

  field('host', b.host, omitEmpty),
  field('repo', b.repo, omitEmpty),
  field('auth', b.auth, secret),
  field('registry_token', b.registry_token, secret),
  field('blob_url_scheme', b.blob_url_scheme, omitEmpty),
  field('blob_redirected_host', b.blob_redirected_host, omitEmpty),
  list('mirrors', b.mirrors, mirrorConfigFields, omitEmpty),

  field('endpoint', b.endpoint, omitEmpty),
  field('access_key_id', b.access_key_id, secret),
  field('access_key_secret', b.access_key_secret, secret),
  field('bucket_name', b.bucket_name, omitEmpty),
  field('object_prefix', b.object_prefix, omitEmpty),

  field('scheme', b.scheme, omitEmpty),
  field('skip_verify', b.skip_verify, omitEmpty),

  ref('proxy', b.proxy, proxyConfigFields, omitEmpty),
  field('timeout', b.timeout, omitEmpty),
  field('connect_timeout', b.connect_timeout, omitEmpty),
  field('retry_limit', b.retry_limit, omitEmpty),
];

export const cacheConfigFields: FieldSchema<CacheConfig> = (c) => [
  field('type', c.type),
  field('compressed', c.compressed, omitEmpty),
  struct('config', c.config, (cfg) => [
    field('work_dir', cfg.work_dir),
    field('disable_indexed_map', cfg.disable_indexed_map),
  ]),
];

export const deviceConfigFields: FieldSchema<DeviceConfig> = (d) => [
  struct('backend', d.backend, (backend) => [
    field('type', backend.type),
    struct('config', backend.config, backendConfigFields),
  ]),
  struct('cache', d.cache, cacheConfigFields),
];
