/**
 * Daemon Config Supplementation
 *
 * Fills registry host, repository, mirrors and credentials that are only
 * known once an image is being mounted.
 */

import {
  BackendTypes,
  ImageReferenceError,
  MirrorUpdateError,
  UnsupportedBackendError,
  parseBackendType,
  parseImageReference,
  type ImageReference,
  type ImageReferenceParser,
  type SupplementInfo,
} from '@lazypull/core';
import {
  ChainKeychainProvider,
  DockerConfigKeychainProvider,
  LabelKeychainProvider,
} from './auth/providers.js';
import type { KeychainProvider } from './auth/keychain.js';
import { MirrorsDirectory } from './mirrors/directory.js';
import {
  defaultHostPolicy,
  resolveRegistryHost,
  type RegistryHostPolicy,
} from './registry/host-policy.js';
import { resolveSupplementSettings, type SupplementSettings } from './settings.js';
import type { DaemonConfig } from './variants/index.js';

export interface SupplementDeps {
  /** Mirror definitions, also the lock every supplementation runs under */
  mirrors: MirrorsDirectory;
  keychains: KeychainProvider;
  hostPolicy?: RegistryHostPolicy;
  parseImage?: ImageReferenceParser;
}

/**
 * Supplement `config` for the image described by `info`.
 *
 * Runs entirely inside the mirrors directory lock. Only the registry backend
 * is touched; localfs and oss configs are used as the template gives them.
 * Nothing is mutated when the image reference or backend type is rejected.
 */
export async function supplementDaemonConfig(
  config: DaemonConfig,
  info: SupplementInfo,
  deps: SupplementDeps,
): Promise<void> {
  const { mirrors } = deps;

  await mirrors.exclusive(async () => {
    const imageId = info.getImageId();
    const image = parseImage(deps.parseImage ?? parseImageReference, imageId);

    const { type } = config.storageBackend();
    const backendType = parseBackendType(type);
    if (backendType === undefined) {
      throw new UnsupportedBackendError(type, imageId);
    }

    switch (backendType) {
      case BackendTypes.REGISTRY:
        await supplementRegistry(config, info, image, deps);
        return;
      case BackendTypes.LOCALFS:
      case BackendTypes.OSS:
        return;
      default: {
        const unreachable: never = backendType;
        throw new UnsupportedBackendError(unreachable, imageId);
      }
    }
  });
}

function parseImage(parser: ImageReferenceParser, imageId: string): ImageReference {
  try {
    return parser(imageId);
  } catch (error) {
    if (error instanceof ImageReferenceError) {
      throw error;
    }
    throw new ImageReferenceError(imageId, error instanceof Error ? error.message : String(error), error);
  }
}

async function supplementRegistry(
  config: DaemonConfig,
  info: SupplementInfo,
  image: ImageReference,
  deps: SupplementDeps,
): Promise<void> {
  const imageId = info.getImageId();
  const registryHost = resolveRegistryHost(
    image.host,
    info.isVpcRegistry(),
    deps.hostPolicy ?? defaultHostPolicy,
  );

  try {
    await config.updateMirrors(deps.mirrors, registryHost);
  } catch (error) {
    throw new MirrorUpdateError(registryHost, imageId, error);
  }

  // An empty keychain keeps the template's auth.
  const keychain = await deps.keychains.getKeychain(registryHost, imageId, info.getLabels());
  config.supplement(registryHost, image.repo, info.getSnapshotId(), info.getParams());
  config.fillAuth(keychain);

  console.log(
    `[Lazypull:Supplement] ${imageId}: registry ${registryHost}, repo ${image.repo}` +
    `, auth ${keychain.isEmpty() ? 'from template' : 'resolved'}`,
  );
}

export interface SupplementerOptions {
  /** Shared handle, so several supplementers serialize on one lock */
  mirrors?: MirrorsDirectory;
  keychains?: KeychainProvider;
  hostPolicy?: RegistryHostPolicy;
}

/**
 * Supplementer bound to one mirrors directory and keychain chain
 *
 * Supplementation is serialized per `MirrorsDirectory`. A process should
 * use a single supplementer, or pass the same `mirrors` handle to each.
 */
export class DaemonConfigSupplementer {
  readonly mirrors: MirrorsDirectory;
  private readonly keychains: KeychainProvider;
  private readonly hostPolicy: RegistryHostPolicy;

  constructor(
    settings: SupplementSettings = {},
    options: SupplementerOptions = {},
  ) {
    const resolved = resolveSupplementSettings(settings);
    this.mirrors = options.mirrors ?? new MirrorsDirectory(resolved.mirrorsConfigDir);
    this.keychains = options.keychains ?? new ChainKeychainProvider([
      new LabelKeychainProvider(),
      new DockerConfigKeychainProvider({ configDir: resolved.dockerConfigDir }),
    ]);
    this.hostPolicy = options.hostPolicy ?? defaultHostPolicy;
  }

  supplement(config: DaemonConfig, info: SupplementInfo): Promise<void> {
    return supplementDaemonConfig(config, info, {
      mirrors: this.mirrors,
      keychains: this.keychains,
      hostPolicy: this.hostPolicy,
    });
  }
}
