/**
 * Image reference parsing with docker-style normalization.
 *
 * Format: [host[:port]/]path[:tag][@digest]
 */

import { ImageReferenceError } from '../errors/index.js';

export interface ImageReference {
  host: string;
  repo: string;
  tag?: string;
  digest?: string;
}

export type ImageReferenceParser = (imageId: string) => ImageReference;

/** User-facing domain of the public default registry */
export const DEFAULT_REGISTRY_DOMAIN = 'docker.io';

const LEGACY_DEFAULT_DOMAIN = 'index.docker.io';
const OFFICIAL_REPO_PREFIX = 'library/';

const DOMAIN_PATTERN =
  /^[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)*(?::[0-9]+)?$/;
const PATH_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG_PATTERN = /^\w[\w.-]{0,127}$/;
const DIGEST_PATTERN = /^[A-Za-z][A-Za-z0-9]*(?:[-_+.][A-Za-z][A-Za-z0-9]*)*:[0-9a-fA-F]{32,}$/;

function isDomainComponent(component: string): boolean {
  return (
    component.includes('.') ||
    component.includes(':') ||
    component === 'localhost' ||
    component.toLowerCase() !== component
  );
}

export function parseImageReference(imageId: string): ImageReference {
  if (imageId === '') {
    throw new ImageReferenceError(imageId, 'reference is empty');
  }

  let remainder = imageId;
  let digest: string | undefined;
  let tag: string | undefined;

  const at = remainder.indexOf('@');
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
    if (!DIGEST_PATTERN.test(digest)) {
      throw new ImageReferenceError(imageId, `invalid digest "${digest}"`);
    }
  }

  const lastColon = remainder.lastIndexOf(':');
  if (lastColon > remainder.lastIndexOf('/')) {
    tag = remainder.slice(lastColon + 1);
    remainder = remainder.slice(0, lastColon);
    if (!TAG_PATTERN.test(tag)) {
      throw new ImageReferenceError(imageId, `invalid tag "${tag}"`);
    }
  }

  let host = DEFAULT_REGISTRY_DOMAIN;
  let repo = remainder;
  const slash = remainder.indexOf('/');
  if (slash !== -1 && isDomainComponent(remainder.slice(0, slash))) {
    host = remainder.slice(0, slash);
    repo = remainder.slice(slash + 1);
  }

  if (!DOMAIN_PATTERN.test(host)) {
    throw new ImageReferenceError(imageId, `invalid registry host "${host}"`);
  }
  if (host === LEGACY_DEFAULT_DOMAIN) {
    host = DEFAULT_REGISTRY_DOMAIN;
  }
  if (host === DEFAULT_REGISTRY_DOMAIN && !repo.includes('/')) {
    repo = `${OFFICIAL_REPO_PREFIX}${repo}`;
  }

  if (repo === '') {
    throw new ImageReferenceError(imageId, 'repository path is empty');
  }
  if (repo.toLowerCase() !== repo) {
    throw new ImageReferenceError(imageId, 'repository name must be lowercase');
  }
  for (const component of repo.split('/')) {
    if (!PATH_COMPONENT_PATTERN.test(component)) {
      throw new ImageReferenceError(imageId, `invalid path component "${component}"`);
    }
  }

  return {
    host,
    repo,
    ...(tag !== undefined ? { tag } : {}),
    ...(digest !== undefined ? { digest } : {}),
  };
}
