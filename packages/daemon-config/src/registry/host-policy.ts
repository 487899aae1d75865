/**
 * Registry Host Policy
 *
 * Turns the host parsed from an image reference into the host the daemon
 * must talk to.
 */

import { DEFAULT_REGISTRY_DOMAIN } from '@lazypull/core';

/** Host that serves API and blob requests of the public default registry */
export const DEFAULT_REGISTRY_API_HOST = 'index.docker.io';

const VPC_SUFFIX = '-vpc';

export interface RegistryHostPolicy {
  /** Private-network equivalent of a public registry host */
  toVpcHost(host: string): string;
  /** API host of a registry whose user-facing domain differs */
  canonicalHost(host: string): string;
}

/**
 * Append "-vpc" to the first DNS label:
 * registry.cn-hangzhou.example.com -> registry-vpc.cn-hangzhou.example.com
 */
export function convertToVpcHost(host: string): string {
  const labels = host.split('.');
  if (labels[0].endsWith(VPC_SUFFIX)) {
    return host;
  }
  labels[0] = `${labels[0]}${VPC_SUFFIX}`;
  return labels.join('.');
}

export function canonicalRegistryHost(host: string): string {
  return host === DEFAULT_REGISTRY_DOMAIN ? DEFAULT_REGISTRY_API_HOST : host;
}

export const defaultHostPolicy: RegistryHostPolicy = {
  toVpcHost: convertToVpcHost,
  canonicalHost: canonicalRegistryHost,
};

export function resolveRegistryHost(
  host: string,
  isVpcRegistry: boolean,
  policy: RegistryHostPolicy = defaultHostPolicy,
): string {
  return isVpcRegistry ? policy.toVpcHost(host) : policy.canonicalHost(host);
}
