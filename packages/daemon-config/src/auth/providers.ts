/**
 * Keychain Providers
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { Labels } from '@lazypull/core';
import { isNotFoundError } from '../utils/fs.js';
import { PassKeyChain, type KeychainProvider } from './keychain.js';

/**
 * Credentials passed by the container runtime as snapshot labels
 */
export class LabelKeychainProvider implements KeychainProvider {
  async getKeychain(
    _host: string,
    _imageId: string,
    labels: Record<string, string>,
  ): Promise<PassKeyChain> {
    const username = labels[Labels.PULL_USERNAME];
    const password = labels[Labels.PULL_SECRET];
    if (!username || !password) {
      return PassKeyChain.empty();
    }
    return new PassKeyChain(username, password);
  }
}

const dockerConfigSchema = z.object({
  auths: z
    .record(
      z.object({
        auth: z.string().optional(),
        username: z.string().optional(),
        password: z.string().optional(),
      }),
    )
    .default({}),
});

type DockerAuthEntry = z.infer<typeof dockerConfigSchema>['auths'][string];

const DOCKER_CONFIG_FILE = 'config.json';
const DOCKER_HUB_AUTH_KEY = 'https://index.docker.io/v1/';
const DOCKER_HUB_HOSTS = ['docker.io', 'index.docker.io', 'registry-1.docker.io'];

export interface DockerConfigKeychainProviderConfig {
  /** Directory holding config.json (default: ~/.docker) */
  configDir: string;
}

/**
 * Credentials stored by `docker login`
 */
export class DockerConfigKeychainProvider implements KeychainProvider {
  private configDir: string;

  constructor(config: DockerConfigKeychainProviderConfig) {
    this.configDir = config.configDir;
  }

  async getKeychain(host: string): Promise<PassKeyChain> {
    const auths = await this.readAuths();
    for (const key of this.candidateKeys(host)) {
      const entry = auths[key];
      if (entry) {
        const keychain = this.toKeychain(entry);
        if (!keychain.isEmpty()) {
          return keychain;
        }
      }
    }
    return PassKeyChain.empty();
  }

  private candidateKeys(host: string): string[] {
    const keys = [host, `https://${host}`, `http://${host}`];
    if (DOCKER_HUB_HOSTS.includes(host)) {
      keys.push(DOCKER_HUB_AUTH_KEY);
    }
    return keys;
  }

  private toKeychain(entry: DockerAuthEntry): PassKeyChain {
    if (entry.username && entry.password) {
      return new PassKeyChain(entry.username, entry.password);
    }
    if (entry.auth) {
      return PassKeyChain.fromBase64(entry.auth);
    }
    return PassKeyChain.empty();
  }

  private async readAuths(): Promise<Record<string, DockerAuthEntry>> {
    const configPath = join(this.configDir, DOCKER_CONFIG_FILE);
    let raw: string;
    try {
      raw = await readFile(configPath, 'utf-8');
    } catch (error) {
      if (!isNotFoundError(error)) {
        console.warn(`[Lazypull:Auth] Cannot read ${configPath}:`, error);
      }
      return {};
    }

    try {
      return dockerConfigSchema.parse(JSON.parse(raw)).auths;
    } catch (error) {
      console.warn(`[Lazypull:Auth] Ignoring malformed ${configPath}:`, error);
      return {};
    }
  }
}

/**
 * Ask providers in order, first non-empty keychain wins
 */
export class ChainKeychainProvider implements KeychainProvider {
  constructor(private readonly providers: KeychainProvider[]) {}

  async getKeychain(
    host: string,
    imageId: string,
    labels: Record<string, string>,
  ): Promise<PassKeyChain> {
    for (const provider of this.providers) {
      const keychain = await provider.getKeychain(host, imageId, labels);
      if (!keychain.isEmpty()) {
        return keychain;
      }
    }
    return PassKeyChain.empty();
  }
}
