/**
 * Registry credentials resolved for one host/image
 */
export class PassKeyChain {
  constructor(
    readonly username: string = '',
    readonly password: string = '',
  ) {}

  static empty(): PassKeyChain {
    return new PassKeyChain();
  }

  /**
   * Decode a docker-style `auth` value (base64 of "user:password").
   * Returns an empty keychain when the value carries no separator.
   */
  static fromBase64(encoded: string): PassKeyChain {
    const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    if (separator === -1) {
      return PassKeyChain.empty();
    }
    return new PassKeyChain(decoded.slice(0, separator), decoded.slice(separator + 1));
  }

  isEmpty(): boolean {
    return this.username === '' && this.password === '';
  }

  toBase64(): string {
    return Buffer.from(`${this.username}:${this.password}`, 'utf-8').toString('base64');
  }
}

/**
 * Source of registry credentials. Lookups never fail: an absent credential
 * is an empty keychain.
 */
export interface KeychainProvider {
  getKeychain(host: string, imageId: string, labels: Record<string, string>): Promise<PassKeyChain>;
}
