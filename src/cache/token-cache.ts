/**
 * Token Cache
 *
 * Holds derived access tokens keyed by a stable identifier of the credential
 * they were derived from. An entry is considered expired `expLeewaySeconds`
 * before its real expiry so callers never hand out a token that dies in
 * flight.
 */

// ============================================================================
// Types
// ============================================================================

export interface CachedToken {
  token: string;
  /** Expiry as epoch seconds */
  expiresAt: number;
}

/**
 * Pluggable token store. Implementations decide expiry; callers only see
 * live entries.
 */
export interface TokenCache {
  get(key: string): CachedToken | undefined;
  set(key: string, value: CachedToken): void;
  delete(key: string): boolean;
  clear(): void;
}

export interface InMemoryTokenCacheConfig {
  /** Seconds before `expiresAt` at which an entry is treated as expired (default: 300) */
  expLeewaySeconds?: number;
}

// ============================================================================
// InMemoryTokenCache
// ============================================================================

export class InMemoryTokenCache implements TokenCache {
  private readonly entries = new Map<string, CachedToken>();
  private readonly expLeewaySeconds: number;

  constructor(config: InMemoryTokenCacheConfig = {}) {
    this.expLeewaySeconds = config.expLeewaySeconds ?? 300;
  }

  get(key: string): CachedToken | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    const nowSeconds = Date.now() / 1000;
    if (nowSeconds >= entry.expiresAt - this.expLeewaySeconds) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  set(key: string, value: CachedToken): void {
    this.entries.set(key, { token: value.token, expiresAt: value.expiresAt });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
