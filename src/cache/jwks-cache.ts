/**
 * JWKS Cache
 *
 * TTL-bounded cache of imported verification keys, keyed by `kid`. Tokens
 * without a `kid` share the `_default` slot.
 *
 * Eviction is deliberately coarse: inserting a new kid when the cache is full
 * clears every entry. Key sets are small and rotate together, so a full cache
 * almost always means the issuer rotated.
 */

import type { KeyLike } from 'jose';
import { createLogger } from '../utils/logger.js';

const log = createLogger('JWKSCache');

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_KID = '_default';

export interface JWKSCacheConfig {
  /** Entry lifetime in seconds (default: 300) */
  ttlSeconds?: number;

  /** Maximum number of kids held at once (default: 10) */
  maxSize?: number;
}

/** A key as handed to jose for verification. */
export type VerificationKey = KeyLike | Uint8Array;

export interface CachedKey {
  key: VerificationKey;
  algorithm: string;
  /** Epoch milliseconds */
  fetchedAt: number;
}

export interface JWKSCacheStats {
  cacheSize: number;
  maxSize: number;
  ttlSeconds: number;
  expiredEntries: number;
  cachedKeys: string[];
  cacheDetails: Record<string, { ageSeconds: number; expired: boolean }>;
}

// ============================================================================
// JWKSCache
// ============================================================================

export class JWKSCache {
  private readonly entries = new Map<string, CachedKey>();
  private readonly ttlMs: number;
  private readonly config: Required<JWKSCacheConfig>;

  constructor(config: JWKSCacheConfig = {}) {
    this.config = {
      ttlSeconds: config.ttlSeconds ?? 300,
      maxSize: config.maxSize ?? 10,
    };
    if (this.config.ttlSeconds <= 0 || this.config.maxSize <= 0) {
      throw new Error('JWKSCache: ttlSeconds and maxSize must be positive');
    }
    this.ttlMs = this.config.ttlSeconds * 1000;
  }

  /** Returns the entry if younger than the TTL; evicts it otherwise. */
  get(kid: string | undefined): CachedKey | undefined {
    const cacheKey = kid || DEFAULT_KID;
    const entry = this.entries.get(cacheKey);
    if (!entry) {
      return undefined;
    }

    if (Date.now() - entry.fetchedAt >= this.ttlMs) {
      this.entries.delete(cacheKey);
      return undefined;
    }
    return entry;
  }

  set(kid: string | undefined, key: VerificationKey, algorithm: string): CachedKey {
    const cacheKey = kid || DEFAULT_KID;

    if (this.entries.size >= this.config.maxSize && !this.entries.has(cacheKey)) {
      log.info('Capacity reached, clearing cache', {
        maxSize: this.config.maxSize,
      });
      this.entries.clear();
    }

    const entry: CachedKey = { key, algorithm, fetchedAt: Date.now() };
    this.entries.set(cacheKey, entry);
    return entry;
  }

  remove(kid: string | undefined): boolean {
    return this.entries.delete(kid || DEFAULT_KID);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  cachedKids(): string[] {
    return [...this.entries.keys()];
  }

  /** Drops every expired entry and returns how many were removed. */
  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [kid, entry] of this.entries) {
      if (now - entry.fetchedAt >= this.ttlMs) {
        this.entries.delete(kid);
        removed++;
      }
    }
    return removed;
  }

  getStats(): JWKSCacheStats {
    const now = Date.now();
    const cacheDetails: JWKSCacheStats['cacheDetails'] = {};
    let expiredEntries = 0;

    for (const [kid, entry] of this.entries) {
      const ageMs = now - entry.fetchedAt;
      const expired = ageMs >= this.ttlMs;
      if (expired) {
        expiredEntries++;
      }
      cacheDetails[kid] = { ageSeconds: ageMs / 1000, expired };
    }

    return {
      cacheSize: this.entries.size,
      maxSize: this.config.maxSize,
      ttlSeconds: this.config.ttlSeconds,
      expiredEntries,
      cachedKeys: this.cachedKids(),
      cacheDetails,
    };
  }
}
