/**
 * Private key storage for WebIdentity.
 *
 * A key pair is stored as two artifacts per key id:
 * - `<keyId>.pem`  PKCS#8 private key (mode 0600)
 * - `<keyId>.json` public metadata: key id, algorithm, creation time, public JWK
 *
 * Storage is synchronous: bootstrap happens once, on first use, and the
 * JWKS endpoint must be able to answer without awaiting.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

const PublicJwkSchema = z.object({
  kty: z.literal('RSA'),
  n: z.string().min(1),
  e: z.string().min(1),
  alg: z.string(),
  use: z.string(),
  kid: z.string(),
});

const KeyMetadataSchema = z.object({
  keyId: z.string().min(1),
  algorithm: z.string(),
  createdAt: z.string(),
  publicJwk: PublicJwkSchema,
});

export type RsaPublicJwk = z.infer<typeof PublicJwkSchema>;
export type KeyMetadata = z.infer<typeof KeyMetadataSchema>;

export interface StoredKeyPair {
  privateKeyPem: string;
  metadata: KeyMetadata;
}

export interface PrivateKeyStorage {
  exists(keyId: string): boolean;
  load(keyId: string): StoredKeyPair | undefined;
  save(keyId: string, keyPair: StoredKeyPair): void;
  delete(keyId: string): boolean;
}

// ============================================================================
// In-memory storage
// ============================================================================

export class InMemoryPrivateKeyStorage implements PrivateKeyStorage {
  private readonly keys = new Map<string, StoredKeyPair>();

  exists(keyId: string): boolean {
    return this.keys.has(keyId);
  }

  load(keyId: string): StoredKeyPair | undefined {
    return this.keys.get(keyId);
  }

  save(keyId: string, keyPair: StoredKeyPair): void {
    this.keys.set(keyId, keyPair);
  }

  delete(keyId: string): boolean {
    return this.keys.delete(keyId);
  }
}

// ============================================================================
// File storage
// ============================================================================

export class FilePrivateKeyStorage implements PrivateKeyStorage {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  exists(keyId: string): boolean {
    return existsSync(this.privateKeyPath(keyId)) && existsSync(this.metadataPath(keyId));
  }

  load(keyId: string): StoredKeyPair | undefined {
    if (!this.exists(keyId)) {
      return undefined;
    }

    const privateKeyPem = readFileSync(this.privateKeyPath(keyId), 'utf-8');
    const metadata = KeyMetadataSchema.parse(
      JSON.parse(readFileSync(this.metadataPath(keyId), 'utf-8'))
    );
    return { privateKeyPem, metadata };
  }

  save(keyId: string, keyPair: StoredKeyPair): void {
    mkdirSync(this.baseDir, { recursive: true, mode: 0o700 });
    writeFileSync(this.privateKeyPath(keyId), keyPair.privateKeyPem, { mode: 0o600 });
    writeFileSync(this.metadataPath(keyId), JSON.stringify(keyPair.metadata, null, 2));
  }

  delete(keyId: string): boolean {
    const existed = this.exists(keyId);
    rmSync(this.privateKeyPath(keyId), { force: true });
    rmSync(this.metadataPath(keyId), { force: true });
    return existed;
  }

  private privateKeyPath(keyId: string): string {
    return join(this.baseDir, `${keyId}.pem`);
  }

  private metadataPath(keyId: string): string {
    return join(this.baseDir, `${keyId}.json`);
  }
}
