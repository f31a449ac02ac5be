/**
 * Audit Service - write-only audit trail with Null Object Pattern
 *
 * Disabled unless configured, so every component can take an AuditService
 * and log unconditionally. Exchange, grant and verification events flow
 * through here; raw tokens never do.
 */

import type { AuditEntry } from './types.js';
import { createLogger } from '../utils/logger.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Capacity of the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Invoked with a copy of all entries when the default storage overflows */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage for audit entries. Write-only: querying belongs to an indexed
 * backing store, not to this interface.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage
// ============================================================================

export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /** @internal testing only */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /** @internal testing only */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const audit = new AuditService();                 // no-op
 * const audit = new AuditService({ enabled: true }); // in-memory
 * await audit.log({ timestamp: new Date(), source: 'oauth:exchange', action: 'token_exchange', success: true });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** @internal testing only */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

/**
 * Logs an entry without letting an audit failure break the caller.
 * Failures are reported on stderr under the given component prefix.
 */
export async function safeAudit(
  auditService: AuditService | undefined,
  component: string,
  entry: AuditEntry
): Promise<void> {
  if (!auditService) {
    return;
  }
  try {
    await auditService.log(entry);
  } catch (error) {
    createLogger(component).error('Failed to log audit entry:', error);
  }
}
