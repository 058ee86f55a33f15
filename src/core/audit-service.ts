/**
 * Audit Service - Centralized Logging with Null Object Pattern
 *
 * Write-only audit trail with overflow handling. Disabled unless configured,
 * in which case `log()` is a no-op.
 */

import type { AuditEntry, AuditSink } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries held by the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Callback invoked when storage reaches capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries
 *
 * Write-only: querying belongs to indexed persistence, not this process.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Default in-memory audit storage; calls onOverflow before discarding entries
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      // Pass a copy so the callback cannot mutate our buffer
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /**
   * Get all entries (for testing only - not exposed via AuditService)
   * @internal
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * @internal
   */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const audit = new AuditService();            // disabled, log() is a no-op
 * const audit = new AuditService({ enabled: true, onOverflow: flush });
 * ```
 */
export class AuditService implements AuditSink {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  /**
   * Log an audit entry
   *
   * @throws {Error} If the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error(
        'AuditEntry missing required field: source. ' +
          'All audit entries must include a source field for audit trail integrity.'
      );
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

/**
 * Write an entry without letting an audit failure break the request path
 */
export async function safeAudit(sink: AuditSink | undefined, entry: AuditEntry): Promise<void> {
  if (!sink) {
    return;
  }
  try {
    await sink.log(entry);
  } catch (error) {
    console.error('[Audit] Failed to log audit entry:', error);
  }
}
