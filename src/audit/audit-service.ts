/**
 * Audit Trail Service.
 *
 * Appends hash-chained audit entries in call order. Writes are queued:
 * record() returns immediately with a promise that settles once the entry
 * is persisted, and never rejects, so a failing audit backend can be
 * reported as a warning without failing the operation being audited.
 */

import { createHash } from 'crypto';
import { v4 as uuid } from 'uuid';
import { AuditAction, AuditEntry, AuditOutcome } from '../domain/audit';
import { Environment } from '../domain/environment';
import { AuditStore } from '../storage/store';
import { createLogger } from '../logger';

const log = createLogger({ component: 'audit' });

/** Input for creating an audit entry. */
export interface AuditInput {
  actorId: string;
  action: AuditAction;
  environment?: Environment;
  outcome: AuditOutcome;
  correlationId: string;
  details?: Record<string, unknown>;
}

/** Audit query options. */
export interface AuditQueryOptions {
  environment?: Environment;
  /** Only entries recorded against one of these environments. */
  environments?: readonly Environment[];
  /** Most recent N entries. Default 20. */
  limit?: number;
}

export type AuditWriteResult =
  | { ok: true; entry: AuditEntry }
  | { ok: false; action: AuditAction; error: string };

/** Result of walking the hash chain. */
export interface ChainVerification {
  valid: boolean;
  entries: number;
  /** Sequence number of the first entry that does not chain. */
  brokenAt?: number;
  reason?: string;
}

/** Hash over the previous hash and every field of the entry except the hash itself. */
export function computeEntryHash(entry: Omit<AuditEntry, 'hash'>): string {
  const payload = JSON.stringify([
    entry.prevHash,
    entry.sequence,
    entry.id,
    entry.timestamp,
    entry.actorId,
    entry.action,
    entry.environment ?? null,
    entry.outcome,
    entry.correlationId,
    entry.details ?? null,
  ]);
  return createHash('sha256').update(payload).digest('hex');
}

/** The audit service. */
export class AuditService {
  private queue: Promise<unknown> = Promise.resolve();
  private head: { sequence: number; hash: string } | undefined;

  constructor(private store: AuditStore) {}

  /** Queue an audit entry. The promise resolves once it is written (or failed). */
  record(input: AuditInput): Promise<AuditWriteResult> {
    const write = this.queue.then(() => this.append(input));
    this.queue = write;
    return write;
  }

  /** Most recent entries, oldest first. */
  async query(options: AuditQueryOptions = {}): Promise<AuditEntry[]> {
    const limit = options.limit ?? 20;
    let entries = await this.store.list({ environment: options.environment, limit: Number.MAX_SAFE_INTEGER });
    const scope = options.environments;
    if (scope) {
      entries = entries.filter((e) => e.environment !== undefined && scope.includes(e.environment));
    }
    return limit > 0 ? entries.slice(-limit) : [];
  }

  /** Walk the whole log and check sequence numbers and hashes. */
  async verify(): Promise<ChainVerification> {
    const entries = await this.store.list({ limit: Number.MAX_SAFE_INTEGER });
    let prevHash = '';
    let expectedSequence = 1;

    for (const entry of entries) {
      if (entry.sequence !== expectedSequence) {
        return { valid: false, entries: entries.length, brokenAt: entry.sequence, reason: `expected sequence ${expectedSequence}` };
      }
      if (entry.prevHash !== prevHash) {
        return { valid: false, entries: entries.length, brokenAt: entry.sequence, reason: 'previous hash does not match' };
      }
      const { hash, ...rest } = entry;
      if (computeEntryHash(rest) !== hash) {
        return { valid: false, entries: entries.length, brokenAt: entry.sequence, reason: 'entry hash does not match its content' };
      }
      prevHash = hash;
      expectedSequence++;
    }
    return { valid: true, entries: entries.length };
  }

  private async append(input: AuditInput): Promise<AuditWriteResult> {
    try {
      if (!this.head) {
        const last = await this.store.last();
        this.head = last ? { sequence: last.sequence, hash: last.hash } : { sequence: 0, hash: '' };
      }

      const unsigned: Omit<AuditEntry, 'hash'> = {
        id: `aud_${uuid()}`,
        sequence: this.head.sequence + 1,
        timestamp: new Date().toISOString(),
        actorId: input.actorId,
        action: input.action,
        environment: input.environment,
        outcome: input.outcome,
        correlationId: input.correlationId,
        details: input.details,
        prevHash: this.head.hash,
      };
      const entry: AuditEntry = { ...unsigned, hash: computeEntryHash(unsigned) };

      await this.store.append(entry);
      this.head = { sequence: entry.sequence, hash: entry.hash };
      log.info('audit', {
        action: entry.action,
        actorId: entry.actorId,
        environment: entry.environment,
        outcome: entry.outcome,
        correlationId: entry.correlationId,
      });
      return { ok: true, entry };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error('failed to write audit entry', { action: input.action, correlationId: input.correlationId, error: message });
      return { ok: false, action: input.action, error: message };
    }
  }
}

/** Collects audit writes for one operation so they can be flushed together. */
export class AuditTrail {
  private pending: Array<Promise<AuditWriteResult>> = [];

  constructor(
    private service: AuditService,
    private base: { actorId: string; correlationId: string; environment?: Environment },
  ) {}

  /** Queue an entry without waiting for it. */
  append(action: AuditAction, outcome: AuditOutcome, details?: Record<string, unknown>): void {
    this.pending.push(
      this.service.record({
        ...this.base,
        action,
        outcome,
        details,
      }),
    );
  }

  /** Wait for every queued entry; returns a warning per entry that was not written. */
  async flush(): Promise<string[]> {
    const results = await Promise.all(this.pending);
    this.pending = [];
    const warnings: string[] = [];
    for (const result of results) {
      if (!result.ok) {
        warnings.push(`audit entry "${result.action}" was not written: ${result.error}`);
      }
    }
    return warnings;
  }
}
