/**
 * JSON Lines audit store.
 *
 * One entry per line, appended. The directory is created on the first
 * write rather than at construction, so building a store never touches
 * the filesystem. A malformed line is skipped on read; the remaining
 * entries are still returned (the chain check in AuditService reports
 * the gap).
 */

import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { AUDIT_ACTIONS, AuditEntry } from '../domain/audit';
import { Environment } from '../domain/environment';
import { createLogger } from '../logger';
import { AuditStore, ListOptions } from './store';

const log = createLogger({ component: 'audit-store' });

const AuditEntrySchema = z.object({
  id: z.string(),
  sequence: z.number().int().positive(),
  timestamp: z.string(),
  actorId: z.string(),
  action: z.enum(AUDIT_ACTIONS),
  environment: z.nativeEnum(Environment).optional(),
  outcome: z.enum(['success', 'failure', 'denied']),
  correlationId: z.string(),
  details: z.record(z.unknown()).optional(),
  prevHash: z.string(),
  hash: z.string(),
});

export class FileAuditStore implements AuditStore {
  private dirReady = false;
  private tail: AuditEntry | null | undefined;

  constructor(private logPath: string) {}

  async append(entry: AuditEntry): Promise<AuditEntry> {
    if (!this.dirReady) {
      await mkdir(dirname(this.logPath), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    this.tail = entry;
    return entry;
  }

  async list(options?: ListOptions & { environment?: Environment }): Promise<AuditEntry[]> {
    const entries = await this.readAll();
    const filtered = options?.environment
      ? entries.filter((e) => e.environment === options.environment)
      : entries;
    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? filtered.length;
    return filtered.slice(offset, offset + limit);
  }

  async last(): Promise<AuditEntry | null> {
    if (this.tail === undefined) {
      const entries = await this.readAll();
      this.tail = entries[entries.length - 1] ?? null;
    }
    return this.tail;
  }

  private async readAll(): Promise<AuditEntry[]> {
    let content: string;
    try {
      content = await readFile(this.logPath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const entries: AuditEntry[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        log.warn('skipping corrupt audit log line', { line: trimmed.slice(0, 120) });
        continue;
      }
      const result = AuditEntrySchema.safeParse(parsed);
      if (result.success) {
        entries.push(result.data);
      } else {
        log.warn('skipping audit log line with unexpected shape', { line: trimmed.slice(0, 120) });
      }
    }
    return entries;
  }
}
