/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Rotations keep
 * the same three-step shape as the file store so the pending slot and the
 * per-environment lock behave identically.
 */

import { AuditEntry } from '../domain/audit';
import { Environment, ImageReference } from '../domain/environment';
import { DeploymentError, noPreviousImageError } from '../domain/errors';
import { DeployRecord, ImageState, emptyImageState } from '../domain/image-state';
import { KeyedMutex } from './keyed-mutex';
import { AuditStore, ImageStateStore, ListOptions, Store } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** Returned values never alias the store's internal records. */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

export class MemoryImageStateStore implements ImageStateStore {
  private states = new Map<Environment, ImageState>();
  private successes = new Map<Environment, DeployRecord>();
  private locks = new KeyedMutex<Environment>();

  async read(environment: Environment): Promise<ImageState> {
    const state = this.states.get(environment) ?? emptyImageState(environment);
    return { ...deepCopy(state), pending: null };
  }

  async recordDeploy(environment: Environment, image: ImageReference): Promise<ImageState> {
    return this.locks.withLock(environment, () => {
      const state = deepCopy(this.states.get(environment) ?? emptyImageState(environment));
      state.pending = state.current;
      state.current = image;
      state.previous = state.pending;
      state.pending = null;
      this.states.set(environment, state);
      return deepCopy(state);
    });
  }

  async rollback(environment: Environment): Promise<ImageReference> {
    return this.locks.withLock(environment, () => {
      const state = this.states.get(environment);
      if (!state || state.previous === null || state.current === null) {
        throw new DeploymentError(noPreviousImageError(environment));
      }
      const restored = state.previous;
      this.states.set(environment, {
        environment,
        current: restored,
        previous: state.current,
        pending: null,
      });
      return restored;
    });
  }

  async recordSuccess(environment: Environment, record: DeployRecord): Promise<void> {
    this.successes.set(environment, deepCopy(record));
  }

  async lastSuccess(environment: Environment): Promise<DeployRecord | null> {
    const record = this.successes.get(environment);
    return record ? deepCopy(record) : null;
  }
}

export class MemoryAuditStore implements AuditStore {
  private entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<AuditEntry> {
    this.entries.push(deepCopy(entry));
    return deepCopy(entry);
  }

  async list(options?: ListOptions & { environment?: Environment }): Promise<AuditEntry[]> {
    const filtered = options?.environment
      ? this.entries.filter((e) => e.environment === options.environment)
      : this.entries;
    return applyListOptions(filtered, { limit: options?.limit ?? filtered.length, offset: options?.offset }).map(deepCopy);
  }

  async last(): Promise<AuditEntry | null> {
    const entry = this.entries[this.entries.length - 1];
    return entry ? deepCopy(entry) : null;
  }
}

/** Create a fully in-memory store. */
export function createMemoryStore(): Store {
  return {
    imageState: new MemoryImageStateStore(),
    audit: new MemoryAuditStore(),
  };
}
