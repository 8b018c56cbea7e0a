/**
 * Storage layer interfaces.
 *
 * Defines the contract for image-state and audit persistence with
 * pluggable backends (in-memory for tests and library use, files for
 * a real deployment host).
 */

import { AuditEntry } from '../domain/audit';
import { Environment, ImageReference } from '../domain/environment';
import { DeployRecord, ImageState } from '../domain/image-state';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/**
 * Durable per-environment image slots.
 *
 * Mutations are serialized per environment inside the store, so two
 * rotations can never interleave even if a caller skips its own guard.
 */
export interface ImageStateStore {
  /** Current/previous pair; pending is always null here. */
  read(environment: Environment): Promise<ImageState>;
  /** Atomic three-way rotation: current becomes previous, image becomes current. */
  recordDeploy(environment: Environment, image: ImageReference): Promise<ImageState>;
  /**
   * Swap current and previous, returning the new current.
   * Throws ROLLBACK.NO_PREVIOUS_IMAGE (no mutation) when there is no previous.
   */
  rollback(environment: Environment): Promise<ImageReference>;
  /** Record the commit and time of the last deploy that passed its health check. */
  recordSuccess(environment: Environment, record: DeployRecord): Promise<void>;
  lastSuccess(environment: Environment): Promise<DeployRecord | null>;
}

/** Append-only audit persistence. */
export interface AuditStore {
  append(entry: AuditEntry): Promise<AuditEntry>;
  /** Entries in append order, optionally filtered by environment. */
  list(options?: ListOptions & { environment?: Environment }): Promise<AuditEntry[]>;
  /** The most recently appended entry, used to extend the hash chain. */
  last(): Promise<AuditEntry | null>;
}

/** Composite store interface. */
export interface Store {
  imageState: ImageStateStore;
  audit: AuditStore;
}
