/**
 * File-backed image state.
 *
 * Each environment has up to three single-line slot files in the state
 * directory:
 *
 *   <env>.image          current image
 *   <env>.image.prev     previous image
 *   <env>.image.pending  shadow of current, present only mid-operation
 *
 * Every write goes to a temp file in the same directory followed by a
 * rename, so a slot is always either its old or its new content. An
 * operation interrupted between slot writes leaves the pending slot
 * behind; the next access resolves it before doing anything else:
 *
 *   pending == current  the operation never replaced current: drop pending
 *   pending != current  current was replaced: commit pending as previous
 *
 * which lands on the fully-before or fully-after state of both rotations
 * and rollbacks.
 */

import { open, readFile, rename, mkdir, unlink } from 'fs/promises';
import { join } from 'path';
import { Environment, ImageReference } from '../domain/environment';
import { DeploymentError, noPreviousImageError, stateCorruptionError } from '../domain/errors';
import { DeployRecord, ImageState } from '../domain/image-state';
import { createLogger } from '../logger';
import { KeyedMutex } from './keyed-mutex';
import { ImageStateStore } from './store';

const log = createLogger({ component: 'image-state' });

type Slot = 'current' | 'previous' | 'pending' | 'commit' | 'timestamp';

const SLOT_SUFFIX: Record<Slot, string> = {
  current: '.image',
  previous: '.image.prev',
  pending: '.image.pending',
  commit: '.commit',
  timestamp: '.timestamp',
};

let tmpCounter = 0;

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileImageStateStore implements ImageStateStore {
  private locks = new KeyedMutex<Environment>();

  constructor(private stateDir: string) {}

  /** Absolute path of a slot file. */
  slotPath(environment: Environment, slot: Slot): string {
    return join(this.stateDir, `${environment}${SLOT_SUFFIX[slot]}`);
  }

  async read(environment: Environment): Promise<ImageState> {
    return this.locks.withLock(environment, async () => {
      await this.recover(environment);
      return this.readValidated(environment);
    });
  }

  async recordDeploy(environment: Environment, image: ImageReference): Promise<ImageState> {
    return this.locks.withLock(environment, async () => {
      await this.recover(environment);
      const before = await this.readValidated(environment);
      await mkdir(this.stateDir, { recursive: true });

      // 1. shadow current
      await this.writeSlot(environment, 'pending', before.current ?? '');
      // 2. new current
      await this.writeSlot(environment, 'current', image);
      // 3. shadow becomes previous
      if (before.current === null) {
        await this.removeSlot(environment, 'pending');
      } else {
        await rename(this.slotPath(environment, 'pending'), this.slotPath(environment, 'previous'));
      }

      log.info('image state rotated', { environment, current: image, previous: before.current });
      return { environment, current: image, previous: before.current, pending: null };
    });
  }

  async rollback(environment: Environment): Promise<ImageReference> {
    return this.locks.withLock(environment, async () => {
      await this.recover(environment);
      const before = await this.readValidated(environment);
      if (before.previous === null || before.current === null) {
        throw new DeploymentError(noPreviousImageError(environment));
      }
      if (before.previous === before.current) {
        return before.current;
      }

      await this.writeSlot(environment, 'pending', before.current);
      await rename(this.slotPath(environment, 'previous'), this.slotPath(environment, 'current'));
      await rename(this.slotPath(environment, 'pending'), this.slotPath(environment, 'previous'));

      log.info('image state rolled back', { environment, current: before.previous, previous: before.current });
      return before.previous;
    });
  }

  async recordSuccess(environment: Environment, record: DeployRecord): Promise<void> {
    await mkdir(this.stateDir, { recursive: true });
    await this.writeSlot(environment, 'commit', record.commit);
    await this.writeSlot(environment, 'timestamp', record.deployedAt);
  }

  async lastSuccess(environment: Environment): Promise<DeployRecord | null> {
    const commit = await this.readSlot(environment, 'commit');
    if (commit === null) return null;
    const deployedAt = await this.readSlot(environment, 'timestamp');
    return { commit, deployedAt: deployedAt ?? 'never' };
  }

  /** Resolve a pending slot left by an interrupted rotation or rollback. */
  private async recover(environment: Environment): Promise<void> {
    const pending = await this.readSlot(environment, 'pending');
    if (pending === null) return;

    const shadow = pending === '' ? null : pending;
    const current = await this.readSlot(environment, 'current');

    if (shadow === current) {
      await this.removeSlot(environment, 'pending');
      log.warn('discarded interrupted image state operation', { environment });
    } else if (shadow === null) {
      await this.removeSlot(environment, 'previous');
      await this.removeSlot(environment, 'pending');
      log.warn('completed interrupted first rotation', { environment, current });
    } else {
      await rename(this.slotPath(environment, 'pending'), this.slotPath(environment, 'previous'));
      log.warn('completed interrupted image state operation', { environment, current, previous: shadow });
    }
  }

  private async readValidated(environment: Environment): Promise<ImageState> {
    const current = await this.readSlot(environment, 'current');
    const previous = await this.readSlot(environment, 'previous');

    if (current === '') {
      throw new DeploymentError(stateCorruptionError(environment, 'current slot is empty'));
    }
    if (previous === '') {
      throw new DeploymentError(stateCorruptionError(environment, 'previous slot is empty'));
    }
    if (current === null && previous !== null) {
      throw new DeploymentError(stateCorruptionError(environment, 'previous image recorded without a current image'));
    }
    return { environment, current, previous, pending: null };
  }

  /** Read a slot: null when the file does not exist, the line otherwise. */
  private async readSlot(environment: Environment, slot: Slot): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(this.slotPath(environment, slot), 'utf-8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    const value = raw.endsWith('\n') ? raw.slice(0, -1) : raw;
    if (/[\r\n]/.test(value)) {
      throw new DeploymentError(stateCorruptionError(environment, `${slot} slot holds more than one line`));
    }
    return value.trim();
  }

  private async writeSlot(environment: Environment, slot: Slot, value: string): Promise<void> {
    const target = this.slotPath(environment, slot);
    const tmp = `${target}.tmp-${process.pid}-${++tmpCounter}`;
    const handle = await open(tmp, 'w');
    try {
      await handle.writeFile(`${value}\n`, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmp, target);
  }

  private async removeSlot(environment: Environment, slot: Slot): Promise<void> {
    try {
      await unlink(this.slotPath(environment, slot));
    } catch (err) {
      if (!isMissing(err)) throw err;
    }
  }
}
