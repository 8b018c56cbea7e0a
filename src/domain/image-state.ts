/**
 * Per-environment image state.
 */

import { Environment, ImageReference } from './environment';

/** The current/previous pair plus the transient rotation slot. */
export interface ImageState {
  environment: Environment;
  current: ImageReference | null;
  previous: ImageReference | null;
  /** Only non-null in the middle of a rotation; never returned by read(). */
  pending: ImageReference | null;
}

/** Last successful deploy, kept beside the image slots for status output. */
export interface DeployRecord {
  commit: string;
  deployedAt: string;
}

export function emptyImageState(environment: Environment): ImageState {
  return { environment, current: null, previous: null, pending: null };
}
