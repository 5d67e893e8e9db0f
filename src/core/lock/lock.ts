// SPDX-License-Identifier: Apache-2.0

import {type LockHolder} from './lock-holder.js';

/**
 * An advisory lock that serializes runs against the same deployment.
 */
export interface Lock {
  readonly lockHolder: LockHolder;

  /**
   * Acquires the lock. A lock left behind by a dead process on this host is taken over.
   *
   * @throws LockAcquisitionError if another live process holds the lock or the lock cannot be written
   */
  acquire(): Promise<void>;

  /** Attempts to acquire the lock; false when acquire() would throw. */
  tryAcquire(): Promise<boolean>;

  /** Releases the lock if this process holds it; otherwise does nothing. */
  release(): Promise<void>;

  isAcquired(): boolean;
}
