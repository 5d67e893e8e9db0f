// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {type Lock} from './lock.js';
import {LockHolder} from './lock-holder.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {LockAcquisitionError} from '../errors/lock-acquisition-error.js';
import {Duration} from '../time/duration.js';
import {errorMessage} from '../helpers.js';

/** An unreadable lock file or takeover guard younger than this may still be in use. */
const UNREADABLE_LOCK_GRACE = Duration.ofSeconds(10);

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * A lock file created exclusively, holding the JSON of its holder.
 */
export class FileLock implements Lock {
  private acquired = false;

  public constructor(
    public readonly filePath: string,
    public readonly lockHolder: LockHolder,
    private readonly logger: DeployLogger,
  ) {}

  public async acquire(): Promise<void> {
    if (this.acquired) {
      return;
    }
    fs.mkdirSync(path.dirname(this.filePath), {recursive: true});

    if (this.create()) {
      return;
    }

    const current = this.readHolder();
    if (current instanceof LockHolder && current.equals(this.lockHolder)) {
      this.acquired = true;
      return;
    }
    if (this.isStale(current)) {
      if (!this.createTakeoverGuard()) {
        throw new LockAcquisitionError(`Lock ${this.filePath} is being taken over by another run`);
      }
      try {
        if (this.takeOver()) {
          return;
        }
      } finally {
        fs.rmSync(this.takeoverGuardPath(), {force: true});
      }
    }

    const holder = this.readHolder();
    throw new LockAcquisitionError(
      holder instanceof LockHolder
        ? `Lock ${this.filePath} is held by ${holder.toString()}`
        : `Lock ${this.filePath} is held by another run`,
    );
  }

  public async tryAcquire(): Promise<boolean> {
    try {
      await this.acquire();
      return true;
    } catch (error) {
      this.logger.debug(`Lock not acquired: ${errorMessage(error)}`);
      return false;
    }
  }

  public async release(): Promise<void> {
    if (!this.acquired) {
      return;
    }
    this.acquired = false;

    const current = this.readHolder();
    if (current instanceof LockHolder && current.equals(this.lockHolder)) {
      fs.rmSync(this.filePath, {force: true});
      this.logger.debug(`Released lock ${this.filePath}`);
    } else {
      this.logger.warn(`Lock ${this.filePath} is no longer ours, leaving it in place`);
    }
  }

  public isAcquired(): boolean {
    return this.acquired;
  }

  /** Replaces a stale lock. Runs under the takeover guard, which is where staleness is decided. */
  private takeOver(): boolean {
    const current = this.readHolder();
    if (!this.isStale(current)) {
      return false;
    }
    this.logger.warn(`Taking over stale lock ${this.filePath}`, {
      holder: current instanceof LockHolder ? current.toObject() : current,
    });
    fs.rmSync(this.filePath, {force: true});
    return this.create();
  }

  private takeoverGuardPath(): string {
    return `${this.filePath}.takeover`;
  }

  /**
   * Only one run at a time may replace a stale lock. A guard left behind by a run that died mid-takeover is cleared
   * after the grace period.
   *
   * @returns false if another takeover is in progress
   */
  private createTakeoverGuard(): boolean {
    const guardPath = this.takeoverGuardPath();
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        fs.writeFileSync(guardPath, this.lockHolder.toJson(), {flag: 'wx', mode: 0o600});
        return true;
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) {
          throw new LockAcquisitionError(`Failed to create lock takeover guard ${guardPath}`, error);
        }
      }
      if (!this.isAbandoned(guardPath)) {
        return false;
      }
      fs.rmSync(guardPath, {force: true});
    }
    return false;
  }

  private isAbandoned(guardPath: string): boolean {
    try {
      return Date.now() - fs.statSync(guardPath).mtimeMs > UNREADABLE_LOCK_GRACE.toMillis();
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return true;
      }
      throw new LockAcquisitionError(`Failed to read lock takeover guard ${guardPath}`, error);
    }
  }

  /** @returns false if the file already exists */
  private create(): boolean {
    try {
      fs.writeFileSync(this.filePath, this.lockHolder.toJson(), {flag: 'wx', mode: 0o600});
      this.acquired = true;
      this.logger.debug(`Acquired lock ${this.filePath}`, {holder: this.lockHolder.toObject()});
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw new LockAcquisitionError(`Failed to create lock file ${this.filePath}`, error);
    }
  }

  /**
   * @returns the holder, 'missing' when the file vanished, or 'unreadable' with its age in milliseconds
   */
  private readHolder(): LockHolder | 'missing' | {unreadableForMillis: number} {
    let content: string;
    let modified: number;
    try {
      content = fs.readFileSync(this.filePath, 'utf8');
      modified = fs.statSync(this.filePath).mtimeMs;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return 'missing';
      }
      throw new LockAcquisitionError(`Failed to read lock file ${this.filePath}`, error);
    }

    try {
      return LockHolder.fromJson(content);
    } catch {
      return {unreadableForMillis: Date.now() - modified};
    }
  }

  private isStale(current: LockHolder | 'missing' | {unreadableForMillis: number}): boolean {
    if (current === 'missing') {
      return true;
    }
    if (current instanceof LockHolder) {
      return current.isSameHost(this.lockHolder) && !current.isProcessAlive();
    }
    return current.unreadableForMillis > UNREADABLE_LOCK_GRACE.toMillis();
  }
}
