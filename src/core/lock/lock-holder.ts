// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import process from 'node:process';
import {MissingArgumentError} from '../errors/missing-argument-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

interface LockHolderObject {
  username: string;
  hostname: string;
  pid: number;
}

/**
 * The owner of a lock, identified by username, hostname and process id.
 */
export class LockHolder {
  private constructor(
    public readonly username: string,
    public readonly hostname: string,
    public readonly processId: number,
  ) {
    if (!username) {
      throw new MissingArgumentError('username is required');
    }
    if (!hostname) {
      throw new MissingArgumentError('hostname is required');
    }
    if (!Number.isInteger(processId) || processId <= 0) {
      throw new MissingArgumentError('pid is required');
    }
  }

  public static of(username: string, hostname: string = os.hostname(), processId: number = process.pid): LockHolder {
    return new LockHolder(username, hostname, processId);
  }

  /** The current user, host and process. */
  public static default(): LockHolder {
    return LockHolder.of(os.userInfo().username);
  }

  public toObject(): LockHolderObject {
    return {username: this.username, hostname: this.hostname, pid: this.processId};
  }

  public equals(other: LockHolder): boolean {
    return this.username === other.username && this.hostname === other.hostname && this.processId === other.processId;
  }

  public isSameHost(other: LockHolder): boolean {
    return this.hostname === other.hostname;
  }

  /**
   * Whether the holder's process still runs. Only meaningful for holders on this host.
   */
  public isProcessAlive(): boolean {
    try {
      return process.kill(this.processId, 0);
    } catch (error) {
      // the process exists but belongs to someone else
      return error instanceof Error && 'code' in error && error.code === 'EPERM';
    }
  }

  public toString(): string {
    return `${this.username}@${this.hostname} (pid ${this.processId})`;
  }

  public toJson(): string {
    return JSON.stringify(this.toObject());
  }

  /**
   * @throws IllegalArgumentError if the text is not a serialized lock holder
   */
  public static fromJson(json: string): LockHolder {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw new IllegalArgumentError('lock holder is not valid JSON', json, error);
    }
    if (parsed === null || typeof parsed !== 'object') {
      throw new IllegalArgumentError('lock holder must be an object', json);
    }

    const fields = new Map(Object.entries(parsed));
    const username = fields.get('username');
    const hostname = fields.get('hostname');
    const pid = fields.get('pid');
    if (typeof username !== 'string' || typeof hostname !== 'string' || typeof pid !== 'number') {
      throw new IllegalArgumentError('lock holder needs username, hostname and pid', json);
    }
    return new LockHolder(username, hostname, pid);
  }
}
