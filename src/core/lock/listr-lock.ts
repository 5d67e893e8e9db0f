// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {type Lock} from './lock.js';
import {LockAcquisitionError} from '../errors/lock-acquisition-error.js';
import {type DeployListrTask, type DeployListrTaskWrapper} from '../../types/index.js';
import {Duration} from '../time/duration.js';
import {sleep} from '../helpers.js';
import * as constants from '../constants.js';

/**
 * A utility class for managing lock acquisition tasks in Listr2 based workflows.
 */
export class ListrLock {
  public static readonly ACQUIRE_LOCK_TASK_TITLE = 'Acquire lock';

  private constructor() {
    throw new Error('This class cannot be instantiated');
  }

  /**
   * A task that acquires the lock, retrying while another run holds it.
   */
  public static newAcquireLockTask<T>(
    lock: Lock,
    maxAttempts: number = constants.LOCK_ACQUIRE_ATTEMPTS,
    retryDelay: Duration = Duration.ofSeconds(constants.LOCK_RETRY_DELAY_SECONDS),
  ): DeployListrTask<T> {
    return {
      title: ListrLock.ACQUIRE_LOCK_TASK_TITLE,
      task: async (_, task) => {
        await ListrLock.acquireWithRetry(lock, task, maxAttempts, retryDelay);
      },
    };
  }

  /**
   * @throws LockAcquisitionError if the lock could not be acquired after the maximum number of attempts
   */
  public static async acquireWithRetry<T>(
    lock: Lock,
    task: DeployListrTaskWrapper<T>,
    maxAttempts: number,
    retryDelay: Duration,
  ): Promise<void> {
    const title = task.title;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await lock.acquire();
        task.title =
          `${title} - ${chalk.green('lock acquired successfully')}` +
          `, attempt: ${chalk.cyan(attempt.toString())}/${chalk.cyan(maxAttempts.toString())}`;
        return;
      } catch (error) {
        lastError = error;
        task.title =
          `${title} - ${chalk.gray(`lock exists, attempting again in ${retryDelay.toString()}`)}` +
          `, attempt: ${chalk.cyan(attempt.toString())}/${chalk.cyan(maxAttempts.toString())}`;
        if (attempt < maxAttempts) {
          await sleep(retryDelay);
        }
      }
    }

    task.title =
      `${title} - ${chalk.red('failed to acquire lock, max attempts reached!')}` +
      `, attempt: ${chalk.cyan(maxAttempts.toString())}/${chalk.cyan(maxAttempts.toString())}`;

    throw new LockAcquisitionError(`Failed to acquire lock, max attempts reached (${maxAttempts})`, lastError);
  }
}
