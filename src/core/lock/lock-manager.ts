// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type Lock} from './lock.js';
import {FileLock} from './file-lock.js';
import {LockHolder} from './lock-holder.js';
import {PathEx} from '../../business/utils/path-ex.js';
import * as constants from '../constants.js';

/**
 * Creates the run lock of the tool home directory.
 */
@injectable()
export class LockManager {
  private readonly logger: DeployLogger;
  private readonly homeDirectory: string;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.HomeDirectory) homeDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.homeDirectory = patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name);
  }

  /** A new lock, not yet acquired. */
  public create(holder: LockHolder = LockHolder.default()): Lock {
    return new FileLock(PathEx.join(this.homeDirectory, constants.LOCK_FILE), holder, this.logger);
  }
}
