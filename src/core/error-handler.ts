// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type DeployLogger} from './logging/deploy-logger.js';
import {UserBreak} from './errors/user-break.js';
import {SilentBreak} from './errors/silent-break.js';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_FAILURE = 1;

@injectable()
export class ErrorHandler {
  private readonly logger: DeployLogger;

  public constructor(@inject(InjectTokens.DeployLogger) logger?: DeployLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
  }

  /**
   * Reports the error to the operator and the run log.
   *
   * @returns the process exit code the error maps to
   */
  public handle(error: unknown): number {
    const error_ = this.extractBreak(error);
    if (error_ instanceof UserBreak) {
      this.logger.showUser(error_.message);
      return EXIT_CODE_FAILURE;
    }
    if (error_ instanceof SilentBreak) {
      this.logger.info(error_.message);
      return EXIT_CODE_SUCCESS;
    }

    this.logger.showUserError(error);
    return EXIT_CODE_FAILURE;
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak or SilentBreak
   * Returns the break if found, otherwise false
   */
  private extractBreak(error: unknown): UserBreak | SilentBreak | false {
    if (error instanceof UserBreak || error instanceof SilentBreak) {
      return error;
    }
    if (error instanceof Error && error.cause !== undefined) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
