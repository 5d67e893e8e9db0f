// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

/** Operator input that failed a field validator. */
export class ValidationError extends DeployError {
  /**
   * @param field - key of the offending field, as it appears in the persisted configuration file
   * @param reason - human readable description of what is wrong
   * @param cause - source error (if any)
   */
  public constructor(
    public readonly field: string,
    public readonly reason: string,
    cause?: unknown,
  ) {
    super(`Invalid value for ${field}: ${reason}`, cause, {field, reason});
  }
}
