// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class RuntimeAdapterError extends DeployError {
  /**
   * Create an error for a runtime invocation that did not succeed
   *
   * @param message - error message
   * @param retryable - true when repeating the same invocation may succeed
   * @param cause - source error (if any)
   */
  public constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: unknown,
  ) {
    super(message, cause, {retryable});
  }
}
