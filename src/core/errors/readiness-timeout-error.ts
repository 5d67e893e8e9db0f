// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class ReadinessTimeoutError extends DeployError {
  public constructor(
    message: string,
    public readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(message, cause, {timeoutMs});
  }
}
