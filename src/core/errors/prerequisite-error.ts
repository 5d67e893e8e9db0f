// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class PrerequisiteError extends DeployError {
  public constructor(
    message: string,
    public readonly missing: readonly string[] = [],
    cause?: unknown,
  ) {
    super(message, cause, {missing});
  }
}
