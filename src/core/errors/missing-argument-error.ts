// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class MissingArgumentError extends DeployError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
