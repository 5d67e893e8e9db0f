// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

/** The operator declined to continue. */
export class UserBreak extends DeployError {
  public constructor(message: string) {
    super(message);
  }
}
