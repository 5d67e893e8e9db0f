// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class UnsupportedPlatformError extends DeployError {
  public constructor(public readonly osFamily: string) {
    super(`Unsupported OS family '${osFamily}', install the prerequisites manually`, undefined, {osFamily});
  }
}
