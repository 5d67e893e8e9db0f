// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

/** Raised when a deployment descriptor cannot be rendered from the configuration record. */
export class ArtifactError extends DeployError {
  public constructor(
    message: string,
    public readonly componentId: string,
    cause?: unknown,
  ) {
    super(message, cause, {componentId});
  }
}
