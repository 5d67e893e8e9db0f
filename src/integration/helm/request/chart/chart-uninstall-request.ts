// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {MissingArgumentError} from '../../../../core/errors/missing-argument-error.js';

/**
 * A request to uninstall a release.
 */
export class ChartUninstallRequest implements HelmRequest {
  public constructor(
    private readonly releaseName: string,
    private readonly namespace: string,
  ) {
    if (!releaseName || releaseName.trim() === '') {
      throw new MissingArgumentError('releaseName must not be null or blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('uninstall').argument('namespace', this.namespace).positional(this.releaseName);
  }
}
