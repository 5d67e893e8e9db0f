// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {type Chart} from '../../model/chart.js';
import {applyUpgradeChartOptions, type UpgradeChartOptions} from '../../model/upgrade-chart-options.js';
import {MissingArgumentError} from '../../../../core/errors/missing-argument-error.js';

/**
 * A request to install or upgrade a release.
 */
export class ChartUpgradeRequest implements HelmRequest {
  /**
   * @param releaseName - the name of the release to install or upgrade
   * @param chart - the chart to deploy
   * @param options - the options to use
   */
  public constructor(
    public readonly releaseName: string,
    public readonly chart: Chart,
    public readonly options: UpgradeChartOptions,
  ) {
    if (!releaseName || releaseName.trim() === '') {
      throw new MissingArgumentError('releaseName must not be null or blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('upgrade');
    applyUpgradeChartOptions(this.options, builder);
    builder.positional(this.releaseName).positional(this.chart.qualified());
  }
}
