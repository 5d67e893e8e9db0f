// SPDX-License-Identifier: Apache-2.0

import {type Repository} from './model/repository.js';
import {type Chart} from './model/chart.js';
import {type ReleaseItem} from './model/release-item.js';
import {type UpgradeChartOptions} from './model/upgrade-chart-options.js';

/**
 * The cluster package manager, driven through its command line.
 */
export interface HelmClient {
  /** Adds the repository, replacing an entry of the same name. */
  addRepository(repository: Repository, signal?: AbortSignal): Promise<void>;

  updateRepositories(signal?: AbortSignal): Promise<void>;

  /** Installs the release, or upgrades it in place when it already exists. */
  upgradeChart(releaseName: string, chart: Chart, options: UpgradeChartOptions, signal?: AbortSignal): Promise<void>;

  uninstallChart(releaseName: string, namespace: string, signal?: AbortSignal): Promise<void>;

  /**
   * @param allNamespaces - when true the namespace is ignored
   */
  listReleases(allNamespaces: boolean, namespace?: string): Promise<ReleaseItem[]>;
}
