// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type HelmClient} from '../helm-client.js';
import {HelmExecutionBuilder} from '../execution/helm-execution-builder.js';
import {type HelmRequest} from '../request/helm-request.js';
import {type Repository} from '../model/repository.js';
import {type Chart} from '../model/chart.js';
import {type ReleaseItem} from '../model/release-item.js';
import {type UpgradeChartOptions} from '../model/upgrade-chart-options.js';
import {RepositoryAddRequest} from '../request/repository/repository-add-request.js';
import {RepositoryUpdateRequest} from '../request/repository/repository-update-request.js';
import {ChartUpgradeRequest} from '../request/chart/chart-upgrade-request.js';
import {ChartUninstallRequest} from '../request/chart/chart-uninstall-request.js';
import {ReleaseListRequest} from '../request/release/release-list-request.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type ShellRunner} from '../../../core/shell-runner.js';
import {DeployError} from '../../../core/errors/deploy-error.js';

/**
 * The default implementation of the HelmClient interface. Every invocation goes through the ShellRunner so that its
 * output lands in the run log.
 */
@injectable()
export class DefaultHelmClient implements HelmClient {
  private readonly shellRunner: ShellRunner;

  public constructor(@inject(InjectTokens.ShellRunner) shellRunner?: ShellRunner) {
    this.shellRunner = patchInject(shellRunner, InjectTokens.ShellRunner, this.constructor.name);
  }

  public async addRepository(repository: Repository, signal?: AbortSignal): Promise<void> {
    await this.execute(new RepositoryAddRequest(repository), signal);
  }

  public async updateRepositories(signal?: AbortSignal): Promise<void> {
    await this.execute(new RepositoryUpdateRequest(), signal);
  }

  public async upgradeChart(
    releaseName: string,
    chart: Chart,
    options: UpgradeChartOptions,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.execute(new ChartUpgradeRequest(releaseName, chart, options), signal);
  }

  public async uninstallChart(releaseName: string, namespace: string, signal?: AbortSignal): Promise<void> {
    await this.execute(new ChartUninstallRequest(releaseName, namespace), signal);
  }

  public async listReleases(allNamespaces: boolean, namespace?: string): Promise<ReleaseItem[]> {
    const output = await this.execute(new ReleaseListRequest(allNamespaces, namespace));
    return DefaultHelmClient.parseReleases(output.join('\n'));
  }

  /**
   * Parses `helm list --output json`.
   *
   * @throws DeployError if the text is not a JSON array
   */
  public static parseReleases(json: string): ReleaseItem[] {
    if (json.trim() === '') {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw new DeployError('unexpected helm list output', error);
    }
    if (!Array.isArray(parsed)) {
      throw new DeployError('unexpected helm list output: not an array');
    }

    const text = (value: unknown): string => (typeof value === 'string' ? value : '');
    const releases: ReleaseItem[] = [];
    for (const entry of parsed) {
      if (entry !== null && typeof entry === 'object') {
        const item = new Map(Object.entries(entry));
        releases.push({
          name: text(item.get('name')),
          namespace: text(item.get('namespace')),
          status: text(item.get('status')),
          chart: text(item.get('chart')),
        });
      }
    }
    return releases;
  }

  private execute(request: HelmRequest, signal?: AbortSignal): Promise<string[]> {
    const builder = new HelmExecutionBuilder();
    request.apply(builder);
    return this.shellRunner.run(builder.build(), false, {signal});
  }
}
