// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {BaseCommand} from './base.js';
import {type CliOptions} from './flags.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../core/logging/deploy-logger.js';
import {type LockManager} from '../core/lock/lock-manager.js';
import {type StatusInspector} from '../core/status/status-inspector.js';
import {FacetState, type StatusFacet, type StatusSnapshot} from '../core/status/status-snapshot.js';
import {EXIT_CODE_SUCCESS} from '../core/error-handler.js';

interface StatusContext {
  snapshot?: StatusSnapshot;
}

const STATE_COLORS: ReadonlyMap<FacetState, (text: string) => string> = new Map([
  [FacetState.Healthy, chalk.green],
  [FacetState.Degraded, chalk.yellow],
  [FacetState.Unavailable, chalk.red],
  [FacetState.Unknown, chalk.gray],
]);

/**
 * Reports a point-in-time health snapshot of the deployment. Read only, so no lock is taken.
 */
@injectable()
export class StatusCommand extends BaseCommand {
  private readonly statusInspector: StatusInspector;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.LockManager) lockManager?: LockManager,
    @inject(InjectTokens.StatusInspector) statusInspector?: StatusInspector,
  ) {
    super(logger, lockManager);
    this.statusInspector = patchInject(statusInspector, InjectTokens.StatusInspector, this.constructor.name);
  }

  public async run(_options: CliOptions, _signal: AbortSignal): Promise<number> {
    const context = await this.runTasks<StatusContext>(
      'status',
      [
        {
          title: 'Inspect deployment',
          task: async (context_, task) => {
            context_.snapshot = await this.statusInspector.snapshot();
            const healthy = context_.snapshot.facets.filter(facet => facet.state === FacetState.Healthy).length;
            task.title = `Inspect deployment: ${healthy}/${context_.snapshot.facets.length} healthy`;
          },
        },
      ],
      {},
    );

    if (context.snapshot) {
      this.logger.showList(
        `Status at ${context.snapshot.takenAt.toISOString()}`,
        context.snapshot.facets.map(facet => StatusCommand.formatFacet(facet)),
      );
    }
    return EXIT_CODE_SUCCESS;
  }

  /** e.g. `memory: Degraded - 4096 MB total, 2048 MB available` */
  public static formatFacet(facet: StatusFacet): string {
    const color = STATE_COLORS.get(facet.state) ?? chalk.white;
    return `${facet.name}: ${color(facet.state)}${facet.detail ? ` - ${facet.detail}` : ''}`;
  }
}
