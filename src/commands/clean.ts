// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {BaseCommand} from './base.js';
import {type CliOptions} from './flags.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../core/logging/deploy-logger.js';
import {type LockManager} from '../core/lock/lock-manager.js';
import {ListrLock} from '../core/lock/listr-lock.js';
import {type CleanupCoordinator} from '../core/cleanup/cleanup-coordinator.js';
import {
  type CleanupConfirmations,
  type CleanupPlan,
  type CleanupReport,
  type RemovalResult,
  type ResourceClass,
} from '../core/cleanup/resource-class.js';
import {UserBreak} from '../core/errors/user-break.js';
import {DeployError} from '../core/errors/deploy-error.js';
import {EXIT_CODE_FAILURE, EXIT_CODE_SUCCESS} from '../core/error-handler.js';
import {type DeployListrTaskWrapper} from '../types/index.js';

interface CleanContext {
  plan?: CleanupPlan;
  report?: CleanupReport;
}

/**
 * Reverses a deployment. Destructive resource classes are confirmed one at a time, even with --yes.
 */
@injectable()
export class CleanCommand extends BaseCommand {
  private readonly cleanupCoordinator: CleanupCoordinator;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.LockManager) lockManager?: LockManager,
    @inject(InjectTokens.CleanupCoordinator) cleanupCoordinator?: CleanupCoordinator,
  ) {
    super(logger, lockManager);
    this.cleanupCoordinator = patchInject(cleanupCoordinator, InjectTokens.CleanupCoordinator, this.constructor.name);
  }

  public async run(options: CliOptions, _signal: AbortSignal): Promise<number> {
    const lock = this.lockManager.create();
    const context: CleanContext = {};

    try {
      await this.runTasks<CleanContext>(
        'clean',
        [
          ListrLock.newAcquireLockTask<CleanContext>(lock),
          {
            title: 'Find deployed resources',
            task: async (context_, task) => {
              context_.plan = await this.cleanupCoordinator.plan();
              const found = context_.plan.classes.filter(resourceClass => resourceClass.targets.length > 0).length;
              task.title = `Find deployed resources: ${found} resource classes to remove`;
            },
          },
          {
            title: 'Confirm cleanup',
            task: async (_, task) => {
              if (!(await this.confirm(task, 'Do you want to continue with cleanup?', options.yes))) {
                throw new UserBreak('Cleanup cancelled by the operator');
              }
            },
          },
          {
            title: 'Remove resources',
            task: async (context_, task) => {
              if (!context_.plan) {
                throw new DeployError('cleanup has no plan');
              }
              context_.report = await this.cleanupCoordinator.execute(context_.plan, this.confirmations(task));
            },
          },
        ],
        context,
      );
    } finally {
      await lock.release();
    }

    const report = context.report;
    if (!report) {
      throw new DeployError('cleanup finished without a report');
    }
    this.logger.showList(
      'Cleanup results',
      report.results.map(result => CleanCommand.formatResult(result)),
    );
    if (report.warnings.length > 0) {
      this.logger.showList('Cleanup warnings', [...report.warnings]);
    }
    return report.results.some(result => result.status === 'failed') ? EXIT_CODE_FAILURE : EXIT_CODE_SUCCESS;
  }

  /** Destructive classes are asked for one by one; without a terminal they are kept. */
  private confirmations(task: DeployListrTaskWrapper<CleanContext>): CleanupConfirmations {
    return {
      confirm: async (resourceClass: ResourceClass) => {
        if (!process.stdout.isTTY || !process.stdin.isTTY) {
          this.logger.warn(`Keeping ${resourceClass.name}: no terminal to confirm on`);
          return false;
        }
        return await this.confirm(task, `Remove ${resourceClass.description} (${resourceClass.targets.join(', ')})?`);
      },
    };
  }

  /** e.g. `containers: removed (magma-magmad, magma-mme)` */
  public static formatResult(result: RemovalResult): string {
    switch (result.status) {
      case 'removed': {
        return `${result.name}: ${chalk.green('removed')} (${result.targets.join(', ')})`;
      }
      case 'declined': {
        return `${result.name}: ${chalk.yellow('kept')} (${result.targets.join(', ')})`;
      }
      case 'failed': {
        return `${result.name}: ${chalk.red('failed')} - ${result.error ?? 'unknown error'}`;
      }
      case 'nothing-to-remove': {
        return result.error
          ? `${result.name}: ${chalk.gray('not checked')} - ${result.error}`
          : `${result.name}: ${chalk.gray('nothing to remove')}`;
      }
    }
  }
}
