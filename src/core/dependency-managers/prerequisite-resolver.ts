// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type ShellRunner} from '../shell-runner.js';
import {type ToolProbe} from './tool-probe.js';
import {type ToolName} from './tool-name.js';
import {detectOsFamily, type OsFamily} from './os-family.js';
import {type InstallPlan, type InstallStep, type InstallStrategy} from './install-strategy.js';
import {DebianInstallStrategy} from './debian-install-strategy.js';
import {RhelInstallStrategy} from './rhel-install-strategy.js';
import {UnsupportedPlatformError} from '../errors/unsupported-platform-error.js';
import {PrerequisiteError} from '../errors/prerequisite-error.js';
import {errorMessage} from '../helpers.js';
import {type DeployListrTask, type DeployListrTaskWrapper} from '../../types/index.js';

export type PrerequisiteSet = ReadonlyMap<ToolName, boolean>;

/** Decides whether the missing tools may be installed. */
export type InstallConfirmation<T> = (missing: readonly ToolName[], task: DeployListrTaskWrapper<T>) => Promise<boolean>;

export interface PlanExecutionResult {
  readonly succeeded: readonly InstallStep[];
  /** Steps whose tool was already present when the step came up. */
  readonly skipped: readonly InstallStep[];
  readonly failed?: {readonly step: InstallStep; readonly error: unknown};
  /** Steps never attempted because an earlier step failed. */
  readonly remaining: readonly InstallStep[];
}

const STRATEGIES: ReadonlyMap<OsFamily, InstallStrategy> = new Map<OsFamily, InstallStrategy>([
  ['debian', new DebianInstallStrategy()],
  ['rhel', new RhelInstallStrategy()],
]);

/**
 * Probes for the external tools the deployment drives and installs the missing ones.
 */
@injectable()
export class PrerequisiteResolver {
  private readonly logger: DeployLogger;
  private readonly shellRunner: ShellRunner;
  private readonly probe: ToolProbe;
  private readonly osReleasePath: string;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.ShellRunner) shellRunner?: ShellRunner,
    @inject(InjectTokens.ToolProbe) probe?: ToolProbe,
    @inject(InjectTokens.OsReleasePath) osReleasePath?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.shellRunner = patchInject(shellRunner, InjectTokens.ShellRunner, this.constructor.name);
    this.probe = patchInject(probe, InjectTokens.ToolProbe, this.constructor.name);
    this.osReleasePath = patchInject(osReleasePath, InjectTokens.OsReleasePath, this.constructor.name);
  }

  /** Presence of each tool; nothing is run or changed. */
  public check(tools: readonly ToolName[]): PrerequisiteSet {
    const result = new Map<ToolName, boolean>();
    for (const tool of tools) {
      result.set(tool, this.probe.isPresent(tool));
    }
    this.logger.debug('Prerequisite check', {tools: Object.fromEntries(result)});
    return result;
  }

  public missing(prerequisites: PrerequisiteSet): ToolName[] {
    return [...prerequisites].filter(([, present]) => !present).map(([tool]) => tool);
  }

  /** Reads the OS family of this machine; unreadable release information maps to 'unknown'. */
  public detectOsFamily(): OsFamily {
    try {
      return detectOsFamily(fs.readFileSync(this.osReleasePath, 'utf8'));
    } catch (error) {
      this.logger.warn(`Unable to read ${this.osReleasePath}: ${errorMessage(error)}`);
      return 'unknown';
    }
  }

  /**
   * Builds the ordered install plan for the missing tools.
   *
   * @throws UnsupportedPlatformError if the OS family has no install strategy
   */
  public resolveMissing(missing: readonly ToolName[], osFamily: OsFamily): InstallPlan {
    const strategy = STRATEGIES.get(osFamily);
    if (!strategy) {
      throw new UnsupportedPlatformError(osFamily);
    }
    return {osFamily, steps: missing.map(tool => strategy.stepFor(tool))};
  }

  /**
   * Runs the plan step by step. A step whose tool is already present is skipped; the first failing step stops the
   * plan and the rest is reported as remaining.
   */
  public async executePlan(plan: InstallPlan): Promise<PlanExecutionResult> {
    const succeeded: InstallStep[] = [];
    const skipped: InstallStep[] = [];

    for (const [index, step] of plan.steps.entries()) {
      if (this.probe.isPresent(step.tool)) {
        this.logger.info(`Skipping '${step.description}', ${step.tool} is already present`);
        skipped.push(step);
        continue;
      }

      try {
        for (const command of step.commands) {
          await this.shellRunner.run(command);
        }
      } catch (error) {
        this.logger.error(`Install step '${step.description}' failed: ${errorMessage(error)}`);
        return {succeeded, skipped, failed: {step, error}, remaining: plan.steps.slice(index + 1)};
      }

      succeeded.push(step);
    }

    return {succeeded, skipped, remaining: []};
  }

  /**
   * Listr tasks that check the tools, and install the missing ones when the confirmation allows it.
   *
   * @throws PrerequisiteError from the task if a tool is still missing afterwards
   */
  public taskResolvePrerequisites<T>(
    tools: readonly ToolName[],
    confirmInstall: InstallConfirmation<T>,
  ): DeployListrTask<T>[] {
    return [
      {
        title: `Check prerequisites [OS: ${os.platform()}, Release: ${os.release()}, Arch: ${os.arch()}]`,
        task: async (_, task) => {
          const missing = this.missing(this.check(tools));
          if (missing.length === 0) {
            task.title += ': all present';
            return;
          }
          if (!(await confirmInstall(missing, task))) {
            throw new PrerequisiteError(`Missing prerequisites: ${missing.join(', ')}`, missing);
          }

          const plan = this.resolveMissing(missing, this.detectOsFamily());
          task.output = `Installing ${missing.join(', ')} for ${plan.osFamily}`;
          const result = await this.executePlan(plan);
          if (result.failed) {
            const stillMissing = [result.failed.step, ...result.remaining].map(step => step.tool);
            throw new PrerequisiteError(
              `Failed to ${result.failed.step.description.toLowerCase()}; still missing: ${stillMissing.join(', ')}` +
                (result.succeeded.length > 0
                  ? `; installed: ${result.succeeded.map(step => step.tool).join(', ')}`
                  : ''),
              stillMissing,
              result.failed.error,
            );
          }
        },
      },
    ];
  }
}
