// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {Listr} from 'listr2';
import {ListrInquirerPromptAdapter} from '@listr2/prompt-adapter-inquirer';
import {confirm as confirmPrompt} from '@inquirer/prompts';
import {inject} from 'tsyringe-neo';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../core/logging/deploy-logger.js';
import {type LockManager} from '../core/lock/lock-manager.js';
import {DeployError} from '../core/errors/deploy-error.js';
import {errorMessage} from '../core/helpers.js';
import {type DeployListrTask, type DeployListrTaskWrapper} from '../types/index.js';
import {type CliOptions} from './flags.js';
import * as constants from '../core/constants.js';

export abstract class BaseCommand {
  protected readonly logger: DeployLogger;
  protected readonly lockManager: LockManager;

  protected constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.LockManager) lockManager?: LockManager,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.lockManager = patchInject(lockManager, InjectTokens.LockManager, this.constructor.name);
  }

  /**
   * Runs the command.
   *
   * @returns the process exit code
   */
  public abstract run(options: CliOptions, signal: AbortSignal): Promise<number>;

  /**
   * Setup home directories
   * @param directories a list of directories that need to be created in sequence
   */
  public setupHomeDirectory(directories: string[]): string[] {
    try {
      for (const directoryPath of directories) {
        if (!fs.existsSync(directoryPath)) {
          fs.mkdirSync(directoryPath, {recursive: true});
        }
        this.logger.debug(`OK: setup directory: ${directoryPath}`);
      }
    } catch (error) {
      throw new DeployError(`failed to create directory: ${errorMessage(error)}`, error);
    }

    return directories;
  }

  public setupHomeDirectoryTask<T>(directories: string[]): DeployListrTask<T> {
    return {
      title: 'Setup home directory',
      task: () => {
        this.setupHomeDirectory(directories);
      },
    };
  }

  /**
   * Asks a yes/no question through the running task.
   *
   * @param assumeYes - answer yes without asking
   * @throws DeployError if a question is needed but there is no terminal to ask on
   */
  protected async confirm<T>(task: DeployListrTaskWrapper<T>, message: string, assumeYes = false): Promise<boolean> {
    if (assumeYes) {
      return true;
    }
    if (!process.stdout.isTTY || !process.stdin.isTTY) {
      throw new DeployError(`Cannot ask '${message}' in non-interactive mode, pass --yes to proceed`);
    }
    return await task.prompt(ListrInquirerPromptAdapter).run(confirmPrompt, {message, default: false});
  }

  /**
   * Runs the tasks one after the other. SIGINT is left to the command so that an interrupted run still reaches its
   * summary.
   */
  protected async runTasks<T>(title: string, tasks: DeployListrTask<T>[], context: T): Promise<T> {
    const listr = new Listr<T>(tasks, {
      concurrent: false,
      registerSignalListeners: false,
      rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
    });

    try {
      return await listr.run(context);
    } catch (error) {
      if (error instanceof DeployError) {
        throw error;
      }
      throw new DeployError(`Error running ${title}: ${errorMessage(error)}`, error);
    }
  }
}
