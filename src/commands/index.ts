// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';
import {container} from 'tsyringe-neo';
import {Flags, type CliOptions} from './flags.js';
import {type BaseCommand} from './base.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../core/logging/deploy-logger.js';

export interface CommandResult {
  exitCode: number;
}

/** The command a run maps to: --status and --clean select theirs, anything else deploys. */
export function commandFor(options: CliOptions): BaseCommand {
  if (options.status) {
    return container.resolve<BaseCommand>(InjectTokens.StatusCommand);
  }
  if (options.clean) {
    return container.resolve<BaseCommand>(InjectTokens.CleanCommand);
  }
  return container.resolve<BaseCommand>(InjectTokens.DeployCommand);
}

/**
 * Return the Yargs definition of the root command
 * @param signal - aborted when the operator interrupts the run
 * @param result - receives the exit code of the command that ran
 */
export function Initialize(signal: AbortSignal, result: CommandResult): CommandModule {
  return {
    command: '$0',
    describe: 'Configure and deploy the stack interactively, or report on or remove an existing deployment',
    builder: y => {
      Flags.setOptionalCommandFlags(y, ...Flags.allFlags);
      return y;
    },
    handler: async argv => {
      const options = Flags.parse(argv);
      container.resolve<DeployLogger>(InjectTokens.DeployLogger).setDevMode(options.dev);
      result.exitCode = await commandFor(options).run(options, signal);
    },
  };
}
