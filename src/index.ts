// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import {ListrLogger} from 'listr2';

import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import {CustomProcessOutput} from './core/process-output.js';
import {type DeployLogger} from './core/logging/deploy-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {DeployError} from './core/errors/deploy-error.js';
import {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
import {EXIT_CODE_SUCCESS} from './core/error-handler.js';
import {getVersion} from '../version.js';

/**
 * Runs the CLI.
 *
 * @param argv - process arguments, including the node binary and the script
 * @param context - receives the logger so that the entrypoint can report through it
 * @returns the process exit code
 */
export async function main(argv: string[], context?: {logger?: DeployLogger}): Promise<number> {
  try {
    Container.getInstance().init();
  } catch (error) {
    throw new DeployError('Error initializing container', error);
  }

  const logger = container.resolve<DeployLogger>(InjectTokens.DeployLogger);
  if (context) {
    // save the logger so that the entrypoint can use it to report the outcome
    context.logger = logger;
  }

  logger.debug('Initializing magma-deploy CLI', {argv: argv.slice(2)});
  constants.LISTR_DEFAULT_RENDERER_OPTION.logger = new ListrLogger({processOutput: new CustomProcessOutput(logger)});

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.showUser(chalk.yellow('\nInterrupt received, stopping after the current step'));
    controller.abort();
  };
  // a second interrupt falls through to the default handler and ends the process
  process.once('SIGINT', onInterrupt);

  const result: commands.CommandResult = {exitCode: EXIT_CODE_SUCCESS};
  const rootCmd = yargs(hideBin(argv))
    .scriptName('magma-deploy')
    .usage('Usage:\n  magma-deploy [options]')
    .version(getVersion())
    .alias('v', 'version')
    .alias('h', 'help')
    .command(commands.Initialize(controller.signal, result))
    .strict()
    .exitProcess(false);

  rootCmd.fail((message, error) => {
    if (error) {
      throw error;
    }
    rootCmd.showHelp();
    throw new IllegalArgumentError(message);
  });

  try {
    await rootCmd.parseAsync();
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
  return result.exitCode;
}
