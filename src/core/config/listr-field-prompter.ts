// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {ListrInquirerPromptAdapter} from '@listr2/prompt-adapter-inquirer';
import {input as inputPrompt, password as passwordPrompt} from '@inquirer/prompts';
import {type FieldPrompter} from './field-prompter.js';
import {type ConfigField} from './config-fields.js';
import {type DeployListrTaskWrapper} from '../../types/index.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {DeployError} from '../errors/deploy-error.js';

/** Prompts through the inquirer adapter of the running Listr2 task. */
export class ListrFieldPrompter<T> implements FieldPrompter {
  public constructor(
    private readonly task: DeployListrTaskWrapper<T>,
    private readonly logger: DeployLogger,
  ) {}

  public async ask(field: ConfigField, defaultValue: string | undefined): Promise<string> {
    if (!process.stdout.isTTY || !process.stdin.isTTY) {
      // use --config to replay a persisted configuration instead
      throw new DeployError(`Cannot prompt for ${field.key} in non-interactive mode`);
    }

    const adapter = this.task.prompt(ListrInquirerPromptAdapter);
    if (field.secret) {
      return await adapter.run(passwordPrompt, {message: field.label, mask: '*'});
    }
    return await adapter.run(inputPrompt, {message: field.label, default: defaultValue});
  }

  public reject(field: ConfigField, value: string, reason: string): void {
    this.logger.warn(`Rejected value for ${field.key}: ${reason}`);
    this.task.output = chalk.red(`${field.label} ${field.secret ? '' : `'${value}' `}${reason}`);
  }
}
