// SPDX-License-Identifier: Apache-2.0

import {MissingArgumentError} from '../../../core/errors/missing-argument-error.js';
import {shellQuote} from '../../../core/helpers.js';

/**
 * A builder for a helm command line.
 */
export class HelmExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL = 'value must not be null';

  private readonly _subcommands: string[] = [];
  private readonly _arguments: Map<string, string> = new Map();
  private readonly _optionsWithMultipleValues: Array<{key: string; value: string[]}> = [];
  private readonly _flags: string[] = [];
  private readonly _positionals: string[] = [];

  public constructor(private readonly helmExecutable: string = 'helm') {}

  public subcommands(...commands: string[]): HelmExecutionBuilder {
    this._subcommands.push(...commands);
    return this;
  }

  /** Adds `--name value`; a later call with the same name replaces the value. */
  public argument(name: string, value: string): HelmExecutionBuilder {
    if (!name) {
      throw new MissingArgumentError(HelmExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new MissingArgumentError(HelmExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._arguments.set(name, value);
    return this;
  }

  /** Adds `--name value` once per value. */
  public optionsWithMultipleValues(name: string, value: string[]): HelmExecutionBuilder {
    if (!name) {
      throw new MissingArgumentError(HelmExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    this._optionsWithMultipleValues.push({key: name, value});
    return this;
  }

  public positional(value: string): HelmExecutionBuilder {
    if (!value) {
      throw new MissingArgumentError(HelmExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._positionals.push(value);
    return this;
  }

  public flag(flag: string): HelmExecutionBuilder {
    if (!flag) {
      throw new MissingArgumentError('flag must not be null');
    }
    this._flags.push(flag);
    return this;
  }

  /** The argument vector, executable excluded. */
  public buildArguments(): string[] {
    const command: string[] = [...this._subcommands, ...this._flags];

    for (const [key, value] of this._arguments.entries()) {
      command.push(`--${key}`, value);
    }

    for (const entry of this._optionsWithMultipleValues) {
      for (const value of entry.value) {
        command.push(`--${entry.key}`, value);
      }
    }

    command.push(...this._positionals);
    return command;
  }

  /** The command line with every argument quoted for the shell. */
  public build(): string {
    return [this.helmExecutable, ...this.buildArguments().map(argument => shellQuote(argument))].join(' ');
  }
}
