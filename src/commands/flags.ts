// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';
import {type CommandFlag} from '../types/flag-types.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {type Optional} from '../types/index.js';

/** Options of a run, read from the parsed command line. */
export interface CliOptions {
  config?: string;
  status: boolean;
  clean: boolean;
  dryRun: boolean;
  components?: string;
  skipPrerequisites: boolean;
  yes: boolean;
  dev: boolean;
}

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setOptionalCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        type: flag.definition.type,
        alias: flag.definition.alias,
        default: flag.definition.defaultValue,
      });
    }
  }

  public static readonly config: CommandFlag = {
    constName: 'config',
    name: 'config',
    definition: {
      describe: 'Deploy without prompting, from a persisted configuration file',
      type: 'string',
    },
  };

  public static readonly status: CommandFlag = {
    constName: 'status',
    name: 'status',
    definition: {
      describe: 'Report the health of an existing deployment',
      type: 'boolean',
      defaultValue: false,
    },
  };

  public static readonly clean: CommandFlag = {
    constName: 'clean',
    name: 'clean',
    definition: {
      describe: 'Remove a deployment; destructive resource classes are confirmed one by one',
      type: 'boolean',
      defaultValue: false,
    },
  };

  public static readonly dryRun: CommandFlag = {
    constName: 'dryRun',
    name: 'dry-run',
    definition: {
      describe: 'Collect the configuration and write the artifacts without activating anything',
      type: 'boolean',
      defaultValue: false,
    },
  };

  public static readonly components: CommandFlag = {
    constName: 'components',
    name: 'components',
    definition: {
      describe: 'Comma separated components to deploy (orc8r, agw, fgw, nms)',
      type: 'string',
    },
  };

  public static readonly skipPrerequisites: CommandFlag = {
    constName: 'skipPrerequisites',
    name: 'skip-prerequisites',
    definition: {
      describe: 'Do not check for or install the required tools',
      type: 'boolean',
      defaultValue: false,
    },
  };

  public static readonly yes: CommandFlag = {
    constName: 'yes',
    name: 'yes',
    definition: {
      describe: 'Answer yes to the proceed and install confirmations',
      type: 'boolean',
      alias: 'y',
      defaultValue: false,
    },
  };

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Show full stack traces in error messages',
      type: 'boolean',
      defaultValue: false,
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.config,
    Flags.status,
    Flags.clean,
    Flags.dryRun,
    Flags.components,
    Flags.skipPrerequisites,
    Flags.yes,
    Flags.devMode,
  ];

  /**
   * @throws IllegalArgumentError if a flag has the wrong type or the modes conflict
   */
  public static parse(argv: Readonly<Record<string, unknown>>): CliOptions {
    const options: CliOptions = {
      config: Flags.text(argv, Flags.config),
      status: Flags.toggle(argv, Flags.status),
      clean: Flags.toggle(argv, Flags.clean),
      dryRun: Flags.toggle(argv, Flags.dryRun),
      components: Flags.text(argv, Flags.components),
      skipPrerequisites: Flags.toggle(argv, Flags.skipPrerequisites),
      yes: Flags.toggle(argv, Flags.yes),
      dev: Flags.toggle(argv, Flags.devMode),
    };

    if (options.status && options.clean) {
      throw new IllegalArgumentError('--status and --clean cannot be combined');
    }
    if ((options.status || options.clean) && (options.config !== undefined || options.dryRun)) {
      throw new IllegalArgumentError('--config and --dry-run only apply to a deployment');
    }
    return options;
  }

  private static text(argv: Readonly<Record<string, unknown>>, flag: CommandFlag): Optional<string> {
    const value = argv[flag.name];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      throw new IllegalArgumentError(`--${flag.name} expects a value`, value);
    }
    return value.trim();
  }

  private static toggle(argv: Readonly<Record<string, unknown>>, flag: CommandFlag): boolean {
    const value = argv[flag.name] ?? flag.definition.defaultValue;
    if (typeof value !== 'boolean') {
      throw new IllegalArgumentError(`--${flag.name} is a switch`, value);
    }
    return value;
  }
}
