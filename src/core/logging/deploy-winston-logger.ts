// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {PathEx} from '../../business/utils/path-ex.js';
import * as constants from '../constants.js';
import {type DeployLogger} from './deploy-logger.js';

const customFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // use custom format TIMESTAMP|LEVEL| MESSAGE
  winston.format.printf(data => `${data.timestamp}|${data.level}| ${data.message}`),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

interface StackEntry {
  message: string;
  stacktrace: string;
}

@injectable()
export class DeployWinstonLogger implements DeployLogger {
  private readonly winstonLogger: winston.Logger;
  private developmentMode: boolean;
  private traceId?: string;

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - directory of the append-only run log
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    logsDirectory = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(customFormat, winston.format.json()),
      transports: [new winston.transports.File({filename: PathEx.join(logsDirectory, constants.MAGMA_DEPLOY_LOG_FILE)})],
    });
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public showUser(message: string, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown): void {
    const stack: StackEntry[] = [];
    let cause: unknown = error;
    let depth = 0;
    while (cause instanceof Error && depth < 10) {
      stack.push({message: cause.message, stacktrace: cause.stack ?? ''});
      cause = cause.cause;
      depth += 1;
    }

    const message = error instanceof Error ? error.message : String(error);

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode && stack.length > 0) {
      let prefix = '';
      let indent = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        // Remove everything after the first "Caused by: " and add indentation
        const formattedStacktrace = s.stacktrace
          .replace(/Caused by:.*/s, '')
          .replace(/\n\s*/g, '\n' + indent)
          .trim();
        console.log(indent + chalk.gray(formattedStacktrace) + '\n');
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.error(message, {stack});
  }

  public showList(title: string, items: string[] = []): void {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green('-------------------------------------------------------------------------------'));
    if (items.length > 0) {
      for (const name of items) this.showUser(chalk.cyan(` - ${name}`));
    } else {
      this.showUser(chalk.blue('[ None ]'));
    }

    this.showUser('\n');
  }

  public error(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.error(message, ...arguments_, this.prepMeta());
  }

  public warn(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(message, ...arguments_, this.prepMeta());
  }

  public info(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.info(message, ...arguments_, this.prepMeta());
  }

  public debug(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(message, ...arguments_, this.prepMeta());
  }
}
