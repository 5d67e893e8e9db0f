// SPDX-License-Identifier: Apache-2.0

import {spawn} from 'node:child_process';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {type DeployLogger} from './logging/deploy-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {ShellCommandError} from './errors/shell-command-error.js';

export interface ShellRunOptions {
  cwd?: string;
  signal?: AbortSignal;
  /** Environment added on top of the current process environment. */
  env?: Record<string, string>;
}

@injectable()
export class ShellRunner {
  protected readonly logger: DeployLogger;

  public constructor(@inject(InjectTokens.DeployLogger) logger?: DeployLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
  }

  /** Returns a promise that invokes the shell command and resolves to its non-empty stdout lines */
  public run(cmd: string, verbose = false, options: ShellRunOptions = {}): Promise<string[]> {
    const callStack = new Error().stack; // capture the callstack to be included in error
    this.logger.info(`Executing command: '${cmd}'`, {cwd: options.cwd});

    return new Promise<string[]>((resolve, reject) => {
      const child = spawn(cmd, {
        shell: true,
        cwd: options.cwd,
        signal: options.signal,
        env: options.env ? {...process.env, ...options.env} : process.env,
      });

      const output: string[] = [];
      child.stdout.on('data', (d: Buffer) => {
        for (const item of d.toString().split(/\r?\n/)) {
          if (item) {
            output.push(item);
          }
        }
      });

      const errorOutput: string[] = [];
      child.stderr.on('data', (d: Buffer) => {
        for (const item of d.toString().split(/\r?\n/)) {
          if (item) {
            errorOutput.push(item.trim());
          }
        }
      });

      child.on('error', error => {
        const error_ = new ShellCommandError(cmd, null, output, [...errorOutput, error.message]);
        this.logger.error(`Error spawning: '${cmd}'`, {error: {message: error.message}});
        reject(error_);
      });

      child.on('close', (code, signal) => {
        if (code || signal) {
          const error = new ShellCommandError(cmd, code, output, errorOutput, signal);

          // include the callStack to the parent run() instead of from inside this handler.
          // this is needed to ensure we capture the proper callstack for easier debugging.
          error.stack = callStack;

          if (verbose) {
            for (const m of errorOutput) this.logger.showUser(chalk.red(m));
          }

          this.logger.error(`Error executing: '${cmd}'`, {
            commandExitCode: code,
            commandExitSignal: signal,
            commandOutput: output,
            errOutput: errorOutput,
          });

          reject(error);
          return;
        }

        this.logger.debug(`Finished executing: '${cmd}'`, {
          commandExitCode: code,
          commandOutput: output,
          errOutput: errorOutput,
        });
        resolve(output);
      });
    });
  }
}
