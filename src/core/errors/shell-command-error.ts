// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

/** A shell command exited with a non-zero code or was killed. */
export class ShellCommandError extends DeployError {
  public constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly output: readonly string[],
    public readonly errorOutput: readonly string[],
    public readonly signal: NodeJS.Signals | null = null,
  ) {
    super(
      signal ? `Command killed by ${signal}: ${command}` : `Command exit with error code ${exitCode}: ${command}`,
      undefined,
      {command, exitCode, signal},
    );
  }
}
