// SPDX-License-Identifier: Apache-2.0

import {ProcessOutput} from 'listr2';
import {type DeployLogger} from './logging/deploy-logger.js';

/** Mirrors Listr2 process output into the run log */
export class CustomProcessOutput extends ProcessOutput {
  public constructor(private readonly logger: DeployLogger) {
    super();
  }

  public override toStdout(chunk: string, eol = true): boolean {
    for (const line of chunk.toString().split('\n')) {
      this.logger.debug(line);
    }
    return super.toStdout(chunk, eol);
  }

  public override toStderr(chunk: string, eol = true): boolean {
    this.logger.error(chunk.toString());
    return super.toStderr(chunk, eol);
  }
}
