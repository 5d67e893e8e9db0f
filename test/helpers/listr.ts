// SPDX-License-Identifier: Apache-2.0

import {Listr} from 'listr2';
import {type DeployListrTask} from '../../src/types/index.js';

/** Runs tasks the way the commands do, without rendering anything. */
export function runTasks<T>(tasks: DeployListrTask<T>[], context: T): Promise<T> {
  return new Listr<T>(tasks, {concurrent: false, registerSignalListeners: false, silentRendererCondition: true}).run(
    context,
  );
}
