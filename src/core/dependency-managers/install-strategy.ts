// SPDX-License-Identifier: Apache-2.0

import {type OsFamily} from './os-family.js';
import {type ToolName} from './tool-name.js';

export interface InstallStep {
  readonly tool: ToolName;
  readonly description: string;
  /** Shell commands run in order; the step fails on the first failing command. */
  readonly commands: readonly string[];
}

export interface InstallPlan {
  readonly osFamily: OsFamily;
  readonly steps: readonly InstallStep[];
}

/**
 * Produces the install step of a tool for one OS family.
 */
export interface InstallStrategy {
  readonly osFamily: OsFamily;

  stepFor(tool: ToolName): InstallStep;
}
