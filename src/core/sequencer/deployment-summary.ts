// SPDX-License-Identifier: Apache-2.0

import {componentDisplayName} from '../config/component-id.js';
import {type ComponentOutcomeSnapshot, ComponentState} from './component-outcome.js';

export class DeploymentSummary {
  public readonly succeeded: boolean;
  public readonly interrupted: boolean;

  /**
   * @param outcomes - one per selected component, in activation order
   */
  public constructor(public readonly outcomes: readonly ComponentOutcomeSnapshot[]) {
    this.succeeded = outcomes.length > 0 && outcomes.every(outcome => outcome.state === ComponentState.Succeeded);
    this.interrupted = outcomes.some(outcome => outcome.state === ComponentState.Interrupted);
  }

  /** One line per component, e.g. `Orchestrator: Failed (2 attempts) - release timed out`. */
  public lines(): string[] {
    return this.outcomes.map(outcome => {
      const attempts = outcome.attempts > 1 ? ` (${outcome.attempts} attempts)` : '';
      const detail = outcome.detail ? ` - ${outcome.detail}` : '';
      return `${componentDisplayName(outcome.componentId)}: ${outcome.state}${attempts}${detail}`;
    });
  }
}
