// SPDX-License-Identifier: Apache-2.0

import {type ComponentId, componentDisplayName} from '../config/component-id.js';
import {type ActivationContext, type AdapterResult, type RuntimeAdapter} from './runtime-adapter.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {ReadinessTimeoutError} from '../errors/readiness-timeout-error.js';
import {classifyFailure} from './failure-classifier.js';

export abstract class AbstractRuntimeAdapter implements RuntimeAdapter {
  protected constructor(
    public readonly componentId: ComponentId,
    protected readonly logger: DeployLogger,
  ) {}

  public async activate(context: ActivationContext): Promise<AdapterResult> {
    try {
      const detail = await this.apply(context);
      return {ok: true, detail};
    } catch (error) {
      if (error instanceof ReadinessTimeoutError) {
        return {ok: false, error};
      }
      const failure = classifyFailure(error, `Activating ${componentDisplayName(this.componentId)}`);
      this.logger.error(failure.message, {retryable: failure.retryable});
      return {ok: false, error: failure};
    }
  }

  /**
   * Runs the runtime calls of the component.
   *
   * @returns a one line description of what is now running
   */
  protected abstract apply(context: ActivationContext): Promise<string>;
}
