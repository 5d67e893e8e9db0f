// SPDX-License-Identifier: Apache-2.0

import {type KubeClient} from '../../integration/kube/kube-client.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {ReadinessTimeoutError} from '../errors/readiness-timeout-error.js';
import {Duration} from '../time/duration.js';
import {errorMessage, sleep} from '../helpers.js';

export interface ReadinessPolicy {
  readonly timeout: Duration;
  readonly pollInterval: Duration;
}

/**
 * Polls until at least one pod matches the selector and every matching pod is ready.
 *
 * @throws ReadinessTimeoutError if that does not happen within the policy timeout
 */
export async function waitForReadyPods(
  kube: KubeClient,
  logger: DeployLogger,
  namespace: string,
  labelSelector: string,
  policy: ReadinessPolicy,
  signal?: AbortSignal,
): Promise<void> {
  const deadline = Date.now() + policy.timeout.toMillis();
  let lastState = 'no matching pods';

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      const pods = await kube.listPods(namespace, labelSelector);
      if (pods.length > 0 && pods.every(pod => pod.ready)) {
        logger.info(`Pods ${labelSelector} in ${namespace} are ready`, {attempt});
        return;
      }
      if (pods.length > 0) {
        lastState = pods.map(pod => `${pod.name}=${pod.phase}${pod.ready ? '' : ' (not ready)'}`).join(', ');
      }
    } catch (error) {
      lastState = errorMessage(error);
    }
    logger.debug(`Waiting for pods ${labelSelector} in ${namespace}: ${lastState}`, {attempt});

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ReadinessTimeoutError(
        `Pods ${labelSelector} in ${namespace} not ready after ${policy.timeout.toString()}: ${lastState}`,
        policy.timeout.toMillis(),
      );
    }
    await sleep(Duration.ofMillis(Math.min(policy.pollInterval.toMillis(), remaining)));
  }
}
