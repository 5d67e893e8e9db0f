// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {waitForReadyPods, type ReadinessPolicy} from '../../../../src/core/runtime/readiness.js';
import {ReadinessTimeoutError} from '../../../../src/core/errors/readiness-timeout-error.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {getTestLogger, stubKubeClient} from '../../../helpers/test-doubles.js';

describe('waitForReadyPods', () => {
  const selector = 'app.kubernetes.io/name=postgresql';

  it('returns once every matching pod is ready', async () => {
    const kube = stubKubeClient();
    kube.listPods.onFirstCall().resolves([{name: 'postgresql-0', phase: 'Pending', ready: false}]);
    kube.listPods.onSecondCall().resolves([{name: 'postgresql-0', phase: 'Running', ready: true}]);
    const policy: ReadinessPolicy = {timeout: Duration.ofSeconds(5), pollInterval: Duration.ofMillis(1)};

    await waitForReadyPods(kube, getTestLogger(), 'magma', selector, policy);

    expect(kube.listPods).to.have.been.calledTwice;
    expect(kube.listPods).to.have.been.calledWith('magma', selector);
  });

  it('times out with the last observed state', async () => {
    const kube = stubKubeClient();
    kube.listPods.resolves([{name: 'postgresql-0', phase: 'Pending', ready: false}]);
    const policy: ReadinessPolicy = {timeout: Duration.ZERO, pollInterval: Duration.ofMillis(1)};

    await expect(waitForReadyPods(kube, getTestLogger(), 'magma', selector, policy)).to.be.rejectedWith(
      ReadinessTimeoutError,
      `Pods ${selector} in magma not ready after 0s: postgresql-0=Pending (not ready)`,
    );
  });

  it('does not count an empty pod list as ready', async () => {
    const kube = stubKubeClient();
    const policy: ReadinessPolicy = {timeout: Duration.ZERO, pollInterval: Duration.ofMillis(1)};

    await expect(waitForReadyPods(kube, getTestLogger(), 'magma', selector, policy)).to.be.rejectedWith(
      ReadinessTimeoutError,
      `Pods ${selector} in magma not ready after 0s: no matching pods`,
    );
  });

  it('stops polling when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const kube = stubKubeClient();
    const policy: ReadinessPolicy = {timeout: Duration.ofSeconds(5), pollInterval: Duration.ofMillis(1)};

    await expect(waitForReadyPods(kube, getTestLogger(), 'magma', selector, policy, controller.signal)).to.be
      .rejected;
    expect(kube.listPods).not.to.have.been.called;
  });
});
