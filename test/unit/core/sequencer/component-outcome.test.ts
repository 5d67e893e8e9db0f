// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {ComponentOutcome, ComponentState} from '../../../../src/core/sequencer/component-outcome.js';
import {DeploymentSummary} from '../../../../src/core/sequencer/deployment-summary.js';
import {ComponentId} from '../../../../src/core/config/component-id.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('ComponentOutcome', () => {
  it('moves from Pending through Deploying to a terminal state', () => {
    const outcome = new ComponentOutcome(ComponentId.Orchestrator);
    expect(outcome.state).to.equal(ComponentState.Pending);
    expect(outcome.isTerminal()).to.be.false;

    outcome.startDeploying();
    expect(outcome.recordAttempt()).to.equal(1);
    outcome.succeed('release magma-orc8r deployed');

    expect(outcome.isTerminal()).to.be.true;
    expect(outcome.snapshot()).to.deep.equal({
      componentId: ComponentId.Orchestrator,
      state: ComponentState.Succeeded,
      detail: 'release magma-orc8r deployed',
      attempts: 1,
      blockedBy: undefined,
    });
  });

  it('refuses to skip Deploying', () => {
    const outcome = new ComponentOutcome(ComponentId.AccessGateway);

    expect(() => outcome.succeed()).to.throw(
      IllegalArgumentError,
      'illegal state transition for accessGateway: Pending -> Succeeded',
    );
    expect(() => outcome.recordAttempt()).to.throw(IllegalArgumentError, 'accessGateway is not deploying');
  });

  it('refuses to leave a terminal state', () => {
    const outcome = new ComponentOutcome(ComponentId.AccessGateway);
    outcome.startDeploying();
    outcome.fail('compose up failed');

    expect(() => outcome.startDeploying()).to.throw(
      IllegalArgumentError,
      'illegal state transition for accessGateway: Failed -> Deploying',
    );
  });

  it('only blocks pending components', () => {
    const blocked = new ComponentOutcome(ComponentId.NetworkManagementSystem);
    blocked.block(ComponentId.Orchestrator);
    expect(blocked.state).to.equal(ComponentState.Pending);
    expect(blocked.blockedBy).to.equal(ComponentId.Orchestrator);
    expect(blocked.detail).to.equal('not started: orchestrator did not succeed');

    const deploying = new ComponentOutcome(ComponentId.NetworkManagementSystem);
    deploying.startDeploying();
    expect(() => deploying.block(ComponentId.Orchestrator)).to.throw(
      IllegalArgumentError,
      'networkManagementSystem can only be blocked while pending',
    );
  });
});

describe('DeploymentSummary', () => {
  it('succeeds only when every component succeeded', () => {
    expect(new DeploymentSummary([]).succeeded).to.be.false;
    expect(
      new DeploymentSummary([
        {componentId: ComponentId.Orchestrator, state: ComponentState.Succeeded, attempts: 1},
      ]).succeeded,
    ).to.be.true;
  });

  it('prints one line per component', () => {
    const summary = new DeploymentSummary([
      {componentId: ComponentId.Orchestrator, state: ComponentState.Failed, attempts: 2, detail: 'timed out'},
      {
        componentId: ComponentId.NetworkManagementSystem,
        state: ComponentState.Pending,
        attempts: 0,
        detail: 'not started: orchestrator did not succeed',
      },
    ]);

    expect(summary.succeeded).to.be.false;
    expect(summary.interrupted).to.be.false;
    expect(summary.lines()).to.deep.equal([
      'Orchestrator: Failed (2 attempts) - timed out',
      'Network Management System: Pending - not started: orchestrator did not succeed',
    ]);
  });
});
