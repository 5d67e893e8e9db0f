// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {classifyFailure, failureText, isRetryableText} from '../../../../src/core/runtime/failure-classifier.js';
import {RuntimeAdapterError} from '../../../../src/core/errors/runtime-adapter-error.js';
import {ShellCommandError} from '../../../../src/core/errors/shell-command-error.js';

describe('failure classifier', () => {
  it('recognizes transient runtime failures', () => {
    expect(isRetryableText('Error: timed out waiting for the condition')).to.be.true;
    expect(isRetryableText('dial tcp 10.0.0.5:6443: connect: connection refused')).to.be.true;
    expect(
      isRetryableText('Error: UPGRADE FAILED: another operation (install/upgrade/rollback) is in progress'),
    ).to.be.true;
    expect(isRetryableText('Error: chart "orc8r" not found')).to.be.false;
  });

  it('uses the last error line of a failed command as detail', () => {
    const error = new ShellCommandError(
      'helm upgrade orc8r magma/orc8r',
      1,
      ['Release "orc8r" does not exist. Installing it now.'],
      ['W1018 warning', 'Error: timed out waiting for the condition'],
    );

    const failure = classifyFailure(error, 'Activating Orchestrator');

    expect(failure.message).to.equal('Activating Orchestrator failed: Error: timed out waiting for the condition');
    expect(failure.retryable).to.be.true;
    expect(failure.cause).to.equal(error);
  });

  it('looks at the whole command output', () => {
    const error = new ShellCommandError('docker compose up', 1, ['connection reset by peer'], []);

    expect(failureText(error)).to.equal(
      'Command exit with error code 1: docker compose up\nconnection reset by peer',
    );
    expect(classifyFailure(error, 'Activating Access Gateway').retryable).to.be.true;
  });

  it('treats other errors as fatal', () => {
    const failure = classifyFailure(new Error('permission denied'), 'Activating Access Gateway');

    expect(failure.message).to.equal('Activating Access Gateway failed: permission denied');
    expect(failure.retryable).to.be.false;
  });

  it('passes classified errors through', () => {
    const error = new RuntimeAdapterError('already classified', true);

    expect(classifyFailure(error, 'Activating Orchestrator')).to.equal(error);
  });
});
