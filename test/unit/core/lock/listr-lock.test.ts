// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import sinon from 'sinon';
import {ListrLock} from '../../../../src/core/lock/listr-lock.js';
import {type Lock} from '../../../../src/core/lock/lock.js';
import {LockHolder} from '../../../../src/core/lock/lock-holder.js';
import {LockAcquisitionError} from '../../../../src/core/errors/lock-acquisition-error.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {runTasks} from '../../../helpers/listr.js';

function fakeLock(acquire: sinon.SinonStub): Lock {
  return {
    lockHolder: LockHolder.of('operator'),
    acquire,
    tryAcquire: sinon.stub().resolves(true),
    release: sinon.stub().resolves(),
    isAcquired: sinon.stub().returns(false),
  };
}

describe('ListrLock', () => {
  it('retries until the lock is free', async () => {
    const acquire = sinon.stub();
    acquire.onFirstCall().rejects(new LockAcquisitionError('held'));
    acquire.onSecondCall().rejects(new LockAcquisitionError('held'));
    acquire.onThirdCall().resolves();

    await runTasks([ListrLock.newAcquireLockTask<object>(fakeLock(acquire), 3, Duration.ZERO)], {});

    expect(acquire).to.have.been.calledThrice;
  });

  it('gives up after the last attempt', async () => {
    const acquire = sinon.stub().rejects(new LockAcquisitionError('held'));

    await expect(
      runTasks([ListrLock.newAcquireLockTask<object>(fakeLock(acquire), 2, Duration.ZERO)], {}),
    ).to.be.rejectedWith(LockAcquisitionError, 'Failed to acquire lock, max attempts reached (2)');
    expect(acquire).to.have.been.calledTwice;
  });
});
