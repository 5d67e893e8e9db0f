// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {LockHolder} from '../../../../src/core/lock/lock-holder.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../../../src/core/errors/missing-argument-error.js';

describe('LockHolder', () => {
  const holder = LockHolder.of('operator', 'host-a', 1234);

  it('serializes to JSON and back', () => {
    expect(holder.toJson()).to.equal('{"username":"operator","hostname":"host-a","pid":1234}');
    expect(LockHolder.fromJson(holder.toJson()).equals(holder)).to.be.true;
    expect(holder.toString()).to.equal('operator@host-a (pid 1234)');
  });

  it('tells holders apart by user, host and process', () => {
    expect(holder.equals(LockHolder.of('operator', 'host-a', 1235))).to.be.false;
    expect(holder.isSameHost(LockHolder.of('other', 'host-a', 1))).to.be.true;
    expect(holder.isSameHost(LockHolder.of('operator', 'host-b', 1234))).to.be.false;
  });

  it('requires every field', () => {
    expect(() => LockHolder.of('', 'host-a', 1)).to.throw(MissingArgumentError, 'username is required');
    expect(() => LockHolder.of('operator', 'host-a', 0)).to.throw(MissingArgumentError, 'pid is required');
  });

  it('rejects text that is not a serialized holder', () => {
    expect(() => LockHolder.fromJson('not json')).to.throw(IllegalArgumentError, 'lock holder is not valid JSON');
    expect(() => LockHolder.fromJson('"text"')).to.throw(IllegalArgumentError, 'lock holder must be an object');
    expect(() => LockHolder.fromJson('{"username":"operator"}')).to.throw(
      IllegalArgumentError,
      'lock holder needs username, hostname and pid',
    );
  });

  it('knows whether its process runs', () => {
    expect(LockHolder.of('operator', 'host-a', process.pid).isProcessAlive()).to.be.true;
    expect(LockHolder.of('operator', 'host-a', 99_999_999).isProcessAlive()).to.be.false;
  });
});
