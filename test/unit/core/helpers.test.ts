// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {deepFreeze, errorMessage, shellQuote} from '../../../src/core/helpers.js';

describe('helpers', () => {
  describe('shellQuote', () => {
    it('wraps values in single quotes', () => {
      expect(shellQuote('magma')).to.equal("'magma'");
      expect(shellQuote(5432)).to.equal("'5432'");
      expect(shellQuote('a b;c')).to.equal("'a b;c'");
    });

    it('escapes embedded single quotes', () => {
      expect(shellQuote("it's")).to.equal(String.raw`'it'\''s'`);
    });
  });

  it('extracts the message of anything thrown', () => {
    expect(errorMessage(new Error('boom'))).to.equal('boom');
    expect(errorMessage('plain')).to.equal('plain');
  });

  it('freezes nested objects', () => {
    const frozen = deepFreeze({outer: {inner: [1, 2]}});

    expect(Object.isFrozen(frozen)).to.be.true;
    expect(Object.isFrozen(frozen.outer)).to.be.true;
    expect(Object.isFrozen(frozen.outer.inner)).to.be.true;
  });
});
