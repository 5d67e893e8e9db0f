// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {splitList, validateValue, Validators} from '../../../../src/core/config/validators.js';

describe('Validators', () => {
  it('accepts dotted-quad IPv4 addresses only', () => {
    expect(Validators.ipv4('10.0.0.5')).to.be.undefined;
    expect(Validators.ipv4('999.1.1.1')).to.equal('must be an IPv4 address in dotted-quad form, e.g. 10.0.0.5');
    expect(Validators.ipv4('not-an-ip')).to.equal('must be an IPv4 address in dotted-quad form, e.g. 10.0.0.5');
  });

  it('accepts email addresses', () => {
    expect(Validators.email('admin@test.local')).to.be.undefined;
    expect(Validators.email('bad-email')).to.equal('must be an email address, e.g. admin@example.com');
  });

  it('accepts host names without a public top level domain', () => {
    expect(Validators.hostName('magma.local')).to.be.undefined;
    expect(Validators.hostName('postgresql')).to.be.undefined;
    expect(Validators.hostName('bad host')).to.equal('must be a host name, e.g. magma.local');
  });

  it('bounds port numbers', () => {
    expect(Validators.port('1')).to.be.undefined;
    expect(Validators.port('65535')).to.be.undefined;
    expect(Validators.port('0')).to.equal('must be a port number between 1 and 65535');
    expect(Validators.port('65536')).to.equal('must be a port number between 1 and 65535');
  });

  it('checks mobile country and network codes', () => {
    expect(Validators.mcc('001')).to.be.undefined;
    expect(Validators.mcc('01')).to.equal('must be a 3 digit mobile country code');
    expect(Validators.mnc('01')).to.be.undefined;
    expect(Validators.mnc('001')).to.be.undefined;
    expect(Validators.mnc('1')).to.equal('must be a 2 or 3 digit mobile network code');
  });

  it('requires lower case namespaces', () => {
    expect(Validators.namespace('magma')).to.be.undefined;
    expect(Validators.namespace('Magma')).to.equal('must be a DNS-1123 label, e.g. magma');
  });

  it('checks identifier lists entry by entry', () => {
    expect(Validators.identifierList('network1,network2')).to.be.undefined;
    expect(Validators.identifierList(',')).to.equal('must contain at least one entry');
    expect(Validators.identifierList('a,a')).to.equal('must not contain duplicate entries');
    expect(Validators.identifierList('net 1')).to.equal(
      "entry 'net 1' may only contain letters, digits, underscores, dots and dashes",
    );
  });

  it('requires absolute paths', () => {
    expect(Validators.absolutePath('/etc/magma/tls.crt')).to.be.undefined;
    expect(Validators.absolutePath('relative/path')).to.equal('must be an absolute path');
  });
});

describe('validateValue', () => {
  it('rejects blank values before running the field validator', () => {
    expect(validateValue('   ', Validators.secret)).to.equal('is required');
  });

  it('rejects values that cannot be stored in the configuration file', () => {
    expect(validateValue('a"b', Validators.secret)).to.equal(
      'must not contain double quotes, backslashes or line breaks',
    );
    expect(validateValue('line\nbreak', Validators.secret)).to.equal(
      'must not contain double quotes, backslashes or line breaks',
    );
  });

  it('returns the field validator verdict otherwise', () => {
    expect(validateValue('10.0.0.5', Validators.ipv4)).to.be.undefined;
    expect(validateValue('10.0.0', Validators.ipv4)).to.equal(
      'must be an IPv4 address in dotted-quad form, e.g. 10.0.0.5',
    );
  });
});

describe('splitList', () => {
  it('trims entries and drops empty ones', () => {
    expect(splitList(' a, b,,c ')).to.deep.equal(['a', 'b', 'c']);
  });
});
