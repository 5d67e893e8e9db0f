// SPDX-License-Identifier: Apache-2.0

import {describe, it, beforeEach, afterEach} from 'mocha';
import {expect} from 'chai';
import fs from 'node:fs';
import sinon from 'sinon';
import {ConfigFileStore} from '../../../../src/core/config/config-file-store.js';
import {valuesFromRecord} from '../../../../src/core/config/config-fields.js';
import {ComponentId, COMPONENT_IDS} from '../../../../src/core/config/component-id.js';
import {ValidationError} from '../../../../src/core/errors/validation-error.js';
import {DeployError} from '../../../../src/core/errors/deploy-error.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {getTestLogger, testRecord} from '../../../helpers/test-doubles.js';
import {getTestDirectory, removeTestDirectory} from '../../../test-utility.js';

describe('ConfigFileStore', () => {
  let store: ConfigFileStore;
  let directory: string;
  let filePath: string;

  beforeEach(() => {
    store = new ConfigFileStore(getTestLogger());
    directory = getTestDirectory('config-file-store');
    filePath = PathEx.join(directory, 'magma_config.env');
  });

  afterEach(() => {
    sinon.restore();
    removeTestDirectory(directory);
  });

  it('serializes values as quoted lines under a header', () => {
    const content = ConfigFileStore.serialize(
      new Map([
        ['DOMAIN', 'test.local'],
        ['ADMIN_EMAIL', 'admin@test.local'],
      ]),
    );

    expect(content).to.equal(
      '# magma-deploy configuration\n' +
        '# Edit values in place; every value must stay on one line between double quotes.\n' +
        'DOMAIN="test.local"\n' +
        'ADMIN_EMAIL="admin@test.local"\n',
    );
  });

  it('refuses values that would break the file format', () => {
    expect(() => ConfigFileStore.serialize(new Map([['ORC8R_DB_PASSWORD', 'a"b']]))).to.throw(
      ValidationError,
      'Invalid value for ORC8R_DB_PASSWORD: must not contain double quotes, backslashes or line breaks',
    );
  });

  it('loads what it saved', () => {
    const record = testRecord(COMPONENT_IDS);

    store.save(filePath, record);

    expect(store.exists(filePath)).to.be.true;
    expect(store.load(filePath)).to.deep.equal(valuesFromRecord(record));
  });

  it('writes the file readable by the owner only and leaves no temporary file', () => {
    store.save(filePath, testRecord([ComponentId.Orchestrator]));

    expect(fs.statSync(filePath).mode & 0o777).to.equal(0o600);
    expect(fs.readdirSync(directory)).to.deep.equal(['magma_config.env']);
  });

  it('keeps the previous file when the write is interrupted', () => {
    fs.writeFileSync(filePath, 'DOMAIN="old.local"\n');
    sinon.stub(fs, 'renameSync').throws(new Error('disk full'));

    expect(() => store.save(filePath, testRecord([ComponentId.Orchestrator]))).to.throw(
      DeployError,
      `failed to write configuration file ${filePath}`,
    );
    expect(fs.readFileSync(filePath, 'utf8')).to.equal('DOMAIN="old.local"\n');
    expect(fs.readdirSync(directory)).to.deep.equal(['magma_config.env']);
  });

  it('reports a missing file as a validation error', () => {
    const missing = PathEx.join(directory, 'missing.env');

    expect(store.exists(missing)).to.be.false;
    expect(() => store.load(missing)).to.throw(
      ValidationError,
      `Invalid value for config: cannot read configuration file ${missing}`,
    );
  });
});
