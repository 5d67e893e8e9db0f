// SPDX-License-Identifier: Apache-2.0

import {describe, it, beforeEach, afterEach} from 'mocha';
import {expect} from 'chai';
import fs from 'node:fs';
import {CertificateManager} from '../../../src/core/certificate-manager.js';
import {ComponentId} from '../../../src/core/config/component-id.js';
import {recordFromValues} from '../../../src/core/config/config-fields.js';
import {type ConfigurationRecord} from '../../../src/core/config/configuration-record.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';
import {getTestLogger, testValues} from '../../helpers/test-doubles.js';
import {getTestDirectory, removeTestDirectory} from '../../test-utility.js';

describe('CertificateManager', () => {
  let directory: string;
  let record: ConfigurationRecord;

  beforeEach(() => {
    directory = getTestDirectory('certificate-manager');
    const values = testValues([ComponentId.Orchestrator]);
    values.set('TLS_CERT_PATH', PathEx.join(directory, 'certs', 'tls.crt'));
    values.set('TLS_KEY_PATH', PathEx.join(directory, 'certs', 'tls.key'));
    record = recordFromValues(values, [ComponentId.Orchestrator]);
  });

  afterEach(() => removeTestDirectory(directory));

  it('generates a self-signed pair when none exists', async () => {
    const result = await new CertificateManager(getTestLogger()).ensure(record, 30);

    expect(result.generated).to.be.true;
    expect(fs.readFileSync(result.certificatePath, 'utf8')).to.contain('-----BEGIN CERTIFICATE-----');
    expect(fs.statSync(result.keyPath).mode & 0o777).to.equal(0o600);
  });

  it('keeps an existing pair', async () => {
    fs.mkdirSync(PathEx.join(directory, 'certs'));
    fs.writeFileSync(record.tls.certificatePath, 'cert');
    fs.writeFileSync(record.tls.keyPath, 'key');

    const result = await new CertificateManager(getTestLogger()).ensure(record);

    expect(result).to.deep.equal({
      certificatePath: record.tls.certificatePath,
      keyPath: record.tls.keyPath,
      generated: false,
    });
    expect(fs.readFileSync(record.tls.certificatePath, 'utf8')).to.equal('cert');
  });
});
