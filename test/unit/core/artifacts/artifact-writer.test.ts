// SPDX-License-Identifier: Apache-2.0

import {describe, it, beforeEach, afterEach} from 'mocha';
import {expect} from 'chai';
import fs from 'node:fs';
import {ArtifactWriter} from '../../../../src/core/artifacts/artifact-writer.js';
import {type ArtifactBundle} from '../../../../src/core/artifacts/artifact-generator.js';
import {ComponentId} from '../../../../src/core/config/component-id.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {getTestLogger} from '../../../helpers/test-doubles.js';
import {getTestDirectory, removeTestDirectory} from '../../../test-utility.js';

describe('ArtifactWriter', () => {
  let directory: string;
  let writer: ArtifactWriter;

  const bundle: ArtifactBundle = {
    componentId: ComponentId.AccessGateway,
    directoryName: 'agw',
    files: [
      {name: 'docker-compose.yml', content: 'services: {}\n', secret: false},
      {name: 'configs/gateway.mconfig', content: '---\n', secret: false},
      {name: 'values.yaml', content: 'password: test-secret\n', secret: true},
    ],
  };

  beforeEach(() => {
    directory = getTestDirectory('artifact-writer');
    writer = new ArtifactWriter(getTestLogger(), PathEx.join(directory, 'artifacts'));
  });

  afterEach(() => removeTestDirectory(directory));

  it('writes every file below the component working directory', () => {
    const workingDirectory = writer.write(bundle);

    expect(workingDirectory).to.equal(PathEx.join(directory, 'artifacts', 'agw'));
    expect(writer.workingDirectory(bundle)).to.equal(workingDirectory);
    expect(fs.readFileSync(PathEx.join(workingDirectory, 'docker-compose.yml'), 'utf8')).to.equal('services: {}\n');
    expect(fs.readFileSync(PathEx.join(workingDirectory, 'configs', 'gateway.mconfig'), 'utf8')).to.equal('---\n');
  });

  it('restricts secret files to their owner', () => {
    const workingDirectory = writer.write(bundle);

    expect(fs.statSync(PathEx.join(workingDirectory, 'values.yaml')).mode & 0o777).to.equal(0o600);
    expect(fs.statSync(PathEx.join(workingDirectory, 'docker-compose.yml')).mode & 0o777).to.equal(0o644);
  });

  it('replaces an earlier render', () => {
    writer.write(bundle);
    const workingDirectory = writer.write({
      ...bundle,
      files: [{name: 'docker-compose.yml', content: 'services:\n  magmad: {}\n', secret: false}],
    });

    expect(fs.readFileSync(PathEx.join(workingDirectory, 'docker-compose.yml'), 'utf8')).to.equal(
      'services:\n  magmad: {}\n',
    );
  });
});
