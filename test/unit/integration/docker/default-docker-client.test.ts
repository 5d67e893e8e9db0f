// SPDX-License-Identifier: Apache-2.0

import {describe, it, beforeEach, afterEach} from 'mocha';
import {expect} from 'chai';
import sinon, {type SinonStub} from 'sinon';
import {DefaultDockerClient} from '../../../../src/integration/docker/impl/default-docker-client.js';
import {ShellRunner} from '../../../../src/core/shell-runner.js';
import {ShellCommandError} from '../../../../src/core/errors/shell-command-error.js';
import {getTestLogger} from '../../../helpers/test-doubles.js';

describe('DefaultDockerClient', () => {
  let run: SinonStub;
  let docker: DefaultDockerClient;

  const project = {
    projectName: 'magma-agw',
    composeFile: '/work/agw/docker-compose.yml',
    workingDirectory: '/work/agw',
  };

  beforeEach(() => {
    const logger = getTestLogger();
    const shellRunner = new ShellRunner(logger);
    run = sinon.stub(shellRunner, 'run').resolves([]);
    docker = new DefaultDockerClient(logger, shellRunner);
  });

  afterEach(() => sinon.restore());

  it('reports the engine unavailable when docker info fails', async () => {
    run.rejects(new ShellCommandError('docker info', 1, [], ['Cannot connect to the Docker daemon']));

    expect(await docker.isAvailable()).to.be.false;
  });

  it('starts and stops a compose project from its working directory', async () => {
    await docker.composeUp(project);
    await docker.composeDown(project);

    expect(run.firstCall).to.have.been.calledWith(
      "docker-compose -p 'magma-agw' -f '/work/agw/docker-compose.yml' up -d",
      false,
      {cwd: '/work/agw', signal: undefined},
    );
    expect(run.secondCall.args[0]).to.equal("docker-compose -p 'magma-agw' -f '/work/agw/docker-compose.yml' down");
  });

  it('lists containers with their component label', async () => {
    run.resolves(['magma-mme|running|accessGateway', 'magma-other|exited|']);

    const containers = await docker.listContainers('magma-');

    expect(run.firstCall.args[0]).to.equal(
      `docker ps -a --filter 'name=magma-' --format '{{.Names}}|{{.State}}|{{.Label "magma-deploy.component"}}'`,
    );
    expect(containers).to.deep.equal([
      {name: 'magma-mme', state: 'running', component: 'accessGateway'},
      {name: 'magma-other', state: 'exited', component: ''},
    ]);
  });

  it('removes nothing for an empty list', async () => {
    await docker.removeContainers([]);
    await docker.removeNetworks([]);
    await docker.removeVolumes([]);

    expect(run).not.to.have.been.called;
  });

  it('removes named resources in one call', async () => {
    await docker.removeVolumes(['magma-agw_data', 'magma-fgw_data']);

    expect(run).to.have.been.calledOnceWith("docker volume rm -f 'magma-agw_data' 'magma-fgw_data'");
  });

  it('parses a short container line', () => {
    expect(DefaultDockerClient.parseContainerLine('magma-mme')).to.deep.equal({
      name: 'magma-mme',
      state: '',
      component: '',
    });
  });
});
