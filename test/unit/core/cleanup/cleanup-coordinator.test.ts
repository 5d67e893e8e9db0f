// SPDX-License-Identifier: Apache-2.0

import {describe, it, beforeEach, afterEach} from 'mocha';
import {expect} from 'chai';
import fs from 'node:fs';
import sinon from 'sinon';
import {CleanupCoordinator} from '../../../../src/core/cleanup/cleanup-coordinator.js';
import {type CleanupConfirmations, type ResourceClass} from '../../../../src/core/cleanup/resource-class.js';
import {ConfigFileStore} from '../../../../src/core/config/config-file-store.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {
  getTestLogger,
  stubDockerClient,
  stubHelmClient,
  stubKubeClient,
  stubSystemClient,
} from '../../../helpers/test-doubles.js';
import {getTestDirectory, removeTestDirectory} from '../../../test-utility.js';

describe('CleanupCoordinator', () => {
  let directory: string;
  let configFilePath: string;
  let artifactsDirectory: string;
  let docker: ReturnType<typeof stubDockerClient>;
  let helm: ReturnType<typeof stubHelmClient>;
  let kube: ReturnType<typeof stubKubeClient>;
  let system: ReturnType<typeof stubSystemClient>;
  let coordinator: CleanupCoordinator;

  const confirmOnly = (...names: string[]): CleanupConfirmations => ({
    confirm: async (resourceClass: ResourceClass) => names.includes(resourceClass.name),
  });

  beforeEach(() => {
    directory = getTestDirectory('cleanup');
    configFilePath = PathEx.join(directory, 'config', 'magma_config.env');
    artifactsDirectory = PathEx.join(directory, 'artifacts');
    docker = stubDockerClient();
    helm = stubHelmClient();
    kube = stubKubeClient();
    system = stubSystemClient();
    const logger = getTestLogger();
    coordinator = new CleanupCoordinator(
      logger,
      docker,
      helm,
      kube,
      system,
      new ConfigFileStore(logger),
      configFilePath,
      artifactsDirectory,
      PathEx.join(directory, 'certs'),
      PathEx.join(directory, 'logs'),
    );

    helm.listReleases.resolves([
      {name: 'orc8r', namespace: 'magma', status: 'deployed', chart: 'orc8r-1.8.0'},
      {name: 'ingress', namespace: 'infra', status: 'deployed', chart: 'ingress-4.0.0'},
    ]);
    kube.namespaceExists.onFirstCall().resolves(true);
    docker.listContainers.onFirstCall().resolves([{name: 'magma-mme', state: 'running', component: 'accessGateway'}]);
    system.pathExists.callsFake((path: string) => path === artifactsDirectory || path === configFilePath);
    system.listServices.resolves(['magma@mme.service']);
  });

  afterEach(() => removeTestDirectory(directory));

  it('lists the targets of every resource class in removal order', async () => {
    const plan = await coordinator.plan();

    expect(plan.classes.map(resourceClass => [resourceClass.name, resourceClass.scope, resourceClass.targets])).to.deep.equal([
      ['helm-releases', 'ephemeral', ['magma/orc8r']],
      ['namespace', 'ephemeral', ['magma']],
      ['containers', 'ephemeral', ['magma-mme']],
      ['networks', 'ephemeral', []],
      ['volumes', 'ephemeral', []],
      ['working-directories', 'ephemeral', [artifactsDirectory]],
      ['configuration', 'destructive', [configFilePath]],
      ['certificates', 'destructive', []],
      ['run-logs', 'destructive', []],
      ['system-directories', 'destructive', []],
      ['system-services', 'destructive', ['magma@mme.service']],
    ]);
  });

  it('keeps a class whose probe failed without targets', async () => {
    docker.listNetworks.rejects(new Error('daemon down'));

    const plan = await coordinator.plan();

    expect(plan.classes[3]).to.deep.equal({
      name: 'networks',
      scope: 'ephemeral',
      description: "container networks whose name contains 'magma'",
      targets: [],
      probeError: 'daemon down',
    });
  });

  it('takes the namespace from the configuration file', async () => {
    fs.mkdirSync(PathEx.join(directory, 'config'));
    fs.writeFileSync(configFilePath, 'ORC8R_NAMESPACE="lab"\n');

    const plan = await coordinator.plan();

    expect(kube.namespaceExists).to.have.been.calledWith('lab');
    expect(plan.classes[1].targets).to.deep.equal(['lab']);
  });

  it('removes ephemeral classes and only the confirmed destructive ones', async () => {
    const confirmations = confirmOnly('configuration');
    const confirm = sinon.spy(confirmations, 'confirm');

    const report = await coordinator.execute(await coordinator.plan(), confirmations);

    expect(report.results.map(result => [result.name, result.status])).to.deep.equal([
      ['helm-releases', 'removed'],
      ['namespace', 'removed'],
      ['containers', 'removed'],
      ['networks', 'nothing-to-remove'],
      ['volumes', 'nothing-to-remove'],
      ['working-directories', 'removed'],
      ['configuration', 'removed'],
      ['certificates', 'nothing-to-remove'],
      ['run-logs', 'nothing-to-remove'],
      ['system-directories', 'nothing-to-remove'],
      ['system-services', 'declined'],
    ]);
    expect(confirm).to.have.been.calledTwice;
    expect(helm.uninstallChart).to.have.been.calledOnceWith('orc8r', 'magma');
    expect(kube.deleteNamespace).to.have.been.calledOnceWith('magma');
    expect(docker.removeContainers).to.have.been.calledOnceWith(['magma-mme']);
    expect(system.removePath).to.have.been.calledTwice;
    expect(system.removePath.firstCall).to.have.been.calledWith(artifactsDirectory);
    expect(system.removePath.secondCall).to.have.been.calledWith(configFilePath);
    expect(system.stopAndDisableService).not.to.have.been.called;
    expect(report.warnings).to.be.empty;
  });

  it('records a failed removal and carries on', async () => {
    docker.removeContainers.rejects(new Error('container is in use'));

    const report = await coordinator.execute(await coordinator.plan(), confirmOnly());

    expect(report.results[2]).to.deep.equal({
      name: 'containers',
      scope: 'ephemeral',
      targets: ['magma-mme'],
      status: 'failed',
      error: 'container is in use',
    });
    expect(report.results[5].status).to.equal('removed');
  });

  it('warns about residue found afterwards', async () => {
    docker.listContainers.resolves([{name: 'magma-mme', state: 'running', component: 'accessGateway'}]);
    kube.namespaceExists.onSecondCall().rejects(new Error('Unauthorized'));

    const report = await coordinator.execute(await coordinator.plan(), confirmOnly());

    expect(report.warnings).to.deep.equal([
      'containers still present: magma-mme',
      'namespace could not be verified: Unauthorized',
    ]);
  });

  it('asks before removing a destructive class even when the plan calls it ephemeral', async () => {
    await coordinator.plan();
    const confirmations = confirmOnly();
    const confirm = sinon.spy(confirmations, 'confirm');

    const report = await coordinator.execute(
      {
        classes: [
          {
            name: 'configuration',
            scope: 'ephemeral',
            description: 'the persisted configuration file',
            targets: [configFilePath, '/etc/shadow-copy'],
          },
        ],
      },
      confirmations,
    );

    expect(report.results).to.deep.equal([
      {name: 'configuration', scope: 'destructive', targets: [configFilePath], status: 'declined'},
    ]);
    expect(confirm).to.have.been.calledOnce;
    expect(confirm.firstCall.args[0].scope).to.equal('destructive');
    expect(confirm.firstCall.args[0].targets).to.deep.equal([configFilePath]);
    expect(system.removePath).not.to.have.been.called;
  });

  it('removes only targets its own plan found', async () => {
    const report = await coordinator.execute(
      {
        classes: [
          {name: 'working-directories', scope: 'ephemeral', description: 'working directories', targets: ['/srv/data']},
        ],
      },
      confirmOnly(),
    );

    expect(report.results).to.deep.equal([
      {name: 'working-directories', scope: 'ephemeral', targets: [], status: 'nothing-to-remove', error: undefined},
    ]);
    expect(system.removePath).not.to.have.been.called;
  });
});
