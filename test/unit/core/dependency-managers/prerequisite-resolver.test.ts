// SPDX-License-Identifier: Apache-2.0

import {describe, it, beforeEach, afterEach} from 'mocha';
import {expect} from 'chai';
import fs from 'node:fs';
import sinon, {type SinonStub} from 'sinon';
import {PrerequisiteResolver} from '../../../../src/core/dependency-managers/prerequisite-resolver.js';
import {ToolProbe} from '../../../../src/core/dependency-managers/tool-probe.js';
import {type ToolName} from '../../../../src/core/dependency-managers/tool-name.js';
import {ShellRunner} from '../../../../src/core/shell-runner.js';
import {ShellCommandError} from '../../../../src/core/errors/shell-command-error.js';
import {PrerequisiteError} from '../../../../src/core/errors/prerequisite-error.js';
import {UnsupportedPlatformError} from '../../../../src/core/errors/unsupported-platform-error.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {getTestLogger} from '../../../helpers/test-doubles.js';
import {runTasks} from '../../../helpers/listr.js';
import {getTestDirectory, removeTestDirectory} from '../../../test-utility.js';

describe('PrerequisiteResolver', () => {
  let directory: string;
  let osReleasePath: string;
  let present: Set<string>;
  let run: SinonStub;
  let resolver: PrerequisiteResolver;

  beforeEach(() => {
    directory = getTestDirectory('prerequisites');
    osReleasePath = PathEx.join(directory, 'os-release');
    fs.writeFileSync(osReleasePath, 'ID=ubuntu\nVERSION_ID="22.04"\n');

    present = new Set(['git']);
    const probe = new ToolProbe('');
    sinon.stub(probe, 'isPresent').callsFake((tool: string) => present.has(tool));

    const logger = getTestLogger();
    const shellRunner = new ShellRunner(logger);
    run = sinon.stub(shellRunner, 'run').resolves([]);

    resolver = new PrerequisiteResolver(logger, shellRunner, probe, osReleasePath);
  });

  afterEach(() => {
    sinon.restore();
    removeTestDirectory(directory);
  });

  it('reports the presence of each tool without running anything', () => {
    const prerequisites = resolver.check(['git', 'kubectl', 'helm']);

    expect([...prerequisites]).to.deep.equal([
      ['git', true],
      ['kubectl', false],
      ['helm', false],
    ]);
    expect(resolver.missing(prerequisites)).to.deep.equal(['kubectl', 'helm']);
    expect(run).not.to.have.been.called;
  });

  it('reads the OS family from the release file', () => {
    expect(resolver.detectOsFamily()).to.equal('debian');

    fs.rmSync(osReleasePath);
    expect(resolver.detectOsFamily()).to.equal('unknown');
  });

  it('plans one step per missing tool', () => {
    const plan = resolver.resolveMissing(['git', 'helm'], 'rhel');

    expect(plan.osFamily).to.equal('rhel');
    expect(plan.steps.map(step => step.description)).to.deep.equal(['Install git', 'Install helm 3']);
    expect(plan.steps[0].commands).to.deep.equal(['sudo yum install -y git']);
  });

  it('refuses to plan for an unknown OS family', () => {
    expect(() => resolver.resolveMissing(['git'], 'unknown')).to.throw(
      UnsupportedPlatformError,
      "Unsupported OS family 'unknown', install the prerequisites manually",
    );
  });

  it('skips steps whose tool appeared and stops at the first failing step', async () => {
    run.callsFake(async (command: string) => {
      if (command.startsWith('curl -fsSLO')) {
        throw new ShellCommandError(command, 22, [], ['curl: (22) The requested URL returned error: 404']);
      }
      return [];
    });

    const result = await resolver.executePlan(resolver.resolveMissing(['git', 'kubectl', 'helm'], 'debian'));

    expect(result.skipped.map(step => step.tool)).to.deep.equal(['git']);
    expect(result.succeeded).to.be.empty;
    expect(result.failed?.step.tool).to.equal('kubectl');
    expect(result.remaining.map(step => step.tool)).to.deep.equal(['helm']);
  });

  describe('taskResolvePrerequisites', () => {
    it('asks nothing when every tool is present', async () => {
      const confirm = sinon.stub().resolves(true);

      await runTasks(resolver.taskResolvePrerequisites<object>(['git'], confirm), {});

      expect(confirm).not.to.have.been.called;
    });

    it('fails when installing is declined', async () => {
      const confirm = sinon.stub().resolves(false);

      await expect(runTasks(resolver.taskResolvePrerequisites<object>(['git', 'helm'], confirm), {})).to.be.rejectedWith(
        PrerequisiteError,
        'Missing prerequisites: helm',
      );
      expect(confirm).to.have.been.calledOnceWith(['helm']);
      expect(run).not.to.have.been.called;
    });

    it('installs the missing tools once confirmed', async () => {
      const confirm = sinon.stub().resolves(true);
      const tools: ToolName[] = ['git', 'helm'];

      await runTasks(resolver.taskResolvePrerequisites<object>(tools, confirm), {});

      expect(run).to.have.been.calledOnceWith(
        'curl -fsSL https://raw.githubusercontent.com/helm/helm/main/scripts/get-helm-3 | bash',
      );
    });

    it('reports what is still missing after a failed install', async () => {
      run.rejects(new ShellCommandError('install', 1, [], ['E: Unable to locate package']));

      await expect(
        runTasks(resolver.taskResolvePrerequisites<object>(['docker', 'kubectl'], sinon.stub().resolves(true)), {}),
      ).to.be.rejectedWith(PrerequisiteError, 'Failed to install docker engine; still missing: docker, kubectl');
    });
  });
});
