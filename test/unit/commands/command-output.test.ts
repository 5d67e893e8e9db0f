// SPDX-License-Identifier: Apache-2.0

import {describe, it, before, after} from 'mocha';
import {expect} from 'chai';
import chalk, {type ColorSupportLevel} from 'chalk';
import {StatusCommand} from '../../../src/commands/status.js';
import {CleanCommand} from '../../../src/commands/clean.js';
import {DeployCommand} from '../../../src/commands/deploy.js';
import {Flags} from '../../../src/commands/flags.js';
import {FacetState} from '../../../src/core/status/status-snapshot.js';
import {COMPONENT_IDS, ComponentId} from '../../../src/core/config/component-id.js';

describe('command output', () => {
  let level: ColorSupportLevel;

  before(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  after(() => {
    chalk.level = level;
  });

  it('prints a status facet on one line', () => {
    expect(
      StatusCommand.formatFacet({name: 'memory', state: FacetState.Degraded, detail: '4096 MB total, 2048 MB available'}),
    ).to.equal('memory: Degraded - 4096 MB total, 2048 MB available');
    expect(StatusCommand.formatFacet({name: 'runtime', state: FacetState.Healthy, detail: ''})).to.equal(
      'runtime: Healthy',
    );
  });

  it('prints each removal outcome', () => {
    const targets = ['magma-magmad', 'magma-mme'];

    expect(CleanCommand.formatResult({name: 'containers', scope: 'ephemeral', status: 'removed', targets})).to.equal(
      'containers: removed (magma-magmad, magma-mme)',
    );
    expect(
      CleanCommand.formatResult({name: 'configuration', scope: 'destructive', status: 'declined', targets: ['a']}),
    ).to.equal('configuration: kept (a)');
    expect(
      CleanCommand.formatResult({name: 'volumes', scope: 'ephemeral', status: 'failed', targets, error: 'busy'}),
    ).to.equal('volumes: failed - busy');
    expect(
      CleanCommand.formatResult({name: 'namespace', scope: 'ephemeral', status: 'nothing-to-remove', targets: []}),
    ).to.equal('namespace: nothing to remove');
    expect(
      CleanCommand.formatResult({
        name: 'namespace',
        scope: 'ephemeral',
        status: 'nothing-to-remove',
        targets: [],
        error: 'cluster unreachable',
      }),
    ).to.equal('namespace: not checked - cluster unreachable');
  });

  describe('components checked for prerequisites', () => {
    it('prefers the command line override', () => {
      const options = Flags.parse({components: 'agw'});

      expect(DeployCommand.componentsHint(options, new Map([['COMPONENTS', 'orc8r,nms']]))).to.deep.equal([
        ComponentId.AccessGateway,
      ]);
    });

    it('falls back to the configuration file selection', () => {
      expect(DeployCommand.componentsHint(Flags.parse({}), new Map([['COMPONENTS', 'fgw']]))).to.deep.equal([
        ComponentId.FederatedGateway,
      ]);
    });

    it('checks every component when the selection is missing or invalid', () => {
      expect(DeployCommand.componentsHint(Flags.parse({}), undefined)).to.equal(COMPONENT_IDS);
      expect(DeployCommand.componentsHint(Flags.parse({components: 'sgw'}), undefined)).to.equal(COMPONENT_IDS);
    });
  });
});
