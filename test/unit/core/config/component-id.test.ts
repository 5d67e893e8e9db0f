// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {
  ComponentId,
  componentDisplayName,
  formatComponentList,
  parseComponentId,
  parseComponentList,
} from '../../../../src/core/config/component-id.js';
import {ValidationError} from '../../../../src/core/errors/validation-error.js';

describe('ComponentId', () => {
  it('parses ids and aliases without regard to case', () => {
    expect(parseComponentId('ORC8R')).to.equal(ComponentId.Orchestrator);
    expect(parseComponentId('accessGateway')).to.equal(ComponentId.AccessGateway);
    expect(parseComponentId(' fgw ')).to.equal(ComponentId.FederatedGateway);
    expect(parseComponentId('radius')).to.be.undefined;
  });

  it('returns lists in canonical order without duplicates', () => {
    expect(parseComponentList('nms, orc8r')).to.deep.equal([
      ComponentId.Orchestrator,
      ComponentId.NetworkManagementSystem,
    ]);
    expect(parseComponentList('agw,AGW,accessGateway')).to.deep.equal([ComponentId.AccessGateway]);
  });

  it('rejects an empty selection', () => {
    expect(() => parseComponentList(' , ')).to.throw(
      ValidationError,
      'Invalid value for COMPONENTS: at least one component must be selected',
    );
  });

  it('rejects unknown components and names the field', () => {
    expect(() => parseComponentList('orc8r,foo', '--components')).to.throw(
      ValidationError,
      "Invalid value for --components: unknown component 'foo', expected one of orc8r, agw, fgw, nms",
    );
  });

  it('formats lists with the short aliases', () => {
    expect(formatComponentList([ComponentId.Orchestrator, ComponentId.NetworkManagementSystem])).to.equal('orc8r,nms');
    expect(componentDisplayName(ComponentId.FederatedGateway)).to.equal('Federated Gateway');
  });
});
