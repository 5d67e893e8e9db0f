// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {detectOsFamily} from '../../../../src/core/dependency-managers/os-family.js';
import {requiredTools} from '../../../../src/core/dependency-managers/tool-name.js';
import {ComponentId, COMPONENT_IDS} from '../../../../src/core/config/component-id.js';

describe('detectOsFamily', () => {
  it('maps the release id', () => {
    expect(detectOsFamily('NAME="Ubuntu"\nID=ubuntu\nVERSION_ID="22.04"\n')).to.equal('debian');
    expect(detectOsFamily('ID="rocky"\n')).to.equal('rhel');
  });

  it('falls back to the related ids', () => {
    expect(detectOsFamily('ID=linuxmint\nID_LIKE="ubuntu debian"\n')).to.equal('debian');
    expect(detectOsFamily('ID=ol\nID_LIKE="fedora"\n')).to.equal('rhel');
  });

  it('reports anything else as unknown', () => {
    expect(detectOsFamily('ID=alpine\n')).to.equal('unknown');
    expect(detectOsFamily('')).to.equal('unknown');
  });
});

describe('requiredTools', () => {
  it('always needs git', () => {
    expect(requiredTools([])).to.deep.equal(['git']);
  });

  it('needs the cluster tools for cluster components', () => {
    expect(requiredTools([ComponentId.NetworkManagementSystem])).to.deep.equal(['git', 'kubectl', 'helm']);
  });

  it('needs the container tools for gateways', () => {
    expect(requiredTools([ComponentId.FederatedGateway])).to.deep.equal(['git', 'docker', 'docker-compose']);
  });

  it('lists every tool once in install order', () => {
    expect(requiredTools(COMPONENT_IDS)).to.deep.equal(['git', 'docker', 'docker-compose', 'kubectl', 'helm']);
  });
});
