// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import * as yaml from 'yaml';
import {
  ArtifactGenerator,
  COMPONENT_LABEL,
  NMS_VALUES_FILE,
  ORC8R_VALUES_FILE,
  POSTGRESQL_VALUES_FILE,
} from '../../../../src/core/artifacts/artifact-generator.js';
import {ComponentId, COMPONENT_IDS} from '../../../../src/core/config/component-id.js';
import {recordFromValues} from '../../../../src/core/config/config-fields.js';
import {ArtifactError} from '../../../../src/core/errors/artifact-error.js';
import {testRecord, testValues} from '../../../helpers/test-doubles.js';

describe('ArtifactGenerator', () => {
  const generator = new ArtifactGenerator('registry.test', '1.0.0');

  it('renders the orchestrator chart values and the database values as secrets', () => {
    const bundle = generator.renderBundle(ComponentId.Orchestrator, testRecord([ComponentId.Orchestrator]));

    expect(bundle.directoryName).to.equal('orc8r');
    expect(bundle.files.map(file => [file.name, file.secret])).to.deep.equal([
      [ORC8R_VALUES_FILE, true],
      [POSTGRESQL_VALUES_FILE, true],
    ]);
    expect(yaml.parse(bundle.files[0].content)).to.deep.equal({
      global: {domain: 'test.local'},
      postgresql: {host: 'postgresql', port: 5432, user: 'magma', password: 'test-secret', database: 'magma'},
    });
    expect(yaml.parse(bundle.files[1].content)).to.deep.equal({
      auth: {postgresPassword: 'test-secret', username: 'magma', password: 'test-secret', database: 'magma'},
      primary: {persistence: {storageClass: 'standard'}},
    });
  });

  it('renders the management system values', () => {
    const content = generator.render(
      ComponentId.NetworkManagementSystem,
      testRecord([ComponentId.NetworkManagementSystem]),
    );

    expect(yaml.parse(content)).to.deep.equal({
      global: {domain: 'test.local'},
      nms: {admin: {email: 'admin@test.local'}, host: 'test.local', port: 8080},
    });
    expect(generator.renderBundle(ComponentId.NetworkManagementSystem, testRecord(COMPONENT_IDS)).files[0].name).to.equal(
      NMS_VALUES_FILE,
    );
  });

  it('renders one compose service per access gateway service', () => {
    const bundle = generator.renderBundle(ComponentId.AccessGateway, testRecord([ComponentId.AccessGateway]));
    const compose = yaml.parse(bundle.files[0].content);

    expect(bundle.files.map(file => file.name)).to.deep.equal(['docker-compose.yml', 'configs/gateway.mconfig']);
    expect(Object.keys(compose.services)).to.deep.equal([
      'magmad',
      'mme',
      'spgw',
      'sessiond',
      'mobilityd',
      'policydb',
      'subscriberdb',
      'enodebd',
      'connectiond',
      'health',
    ]);
    expect(compose.services.magmad).to.deep.equal({
      image: 'registry.test/magmad:1.0.0',
      container_name: 'magma-magmad',
      privileged: true,
      network_mode: 'host',
      volumes: ['/var/run/docker.sock:/var/run/docker.sock', './configs:/etc/magma'],
      environment: ['MAGMA_PRINT_GRPC_PAYLOAD=0'],
      labels: {[COMPONENT_LABEL]: 'accessGateway'},
      restart: 'unless-stopped',
    });
    expect(compose.services.mme.depends_on).to.deep.equal(['magmad']);
  });

  it('keeps numeric looking codes as strings in the gateway configuration', () => {
    const content = generator.renderBundle(ComponentId.AccessGateway, testRecord([ComponentId.AccessGateway])).files[1]
      .content;
    const gateway = yaml.parse(content);

    expect(content.startsWith('---\n')).to.be.true;
    expect(gateway.mconfig.mme_config.mcc).to.equal('001');
    expect(gateway.mconfig.mme_config.mnc).to.equal('01');
    expect(gateway.mconfig.mme_config.tac).to.equal(1);
    expect(gateway.mconfig.mme_config.s1ap_ip).to.equal('10.0.0.10');
    expect(gateway.mconfig.pipelined_config.nat_iface).to.equal('eth0');
  });

  it('renders the federated gateway with its served networks', () => {
    const bundle = generator.renderBundle(ComponentId.FederatedGateway, testRecord([ComponentId.FederatedGateway]));
    const compose = yaml.parse(bundle.files[0].content);
    const gateway = yaml.parse(bundle.files[1].content);

    expect(bundle.files[1].name).to.equal('configs/feg_gateway.mconfig');
    expect(compose.services.feg_hello.container_name).to.equal('magma-fgw-feg_hello');
    expect(gateway.mconfig.federation_config).to.deep.equal({
      federation_id: 'fgw01',
      served_network_ids: ['network1', 'network2'],
    });
    expect(gateway.mconfig.diameter_config).to.deep.equal({host: 'fgw.test.local', realm: 'test.local', port: 3868});
  });

  it('renders identical records to identical text', () => {
    const first = generator.renderBundle(ComponentId.FederatedGateway, testRecord(COMPONENT_IDS));
    const second = generator.renderBundle(ComponentId.FederatedGateway, testRecord(COMPONENT_IDS));

    expect(second).to.deep.equal(first);
  });

  it('refuses a component that is not selected', () => {
    expect(() => generator.render(ComponentId.AccessGateway, testRecord([ComponentId.Orchestrator]))).to.throw(
      ArtifactError,
      'accessGateway is not selected in the configuration record',
    );
  });

  it('refuses a record holding an invalid value', () => {
    const values = testValues([ComponentId.Orchestrator]);
    values.set('EXTERNAL_IP', 'not-an-ip');
    const record = recordFromValues(values, [ComponentId.Orchestrator]);

    expect(() => generator.render(ComponentId.Orchestrator, record)).to.throw(
      ArtifactError,
      'cannot render orchestrator: EXTERNAL_IP must be an IPv4 address in dotted-quad form, e.g. 10.0.0.5',
    );
  });
});
