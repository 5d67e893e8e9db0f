// SPDX-License-Identifier: Apache-2.0

import * as yaml from 'yaml';
import {ComponentId, componentAlias} from '../config/component-id.js';
import {
  type AccessGatewaySettings,
  type ConfigurationRecord,
  deploymentNamespace,
  type FederatedGatewaySettings,
  type OrchestratorSettings,
} from '../config/configuration-record.js';
import {type FieldValidator, validateValue, Validators} from '../config/validators.js';
import {ArtifactError} from '../errors/artifact-error.js';
import {
  containerName,
  GATEWAY_LAYOUTS,
  type GatewayComponent,
  type GatewayLayout,
  isGatewayComponent,
} from './gateway-services.js';
import * as constants from '../constants.js';

export interface ArtifactFile {
  /** Path relative to the component working directory. */
  readonly name: string;
  readonly content: string;
  /** Secret files are written readable by the owner only. */
  readonly secret: boolean;
}

export interface ArtifactBundle {
  readonly componentId: ComponentId;
  readonly directoryName: string;
  /** The primary descriptor comes first. */
  readonly files: readonly ArtifactFile[];
}

export const COMPONENT_LABEL = 'magma-deploy.component';
export const ORC8R_VALUES_FILE = 'orc8r-values.yaml';
export const POSTGRESQL_VALUES_FILE = 'postgresql-values.yaml';
export const NMS_VALUES_FILE = 'nms-values.yaml';

const YAML_OPTIONS = {lineWidth: 0} as const;

/**
 * Renders deployment descriptors from a configuration record. Rendering does no I/O and identical records always
 * render to byte-identical text. Every scalar goes through the YAML serializer, which quotes or escapes values as
 * needed, so no field value can change the structure of a descriptor.
 */
export class ArtifactGenerator {
  public constructor(
    private readonly imageRegistry: string = constants.MAGMA_IMAGE_REGISTRY,
    private readonly imageTag: string = constants.MAGMA_IMAGE_TAG,
  ) {}

  /**
   * @returns the primary descriptor of the component
   * @throws ArtifactError if the record cannot be rendered for the component
   */
  public render(componentId: ComponentId, record: ConfigurationRecord): string {
    return this.renderBundle(componentId, record).files[0].content;
  }

  /**
   * @returns the primary descriptor and its support files
   * @throws ArtifactError if the record cannot be rendered for the component
   */
  public renderBundle(componentId: ComponentId, record: ConfigurationRecord): ArtifactBundle {
    this.checkGeneral(componentId, record);

    let files: ArtifactFile[];
    switch (componentId) {
      case ComponentId.Orchestrator: {
        files = this.renderOrchestrator(record, this.requireSettings(componentId, record.orchestrator));
        break;
      }
      case ComponentId.NetworkManagementSystem: {
        files = this.renderNetworkManagementSystem(record);
        break;
      }
      case ComponentId.AccessGateway: {
        files = this.renderAccessGateway(this.requireSettings(componentId, record.accessGateway));
        break;
      }
      case ComponentId.FederatedGateway: {
        files = this.renderFederatedGateway(this.requireSettings(componentId, record.federatedGateway));
        break;
      }
    }

    return {componentId, directoryName: componentAlias(componentId), files};
  }

  private renderOrchestrator(record: ConfigurationRecord, settings: OrchestratorSettings): ArtifactFile[] {
    this.check(ComponentId.Orchestrator, {
      ORC8R_NAMESPACE: [settings.namespace, Validators.namespace],
      ORC8R_STORAGE_CLASS: [settings.storageClass, Validators.storageClass],
      ORC8R_DB_HOST: [settings.dbHost, Validators.hostName],
      ORC8R_DB_PORT: [String(settings.dbPort), Validators.port],
      ORC8R_DB_USER: [settings.dbUser, Validators.identifier],
      ORC8R_DB_PASSWORD: [settings.dbPassword.reveal(), Validators.secret],
      ORC8R_DB_NAME: [settings.dbName, Validators.identifier],
    });

    const password = settings.dbPassword.reveal();
    const orc8rValues = {
      global: {domain: record.domain},
      postgresql: {
        host: settings.dbHost,
        port: settings.dbPort,
        user: settings.dbUser,
        password,
        database: settings.dbName,
      },
    };
    const postgresqlValues = {
      auth: {
        postgresPassword: password,
        username: settings.dbUser,
        password,
        database: settings.dbName,
      },
      primary: {persistence: {storageClass: settings.storageClass}},
    };

    return [
      {name: ORC8R_VALUES_FILE, content: yaml.stringify(orc8rValues, YAML_OPTIONS), secret: true},
      {name: POSTGRESQL_VALUES_FILE, content: yaml.stringify(postgresqlValues, YAML_OPTIONS), secret: true},
    ];
  }

  private renderNetworkManagementSystem(record: ConfigurationRecord): ArtifactFile[] {
    this.check(ComponentId.NetworkManagementSystem, {
      ORC8R_NAMESPACE: [deploymentNamespace(record), Validators.namespace],
    });

    const nmsValues = {
      global: {domain: record.domain},
      nms: {
        admin: {email: record.adminEmail},
        host: record.domain,
        port: constants.NMS_PORT,
      },
    };
    return [{name: NMS_VALUES_FILE, content: yaml.stringify(nmsValues, YAML_OPTIONS), secret: false}];
  }

  private renderAccessGateway(settings: AccessGatewaySettings): ArtifactFile[] {
    this.check(ComponentId.AccessGateway, {
      AGW_INTERFACE: [settings.interface, Validators.interfaceName],
      AGW_IP: [settings.ip, Validators.ipv4],
      AGW_MCC: [settings.mcc, Validators.mcc],
      AGW_MNC: [settings.mnc, Validators.mnc],
      AGW_TAC: [String(settings.tac), Validators.tac],
      AGW_S1AP_IP: [settings.s1apIp, Validators.ipv4],
      AGW_S1AP_PORT: [String(settings.s1apPort), Validators.port],
    });

    const mconfig = {
      mme_config: {
        mcc: settings.mcc,
        mnc: settings.mnc,
        tac: settings.tac,
        mme_code: 1,
        mme_gid: 1,
        enable_dns_caching: false,
        non_eps_service_control: 0,
        csfb_mcc: settings.mcc,
        csfb_mnc: settings.mnc,
        lac: 1,
        s1ap_ip: settings.s1apIp,
        s1ap_port: settings.s1apPort,
      },
      spgw_config: {
        enable_nat: true,
        gtpu_endpoint: settings.ip,
      },
      pipelined_config: {
        nat_iface: settings.interface,
      },
      mobility_config: {
        ip_pool: constants.MOBILITY_IP_POOL,
        static_ip_enabled: false,
        multi_apn_ip_alloc: false,
        nat_enabled: true,
        enable_static_ip_assignments: false,
      },
    };

    return this.renderGateway(ComponentId.AccessGateway, mconfig);
  }

  private renderFederatedGateway(settings: FederatedGatewaySettings): ArtifactFile[] {
    this.check(ComponentId.FederatedGateway, {
      FGW_FEDERATION_ID: [settings.federationId, Validators.identifier],
      FGW_SERVED_NETWORKS: [settings.servedNetworks.join(','), Validators.identifierList],
      FGW_DIAMETER_HOST: [settings.diameterHost, Validators.hostName],
      FGW_DIAMETER_REALM: [settings.diameterRealm, Validators.hostName],
      FGW_DIAMETER_PORT: [String(settings.diameterPort), Validators.port],
    });
    if (settings.servedNetworks.some(network => network.includes(','))) {
      throw new ArtifactError('FGW_SERVED_NETWORKS entries must not contain commas', ComponentId.FederatedGateway);
    }

    const mconfig = {
      federation_config: {
        federation_id: settings.federationId,
        served_network_ids: [...settings.servedNetworks],
      },
      diameter_config: {
        host: settings.diameterHost,
        realm: settings.diameterRealm,
        port: settings.diameterPort,
      },
      health_config: {
        health_service_enabled: true,
        update_interval_secs: 10,
        cloud_disable_period_secs: 10,
        local_disable_period_secs: 1,
      },
      session_proxy_config: {
        request_timeout: 30,
        endpoint_timeout: 30,
      },
    };

    return this.renderGateway(ComponentId.FederatedGateway, mconfig);
  }

  private renderGateway(componentId: GatewayComponent, mconfig: object): ArtifactFile[] {
    const layout = this.layout(componentId);
    const gatewayConfig = {
      magmad_config: {
        checkin_interval: 60,
        checkin_timeout: 30,
        autoupgrade_enabled: false,
        autoupgrade_poll_interval: 300,
        package_version: '0.0.0-0',
        images: [],
        tier: 'default',
        feature_flags: {},
        dynamic_services: [],
      },
      mconfig,
    };

    return [
      {name: constants.COMPOSE_FILE, content: this.renderCompose(componentId, layout), secret: false},
      {
        name: `configs/${layout.mconfigFile}`,
        content: '---\n' + yaml.stringify(gatewayConfig, YAML_OPTIONS),
        secret: false,
      },
    ];
  }

  private renderCompose(componentId: GatewayComponent, layout: GatewayLayout): string {
    const services = Object.fromEntries(
      layout.services.map(service => [
        service.name,
        {
          image: `${this.imageRegistry}/${service.name}:${this.imageTag}`,
          container_name: containerName(layout, service),
          ...(service.privileged ? {privileged: true} : {}),
          network_mode: 'host',
          ...(service.dependsOn ? {depends_on: [...service.dependsOn]} : {}),
          volumes: [
            ...(service.dockerSocket ? ['/var/run/docker.sock:/var/run/docker.sock'] : []),
            './configs:/etc/magma',
          ],
          environment: ['MAGMA_PRINT_GRPC_PAYLOAD=0'],
          labels: {[COMPONENT_LABEL]: componentId},
          restart: 'unless-stopped',
        },
      ]),
    );

    return yaml.stringify({version: '3.8', services}, YAML_OPTIONS);
  }

  private layout(componentId: GatewayComponent): GatewayLayout {
    const layout = GATEWAY_LAYOUTS.get(componentId);
    if (!layout) {
      throw new ArtifactError(`no service layout for ${componentId}`, componentId);
    }
    return layout;
  }

  private checkGeneral(componentId: ComponentId, record: ConfigurationRecord): void {
    if (!record.selectedComponents.includes(componentId)) {
      throw new ArtifactError(`${componentId} is not selected in the configuration record`, componentId);
    }
    const general: Record<string, [string, FieldValidator]> = {
      DOMAIN: [record.domain, Validators.hostName],
      ADMIN_EMAIL: [record.adminEmail, Validators.email],
      EXTERNAL_IP: [record.externalIp, Validators.ipv4],
    };
    if (!isGatewayComponent(componentId)) {
      general.TLS_CERT_PATH = [record.tls.certificatePath, Validators.absolutePath];
      general.TLS_KEY_PATH = [record.tls.keyPath, Validators.absolutePath];
    }
    this.check(componentId, general);
  }

  private check(componentId: ComponentId, values: Record<string, [string, FieldValidator]>): void {
    for (const [key, [value, validator]] of Object.entries(values)) {
      const reason = validateValue(value, validator);
      if (reason !== undefined) {
        throw new ArtifactError(`cannot render ${componentId}: ${key} ${reason}`, componentId);
      }
    }
  }

  private requireSettings<T>(componentId: ComponentId, settings: T | undefined): T {
    if (settings === undefined) {
      throw new ArtifactError(`configuration record has no ${componentId} settings`, componentId);
    }
    return settings;
  }
}
