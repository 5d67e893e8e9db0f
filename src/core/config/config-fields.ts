// SPDX-License-Identifier: Apache-2.0

import {ComponentId, formatComponentList, parseComponentList} from './component-id.js';
import {type ComponentWithSettings, type ConfigurationRecord} from './configuration-record.js';
import {SecretValue} from './secret-value.js';
import {type FieldValidator, splitList, Validators} from './validators.js';
import {ValidationError} from '../errors/validation-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {deepFreeze} from '../helpers.js';
import * as constants from '../constants.js';

export type FieldGroup = 'general' | ComponentWithSettings | 'tls';

/** Answers collected so far, keyed by field key. */
export type FieldValues = ReadonlyMap<string, string>;

export interface ConfigField {
  /** Key of the field in the persisted configuration file. */
  readonly key: string;
  readonly label: string;
  readonly group: FieldGroup;
  readonly validate: FieldValidator;
  /** Static default, or one derived from earlier answers. */
  readonly defaultValue?: string | ((values: FieldValues) => string | undefined);
  readonly secret?: boolean;
  /** Fields that are never prompted for still load from the file and take their default. */
  readonly interactive?: boolean;
}

export const COMPONENTS_KEY = 'COMPONENTS';

const componentList: FieldValidator = value => {
  try {
    parseComponentList(value);
    return undefined;
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.reason;
    }
    throw error;
  }
};

/**
 * All configuration fields in prompt order.
 *
 * @param certificatesDirectory - directory holding the generated TLS material when no paths are configured
 */
export function configFields(certificatesDirectory: string): readonly ConfigField[] {
  return [
    {
      key: COMPONENTS_KEY,
      label: 'Components to deploy (orc8r, agw, fgw, nms; comma separated)',
      group: 'general',
      validate: componentList,
      defaultValue: 'orc8r,nms',
    },
    {key: 'DOMAIN', label: 'Domain name', group: 'general', validate: Validators.hostName, defaultValue: constants.DEFAULT_DOMAIN},
    {key: 'ADMIN_EMAIL', label: 'Administrator email', group: 'general', validate: Validators.email},
    {key: 'EXTERNAL_IP', label: 'External IP address', group: 'general', validate: Validators.ipv4},

    {
      key: 'ORC8R_NAMESPACE',
      label: 'Orchestrator Kubernetes namespace',
      group: ComponentId.Orchestrator,
      validate: Validators.namespace,
      defaultValue: constants.DEFAULT_NAMESPACE,
    },
    {
      key: 'ORC8R_STORAGE_CLASS',
      label: 'Orchestrator storage class',
      group: ComponentId.Orchestrator,
      validate: Validators.storageClass,
      defaultValue: 'standard',
    },
    {
      key: 'ORC8R_DB_HOST',
      label: 'Database host',
      group: ComponentId.Orchestrator,
      validate: Validators.hostName,
      defaultValue: 'postgresql',
    },
    {key: 'ORC8R_DB_PORT', label: 'Database port', group: ComponentId.Orchestrator, validate: Validators.port, defaultValue: '5432'},
    {
      key: 'ORC8R_DB_USER',
      label: 'Database user',
      group: ComponentId.Orchestrator,
      validate: Validators.identifier,
      defaultValue: 'magma',
    },
    {
      key: 'ORC8R_DB_PASSWORD',
      label: 'Database password',
      group: ComponentId.Orchestrator,
      validate: Validators.secret,
      secret: true,
    },
    {
      key: 'ORC8R_DB_NAME',
      label: 'Database name',
      group: ComponentId.Orchestrator,
      validate: Validators.identifier,
      defaultValue: 'magma',
    },

    {
      key: 'AGW_INTERFACE',
      label: 'Access gateway network interface',
      group: ComponentId.AccessGateway,
      validate: Validators.interfaceName,
      defaultValue: 'eth0',
    },
    {key: 'AGW_IP', label: 'Access gateway IP address', group: ComponentId.AccessGateway, validate: Validators.ipv4},
    {key: 'AGW_MCC', label: 'Mobile country code (MCC)', group: ComponentId.AccessGateway, validate: Validators.mcc, defaultValue: '001'},
    {key: 'AGW_MNC', label: 'Mobile network code (MNC)', group: ComponentId.AccessGateway, validate: Validators.mnc, defaultValue: '01'},
    {key: 'AGW_TAC', label: 'Tracking area code (TAC)', group: ComponentId.AccessGateway, validate: Validators.tac, defaultValue: '1'},
    {
      key: 'AGW_S1AP_IP',
      label: 'S1AP IP address',
      group: ComponentId.AccessGateway,
      validate: Validators.ipv4,
      defaultValue: values => values.get('AGW_IP'),
    },
    {
      key: 'AGW_S1AP_PORT',
      label: 'S1AP port',
      group: ComponentId.AccessGateway,
      validate: Validators.port,
      defaultValue: '36412',
    },

    {
      key: 'FGW_FEDERATION_ID',
      label: 'Federation ID',
      group: ComponentId.FederatedGateway,
      validate: Validators.identifier,
      defaultValue: 'fgw01',
    },
    {
      key: 'FGW_SERVED_NETWORKS',
      label: 'Served network IDs (comma separated)',
      group: ComponentId.FederatedGateway,
      validate: Validators.identifierList,
      defaultValue: 'network1,network2',
    },
    {
      key: 'FGW_DIAMETER_HOST',
      label: 'Diameter host',
      group: ComponentId.FederatedGateway,
      validate: Validators.hostName,
      defaultValue: 'fgw.magma.local',
    },
    {
      key: 'FGW_DIAMETER_REALM',
      label: 'Diameter realm',
      group: ComponentId.FederatedGateway,
      validate: Validators.hostName,
      defaultValue: 'magma.local',
    },
    {
      key: 'FGW_DIAMETER_PORT',
      label: 'Diameter port',
      group: ComponentId.FederatedGateway,
      validate: Validators.port,
      defaultValue: '3868',
    },

    {
      key: 'TLS_CERT_PATH',
      label: 'TLS certificate path',
      group: 'tls',
      validate: Validators.absolutePath,
      defaultValue: PathEx.join(certificatesDirectory, 'tls.crt'),
      interactive: false,
    },
    {
      key: 'TLS_KEY_PATH',
      label: 'TLS private key path',
      group: 'tls',
      validate: Validators.absolutePath,
      defaultValue: PathEx.join(certificatesDirectory, 'tls.key'),
      interactive: false,
    },
  ];
}

/** The fields a selection of components requires, in prompt order. */
export function fieldsFor(fields: readonly ConfigField[], selected: readonly ComponentId[]): ConfigField[] {
  return fields.filter(
    field => field.group === 'general' || field.group === 'tls' || selected.some(id => id === field.group),
  );
}

export function defaultFor(field: ConfigField, values: FieldValues): string | undefined {
  return typeof field.defaultValue === 'function' ? field.defaultValue(values) : field.defaultValue;
}

function required(values: FieldValues, key: string): string {
  const value = values.get(key);
  if (value === undefined) {
    throw new ValidationError(key, 'is required');
  }
  return value;
}

/**
 * Builds the immutable record from validated field values.
 *
 * @throws ValidationError if a value required by the selection is absent
 */
export function recordFromValues(values: FieldValues, selected: readonly ComponentId[]): ConfigurationRecord {
  const has = (id: ComponentId) => selected.includes(id);
  const text = (key: string) => required(values, key);
  const number = (key: string) => Number.parseInt(required(values, key), 10);

  return deepFreeze<ConfigurationRecord>({
    domain: text('DOMAIN'),
    adminEmail: text('ADMIN_EMAIL'),
    externalIp: text('EXTERNAL_IP'),
    selectedComponents: [...selected],
    orchestrator: has(ComponentId.Orchestrator)
      ? {
          namespace: text('ORC8R_NAMESPACE'),
          storageClass: text('ORC8R_STORAGE_CLASS'),
          dbHost: text('ORC8R_DB_HOST'),
          dbPort: number('ORC8R_DB_PORT'),
          dbUser: text('ORC8R_DB_USER'),
          dbPassword: new SecretValue(text('ORC8R_DB_PASSWORD')),
          dbName: text('ORC8R_DB_NAME'),
        }
      : undefined,
    accessGateway: has(ComponentId.AccessGateway)
      ? {
          interface: text('AGW_INTERFACE'),
          ip: text('AGW_IP'),
          mcc: text('AGW_MCC'),
          mnc: text('AGW_MNC'),
          tac: number('AGW_TAC'),
          s1apIp: text('AGW_S1AP_IP'),
          s1apPort: number('AGW_S1AP_PORT'),
        }
      : undefined,
    federatedGateway: has(ComponentId.FederatedGateway)
      ? {
          federationId: text('FGW_FEDERATION_ID'),
          servedNetworks: splitList(text('FGW_SERVED_NETWORKS')),
          diameterHost: text('FGW_DIAMETER_HOST'),
          diameterRealm: text('FGW_DIAMETER_REALM'),
          diameterPort: number('FGW_DIAMETER_PORT'),
        }
      : undefined,
    tls: {
      certificatePath: text('TLS_CERT_PATH'),
      keyPath: text('TLS_KEY_PATH'),
    },
  });
}

/** Flattens a record back into field values, secrets revealed, in prompt order. */
export function valuesFromRecord(record: ConfigurationRecord): Map<string, string> {
  const values = new Map<string, string>([
    [COMPONENTS_KEY, formatComponentList(record.selectedComponents)],
    ['DOMAIN', record.domain],
    ['ADMIN_EMAIL', record.adminEmail],
    ['EXTERNAL_IP', record.externalIp],
  ]);

  const orchestrator = record.orchestrator;
  if (orchestrator) {
    values.set('ORC8R_NAMESPACE', orchestrator.namespace);
    values.set('ORC8R_STORAGE_CLASS', orchestrator.storageClass);
    values.set('ORC8R_DB_HOST', orchestrator.dbHost);
    values.set('ORC8R_DB_PORT', String(orchestrator.dbPort));
    values.set('ORC8R_DB_USER', orchestrator.dbUser);
    values.set('ORC8R_DB_PASSWORD', orchestrator.dbPassword.reveal());
    values.set('ORC8R_DB_NAME', orchestrator.dbName);
  }

  const accessGateway = record.accessGateway;
  if (accessGateway) {
    values.set('AGW_INTERFACE', accessGateway.interface);
    values.set('AGW_IP', accessGateway.ip);
    values.set('AGW_MCC', accessGateway.mcc);
    values.set('AGW_MNC', accessGateway.mnc);
    values.set('AGW_TAC', String(accessGateway.tac));
    values.set('AGW_S1AP_IP', accessGateway.s1apIp);
    values.set('AGW_S1AP_PORT', String(accessGateway.s1apPort));
  }

  const federatedGateway = record.federatedGateway;
  if (federatedGateway) {
    values.set('FGW_FEDERATION_ID', federatedGateway.federationId);
    values.set('FGW_SERVED_NETWORKS', federatedGateway.servedNetworks.join(','));
    values.set('FGW_DIAMETER_HOST', federatedGateway.diameterHost);
    values.set('FGW_DIAMETER_REALM', federatedGateway.diameterRealm);
    values.set('FGW_DIAMETER_PORT', String(federatedGateway.diameterPort));
  }

  values.set('TLS_CERT_PATH', record.tls.certificatePath);
  values.set('TLS_KEY_PATH', record.tls.keyPath);
  return values;
}
