// SPDX-License-Identifier: Apache-2.0

import {ComponentId} from './component-id.js';
import {type SecretValue} from './secret-value.js';
import {DEFAULT_NAMESPACE} from '../constants.js';

export interface OrchestratorSettings {
  readonly namespace: string;
  readonly storageClass: string;
  readonly dbHost: string;
  readonly dbPort: number;
  readonly dbUser: string;
  readonly dbPassword: SecretValue;
  readonly dbName: string;
}

export interface AccessGatewaySettings {
  readonly interface: string;
  readonly ip: string;
  readonly mcc: string;
  readonly mnc: string;
  readonly tac: number;
  readonly s1apIp: string;
  readonly s1apPort: number;
}

export interface FederatedGatewaySettings {
  readonly federationId: string;
  readonly servedNetworks: readonly string[];
  readonly diameterHost: string;
  readonly diameterRealm: string;
  readonly diameterPort: number;
}

export interface TlsSettings {
  readonly certificatePath: string;
  readonly keyPath: string;
}

/**
 * The single source of truth for a deployment run. Built once by the ConfigCollector and deep-frozen; a sub-record is
 * present exactly when its component is selected.
 */
export interface ConfigurationRecord {
  readonly domain: string;
  readonly adminEmail: string;
  readonly externalIp: string;
  readonly selectedComponents: readonly ComponentId[];
  readonly orchestrator?: OrchestratorSettings;
  readonly accessGateway?: AccessGatewaySettings;
  readonly federatedGateway?: FederatedGatewaySettings;
  readonly tls: TlsSettings;
}

export function isSelected(record: ConfigurationRecord, id: ComponentId): boolean {
  return record.selectedComponents.includes(id);
}

/** Components whose sub-record is a field group of the configuration record. */
export type ComponentWithSettings =
  | ComponentId.Orchestrator
  | ComponentId.AccessGateway
  | ComponentId.FederatedGateway;

/**
 * Kubernetes namespace shared by the cluster components. Without an orchestrator in the selection the NMS goes to
 * the default namespace.
 */
export function deploymentNamespace(record: ConfigurationRecord): string {
  return record.orchestrator?.namespace ?? DEFAULT_NAMESPACE;
}
