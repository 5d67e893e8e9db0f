// SPDX-License-Identifier: Apache-2.0

import {ComponentId} from '../config/component-id.js';

export interface GatewayService {
  readonly name: string;
  readonly privileged?: boolean;
  readonly dependsOn?: readonly string[];
  /** Mounts the container engine socket, needed by the service supervisor. */
  readonly dockerSocket?: boolean;
}

export type GatewayComponent = ComponentId.AccessGateway | ComponentId.FederatedGateway;

export interface GatewayLayout {
  readonly projectName: string;
  readonly containerPrefix: string;
  readonly mconfigFile: string;
  readonly services: readonly GatewayService[];
}

const SUPERVISOR = 'magmad';
const onSupervisor = [SUPERVISOR];

export const GATEWAY_LAYOUTS: ReadonlyMap<GatewayComponent, GatewayLayout> = new Map<GatewayComponent, GatewayLayout>([
  [
    ComponentId.AccessGateway,
    {
      projectName: 'magma-agw',
      containerPrefix: 'magma-',
      mconfigFile: 'gateway.mconfig',
      services: [
        {name: SUPERVISOR, privileged: true, dockerSocket: true},
        {name: 'mme', dependsOn: onSupervisor},
        {name: 'spgw', privileged: true, dependsOn: onSupervisor},
        {name: 'sessiond', dependsOn: onSupervisor},
        {name: 'mobilityd', dependsOn: onSupervisor},
        {name: 'policydb', dependsOn: onSupervisor},
        {name: 'subscriberdb', dependsOn: onSupervisor},
        {name: 'enodebd', dependsOn: onSupervisor},
        {name: 'connectiond', dependsOn: onSupervisor},
        {name: 'health', dependsOn: onSupervisor},
      ],
    },
  ],
  [
    ComponentId.FederatedGateway,
    {
      projectName: 'magma-fgw',
      containerPrefix: 'magma-fgw-',
      mconfigFile: 'feg_gateway.mconfig',
      services: [
        {name: SUPERVISOR, privileged: true, dockerSocket: true},
        {name: 'feg_hello', dependsOn: onSupervisor},
        {name: 'feg_session_proxy', dependsOn: ['feg_hello']},
        {name: 'feg_relay', dependsOn: onSupervisor},
        {name: 'health', dependsOn: onSupervisor},
        {name: 'diameter_client', dependsOn: ['feg_session_proxy']},
        {name: 's8_proxy', dependsOn: onSupervisor},
        {name: 'connectiond', dependsOn: onSupervisor},
      ],
    },
  ],
]);

export function isGatewayComponent(id: ComponentId): id is GatewayComponent {
  return id === ComponentId.AccessGateway || id === ComponentId.FederatedGateway;
}

/** Container name of a gateway service, e.g. magma-fgw-feg_hello. */
export function containerName(layout: GatewayLayout, service: GatewayService): string {
  return `${layout.containerPrefix}${service.name}`;
}
