// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ComponentId} from '../config/component-id.js';
import {type RuntimeAdapter, type RuntimeAdapters} from './runtime-adapter.js';
import {OrchestratorAdapter} from './orchestrator-adapter.js';
import {NetworkManagementSystemAdapter} from './network-management-system-adapter.js';
import {GatewayAdapter} from './gateway-adapter.js';
import {type ReadinessPolicy} from './readiness.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {type KubeClient} from '../../integration/kube/kube-client.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * One adapter per component, wired to the real runtime clients.
 */
@injectable()
export class RuntimeAdapterRegistry implements RuntimeAdapters {
  private readonly adapters: ReadonlyMap<ComponentId, RuntimeAdapter>;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.HelmClient) helm?: HelmClient,
    @inject(InjectTokens.KubeClient) kube?: KubeClient,
    @inject(InjectTokens.DockerClient) docker?: DockerClient,
    @inject(InjectTokens.ReadinessPolicy) readiness?: ReadinessPolicy,
  ) {
    logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    helm = patchInject(helm, InjectTokens.HelmClient, this.constructor.name);
    kube = patchInject(kube, InjectTokens.KubeClient, this.constructor.name);
    docker = patchInject(docker, InjectTokens.DockerClient, this.constructor.name);
    readiness = patchInject(readiness, InjectTokens.ReadinessPolicy, this.constructor.name);

    this.adapters = new Map<ComponentId, RuntimeAdapter>([
      [ComponentId.Orchestrator, new OrchestratorAdapter(logger, helm, kube, readiness)],
      [ComponentId.AccessGateway, new GatewayAdapter(ComponentId.AccessGateway, logger, docker)],
      [ComponentId.FederatedGateway, new GatewayAdapter(ComponentId.FederatedGateway, logger, docker)],
      [ComponentId.NetworkManagementSystem, new NetworkManagementSystemAdapter(logger, helm, kube)],
    ]);
  }

  public get(componentId: ComponentId): RuntimeAdapter {
    const adapter = this.adapters.get(componentId);
    if (!adapter) {
      throw new IllegalArgumentError(`no runtime adapter for component ${componentId}`, componentId);
    }
    return adapter;
  }
}
