// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {COMPONENT_IDS, ComponentId, componentDisplayName} from '../config/component-id.js';
import {type ConfigFileStore} from '../config/config-file-store.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {type KubeClient, type PodItem} from '../../integration/kube/kube-client.js';
import {type SystemClient} from '../../integration/system/system-client.js';
import {FacetState, type StatusFacet, type StatusProbe, type StatusSnapshot} from './status-snapshot.js';
import {errorMessage} from '../helpers.js';
import {PathEx} from '../../business/utils/path-ex.js';
import * as constants from '../constants.js';

const ERROR_LINE = /"level":"ERROR"|\|ERROR\|/;

/** Pod selector of the release that runs a cluster component. */
const RELEASE_SELECTORS: ReadonlyMap<ComponentId, string> = new Map([
  [ComponentId.Orchestrator, `app.kubernetes.io/instance=${constants.ORC8R_RELEASE_NAME}`],
  [ComponentId.NetworkManagementSystem, `app.kubernetes.io/instance=${constants.NMS_RELEASE_NAME}`],
]);

function facet(name: string, state: FacetState, detail: string): StatusFacet {
  return {name, state, detail};
}

/** Healthy when everything counted is up, Degraded when part of it is, Unavailable when none is. */
function countFacet(name: string, up: number, total: number, noun: string): StatusFacet {
  if (total === 0) {
    return facet(name, FacetState.Unavailable, `no ${noun} found`);
  }
  const detail = `${up}/${total} ${noun} up`;
  if (up === total) {
    return facet(name, FacetState.Healthy, detail);
  }
  return facet(name, up === 0 ? FacetState.Unavailable : FacetState.Degraded, detail);
}

/**
 * Read-only view of the host, the runtimes and the deployed components.
 */
@injectable()
export class StatusInspector {
  private readonly logger: DeployLogger;
  private readonly docker: DockerClient;
  private readonly kube: KubeClient;
  private readonly system: SystemClient;
  private readonly store: ConfigFileStore;
  private readonly configFilePath: string;
  private readonly homeDirectory: string;
  private readonly logsDirectory: string;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.DockerClient) docker?: DockerClient,
    @inject(InjectTokens.KubeClient) kube?: KubeClient,
    @inject(InjectTokens.SystemClient) system?: SystemClient,
    @inject(InjectTokens.ConfigFileStore) store?: ConfigFileStore,
    @inject(InjectTokens.ConfigFilePath) configFilePath?: string,
    @inject(InjectTokens.HomeDirectory) homeDirectory?: string,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.docker = patchInject(docker, InjectTokens.DockerClient, this.constructor.name);
    this.kube = patchInject(kube, InjectTokens.KubeClient, this.constructor.name);
    this.system = patchInject(system, InjectTokens.SystemClient, this.constructor.name);
    this.store = patchInject(store, InjectTokens.ConfigFileStore, this.constructor.name);
    this.configFilePath = patchInject(configFilePath, InjectTokens.ConfigFilePath, this.constructor.name);
    this.homeDirectory = patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name);
    this.logsDirectory = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);
  }

  /** Runs every probe concurrently; a probe that fails never affects the others. */
  public async snapshot(): Promise<StatusSnapshot> {
    const probes = this.probes();
    const results = await Promise.allSettled(probes.map(probe => probe.run()));

    const facets = results.map((result, index): StatusFacet => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      const name = probes[index].name;
      this.logger.warn(`Status probe ${name} failed: ${errorMessage(result.reason)}`);
      return facet(name, FacetState.Unknown, errorMessage(result.reason));
    });

    return {takenAt: new Date(), facets};
  }

  public probes(): StatusProbe[] {
    return [
      {name: 'runtime', run: () => this.probeRuntime()},
      {name: 'cluster', run: () => this.probeCluster()},
      ...COMPONENT_IDS.map(id => ({name: id, run: () => this.probeComponent(id)})),
      {name: 'memory', run: async () => this.probeMemory()},
      {name: 'cpu', run: async () => this.probeCpu()},
      {name: 'disk', run: () => this.probeDisk()},
      {name: 'configuration', run: async () => this.probeConfiguration()},
      {name: 'run-log', run: () => this.probeRunLog()},
    ];
  }

  private async probeRuntime(): Promise<StatusFacet> {
    return (await this.docker.isAvailable())
      ? facet('runtime', FacetState.Healthy, 'container engine is answering')
      : facet('runtime', FacetState.Unavailable, 'container engine is not answering');
  }

  private async probeCluster(): Promise<StatusFacet> {
    return (await this.kube.isReachable())
      ? facet('cluster', FacetState.Healthy, 'Kubernetes API is reachable')
      : facet('cluster', FacetState.Unavailable, 'Kubernetes API is not reachable');
  }

  private async probeComponent(componentId: ComponentId): Promise<StatusFacet> {
    const selector = RELEASE_SELECTORS.get(componentId);
    if (selector !== undefined) {
      const pods: PodItem[] = await this.kube.listPods(this.namespace(), selector);
      return countFacet(componentId, pods.filter(pod => pod.ready).length, pods.length, 'pods');
    }

    const containers = (await this.docker.listContainers(constants.RESOURCE_NAME_MARKER)).filter(
      container => container.component === componentId,
    );
    return countFacet(
      componentId,
      containers.filter(container => container.state === 'running').length,
      containers.length,
      `${componentDisplayName(componentId)} containers`,
    );
  }

  private probeMemory(): StatusFacet {
    const {totalMb, availableMb} = this.system.memory();
    const detail = `${availableMb} MB available of ${totalMb} MB`;
    const sufficient = totalMb >= constants.MIN_TOTAL_MEMORY_MB && availableMb >= constants.MIN_AVAILABLE_MEMORY_MB;
    return facet(
      'memory',
      sufficient ? FacetState.Healthy : FacetState.Degraded,
      sufficient
        ? detail
        : `${detail} (needs ${constants.MIN_TOTAL_MEMORY_MB} MB total, ${constants.MIN_AVAILABLE_MEMORY_MB} MB available)`,
    );
  }

  private probeCpu(): StatusFacet {
    const count = this.system.cpuCount();
    return count >= constants.MIN_CPU_COUNT
      ? facet('cpu', FacetState.Healthy, `${count} CPUs`)
      : facet('cpu', FacetState.Degraded, `${count} CPUs (needs ${constants.MIN_CPU_COUNT})`);
  }

  private async probeDisk(): Promise<StatusFacet> {
    const usage = await this.system.diskUsagePercent(
      this.system.pathExists(this.homeDirectory) ? this.homeDirectory : '/',
    );
    return usage < constants.MAX_DISK_USAGE_PERCENT
      ? facet('disk', FacetState.Healthy, `${usage}% used`)
      : facet('disk', FacetState.Degraded, `${usage}% used (limit ${constants.MAX_DISK_USAGE_PERCENT}%)`);
  }

  private probeConfiguration(): StatusFacet {
    return this.store.exists(this.configFilePath)
      ? facet('configuration', FacetState.Healthy, `found at ${this.configFilePath}`)
      : facet('configuration', FacetState.Unavailable, `no configuration at ${this.configFilePath}`);
  }

  private async probeRunLog(): Promise<StatusFacet> {
    const logFile = PathEx.join(this.logsDirectory, constants.MAGMA_DEPLOY_LOG_FILE);
    if (!this.system.pathExists(logFile)) {
      return facet('run-log', FacetState.Unavailable, `no run log at ${logFile}`);
    }
    const content = await fs.promises.readFile(logFile, 'utf8');
    const errors = content.split('\n').filter(line => ERROR_LINE.test(line)).length;
    return errors === 0
      ? facet('run-log', FacetState.Healthy, 'no errors recorded')
      : facet('run-log', FacetState.Degraded, `${errors} error entries in ${logFile}`);
  }

  /** Namespace from the persisted configuration, or the default one. */
  private namespace(): string {
    if (!this.store.exists(this.configFilePath)) {
      return constants.DEFAULT_NAMESPACE;
    }
    return this.store.load(this.configFilePath).get('ORC8R_NAMESPACE') ?? constants.DEFAULT_NAMESPACE;
  }
}
