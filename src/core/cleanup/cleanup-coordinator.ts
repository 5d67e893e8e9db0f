// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type ConfigFileStore} from '../config/config-file-store.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {type KubeClient} from '../../integration/kube/kube-client.js';
import {type SystemClient} from '../../integration/system/system-client.js';
import {
  type CleanupConfirmations,
  type CleanupPlan,
  type CleanupReport,
  type RemovalResult,
  type ResourceClass,
  type ResourceScope,
} from './resource-class.js';
import {errorMessage} from '../helpers.js';
import * as constants from '../constants.js';

interface ResourceClassDefinition {
  readonly name: string;
  readonly scope: ResourceScope;
  readonly description: string;
  probe(): Promise<string[]>;
  remove(targets: readonly string[]): Promise<void>;
}

/**
 * Plans and performs the removal of everything a deployment left on the host and the cluster.
 */
@injectable()
export class CleanupCoordinator {
  private readonly logger: DeployLogger;
  private readonly docker: DockerClient;
  private readonly helm: HelmClient;
  private readonly kube: KubeClient;
  private readonly system: SystemClient;
  private readonly store: ConfigFileStore;
  private readonly configFilePath: string;
  private readonly artifactsDirectory: string;
  private readonly certificatesDirectory: string;
  private readonly logsDirectory: string;
  private namespaceName?: string;
  /** Targets each class's own probe returned in the last plan; execute removes nothing else. */
  private readonly probedTargets = new Map<string, ReadonlySet<string>>();

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.DockerClient) docker?: DockerClient,
    @inject(InjectTokens.HelmClient) helm?: HelmClient,
    @inject(InjectTokens.KubeClient) kube?: KubeClient,
    @inject(InjectTokens.SystemClient) system?: SystemClient,
    @inject(InjectTokens.ConfigFileStore) store?: ConfigFileStore,
    @inject(InjectTokens.ConfigFilePath) configFilePath?: string,
    @inject(InjectTokens.ArtifactsDirectory) artifactsDirectory?: string,
    @inject(InjectTokens.CertificatesDirectory) certificatesDirectory?: string,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.docker = patchInject(docker, InjectTokens.DockerClient, this.constructor.name);
    this.helm = patchInject(helm, InjectTokens.HelmClient, this.constructor.name);
    this.kube = patchInject(kube, InjectTokens.KubeClient, this.constructor.name);
    this.system = patchInject(system, InjectTokens.SystemClient, this.constructor.name);
    this.store = patchInject(store, InjectTokens.ConfigFileStore, this.constructor.name);
    this.configFilePath = patchInject(configFilePath, InjectTokens.ConfigFilePath, this.constructor.name);
    this.artifactsDirectory = patchInject(artifactsDirectory, InjectTokens.ArtifactsDirectory, this.constructor.name);
    this.certificatesDirectory = patchInject(
      certificatesDirectory,
      InjectTokens.CertificatesDirectory,
      this.constructor.name,
    );
    this.logsDirectory = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);
  }

  /** Probes every resource class for its targets. A failing probe leaves its class without targets. */
  public async plan(): Promise<CleanupPlan> {
    const classes: ResourceClass[] = [];
    this.probedTargets.clear();
    for (const definition of this.definitions()) {
      const {name, scope, description} = definition;
      try {
        const targets = await definition.probe();
        this.probedTargets.set(name, new Set(targets));
        classes.push({name, scope, description, targets});
      } catch (error) {
        this.logger.warn(`Unable to list ${name}: ${errorMessage(error)}`);
        classes.push({name, scope, description, targets: [], probeError: errorMessage(error)});
      }
    }
    return {classes};
  }

  /**
   * Removes every ephemeral class and each destructive class the operator confirms. Scopes come from the class
   * definitions and only targets found by the last plan() are removed, whatever the given plan claims. Failures are
   * recorded in the report, never thrown.
   */
  public async execute(plan: CleanupPlan, confirmations: CleanupConfirmations): Promise<CleanupReport> {
    const definitions = new Map(this.definitions().map(definition => [definition.name, definition]));
    const results: RemovalResult[] = [];

    for (const planned of plan.classes) {
      const definition = definitions.get(planned.name);
      if (!definition) {
        this.logger.warn(`Skipping unknown resource class ${planned.name}`);
        results.push({name: planned.name, scope: planned.scope, targets: [], status: 'nothing-to-remove'});
        continue;
      }

      const {name, scope} = definition;
      const probed = this.probedTargets.get(name);
      const targets = planned.targets.filter(target => probed?.has(target));
      const unknown = planned.targets.filter(target => !probed?.has(target));
      if (unknown.length > 0) {
        this.logger.warn(`Skipping ${name} targets that were not found by the plan`, {targets: unknown});
      }
      if (targets.length === 0) {
        results.push({name, scope, targets, status: 'nothing-to-remove', error: planned.probeError});
        continue;
      }

      const resourceClass: ResourceClass = {...planned, scope, targets};
      if (scope === 'destructive' && !(await confirmations.confirm(resourceClass))) {
        this.logger.info(`Keeping ${name}: not confirmed`);
        results.push({name, scope, targets, status: 'declined'});
        continue;
      }

      try {
        await definition.remove(targets);
        this.logger.info(`Removed ${name}`, {targets});
        results.push({name, scope, targets, status: 'removed'});
      } catch (error) {
        this.logger.error(`Failed to remove ${name}: ${errorMessage(error)}`);
        results.push({name, scope, targets, status: 'failed', error: errorMessage(error)});
      }
    }

    return {results, warnings: await this.verify()};
  }

  /** Re-probes containers and the namespace; anything left is returned as a warning. */
  public async verify(): Promise<string[]> {
    const warnings: string[] = [];
    const check = async (label: string, probe: () => Promise<string[]>) => {
      try {
        const residue = await probe();
        if (residue.length > 0) {
          warnings.push(`${label} still present: ${residue.join(', ')}`);
        }
      } catch (error) {
        warnings.push(`${label} could not be verified: ${errorMessage(error)}`);
      }
    };

    await check('containers', () => this.listContainers());
    await check('namespace', () => this.listNamespace());
    for (const warning of warnings) {
      this.logger.warn(warning);
    }
    return warnings;
  }

  private definitions(): ResourceClassDefinition[] {
    const existing = async (paths: readonly string[]) => paths.filter(path => this.system.pathExists(path));
    const removePaths = async (paths: readonly string[]) => {
      for (const path of paths) {
        await this.system.removePath(path);
      }
    };

    return [
      {
        name: 'helm-releases',
        scope: 'ephemeral',
        description: `Helm releases ${constants.MANAGED_HELM_RELEASES.join(', ')}`,
        probe: async () =>
          (await this.helm.listReleases(true))
            .filter(release => constants.MANAGED_HELM_RELEASES.includes(release.name))
            .map(release => `${release.namespace}/${release.name}`),
        remove: async targets => {
          for (const target of targets) {
            const [namespace, releaseName] = target.split('/');
            await this.helm.uninstallChart(releaseName, namespace);
          }
        },
      },
      {
        name: 'namespace',
        scope: 'ephemeral',
        description: 'Kubernetes namespace of the deployment',
        probe: () => this.listNamespace(),
        remove: async targets => {
          for (const namespace of targets) {
            await this.kube.deleteNamespace(namespace);
          }
        },
      },
      {
        name: 'containers',
        scope: 'ephemeral',
        description: `containers whose name contains '${constants.RESOURCE_NAME_MARKER}'`,
        probe: () => this.listContainers(),
        remove: targets => this.docker.removeContainers(targets),
      },
      {
        name: 'networks',
        scope: 'ephemeral',
        description: `container networks whose name contains '${constants.RESOURCE_NAME_MARKER}'`,
        probe: () => this.docker.listNetworks(constants.RESOURCE_NAME_MARKER),
        remove: targets => this.docker.removeNetworks(targets),
      },
      {
        name: 'volumes',
        scope: 'ephemeral',
        description: `container volumes whose name contains '${constants.RESOURCE_NAME_MARKER}'`,
        probe: () => this.docker.listVolumes(constants.RESOURCE_NAME_MARKER),
        remove: targets => this.docker.removeVolumes(targets),
      },
      {
        name: 'working-directories',
        scope: 'ephemeral',
        description: 'generated deployment artifacts',
        probe: () => existing([this.artifactsDirectory]),
        remove: removePaths,
      },
      {
        name: 'configuration',
        scope: 'destructive',
        description: 'persisted configuration file',
        probe: () => existing([this.configFilePath]),
        remove: removePaths,
      },
      {
        name: 'certificates',
        scope: 'destructive',
        description: 'generated TLS certificates',
        probe: () => existing([this.certificatesDirectory]),
        remove: removePaths,
      },
      {
        name: 'run-logs',
        scope: 'destructive',
        description: 'run logs',
        probe: () => existing([this.logsDirectory]),
        remove: removePaths,
      },
      {
        name: 'system-directories',
        scope: 'destructive',
        description: 'system directories of the gateways',
        probe: () => existing(constants.SYSTEM_DIRECTORIES),
        remove: removePaths,
      },
      {
        name: 'system-services',
        scope: 'destructive',
        description: `system services whose name contains '${constants.RESOURCE_NAME_MARKER}'`,
        probe: () => this.system.listServices(constants.RESOURCE_NAME_MARKER),
        remove: async targets => {
          for (const service of targets) {
            await this.system.stopAndDisableService(service);
          }
        },
      },
    ];
  }

  private async listContainers(): Promise<string[]> {
    return (await this.docker.listContainers(constants.RESOURCE_NAME_MARKER)).map(container => container.name);
  }

  private async listNamespace(): Promise<string[]> {
    const namespace = this.namespace();
    return (await this.kube.namespaceExists(namespace)) ? [namespace] : [];
  }

  /** Read once, the configuration file may be among the removed resources. */
  private namespace(): string {
    if (this.namespaceName === undefined) {
      this.namespaceName = this.store.exists(this.configFilePath)
        ? (this.store.load(this.configFilePath).get('ORC8R_NAMESPACE') ?? constants.DEFAULT_NAMESPACE)
        : constants.DEFAULT_NAMESPACE;
    }
    return this.namespaceName;
  }
}
