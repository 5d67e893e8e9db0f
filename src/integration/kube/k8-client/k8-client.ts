// SPDX-License-Identifier: Apache-2.0

import {CoreV1Api, HttpError, KubeConfig, type V1Pod} from '@kubernetes/client-node';
import {inject, injectable} from 'tsyringe-neo';
import {type KubeClient, type PodItem} from '../kube-client.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type DeployLogger} from '../../../core/logging/deploy-logger.js';
import {errorMessage} from '../../../core/helpers.js';
import {Duration} from '../../../core/time/duration.js';

const HTTP_NOT_FOUND = 404;
const HTTP_CONFLICT = 409;
const REQUEST_TIMEOUT = Duration.ofMinutes(1);

/**
 * KubeClient over the current context of the default kubeconfig.
 */
@injectable()
export class K8Client implements KubeClient {
  private readonly logger: DeployLogger;
  private kubeClient?: CoreV1Api;

  public constructor(@inject(InjectTokens.DeployLogger) logger?: DeployLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
  }

  public async isReachable(): Promise<boolean> {
    try {
      await this.api().listNamespace();
      return true;
    } catch (error) {
      this.logger.debug(`Kubernetes API not reachable: ${errorMessage(error)}`);
      return false;
    }
  }

  public async namespaceExists(namespace: string): Promise<boolean> {
    try {
      await this.api().readNamespace(namespace);
      return true;
    } catch (error) {
      if (K8Client.hasStatus(error, HTTP_NOT_FOUND)) {
        return false;
      }
      throw error;
    }
  }

  public async createNamespace(namespace: string): Promise<void> {
    try {
      await this.api().createNamespace({metadata: {name: namespace}});
      this.logger.info(`Created namespace ${namespace}`);
    } catch (error) {
      if (!K8Client.hasStatus(error, HTTP_CONFLICT)) {
        throw error;
      }
      this.logger.debug(`Namespace ${namespace} already exists`);
    }
  }

  public async deleteNamespace(namespace: string): Promise<void> {
    try {
      await this.api().deleteNamespace(namespace);
      this.logger.info(`Deleted namespace ${namespace}`);
    } catch (error) {
      if (!K8Client.hasStatus(error, HTTP_NOT_FOUND)) {
        throw error;
      }
    }
  }

  public async listPods(namespace: string, labelSelector?: string): Promise<PodItem[]> {
    const result = await this.api().listNamespacedPod(
      namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      labelSelector,
      undefined,
      undefined,
      undefined,
      undefined,
      REQUEST_TIMEOUT.toSeconds(),
    );
    return result.body.items.map(pod => K8Client.toPodItem(pod));
  }

  public static toPodItem(pod: V1Pod): PodItem {
    return {
      name: pod.metadata?.name ?? '',
      phase: pod.status?.phase ?? 'Unknown',
      ready: (pod.status?.conditions ?? []).some(
        condition => condition.type === 'Ready' && condition.status === 'True',
      ),
    };
  }

  private api(): CoreV1Api {
    if (!this.kubeClient) {
      const kubeConfig = new KubeConfig();
      kubeConfig.loadFromDefault();
      this.kubeClient = kubeConfig.makeApiClient(CoreV1Api);
    }
    return this.kubeClient;
  }

  private static hasStatus(error: unknown, statusCode: number): boolean {
    return error instanceof HttpError && error.statusCode === statusCode;
  }
}
