// SPDX-License-Identifier: Apache-2.0

import {ComponentId} from '../config/component-id.js';
import {deploymentNamespace} from '../config/configuration-record.js';
import {type ActivationContext} from './runtime-adapter.js';
import {AbstractRuntimeAdapter} from './abstract-runtime-adapter.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {type KubeClient} from '../../integration/kube/kube-client.js';
import {Chart} from '../../integration/helm/model/chart.js';
import {Repository} from '../../integration/helm/model/repository.js';
import {NMS_VALUES_FILE} from '../artifacts/artifact-generator.js';
import {PathEx} from '../../business/utils/path-ex.js';
import * as constants from '../constants.js';

export class NetworkManagementSystemAdapter extends AbstractRuntimeAdapter {
  public constructor(
    logger: DeployLogger,
    private readonly helm: HelmClient,
    private readonly kube: KubeClient,
  ) {
    super(ComponentId.NetworkManagementSystem, logger);
  }

  protected async apply({record, workingDirectory, signal}: ActivationContext): Promise<string> {
    const namespace = deploymentNamespace(record);

    // already there when the orchestrator was deployed in this run
    await this.kube.createNamespace(namespace);
    await this.helm.addRepository(
      new Repository(constants.MAGMA_CHART_REPO_NAME, constants.MAGMA_CHART_REPO_URL),
      signal,
    );
    await this.helm.upgradeChart(
      constants.NMS_RELEASE_NAME,
      Chart.parse(constants.NMS_CHART),
      {
        namespace,
        valuesFiles: [PathEx.join(workingDirectory, NMS_VALUES_FILE)],
        setFiles: {'tls.crt': record.tls.certificatePath, 'tls.key': record.tls.keyPath},
      },
      signal,
    );

    return `release ${constants.NMS_RELEASE_NAME} deployed to namespace ${namespace}, https://${record.domain}:${constants.NMS_PORT}`;
  }
}
