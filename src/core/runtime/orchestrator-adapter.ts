// SPDX-License-Identifier: Apache-2.0

import {ComponentId} from '../config/component-id.js';
import {type ActivationContext} from './runtime-adapter.js';
import {AbstractRuntimeAdapter} from './abstract-runtime-adapter.js';
import {type ReadinessPolicy, waitForReadyPods} from './readiness.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {type KubeClient} from '../../integration/kube/kube-client.js';
import {Chart} from '../../integration/helm/model/chart.js';
import {Repository} from '../../integration/helm/model/repository.js';
import {ORC8R_VALUES_FILE, POSTGRESQL_VALUES_FILE} from '../artifacts/artifact-generator.js';
import {ArtifactError} from '../errors/artifact-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import * as constants from '../constants.js';

/**
 * Installs the orchestrator: namespace, chart repository, PostgreSQL, a readiness wait on the database, then the
 * orc8r release.
 */
export class OrchestratorAdapter extends AbstractRuntimeAdapter {
  public constructor(
    logger: DeployLogger,
    private readonly helm: HelmClient,
    private readonly kube: KubeClient,
    private readonly readiness: ReadinessPolicy,
  ) {
    super(ComponentId.Orchestrator, logger);
  }

  protected async apply({record, workingDirectory, signal}: ActivationContext): Promise<string> {
    const settings = record.orchestrator;
    if (!settings) {
      throw new ArtifactError('configuration record has no orchestrator settings', this.componentId);
    }
    const namespace = settings.namespace;

    await this.kube.createNamespace(namespace);
    await this.helm.addRepository(
      new Repository(constants.MAGMA_CHART_REPO_NAME, constants.MAGMA_CHART_REPO_URL),
      signal,
    );
    await this.helm.updateRepositories(signal);

    await this.helm.upgradeChart(
      constants.POSTGRESQL_RELEASE_NAME,
      Chart.parse(constants.POSTGRESQL_CHART),
      {namespace, valuesFiles: [PathEx.join(workingDirectory, POSTGRESQL_VALUES_FILE)]},
      signal,
    );
    await waitForReadyPods(this.kube, this.logger, namespace, constants.POSTGRESQL_POD_LABEL, this.readiness, signal);

    await this.helm.upgradeChart(
      constants.ORC8R_RELEASE_NAME,
      Chart.parse(constants.ORC8R_CHART),
      {
        namespace,
        valuesFiles: [PathEx.join(workingDirectory, ORC8R_VALUES_FILE)],
        setFiles: {'tls.crt': record.tls.certificatePath, 'tls.key': record.tls.keyPath},
      },
      signal,
    );

    return `release ${constants.ORC8R_RELEASE_NAME} deployed to namespace ${namespace}`;
  }
}
