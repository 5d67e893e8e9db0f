// SPDX-License-Identifier: Apache-2.0

import {type ActivationContext} from './runtime-adapter.js';
import {AbstractRuntimeAdapter} from './abstract-runtime-adapter.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {GATEWAY_LAYOUTS, type GatewayComponent, type GatewayLayout} from '../artifacts/gateway-services.js';
import {ArtifactError} from '../errors/artifact-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import * as constants from '../constants.js';

/**
 * Starts the services of a gateway from its compose file.
 */
export class GatewayAdapter extends AbstractRuntimeAdapter {
  private readonly layout: GatewayLayout;

  public constructor(
    componentId: GatewayComponent,
    logger: DeployLogger,
    private readonly docker: DockerClient,
  ) {
    super(componentId, logger);
    const layout = GATEWAY_LAYOUTS.get(componentId);
    if (!layout) {
      throw new ArtifactError(`no service layout for ${componentId}`, componentId);
    }
    this.layout = layout;
  }

  protected async apply({workingDirectory, signal}: ActivationContext): Promise<string> {
    await this.docker.composeUp(
      {
        projectName: this.layout.projectName,
        composeFile: PathEx.join(workingDirectory, constants.COMPOSE_FILE),
        workingDirectory,
      },
      signal,
    );
    return `${this.layout.services.length} services started in project ${this.layout.projectName}`;
  }
}
