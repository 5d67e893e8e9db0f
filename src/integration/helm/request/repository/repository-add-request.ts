// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {type Repository} from '../../model/repository.js';

/**
 * A request to add a chart repository, replacing an existing entry of the same name.
 */
export class RepositoryAddRequest implements HelmRequest {
  public constructor(private readonly repository: Repository) {}

  public apply(builder: HelmExecutionBuilder): void {
    builder
      .subcommands('repo', 'add')
      .flag('--force-update')
      .positional(this.repository.name)
      .positional(this.repository.url);
  }
}
