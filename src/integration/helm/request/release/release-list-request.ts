// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';

/**
 * A request to list releases as JSON.
 */
export class ReleaseListRequest implements HelmRequest {
  public constructor(
    private readonly allNamespaces: boolean,
    private readonly namespace?: string,
  ) {}

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('list');
    builder.argument('output', 'json');

    if (this.allNamespaces) {
      builder.flag('--all-namespaces');
    } else if (this.namespace) {
      builder.argument('namespace', this.namespace);
    }
  }
}
