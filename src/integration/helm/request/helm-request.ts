// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../execution/helm-execution-builder.js';

/**
 * Parameters of one helm invocation.
 */
export interface HelmRequest {
  apply(builder: HelmExecutionBuilder): void;
}
