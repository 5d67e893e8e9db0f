// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../execution/helm-execution-builder.js';

/**
 * Options of `helm upgrade --install`.
 */
export interface UpgradeChartOptions {
  readonly namespace: string;
  readonly createNamespace?: boolean;
  /** Values files, later files override earlier ones. */
  readonly valuesFiles?: readonly string[];
  /** `--set-file` entries, keyed by value path. */
  readonly setFiles?: Readonly<Record<string, string>>;
  /** Chart version; the latest when absent. */
  readonly version?: string;
}

export function applyUpgradeChartOptions(options: UpgradeChartOptions, builder: HelmExecutionBuilder): void {
  builder.flag('--install');
  builder.argument('namespace', options.namespace);
  if (options.createNamespace) {
    builder.flag('--create-namespace');
  }
  if (options.version) {
    builder.argument('version', options.version);
  }
  if (options.valuesFiles && options.valuesFiles.length > 0) {
    builder.optionsWithMultipleValues('values', [...options.valuesFiles]);
  }
  const setFiles = Object.entries(options.setFiles ?? {});
  if (setFiles.length > 0) {
    builder.optionsWithMultipleValues(
      'set-file',
      setFiles.map(([key, file]) => `${key}=${file}`),
    );
  }
}
