// SPDX-License-Identifier: Apache-2.0

import {type ComponentId} from '../config/component-id.js';
import {type ConfigurationRecord} from '../config/configuration-record.js';
import {type ArtifactBundle} from '../artifacts/artifact-generator.js';
import {type RuntimeAdapterError} from '../errors/runtime-adapter-error.js';
import {type ReadinessTimeoutError} from '../errors/readiness-timeout-error.js';

export interface ActivationContext {
  readonly record: ConfigurationRecord;
  readonly bundle: ArtifactBundle;
  /** Directory the bundle was written to. */
  readonly workingDirectory: string;
  readonly signal: AbortSignal;
}

export type AdapterResult =
  | {readonly ok: true; readonly detail: string}
  | {readonly ok: false; readonly error: RuntimeAdapterError | ReadinessTimeoutError};

/**
 * Brings one component up on its runtime. Failures are returned, never thrown.
 */
export interface RuntimeAdapter {
  readonly componentId: ComponentId;

  activate(context: ActivationContext): Promise<AdapterResult>;
}

/** Looks up the adapter of a component. */
export interface RuntimeAdapters {
  get(componentId: ComponentId): RuntimeAdapter;
}
