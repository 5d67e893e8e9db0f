// SPDX-License-Identifier: Apache-2.0

/** Ephemeral resources are removed unconditionally, destructive ones only after confirmation. */
export type ResourceScope = 'ephemeral' | 'destructive';

export interface ResourceClass {
  readonly name: string;
  readonly scope: ResourceScope;
  readonly description: string;
  /** What removal would affect, as shown to the operator. */
  readonly targets: readonly string[];
  /** Set when the targets could not be determined. */
  readonly probeError?: string;
}

export interface CleanupPlan {
  /** In removal order. */
  readonly classes: readonly ResourceClass[];
}

export interface CleanupConfirmations {
  /** Resolves true only when the operator agreed to remove this destructive class. */
  confirm(resourceClass: ResourceClass): Promise<boolean>;
}

export type RemovalStatus = 'removed' | 'nothing-to-remove' | 'declined' | 'failed';

export interface RemovalResult {
  readonly name: string;
  readonly scope: ResourceScope;
  readonly status: RemovalStatus;
  readonly targets: readonly string[];
  readonly error?: string;
}

export interface CleanupReport {
  readonly results: readonly RemovalResult[];
  /** Residue found by the verification pass. */
  readonly warnings: readonly string[];
}
