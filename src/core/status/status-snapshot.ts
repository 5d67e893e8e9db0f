// SPDX-License-Identifier: Apache-2.0

export enum FacetState {
  Healthy = 'Healthy',
  Degraded = 'Degraded',
  Unavailable = 'Unavailable',
  Unknown = 'Unknown',
}

export interface StatusFacet {
  readonly name: string;
  readonly state: FacetState;
  readonly detail: string;
}

export interface StatusSnapshot {
  readonly takenAt: Date;
  /** In probe order. */
  readonly facets: readonly StatusFacet[];
}

/** A single status check; a thrown error turns into an Unknown facet. */
export interface StatusProbe {
  readonly name: string;

  run(): Promise<StatusFacet>;
}
