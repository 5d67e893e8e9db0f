// SPDX-License-Identifier: Apache-2.0

/** One entry of `helm list --output json`. */
export interface ReleaseItem {
  readonly name: string;
  readonly namespace: string;
  readonly status: string;
  readonly chart: string;
}
