// SPDX-License-Identifier: Apache-2.0

import {MissingArgumentError} from '../../../core/errors/missing-argument-error.js';

/**
 * A chart reference: `<repo>/<name>` for repository charts, or a full `oci://` reference.
 */
export class Chart {
  public constructor(
    public readonly name: string,
    public readonly repoName?: string,
  ) {
    if (!name || name.trim() === '') {
      throw new MissingArgumentError('chart name must not be null or blank');
    }
  }

  /** Splits `repo/name`; anything with a scheme is kept whole. */
  public static parse(reference: string): Chart {
    if (reference.includes('://')) {
      return new Chart(reference);
    }
    const index = reference.indexOf('/');
    return index === -1 ? new Chart(reference) : new Chart(reference.slice(index + 1), reference.slice(0, index));
  }

  public qualified(): string {
    return this.repoName ? `${this.repoName}/${this.name}` : this.name;
  }
}
