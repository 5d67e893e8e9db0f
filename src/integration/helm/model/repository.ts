// SPDX-License-Identifier: Apache-2.0

import {MissingArgumentError} from '../../../core/errors/missing-argument-error.js';

/**
 * A chart repository.
 */
export class Repository {
  public constructor(
    public readonly name: string,
    public readonly url: string,
  ) {
    if (!name || name.trim() === '') {
      throw new MissingArgumentError('repository name must not be null or blank');
    }
    if (!url || url.trim() === '') {
      throw new MissingArgumentError('repository url must not be null or blank');
    }
  }
}
