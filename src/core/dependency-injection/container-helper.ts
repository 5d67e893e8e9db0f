// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {MissingArgumentError} from '../errors/missing-argument-error.js';

/**
 * Returns the constructor argument when one was passed, otherwise resolves the token from the container. Lets classes
 * be built by hand (tests) or by the container with the same constructor.
 *
 * @param parameterValue - the value that should have been injected as a parameter in the constructor
 * @param registryToken - the token to resolve from the container
 * @param callingClassName - the name of the class that is calling this function
 */
export function patchInject<T>(parameterValue: T | undefined | null, registryToken: symbol, callingClassName: string): T {
  if (registryToken === undefined || registryToken === null) {
    throw new MissingArgumentError(`registryToken is undefined or null, callingClassName: ${callingClassName}`);
  }
  if (parameterValue === undefined || parameterValue === null) {
    return container.resolve<T>(registryToken);
  }

  return parameterValue;
}
