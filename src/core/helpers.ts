// SPDX-License-Identifier: Apache-2.0

import {type Duration} from './time/duration.js';

export function sleep(duration: Duration): Promise<void> {
  return new Promise<void>(resolve => {
    setTimeout(resolve, duration.toMillis());
  });
}

/**
 * Quotes a value for a POSIX shell command line. Values are wrapped in single quotes, embedded single quotes are
 * closed, escaped and reopened.
 */
export function shellQuote(value: string | number): string {
  return `'${String(value).replaceAll("'", String.raw`'\''`)}'`;
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Freezes the object and everything reachable from its own properties. */
export function deepFreeze<T extends object>(object: T): Readonly<T> {
  for (const value of Object.values(object)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(object);
}
