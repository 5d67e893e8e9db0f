// SPDX-License-Identifier: Apache-2.0

import {RuntimeAdapterError} from '../errors/runtime-adapter-error.js';
import {ShellCommandError} from '../errors/shell-command-error.js';
import {errorMessage} from '../helpers.js';

/** Runtime failures that may clear up when the same invocation is repeated. */
export const RETRYABLE_PATTERNS: readonly RegExp[] = [
  /timed out/i,
  /timeout/i,
  /connection refused/i,
  /connection reset/i,
  /TLS handshake/i,
  /temporarily unavailable/i,
  /another operation \(install\/upgrade\/rollback\) is in progress/i,
];

export function isRetryableText(text: string): boolean {
  return RETRYABLE_PATTERNS.some(pattern => pattern.test(text));
}

/** Everything a failed invocation reported, for classification and error detail. */
export function failureText(error: unknown): string {
  if (error instanceof ShellCommandError) {
    return [error.message, ...error.errorOutput, ...error.output].join('\n');
  }
  return errorMessage(error);
}

/**
 * Turns a runtime invocation failure into a RuntimeAdapterError marked retryable or fatal.
 *
 * @param action - what was being done, used as message prefix
 */
export function classifyFailure(error: unknown, action: string): RuntimeAdapterError {
  if (error instanceof RuntimeAdapterError) {
    return error;
  }

  const text = failureText(error);
  const detail =
    error instanceof ShellCommandError && error.errorOutput.length > 0
      ? error.errorOutput[error.errorOutput.length - 1]
      : errorMessage(error);
  return new RuntimeAdapterError(`${action} failed: ${detail}`, isRetryableText(text), error);
}
