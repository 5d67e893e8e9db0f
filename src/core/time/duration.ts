// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * An amount of time with millisecond resolution, such as '34.5 seconds'.
 *
 * This is a value-based class; use equals() for comparisons.
 */
export class Duration {
  public static readonly ZERO: Duration = new Duration(0);

  private static readonly MILLIS_PER_SECOND: number = 1000;
  private static readonly SECONDS_PER_MINUTE: number = 60;

  private constructor(private readonly millis: number) {
    if (!Number.isFinite(millis)) {
      throw new IllegalArgumentError('duration must be a finite number of milliseconds', millis);
    }
  }

  public static ofMillis(millis: number): Duration {
    return new Duration(Math.trunc(millis));
  }

  public static ofSeconds(seconds: number): Duration {
    return Duration.ofMillis(seconds * Duration.MILLIS_PER_SECOND);
  }

  public static ofMinutes(minutes: number): Duration {
    return Duration.ofSeconds(minutes * Duration.SECONDS_PER_MINUTE);
  }

  public isZero(): boolean {
    return this.millis === 0;
  }

  public isNegative(): boolean {
    return this.millis < 0;
  }

  public plus(other: Duration): Duration {
    return new Duration(this.millis + other.millis);
  }

  public toMillis(): number {
    return this.millis;
  }

  /** Whole seconds, truncated toward zero. */
  public toSeconds(): number {
    return Math.trunc(this.millis / Duration.MILLIS_PER_SECOND);
  }

  /**
   * Compares this duration to another.
   *
   * @returns a negative number, zero or a positive number as this duration is shorter, equal or longer.
   */
  public compareTo(other: Duration): number {
    return this.millis - other.millis;
  }

  public equals(other: Duration): boolean {
    return other instanceof Duration && this.millis === other.millis;
  }

  public toString(): string {
    return `${this.millis / Duration.MILLIS_PER_SECOND}s`;
  }
}
