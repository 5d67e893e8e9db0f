// SPDX-License-Identifier: Apache-2.0

/**
 * Holds a secret string. Converting it to text or JSON yields a mask, so secrets do not end up in logs or summaries
 * by accident; reveal() must be called explicitly.
 */
export class SecretValue {
  public static readonly MASK = '******';

  public constructor(private readonly value: string) {}

  public reveal(): string {
    return this.value;
  }

  public toString(): string {
    return SecretValue.MASK;
  }

  public toJSON(): string {
    return SecretValue.MASK;
  }
}
