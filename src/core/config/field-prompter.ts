// SPDX-License-Identifier: Apache-2.0

import {type ConfigField} from './config-fields.js';

/**
 * Asks the operator for field values during interactive collection.
 */
export interface FieldPrompter {
  /**
   * @param field - the field to ask for
   * @param defaultValue - value offered to the operator; an empty answer selects it
   * @returns the raw answer
   */
  ask(field: ConfigField, defaultValue: string | undefined): Promise<string>;

  /** Tells the operator why an answer was rejected; the same field is asked again afterwards. */
  reject(field: ConfigField, value: string, reason: string): void;
}
