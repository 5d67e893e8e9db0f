// SPDX-License-Identifier: Apache-2.0

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  type: 'string' | 'boolean';
  defaultValue?: boolean | string;
  alias?: string;
}
