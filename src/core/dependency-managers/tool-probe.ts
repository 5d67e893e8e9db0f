// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';

/**
 * Presence probe: looks for an executable file on the search path without running anything.
 */
export class ToolProbe {
  public constructor(private readonly searchPath: string = process.env.PATH ?? '') {}

  public isPresent(tool: string): boolean {
    return this.searchPath
      .split(path.delimiter)
      .filter(directory => directory.length > 0)
      .some(directory => ToolProbe.isExecutableFile(path.join(directory, tool)));
  }

  private static isExecutableFile(candidate: string): boolean {
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      return fs.statSync(candidate).isFile();
    } catch {
      return false;
    }
  }
}
