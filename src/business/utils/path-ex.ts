// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import fs from 'node:fs';
import {DeployError} from '../../core/errors/deploy-error.js';

export class PathEx {
  /**
   * Joins the given paths and resolves the result to a real path, which must exist.
   *
   * Use this instead of path.join(...) when the result must point at an existing file or directory.
   * @param paths - The paths to join
   */
  public static joinWithRealPath(...paths: string[]): string {
    return fs.realpathSync(path.join(...paths));
  }

  /**
   * Joins paths while ensuring the result stays below the base directory. The base directory must exist; the joined
   * path does not need to.
   *
   * @param baseDirectory - The base directory to enforce
   * @param paths - The paths to join
   * @throws DeployError if the resolved path is outside the base directory.
   */
  public static safeJoinWithBaseDirConfinement(baseDirectory: string, ...paths: string[]): string {
    const resolvedBase: string = path.resolve(baseDirectory);
    const resolvedPath: string = path.resolve(resolvedBase, ...paths);

    if (!resolvedPath.startsWith(resolvedBase + path.sep)) {
      throw new DeployError(`Path traversal detected: ${resolvedPath} is outside ${resolvedBase}`);
    }

    return resolvedPath;
  }

  /**
   * Joins the given paths. This is a wrapper around path.join.
   *
   * Not safe unless literals or validated values are used as parameters.
   * @param paths
   */
  public static join(...paths: string[]): string {
    return path.normalize(path.join(...paths));
  }

  /** Wrapper around path.resolve. */
  public static resolve(...paths: string[]): string {
    return path.resolve(...paths);
  }
}
