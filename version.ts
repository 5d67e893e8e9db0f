// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * Version of this tool, from npm when run as a script, otherwise from the nearest package.json.
 */
export function getVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const directory = path.dirname(fileURLToPath(import.meta.url));
  // beside the sources, or one level up from dist/
  for (const candidate of [PathEx.resolve(directory, 'package.json'), PathEx.resolve(directory, '..', 'package.json')]) {
    if (fs.existsSync(candidate)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (packageJson !== null && typeof packageJson === 'object' && 'version' in packageJson) {
        return String(packageJson.version);
      }
    }
  }
  return '0.0.0';
}
