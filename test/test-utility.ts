// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {PathEx} from '../src/business/utils/path-ex.js';

/** A fresh, empty directory below the system temporary directory. */
export function getTestDirectory(testName: string): string {
  return fs.mkdtempSync(PathEx.join(os.tmpdir(), `magma-deploy-${testName}-`));
}

export function removeTestDirectory(directory: string): void {
  fs.rmSync(directory, {recursive: true, force: true});
}
