// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';

export type OsFamily = 'debian' | 'rhel' | 'unknown';

const DEBIAN_IDS = new Set(['debian', 'ubuntu']);
const RHEL_IDS = new Set(['rhel', 'centos', 'fedora', 'rocky', 'almalinux']);

/**
 * Detects the OS family from the content of /etc/os-release, looking at ID first and then at each ID_LIKE entry.
 */
export function detectOsFamily(osRelease: string): OsFamily {
  const fields = dotenv.parse(osRelease);
  const candidates = [fields.ID ?? '', ...(fields.ID_LIKE ?? '').split(/\s+/)]
    .map(id => id.trim().toLowerCase())
    .filter(id => id.length > 0);

  for (const id of candidates) {
    if (DEBIAN_IDS.has(id)) {
      return 'debian';
    }
    if (RHEL_IDS.has(id)) {
      return 'rhel';
    }
  }
  return 'unknown';
}
