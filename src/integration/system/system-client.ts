// SPDX-License-Identifier: Apache-2.0

export interface MemoryUsage {
  readonly totalMb: number;
  readonly availableMb: number;
}

/**
 * Host level queries and changes outside the container engine and the cluster.
 */
export interface SystemClient {
  memory(): MemoryUsage;

  cpuCount(): number;

  /** Used share of the file system holding the path, in percent. */
  diskUsagePercent(path: string): Promise<number>;

  pathExists(path: string): boolean;

  /** Removes a file or directory tree; a missing path is not an error. */
  removePath(path: string): Promise<void>;

  /** Service unit names containing the filter. */
  listServices(nameFilter: string): Promise<string[]>;

  stopAndDisableService(name: string): Promise<void>;
}
