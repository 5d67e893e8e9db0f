// SPDX-License-Identifier: Apache-2.0

export interface ContainerItem {
  readonly name: string;
  /** `running`, `exited`, `restarting` and so on. */
  readonly state: string;
  /** Value of the component label, empty for containers started by other means. */
  readonly component: string;
}

export interface ComposeProject {
  readonly projectName: string;
  readonly composeFile: string;
  readonly workingDirectory: string;
}

/**
 * The container engine and its compose front end.
 */
export interface DockerClient {
  /** True when the engine daemon answers. */
  isAvailable(): Promise<boolean>;

  composeUp(project: ComposeProject, signal?: AbortSignal): Promise<void>;

  composeDown(project: ComposeProject, signal?: AbortSignal): Promise<void>;

  /** All containers, running or not, whose name contains the filter. */
  listContainers(nameFilter: string): Promise<ContainerItem[]>;

  removeContainers(names: readonly string[]): Promise<void>;

  listNetworks(nameFilter: string): Promise<string[]>;

  removeNetworks(names: readonly string[]): Promise<void>;

  listVolumes(nameFilter: string): Promise<string[]>;

  removeVolumes(names: readonly string[]): Promise<void>;
}
