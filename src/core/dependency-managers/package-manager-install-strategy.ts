// SPDX-License-Identifier: Apache-2.0

import {type InstallStep, type InstallStrategy} from './install-strategy.js';
import {type OsFamily} from './os-family.js';
import {type ToolName} from './tool-name.js';

const DOCKER_COMPOSE_URL =
  'https://github.com/docker/compose/releases/download/1.29.2/docker-compose-$(uname -s)-$(uname -m)';

/**
 * Steps shared by the supported families; subclasses supply the package manager specific parts.
 */
export abstract class PackageManagerInstallStrategy implements InstallStrategy {
  public abstract readonly osFamily: OsFamily;

  protected abstract installPackages(packages: readonly string[]): string[];

  protected abstract dockerRepositoryCommands(): string[];

  public stepFor(tool: ToolName): InstallStep {
    switch (tool) {
      case 'git': {
        return {tool, description: 'Install git', commands: this.installPackages(['git'])};
      }
      case 'docker': {
        return {
          tool,
          description: 'Install Docker engine',
          commands: [
            ...this.dockerRepositoryCommands(),
            ...this.installPackages(['docker-ce', 'docker-ce-cli', 'containerd.io']),
            'sudo systemctl start docker',
            'sudo systemctl enable docker',
            'sudo usermod -aG docker "$(whoami)"',
          ],
        };
      }
      case 'docker-compose': {
        return {
          tool,
          description: 'Install docker-compose',
          commands: [
            `sudo curl -fsSL "${DOCKER_COMPOSE_URL}" -o /usr/local/bin/docker-compose`,
            'sudo chmod +x /usr/local/bin/docker-compose',
          ],
        };
      }
      case 'kubectl': {
        return {
          tool,
          description: 'Install kubectl',
          commands: [
            'curl -fsSLO "https://dl.k8s.io/release/$(curl -fsSL https://dl.k8s.io/release/stable.txt)/bin/linux/amd64/kubectl"',
            'sudo install -o root -g root -m 0755 kubectl /usr/local/bin/kubectl',
            'rm -f kubectl',
          ],
        };
      }
      case 'helm': {
        return {
          tool,
          description: 'Install helm 3',
          commands: ['curl -fsSL https://raw.githubusercontent.com/helm/helm/main/scripts/get-helm-3 | bash'],
        };
      }
    }
  }
}
