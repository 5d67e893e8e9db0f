// SPDX-License-Identifier: Apache-2.0

import {PackageManagerInstallStrategy} from './package-manager-install-strategy.js';
import {type OsFamily} from './os-family.js';

export class DebianInstallStrategy extends PackageManagerInstallStrategy {
  public readonly osFamily: OsFamily = 'debian';

  protected installPackages(packages: readonly string[]): string[] {
    return ['sudo apt-get update', `sudo apt-get install -y ${packages.join(' ')}`];
  }

  protected dockerRepositoryCommands(): string[] {
    return [
      ...this.installPackages(['apt-transport-https', 'ca-certificates', 'curl', 'gnupg', 'lsb-release']),
      'curl -fsSL https://download.docker.com/linux/ubuntu/gpg | sudo gpg --dearmor --yes -o /usr/share/keyrings/docker-archive-keyring.gpg',
      'echo "deb [arch=amd64 signed-by=/usr/share/keyrings/docker-archive-keyring.gpg] https://download.docker.com/linux/ubuntu $(lsb_release -cs) stable" | sudo tee /etc/apt/sources.list.d/docker.list > /dev/null',
    ];
  }
}
