// SPDX-License-Identifier: Apache-2.0

import {PackageManagerInstallStrategy} from './package-manager-install-strategy.js';
import {type OsFamily} from './os-family.js';

export class RhelInstallStrategy extends PackageManagerInstallStrategy {
  public readonly osFamily: OsFamily = 'rhel';

  protected installPackages(packages: readonly string[]): string[] {
    return [`sudo yum install -y ${packages.join(' ')}`];
  }

  protected dockerRepositoryCommands(): string[] {
    return [
      ...this.installPackages(['yum-utils']),
      'sudo yum-config-manager --add-repo https://download.docker.com/linux/centos/docker-ce.repo',
    ];
  }
}
