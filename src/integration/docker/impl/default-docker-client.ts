// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ComposeProject, type ContainerItem, type DockerClient} from '../docker-client.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type ShellRunner} from '../../../core/shell-runner.js';
import {type DeployLogger} from '../../../core/logging/deploy-logger.js';
import {errorMessage, shellQuote} from '../../../core/helpers.js';
import {COMPONENT_LABEL} from '../../../core/artifacts/artifact-generator.js';

const FIELD_SEPARATOR = '|';

/**
 * Drives `docker` and `docker-compose` through the ShellRunner.
 */
@injectable()
export class DefaultDockerClient implements DockerClient {
  private readonly logger: DeployLogger;
  private readonly shellRunner: ShellRunner;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.ShellRunner) shellRunner?: ShellRunner,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.shellRunner = patchInject(shellRunner, InjectTokens.ShellRunner, this.constructor.name);
  }

  public async isAvailable(): Promise<boolean> {
    try {
      await this.shellRunner.run(`docker info --format ${shellQuote('{{.ServerVersion}}')}`);
      return true;
    } catch (error) {
      this.logger.debug(`docker info failed: ${errorMessage(error)}`);
      return false;
    }
  }

  public async composeUp(project: ComposeProject, signal?: AbortSignal): Promise<void> {
    await this.shellRunner.run(`${this.compose(project)} up -d`, false, {cwd: project.workingDirectory, signal});
  }

  public async composeDown(project: ComposeProject, signal?: AbortSignal): Promise<void> {
    await this.shellRunner.run(`${this.compose(project)} down`, false, {cwd: project.workingDirectory, signal});
  }

  public async listContainers(nameFilter: string): Promise<ContainerItem[]> {
    const format = ['{{.Names}}', '{{.State}}', `{{.Label "${COMPONENT_LABEL}"}}`].join(FIELD_SEPARATOR);
    const lines = await this.shellRunner.run(
      `docker ps -a --filter ${shellQuote(`name=${nameFilter}`)} --format ${shellQuote(format)}`,
    );
    return lines.map(line => DefaultDockerClient.parseContainerLine(line));
  }

  public async removeContainers(names: readonly string[]): Promise<void> {
    if (names.length > 0) {
      await this.shellRunner.run(`docker rm -f ${names.map(name => shellQuote(name)).join(' ')}`);
    }
  }

  public async listNetworks(nameFilter: string): Promise<string[]> {
    return this.shellRunner.run(
      `docker network ls --filter ${shellQuote(`name=${nameFilter}`)} --format ${shellQuote('{{.Name}}')}`,
    );
  }

  public async removeNetworks(names: readonly string[]): Promise<void> {
    if (names.length > 0) {
      await this.shellRunner.run(`docker network rm ${names.map(name => shellQuote(name)).join(' ')}`);
    }
  }

  public async listVolumes(nameFilter: string): Promise<string[]> {
    return this.shellRunner.run(
      `docker volume ls --filter ${shellQuote(`name=${nameFilter}`)} --format ${shellQuote('{{.Name}}')}`,
    );
  }

  public async removeVolumes(names: readonly string[]): Promise<void> {
    if (names.length > 0) {
      await this.shellRunner.run(`docker volume rm -f ${names.map(name => shellQuote(name)).join(' ')}`);
    }
  }

  /** Parses one `name|state|component` line of `docker ps`. */
  public static parseContainerLine(line: string): ContainerItem {
    const [name = '', state = '', component = ''] = line.split(FIELD_SEPARATOR).map(field => field.trim());
    return {name, state, component};
  }

  private compose(project: ComposeProject): string {
    return `docker-compose -p ${shellQuote(project.projectName)} -f ${shellQuote(project.composeFile)}`;
  }
}
