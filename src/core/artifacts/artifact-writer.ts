// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type ArtifactBundle} from './artifact-generator.js';
import {ArtifactError} from '../errors/artifact-error.js';
import {PathEx} from '../../business/utils/path-ex.js';

/**
 * Writes rendered bundles into per-component working directories below the artifacts directory.
 */
@injectable()
export class ArtifactWriter {
  private readonly logger: DeployLogger;
  private readonly artifactsDirectory: string;

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.ArtifactsDirectory) artifactsDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.artifactsDirectory = patchInject(artifactsDirectory, InjectTokens.ArtifactsDirectory, this.constructor.name);
  }

  /** Working directory of a bundle, whether or not it has been written. */
  public workingDirectory(bundle: ArtifactBundle): string {
    return PathEx.join(this.artifactsDirectory, bundle.directoryName);
  }

  /**
   * Writes every file of the bundle, replacing earlier renders. Secret files are created with mode 0600.
   *
   * @returns the working directory
   * @throws ArtifactError if a file cannot be written
   */
  public write(bundle: ArtifactBundle): string {
    fs.mkdirSync(this.artifactsDirectory, {recursive: true});
    const workingDirectory = this.workingDirectory(bundle);

    for (const file of bundle.files) {
      const target = PathEx.safeJoinWithBaseDirConfinement(workingDirectory, file.name);
      try {
        fs.mkdirSync(path.dirname(target), {recursive: true});
        fs.writeFileSync(target, file.content, {encoding: 'utf8', mode: file.secret ? 0o600 : 0o644});
        // mode only applies when the file is created
        fs.chmodSync(target, file.secret ? 0o600 : 0o644);
      } catch (error) {
        throw new ArtifactError(`failed to write ${target}`, bundle.componentId, error);
      }
      this.logger.debug(`Wrote artifact ${target}`, {secret: file.secret});
    }

    this.logger.info(`Artifacts for ${bundle.componentId} written to ${workingDirectory}`);
    return workingDirectory;
  }
}
