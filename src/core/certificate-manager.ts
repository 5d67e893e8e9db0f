// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import * as selfsigned from 'selfsigned';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type DeployLogger} from './logging/deploy-logger.js';
import {type ConfigurationRecord} from './config/configuration-record.js';
import {DeployError} from './errors/deploy-error.js';
import * as constants from './constants.js';

export interface CertificateResult {
  readonly certificatePath: string;
  readonly keyPath: string;
  /** False when both files already existed. */
  readonly generated: boolean;
}

interface PemPair {
  readonly cert: string;
  readonly private: string;
}

/**
 * Provides the TLS material the cluster components are installed with.
 */
@injectable()
export class CertificateManager {
  private readonly logger: DeployLogger;

  public constructor(@inject(InjectTokens.DeployLogger) logger?: DeployLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
  }

  /**
   * Makes sure the configured certificate and key exist, generating a self-signed pair for the domain when either
   * file is missing.
   */
  public async ensure(
    record: ConfigurationRecord,
    expireDays: number = constants.CERTIFICATE_VALIDITY_DAYS,
  ): Promise<CertificateResult> {
    const {certificatePath, keyPath} = record.tls;
    if (fs.existsSync(certificatePath) && fs.existsSync(keyPath)) {
      this.logger.debug(`Using existing TLS certificate ${certificatePath}`);
      return {certificatePath, keyPath, generated: false};
    }

    const pems = await CertificateManager.generate(record.domain, expireDays);
    try {
      fs.mkdirSync(path.dirname(certificatePath), {recursive: true});
      fs.mkdirSync(path.dirname(keyPath), {recursive: true});
      fs.writeFileSync(certificatePath, pems.cert, {mode: 0o644});
      fs.writeFileSync(keyPath, pems.private, {mode: 0o600});
    } catch (error) {
      throw new DeployError(`failed to write TLS material to ${certificatePath} and ${keyPath}`, error);
    }

    this.logger.info(`Generated self-signed TLS certificate for ${record.domain}`, {certificatePath, keyPath});
    return {certificatePath, keyPath, generated: true};
  }

  private static generate(commonName: string, expireDays: number): Promise<PemPair> {
    const attributes = [{name: 'commonName', value: commonName}];
    return new Promise((resolve, reject) => {
      selfsigned.generate(attributes, {days: expireDays, keySize: 2048}, (error, pems) => {
        if (error) {
          reject(new DeployError(`Error generating TLS keys: ${error.message}`, error));
          return;
        }
        resolve(pems);
      });
    });
  }
}
