// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type ConfigurationRecord} from './configuration-record.js';
import {valuesFromRecord, type FieldValues} from './config-fields.js';
import {isFileSafe} from './validators.js';
import {ValidationError} from '../errors/validation-error.js';
import {DeployError} from '../errors/deploy-error.js';

const FILE_HEADER = [
  '# magma-deploy configuration',
  '# Edit values in place; every value must stay on one line between double quotes.',
];

/**
 * Reads and writes the persisted configuration file: flat `KEY="value"` lines.
 */
@injectable()
export class ConfigFileStore {
  private readonly logger: DeployLogger;

  public constructor(@inject(InjectTokens.DeployLogger) logger?: DeployLogger) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
  }

  public exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  /**
   * @throws ValidationError if the file does not exist or cannot be read
   */
  public load(filePath: string): Map<string, string> {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new ValidationError('config', `cannot read configuration file ${filePath}`, error);
    }

    const parsed = dotenv.parse(content);
    this.logger.debug(`Loaded configuration file ${filePath}`, {keys: Object.keys(parsed)});
    return new Map(Object.entries(parsed));
  }

  /**
   * Serialises the whole record in memory, then replaces the target file in one rename so that an interrupted run
   * never leaves a partially written file behind.
   */
  public save(filePath: string, record: ConfigurationRecord): void {
    this.writeAtomically(filePath, ConfigFileStore.serialize(valuesFromRecord(record)));
    this.logger.info(`Saved configuration to ${filePath}`);
  }

  public static serialize(values: FieldValues): string {
    const lines = [...FILE_HEADER];
    for (const [key, value] of values) {
      if (!isFileSafe(value)) {
        throw new ValidationError(key, 'must not contain double quotes, backslashes or line breaks');
      }
      lines.push(`${key}="${value}"`);
    }
    return lines.join('\n') + '\n';
  }

  private writeAtomically(filePath: string, content: string): void {
    const directory = path.dirname(filePath);
    const temporaryPath = path.join(directory, `.${path.basename(filePath)}.${process.pid}.tmp`);

    try {
      fs.mkdirSync(directory, {recursive: true});
      fs.writeFileSync(temporaryPath, content, {encoding: 'utf8', mode: 0o600});
      fs.renameSync(temporaryPath, filePath);
    } catch (error) {
      fs.rmSync(temporaryPath, {force: true});
      throw new DeployError(`failed to write configuration file ${filePath}`, error);
    }
  }
}
