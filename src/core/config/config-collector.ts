// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type ComponentId, formatComponentList, parseComponentList} from './component-id.js';
import {type ConfigurationRecord} from './configuration-record.js';
import {
  COMPONENTS_KEY,
  type ConfigField,
  configFields,
  defaultFor,
  fieldsFor,
  type FieldValues,
  recordFromValues,
} from './config-fields.js';
import {type FieldPrompter} from './field-prompter.js';
import {type ConfigFileStore} from './config-file-store.js';
import {validateValue} from './validators.js';
import {ValidationError} from '../errors/validation-error.js';

export interface InteractiveMode {
  kind: 'interactive';
  prompter: FieldPrompter;
  /** Previously persisted values, offered as defaults. */
  seed?: FieldValues;
}

export interface ReplayMode {
  kind: 'replay';
  values: FieldValues;
}

export type CollectionMode = InteractiveMode | ReplayMode;

export interface CollectionOverrides {
  /** Comma separated component list that replaces the COMPONENTS field. */
  components?: string;
}

/**
 * Gathers and validates operator input into an immutable configuration record.
 */
@injectable()
export class ConfigCollector {
  private readonly logger: DeployLogger;
  private readonly store: ConfigFileStore;
  private readonly fields: readonly ConfigField[];

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.ConfigFileStore) store?: ConfigFileStore,
    @inject(InjectTokens.CertificatesDirectory) certificatesDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.store = patchInject(store, InjectTokens.ConfigFileStore, this.constructor.name);
    certificatesDirectory = patchInject(certificatesDirectory, InjectTokens.CertificatesDirectory, this.constructor.name);
    this.fields = configFields(certificatesDirectory);
  }

  /**
   * Builds the configuration record.
   *
   * Interactive mode asks each field until it validates. Replay mode never prompts and fails on the first field that
   * is missing or invalid.
   *
   * @throws ValidationError in replay mode, or for an invalid component override
   */
  public async collect(mode: CollectionMode, overrides: CollectionOverrides = {}): Promise<ConfigurationRecord> {
    const answers = new Map<string, string>();

    let selected: ComponentId[];
    if (overrides.components === undefined) {
      const componentsField = this.field(COMPONENTS_KEY);
      selected = parseComponentList(await this.resolve(componentsField, mode, answers));
    } else {
      selected = parseComponentList(overrides.components);
    }
    answers.set(COMPONENTS_KEY, formatComponentList(selected));

    for (const field of fieldsFor(this.fields, selected)) {
      if (field.key !== COMPONENTS_KEY) {
        answers.set(field.key, await this.resolve(field, mode, answers));
      }
    }

    this.logger.info(`Configuration collected in ${mode.kind} mode`, {components: selected});
    return recordFromValues(answers, selected);
  }

  /** Persists a completed record with a single atomic write. */
  public persist(record: ConfigurationRecord, filePath: string): void {
    this.store.save(filePath, record);
  }

  private field(key: string): ConfigField {
    const field = this.fields.find(candidate => candidate.key === key);
    if (!field) {
      throw new ValidationError(key, 'unknown configuration field');
    }
    return field;
  }

  private async resolve(field: ConfigField, mode: CollectionMode, answers: FieldValues): Promise<string> {
    if (mode.kind === 'replay') {
      return this.replay(field, mode.values, answers);
    }

    const defaultValue = mode.seed?.get(field.key) ?? defaultFor(field, answers);
    if (field.interactive === false) {
      return this.replay(field, mode.seed ?? new Map(), answers);
    }

    for (;;) {
      const answer = await mode.prompter.ask(field, defaultValue);
      const trimmed = field.secret ? answer : answer.trim();
      const value = trimmed === '' && defaultValue !== undefined ? defaultValue : trimmed;

      const reason = validateValue(value, field.validate);
      if (reason === undefined) {
        return value;
      }
      mode.prompter.reject(field, value, reason);
    }
  }

  private replay(field: ConfigField, values: FieldValues, answers: FieldValues): string {
    const value = values.get(field.key) ?? defaultFor(field, answers);
    if (value === undefined) {
      throw new ValidationError(field.key, 'is required');
    }

    const reason = validateValue(value, field.validate);
    if (reason !== undefined) {
      throw new ValidationError(field.key, reason);
    }
    return value;
  }
}
