// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {BaseCommand} from './base.js';
import {type CliOptions} from './flags.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../core/logging/deploy-logger.js';
import {type LockManager} from '../core/lock/lock-manager.js';
import {type Lock} from '../core/lock/lock.js';
import {ListrLock} from '../core/lock/listr-lock.js';
import {type PrerequisiteResolver} from '../core/dependency-managers/prerequisite-resolver.js';
import {requiredTools} from '../core/dependency-managers/tool-name.js';
import {type ConfigCollector, type CollectionMode} from '../core/config/config-collector.js';
import {type ConfigFileStore} from '../core/config/config-file-store.js';
import {COMPONENTS_KEY, type FieldValues} from '../core/config/config-fields.js';
import {ListrFieldPrompter} from '../core/config/listr-field-prompter.js';
import {
  COMPONENT_IDS,
  ComponentId,
  componentDisplayName,
  formatComponentList,
  parseComponentList,
} from '../core/config/component-id.js';
import {type ConfigurationRecord, isSelected} from '../core/config/configuration-record.js';
import {type CertificateManager} from '../core/certificate-manager.js';
import {type ArtifactGenerator} from '../core/artifacts/artifact-generator.js';
import {type ArtifactWriter} from '../core/artifacts/artifact-writer.js';
import {type DeploymentSequencer} from '../core/sequencer/deployment-sequencer.js';
import {type DeploymentSummary} from '../core/sequencer/deployment-summary.js';
import {ValidationError} from '../core/errors/validation-error.js';
import {UserBreak} from '../core/errors/user-break.js';
import {DeployError} from '../core/errors/deploy-error.js';
import {EXIT_CODE_FAILURE, EXIT_CODE_SUCCESS} from '../core/error-handler.js';
import {type DeployListrTask} from '../types/index.js';

interface DeployContext {
  /** Values of the configuration file: replayed with --config, otherwise offered as defaults. */
  fileValues?: FieldValues;
  record?: ConfigurationRecord;
  writtenDirectories: string[];
  summary?: DeploymentSummary;
}

/**
 * Collects the configuration, writes the artifacts and activates the selected components.
 */
@injectable()
export class DeployCommand extends BaseCommand {
  private readonly prerequisiteResolver: PrerequisiteResolver;
  private readonly configCollector: ConfigCollector;
  private readonly configFileStore: ConfigFileStore;
  private readonly certificateManager: CertificateManager;
  private readonly artifactGenerator: ArtifactGenerator;
  private readonly artifactWriter: ArtifactWriter;
  private readonly sequencer: DeploymentSequencer;
  private readonly configFilePath: string;
  private readonly homeDirectories: string[];

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.LockManager) lockManager?: LockManager,
    @inject(InjectTokens.PrerequisiteResolver) prerequisiteResolver?: PrerequisiteResolver,
    @inject(InjectTokens.ConfigCollector) configCollector?: ConfigCollector,
    @inject(InjectTokens.ConfigFileStore) configFileStore?: ConfigFileStore,
    @inject(InjectTokens.CertificateManager) certificateManager?: CertificateManager,
    @inject(InjectTokens.ArtifactGenerator) artifactGenerator?: ArtifactGenerator,
    @inject(InjectTokens.ArtifactWriter) artifactWriter?: ArtifactWriter,
    @inject(InjectTokens.DeploymentSequencer) sequencer?: DeploymentSequencer,
    @inject(InjectTokens.ConfigFilePath) configFilePath?: string,
    @inject(InjectTokens.HomeDirectory) homeDirectory?: string,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
    @inject(InjectTokens.ArtifactsDirectory) artifactsDirectory?: string,
    @inject(InjectTokens.CertificatesDirectory) certificatesDirectory?: string,
  ) {
    super(logger, lockManager);
    this.prerequisiteResolver = patchInject(
      prerequisiteResolver,
      InjectTokens.PrerequisiteResolver,
      this.constructor.name,
    );
    this.configCollector = patchInject(configCollector, InjectTokens.ConfigCollector, this.constructor.name);
    this.configFileStore = patchInject(configFileStore, InjectTokens.ConfigFileStore, this.constructor.name);
    this.certificateManager = patchInject(certificateManager, InjectTokens.CertificateManager, this.constructor.name);
    this.artifactGenerator = patchInject(artifactGenerator, InjectTokens.ArtifactGenerator, this.constructor.name);
    this.artifactWriter = patchInject(artifactWriter, InjectTokens.ArtifactWriter, this.constructor.name);
    this.sequencer = patchInject(sequencer, InjectTokens.DeploymentSequencer, this.constructor.name);
    this.configFilePath = patchInject(configFilePath, InjectTokens.ConfigFilePath, this.constructor.name);
    this.homeDirectories = [
      patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name),
      patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name),
      patchInject(artifactsDirectory, InjectTokens.ArtifactsDirectory, this.constructor.name),
      patchInject(certificatesDirectory, InjectTokens.CertificatesDirectory, this.constructor.name),
      path.dirname(this.configFilePath),
    ];
  }

  public async run(options: CliOptions, signal: AbortSignal): Promise<number> {
    const lock = this.lockManager.create();
    const context: DeployContext = {writtenDirectories: []};

    try {
      await this.runTasks('deploy', this.tasks(options, signal, lock), context);
    } finally {
      await lock.release();
    }

    if (options.dryRun) {
      this.logger.showList('Artifacts written (dry run, nothing activated)', context.writtenDirectories);
      return EXIT_CODE_SUCCESS;
    }

    const summary = context.summary;
    if (!summary) {
      throw new DeployError('deployment finished without a summary');
    }
    this.logger.showList('Deployment summary', summary.lines());
    if (summary.interrupted) {
      this.logger.showUser(chalk.yellow('Deployment interrupted; completed components were left in place'));
    }
    return summary.succeeded ? EXIT_CODE_SUCCESS : EXIT_CODE_FAILURE;
  }

  private tasks(options: CliOptions, signal: AbortSignal, lock: Lock): DeployListrTask<DeployContext>[] {
    return [
      this.setupHomeDirectoryTask(this.homeDirectories),
      ListrLock.newAcquireLockTask<DeployContext>(lock),
      {
        title: 'Load configuration file',
        skip: () => options.config === undefined && !this.configFileStore.exists(this.configFilePath),
        task: (context_, task) => {
          const filePath = options.config ?? this.configFilePath;
          context_.fileValues = this.configFileStore.load(filePath);
          task.title = `Load configuration file: ${chalk.cyan(filePath)}`;
        },
      },
      {
        title: 'Check prerequisites',
        skip: () => options.skipPrerequisites,
        task: (context_, task) => {
          const tools = requiredTools(DeployCommand.componentsHint(options, context_.fileValues));
          return task.newListr(
            this.prerequisiteResolver.taskResolvePrerequisites<DeployContext>(tools, (missing, subTask) =>
              this.confirm(subTask, `Install missing dependencies (${missing.join(', ')}) automatically?`, options.yes),
            ),
          );
        },
      },
      {
        title: 'Collect configuration',
        task: async (context_, task) => {
          const mode: CollectionMode =
            options.config === undefined
              ? {kind: 'interactive', prompter: new ListrFieldPrompter(task, this.logger), seed: context_.fileValues}
              : {kind: 'replay', values: context_.fileValues ?? new Map<string, string>()};

          context_.record = await this.configCollector.collect(mode, {components: options.components});
          task.title = `Collect configuration: ${chalk.cyan(formatComponentList(context_.record.selectedComponents))}`;
        },
      },
      {
        title: 'Save configuration',
        skip: () => options.config !== undefined,
        task: (context_, task) => {
          this.configCollector.persist(DeployCommand.record(context_), this.configFilePath);
          task.title = `Save configuration: ${chalk.cyan(this.configFilePath)}`;
        },
      },
      {
        title: 'Confirm deployment',
        skip: () => options.dryRun,
        task: async (context_, task) => {
          const names = DeployCommand.record(context_).selectedComponents.map(componentDisplayName).join(', ');
          if (!(await this.confirm(task, `Proceed with the deployment of ${names}?`, options.yes))) {
            throw new UserBreak('Deployment cancelled by the operator');
          }
        },
      },
      {
        title: 'Prepare TLS certificate',
        skip: context_ => {
          const record = DeployCommand.record(context_);
          return (
            !isSelected(record, ComponentId.Orchestrator) && !isSelected(record, ComponentId.NetworkManagementSystem)
          );
        },
        task: async (context_, task) => {
          const result = await this.certificateManager.ensure(DeployCommand.record(context_));
          task.title = `Prepare TLS certificate: ${result.generated ? 'generated' : 'existing'} ${chalk.cyan(result.certificatePath)}`;
        },
      },
      {
        title: 'Write artifacts',
        skip: () => !options.dryRun,
        task: context_ => {
          const record = DeployCommand.record(context_);
          for (const componentId of this.sequencer.order(record.selectedComponents)) {
            const bundle = this.artifactGenerator.renderBundle(componentId, record);
            context_.writtenDirectories.push(this.artifactWriter.write(bundle));
          }
        },
      },
      {
        title: 'Activate components',
        skip: () => options.dryRun,
        task: async (context_, task) => {
          context_.summary = await this.sequencer.run(DeployCommand.record(context_), {
            signal,
            listener: {
              onStateChange: outcome => {
                task.output = `${componentDisplayName(outcome.componentId)}: ${outcome.state}`;
              },
              onRetry: (outcome, error) => {
                task.output = chalk.yellow(
                  `${componentDisplayName(outcome.componentId)}: attempt ${outcome.attempts} failed, retrying (${error.message})`,
                );
              },
            },
          });
          task.title = context_.summary.succeeded
            ? `Activate components: ${chalk.green('all succeeded')}`
            : `Activate components: ${chalk.red('not all components succeeded')}`;
        },
      },
    ];
  }

  /**
   * Components whose tools the prerequisite check covers: the override, else the configuration file's selection,
   * else all of them.
   */
  public static componentsHint(options: CliOptions, fileValues: FieldValues | undefined): readonly ComponentId[] {
    const list = options.components ?? fileValues?.get(COMPONENTS_KEY);
    if (list === undefined) {
      return COMPONENT_IDS;
    }
    try {
      return parseComponentList(list);
    } catch (error) {
      // collection reports the invalid list with its field
      if (error instanceof ValidationError) {
        return COMPONENT_IDS;
      }
      throw error;
    }
  }

  private static record(context_: DeployContext): ConfigurationRecord {
    if (!context_.record) {
      throw new DeployError('configuration has not been collected');
    }
    return context_.record;
  }
}
