// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {DeployWinstonLogger} from '../logging/deploy-winston-logger.js';
import {InjectTokens} from './inject-tokens.js';
import {ErrorHandler} from '../error-handler.js';
import {ShellRunner} from '../shell-runner.js';
import {ToolProbe} from '../dependency-managers/tool-probe.js';
import {PrerequisiteResolver} from '../dependency-managers/prerequisite-resolver.js';
import {ConfigFileStore} from '../config/config-file-store.js';
import {ConfigCollector} from '../config/config-collector.js';
import {ArtifactGenerator} from '../artifacts/artifact-generator.js';
import {ArtifactWriter} from '../artifacts/artifact-writer.js';
import {CertificateManager} from '../certificate-manager.js';
import {DefaultHelmClient} from '../../integration/helm/impl/default-helm-client.js';
import {DefaultDockerClient} from '../../integration/docker/impl/default-docker-client.js';
import {K8Client} from '../../integration/kube/k8-client/k8-client.js';
import {DefaultSystemClient} from '../../integration/system/impl/default-system-client.js';
import {RuntimeAdapterRegistry} from '../runtime/runtime-adapter-registry.js';
import {type ReadinessPolicy} from '../runtime/readiness.js';
import {DeploymentSequencer, type RetryPolicy} from '../sequencer/deployment-sequencer.js';
import {StatusInspector} from '../status/status-inspector.js';
import {CleanupCoordinator} from '../cleanup/cleanup-coordinator.js';
import {LockManager} from '../lock/lock-manager.js';
import {DeployCommand} from '../../commands/deploy.js';
import {StatusCommand} from '../../commands/status.js';
import {CleanCommand} from '../../commands/clean.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {Duration} from '../time/duration.js';
import * as constants from '../constants.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - the home directory to use, defaults to constants.MAGMA_DEPLOY_HOME_DIR
   * @param logLevel - the log level to use, defaults to constants.LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    homeDirectory: string = constants.MAGMA_DEPLOY_HOME_DIR,
    logLevel: string = constants.LOG_LEVEL,
    developmentMode: boolean = false,
    testLogger?: DeployLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Container already initialized');
      return;
    }

    // directories
    container.register(InjectTokens.HomeDirectory, {useValue: homeDirectory});
    container.register(InjectTokens.LogsDirectory, {useValue: PathEx.join(homeDirectory, 'logs')});
    container.register(InjectTokens.ArtifactsDirectory, {useValue: PathEx.join(homeDirectory, 'artifacts')});
    container.register(InjectTokens.CertificatesDirectory, {useValue: PathEx.join(homeDirectory, 'certs')});
    container.register(InjectTokens.ConfigFilePath, {
      useValue: PathEx.join(homeDirectory, 'config', constants.DEFAULT_CONFIG_FILE),
    });
    container.register(InjectTokens.OsReleasePath, {useValue: '/etc/os-release'});

    // DeployLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    if (testLogger) {
      container.registerInstance(InjectTokens.DeployLogger, testLogger);
      container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.DeployLogger, {useClass: DeployWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Using default logger');
    }

    // policies
    container.register<ReadinessPolicy>(InjectTokens.ReadinessPolicy, {
      useValue: {
        timeout: Duration.ofSeconds(constants.READINESS_TIMEOUT_SECONDS),
        pollInterval: Duration.ofMillis(constants.READINESS_POLL_INTERVAL_MILLIS),
      },
    });
    container.register<RetryPolicy>(InjectTokens.RetryPolicy, {
      useValue: {
        maxAttempts: constants.ADAPTER_MAX_ATTEMPTS,
        delay: Duration.ofSeconds(constants.ADAPTER_RETRY_DELAY_SECONDS),
      },
    });

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ShellRunner, {useClass: ShellRunner}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.LockManager, {useClass: LockManager}, {lifecycle: Lifecycle.Singleton});

    // prerequisites
    container.register(InjectTokens.ToolProbe, {useValue: new ToolProbe()});
    container.register(
      InjectTokens.PrerequisiteResolver,
      {useClass: PrerequisiteResolver},
      {lifecycle: Lifecycle.Singleton},
    );

    // configuration and artifacts
    container.register(InjectTokens.ConfigFileStore, {useClass: ConfigFileStore}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ConfigCollector, {useClass: ConfigCollector}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ArtifactGenerator, {useValue: new ArtifactGenerator()});
    container.register(InjectTokens.ArtifactWriter, {useClass: ArtifactWriter}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.CertificateManager,
      {useClass: CertificateManager},
      {lifecycle: Lifecycle.Singleton},
    );

    // runtimes
    container.register(InjectTokens.HelmClient, {useClass: DefaultHelmClient}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.DockerClient, {useClass: DefaultDockerClient}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.KubeClient, {useClass: K8Client}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.SystemClient, {useClass: DefaultSystemClient}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.RuntimeAdapters,
      {useClass: RuntimeAdapterRegistry},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(
      InjectTokens.DeploymentSequencer,
      {useClass: DeploymentSequencer},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.StatusInspector, {useClass: StatusInspector}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.CleanupCoordinator,
      {useClass: CleanupCoordinator},
      {lifecycle: Lifecycle.Singleton},
    );

    // Commands
    container.register(InjectTokens.DeployCommand, {useClass: DeployCommand}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.StatusCommand, {useClass: StatusCommand}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.CleanCommand, {useClass: CleanCommand}, {lifecycle: Lifecycle.Singleton});

    container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param homeDirectory - the home directory to use, defaults to constants.MAGMA_DEPLOY_HOME_DIR
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(homeDirectory?: string, logLevel?: string, developmentMode?: boolean, testLogger?: DeployLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<DeployLogger>(InjectTokens.DeployLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
