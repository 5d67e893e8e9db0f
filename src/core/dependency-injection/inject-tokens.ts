// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HomeDirectory: Symbol.for('HomeDirectory'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  ArtifactsDirectory: Symbol.for('ArtifactsDirectory'),
  CertificatesDirectory: Symbol.for('CertificatesDirectory'),
  ConfigFilePath: Symbol.for('ConfigFilePath'),
  OsReleasePath: Symbol.for('OsReleasePath'),
  ReadinessPolicy: Symbol.for('ReadinessPolicy'),
  RetryPolicy: Symbol.for('RetryPolicy'),
  DeployLogger: Symbol.for('DeployLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ShellRunner: Symbol.for('ShellRunner'),
  ToolProbe: Symbol.for('ToolProbe'),
  PrerequisiteResolver: Symbol.for('PrerequisiteResolver'),
  ConfigFileStore: Symbol.for('ConfigFileStore'),
  ConfigCollector: Symbol.for('ConfigCollector'),
  ArtifactGenerator: Symbol.for('ArtifactGenerator'),
  ArtifactWriter: Symbol.for('ArtifactWriter'),
  CertificateManager: Symbol.for('CertificateManager'),
  HelmClient: Symbol.for('HelmClient'),
  DockerClient: Symbol.for('DockerClient'),
  KubeClient: Symbol.for('KubeClient'),
  SystemClient: Symbol.for('SystemClient'),
  RuntimeAdapters: Symbol.for('RuntimeAdapters'),
  DeploymentSequencer: Symbol.for('DeploymentSequencer'),
  StatusInspector: Symbol.for('StatusInspector'),
  CleanupCoordinator: Symbol.for('CleanupCoordinator'),
  LockManager: Symbol.for('LockManager'),
  DeployCommand: Symbol.for('DeployCommand'),
  StatusCommand: Symbol.for('StatusCommand'),
  CleanCommand: Symbol.for('CleanCommand'),
};
