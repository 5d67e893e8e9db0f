// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployLogger} from '../logging/deploy-logger.js';
import {type ComponentId, componentDisplayName} from '../config/component-id.js';
import {type ConfigurationRecord} from '../config/configuration-record.js';
import {type ArtifactBundle, type ArtifactGenerator} from '../artifacts/artifact-generator.js';
import {type ArtifactWriter} from '../artifacts/artifact-writer.js';
import {type AdapterResult, type RuntimeAdapters} from '../runtime/runtime-adapter.js';
import {classifyFailure} from '../runtime/failure-classifier.js';
import {RuntimeAdapterError} from '../errors/runtime-adapter-error.js';
import {ComponentGraph} from './component-graph.js';
import {ComponentOutcome, ComponentState} from './component-outcome.js';
import {DeploymentSummary} from './deployment-summary.js';
import {type Duration} from '../time/duration.js';
import {errorMessage, sleep} from '../helpers.js';

export interface RetryPolicy {
  /** Attempts per component, the first one included. */
  readonly maxAttempts: number;
  readonly delay: Duration;
}

export interface SequencerListener {
  onStateChange?(outcome: ComponentOutcome): void;

  /** A retryable failure, reported before the next attempt. */
  onRetry?(outcome: ComponentOutcome, error: RuntimeAdapterError): void;
}

export interface SequencerOptions {
  signal?: AbortSignal;
  listener?: SequencerListener;
}

/**
 * Activates the selected components one at a time in dependency order.
 *
 * A component whose dependency did not succeed stays Pending. Once the signal is aborted no component enters
 * Deploying and the one in flight ends Interrupted.
 */
@injectable()
export class DeploymentSequencer {
  private readonly logger: DeployLogger;
  private readonly generator: ArtifactGenerator;
  private readonly writer: ArtifactWriter;
  private readonly adapters: RuntimeAdapters;
  private readonly retryPolicy: RetryPolicy;
  private readonly graph = new ComponentGraph();

  public constructor(
    @inject(InjectTokens.DeployLogger) logger?: DeployLogger,
    @inject(InjectTokens.ArtifactGenerator) generator?: ArtifactGenerator,
    @inject(InjectTokens.ArtifactWriter) writer?: ArtifactWriter,
    @inject(InjectTokens.RuntimeAdapters) adapters?: RuntimeAdapters,
    @inject(InjectTokens.RetryPolicy) retryPolicy?: RetryPolicy,
  ) {
    this.logger = patchInject(logger, InjectTokens.DeployLogger, this.constructor.name);
    this.generator = patchInject(generator, InjectTokens.ArtifactGenerator, this.constructor.name);
    this.writer = patchInject(writer, InjectTokens.ArtifactWriter, this.constructor.name);
    this.adapters = patchInject(adapters, InjectTokens.RuntimeAdapters, this.constructor.name);
    this.retryPolicy = patchInject(retryPolicy, InjectTokens.RetryPolicy, this.constructor.name);
  }

  public order(selected: readonly ComponentId[]): ComponentId[] {
    return this.graph.order(selected);
  }

  public async run(record: ConfigurationRecord, options: SequencerOptions = {}): Promise<DeploymentSummary> {
    const signal = options.signal ?? new AbortController().signal;
    const listener = options.listener ?? {};
    const order = this.graph.order(record.selectedComponents);
    const outcomes = new Map(order.map(id => [id, new ComponentOutcome(id)]));
    const notify = (outcome: ComponentOutcome) => listener.onStateChange?.(outcome);

    this.logger.info(`Activation order: ${order.join(' -> ')}`);

    for (const outcome of outcomes.values()) {
      if (signal.aborted) {
        this.logger.warn(`Interrupted, ${outcome.componentId} and the rest are not started`);
        break;
      }

      const blocker = this.graph
        .dependenciesOf(outcome.componentId)
        .find(dependency => outcomes.has(dependency) && outcomes.get(dependency)?.state !== ComponentState.Succeeded);
      if (blocker !== undefined) {
        outcome.block(blocker);
        this.logger.warn(`Skipping ${outcome.componentId}: dependency ${blocker} did not succeed`);
        notify(outcome);
        continue;
      }

      outcome.startDeploying();
      notify(outcome);
      await this.activate(record, outcome, signal, listener);
      this.logger.info(`${outcome.componentId} is ${outcome.state}`, {
        attempts: outcome.attempts,
        detail: outcome.detail,
      });
      notify(outcome);
    }

    return new DeploymentSummary([...outcomes.values()].map(outcome => outcome.snapshot()));
  }

  private async activate(
    record: ConfigurationRecord,
    outcome: ComponentOutcome,
    signal: AbortSignal,
    listener: SequencerListener,
  ): Promise<void> {
    const componentId = outcome.componentId;
    const name = componentDisplayName(componentId);

    let workingDirectory: string;
    let bundle: ArtifactBundle;
    try {
      bundle = this.generator.renderBundle(componentId, record);
      workingDirectory = this.writer.write(bundle);
    } catch (error) {
      this.logger.error(`Artifacts for ${componentId} could not be produced: ${errorMessage(error)}`);
      outcome.fail(errorMessage(error));
      return;
    }

    const adapter = this.adapters.get(componentId);
    for (;;) {
      const attempt = outcome.recordAttempt();
      this.logger.info(`Activating ${componentId}, attempt ${attempt}/${this.retryPolicy.maxAttempts}`);

      let result: AdapterResult;
      try {
        result = await adapter.activate({record, bundle, workingDirectory, signal});
      } catch (error) {
        result = {ok: false, error: classifyFailure(error, `Activating ${name}`)};
      }

      if (signal.aborted) {
        outcome.interrupt();
        return;
      }
      if (result.ok) {
        outcome.succeed(result.detail);
        return;
      }

      const error = result.error;
      const retryable = error instanceof RuntimeAdapterError && error.retryable;
      if (!retryable || attempt >= this.retryPolicy.maxAttempts) {
        outcome.fail(error.message);
        return;
      }

      this.logger.warn(`${name} failed with a retryable error, retrying in ${this.retryPolicy.delay.toString()}`, {
        error: error.message,
      });
      listener.onRetry?.(outcome, error);
      await sleep(this.retryPolicy.delay);
      if (signal.aborted) {
        outcome.interrupt();
        return;
      }
    }
  }
}
