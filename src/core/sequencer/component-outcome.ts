// SPDX-License-Identifier: Apache-2.0

import {type ComponentId} from '../config/component-id.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export enum ComponentState {
  Pending = 'Pending',
  Deploying = 'Deploying',
  Succeeded = 'Succeeded',
  Failed = 'Failed',
  Interrupted = 'Interrupted',
}

const TRANSITIONS: ReadonlyMap<ComponentState, readonly ComponentState[]> = new Map<ComponentState, readonly ComponentState[]>([
  [ComponentState.Pending, [ComponentState.Deploying]],
  [ComponentState.Deploying, [ComponentState.Succeeded, ComponentState.Failed, ComponentState.Interrupted]],
  [ComponentState.Succeeded, []],
  [ComponentState.Failed, []],
  [ComponentState.Interrupted, []],
]);

export interface ComponentOutcomeSnapshot {
  readonly componentId: ComponentId;
  readonly state: ComponentState;
  /** Failure or interruption detail, or what is running after success. */
  readonly detail?: string;
  readonly attempts: number;
  /** Set when the component stayed Pending because this dependency did not succeed. */
  readonly blockedBy?: ComponentId;
}

/**
 * Lifecycle of one component in a run. Only the transitions Pending to Deploying, and Deploying to a terminal state,
 * are allowed.
 */
export class ComponentOutcome {
  private _state = ComponentState.Pending;
  private _detail?: string;
  private _attempts = 0;
  private _blockedBy?: ComponentId;

  public constructor(public readonly componentId: ComponentId) {}

  public get state(): ComponentState {
    return this._state;
  }

  public get detail(): string | undefined {
    return this._detail;
  }

  public get attempts(): number {
    return this._attempts;
  }

  public get blockedBy(): ComponentId | undefined {
    return this._blockedBy;
  }

  public startDeploying(): void {
    this.transition(ComponentState.Deploying);
  }

  public recordAttempt(): number {
    if (this._state !== ComponentState.Deploying) {
      throw new IllegalArgumentError(`${this.componentId} is not deploying`, this._state);
    }
    return ++this._attempts;
  }

  public succeed(detail?: string): void {
    this.transition(ComponentState.Succeeded);
    this._detail = detail;
  }

  public fail(detail: string): void {
    this.transition(ComponentState.Failed);
    this._detail = detail;
  }

  public interrupt(detail = 'interrupted by operator'): void {
    this.transition(ComponentState.Interrupted);
    this._detail = detail;
  }

  /** Leaves the component Pending behind a dependency that did not succeed. */
  public block(dependency: ComponentId): void {
    if (this._state !== ComponentState.Pending) {
      throw new IllegalArgumentError(`${this.componentId} can only be blocked while pending`, this._state);
    }
    this._blockedBy = dependency;
    this._detail = `not started: ${dependency} did not succeed`;
  }

  public isTerminal(): boolean {
    return (TRANSITIONS.get(this._state) ?? []).length === 0;
  }

  public snapshot(): ComponentOutcomeSnapshot {
    return {
      componentId: this.componentId,
      state: this._state,
      detail: this._detail,
      attempts: this._attempts,
      blockedBy: this._blockedBy,
    };
  }

  private transition(next: ComponentState): void {
    if (!(TRANSITIONS.get(this._state) ?? []).includes(next)) {
      throw new IllegalArgumentError(
        `illegal state transition for ${this.componentId}: ${this._state} -> ${next}`,
        next,
      );
    }
    this._state = next;
  }
}
