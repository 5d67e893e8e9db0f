// SPDX-License-Identifier: Apache-2.0

import {ComponentId, COMPONENT_IDS} from '../config/component-id.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/** Static activation dependencies: a component starts only after these succeed. */
const DEPENDENCIES: ReadonlyMap<ComponentId, readonly ComponentId[]> = new Map<ComponentId, readonly ComponentId[]>([
  [ComponentId.Orchestrator, []],
  [ComponentId.AccessGateway, []],
  [ComponentId.FederatedGateway, []],
  [ComponentId.NetworkManagementSystem, [ComponentId.Orchestrator]],
]);

export class ComponentGraph {
  public constructor(private readonly dependencies: ReadonlyMap<ComponentId, readonly ComponentId[]> = DEPENDENCIES) {}

  public dependenciesOf(componentId: ComponentId): readonly ComponentId[] {
    return this.dependencies.get(componentId) ?? [];
  }

  /**
   * Topological order of the selected components. Dependencies outside the selection are ignored; ties are broken by
   * the canonical component order.
   *
   * @throws IllegalArgumentError if the selected components form a cycle
   */
  public order(selected: readonly ComponentId[]): ComponentId[] {
    const nodes = COMPONENT_IDS.filter(id => selected.includes(id));
    const inDegree = new Map<ComponentId, number>();
    for (const id of nodes) {
      inDegree.set(id, this.dependenciesOf(id).filter(dependency => nodes.includes(dependency)).length);
    }

    const result: ComponentId[] = [];
    const rank = (id: ComponentId) => COMPONENT_IDS.indexOf(id);
    let ready = nodes.filter(id => inDegree.get(id) === 0);

    while (ready.length > 0) {
      ready.sort((a, b) => rank(a) - rank(b));
      const [next, ...rest] = ready;
      ready = rest;
      result.push(next);

      for (const id of nodes) {
        if (this.dependenciesOf(id).includes(next)) {
          const remaining = (inDegree.get(id) ?? 0) - 1;
          inDegree.set(id, remaining);
          if (remaining === 0) {
            ready.push(id);
          }
        }
      }
    }

    if (result.length !== nodes.length) {
      throw new IllegalArgumentError('component dependencies contain a cycle', nodes.filter(id => !result.includes(id)));
    }
    return result;
  }
}
