// SPDX-License-Identifier: Apache-2.0

import {ValidationError} from '../errors/validation-error.js';

/**
 * Deployable units of the managed stack.
 */
export enum ComponentId {
  Orchestrator = 'orchestrator',
  AccessGateway = 'accessGateway',
  FederatedGateway = 'federatedGateway',
  NetworkManagementSystem = 'networkManagementSystem',
}

/** Canonical order, used for display and to break ties when ordering activation. */
export const COMPONENT_IDS: readonly ComponentId[] = [
  ComponentId.Orchestrator,
  ComponentId.AccessGateway,
  ComponentId.FederatedGateway,
  ComponentId.NetworkManagementSystem,
];

const ALIASES: ReadonlyMap<ComponentId, string> = new Map([
  [ComponentId.Orchestrator, 'orc8r'],
  [ComponentId.AccessGateway, 'agw'],
  [ComponentId.FederatedGateway, 'fgw'],
  [ComponentId.NetworkManagementSystem, 'nms'],
]);

const DISPLAY_NAMES: ReadonlyMap<ComponentId, string> = new Map([
  [ComponentId.Orchestrator, 'Orchestrator'],
  [ComponentId.AccessGateway, 'Access Gateway'],
  [ComponentId.FederatedGateway, 'Federated Gateway'],
  [ComponentId.NetworkManagementSystem, 'Network Management System'],
]);

const LOOKUP: ReadonlyMap<string, ComponentId> = new Map(
  COMPONENT_IDS.flatMap((id): [string, ComponentId][] => [
    [id.toLowerCase(), id],
    [componentAlias(id), id],
  ]),
);

export function componentAlias(id: ComponentId): string {
  return ALIASES.get(id) ?? id;
}

export function componentDisplayName(id: ComponentId): string {
  return DISPLAY_NAMES.get(id) ?? id;
}

/**
 * Parses a single component name, either its id (case-insensitive) or its short alias.
 *
 * @returns the component id, or undefined when the name is unknown
 */
export function parseComponentId(name: string): ComponentId | undefined {
  return LOOKUP.get(name.trim().toLowerCase());
}

/**
 * Parses a comma separated component list into a duplicate-free list in canonical order.
 *
 * @param value - e.g. `orc8r, nms` or `orchestrator,networkManagementSystem`
 * @param field - the field name reported on failure
 * @throws ValidationError if the list is empty or names an unknown component
 */
export function parseComponentList(value: string, field = 'COMPONENTS'): ComponentId[] {
  const names = value
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);

  if (names.length === 0) {
    throw new ValidationError(field, 'at least one component must be selected');
  }

  const selected = new Set<ComponentId>();
  for (const name of names) {
    const id = parseComponentId(name);
    if (!id) {
      throw new ValidationError(
        field,
        `unknown component '${name}', expected one of ${COMPONENT_IDS.map(componentAlias).join(', ')}`,
      );
    }
    selected.add(id);
  }

  return COMPONENT_IDS.filter(id => selected.has(id));
}

/** Inverse of parseComponentList, using the short aliases. */
export function formatComponentList(ids: readonly ComponentId[]): string {
  return ids.map(componentAlias).join(',');
}
