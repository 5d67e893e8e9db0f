// SPDX-License-Identifier: Apache-2.0

import {ComponentId} from '../config/component-id.js';

export type ToolName = 'docker' | 'docker-compose' | 'kubectl' | 'helm' | 'git';

/** Install order; tools later in the list may rely on earlier ones. */
export const TOOL_NAMES: readonly ToolName[] = ['git', 'docker', 'docker-compose', 'kubectl', 'helm'];

const CLUSTER_TOOLS: readonly ToolName[] = ['kubectl', 'helm'];
const CONTAINER_TOOLS: readonly ToolName[] = ['docker', 'docker-compose'];

const TOOLS_BY_COMPONENT: ReadonlyMap<ComponentId, readonly ToolName[]> = new Map([
  [ComponentId.Orchestrator, CLUSTER_TOOLS],
  [ComponentId.NetworkManagementSystem, CLUSTER_TOOLS],
  [ComponentId.AccessGateway, CONTAINER_TOOLS],
  [ComponentId.FederatedGateway, CONTAINER_TOOLS],
]);

/** Tools the selected components need, in install order; git is always required. */
export function requiredTools(components: readonly ComponentId[]): ToolName[] {
  const needed = new Set<ToolName>(['git']);
  for (const component of components) {
    for (const tool of TOOLS_BY_COMPONENT.get(component) ?? []) {
      needed.add(tool);
    }
  }
  return TOOL_NAMES.filter(tool => needed.has(tool));
}
