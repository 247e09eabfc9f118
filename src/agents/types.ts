/**
 * Agent service types
 */

import type { ToolRegistry } from '../tools/registry.js';

/**
 * An agent service: a name plus a factory for its tools
 */
export interface AgentService<D> {
  name: string;
  description: string;
  createTools(deps: D): ToolRegistry;
}

/**
 * A service with its dependencies bound, ready to serve
 * createTools runs per request, so handlers only see the dependencies bound here
 */
export interface BoundService {
  name: string;
  description: string;
  createTools(): ToolRegistry;
}

export function bindService<D>(service: AgentService<D>, deps: D): BoundService {
  return {
    name: service.name,
    description: service.description,
    createTools: () => service.createTools(deps),
  };
}
