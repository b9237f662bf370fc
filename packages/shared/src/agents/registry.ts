/**
 * Agent Registry
 *
 * Static route table from (format, intent) to an agent. Lookup tries the exact
 * "<Format>:<Intent>" route, then "<Format>:*", then the default agent, so every
 * classification resolves to some agent.
 */

import { logger } from '../logger';
import type { AgentName, DocumentFormat, Intent } from '../types';
import type { Agent } from './types';

export type RouteKey = `${DocumentFormat}:${Intent | '*'}`;

export const DEFAULT_ROUTES: ReadonlyArray<readonly [RouteKey, AgentName]> = [
  ['JSON:*', 'json_agent'],
  ['Email:*', 'email_agent'],
  ['Text:*', 'email_agent'],
  ['PDF:*', 'pdf_agent'],
];

export const DEFAULT_AGENT: AgentName = 'email_agent';

export interface AgentRegistryOptions {
  routes?: ReadonlyArray<readonly [RouteKey, AgentName]>;
  defaultAgent?: AgentName;
}

export class AgentRegistry {
  private readonly agents = new Map<AgentName, Agent>();
  private readonly routes = new Map<RouteKey, AgentName>();
  private readonly defaultAgent: AgentName;

  /**
   * @throws Error if the default agent is not among the given agents
   */
  constructor(agents: Agent[], options: AgentRegistryOptions = {}) {
    for (const agent of agents) {
      this.agents.set(agent.name, agent);
    }
    for (const [key, agentName] of options.routes ?? DEFAULT_ROUTES) {
      this.routes.set(key, agentName);
    }
    this.defaultAgent = options.defaultAgent ?? DEFAULT_AGENT;

    if (!this.agents.has(this.defaultAgent)) {
      throw new Error(`Default agent is not registered: ${this.defaultAgent}`);
    }
  }

  resolve(format: DocumentFormat, intent: Intent): Agent {
    const routed = this.routes.get(`${format}:${intent}`) ?? this.routes.get(`${format}:*`);
    const agent = routed ? this.agents.get(routed) : undefined;

    if (agent) return agent;

    logger.debug('No route for classification, using default agent', {
      format,
      intent,
      routed_to: routed,
      default_agent: this.defaultAgent,
    });
    return this.getAgentOrThrow(this.defaultAgent);
  }

  getAgent(name: AgentName): Agent | undefined {
    return this.agents.get(name);
  }

  getAgentOrThrow(name: AgentName): Agent {
    const agent = this.agents.get(name);
    if (!agent) {
      throw new Error(`No agent registered with name: ${name}`);
    }
    return agent;
  }

  hasAgent(name: AgentName): boolean {
    return this.agents.has(name);
  }

  getRegistryStats(): {
    totalAgents: number;
    totalRoutes: number;
    routesByAgent: Record<string, number>;
    agentNames: AgentName[];
  } {
    const routesByAgent: Record<string, number> = {};
    for (const agentName of this.routes.values()) {
      routesByAgent[agentName] = (routesByAgent[agentName] || 0) + 1;
    }

    return {
      totalAgents: this.agents.size,
      totalRoutes: this.routes.size,
      routesByAgent,
      agentNames: Array.from(this.agents.keys()),
    };
  }
}
