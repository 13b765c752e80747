import type { AgentId, ServerId } from '../types';
import type { AggregationEngine } from './aggregation';
import type { ToolCatalog } from './catalog';
import type { ConnectionRegistry } from './registry';
import type { MessageRouter } from './router';

export interface ServerStats {
  tool_count: number;
  tool_names: string[];
  connected_at: string;
  last_activity: string;
  server_info?: Record<string, unknown>;
}

export interface BrokerStats {
  provider_connections: number;
  client_connections: number;
  total_connections: number;
  agents: AgentId[];
  total_tools: number;
  pending_calls: number;
  pending_aggregations: number;
  servers: Record<AgentId, Record<ServerId, ServerStats>>;
}

interface StatsSources {
  registry: ConnectionRegistry;
  catalog: ToolCatalog;
  router: MessageRouter;
  aggregation: AggregationEngine;
}

/** Read-only view over broker state for the health endpoint. */
export class StatsReporter {
  constructor(private readonly sources: StatsSources) {}

  snapshot(): BrokerStats {
    const { registry, catalog, router, aggregation } = this.sources;
    const servers: Record<AgentId, Record<ServerId, ServerStats>> = {};
    const agents: AgentId[] = [];

    for (const agentId of registry.agentIds()) {
      const providers = registry.listProviders(agentId);
      if (providers.length === 0) continue;
      agents.push(agentId);

      const perServer: Record<ServerId, ServerStats> = {};
      for (const provider of providers) {
        const toolNames = catalog.toolsOwnedBy(agentId, provider.serverId).map((entry) => entry.name);
        perServer[provider.serverId] = {
          tool_count: toolNames.length,
          tool_names: toolNames,
          connected_at: new Date(provider.connectedAt).toISOString(),
          last_activity: new Date(provider.lastActivity).toISOString(),
          ...(provider.serverInfo ? { server_info: provider.serverInfo } : {}),
        };
      }
      servers[agentId] = perServer;
    }

    const providerCount = registry.providerCount;
    const clientCount = registry.clientCount;
    return {
      provider_connections: providerCount,
      client_connections: clientCount,
      total_connections: providerCount + clientCount,
      agents,
      total_tools: catalog.totalToolCount(),
      pending_calls: router.pendingCallCount,
      pending_aggregations: aggregation.size,
      servers,
    };
  }
}
