import { randomUUID } from 'crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { PeerChannel } from '../contracts/channel';
import type { AgentId, ConnectionId, ServerId } from '../types';
import { DuplicateServerIdError } from './errors';

export type DuplicateServerPolicy = 'supersede' | 'reject';

export type RemovalReason = 'disconnected' | 'superseded' | 'idle' | 'shutdown';

export interface ProviderConnection {
  readonly kind: 'provider';
  readonly id: ConnectionId;
  readonly agentId: AgentId;
  readonly serverId: ServerId;
  readonly channel: PeerChannel;
  readonly connectedAt: number;
  lastActivity: number;
  serverInfo?: Record<string, unknown>;
}

export interface ClientConnection {
  readonly kind: 'client';
  readonly id: ConnectionId;
  readonly agentId: AgentId;
  readonly channel: PeerChannel;
  readonly connectedAt: number;
  lastActivity: number;
}

export type Connection = ProviderConnection | ClientConnection;

export type RegistryEvent =
  | { type: 'provider-added'; connection: ProviderConnection }
  | { type: 'provider-removed'; connection: ProviderConnection; reason: RemovalReason }
  | { type: 'client-added'; connection: ClientConnection }
  | { type: 'client-removed'; connection: ClientConnection; reason: RemovalReason };

export type RegistryListener = (event: RegistryEvent) => void;

interface AgentContext {
  agentId: AgentId;
  // Map insertion order doubles as provider registration order.
  providers: Map<ServerId, ProviderConnection>;
  clients: Map<ConnectionId, ClientConnection>;
  createdAt: number;
}

export interface RegistryOptions {
  logger: FastifyBaseLogger;
  duplicatePolicy?: DuplicateServerPolicy;
  now?: () => number;
}

/**
 * Authoritative store of live connections, keyed by agent. Every mutation is
 * followed synchronously by its event, so listeners (catalog, router,
 * aggregation) never observe the registry and their own state out of step.
 */
export class ConnectionRegistry {
  private readonly agents = new Map<AgentId, AgentContext>();
  private readonly listeners = new Set<RegistryListener>();
  private readonly logger: FastifyBaseLogger;
  private readonly duplicatePolicy: DuplicateServerPolicy;
  private readonly now: () => number;

  constructor(options: RegistryOptions) {
    this.logger = options.logger;
    this.duplicatePolicy = options.duplicatePolicy ?? 'supersede';
    this.now = options.now ?? Date.now;
  }

  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  registerProvider(agentId: AgentId, serverId: ServerId, channel: PeerChannel): ProviderConnection {
    const existing = this.agents.get(agentId)?.providers.get(serverId);
    if (existing) {
      if (this.duplicatePolicy === 'reject') {
        throw new DuplicateServerIdError(agentId, serverId);
      }
      this.removeProvider(existing, 'superseded');
      existing.channel.close(1000, 'Replaced by new connection');
    }

    const at = this.now();
    const connection: ProviderConnection = {
      kind: 'provider',
      id: randomUUID(),
      agentId,
      serverId,
      channel,
      connectedAt: at,
      lastActivity: at,
    };
    this.ensureAgent(agentId).providers.set(serverId, connection);
    this.logger.info({ agentId, serverId, connectionId: connection.id }, 'MCP server registered');
    this.emit({ type: 'provider-added', connection });
    return connection;
  }

  registerClient(agentId: AgentId, channel: PeerChannel): ClientConnection {
    const at = this.now();
    const connection: ClientConnection = {
      kind: 'client',
      id: randomUUID(),
      agentId,
      channel,
      connectedAt: at,
      lastActivity: at,
    };
    this.ensureAgent(agentId).clients.set(connection.id, connection);
    this.logger.info({ agentId, connectionId: connection.id }, 'Client registered');
    this.emit({ type: 'client-added', connection });
    return connection;
  }

  /**
   * Removes the provider registered under `(agentId, serverId)`. When `connection`
   * is given, only that exact connection is removed, so a superseded socket that
   * closes late cannot evict its replacement. Returns false when nothing changed.
   */
  unregisterProvider(
    agentId: AgentId,
    serverId: ServerId,
    options: { connection?: ProviderConnection; reason?: RemovalReason } = {},
  ): boolean {
    const current = this.agents.get(agentId)?.providers.get(serverId);
    if (!current) return false;
    if (options.connection && options.connection !== current) return false;
    this.removeProvider(current, options.reason ?? 'disconnected');
    return true;
  }

  unregisterClient(agentId: AgentId, clientId: ConnectionId, reason: RemovalReason = 'disconnected'): boolean {
    const agent = this.agents.get(agentId);
    const current = agent?.clients.get(clientId);
    if (!agent || !current) return false;

    agent.clients.delete(clientId);
    this.reap(agent);
    this.logger.info({ agentId, connectionId: clientId, reason }, 'Client unregistered');
    this.emit({ type: 'client-removed', connection: current, reason });
    return true;
  }

  lookupProvider(agentId: AgentId, serverId: ServerId): ProviderConnection | undefined {
    return this.agents.get(agentId)?.providers.get(serverId);
  }

  isLive(connection: Connection): boolean {
    const agent = this.agents.get(connection.agentId);
    if (!agent) return false;
    if (connection.kind === 'provider') {
      return agent.providers.get(connection.serverId) === connection;
    }
    return agent.clients.get(connection.id) === connection;
  }

  listProviders(agentId: AgentId): ProviderConnection[] {
    return [...(this.agents.get(agentId)?.providers.values() ?? [])];
  }

  listClients(agentId: AgentId): ClientConnection[] {
    return [...(this.agents.get(agentId)?.clients.values() ?? [])];
  }

  agentIds(): AgentId[] {
    return [...this.agents.keys()];
  }

  connections(): Connection[] {
    const all: Connection[] = [];
    for (const agent of this.agents.values()) {
      all.push(...agent.providers.values(), ...agent.clients.values());
    }
    return all;
  }

  get providerCount(): number {
    let count = 0;
    for (const agent of this.agents.values()) count += agent.providers.size;
    return count;
  }

  get clientCount(): number {
    let count = 0;
    for (const agent of this.agents.values()) count += agent.clients.size;
    return count;
  }

  touch(connection: Connection): void {
    if (this.isLive(connection)) connection.lastActivity = this.now();
  }

  /** Live connections whose last inbound frame is older than `maxIdleMs`. */
  findIdle(maxIdleMs: number): Connection[] {
    const cutoff = this.now() - maxIdleMs;
    return this.connections().filter((connection) => connection.lastActivity < cutoff);
  }

  private removeProvider(connection: ProviderConnection, reason: RemovalReason) {
    const agent = this.agents.get(connection.agentId);
    if (!agent) return;
    agent.providers.delete(connection.serverId);
    this.reap(agent);
    this.logger.info(
      { agentId: connection.agentId, serverId: connection.serverId, connectionId: connection.id, reason },
      'MCP server unregistered',
    );
    this.emit({ type: 'provider-removed', connection, reason });
  }

  private ensureAgent(agentId: AgentId): AgentContext {
    let agent = this.agents.get(agentId);
    if (!agent) {
      agent = { agentId, providers: new Map(), clients: new Map(), createdAt: this.now() };
      this.agents.set(agentId, agent);
    }
    return agent;
  }

  private reap(agent: AgentContext) {
    if (agent.providers.size === 0 && agent.clients.size === 0) {
      this.agents.delete(agent.agentId);
    }
  }

  private emit(event: RegistryEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, event: event.type }, 'Registry listener failed');
      }
    }
  }
}
