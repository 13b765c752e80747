import type { FastifyBaseLogger } from 'fastify';
import type { PeerChannel } from '../contracts/channel';
import type { AgentId, ServerId } from '../types';
import { AggregationEngine } from './aggregation';
import { ToolCatalog } from './catalog';
import { IdSequence } from './ids';
import { Outbox } from './outbox';
import {
  ConnectionRegistry,
  type ClientConnection,
  type Connection,
  type DuplicateServerPolicy,
  type ProviderConnection,
} from './registry';
import { MessageRouter, type BrokerInfo } from './router';
import { StatsReporter } from './stats';

export interface BrokerOptions {
  logger: FastifyBaseLogger;
  callTimeoutMs: number;
  broadcastTimeoutMs: number;
  fanOutMethods?: Iterable<string>;
  duplicatePolicy?: DuplicateServerPolicy;
  brokerInfo?: BrokerInfo;
  now?: () => number;
}

export const DEFAULT_BROKER_INFO: BrokerInfo = { name: 'mcp-endpoint-broker', version: '0.1.0' };

export class Broker {
  readonly registry: ConnectionRegistry;
  readonly catalog: ToolCatalog;
  readonly aggregation: AggregationEngine;
  readonly router: MessageRouter;
  readonly stats: StatsReporter;

  private readonly outbox: Outbox;
  private readonly logger: FastifyBaseLogger;
  private readonly unsubscribe: Array<() => void>;

  constructor(options: BrokerOptions) {
    const { logger, now } = options;
    this.logger = logger;
    this.outbox = new Outbox(logger);
    const ids = new IdSequence();

    this.registry = new ConnectionRegistry({ logger, duplicatePolicy: options.duplicatePolicy, now });
    this.catalog = new ToolCatalog();
    this.aggregation = new AggregationEngine({
      registry: this.registry,
      ids,
      outbox: this.outbox,
      logger,
      timeoutMs: options.broadcastTimeoutMs,
      now,
    });
    this.router = new MessageRouter({
      registry: this.registry,
      catalog: this.catalog,
      aggregation: this.aggregation,
      ids,
      outbox: this.outbox,
      logger,
      callTimeoutMs: options.callTimeoutMs,
      fanOutMethods: options.fanOutMethods,
      brokerInfo: options.brokerInfo ?? DEFAULT_BROKER_INFO,
      now,
    });
    this.stats = new StatsReporter({
      registry: this.registry,
      catalog: this.catalog,
      router: this.router,
      aggregation: this.aggregation,
    });

    // Order matters: the catalog forgets a provider's tools before pending work fails over.
    this.unsubscribe = [
      this.registry.subscribe((event) => this.catalog.handleRegistryEvent(event)),
      this.registry.subscribe((event) => this.router.handleRegistryEvent(event)),
      this.registry.subscribe((event) => this.aggregation.handleRegistryEvent(event)),
    ];
  }

  /**
   * Registers a provider and starts its handshake. Throws DuplicateServerIdError
   * under the `reject` policy.
   */
  connectProvider(agentId: AgentId, serverId: ServerId, channel: PeerChannel): ProviderConnection {
    const provider = this.registry.registerProvider(agentId, serverId, channel);
    this.outbox.track(this.router.onProviderConnected(provider), 'Provider handshake failed');
    return provider;
  }

  connectClient(agentId: AgentId, channel: PeerChannel): ClientConnection {
    return this.registry.registerClient(agentId, channel);
  }

  /** Safe to call for a connection that was already superseded or swept. */
  disconnect(connection: Connection): boolean {
    if (connection.kind === 'provider') {
      return this.registry.unregisterProvider(connection.agentId, connection.serverId, { connection });
    }
    return this.registry.unregisterClient(connection.agentId, connection.id);
  }

  async handleMessage(connection: Connection, raw: string): Promise<void> {
    if (connection.kind === 'provider') {
      await this.router.handleProviderMessage(connection, raw);
    } else {
      await this.router.handleClientMessage(connection, raw);
    }
  }

  /** Records transport-level liveness (ping or pong) that carries no JSON-RPC frame. */
  touch(connection: Connection): void {
    this.registry.touch(connection);
  }

  /** Closes and unregisters connections that have been silent for longer than `maxIdleMs`. */
  sweepIdle(maxIdleMs: number): number {
    const idle = this.registry.findIdle(maxIdleMs);
    for (const connection of idle) {
      this.logger.info(
        { agentId: connection.agentId, connectionId: connection.id, role: connection.kind },
        'Closing idle connection',
      );
      this.remove(connection, 'idle');
      connection.channel.close(1001, 'idle');
    }
    return idle.length;
  }

  drain(): Promise<void> {
    return this.outbox.drain();
  }

  async shutdown(): Promise<void> {
    // Outstanding work is dropped rather than failed over; every socket is closing anyway.
    this.router.clear();
    this.aggregation.clear();
    for (const connection of this.registry.connections()) {
      this.remove(connection, 'shutdown');
      connection.channel.close(1001, 'Server shutting down');
    }
    await this.outbox.drain();
    for (const stop of this.unsubscribe) stop();
  }

  private remove(connection: Connection, reason: 'idle' | 'shutdown') {
    if (connection.kind === 'provider') {
      this.registry.unregisterProvider(connection.agentId, connection.serverId, { connection, reason });
    } else {
      this.registry.unregisterClient(connection.agentId, connection.id, reason);
    }
  }
}
