import type { FastifyBaseLogger } from 'fastify';
import { BROKER_ERRORS, errorResponse, successResponse } from '../jsonrpc/errors';
import type { AgentId, JsonRpcErrorObject, JsonRpcResponse, ServerId } from '../types';
import { deliver } from './delivery';
import type { IdSequence } from './ids';
import type { Outbox } from './outbox';
import type { ClientConnection, ConnectionRegistry, RegistryEvent } from './registry';

export type ServerReply =
  | { server_id: ServerId; result: unknown }
  | { server_id: ServerId; error: JsonRpcErrorObject };

export interface AggregatedResult {
  responses: ServerReply[];
  total_servers: number;
  responded_servers: number;
}

export interface BroadcastRequest {
  method: string;
  params?: unknown;
}

interface PendingAggregation {
  requestId: string;
  originalId: string | number;
  client: ClientConnection;
  agentId: AgentId;
  method: string;
  // Frozen at fan-out; only shrinks when a provider leaves before answering.
  expected: Set<ServerId>;
  // Insertion order is arrival order.
  received: Map<ServerId, ServerReply>;
  forwardFailures: number;
  createdAt: number;
  deadline: number;
  timer: ReturnType<typeof setTimeout>;
}

export interface AggregationEngineOptions {
  registry: ConnectionRegistry;
  ids: IdSequence;
  outbox: Outbox;
  logger: FastifyBaseLogger;
  timeoutMs: number;
  now?: () => number;
}

/**
 * Fans one client request out to every live provider of its agent and answers
 * with a single combined reply once all of them replied, left, or the deadline
 * passed.
 */
export class AggregationEngine {
  private readonly pending = new Map<string, PendingAggregation>();
  private readonly now: () => number;

  constructor(private readonly options: AggregationEngineOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.pending.size;
  }

  has(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  async broadcast(client: ClientConnection, originalId: string | number, request: BroadcastRequest): Promise<void> {
    const { registry, ids, logger, timeoutMs } = this.options;
    const providers = registry.listProviders(client.agentId);

    if (providers.length === 0) {
      const empty: AggregatedResult = { responses: [], total_servers: 0, responded_servers: 0 };
      await deliver(client, successResponse(originalId, empty), logger);
      return;
    }

    const requestId = ids.next('bcast');
    const createdAt = this.now();
    const aggregation: PendingAggregation = {
      requestId,
      originalId,
      client,
      agentId: client.agentId,
      method: request.method,
      expected: new Set(providers.map((provider) => provider.serverId)),
      received: new Map(),
      forwardFailures: 0,
      createdAt,
      deadline: createdAt + timeoutMs,
      timer: setTimeout(() => this.onTimeout(requestId), timeoutMs),
    };
    this.pending.set(requestId, aggregation);

    const frame = JSON.stringify({
      jsonrpc: '2.0',
      id: requestId,
      method: request.method,
      ...(typeof request.params !== 'undefined' ? { params: request.params } : {}),
    });
    logger.info(
      { agentId: client.agentId, requestId, method: request.method, servers: [...aggregation.expected] },
      'Broadcasting request',
    );

    await Promise.all(
      providers.map(async (provider) => {
        try {
          await provider.channel.send(frame);
        } catch (err) {
          logger.warn({ err, agentId: client.agentId, serverId: provider.serverId, requestId }, 'Broadcast forward failed');
          this.recordForwardFailure(requestId, provider.serverId);
        }
      }),
    );
  }

  /** Returns false when `requestId` does not belong to an open aggregation. */
  onProviderReply(requestId: string, serverId: ServerId, reply: JsonRpcResponse): boolean {
    const aggregation = this.pending.get(requestId);
    if (!aggregation) return false;

    if (!aggregation.expected.has(serverId)) {
      this.options.logger.debug({ requestId, serverId }, 'Ignoring broadcast reply from unexpected server');
      return true;
    }
    if (aggregation.received.has(serverId)) {
      this.options.logger.debug({ requestId, serverId }, 'Ignoring duplicate broadcast reply');
      return true;
    }

    aggregation.received.set(
      serverId,
      'error' in reply ? { server_id: serverId, error: reply.error } : { server_id: serverId, result: reply.result },
    );
    if (isComplete(aggregation)) this.finalize(aggregation);
    return true;
  }

  onTimeout(requestId: string): void {
    const aggregation = this.pending.get(requestId);
    if (!aggregation) return;
    this.options.logger.warn(
      {
        requestId,
        agentId: aggregation.agentId,
        missing: [...aggregation.expected].filter((serverId) => !aggregation.received.has(serverId)),
      },
      'Broadcast deadline reached',
    );
    this.finalize(aggregation);
  }

  handleRegistryEvent(event: RegistryEvent): void {
    if (event.type === 'provider-removed') {
      const { agentId, serverId } = event.connection;
      for (const aggregation of [...this.pending.values()]) {
        if (aggregation.agentId !== agentId) continue;
        if (!aggregation.expected.has(serverId) || aggregation.received.has(serverId)) continue;
        aggregation.expected.delete(serverId);
        if (isComplete(aggregation)) this.finalize(aggregation);
      }
    } else if (event.type === 'client-removed') {
      for (const aggregation of [...this.pending.values()]) {
        if (aggregation.client.id === event.connection.id) this.discard(aggregation);
      }
    }
  }

  clear(): void {
    for (const aggregation of [...this.pending.values()]) this.discard(aggregation);
  }

  private recordForwardFailure(requestId: string, serverId: ServerId) {
    const aggregation = this.pending.get(requestId);
    if (!aggregation || aggregation.received.has(serverId) || !aggregation.expected.has(serverId)) return;
    aggregation.forwardFailures += 1;
    aggregation.received.set(serverId, {
      server_id: serverId,
      error: { code: BROKER_ERRORS.FORWARD_FAILED.code, message: BROKER_ERRORS.FORWARD_FAILED.message },
    });
    if (isComplete(aggregation)) this.finalize(aggregation);
  }

  private finalize(aggregation: PendingAggregation) {
    // Whoever deletes the record first finalizes; later callers see nothing.
    if (!this.pending.delete(aggregation.requestId)) return;
    clearTimeout(aggregation.timer);

    const { logger, outbox } = this.options;
    const { client, originalId } = aggregation;

    if (aggregation.expected.size > 0 && aggregation.forwardFailures === aggregation.expected.size) {
      const failure = errorResponse('FORWARD_FAILED', originalId, `Forwarding '${aggregation.method}' to every MCP server failed`);
      outbox.track(deliver(client, failure, logger), 'Broadcast failure delivery failed');
      return;
    }

    const result: AggregatedResult = {
      responses: [...aggregation.received.values()],
      total_servers: aggregation.expected.size,
      responded_servers: aggregation.received.size,
    };
    logger.info(
      {
        requestId: aggregation.requestId,
        agentId: aggregation.agentId,
        total: result.total_servers,
        responded: result.responded_servers,
        elapsedMs: this.now() - aggregation.createdAt,
      },
      'Broadcast finalized',
    );
    outbox.track(deliver(client, successResponse(originalId, result), logger), 'Broadcast result delivery failed');
  }

  private discard(aggregation: PendingAggregation) {
    if (!this.pending.delete(aggregation.requestId)) return;
    clearTimeout(aggregation.timer);
  }
}

function isComplete(aggregation: PendingAggregation): boolean {
  for (const serverId of aggregation.expected) {
    if (!aggregation.received.has(serverId)) return false;
  }
  return true;
}
