import type { FastifyBaseLogger } from 'fastify';
import { errorResponse, successResponse } from '../jsonrpc/errors';
import {
  broadcastParamsSchema,
  explicitTarget,
  parseMessage,
  readServerInfo,
  readToolList,
  requestedProtocolVersion,
  toolCallParamsSchema,
} from '../jsonrpc/messages';
import type { JsonRpcMessage, JsonRpcNotification, JsonRpcRequest, JsonRpcResponse, ServerId } from '../types';
import type { AggregationEngine } from './aggregation';
import type { ToolCatalog } from './catalog';
import { deliver } from './delivery';
import type { IdSequence } from './ids';
import type { Outbox } from './outbox';
import { PendingCallTable, type PendingCall } from './pendingCalls';
import type {
  ClientConnection,
  ConnectionRegistry,
  ProviderConnection,
  RegistryEvent,
} from './registry';

export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

const CLIENT_METHODS = ['initialize', 'ping', 'tools/list', 'tools/call', 'broadcast'] as const;
type ClientMethod = (typeof CLIENT_METHODS)[number];
const CLIENT_METHOD_SET: ReadonlySet<string> = new Set(CLIENT_METHODS);
type ClientHandler = (client: ClientConnection, request: JsonRpcRequest) => Promise<void>;

type ProbeMethod = 'initialize' | 'tools/list';

export interface BrokerInfo {
  name: string;
  version: string;
}

export interface MessageRouterOptions {
  registry: ConnectionRegistry;
  catalog: ToolCatalog;
  aggregation: AggregationEngine;
  ids: IdSequence;
  outbox: Outbox;
  logger: FastifyBaseLogger;
  callTimeoutMs: number;
  fanOutMethods?: Iterable<string>;
  brokerInfo: BrokerInfo;
  now?: () => number;
}

function isClientMethod(method: string): method is ClientMethod {
  return CLIENT_METHOD_SET.has(method);
}

/**
 * Classifies every inbound frame and sends it where it belongs. Owns the
 * correlation state for single-destination calls and for the probes the broker
 * itself sends to providers.
 */
export class MessageRouter {
  private readonly calls: PendingCallTable;
  private readonly probes = new Map<string, { connectionId: string; method: ProbeMethod }>();
  private readonly fanOutMethods: Set<string>;
  private readonly handlers: Record<ClientMethod, ClientHandler>;

  constructor(private readonly options: MessageRouterOptions) {
    this.fanOutMethods = new Set(options.fanOutMethods ?? []);
    this.calls = new PendingCallTable({
      timeoutMs: options.callTimeoutMs,
      now: options.now,
      onExpire: (call) => this.onCallExpired(call),
    });
    this.handlers = {
      initialize: (client, request) => this.handleInitialize(client, request),
      ping: (client, request) => this.handlePing(client, request),
      'tools/list': (client, request) => this.handleToolsList(client, request),
      'tools/call': (client, request) => this.handleToolsCall(client, request),
      broadcast: (client, request) => this.handleBroadcast(client, request),
    };
  }

  get pendingCallCount(): number {
    return this.calls.size;
  }

  // ---------- Client side ----------

  async handleClientMessage(client: ClientConnection, raw: string): Promise<void> {
    const { registry, logger } = this.options;
    if (!registry.isLive(client)) {
      logger.debug({ connectionId: client.id }, 'Dropping frame from closed client connection');
      return;
    }
    registry.touch(client);

    const inbound = parseMessage(raw);
    const context = { agentId: client.agentId, connectionId: client.id };
    switch (inbound.kind) {
      case 'invalid': {
        logger.warn({ ...context, detail: inbound.detail }, 'Rejected malformed client message');
        const category = inbound.reason === 'parse' ? 'PARSE_ERROR' : 'INVALID_REQUEST';
        await this.reply(client, errorResponse(category, inbound.id, undefined, { detail: inbound.detail }));
        return;
      }
      case 'response':
        logger.warn({ ...context, id: inbound.message.id }, 'Dropping response sent by client');
        return;
      case 'notification':
        logger.debug({ ...context, method: inbound.message.method }, 'Client notification absorbed');
        return;
      case 'request': {
        const request = inbound.message;
        logger.debug({ ...context, method: request.method, id: request.id }, 'Client request received');
        try {
          await this.dispatchClientRequest(client, request);
        } catch (err) {
          logger.error({ err, ...context, method: request.method }, 'Client request handling failed');
          await this.reply(client, errorResponse('INTERNAL', request.id));
        }
        return;
      }
    }
  }

  private async dispatchClientRequest(client: ClientConnection, request: JsonRpcRequest) {
    const { method } = request;
    if (isClientMethod(method)) {
      await this.handlers[method](client, request);
      return;
    }

    const target = explicitTarget(request.params);
    if (target) {
      await this.forwardToServer(client, request, target);
      return;
    }
    if (this.fanOutMethods.has(method)) {
      await this.options.aggregation.broadcast(client, request.id, { method, params: request.params });
      return;
    }
    await this.reply(client, errorResponse('NOT_FOUND', request.id, `Method '${method}' not found`));
  }

  private async handleInitialize(client: ClientConnection, request: JsonRpcRequest) {
    await this.reply(
      client,
      successResponse(request.id, {
        protocolVersion: requestedProtocolVersion(request.params) ?? DEFAULT_PROTOCOL_VERSION,
        capabilities: { tools: { listChanged: false } },
        serverInfo: this.options.brokerInfo,
      }),
    );
  }

  private async handlePing(client: ClientConnection, request: JsonRpcRequest) {
    const target = explicitTarget(request.params);
    if (target) {
      await this.forwardToServer(client, request, target);
      return;
    }
    await this.reply(client, successResponse(request.id, {}));
  }

  private async handleToolsList(client: ClientConnection, request: JsonRpcRequest) {
    const tools = this.options.catalog
      .listAll(client.agentId)
      .map((entry) => ({ ...entry.tool, server_id: entry.serverId }));
    await this.reply(client, successResponse(request.id, { tools }));
  }

  private async handleToolsCall(client: ClientConnection, request: JsonRpcRequest) {
    const { catalog, registry } = this.options;
    const params = toolCallParamsSchema.safeParse(request.params);
    if (!params.success) {
      await this.reply(
        client,
        errorResponse('INVALID_PARAMS', request.id, 'Missing tool name', params.error.flatten()),
      );
      return;
    }

    const toolName = params.data.name;
    const serverId = catalog.resolve(client.agentId, toolName);
    if (!serverId) {
      await this.reply(client, errorResponse('NOT_FOUND', request.id, `Tool '${toolName}' not found`));
      return;
    }

    const provider = registry.lookupProvider(client.agentId, serverId);
    if (!provider) {
      await this.reply(
        client,
        errorResponse('SERVER_UNAVAILABLE', request.id, `MCP server '${serverId}' is not connected`),
      );
      return;
    }
    await this.forwardCall(client, request, provider);
  }

  private async handleBroadcast(client: ClientConnection, request: JsonRpcRequest) {
    const params = broadcastParamsSchema.safeParse(request.params);
    if (!params.success) {
      await this.reply(
        client,
        errorResponse('INVALID_PARAMS', request.id, 'broadcast requires params.method', params.error.flatten()),
      );
      return;
    }
    await this.options.aggregation.broadcast(client, request.id, params.data);
  }

  private async forwardToServer(client: ClientConnection, request: JsonRpcRequest, serverId: ServerId) {
    const provider = this.options.registry.lookupProvider(client.agentId, serverId);
    if (!provider) {
      await this.reply(
        client,
        errorResponse('SERVER_UNAVAILABLE', request.id, `MCP server '${serverId}' is not connected`),
      );
      return;
    }
    await this.forwardCall(client, request, provider);
  }

  private async forwardCall(client: ClientConnection, request: JsonRpcRequest, provider: ProviderConnection) {
    const { ids, logger } = this.options;
    const forwardedId = ids.next('call');
    this.calls.open(forwardedId, request.id, client, provider);

    const context = { agentId: client.agentId, serverId: provider.serverId, method: request.method, forwardedId };
    logger.info({ ...context, originalId: request.id }, 'Forwarding request to MCP server');
    try {
      await provider.channel.send(JSON.stringify({ ...request, id: forwardedId }));
    } catch (err) {
      logger.warn({ err, ...context }, 'Forward to MCP server failed');
      if (this.calls.settle(forwardedId)) {
        await this.reply(
          client,
          errorResponse('FORWARD_FAILED', request.id, `Forwarding to MCP server '${provider.serverId}' failed`),
        );
      }
    }
  }

  private onCallExpired(call: PendingCall) {
    const { logger, outbox, callTimeoutMs } = this.options;
    logger.warn(
      { agentId: call.client.agentId, serverId: call.provider.serverId, forwardedId: call.forwardedId },
      'MCP server did not answer before the deadline',
    );
    const timeout = errorResponse(
      'TIMEOUT',
      call.originalId,
      `MCP server '${call.provider.serverId}' did not respond within ${callTimeoutMs}ms`,
    );
    outbox.track(deliver(call.client, timeout, logger), 'Timeout reply delivery failed');
  }

  // ---------- Provider side ----------

  /** Starts the handshake the broker runs with every newly registered provider. */
  async onProviderConnected(provider: ProviderConnection): Promise<void> {
    await this.probe(provider, 'initialize');
  }

  async handleProviderMessage(provider: ProviderConnection, raw: string): Promise<void> {
    const { registry, logger } = this.options;
    const context = { agentId: provider.agentId, serverId: provider.serverId };
    if (!registry.isLive(provider)) {
      logger.debug({ ...context, connectionId: provider.id }, 'Dropping frame from inactive MCP server connection');
      return;
    }
    registry.touch(provider);

    const inbound = parseMessage(raw);
    switch (inbound.kind) {
      case 'invalid':
        logger.warn({ ...context, detail: inbound.detail }, 'Dropping malformed message from MCP server');
        return;
      case 'request':
        await this.handleProviderRequest(provider, inbound.message);
        return;
      case 'notification':
        await this.handleProviderNotification(provider, inbound.message);
        return;
      case 'response':
        await this.handleProviderResponse(provider, inbound.message);
        return;
    }
  }

  private async handleProviderRequest(provider: ProviderConnection, request: JsonRpcRequest) {
    const { logger } = this.options;
    if (request.method === 'ping') {
      await deliver(provider, successResponse(request.id, {}), logger);
      return;
    }
    logger.warn({ agentId: provider.agentId, serverId: provider.serverId, method: request.method }, 'Unsupported request from MCP server');
    await deliver(
      provider,
      errorResponse('NOT_FOUND', request.id, `Method '${request.method}' is not supported by the endpoint`),
      logger,
    );
  }

  private async handleProviderNotification(provider: ProviderConnection, notification: JsonRpcNotification) {
    const { registry, logger } = this.options;
    if (notification.method === 'notifications/tools/list_changed') {
      await this.probe(provider, 'tools/list');
      return;
    }
    const clients = registry.listClients(provider.agentId);
    logger.debug(
      { agentId: provider.agentId, serverId: provider.serverId, method: notification.method, clients: clients.length },
      'Relaying MCP server notification',
    );
    await Promise.all(clients.map((client) => deliver(client, notification, logger)));
  }

  private async handleProviderResponse(provider: ProviderConnection, response: JsonRpcResponse) {
    const { aggregation, logger } = this.options;
    this.absorbProviderState(provider, response);

    const id = response.id;
    if (typeof id === 'string') {
      const probe = this.probes.get(id);
      if (probe && probe.connectionId === provider.id) {
        this.probes.delete(id);
        await this.completeProbe(provider, probe.method, response);
        return;
      }

      const call = this.calls.peek(id);
      if (call && call.provider.id === provider.id) {
        this.calls.settle(id);
        await this.reply(call.client, { ...response, id: call.originalId });
        return;
      }

      if (aggregation.onProviderReply(id, provider.serverId, response)) return;
    }

    logger.warn(
      { agentId: provider.agentId, serverId: provider.serverId, id },
      'Dropping reply to unknown or expired request',
    );
  }

  /** Any reply carrying a tool list or an initialize result updates what we know about the provider. */
  private absorbProviderState(provider: ProviderConnection, response: JsonRpcResponse) {
    if (!('result' in response)) return;
    const { catalog, logger } = this.options;
    const context = { agentId: provider.agentId, serverId: provider.serverId };

    const toolList = readToolList(response.result);
    if (toolList) {
      if (toolList.skipped > 0) {
        logger.warn({ ...context, skipped: toolList.skipped }, 'Skipped malformed tool descriptors');
      }
      catalog.updateTools(provider.agentId, provider.serverId, toolList.tools);
      logger.info({ ...context, tools: toolList.tools.length }, 'Tool list updated');
    }

    const serverInfo = readServerInfo(response.result);
    if (serverInfo) provider.serverInfo = serverInfo;
  }

  private async probe(provider: ProviderConnection, method: ProbeMethod) {
    const { ids, logger, brokerInfo } = this.options;
    const id = ids.next('probe');
    this.probes.set(id, { connectionId: provider.id, method });

    const params =
      method === 'initialize'
        ? { protocolVersion: DEFAULT_PROTOCOL_VERSION, capabilities: {}, clientInfo: brokerInfo }
        : {};
    const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };
    if (!(await deliver(provider, request, logger))) this.probes.delete(id);
  }

  private async completeProbe(provider: ProviderConnection, method: ProbeMethod, response: JsonRpcResponse) {
    const { logger } = this.options;
    if ('error' in response) {
      logger.warn(
        { agentId: provider.agentId, serverId: provider.serverId, method, error: response.error },
        'MCP server rejected probe',
      );
    }
    if (method === 'initialize') {
      await deliver(provider, { jsonrpc: '2.0', method: 'notifications/initialized' }, logger);
      await this.probe(provider, 'tools/list');
    }
  }

  // ---------- Registry cascade ----------

  handleRegistryEvent(event: RegistryEvent): void {
    const { logger, outbox } = this.options;
    if (event.type === 'provider-removed') {
      const provider = event.connection;
      for (const [id, probe] of [...this.probes]) {
        if (probe.connectionId === provider.id) this.probes.delete(id);
      }
      for (const call of this.calls.settleByProvider(provider.id)) {
        const failure = errorResponse(
          'SERVER_UNAVAILABLE',
          call.originalId,
          `MCP server '${provider.serverId}' disconnected`,
        );
        outbox.track(deliver(call.client, failure, logger), 'Disconnect reply delivery failed');
      }
    } else if (event.type === 'client-removed') {
      const discarded = this.calls.settleByClient(event.connection.id);
      if (discarded.length > 0) {
        logger.debug({ connectionId: event.connection.id, discarded: discarded.length }, 'Discarded calls of closed client');
      }
    }
  }

  clear(): void {
    this.calls.clear();
    this.probes.clear();
  }

  private reply(client: ClientConnection, message: JsonRpcMessage): Promise<boolean> {
    return deliver(client, message, this.options.logger);
  }
}
