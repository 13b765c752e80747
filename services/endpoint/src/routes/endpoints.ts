import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { WebSocket } from 'ws';
import { z } from 'zod';
import type { TokenResolver } from '../contracts/auth';
import type { Broker } from '../core/broker';
import { DuplicateServerIdError } from '../core/errors';
import type { Connection } from '../core/registry';
import { WebSocketChannel, frameToText } from '../transport/wsChannel';

// ---------- Schemas ----------
const clientQuerySchema = z.object({
  token: z.string().min(1, 'token required'),
});

const providerQuerySchema = clientQuerySchema.extend({
  server_id: z.string().min(1, 'server_id required'),
});

const POLICY_VIOLATION = 1008;
const INTERNAL_ERROR = 1011;

export interface EndpointRouteOptions {
  broker: Broker;
  tokens: TokenResolver;
  prefix: string;
}

type OpenSession = (channel: WebSocketChannel) => Promise<Connection | null>;

// ---------- Helper ----------
/**
 * Wires one socket to the broker. Listeners are attached before the token is
 * resolved so no early frame is lost; frames then run strictly one after another.
 */
function bindSocket(socket: WebSocket, broker: Broker, log: FastifyBaseLogger, open: OpenSession) {
  const channel = new WebSocketChannel(socket);
  const session = open(channel).catch((err: unknown) => {
    log.error({ err }, 'Session setup failed');
    channel.close(INTERNAL_ERROR, 'Internal error');
    return null;
  });

  let queue: Promise<void> = session.then(() => undefined);
  const enqueue = (task: (connection: Connection) => Promise<void> | void) => {
    queue = queue
      .then(async () => {
        const connection = await session;
        if (connection) await task(connection);
      })
      .catch((err: unknown) => {
        log.error({ err }, 'Frame handling failed');
      });
  };

  socket.on('message', (data) => {
    const raw = frameToText(data);
    enqueue((connection) => broker.handleMessage(connection, raw));
  });
  // Keepalive traffic proves the peer is alive even when it has nothing to say.
  for (const event of ['ping', 'pong'] as const) {
    socket.on(event, () => {
      enqueue((connection) => {
        broker.touch(connection);
      });
    });
  }
  socket.on('close', () => {
    enqueue((connection) => {
      broker.disconnect(connection);
    });
  });
  socket.on('error', (err) => {
    log.warn({ err }, 'WebSocket error');
  });
}

function isOpen(socket: WebSocket): boolean {
  return socket.readyState === socket.OPEN;
}

// ---------- Routes ----------
export async function registerEndpointRoutes(app: FastifyInstance, options: EndpointRouteOptions) {
  const { broker, tokens, prefix } = options;

  // Provider (tool server) side
  app.get(`${prefix}/mcp/`, { websocket: true }, (socket, req) => {
    bindSocket(socket, broker, req.log, async (channel) => {
      const query = providerQuerySchema.safeParse(req.query);
      if (!query.success) {
        req.log.warn({ error: query.error.flatten() }, 'Rejected MCP server handshake');
        channel.close(POLICY_VIOLATION, 'token and server_id are required');
        return null;
      }

      const agentId = await tokens.resolve(query.data.token);
      if (!agentId) {
        req.log.warn({ serverId: query.data.server_id }, 'Rejected MCP server with invalid token');
        channel.close(POLICY_VIOLATION, 'Invalid token');
        return null;
      }
      if (!isOpen(socket)) return null;

      try {
        return broker.connectProvider(agentId, query.data.server_id, channel);
      } catch (err) {
        if (err instanceof DuplicateServerIdError) {
          req.log.warn({ agentId, serverId: err.serverId }, 'Rejected duplicate MCP server');
          channel.close(POLICY_VIOLATION, 'Duplicate server_id');
          return null;
        }
        throw err;
      }
    });
  });

  // Client side
  app.get(`${prefix}/call/`, { websocket: true }, (socket, req) => {
    bindSocket(socket, broker, req.log, async (channel) => {
      const query = clientQuerySchema.safeParse(req.query);
      if (!query.success) {
        req.log.warn({ error: query.error.flatten() }, 'Rejected client handshake');
        channel.close(POLICY_VIOLATION, 'token is required');
        return null;
      }

      const agentId = await tokens.resolve(query.data.token);
      if (!agentId) {
        req.log.warn('Rejected client with invalid token');
        channel.close(POLICY_VIOLATION, 'Invalid token');
        return null;
      }
      if (!isOpen(socket)) return null;
      return broker.connectClient(agentId, channel);
    });
  });
}
