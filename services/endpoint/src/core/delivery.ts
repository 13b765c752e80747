import type { FastifyBaseLogger } from 'fastify';
import type { JsonRpcMessage } from '../types';
import type { Connection } from './registry';

/** Writes one JSON-RPC frame to a connection. Write failures are logged and reported as false. */
export async function deliver(
  connection: Connection,
  message: JsonRpcMessage,
  logger: FastifyBaseLogger,
): Promise<boolean> {
  try {
    await connection.channel.send(JSON.stringify(message));
    return true;
  } catch (err) {
    logger.warn(
      { err, agentId: connection.agentId, connectionId: connection.id, role: connection.kind },
      'Failed to deliver message',
    );
    return false;
  }
}
