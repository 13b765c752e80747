import type { JsonRpcFailure, JsonRpcId, JsonRpcSuccess } from '../types';

/**
 * Error codes the broker answers with. Standard JSON-RPC codes keep their
 * meaning; the -3200x range covers relay failures.
 */
export const BROKER_ERRORS = {
  PARSE_ERROR: { code: -32700, message: 'Parse error' },
  INVALID_REQUEST: { code: -32600, message: 'Invalid Request' },
  NOT_FOUND: { code: -32601, message: 'Method not found' },
  INVALID_PARAMS: { code: -32602, message: 'Invalid params' },
  INTERNAL: { code: -32603, message: 'Internal error' },
  SERVER_UNAVAILABLE: { code: -32001, message: 'MCP server not connected' },
  FORWARD_FAILED: { code: -32002, message: 'Forwarding to MCP server failed' },
  TIMEOUT: { code: -32003, message: 'MCP server did not respond in time' },
} as const;

export type BrokerErrorCategory = keyof typeof BROKER_ERRORS;

export function errorResponse(
  category: BrokerErrorCategory,
  id: JsonRpcId,
  message?: string,
  data?: unknown,
): JsonRpcFailure {
  const { code, message: fallback } = BROKER_ERRORS[category];
  const error: JsonRpcFailure['error'] = { code, message: message ?? fallback };
  if (typeof data !== 'undefined') error.data = data;
  return { jsonrpc: '2.0', id, error };
}

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccess {
  return { jsonrpc: '2.0', id, result };
}
