import type { AgentId, ServerId } from '../types';

export class DuplicateServerIdError extends Error {
  constructor(
    readonly agentId: AgentId,
    readonly serverId: ServerId,
  ) {
    super(`MCP server '${serverId}' is already connected for agent '${agentId}'`);
    this.name = 'DuplicateServerIdError';
  }
}
