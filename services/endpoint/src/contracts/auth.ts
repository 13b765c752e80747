import type { AgentId } from '../types';

/**
 * Turns the `token` query parameter of a handshake into the agent it belongs to.
 * Returns null when the token is not recognised.
 */
export interface TokenResolver {
  resolve(token: string): Promise<AgentId | null>;
}
