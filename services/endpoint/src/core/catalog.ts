import type { AgentId, ServerId, ToolDescriptor } from '../types';
import type { RegistryEvent } from './registry';

export interface ToolCatalogEntry {
  name: string;
  serverId: ServerId;
  description?: string;
  inputSchema?: Record<string, unknown>;
  tool: ToolDescriptor;
}

interface OwnedTools {
  tools: ToolDescriptor[];
  // 0 until the provider's first tool-list write.
  writeSeq: number;
}

/**
 * Unified tool namespace per agent. When two providers offer the same name the
 * most recent tool-list write wins; removing the winner hands the name back to
 * the next most recent provider still offering it.
 */
export class ToolCatalog {
  // Inner map insertion order is provider registration order.
  private readonly agents = new Map<AgentId, Map<ServerId, OwnedTools>>();
  private writeCounter = 0;

  handleRegistryEvent(event: RegistryEvent): void {
    switch (event.type) {
      case 'provider-added':
        this.ensureOwners(event.connection.agentId).set(event.connection.serverId, { tools: [], writeSeq: 0 });
        break;
      case 'provider-removed':
        this.removeOwner(event.connection.agentId, event.connection.serverId);
        break;
      default:
        break;
    }
  }

  /** Replaces every tool previously owned by `serverId` with `tools`. */
  updateTools(agentId: AgentId, serverId: ServerId, tools: ToolDescriptor[]): void {
    const owners = this.ensureOwners(agentId);
    const seen = new Set<string>();
    const unique = tools.filter((tool) => {
      if (seen.has(tool.name)) return false;
      seen.add(tool.name);
      return true;
    });
    this.writeCounter += 1;
    owners.set(serverId, { tools: unique, writeSeq: this.writeCounter });
  }

  removeOwner(agentId: AgentId, serverId: ServerId): void {
    const owners = this.agents.get(agentId);
    if (!owners) return;
    owners.delete(serverId);
    if (owners.size === 0) this.agents.delete(agentId);
  }

  resolve(agentId: AgentId, toolName: string): ServerId | undefined {
    return this.ownershipIndex(agentId).get(toolName);
  }

  listAll(agentId: AgentId): ToolCatalogEntry[] {
    const owners = this.agents.get(agentId);
    if (!owners) return [];

    const index = this.ownershipIndex(agentId);
    const entries: ToolCatalogEntry[] = [];
    for (const [serverId, owned] of owners) {
      for (const tool of owned.tools) {
        if (index.get(tool.name) !== serverId) continue;
        entries.push({
          name: tool.name,
          serverId,
          description: tool.description,
          inputSchema: tool.inputSchema,
          tool,
        });
      }
    }
    return entries;
  }

  /** Tools currently resolved to `serverId` (shadowed names excluded). */
  toolsOwnedBy(agentId: AgentId, serverId: ServerId): ToolCatalogEntry[] {
    return this.listAll(agentId).filter((entry) => entry.serverId === serverId);
  }

  totalToolCount(): number {
    let total = 0;
    for (const agentId of this.agents.keys()) total += this.ownershipIndex(agentId).size;
    return total;
  }

  private ensureOwners(agentId: AgentId): Map<ServerId, OwnedTools> {
    let owners = this.agents.get(agentId);
    if (!owners) {
      owners = new Map();
      this.agents.set(agentId, owners);
    }
    return owners;
  }

  private ownershipIndex(agentId: AgentId): Map<string, ServerId> {
    const index = new Map<string, { serverId: ServerId; writeSeq: number }>();
    const owners = this.agents.get(agentId);
    if (!owners) return new Map();
    for (const [serverId, owned] of owners) {
      for (const tool of owned.tools) {
        const current = index.get(tool.name);
        if (!current || owned.writeSeq > current.writeSeq) {
          index.set(tool.name, { serverId, writeSeq: owned.writeSeq });
        }
      }
    }
    const resolved = new Map<string, ServerId>();
    for (const [name, owner] of index) resolved.set(name, owner.serverId);
    return resolved;
  }
}
