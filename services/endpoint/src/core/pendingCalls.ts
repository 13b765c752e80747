import type { ConnectionId } from '../types';
import type { ClientConnection, ProviderConnection } from './registry';

export interface PendingCall {
  forwardedId: string;
  originalId: string | number;
  client: ClientConnection;
  provider: ProviderConnection;
  createdAt: number;
  deadline: number;
}

interface Entry extends PendingCall {
  timer: ReturnType<typeof setTimeout>;
}

export interface PendingCallTableOptions {
  timeoutMs: number;
  onExpire: (call: PendingCall) => void;
  now?: () => number;
}

/**
 * Correlation records for requests forwarded to exactly one provider. Each
 * record owns its deadline timer; whoever removes a record first (reply,
 * timeout, disconnect) is the only one that gets it back.
 */
export class PendingCallTable {
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;

  constructor(private readonly options: PendingCallTableOptions) {
    this.now = options.now ?? Date.now;
  }

  open(forwardedId: string, originalId: string | number, client: ClientConnection, provider: ProviderConnection): PendingCall {
    const createdAt = this.now();
    const timer = setTimeout(() => {
      const expired = this.settle(forwardedId);
      if (expired) this.options.onExpire(expired);
    }, this.options.timeoutMs);

    const entry: Entry = {
      forwardedId,
      originalId,
      client,
      provider,
      createdAt,
      deadline: createdAt + this.options.timeoutMs,
      timer,
    };
    this.entries.set(forwardedId, entry);
    return toCall(entry);
  }

  peek(forwardedId: string): PendingCall | undefined {
    const entry = this.entries.get(forwardedId);
    return entry ? toCall(entry) : undefined;
  }

  /** Removes the record and cancels its deadline. */
  settle(forwardedId: string): PendingCall | undefined {
    const entry = this.entries.get(forwardedId);
    if (!entry) return undefined;
    this.entries.delete(forwardedId);
    clearTimeout(entry.timer);
    return toCall(entry);
  }

  settleByProvider(providerId: ConnectionId): PendingCall[] {
    return this.settleWhere((entry) => entry.provider.id === providerId);
  }

  settleByClient(clientId: ConnectionId): PendingCall[] {
    return this.settleWhere((entry) => entry.client.id === clientId);
  }

  clear(): void {
    this.settleWhere(() => true);
  }

  get size(): number {
    return this.entries.size;
  }

  private settleWhere(match: (entry: Entry) => boolean): PendingCall[] {
    const settled: PendingCall[] = [];
    for (const entry of [...this.entries.values()]) {
      if (!match(entry)) continue;
      const call = this.settle(entry.forwardedId);
      if (call) settled.push(call);
    }
    return settled;
  }
}

function toCall(entry: Entry): PendingCall {
  const { timer: _timer, ...call } = entry;
  return call;
}
