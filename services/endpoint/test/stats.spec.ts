import { afterEach, describe, expect, it } from 'vitest';
import type { Broker } from '../src/core/broker';
import { attachClient, attachProvider, createBroker, send } from './helpers/broker';

let broker: Broker;

afterEach(async () => {
  await broker.shutdown();
});

describe('StatsReporter', () => {
  it('reports an empty broker', () => {
    broker = createBroker();

    expect(broker.stats.snapshot()).toEqual({
      provider_connections: 0,
      client_connections: 0,
      total_connections: 0,
      agents: [],
      total_tools: 0,
      pending_calls: 0,
      pending_aggregations: 0,
      servers: {},
    });
  });

  it('describes connected servers and outstanding work', async () => {
    const clock = Date.UTC(2024, 0, 1);
    broker = createBroker({ now: () => clock });
    await attachProvider(broker, 'agent-1', 'a', [{ name: 'search' }, { name: 'fetch' }]);
    await attachProvider(broker, 'agent-1', 'b', [{ name: 'search' }]);
    const { client } = attachClient(broker, 'agent-1');
    // client-only agents are not listed
    attachClient(broker, 'agent-2');

    await send(broker, client, { jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'search' } });
    await send(broker, client, { jsonrpc: '2.0', id: 2, method: 'broadcast', params: { method: 'resources/list' } });

    const at = '2024-01-01T00:00:00.000Z';
    const serverInfo = (name: string) => ({
      protocolVersion: '2024-11-05',
      capabilities: { tools: {} },
      serverInfo: { name, version: '1.0.0' },
    });
    expect(broker.stats.snapshot()).toEqual({
      provider_connections: 2,
      client_connections: 2,
      total_connections: 4,
      agents: ['agent-1'],
      total_tools: 2,
      pending_calls: 1,
      pending_aggregations: 1,
      servers: {
        'agent-1': {
          a: { tool_count: 1, tool_names: ['fetch'], connected_at: at, last_activity: at, server_info: serverInfo('a') },
          b: { tool_count: 1, tool_names: ['search'], connected_at: at, last_activity: at, server_info: serverInfo('b') },
        },
      },
    });
  });
});
