import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Broker } from '../src/core/broker';
import { answer, attachClient, attachProvider, createBroker, send } from './helpers/broker';

let broker: Broker;

afterEach(async () => {
  await broker.shutdown();
  vi.useRealTimers();
});

async function twoProviders() {
  const files = await attachProvider(broker, 'agent-1', 'files', [{ name: 'read_file' }]);
  const weather = await attachProvider(broker, 'agent-1', 'weather', [{ name: 'forecast' }]);
  const client = attachClient(broker, 'agent-1');
  return { files, weather, client };
}

const broadcast = (id: number, method: string, params?: unknown) => ({
  jsonrpc: '2.0',
  id,
  method: 'broadcast',
  params: { method, ...(params ? { params } : {}) },
});

describe('broadcast', () => {
  it('collects one reply per provider in arrival order', async () => {
    broker = createBroker();
    const { files, weather, client } = await twoProviders();

    await send(broker, client.client, broadcast(1, 'resources/list'));
    expect(files.channel.last()).toEqual({ jsonrpc: '2.0', id: 'bcast-5', method: 'resources/list' });
    expect(weather.channel.last()).toEqual({ jsonrpc: '2.0', id: 'bcast-5', method: 'resources/list' });

    await answer(broker, weather.provider, weather.channel, 'resources/list', { resources: [] });
    expect(client.channel.sent).toEqual([]);

    await send(broker, files.provider, {
      jsonrpc: '2.0',
      id: 'bcast-5',
      error: { code: -32601, message: 'Method not found' },
    });
    await broker.drain();

    expect(client.channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        responses: [
          { server_id: 'weather', result: { resources: [] } },
          { server_id: 'files', error: { code: -32601, message: 'Method not found' } },
        ],
        total_servers: 2,
        responded_servers: 2,
      },
    });
    expect(broker.aggregation.size).toBe(0);
  });

  it('ignores duplicate, unexpected and late replies', async () => {
    broker = createBroker();
    const { files, weather, client } = await twoProviders();

    await send(broker, client.client, broadcast(11, 'resources/list'));
    // joined after the fan-out, so it is not expected (probe-6, probe-7)
    const late = await attachProvider(broker, 'agent-1', 'late', []);
    await send(broker, late.provider, { jsonrpc: '2.0', id: 'bcast-5', result: { resources: ['late'] } });

    await answer(broker, weather.provider, weather.channel, 'resources/list', { resources: ['first'] });
    await answer(broker, weather.provider, weather.channel, 'resources/list', { resources: ['second'] });
    await answer(broker, files.provider, files.channel, 'resources/list', { resources: ['f'] });
    await broker.drain();

    const expected = {
      jsonrpc: '2.0',
      id: 11,
      result: {
        responses: [
          { server_id: 'weather', result: { resources: ['first'] } },
          { server_id: 'files', result: { resources: ['f'] } },
        ],
        total_servers: 2,
        responded_servers: 2,
      },
    };
    expect(client.channel.frames()).toEqual([expected]);

    // a reply after finalization changes nothing
    await answer(broker, files.provider, files.channel, 'resources/list', { resources: ['again'] });
    await broker.drain();
    expect(client.channel.frames()).toEqual([expected]);
  });

  it('passes params through to every provider', async () => {
    broker = createBroker();
    const { files, client } = await twoProviders();

    await send(broker, client.client, broadcast(2, 'resources/read', { uri: 'mem://a' }));

    expect(files.channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 'bcast-5',
      method: 'resources/read',
      params: { uri: 'mem://a' },
    });
  });

  it('answers at once when the agent has no providers', async () => {
    broker = createBroker();
    const { client, channel } = attachClient(broker, 'agent-1');

    await send(broker, client, broadcast(3, 'resources/list'));

    expect(channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 3,
      result: { responses: [], total_servers: 0, responded_servers: 0 },
    });
  });

  it('stops waiting for a provider that disconnects', async () => {
    broker = createBroker();
    const { files, weather, client } = await twoProviders();

    await send(broker, client.client, broadcast(4, 'resources/list'));
    await answer(broker, weather.provider, weather.channel, 'resources/list', { resources: ['w'] });
    broker.disconnect(files.provider);
    await broker.drain();

    expect(client.channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 4,
      result: {
        responses: [{ server_id: 'weather', result: { resources: ['w'] } }],
        total_servers: 1,
        responded_servers: 1,
      },
    });
  });

  it('returns partial results at the deadline', async () => {
    vi.useFakeTimers();
    broker = createBroker();
    const { weather, client } = await twoProviders();

    await send(broker, client.client, broadcast(5, 'resources/list'));
    await answer(broker, weather.provider, weather.channel, 'resources/list', { resources: [] });
    vi.advanceTimersByTime(500);
    await broker.drain();

    expect(client.channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 5,
      result: {
        responses: [{ server_id: 'weather', result: { resources: [] } }],
        total_servers: 2,
        responded_servers: 1,
      },
    });
  });

  it('records a failed forward as that provider reply', async () => {
    broker = createBroker();
    const { files, weather, client } = await twoProviders();
    files.channel.failSends = true;

    await send(broker, client.client, broadcast(6, 'resources/list'));
    await answer(broker, weather.provider, weather.channel, 'resources/list', { resources: [] });
    await broker.drain();

    expect(client.channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 6,
      result: {
        responses: [
          { server_id: 'files', error: { code: -32002, message: 'Forwarding to MCP server failed' } },
          { server_id: 'weather', result: { resources: [] } },
        ],
        total_servers: 2,
        responded_servers: 2,
      },
    });
  });

  it('answers with one error when no provider could be reached', async () => {
    broker = createBroker();
    const { files, weather, client } = await twoProviders();
    files.channel.failSends = true;
    weather.channel.failSends = true;

    await send(broker, client.client, broadcast(7, 'resources/list'));
    await broker.drain();

    expect(client.channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 7,
      error: { code: -32002, message: "Forwarding 'resources/list' to every MCP server failed" },
    });
  });

  it('discards the aggregation when the client leaves', async () => {
    broker = createBroker();
    const { files, client } = await twoProviders();

    await send(broker, client.client, broadcast(8, 'resources/list'));
    expect(broker.aggregation.size).toBe(1);
    broker.disconnect(client.client);
    expect(broker.aggregation.size).toBe(0);

    await answer(broker, files.provider, files.channel, 'resources/list', { resources: [] });
    expect(client.channel.sent).toEqual([]);
  });

  it('fans out configured methods sent without the broadcast wrapper', async () => {
    broker = createBroker({ fanOutMethods: ['resources/list'] });
    const { files, weather, client } = await twoProviders();

    await send(broker, client.client, { jsonrpc: '2.0', id: 9, method: 'resources/list' });
    await answer(broker, files.provider, files.channel, 'resources/list', { resources: ['f'] });
    await answer(broker, weather.provider, weather.channel, 'resources/list', { resources: ['w'] });
    await broker.drain();

    expect(client.channel.last()).toEqual({
      jsonrpc: '2.0',
      id: 9,
      result: {
        responses: [
          { server_id: 'files', result: { resources: ['f'] } },
          { server_id: 'weather', result: { resources: ['w'] } },
        ],
        total_servers: 2,
        responded_servers: 2,
      },
    });
  });

  it('rejects a broadcast without a method', async () => {
    broker = createBroker();
    const { client, channel } = attachClient(broker, 'agent-1');

    await send(broker, client, { jsonrpc: '2.0', id: 10, method: 'broadcast', params: {} });

    expect(channel.last()).toMatchObject({
      id: 10,
      error: { code: -32602, message: 'broadcast requires params.method' },
    });
  });
});
