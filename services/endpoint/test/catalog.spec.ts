import { describe, expect, it } from 'vitest';
import { ToolCatalog } from '../src/core/catalog';

const tool = (name: string, extra: Record<string, unknown> = {}) => ({ name, ...extra });

describe('ToolCatalog', () => {
  it('lists tools of every provider and resolves them to their owner', () => {
    const catalog = new ToolCatalog();
    catalog.updateTools('agent-1', 'weather', [tool('forecast', { description: 'Daily forecast' })]);
    catalog.updateTools('agent-1', 'files', [tool('read_file'), tool('write_file')]);

    expect(catalog.resolve('agent-1', 'forecast')).toBe('weather');
    expect(catalog.resolve('agent-1', 'read_file')).toBe('files');
    expect(catalog.listAll('agent-1').map((entry) => [entry.name, entry.serverId])).toEqual([
      ['forecast', 'weather'],
      ['read_file', 'files'],
      ['write_file', 'files'],
    ]);
    expect(catalog.totalToolCount()).toBe(3);
  });

  it('keeps agents apart', () => {
    const catalog = new ToolCatalog();
    catalog.updateTools('agent-1', 'weather', [tool('forecast')]);

    expect(catalog.resolve('agent-2', 'forecast')).toBeUndefined();
    expect(catalog.listAll('agent-2')).toEqual([]);
  });

  it('replaces a provider tool list wholesale', () => {
    const catalog = new ToolCatalog();
    catalog.updateTools('agent-1', 'files', [tool('read_file'), tool('write_file')]);
    catalog.updateTools('agent-1', 'files', [tool('list_dir')]);

    expect(catalog.listAll('agent-1').map((entry) => entry.name)).toEqual(['list_dir']);
    expect(catalog.resolve('agent-1', 'read_file')).toBeUndefined();
  });

  it('gives a shared name to the most recent writer and falls back when it leaves', () => {
    const catalog = new ToolCatalog();
    catalog.updateTools('agent-1', 'a', [tool('search')]);
    catalog.updateTools('agent-1', 'b', [tool('search')]);

    expect(catalog.resolve('agent-1', 'search')).toBe('b');
    expect(catalog.listAll('agent-1')).toHaveLength(1);

    // a rewrite by the older provider takes the name back
    catalog.updateTools('agent-1', 'a', [tool('search')]);
    expect(catalog.resolve('agent-1', 'search')).toBe('a');

    catalog.removeOwner('agent-1', 'a');
    expect(catalog.resolve('agent-1', 'search')).toBe('b');
  });

  it('ignores duplicate names inside one list and preserves extra descriptor fields', () => {
    const catalog = new ToolCatalog();
    catalog.updateTools('agent-1', 'files', [
      tool('read_file', { annotations: { readOnlyHint: true } }),
      tool('read_file', { description: 'second copy' }),
    ]);

    const [entry] = catalog.listAll('agent-1');
    expect(catalog.listAll('agent-1')).toHaveLength(1);
    expect(entry.tool).toEqual({ name: 'read_file', annotations: { readOnlyHint: true } });
    expect(entry.description).toBeUndefined();
  });

  it('follows registry events', () => {
    const catalog = new ToolCatalog();
    catalog.updateTools('agent-1', 'files', [tool('read_file')]);

    const connection = {
      kind: 'provider' as const,
      id: 'conn-1',
      agentId: 'agent-1',
      serverId: 'files',
      channel: { send: async () => undefined, close: () => undefined },
      connectedAt: 0,
      lastActivity: 0,
    };
    catalog.handleRegistryEvent({ type: 'provider-removed', connection, reason: 'disconnected' });

    expect(catalog.resolve('agent-1', 'read_file')).toBeUndefined();
    expect(catalog.totalToolCount()).toBe(0);
  });

  it('reports the tools a provider currently owns', () => {
    const catalog = new ToolCatalog();
    catalog.updateTools('agent-1', 'a', [tool('search'), tool('fetch')]);
    catalog.updateTools('agent-1', 'b', [tool('search')]);

    expect(catalog.toolsOwnedBy('agent-1', 'a').map((entry) => entry.name)).toEqual(['fetch']);
    expect(catalog.toolsOwnedBy('agent-1', 'b').map((entry) => entry.name)).toEqual(['search']);
  });
});
