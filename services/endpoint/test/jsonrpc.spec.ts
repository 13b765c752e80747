import { describe, expect, it } from 'vitest';
import { errorResponse, successResponse } from '../src/jsonrpc/errors';
import {
  explicitTarget,
  parseMessage,
  readServerInfo,
  readToolList,
  requestedProtocolVersion,
} from '../src/jsonrpc/messages';

describe('parseMessage', () => {
  it('classifies requests, notifications and responses', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":1,"method":"tools/list"}')).toEqual({
      kind: 'request',
      message: { jsonrpc: '2.0', id: 1, method: 'tools/list' },
    });
    expect(parseMessage('{"jsonrpc":"2.0","method":"notifications/initialized"}')).toEqual({
      kind: 'notification',
      message: { jsonrpc: '2.0', method: 'notifications/initialized' },
    });
    expect(parseMessage('{"jsonrpc":"2.0","id":"call-1","result":{"ok":true}}')).toEqual({
      kind: 'response',
      message: { jsonrpc: '2.0', id: 'call-1', result: { ok: true } },
    });
    expect(parseMessage('{"jsonrpc":"2.0","id":"call-1","error":{"code":-1,"message":"boom"}}')).toEqual({
      kind: 'response',
      message: { jsonrpc: '2.0', id: 'call-1', error: { code: -1, message: 'boom' } },
    });
  });

  it('keeps a null result', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":2,"result":null}')).toEqual({
      kind: 'response',
      message: { jsonrpc: '2.0', id: 2, result: null },
    });
  });

  it('reports frames that are not JSON', () => {
    const parsed = parseMessage('{oops');
    expect(parsed.kind).toBe('invalid');
    expect(parsed).toMatchObject({ reason: 'parse', id: null });
  });

  it('recovers the id of an invalid envelope', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":4,"method":""}')).toEqual({
      kind: 'invalid',
      reason: 'envelope',
      id: 4,
      detail: 'method: String must contain at least 1 character(s)',
    });
    expect(parseMessage('{"jsonrpc":"2.0","id":5}')).toEqual({
      kind: 'invalid',
      reason: 'envelope',
      id: 5,
      detail: 'message has neither method nor result/error',
    });
    expect(parseMessage('"text"')).toEqual({
      kind: 'invalid',
      reason: 'envelope',
      id: null,
      detail: 'message must be a JSON object',
    });
  });
});

describe('payload helpers', () => {
  it('reads an explicit target server', () => {
    expect(explicitTarget({ _meta: { server_id: 'files' } })).toBe('files');
    expect(explicitTarget({ _meta: {} })).toBeUndefined();
    expect(explicitTarget(undefined)).toBeUndefined();
  });

  it('reads tool lists and skips malformed descriptors', () => {
    expect(readToolList({ tools: [{ name: 'a', extra: 1 }, { description: 'no name' }, 'junk'] })).toEqual({
      tools: [{ name: 'a', extra: 1 }],
      skipped: 2,
    });
    expect(readToolList({ resources: [] })).toBeNull();
  });

  it('recognises initialize results and requested protocol versions', () => {
    expect(readServerInfo({ protocolVersion: '2024-11-05', serverInfo: { name: 'x' } })).toEqual({
      protocolVersion: '2024-11-05',
      serverInfo: { name: 'x' },
    });
    expect(readServerInfo({ tools: [] })).toBeNull();
    expect(requestedProtocolVersion({ protocolVersion: '2025-03-26' })).toBe('2025-03-26');
    expect(requestedProtocolVersion({})).toBeUndefined();
  });
});

describe('reply builders', () => {
  it('builds error replies from the taxonomy', () => {
    expect(errorResponse('TIMEOUT', 3)).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32003, message: 'MCP server did not respond in time' },
    });
    expect(errorResponse('INVALID_PARAMS', 'a', 'bad', { field: 'name' })).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      error: { code: -32602, message: 'bad', data: { field: 'name' } },
    });
    expect(successResponse(null, {})).toEqual({ jsonrpc: '2.0', id: null, result: {} });
  });
});
