import { describe, it, expect } from 'vitest';
import { errorResponse, parseEnvelope, successResponse } from '../ts/json-rpc';

describe('parseEnvelope', () => {
  it('should parse a request and keep the id type', () => {
    expect(parseEnvelope('{"jsonrpc":"2.0","id":7,"method":"initialize","params":{}}')).toEqual({
      ok: true,
      request: { jsonrpc: '2.0', id: 7, method: 'initialize', params: {} },
    });
    expect(parseEnvelope('{"jsonrpc":"2.0","id":"7","method":"x"}')).toEqual({
      ok: true,
      request: { jsonrpc: '2.0', id: '7', method: 'x', params: undefined },
    });
  });

  it('should treat a missing id as null', () => {
    const result = parseEnvelope('{"jsonrpc":"2.0","method":"x"}');
    expect(result.ok && result.request.id).toBeNull();
  });

  it('should report invalid JSON with a null id', () => {
    const result = parseEnvelope('{not json');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.id).toBeNull();
      expect(result.message.startsWith('Parse error: ')).toBe(true);
    }
  });

  it('should reject non-object messages', () => {
    expect(parseEnvelope('[1,2]')).toEqual({ ok: false, id: null, message: 'Parse error: request must be a JSON object' });
  });

  it('should recover the id of a malformed envelope', () => {
    const result = parseEnvelope('{"jsonrpc":"1.0","id":"abc","method":"x"}');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.id).toBe('abc');
      expect(result.message.startsWith('Parse error: invalid request envelope: jsonrpc: ')).toBe(true);
    }
  });

  it('should not recover an id of the wrong type', () => {
    const result = parseEnvelope('{"jsonrpc":"2.0","id":{"nested":true},"method":"x"}');
    expect(result.ok ? 'ok' : result.id).toBeNull();
  });
});

describe('response builders', () => {
  it('should build success and error responses', () => {
    expect(successResponse(1, { a: 1 })).toEqual({ jsonrpc: '2.0', id: 1, result: { a: 1 } });
    const error = errorResponse('x', -32601, 'Method not found: y');
    expect(error).toEqual({ jsonrpc: '2.0', id: 'x', error: { code: -32601, message: 'Method not found: y' } });
    expect(JSON.stringify(error)).toBe('{"jsonrpc":"2.0","id":"x","error":{"code":-32601,"message":"Method not found: y"}}');
  });
});
