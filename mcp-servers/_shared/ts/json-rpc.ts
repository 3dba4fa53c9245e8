/**
 * JSON-RPC 2.0 Envelope Utilities
 *
 * Low-level message handling for MCP server communication.
 * Used by mcp-base.ts; typically not imported directly by tool implementations.
 */

import { z } from 'zod';

import { errorMessage } from './errors';
import { formatZodIssues, isPlainObject } from './validation';

// ─── JSON-RPC Types ─────────────────────────────────────────────────────────

/** Request identifier. Absent ids are treated as `null`. */
export type JsonRpcId = string | number | null;

export interface JsonRpcMessage {
  jsonrpc: '2.0';
}

export interface JsonRpcRequest extends JsonRpcMessage {
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccessResponse extends JsonRpcMessage {
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse extends JsonRpcMessage {
  id: JsonRpcId;
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Create a success response */
export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

/** Create an error response */
export function errorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcErrorResponse {
  const error: JsonRpcErrorResponse['error'] = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: '2.0', id, error };
}

// ─── Envelope Parsing ───────────────────────────────────────────────────────

const idSchema = z.union([z.string(), z.number(), z.null()]);

const envelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema.optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

export type EnvelopeParseResult =
  | { ok: true; request: JsonRpcRequest }
  | { ok: false; id: JsonRpcId; message: string };

/** Best-effort id recovery from a value that failed envelope validation. */
function recoverId(value: unknown): JsonRpcId {
  if (!isPlainObject(value)) return null;
  const parsed = idSchema.safeParse(value.id);
  return parsed.success ? parsed.data : null;
}

/**
 * Parse one frame into a request envelope. Never throws: JSON syntax errors
 * and malformed envelopes come back as `{ ok: false }` with the id recovered
 * where possible.
 */
export function parseEnvelope(raw: string): EnvelopeParseResult {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return { ok: false, id: null, message: `Parse error: ${errorMessage(err)}` };
  }

  if (!isPlainObject(value)) {
    return { ok: false, id: null, message: 'Parse error: request must be a JSON object' };
  }

  const result = envelopeSchema.safeParse(value);
  if (!result.success) {
    return {
      ok: false,
      id: recoverId(value),
      message: `Parse error: invalid request envelope: ${formatZodIssues(result.error)}`,
    };
  }

  const { id, method, params } = result.data;
  return { ok: true, request: { jsonrpc: '2.0', id: id ?? null, method, params } };
}
