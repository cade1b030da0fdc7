/**
 * JSON-RPC 2.0 wire types and request decoding.
 */

import { MalformedRequestError } from './errors';

/** Request identifiers are echoed back untouched; duplicates are not detected. */
export type RpcId = string | number | boolean | null;

export interface RPCCall {
  id: RpcId;
  method: string;
  params: unknown[];
}

export interface RPCErrorObject {
  code: number;
  message: string;
}

export interface RPCSuccess<T = unknown> {
  jsonrpc: '2.0';
  id: RpcId;
  result: T;
}

export interface RPCFailure {
  jsonrpc: '2.0';
  id: RpcId;
  error: RPCErrorObject;
}

export type RPCResponse<T = unknown> = RPCSuccess<T> | RPCFailure;

export interface DecodedRequest {
  /** True when the payload was a top-level JSON array */
  batch: boolean;
  calls: RPCCall[];
}

export function isRpcId(value: unknown): value is RpcId {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeCall(value: unknown, index?: number): RPCCall {
  const where = index === undefined ? 'request' : `request[${index}]`;
  if (!isRecord(value)) {
    throw new MalformedRequestError(`${where}: expected an object`);
  }

  const id = value.id ?? null;
  if (!isRpcId(id)) {
    throw new MalformedRequestError(`${where}: id must be a string, number, boolean or null`);
  }

  const { method } = value;
  if (typeof method !== 'string') {
    throw new MalformedRequestError(`${where}: method must be a string`);
  }

  const params = value.params ?? [];
  if (!Array.isArray(params)) {
    throw new MalformedRequestError(`${where}: params must be an array`);
  }

  return { id, method, params };
}

/**
 * Decodes request text into an ordered call sequence.
 *
 * A payload whose first non-whitespace character is `[` is a batch; anything
 * else is a single call, returned as a one-element sequence.
 */
export function decodeRequest(text: string): DecodedRequest {
  const trimmed = text.trimStart();
  if (trimmed.length === 0) {
    throw new MalformedRequestError('empty request');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedRequestError(`invalid request JSON: ${reason}`);
  }

  if (trimmed[0] === '[') {
    if (!Array.isArray(parsed)) {
      throw new MalformedRequestError('batch request must be an array');
    }
    return { batch: true, calls: parsed.map((item, index) => decodeCall(item, index)) };
  }

  return { batch: false, calls: [decodeCall(parsed)] };
}

export function successResponse<T>(id: RpcId, result: T): RPCSuccess<T> {
  return { jsonrpc: '2.0', id, result };
}

export function errorResponse(id: RpcId, code: number, message: string): RPCFailure {
  return { jsonrpc: '2.0', id, error: { code, message } };
}
