/**
 * Error classes shared by the registry, the bridge and the node collaborators.
 *
 * Every class carries a stable `code` so hosts can branch without parsing messages.
 */

export type SandboxErrorCode =
  | 'NOT_INITIALIZED'
  | 'CELL_NOT_FOUND'
  | 'NODE_UNAVAILABLE'
  | 'BUSY'
  | 'MALFORMED_REQUEST'
  | 'BACKEND_ERROR'
  | 'INTERNAL_ERROR'
  | 'TRANSPORT_ERROR';

/** JSON-RPC code used for every failure that is not a backend-reported error. */
export const INTERNAL_ERROR_CODE = -32603;

/**
 * Base sandbox error.
 */
export class SandboxError extends Error {
  readonly code: SandboxErrorCode;

  constructor(message: string, code: SandboxErrorCode) {
    super(message);
    this.name = 'SandboxError';
    this.code = code;
  }
}

export class NotInitializedError extends SandboxError {
  constructor(message = 'jail environment is not properly initialized') {
    super(message, 'NOT_INITIALIZED');
    this.name = 'NotInitializedError';
  }
}

export class CellNotFoundError extends SandboxError {
  readonly cellId: string;

  constructor(cellId: string) {
    super(`Cell[${cellId}] doesn't exist.`, 'CELL_NOT_FOUND');
    this.name = 'CellNotFoundError';
    this.cellId = cellId;
  }
}

export class NodeUnavailableError extends SandboxError {
  constructor(message = 'no running node detected') {
    super(message, 'NODE_UNAVAILABLE');
    this.name = 'NodeUnavailableError';
  }
}

/**
 * The cell's gate could not be acquired within its bound.
 */
export class BusyError extends SandboxError {
  readonly timeoutMs: number;

  constructor(cellId: string, timeoutMs: number) {
    super(`Cell[${cellId}] is busy: gate not acquired within ${timeoutMs}ms`, 'BUSY');
    this.name = 'BusyError';
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedRequestError extends SandboxError {
  constructor(message: string) {
    super(message, 'MALFORMED_REQUEST');
    this.name = 'MalformedRequestError';
  }
}

/**
 * Structured error reported by the backend node. Passed to scripts verbatim.
 */
export class RpcError extends SandboxError {
  readonly rpcCode: number;
  readonly data?: unknown;

  constructor(rpcCode: number, message: string, data?: unknown) {
    super(message, 'BACKEND_ERROR');
    this.name = 'RpcError';
    this.rpcCode = rpcCode;
    this.data = data;
  }
}

export class InternalError extends SandboxError {
  constructor(message: string) {
    super(message, 'INTERNAL_ERROR');
    this.name = 'InternalError';
  }
}

/**
 * The backend could not be reached, or answered with something that is not JSON-RPC.
 */
export class TransportError extends SandboxError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
    this.status = status;
  }
}

export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}

/**
 * Extracts a JSON-RPC error code from a backend failure.
 * Besides RpcError, any error object exposing a numeric `code` counts
 * (errors thrown by third-party clients keep their codes that way).
 */
export function rpcErrorCode(error: unknown): number | undefined {
  if (error instanceof RpcError) {
    return error.rpcCode;
  }
  if (error instanceof SandboxError) {
    return undefined;
  }
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'number' && Number.isInteger(code)) {
      return code;
    }
  }
  return undefined;
}

/**
 * Message of an unknown throwable.
 *
 * Errors thrown inside a cell come from another realm, so `instanceof Error`
 * does not hold for them; anything with a string `message` is treated alike.
 * Sandbox errors keep their bare message, other errors are prefixed by their name.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof SandboxError) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      const name = 'name' in error && typeof error.name === 'string' ? error.name : '';
      return name ? `${name}: ${message}` : message;
    }
  }
  return String(error);
}
