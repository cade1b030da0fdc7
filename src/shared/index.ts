/**
 * Shared wire types, envelopes and errors.
 */

export type { Envelope } from './envelope';
export { parseEnvelope, printError, printResult } from './envelope';
export type { SandboxErrorCode } from './errors';
export {
  BusyError,
  CellNotFoundError,
  INTERNAL_ERROR_CODE,
  InternalError,
  isSandboxError,
  MalformedRequestError,
  NodeUnavailableError,
  NotInitializedError,
  RpcError,
  rpcErrorCode,
  SandboxError,
  toErrorMessage,
  TransportError,
} from './errors';
export type {
  DecodedRequest,
  RpcId,
  RPCCall,
  RPCErrorObject,
  RPCFailure,
  RPCResponse,
  RPCSuccess,
} from './rpc';
export { decodeRequest, errorResponse, isRpcId, successResponse } from './rpc';
