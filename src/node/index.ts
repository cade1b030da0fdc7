/**
 * Node-management collaborator: restart-tolerant client access and request hooks.
 */

export type { HttpRpcClientOptions } from './HttpRpcClient';
export { HttpRpcClient } from './HttpRpcClient';
export type { NodeManagerOptions } from './NodeManager';
export { NodeManager } from './NodeManager';
export { RestartableClient } from './RestartableClient';
export type { TrackedRequest, TransactionContextQueueOptions } from './TransactionContextQueue';
export { MESSAGE_ID_GLOBAL, TransactionContextQueue } from './TransactionContextQueue';
export type { Logger, NodeAccessor, RequestQueue, RpcClient } from './types';
