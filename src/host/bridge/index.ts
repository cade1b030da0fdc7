/**
 * Script-to-node RPC bridge
 */

export { BatchScope, type Deferred } from './BatchScope';
export { RpcBridge, type RpcBridgeOptions } from './RpcBridge';
