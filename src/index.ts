/**
 * rpc-jail
 *
 * Sandboxed script cells that reach a blockchain node through a shared,
 * restart-tolerant JSON-RPC client.
 */

export * from './host';
export * from './node';
export * from './sandbox';
export * from './shared';
