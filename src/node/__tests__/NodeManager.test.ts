import { describe, expect, it } from 'vitest';
import { NodeUnavailableError } from '../../shared';
import { NodeManager } from '../NodeManager';
import { RestartableClient } from '../RestartableClient';
import { TransactionContextQueue } from '../TransactionContextQueue';
import type { RpcClient } from '../types';

const silentLogger = { log: () => {}, warn: () => {}, error: () => {} };

function namedClient(name: string): RpcClient {
  return { call: async (method) => `${name}:${method}` };
}

describe('RestartableClient', () => {
  it('forwards to the current client and counts swaps', async () => {
    const handle = new RestartableClient(namedClient('a'));
    await expect(handle.call('m', [])).resolves.toBe('a:m');

    handle.swap(namedClient('b'));
    await expect(handle.call('m', [])).resolves.toBe('b:m');
    expect(handle.restarts).toBe(1);
    expect(handle.connected).toBe(true);
  });

  it('rejects while no client is attached', async () => {
    const handle = new RestartableClient();
    expect(handle.connected).toBe(false);
    await expect(handle.call('m', [])).rejects.toBeInstanceOf(NodeUnavailableError);
  });
});

describe('NodeManager', () => {
  it('refuses access until the node is started', () => {
    const node = new NodeManager({ createClient: () => namedClient('a'), logger: silentLogger });

    expect(node.hasNode()).toBe(false);
    expect(() => node.getClient()).toThrow(NodeUnavailableError);
    expect(() => node.getRequestQueue()).toThrow('no running node detected');
    expect(() => node.stopNode()).toThrow(NodeUnavailableError);
  });

  it('hands out one client handle that survives restarts', async () => {
    let generation = 0;
    const node = new NodeManager({
      createClient: () => namedClient(`gen${++generation}`),
      logger: silentLogger,
    });
    node.startNode();

    const client = node.getClient();
    await expect(client.call('m', [])).resolves.toBe('gen1:m');

    node.restartNode();
    expect(node.getClient()).toBe(client);
    await expect(client.call('m', [])).resolves.toBe('gen2:m');

    node.stopNode();
    await expect(client.call('m', [])).rejects.toThrow('no running node detected');
  });

  it('rejects a second start', () => {
    const node = new NodeManager({ createClient: () => namedClient('a'), logger: silentLogger });
    node.startNode();
    expect(() => node.startNode()).toThrow('[jail:node] node is already running');
  });

  it('defaults to the transaction context queue', () => {
    const node = new NodeManager({ createClient: () => namedClient('a'), logger: silentLogger });
    node.startNode();
    expect(node.getRequestQueue()).toBeInstanceOf(TransactionContextQueue);
  });
});
