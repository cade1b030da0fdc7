import { afterEach, describe, expect, it } from 'vitest';
import type { SandboxRegistry } from '../../Registry';
import { createRegistry, createRunningNode, deferred, sleep, StubClient } from '../helpers/test-utils';

const CATALOG = `var _status_catalog = {
  ping: function () { return "pong"; },
  slow: function () { return jeth.send({ id: 1, method: "slow" }); },
  chained: function () {
    return jeth.send({ id: 1, method: "eth_blockNumber" }).then(function (first) {
      return jeth.send({ id: 2, method: "eth_blockNumber" }).then(function (second) {
        return [first.result, second.result];
      });
    });
  }
};`;

describe('cell concurrency', () => {
  let registry: SandboxRegistry;

  afterEach(() => {
    registry?.dispose();
  });

  async function setup(acquireTimeoutMs: number) {
    const hold = deferred<string>();
    const client = new StubClient({
      slow: () => hold.promise,
      eth_blockNumber: () => '0x10',
    });
    registry = createRegistry({ nodeManager: createRunningNode(client), acquireTimeoutMs });
    await registry.bootstrapCell('a', CATALOG);
    await registry.bootstrapCell('b', CATALOG);
    return hold;
  }

  it('rejects a call as busy once the bound elapses', async () => {
    const hold = await setup(50);

    const slow = registry.dispatchCall('a', 'slow', '[]');
    await expect(registry.dispatchCall('a', 'ping', '[]')).resolves.toBe(
      '{"error":"Cell[a] is busy: gate not acquired within 50ms"}'
    );

    hold.resolve('0x1');
    await expect(slow).resolves.toBe('{"result":{"jsonrpc":"2.0","id":1,"result":"0x1"}}');
  });

  it('serializes calls on the same cell', async () => {
    const hold = await setup(1000);
    const order: string[] = [];

    const slow = registry.dispatchCall('a', 'slow', '[]').then((envelope) => {
      order.push('slow');
      return envelope;
    });
    const ping = registry.dispatchCall('a', 'ping', '[]').then((envelope) => {
      order.push('ping');
      return envelope;
    });

    await sleep(10);
    expect(order).toEqual([]);

    hold.resolve('0x1');
    await expect(slow).resolves.toBe('{"result":{"jsonrpc":"2.0","id":1,"result":"0x1"}}');
    await expect(ping).resolves.toBe('{"result":"pong"}');
  });

  it('does not block other cells', async () => {
    const hold = await setup(50);

    const slow = registry.dispatchCall('a', 'slow', '[]');
    await expect(registry.dispatchCall('b', 'ping', '[]')).resolves.toBe('{"result":"pong"}');

    hold.resolve('0x1');
    await slow;
  });

  it('lets bridge calls started from callbacks join the running call', async () => {
    await setup(50);
    await expect(registry.dispatchCall('a', 'chained', '[]')).resolves.toBe('{"result":["0x10","0x10"]}');
  });
});
