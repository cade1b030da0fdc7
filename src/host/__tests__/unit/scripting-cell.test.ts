import { describe, expect, it } from 'vitest';
import { VMProvider } from '../../../sandbox';
import { ExecutionScope, ScriptingCell } from '../../cell/ScriptingCell';
import { deferred } from '../helpers/test-utils';

function createCell(acquireTimeoutMs = 1000): ScriptingCell {
  const vm = new VMProvider().createRuntime().createContext('cell');
  return new ScriptingCell({ id: 'cell', vm, acquireTimeoutMs });
}

describe('ExecutionScope', () => {
  it('drains work started while draining', async () => {
    const scope = new ExecutionScope();
    const order: string[] = [];
    const late = deferred<void>();

    scope.track(
      Promise.resolve().then(() => {
        order.push('first');
        scope.track(
          late.promise.then(() => {
            order.push('second');
          })
        );
      })
    );

    const drained = scope.drain().then(() => order.push('drained'));
    await Promise.resolve();
    late.resolve();
    await drained;

    expect(order).toEqual(['first', 'second', 'drained']);
    expect(scope.size).toBe(0);
  });

  it('does not fail on rejected work', async () => {
    const scope = new ExecutionScope();
    const failing = scope.track(Promise.reject(new Error('nope')));
    await expect(failing).rejects.toThrow('nope');
    await expect(scope.drain()).resolves.toBeUndefined();
  });
});

describe('ScriptingCell', () => {
  it('keeps the gate until scheduled work settles', async () => {
    const cell = createCell();
    const pending = deferred<string>();
    const order: string[] = [];

    const entry = cell.enter(() => {
      void cell.schedule(async () => {
        order.push(`scheduled:${await pending.promise}`);
      });
      return 'entered';
    });

    await Promise.resolve();
    expect(cell.gate.isHeld).toBe(true);

    pending.resolve('done');
    await expect(entry).resolves.toBe('entered');
    expect(order).toEqual(['scheduled:done']);
    expect(cell.gate.isHeld).toBe(false);
    expect(cell.activeScope).toBeNull();
  });

  it('acquires the gate itself when nothing holds it', async () => {
    const cell = createCell();
    let heldInside = false;

    await cell.schedule(async () => {
      heldInside = cell.gate.isHeld;
    });

    expect(heldInside).toBe(true);
    expect(cell.gate.isHeld).toBe(false);
  });

  it('rejects entry with BusyError while another entry point holds the gate', async () => {
    const cell = createCell(20);
    const hold = deferred<void>();

    const first = cell.enter(() => hold.promise);
    await expect(cell.enter(() => 'second')).rejects.toThrow('Cell[cell] is busy: gate not acquired within 20ms');

    hold.resolve();
    await first;
  });

  it('disposes its context once', () => {
    const cell = createCell();
    cell.vm.setGlobal('value', 1);

    cell.dispose();
    cell.dispose();

    expect(cell.isDisposed).toBe(true);
    expect(cell.vm.getGlobal('value')).toBeUndefined();
  });
});
