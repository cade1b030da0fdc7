import { afterEach, describe, expect, it, vi } from 'vitest';
import { NotInitializedError } from '../../../shared';
import { DEFAULT_BASE_SCRIPT } from '../../cell/scripts';
import { bootstrapCell, dispatchCall, getInstance, getVM, initialize, resetInstance } from '../../instance';
import { silentLogger, testModules } from '../helpers/test-utils';

describe('shared registry instance', () => {
  afterEach(() => {
    resetInstance();
  });

  it('answers with the not-initialized envelope without a registry', async () => {
    await expect(bootstrapCell(null, 'c1', '')).resolves.toBe(
      '{"error":"jail environment is not properly initialized"}'
    );
    await expect(dispatchCall(undefined, 'c1', 'ping', '[]')).resolves.toBe(
      '{"error":"jail environment is not properly initialized"}'
    );
    expect(() => getVM(null, 'c1')).toThrow(NotInitializedError);
  });

  it('keeps one instance and replaces its base script', () => {
    const first = initialize('var a = 1;', { logger: silentLogger });
    const second = initialize('var b = 2;');

    expect(second).toBe(first);
    expect(getInstance()).toBe(first);
    expect(first.getBaseScript()).toBe('var b = 2;');
  });

  it('warns when options arrive after creation', () => {
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    getInstance({ logger: silentLogger });
    getInstance({ logger });

    expect(logger.warn).toHaveBeenCalledWith(
      '[jail] Registry already created, options passed to getInstance() are ignored'
    );
  });

  it('creates a fresh instance after reset', () => {
    const first = getInstance({ logger: silentLogger });
    resetInstance();
    expect(getInstance({ logger: silentLogger })).not.toBe(first);
  });

  it('forwards to the given registry', async () => {
    const registry = initialize(DEFAULT_BASE_SCRIPT, { modules: testModules, logger: silentLogger });
    await expect(
      bootstrapCell(registry, 'c1', 'var _status_catalog = { ping: function () { return "pong"; } };')
    ).resolves.toBe('{"result":{}}');
    expect(getVM(registry, 'c1').eval('_status_catalog.ping()')).toBe('pong');
    await expect(dispatchCall(registry, 'c1', 'ping', '[]')).resolves.toBe('{"error":"no running node detected"}');
  });
});
