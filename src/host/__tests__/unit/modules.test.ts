import { describe, expect, it } from 'vitest';
import { VMProvider } from '../../../sandbox';
import { createModuleLoader, moduleCode } from '../../cell/modules';

const COUNTER_SOURCE = `
var count = 0;
exports.next = function () { return ++count; };
`;

function createContext() {
  return new VMProvider().createRuntime().createContext('modules');
}

describe('createModuleLoader', () => {
  it('evaluates a module inside the cell once and caches its exports', () => {
    const vm = createContext();
    const load = createModuleLoader(vm, { counter: COUNTER_SOURCE });
    vm.setGlobal('counter', load('counter'));

    expect(load('counter')).toBe(vm.getGlobal('counter'));
    expect(vm.eval('counter.next() + counter.next()')).toBe(3);
    expect(vm.eval('counter.next.constructor === Function')).toBe(true);
  });

  it('keeps module state per cell', () => {
    const modules = { counter: () => COUNTER_SOURCE };
    const first = createContext();
    const second = createContext();
    first.setGlobal('counter', createModuleLoader(first, modules)('counter'));
    second.setGlobal('counter', createModuleLoader(second, modules)('counter'));

    first.eval('counter.next(); counter.next();');
    expect(second.eval('counter.next()')).toBe(1);
  });

  it('rejects names outside the table', () => {
    const load = createModuleLoader(createContext(), { counter: COUNTER_SOURCE });
    expect(() => load('fs')).toThrow("Cannot find module 'fs'");
    expect(() => load('toString')).toThrow("Cannot find module 'toString'");
  });

  it('prefers module.exports replacements', () => {
    const vm = createContext();
    expect(vm.eval(moduleCode('module.exports = 42;'))).toBe(42);
  });
});
