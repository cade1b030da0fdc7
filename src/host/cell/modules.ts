import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import type { JSEngineContext } from '../../sandbox';

/**
 * CommonJS source of a module scripts may `require`, or a function producing it.
 * Each cell evaluates its own copy, so module state never leaks between cells.
 */
export type ModuleSource = string | (() => string);

const packageRequire = createRequire(import.meta.url);
const packageSources = new Map<string, string>();

/**
 * Reads a file of an installed package once per process.
 */
function packageFile(specifier: string): () => string {
  return () => {
    let source = packageSources.get(specifier);
    if (source === undefined) {
      source = readFileSync(packageRequire.resolve(specifier), 'utf8');
      packageSources.set(specifier, source);
    }
    return source;
  };
}

/**
 * Modules cell scripts may `require` unless the registry is given its own table:
 * the browser bundle of web3 and the standalone build of bignumber.js
 */
export const DEFAULT_MODULES: Readonly<Record<string, ModuleSource>> = Object.freeze({
  web3: packageFile('web3/dist/web3.min.js'),
  'bignumber.js': packageFile('bignumber.js'),
});

/**
 * Wraps CommonJS/UMD source into an expression evaluating to its exports.
 * `self` is provided for bundles that look up their global object through it.
 */
export function moduleCode(source: string): string {
  return `(function () {
var module = { exports: {} };
(function (module, exports, self) {
${source}
})(module, module.exports, globalThis);
return module.exports;
})()`;
}

/**
 * Builds the `require` behind a cell's script-realm `require` function.
 * Only names present in `modules` resolve; each is evaluated inside the cell
 * on first use and cached for the cell's lifetime.
 */
export function createModuleLoader(
  vm: JSEngineContext,
  modules: Readonly<Record<string, ModuleSource>>
): (name: unknown) => unknown {
  const loaded = new Map<string, unknown>();

  return (name: unknown) => {
    if (typeof name !== 'string' || !Object.hasOwn(modules, name)) {
      throw new Error(`Cannot find module '${String(name)}'`);
    }
    if (loaded.has(name)) {
      return loaded.get(name);
    }

    const entry = modules[name];
    const exports = vm.eval(moduleCode(typeof entry === 'function' ? entry() : entry));
    loaded.set(name, exports);
    return exports;
  };
}
