/**
 * Process-wide registry access
 *
 * For hosts that want one shared registry instead of holding their own
 * SandboxRegistry. The `registry` parameter of the entry-point helpers may be
 * absent; they then answer with the not-initialized envelope instead of throwing.
 */

import type { JSEngineContext } from '../sandbox';
import { NotInitializedError, printError } from '../shared';
import { SandboxRegistry } from './Registry';
import type { RegistryOptions } from './types';

let instance: SandboxRegistry | null = null;

/**
 * Returns the shared registry, creating it on first use.
 * `options` only apply to that first creation.
 */
export function getInstance(options?: RegistryOptions): SandboxRegistry {
  if (!instance) {
    instance = new SandboxRegistry(options);
  } else if (options) {
    (options.logger ?? console).warn(
      '[jail] Registry already created, options passed to getInstance() are ignored'
    );
  }
  return instance;
}

/**
 * Sets the shared registry's base script. Always returns the same instance.
 */
export function initialize(baseScript: string, options?: RegistryOptions): SandboxRegistry {
  const registry = getInstance(options);
  registry.setBaseScript(baseScript);
  return registry;
}

/**
 * Disposes the shared registry; the next getInstance() creates a new one.
 */
export function resetInstance(): void {
  instance?.dispose();
  instance = null;
}

export function bootstrapCell(
  registry: SandboxRegistry | null | undefined,
  id: string,
  scriptBody: string
): Promise<string> {
  if (!registry) {
    return Promise.resolve(printError(new NotInitializedError()));
  }
  return registry.bootstrapCell(id, scriptBody);
}

export function dispatchCall(
  registry: SandboxRegistry | null | undefined,
  id: string,
  path: string,
  argsJSON: string
): Promise<string> {
  if (!registry) {
    return Promise.resolve(printError(new NotInitializedError()));
  }
  return registry.dispatchCall(id, path, argsJSON);
}

/**
 * @throws NotInitializedError when `registry` is absent, CellNotFoundError when the cell is
 */
export function getVM(registry: SandboxRegistry | null | undefined, id: string): JSEngineContext {
  if (!registry) {
    throw new NotInitializedError();
  }
  return registry.getVM(id);
}
