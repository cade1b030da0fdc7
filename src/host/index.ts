/**
 * Host-side jail: sandbox registry, scripting cells and the RPC bridge
 */

export { RpcBridge } from './bridge';
export { Gate, type GateOptions, type Release } from './cell/Gate';
export { createModuleLoader, DEFAULT_MODULES, type ModuleSource, moduleCode } from './cell/modules';
export {
  DEFAULT_ACQUIRE_TIMEOUT_MS,
  ExecutionScope,
  ScriptingCell,
  type ScriptingCellOptions,
} from './cell/ScriptingCell';
export { createScriptValueCodec, type HostFunction, type ScriptValueCodec } from './cell/ScriptValueCodec';
export {
  BRIDGE_GLOBAL,
  CALL_ENTRY_POINT,
  CATALOG_GLOBAL,
  DEFAULT_BASE_SCRIPT,
  PREAMBLE_CODE,
} from './cell/scripts';
export {
  bootstrapCell,
  dispatchCall,
  getInstance,
  getVM,
  initialize,
  resetInstance,
} from './instance';
export { SandboxRegistry } from './Registry';
export type { RegistryOptions } from './types';
