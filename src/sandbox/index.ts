/**
 * JavaScript sandbox providers for jail cells.
 *
 * - VMProvider: Node.js vm module
 */

export { VMProvider } from './providers/VMProvider';
export type {
  JSEngineContext,
  JSEngineProvider,
  JSEngineRuntime,
  JSEngineRuntimeOptions,
} from './types/provider';
