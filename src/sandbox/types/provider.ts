/**
 * JSEngineProvider Interface
 *
 * Abstracts the JavaScript engine a jail cell runs its scripts in.
 *
 * - JSEngineProvider: The top-level factory for creating a runtime.
 * - JSEngineRuntime: A runtime instance that can create one or more isolated contexts.
 * - JSEngineContext: A single, isolated JS execution environment (one per cell).
 */

/**
 * JSEngineContext - Represents an isolated JS execution context.
 * This is the actual sandbox environment where cell scripts are executed.
 */
export interface JSEngineContext {
  /**
   * Synchronously evaluates a string of JavaScript code.
   * Note: This method blocks the current thread until execution is complete.
   * @param code The JavaScript code string to execute.
   * @returns The result of the last executed expression in the code.
   */
  eval: (code: string) => unknown;

  /**
   * Invokes a function that lives in the context's global scope.
   * Throws (inside the context) when the global is missing or not callable.
   * @param name Identifier of the global function.
   * @param args Arguments passed to the function: primitives, or values created inside the context.
   */
  callFunction: (name: string, args: readonly unknown[]) => unknown;

  /**
   * Sets a global variable in the sandbox's global scope synchronously.
   * Host objects set here are reachable by scripts along with their prototype chain.
   * @param name The name of the global variable.
   * @param value The value to set.
   */
  setGlobal: (name: string, value: unknown) => void;

  /**
   * Gets a global variable from the sandbox's global scope.
   * Top-level `var` and function declarations of evaluated scripts are visible here.
   * @param name The name of the global variable.
   */
  getGlobal: (name: string) => unknown;

  /**
   * Disposes of this context, releasing all associated resources.
   */
  dispose: () => void;
}

/**
 * JSEngineRuntime - An instance of a JS runtime.
 * It can create and manage one or more isolated JSEngineContexts.
 */
export interface JSEngineRuntime {
  /**
   * Creates a new, isolated JS execution context.
   * @param name Label used in stack traces (the cell id).
   */
  createContext: (name?: string) => JSEngineContext;

  /**
   * Disposes of this runtime and all contexts it has created.
   */
  dispose: () => void;
}

/**
 * Options for creating a JSEngineRuntime.
 */
export interface JSEngineRuntimeOptions {
  /**
   * The execution timeout for a single synchronous evaluation, in milliseconds.
   * Note: Not all providers support hard interruption.
   */
  timeout?: number;
}

/**
 * JSEngineProvider - The top-level abstraction for a JS engine.
 * Responsible for creating runtime instances based on configuration.
 */
export interface JSEngineProvider {
  /**
   * Creates a JS runtime instance.
   * This method can be asynchronous, e.g., if it needs to load a WASM file.
   */
  createRuntime: (options?: JSEngineRuntimeOptions) => Promise<JSEngineRuntime> | JSEngineRuntime;
}
