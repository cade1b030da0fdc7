import vm from 'node:vm';
import type {
  JSEngineContext,
  JSEngineProvider,
  JSEngineRuntime,
  JSEngineRuntimeOptions,
} from '../types/provider';

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const ARG_SLOT = '__jailCallArg';

/**
 * An implementation of JSEngineProvider that uses the Node.js `vm` module.
 * Every context gets its own global object and builtins (its own `JSON`, `Array`, ...).
 * The contextified object has no prototype, so `this.constructor` inside a
 * context resolves to the context's own `Object` and never to the host's.
 *
 * Timeout Support:
 * - Hard timeout: YES. Uses vm.Script.runInContext({ timeout }) which is a true hard interrupt.
 *   It bounds synchronous evaluation only; pending promises are not interrupted.
 */
export class VMProvider implements JSEngineProvider {
  private options: { timeout?: number };

  constructor(options?: { timeout?: number }) {
    this.options = options || {};
  }

  createRuntime(runtimeOptions?: JSEngineRuntimeOptions): JSEngineRuntime {
    const timeout = runtimeOptions?.timeout ?? this.options.timeout;
    const contexts: JSEngineContext[] = [];

    const createContext = (name = 'vm'): JSEngineContext => {
      const vmContext = vm.createContext(Object.create(null), { name });
      const filename = `${name}.js`;

      const run = (code: string): unknown => {
        const script = new vm.Script(code, { filename });
        // vm.Script timeout provides hard interrupt capability
        return script.runInContext(vmContext, { timeout });
      };

      const context: JSEngineContext = {
        eval: run,

        callFunction: (fnName: string, args: readonly unknown[]) => {
          if (!IDENTIFIER.test(fnName)) {
            throw new TypeError(`Invalid function name: ${fnName}`);
          }
          // One global per argument: no host-realm array is ever visible to the callee
          const slots = args.map((arg, i) => {
            const slot = `${ARG_SLOT}${i}`;
            vmContext[slot] = arg;
            return slot;
          });
          try {
            return run(`${fnName}(${slots.join(', ')})`);
          } finally {
            for (const slot of slots) {
              delete vmContext[slot];
            }
          }
        },

        setGlobal: (globalName: string, value: unknown) => {
          vmContext[globalName] = value;
        },

        getGlobal: (globalName: string) => {
          return vmContext[globalName];
        },

        dispose: () => {
          // Clear all properties to help GC
          for (const key of Object.keys(vmContext)) {
            delete vmContext[key];
          }
        },
      };

      contexts.push(context);
      return context;
    };

    return {
      createContext,
      dispose: () => {
        for (const ctx of contexts) {
          ctx.dispose();
        }
        contexts.length = 0;
      },
    };
  }
}
