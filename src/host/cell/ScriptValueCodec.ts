/**
 * Host value <-> script value conversion for one cell.
 *
 * Everything crosses the boundary as JSON text, encoded and decoded by the
 * cell's own `JSON` object, so values handed to scripts are native to the
 * script's realm and never host objects. Host functions reach scripts only
 * wrapped in script-realm functions (`expose`): a script can never read a
 * host function, its prototype or its constructor.
 */

import type { JSEngineContext } from '../../sandbox';
import { InternalError, toErrorMessage } from '../../shared';

/**
 * Host callback behind a script-realm function. Receives the call's arguments
 * as a script array and must return a primitive or a script-realm value.
 * A throw becomes a script `Error` carrying the message.
 */
export type HostFunction = (args: unknown[]) => unknown;

export interface ScriptValueCodec {
  /** The script's JSON.stringify; undefined for values JSON cannot represent */
  stringify(value: unknown): string | undefined;
  /** The script's JSON.parse; the result lives in the script realm */
  parse(text: string): unknown;
  /** Serializes a host value and rebuilds it in the script realm */
  toScript(value: unknown): unknown;
  /** Builds a script-realm array from already converted items */
  list(items: readonly unknown[]): unknown;
  /** Builds a script-realm object from already converted values */
  record(entries: Readonly<Record<string, unknown>>): unknown;
  /** A script-realm `Error` */
  error(message: string): unknown;
  /** Wraps a host callback in a script-realm function */
  expose(fn: HostFunction): unknown;
  /**
   * Builds the script-realm `{ send, sendAsync }` pair around an exposed
   * `dispatch(payload, callback)`. Without a callback argument, `send` returns
   * a script-realm promise settled by the callback.
   */
  bridge(dispatch: unknown): unknown;
}

const HELPERS_CODE = `
(function (json, array, error, promise) {
  return {
    stringify: function (value) { return json.stringify(value); },
    parse: function (text) { return json.parse(text); },
    list: function (items) { return array.from(items); },
    record: function (keys, values) {
      var out = {};
      for (var i = 0; i < keys.length; i++) { out[keys[i]] = values[i]; }
      return out;
    },
    error: function (message) { return new error(message); },
    expose: function (host) {
      return function () {
        var failure = null;
        var result = host(array.from(arguments), function (message) { failure = String(message); });
        if (failure !== null) { throw new error(failure); }
        return result;
      };
    },
    bridge: function (dispatch) {
      function send(payload, callback) {
        if (typeof callback === 'function') {
          dispatch(payload, callback);
          return undefined;
        }
        var settle = {};
        var pending = new promise(function (resolve, reject) {
          settle.resolve = resolve;
          settle.reject = reject;
        });
        dispatch(payload, function (err, res) {
          if (err) { settle.reject(err); } else { settle.resolve(res); }
        });
        return pending;
      }
      return { send: send, sendAsync: send };
    }
  };
})(JSON, Array, Error, Promise)`;

function method(target: unknown, name: string): (...args: unknown[]) => unknown {
  if (typeof target !== 'object' || target === null || !(name in target)) {
    throw new InternalError(`script context is missing the ${name} helper`);
  }
  const fn: unknown = Reflect.get(target, name);
  if (typeof fn !== 'function') {
    throw new InternalError(`script context helper ${name} is not callable`);
  }
  return (...args: unknown[]): unknown => Reflect.apply(fn, target, args);
}

/**
 * Host errors cross as their bare message; anything else (script errors
 * included) as its formatted message.
 */
function failureMessage(error: unknown): string {
  return error instanceof Error ? error.message : toErrorMessage(error);
}

/**
 * Captures the context's JSON, Array, Error and Promise before any cell script
 * runs, so later reassignments by scripts do not change how the bridge
 * marshals values.
 */
export function createScriptValueCodec(vm: JSEngineContext): ScriptValueCodec {
  const helpers = vm.eval(HELPERS_CODE);
  const stringify = method(helpers, 'stringify');
  const parse = method(helpers, 'parse');
  const list = method(helpers, 'list');
  const record = method(helpers, 'record');
  const error = method(helpers, 'error');
  const expose = method(helpers, 'expose');
  const bridge = method(helpers, 'bridge');

  return {
    stringify(value) {
      const text = stringify(value);
      return typeof text === 'string' ? text : undefined;
    },
    parse(text) {
      return parse(text);
    },
    toScript(value) {
      const text = JSON.stringify(value);
      return text === undefined ? undefined : parse(text);
    },
    list(items) {
      return list(items);
    },
    record(entries) {
      return record(Object.keys(entries), Object.values(entries));
    },
    error(message) {
      return error(message);
    },
    expose(fn) {
      // Host errors never reach the script; only their message crosses
      const guarded = (args: unknown, fail: unknown): unknown => {
        try {
          return fn(Array.isArray(args) ? args : []);
        } catch (thrown) {
          if (typeof fail === 'function') {
            Reflect.apply(fail, undefined, [failureMessage(thrown)]);
          }
          return undefined;
        }
      };
      return expose(guarded);
    },
    bridge(dispatch) {
      return bridge(dispatch);
    },
  };
}
