/**
 * RpcBridge - the `jeth` object scripts use to reach the node
 *
 * `send` and `sendAsync` share one implementation:
 * - the payload is re-serialized with the cell's own JSON encoder
 * - a leading `[` makes it a batch, anything else a single call
 * - every call runs pre-hook, dispatch, and a post-hook deferred to batch exit
 * - responses are rebuilt in the script realm, in request order
 * - the result is delivered once: to `callback(null, response)` when the
 *   second argument is a function, otherwise as the resolved value of the
 *   returned promise
 *
 * `jeth` itself, its functions and the promises it returns belong to the
 * cell's realm; the host side only ever sees a payload and a callback.
 */

import type { Logger, RequestQueue, RpcClient } from '../../node';
import {
  decodeRequest,
  type DecodedRequest,
  errorResponse,
  INTERNAL_ERROR_CODE,
  MalformedRequestError,
  type RPCCall,
  rpcErrorCode,
  SandboxError,
  successResponse,
  toErrorMessage,
} from '../../shared';
import type { ScriptingCell } from '../cell/ScriptingCell';
import { BatchScope } from './BatchScope';

export interface RpcBridgeOptions {
  cell: ScriptingCell;
  /** Lazily resolved, restart-tolerant client (throws NodeUnavailableError) */
  resolveClient: () => Promise<RpcClient>;
  /** Lazily resolved hook queue (throws NodeUnavailableError) */
  resolveRequestQueue: () => Promise<RequestQueue>;
  debug?: boolean;
  logger: Logger;
}

type Outcome = { ok: true; result: unknown } | { ok: false; error: unknown };

type Hook = 'preDispatch' | 'postDispatch';

function backendMessage(error: unknown): string {
  if (error instanceof SandboxError) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
}

export class RpcBridge {
  private readonly cell: ScriptingCell;
  private readonly resolveClient: () => Promise<RpcClient>;
  private readonly resolveRequestQueue: () => Promise<RequestQueue>;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(options: RpcBridgeOptions) {
    this.cell = options.cell;
    this.resolveClient = options.resolveClient;
    this.resolveRequestQueue = options.resolveRequestQueue;
    this.debug = options.debug ?? false;
    this.logger = options.logger;
  }

  /**
   * The script-realm `jeth` object bound into the cell's global scope.
   */
  bindings(): unknown {
    const { codec } = this.cell;
    return codec.bridge(
      codec.expose(([payload, callback]) => {
        this.send(payload, callback);
      })
    );
  }

  /**
   * Entry point for both bridge methods. `callback` is a script function
   * called once with `(null, response)` or `(error)`.
   * Throws MalformedRequestError when the payload cannot be decoded.
   */
  send(payload: unknown, callback: unknown): void {
    const request = this.decode(payload);
    if (typeof callback !== 'function') {
      throw new MalformedRequestError('callback must be a function');
    }

    const callbackFn = callback;
    const deliver = (error: unknown, response: unknown): void => {
      try {
        Reflect.apply(callbackFn, undefined, [error, response]);
      } catch (callbackError) {
        this.logger.warn(
          `[jail:bridge] Cell[${this.cell.id}] callback threw:`,
          toErrorMessage(callbackError)
        );
      }
    };

    this.cell
      .schedule(async () => {
        deliver(null, await this.dispatch(request));
      })
      .catch((error: unknown) => {
        // Gate timeout, or the cell was disposed mid-dispatch
        deliver(this.cell.codec.error(toErrorMessage(error)), undefined);
      });
  }

  private decode(payload: unknown): DecodedRequest {
    let text: string | undefined;
    try {
      text = this.cell.codec.stringify(payload);
    } catch (error) {
      throw new MalformedRequestError(`request is not serializable: ${toErrorMessage(error)}`);
    }
    if (text === undefined) {
      throw new MalformedRequestError('request is not serializable');
    }
    return decodeRequest(text);
  }

  /**
   * Runs every call of the request and returns the script-realm response
   * (an array for batches, the single response otherwise).
   */
  private async dispatch({ batch, calls }: DecodedRequest): Promise<unknown> {
    let client: RpcClient;
    let queue: RequestQueue;
    try {
      queue = await this.resolveRequestQueue();
      client = await this.resolveClient();
    } catch (error) {
      return this.cell.codec.toScript(
        errorResponse(null, INTERNAL_ERROR_CODE, toErrorMessage(error))
      );
    }

    const scope = new BatchScope((error) => {
      this.logger.warn(`[jail:bridge] Cell[${this.cell.id}] deferred hook failed:`, error);
    });
    const responses: unknown[] = [];

    try {
      for (const call of calls) {
        await this.runHook(queue, 'preDispatch', call);
        scope.defer(() => this.runHook(queue, 'postDispatch', call));

        const outcome = await this.invoke(client, call);
        responses.push(this.toScriptResponse(call, outcome));
      }
    } finally {
      await scope.exit();
    }

    if (this.debug) {
      this.logger.log(
        `[jail:bridge] Cell[${this.cell.id}] dispatched ${calls.length} call(s)${batch ? ' (batch)' : ''}`
      );
    }

    return batch ? this.cell.codec.list(responses) : responses[0];
  }

  private async invoke(client: RpcClient, call: RPCCall): Promise<Outcome> {
    try {
      return { ok: true, result: await client.call(call.method, call.params) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private toScriptResponse(call: RPCCall, outcome: Outcome): unknown {
    const { codec } = this.cell;

    if (!outcome.ok) {
      const code = rpcErrorCode(outcome.error);
      if (code !== undefined) {
        return codec.toScript(errorResponse(call.id, code, backendMessage(outcome.error)));
      }
      return codec.toScript(
        errorResponse(call.id, INTERNAL_ERROR_CODE, toErrorMessage(outcome.error))
      );
    }

    // null and undefined results both become the script's native null
    const result = outcome.result ?? null;
    try {
      const text = JSON.stringify(successResponse(call.id, result));
      return codec.parse(text);
    } catch (error) {
      return codec.toScript(errorResponse(call.id, INTERNAL_ERROR_CODE, toErrorMessage(error)));
    }
  }

  private async runHook(queue: RequestQueue, hook: Hook, call: RPCCall): Promise<void> {
    try {
      await queue[hook](this.cell.vm, call, this.cell.id);
    } catch (error) {
      this.logger.warn(
        `[jail:bridge] Cell[${this.cell.id}] ${hook} hook failed for ${call.method}:`,
        toErrorMessage(error)
      );
    }
  }
}
