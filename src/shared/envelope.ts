/**
 * The `{"result": ...}` / `{"error": ...}` wrapper returned by every public entry point.
 */

import { toErrorMessage } from './errors';

export type Envelope = { result: unknown } | { error: string };

export function printError(error: unknown): string {
  const message = typeof error === 'string' ? error : toErrorMessage(error);
  return JSON.stringify({ error: message });
}

/**
 * Wraps already-serialized JSON text. A missing value (or the literal
 * `undefined` a VM produces when stringifying one) is reported as `null`.
 */
export function printResult(json: string | undefined): string {
  const body = json === undefined || json === 'undefined' ? 'null' : json;
  return `{"result":${body}}`;
}

export function parseEnvelope(text: string): Envelope {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed === 'object' && parsed !== null) {
    if ('error' in parsed && typeof parsed.error === 'string') {
      return { error: parsed.error };
    }
    if ('result' in parsed) {
      return { result: parsed.result };
    }
  }
  throw new SyntaxError(`not an envelope: ${text}`);
}
