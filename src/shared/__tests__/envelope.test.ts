import { describe, expect, it } from 'vitest';
import { parseEnvelope, printError, printResult } from '../envelope';
import { CellNotFoundError } from '../errors';

describe('envelope', () => {
  it('wraps serialized results verbatim', () => {
    expect(printResult('{"a":[1,2]}')).toBe('{"result":{"a":[1,2]}}');
    expect(printResult('"pong"')).toBe('{"result":"pong"}');
  });

  it('reports missing values as null', () => {
    expect(printResult(undefined)).toBe('{"result":null}');
    expect(printResult('undefined')).toBe('{"result":null}');
  });

  it('prints error messages as JSON strings', () => {
    expect(printError('bad "quote"')).toBe('{"error":"bad \\"quote\\""}');
    expect(printError(new CellNotFoundError('c1'))).toBe('{"error":"Cell[c1] doesn\'t exist."}');
    expect(printError(new TypeError('nope'))).toBe('{"error":"TypeError: nope"}');
  });

  it('parses both envelope shapes', () => {
    expect(parseEnvelope('{"result":null}')).toEqual({ result: null });
    expect(parseEnvelope('{"error":"x"}')).toEqual({ error: 'x' });
    expect(() => parseEnvelope('[]')).toThrow('not an envelope: []');
  });
});
