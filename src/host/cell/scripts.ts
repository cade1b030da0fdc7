/**
 * Script snippets evaluated while a cell is bootstrapped
 */

/** Global name of the bridge object */
export const BRIDGE_GLOBAL = 'jeth';

/** Global object every cell script publishes its callable API on */
export const CATALOG_GLOBAL = '_status_catalog';

/** Global entry point invoked by dispatchCall */
export const CALL_ENTRY_POINT = 'call';

/**
 * Loads the web3 client against the bridge and the `bn` decimal helper.
 */
export const PREAMBLE_CODE = `
var Web3 = require('web3');
var web3 = new Web3(${BRIDGE_GLOBAL});
var Bignumber = require('bignumber.js');
function bn(val) {
  return new Bignumber(val);
}
`;

/** Evaluates to the catalog serialized as JSON text */
export const CATALOG_TRAILER_CODE = `JSON.stringify(${CATALOG_GLOBAL});`;

/**
 * Default base script: implements the `call(path, args)` entry point by
 * walking a dotted path through the catalog and applying the JSON-decoded
 * arguments (an array is spread, anything else is passed as one argument).
 */
export const DEFAULT_BASE_SCRIPT = `
function ${CALL_ENTRY_POINT}(pathStr, argsStr) {
  var args = argsStr ? JSON.parse(argsStr) : [];
  var path = String(pathStr).split('.');
  var owner = null;
  var target = ${CATALOG_GLOBAL};
  for (var i = 0; i < path.length; i++) {
    if (target === undefined || target === null) {
      throw new Error('catalog path not found: ' + pathStr);
    }
    owner = target;
    target = target[path[i]];
  }
  if (typeof target !== 'function') {
    throw new Error('catalog entry is not a function: ' + pathStr);
  }
  return target.apply(owner, Array.isArray(args) ? args : [args]);
}
`;
