import _ from "lodash";

import { TransitionSchema, type Edge, type Transition, type TransitionTable } from './TransitionSpec';

export function toStringArray (val: unknown): string[] {
  if (_.isNil(val))
    return [];
  if (_.isString(val))
    return [val];
  else
    return _.castArray(val).map(String);
}

export function splitToStringArray (val: unknown): string[] {
  if (_.isNil(val))
    return [];
  // by code point, as words are read
  if (_.isString(val))
    return Array.from(val);
  if (_.isArray(val))
    return val.map(String);
  else
    return Array.from(String(val));
}

export type Synonyms = {[name: string]: string[]};

export function isRecord (val: unknown): val is {[key: string]: unknown} {
  return _.isPlainObject(val);
}

export function parseSynonyms (val: unknown): Synonyms {
  if (!isRecord(val))
    return {};
  return _.mapValues(val, (symbols) => splitToStringArray(symbols));
}

/**
 * Symbols named by a table key. Keys are comma-separated; a piece naming a
 * synonym stands for all of its symbols.
 * e.g. with `digit: "01"`, key 'digit,-' -> symbols ['0', '1', '-'].
 */
export function symbolsForKey (key: string, synonyms: Synonyms): string[] {
  return _.flatMap(key.split(","), (piece) =>
    _.has(synonyms, [piece]) ? synonyms[piece] : [piece]);
}

// an empty destination loops back to the source
function parseDestinations (from: string, symbol: string, trans: unknown): Transition[] {
  return toStringArray(_.isNil(trans) ? from : trans)
    .map((to) => TransitionSchema.validateSync({ from, read: symbol, to }));
}

/**
 * Normalize the raw `table` of a description to
 * `{ state: { symbol: Transition[] } }`. Order follows the document, except
 * that integer-like keys come first (object key order).
 */
export function parseTable (table: unknown, synonyms: Synonyms = {}): TransitionTable {
  if (!isRecord(table))
    return {};

  return _.mapValues(table, (outTrans, from) => {
    const out: {[key: string]: unknown} = isRecord(outTrans) ? outTrans : {};
    const bySymbol: {[symbol: string]: Transition[]} = {};
    _.forEach(out, (trans, key) => {
      for (const symbol of symbolsForKey(key, synonyms)) {
        bySymbol[symbol] = _.unionWith(bySymbol[symbol] ?? [], parseDestinations(from, symbol, trans), _.isEqual);
      }
    });
    return bySymbol;
  });
}

/** Transitions in table order, as `[from, read, to]` edges. */
export function tableToEdges (table: TransitionTable): Edge[] {
  return _.flatMap(_.values(table), (stateObject) =>
    _.flatMap(_.values(stateObject), (transitions) =>
      transitions.map((t): Edge => [t.from, t.read, t.to])));
}

export function allStatesInTransitionTableDeclared (table: TransitionTable | undefined): boolean {
  const declared = _.keys(table);
  return _.every(tableToEdges(table ?? {}), ([, , to]) => _.includes(declared, to));
}
