import type DFA from './DFA';

/**
 * Lazily walk every path of exactly `length` symbols from the automaton's
 * current state that ends in a terminal state.
 *
 * Depth-first, branching over out-edges in declaration order. Each branch
 * advances its own fork, so siblings never see each other's moves and the
 * given automaton is left untouched.
 */
export function* enumerateWords (automaton: DFA, length: number): Generator<string[]> {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError('path length must be a non-negative integer, got ' + String(length));
  }
  yield* walk(automaton, length, []);
}

function* walk (automaton: DFA, remaining: number, prefix: string[]): Generator<string[]> {
  if (remaining === 0) {
    if (automaton.isTerminal) yield prefix;
    return;
  }

  for (const symbol of automaton.outEdges().keys()) {
    const branch = automaton.fork();
    branch.advance(symbol);
    yield* walk(branch, remaining - 1, [...prefix, symbol]);
  }
}

/**
 * Every word of exactly `length` symbols that drives the automaton from its
 * current state into a terminal state, in search order.
 *
 * No memoization: the work grows with (out-degree ^ length).
 * @throws RangeError if a path uses a symbol that is not a single character;
 *   such paths are only told apart by `enumerateWords`.
 */
export function enumeratePaths (automaton: DFA, length: number): Set<string> {
  const paths = new Set<string>();
  for (const word of enumerateWords(automaton, length)) {
    const wide = word.find((symbol) => Array.from(symbol).length !== 1);
    if (wide !== undefined) {
      throw new RangeError(`symbol "${wide}" is not a single character, use enumerateWords`);
    }
    paths.add(word.join(''));
  }
  return paths;
}
