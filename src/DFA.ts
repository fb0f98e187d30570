'use strict';

import { ConstructionError, InvalidTransitionError } from './AutomatonError';
import { createDebug, type LoggingOptions } from './logger';
import { StateAutomaton } from './StateAutomaton';
import { type Edge, type Transition, type Word, symbolsOf } from './TransitionSpec';

type TransitionMap = Map<string, Map<string, string>>;

export type DFAOptions = LoggingOptions;

/**
 * Deterministic finite automaton with a mutable current-state cursor.
 *
 * The transition table is fixed at construction and shared by forks; only the
 * cursor (and the tape, when one is loaded) changes afterwards.
 */
export default class DFA extends StateAutomaton {
  private table: TransitionMap = new Map();
  private knownStates = new Set<string>();
  private cursor: string;
  private readonly initial: string;
  private readonly terminals: ReadonlySet<string>;
  private readonly options: DFAOptions;
  private readonly debug: (...args: unknown[]) => void;

  private tape: string[] = [];
  private head = 0;

  /**
   * Construct a DFA.
   * @param edges           `[from, read, to]` triples, in declaration order.
   * @param initialState
   * @param terminalStates  States in which the consumed input is accepted.
   * @param options
   * @throws ConstructionError if two edges leave the same state on the same
   *   symbol towards different states, or an edge's symbol is empty.
   */
  constructor (edges: Iterable<Edge>, initialState: string, terminalStates: Iterable<string>, options: DFAOptions = {}) {
    super();

    this.initial = initialState;
    this.terminals = new Set(terminalStates);
    this.options = options;
    this.debug = createDebug('DFA', options);

    this.knownStates.add(initialState);
    for (const [from, read, to] of edges) {
      this.register(from, read, to);
    }
    this.cursor = initialState;
  }

  // guarded insert; a repeated identical edge is a no-op
  private register (from: string, read: string, to: string): void {
    if (read === '') {
      throw new ConstructionError({ source: from, symbol: read, conflicting: to }, 'Empty symbol');
    }

    let out = this.table.get(from);
    if (out === undefined) {
      out = new Map();
      this.table.set(from, out);
    }

    const existing = out.get(read);
    if (existing !== undefined && existing !== to) {
      throw new ConstructionError({ source: from, symbol: read, existing, conflicting: to });
    }

    out.set(read, to);
    this.knownStates.add(from);
    this.knownStates.add(to);
  }

  public get currentState (): string {
    return this.cursor;
  }

  public get initialState (): string {
    return this.initial;
  }

  public get terminalStates (): ReadonlySet<string> {
    return this.terminals;
  }

  /** Initial state first, then every other state in order of appearance. */
  public get states (): string[] {
    return [...this.knownStates];
  }

  public transitions (): Transition[] {
    const all: Transition[] = [];
    this.table.forEach((out, from) => {
      out.forEach((to, read) => all.push({ from, read, to }));
    });
    return all;
  }

  /**
   * Successors of the current state by symbol, in declaration order. The map
   * is a copy.
   */
  public outEdges (): Map<string, string> {
    return new Map(this.table.get(this.cursor) ?? []);
  }

  public get isTerminal (): boolean {
    return this.terminals.has(this.cursor);
  }

  public get isStuck (): boolean {
    return (this.table.get(this.cursor)?.size ?? 0) === 0;
  }

  /**
   * Follow the out-edge labelled `symbol`.
   * @throws InvalidTransitionError if the current state has no such edge; the
   *   current state is left as it was.
   */
  public advance (symbol: string): void {
    const next = this.table.get(this.cursor)?.get(symbol);
    if (next === undefined) {
      throw new InvalidTransitionError({ state: this.cursor, symbol });
    }

    this.debug(`"${this.cursor}" -${symbol}-> "${next}"`);
    this.cursor = next;
  }

  /**
   * Whether `word`, read from the initial state, ends in a terminal state.
   * Runs on a fork; this automaton's cursor does not move.
   */
  public accepts (word: Word): boolean {
    const run = this.fork(this.initial);
    try {
      for (const symbol of symbolsOf(word)) {
        run.advance(symbol);
      }
    } catch (e) {
      if (e instanceof InvalidTransitionError) return false;
      throw e;
    }
    return run.isTerminal;
  }

  /**
   * An independent automaton over the same table, its cursor at `at`
   * (default: the current state). The tape is not carried over.
   * @throws RangeError for a state the automaton does not have
   */
  public fork (at: string = this.cursor): DFA {
    if (!this.knownStates.has(at)) {
      throw new RangeError('not a valid state: ' + String(at));
    }

    const copy = new DFA([], this.initial, this.terminals, this.options);
    copy.table = this.table;
    copy.knownStates = this.knownStates;
    copy.cursor = at;
    return copy;
  }

  /** Back to the initial state, head back to the start of the tape. */
  public reset (): void {
    this.cursor = this.initial;
    this.head = 0;
  }

  /** Reset and put `word` on the tape. */
  public load (word: Word): void {
    this.tape = symbolsOf(word);
    this.reset();
    this.debug('loaded', this.tape);
  }

  public step (): boolean {
    if (this.isHalted) return false;

    this.advance(this.tape[this.head]);
    this.head++;
    return true;
  }

  public get isHalted (): boolean {
    if (this.head >= this.tape.length) return true;
    return !this.table.get(this.cursor)?.has(this.tape[this.head]);
  }

  /**
   * Step until halted.
   * @return {boolean} true iff the whole tape was read and the automaton is
   *   in a terminal state
   */
  public run (): boolean {
    let steps = 0;
    while (this.step()) steps++;
    this.debug(`halted in "${this.cursor}" after ${steps} steps`);
    return this.head === this.tape.length && this.isTerminal;
  }

  // e.g. "s2\na[b]a": the head's cell is bracketed, "[]" past the end
  public toString (): string {
    if (this.tape.length === 0) return this.cursor;

    const cells = this.tape.map((symbol, i) => i === this.head ? `[${symbol}]` : symbol);
    if (this.head >= this.tape.length) cells.push('[]');
    return this.cursor + '\n' + cells.join('');
  }
}
