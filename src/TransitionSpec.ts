import * as yup from "yup";

export interface Transition {
  from: string;
  read: string;
  to: string;
}

export let TransitionSchema: yup.ObjectSchema<Transition> = yup.object({
  from: yup.string().defined(),
  read: yup.string().defined(),
  to: yup.string().defined(),
});

/** Edge on construction: `[from, read, to]` */
export type Edge = readonly [from: string, read: string, to: string];

/**
 * Parsed form of a description's table. Several transitions per symbol are
 * representable here; the automaton built from it rejects them.
 */
export type TransitionTable = {[state: string]: {[symbol: string]: Transition[]}};

/** A word is a string of single-character symbols or a list of symbols. */
export type Word = string | readonly string[];

export function symbolsOf (word: Word): string[] {
  return typeof word === 'string' ? Array.from(word) : [...word];
}
