'use strict';

import * as jsyaml from "js-yaml";
export { YAMLException } from "js-yaml";

import * as yup from 'yup';
import _ from 'lodash';

import {
  toStringArray,
  splitToStringArray,
  isRecord,
  parseSynonyms,
  parseTable,
  tableToEdges,
  allStatesInTransitionTableDeclared,
} from './parser-utils';

import DFA, { type DFAOptions } from './DFA';
import { SpecError } from './AutomatonError';
import { createDebug, type LoggingOptions } from './logger';
import type { TransitionTable } from './TransitionSpec';

export interface AutomatonSpec {
  startState: string;
  acceptStates: string[];
  input: string[];
  table: TransitionTable;
}

let StringArraySchema = (transformer: (val: unknown) => string[]) =>
  yup
    .mixed<string[]>()
    .default(() => [])
    .transform((value) => transformer(value));

let schema = yup.object({
  startStates: StringArraySchema(toStringArray)
    .test(
      'one start state',
      'exactly one start state is required',
      (states) => _.size(states) === 1)
    .test(
      'start states declared',
      'all start states must be declared',
      function (states) {
        let declared = _.keys(this.parent.table);
        return _.every(states, (state) => _.includes(declared, state));
      }),

  acceptStates: StringArraySchema(toStringArray)
    .test(
      'accept states declared',
      'all accept states must be declared',
      function (states) {
        let declared = _.keys(this.parent.table);
        return _.every(states, (state) => _.includes(declared, state));
      }),

  input: StringArraySchema(splitToStringArray),

  table: yup
    .mixed<TransitionTable>()
    .default(() => ({}))
    .test(
      'all states declared',
      'all states must be declared',
      allStatesInTransitionTableDeclared),
})
  .from('["start state"]', 'startStates')
  .from('["start states"]', 'startStates')
  .from('["accept state"]', 'acceptStates')
  .from('["accept states"]', 'acceptStates')
;

function validate (obj: object) {
  try {
    return schema.validateSync(obj, { abortEarly: false });
  } catch (e) {
    if (e instanceof yup.ValidationError) {
      throw new SpecError('Validation Error', {
        validationErrors: e.errors,
        problemValue: e.errors.join('; ')
      });
    }
    throw e;
  }
}

/**
 * Parse a YAML automaton description.
 * @throws SpecError when the description fails validation
 * @throws YAMLException when the document is not valid YAML
 */
export function parseSpec (str: string, options: LoggingOptions = {}): AutomatonSpec {
  const debug = createDebug('parser', options);

  let obj = jsyaml.load(str) ?? {};
  debug('document:', obj);
  if (!isRecord(obj)) {
    throw new SpecError('Validation Error', {
      validationErrors: ['a description must be a mapping'],
      problemValue: obj
    });
  }

  // expand synonyms while normalizing the table
  let expanded = {
    ..._.omit(obj, 'synonyms'),
    table: parseTable(obj.table, parseSynonyms(obj.synonyms))
  };
  debug('expanded:', expanded);

  let validated = validate(expanded);
  const [startState] = validated.startStates ?? [];
  const spec: AutomatonSpec = {
    startState,
    acceptStates: validated.acceptStates ?? [],
    input: validated.input ?? [],
    table: validated.table ?? {},
  };
  debug('spec:', spec);
  return spec;
}

/**
 * Build the automaton a parsed description describes, with its `input`, if
 * any, loaded on the tape.
 * @throws ConstructionError when a symbol leads to more than one state
 */
export function buildAutomaton (spec: AutomatonSpec, options: DFAOptions = {}): DFA {
  const dfa = new DFA(tableToEdges(spec.table), spec.startState, spec.acceptStates, options);
  if (spec.input.length) dfa.load(spec.input);
  return dfa;
}

export function loadAutomaton (str: string, options: DFAOptions = {}): DFA {
  return buildAutomaton(parseSpec(str, options), options);
}
