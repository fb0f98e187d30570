export { default as DFA } from './DFA';
export type { DFAOptions } from './DFA';
export { StateAutomaton } from './StateAutomaton';
export { enumeratePaths, enumerateWords } from './path-enumerator';
export { parseSpec, buildAutomaton, loadAutomaton, YAMLException } from './parser';
export type { AutomatonSpec } from './parser';
export {
  AutomatonError,
  ConstructionError,
  InvalidTransitionError,
  SpecError,
} from './AutomatonError';
export type {
  ErrorDetails,
  ConstructionDetails,
  InvalidTransitionDetails,
  SpecErrorDetails,
} from './AutomatonError';
export { consoleLogger } from './logger';
export type { Logger, LoggingOptions } from './logger';
export { TransitionSchema, symbolsOf } from './TransitionSpec';
export type { Edge, Transition, TransitionTable, Word } from './TransitionSpec';
export { default as StateGraph } from './state-diagram/StateGraph';
export type { Vertex, VertexLUT, LayoutEdge } from './state-diagram/StateGraph';
