import _ from 'lodash';

import DFA from '../src/DFA';
import type { Logger } from '../src/logger';
import type { Edge } from '../src/TransitionSpec';

// "ab" followed by one or more "a"
export function abThenAs (): DFA {
  return new DFA([
    ['s1', 'a', 's2'],
    ['s2', 'b', 's3'],
    ['s3', 'a', 's4'],
    ['s4', 'a', 's4'],
  ], 's1', ['s4']);
}

// x+@x+.x+ over the alphabet {x, @, .}; exits are declared before loops
export function addressLike (): DFA {
  return new DFA([
    ['q0', 'x', 'q1'],
    ['q1', '@', 'q2'],
    ['q1', 'x', 'q1'],
    ['q2', 'x', 'q3'],
    ['q3', '.', 'q4'],
    ['q3', 'x', 'q3'],
    ['q4', 'x', 'q5'],
    ['q5', 'x', 'q5'],
  ], 'q0', ['q5']);
}

// ddd-ddd-dddd
export function phoneNumber (): DFA {
  const digits = '0123456789'.split('');
  const layout = 'ddd-ddd-dddd'.split('');
  const edges: Edge[] = _.flatMap(layout, (cell, i): Edge[] =>
    cell === 'd'
      ? digits.map((digit): Edge => [`p${i}`, digit, `p${i + 1}`])
      : [[`p${i}`, '-', `p${i + 1}`]]);
  return new DFA(edges, 'p0', [`p${layout.length}`]);
}

export class RecordingLogger implements Logger {
  public debugged: unknown[][] = [];

  debug (...args: unknown[]) { this.debugged.push(args); }
  log () {}
  warn () {}
  error () {}
}
