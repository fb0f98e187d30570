'use strict';

import _ from 'lodash';
import * as util from 'util';

export interface ErrorDetails {
  problemValue?: unknown;
}

export class AutomatonError<D extends ErrorDetails = ErrorDetails> extends Error {
  public readonly reason: string;
  public readonly details: D;

  constructor (reason: string, details: D) {
    super(describe(reason, details));

    this.name = 'AutomatonError';

    this.reason = reason;
    this.details = details;

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    // Set the prototype explicitly.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// "<reason>: <problem value>", non-string values rendered on one line
function describe (reason: string, details: ErrorDetails): string {
  let value = details.problemValue;
  let problemValue = _.isUndefined(value) ? ''
    : _.isString(value) ? value
    : util.inspect(value, { breakLength: Infinity });
  return [reason, problemValue].filter(_.identity).join(': ');
}

export interface ConstructionDetails extends ErrorDetails {
  source: string;
  symbol: string;
  existing?: string;
  conflicting: string;
}

/**
 * The edge list does not describe a DFA: two edges leave the same state on
 * the same symbol towards different states, or an edge has an empty symbol.
 */
export class ConstructionError extends AutomatonError<ConstructionDetails> {
  constructor (details: Omit<ConstructionDetails, 'problemValue'>, reason = 'Non deterministic transition') {
    super(reason, {
      ...details,
      problemValue: details.existing === undefined
        ? `${details.source} -${details.symbol}-> ${details.conflicting}`
        : `${details.source} -${details.symbol}-> {${details.existing}, ${details.conflicting}}`
    });
    this.name = 'ConstructionError';
  }
}

export interface InvalidTransitionDetails extends ErrorDetails {
  state: string;
  symbol: string;
}

export class InvalidTransitionError extends AutomatonError<InvalidTransitionDetails> {
  constructor (details: Omit<InvalidTransitionDetails, 'problemValue'>) {
    super('No transition defined', {
      ...details,
      problemValue: `${details.state} -${details.symbol}->`
    });
    this.name = 'InvalidTransitionError';
  }
}

export interface SpecErrorDetails extends ErrorDetails {
  validationErrors: string[];
}

export class SpecError extends AutomatonError<SpecErrorDetails> {
  constructor (reason: string, details: SpecErrorDetails) {
    super(reason, details);
    this.name = 'SpecError';
  }
}
