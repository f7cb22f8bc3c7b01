import { CairnValue, valueToString } from './values';

/** The closed set of failures the reader and the engine can report. */
export type ErrorKind =
  | { type: 'UnknownFunction'; name: string }
  | { type: 'InvalidArgumentType'; expected: string; actual: string }
  | { type: 'InvalidNumberLit'; text: string }
  | { type: 'OutOfBounds'; index: number; length: number }
  | { type: 'NotEnoughArguments' }
  | { type: 'InvalidBoolean'; value: CairnValue };

export function describeErrorKind(kind: ErrorKind): string {
  switch (kind.type) {
    case 'UnknownFunction':
      return `unknown function ${kind.name}`;
    case 'InvalidArgumentType':
      return `expected ${kind.expected}, found ${kind.actual}`;
    case 'InvalidNumberLit':
      return `invalid number literal ${JSON.stringify(kind.text)}`;
    case 'OutOfBounds':
      return `index ${kind.index} out of bounds for stack of length ${kind.length}`;
    case 'NotEnoughArguments':
      return 'not enough arguments on the stack';
    case 'InvalidBoolean':
      return `${valueToString(kind.value)} is not a boolean`;
  }
}

/**
 * Base error for everything the language itself can get wrong.
 * Native functions throw this to fail; the engine rolls the stack back.
 */
export class CairnError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    suffix = '',
  ) {
    super(`${kind.type}: ${describeErrorKind(kind)}${suffix}`);
    this.name = 'CairnError';
  }
}

export class ParseError extends CairnError {
  constructor(
    kind: ErrorKind,
    public readonly offset?: number,
  ) {
    super(kind, offset === undefined ? '' : ` (at offset ${offset})`);
    this.name = 'ParseError';
  }
}

/**
 * A failure that escaped evaluate(). `failedStack` is the stack as the
 * failing call left it, which is not the live stack: the engine has
 * already restored that one.
 */
export class EvaluationError extends CairnError {
  constructor(
    kind: ErrorKind,
    public readonly failedStack: readonly CairnValue[],
    public readonly token?: CairnValue,
  ) {
    super(kind, token === undefined ? '' : ` (in ${valueToString(token)})`);
    this.name = 'EvaluationError';
  }
}
