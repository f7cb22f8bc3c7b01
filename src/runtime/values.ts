/**
 * Runtime value types for the Cairn language.
 * Every token the reader produces, and every stack slot, is a CairnValue.
 */

export type CairnValue =
  | CairnString
  | CairnNumber
  | CairnFunctionRef
  | CairnBlock
  | CairnOperator
  | CairnBoolean;

export interface CairnString {
  readonly kind: 'string';
  readonly value: string;
}

export interface CairnNumber {
  readonly kind: 'number';
  readonly value: number;
}

/** A function name pushed as data. Only `exec`/`invoke` call it. */
export interface CairnFunctionRef {
  readonly kind: 'function';
  readonly name: string;
}

/**
 * Deferred code. Carries no environment: every name inside resolves
 * against the engine's registries when the block finally runs.
 */
export interface CairnBlock {
  readonly kind: 'block';
  readonly body: readonly CairnValue[];
}

export interface CairnOperator {
  readonly kind: 'operator';
  readonly symbol: string;
}

export interface CairnBoolean {
  readonly kind: 'boolean';
  readonly value: boolean;
}

// ─── Constructors ────────────────────────────────────
// Values are frozen: the stack, rollback snapshots and block bodies share them.

export function cairnString(value: string): CairnString {
  return Object.freeze({ kind: 'string', value });
}

export function cairnNumber(value: number): CairnNumber {
  return Object.freeze({ kind: 'number', value });
}

export function cairnFunctionRef(name: string): CairnFunctionRef {
  return Object.freeze({ kind: 'function', name });
}

export function cairnBlock(body: readonly CairnValue[]): CairnBlock {
  return Object.freeze({ kind: 'block', body: Object.freeze([...body]) });
}

export function cairnOperator(symbol: string): CairnOperator {
  return Object.freeze({ kind: 'operator', symbol });
}

export function cairnBoolean(value: boolean): CairnBoolean {
  return Object.freeze({ kind: 'boolean', value });
}

// ─── Utilities ───────────────────────────────────────

export function typeName(value: CairnValue): string {
  return value.kind === 'block' ? 'macro' : value.kind;
}

/** Rendered form used in error messages and stack display. */
export function valueToString(value: CairnValue): string {
  switch (value.kind) {
    case 'string': return JSON.stringify(value.value);
    case 'number': return String(value.value);
    case 'function': return `<fn ${value.name}>`;
    case 'block': return `<mac ${valueToSource(value)}>`;
    case 'operator': return `<sym '${value.symbol}'>`;
    case 'boolean': return `(${value.value})`;
  }
}

/** Like valueToString, but strings come out raw. */
export function valueToDisplay(value: CairnValue): string {
  return value.kind === 'string' ? value.value : valueToString(value);
}

/**
 * Source text that reads back to an equal value. Numbers the bare literal
 * syntax cannot spell (negative, exponent form, non-finite, -0) are wrapped
 * in parentheses.
 */
export function valueToSource(value: CairnValue): string {
  switch (value.kind) {
    case 'string': return `"${value.value}"`;
    case 'number': return numberToSource(value.value);
    case 'function': return `[${value.name}]`;
    case 'block': return '{' + value.body.map(valueToSource).join(' ') + '}';
    case 'operator': return value.symbol;
    case 'boolean': return value.value ? 'T' : 'F';
  }
}

function numberToSource(n: number): string {
  if (Object.is(n, -0)) return '(-0)';
  const text = String(n);
  return /^[0-9.]+$/.test(text) ? text : `(${text})`;
}

export function valuesEqual(a: CairnValue, b: CairnValue): boolean {
  switch (a.kind) {
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'number': return b.kind === 'number' && a.value === b.value;
    case 'boolean': return b.kind === 'boolean' && a.value === b.value;
    case 'function': return b.kind === 'function' && a.name === b.name;
    case 'operator': return b.kind === 'operator' && a.symbol === b.symbol;
    case 'block':
      return b.kind === 'block'
        && a.body.length === b.body.length
        && a.body.every((item, i) => valuesEqual(item, b.body[i]));
  }
}
