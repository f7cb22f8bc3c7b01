import { parse, ReadResult } from '../parser/reader';
import {
  CairnValue,
  CairnBlock,
  cairnFunctionRef,
  valueToString,
} from './values';
import { CairnError, EvaluationError, ErrorKind } from './errors';

/**
 * A registered function. It reads and writes the stack through the
 * engine's accessors and fails by throwing a CairnError.
 */
export type NativeFunction = (engine: Engine) => void;

export interface EngineOptions {
  /** Record calls and rollbacks in the trace log and echo them to `onTrace`. */
  trace?: boolean;
  /** Output sink for built-ins that print. Defaults to console.log. */
  emit?: (text: string) => void;
  /** Where trace lines are echoed. Defaults to console.error. */
  onTrace?: (line: string) => void;
}

export class Engine {
  /** Bottom first, top last. */
  private values: CairnValue[] = [];
  private readonly functions: Map<string, NativeFunction> = new Map();
  private readonly operators: Map<string, string> = new Map();
  private readonly traceEnabled: boolean;
  private readonly traceEntries: string[] = [];
  private readonly startTime = Date.now();
  private readonly sink: (text: string) => void;
  private readonly traceSink: (line: string) => void;

  constructor(options: EngineOptions = {}) {
    this.traceEnabled = options.trace ?? false;
    this.sink = options.emit ?? (text => console.log(text));
    this.traceSink = options.onTrace ?? (line => console.error(line));
  }

  // ─── Registries ─────────────────────────────────────────

  /**
   * Add or replace a function, and bind `alias` to it when given.
   * The alias table stores names, not functions: it is resolved on every use.
   */
  register(alias: string | null, name: string, fn: NativeFunction): void {
    if (alias !== null) {
      this.bindOperator(alias, name);
    }
    this.functions.set(name, fn);
  }

  /** Point a single-character alias at a name, registered or not. */
  bindOperator(symbol: string, name: string): void {
    if (Array.from(symbol).length !== 1) {
      throw new Error(`Operator alias must be a single character, got ${JSON.stringify(symbol)}`);
    }
    this.operators.set(symbol, name);
  }

  unregister(name: string): boolean {
    return this.functions.delete(name);
  }

  unalias(symbol: string): boolean {
    return this.operators.delete(symbol);
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  functionNames(): string[] {
    return Array.from(this.functions.keys());
  }

  resolveOperator(symbol: string): string | undefined {
    return this.operators.get(symbol);
  }

  operatorEntries(): [string, string][] {
    return Array.from(this.operators.entries());
  }

  // ─── Reading & evaluation ───────────────────────────────

  parse(source: string): ReadResult {
    return parse(source, this.operators);
  }

  /** Parse and evaluate in one go. */
  run(source: string): void {
    this.evaluate(this.parse(source).tokens);
  }

  /**
   * Push literals, call operators. Tokens that already ran keep their
   * effect when a later one fails.
   */
  evaluate(tokens: readonly CairnValue[]): void {
    for (const token of tokens) {
      if (token.kind !== 'operator') {
        this.values.push(token);
        continue;
      }

      try {
        const name = this.operators.get(token.symbol);
        if (name === undefined) {
          throw new EvaluationError(
            { type: 'UnknownFunction', name: `'${token.symbol}'` },
            this.stack,
          );
        }
        this.exec(cairnFunctionRef(name));
      } catch (e) {
        if (e instanceof EvaluationError) {
          throw new EvaluationError(e.kind, e.failedStack, token);
        }
        throw e;
      }
    }
  }

  /**
   * Run a FunctionRef or Block. Used by built-ins such as `exec` to build
   * higher-order operators without help from the core.
   */
  invoke(value: CairnValue): void {
    try {
      this.exec(value);
    } catch (e) {
      if (e instanceof EvaluationError) {
        throw new CairnError(e.kind);
      }
      throw e;
    }
  }

  private exec(value: CairnValue): void {
    switch (value.kind) {
      case 'function':
        this.call(value.name);
        return;
      case 'block':
        this.execBlock(value);
        return;
      default:
        throw new EvaluationError(
          { type: 'InvalidArgumentType', expected: 'macro/function', actual: valueToString(value) },
          this.stack,
        );
    }
  }

  private call(name: string): void {
    // Hold on to the function itself: it may re-register its own name mid-call
    const fn = this.functions.get(name);
    if (fn === undefined) {
      throw new EvaluationError({ type: 'UnknownFunction', name }, this.stack);
    }

    const backup = this.values.slice();
    this.trace(`call ${name}`);
    try {
      fn(this);
    } catch (e) {
      const failed = this.values;
      this.values = backup;
      this.trace(`rollback ${name}: ${e instanceof Error ? e.message : String(e)}`);
      if (e instanceof CairnError) {
        throw new EvaluationError(e.kind, failed);
      }
      throw e;
    }
  }

  private execBlock(block: CairnBlock): void {
    try {
      this.evaluate(block.body);
    } catch (e) {
      // no extra layer: the block reports what failed inside it
      if (e instanceof EvaluationError) {
        throw new EvaluationError(e.kind, e.failedStack);
      }
      throw e;
    }
  }

  // ─── Stack accessors ────────────────────────────────────

  /** A copy of the stack, bottom first. */
  get stack(): CairnValue[] {
    return this.values.slice();
  }

  get depth(): number {
    return this.values.length;
  }

  /** Values from plugins may be plain objects; they are frozen on the way in. */
  push(value: CairnValue): void {
    this.values.push(Object.freeze(value));
  }

  pop(): CairnValue {
    const value = this.values.pop();
    if (value === undefined) {
      throw new CairnError({ type: 'NotEnoughArguments' });
    }
    return value;
  }

  popNumber(): number {
    const value = this.pop();
    if (value.kind !== 'number') throw this.typeError('number', value);
    return value.value;
  }

  popString(): string {
    const value = this.pop();
    if (value.kind !== 'string') throw this.typeError('string', value);
    return value.value;
  }

  popMacro(): readonly CairnValue[] {
    const value = this.pop();
    if (value.kind !== 'block') throw this.typeError('macro', value);
    return value.body;
  }

  /** Pop and coerce: "" and 0 are false, other strings and numbers true. */
  popBoolean(): boolean {
    const value = this.pop();
    switch (value.kind) {
      case 'string': return value.value !== '';
      case 'number': return value.value !== 0;
      case 'boolean': return value.value;
      default:
        throw new CairnError({ type: 'InvalidBoolean', value });
    }
  }

  /** Value at depth `index`, 0 being the top. */
  peekAt(index: number): CairnValue {
    return this.values[this.slot(index)];
  }

  setAt(index: number, value: CairnValue): void {
    this.values[this.slot(index)] = Object.freeze(value);
  }

  clear(): void {
    this.values = [];
  }

  private slot(index: number): number {
    const length = this.values.length;
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new CairnError({ type: 'OutOfBounds', index, length });
    }
    return length - 1 - index;
  }

  private typeError(expected: string, actual: CairnValue): CairnError {
    const kind: ErrorKind = { type: 'InvalidArgumentType', expected, actual: valueToString(actual) };
    return new CairnError(kind);
  }

  // ─── Output & tracing ───────────────────────────────────

  emit(text: string): void {
    this.sink(text);
  }

  trace(message: string): void {
    if (!this.traceEnabled) return;
    this.traceEntries.push(`[${Date.now() - this.startTime}ms] ${message}`);
    this.traceSink(`  [trace] ${message}`);
  }

  traceLog(): readonly string[] {
    return this.traceEntries;
  }
}
