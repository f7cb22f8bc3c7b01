import {
  CairnValue,
  cairnString,
  cairnNumber,
  cairnFunctionRef,
  cairnBlock,
  cairnOperator,
  cairnBoolean,
} from '../runtime/values';
import { ParseError } from '../runtime/errors';

/** Anything that can answer "is this character a registered alias?". */
export interface OperatorTable {
  has(symbol: string): boolean;
}

export interface ReadResult {
  /** Code-point offset where reading stopped (input length, or a stray `}`). */
  cursor: number;
  tokens: CairnValue[];
}

const FLOAT_LITERAL = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i;

/**
 * Parse the text of a number literal. Underscores are separators and are
 * dropped; returns null when what is left is not a float.
 */
export function parseNumberLiteral(raw: string): number | null {
  const text = raw.replace(/_/g, '');
  if (!FLOAT_LITERAL.test(text)) return null;

  const negative = text.startsWith('-');
  const unsigned = text.replace(/^[+-]/, '').toLowerCase();
  if (unsigned === 'inf' || unsigned === 'infinity') {
    return negative ? -Infinity : Infinity;
  }
  if (unsigned === 'nan') return NaN;
  return Number(text);
}

/**
 * Single-pass recursive-descent reader. There is no separate lexing phase:
 * whether a character is an operator depends on the alias table at the
 * moment of reading.
 */
export class Reader {
  private readonly chars: string[];

  constructor(
    source: string,
    private readonly operators: OperatorTable,
  ) {
    // Index by code point, not UTF-16 unit, so offsets survive non-ASCII input
    this.chars = Array.from(source);
  }

  read(): ReadResult {
    return this.readFrom(0);
  }

  private readFrom(start: number): ReadResult {
    const tokens: CairnValue[] = [];
    let pos = start;

    while (pos < this.chars.length) {
      const ch = this.chars[pos];

      if (this.isNumberChar(ch)) {
        const end = this.scan(pos, c => !this.isNumberChar(c));
        tokens.push(this.readNumber(this.text(pos, end), end));
        pos = end;
        continue;
      }

      switch (ch) {
        case '(': {
          const end = this.scan(pos + 1, c => c === ')');
          const raw = this.text(pos + 1, end);
          pos = end + 1;
          tokens.push(this.readNumber(raw, pos));
          break;
        }

        case '"': {
          const end = this.scan(pos + 1, c => c === '"');
          tokens.push(cairnString(this.text(pos + 1, end)));
          pos = end + 1;
          break;
        }

        case '[': {
          const end = this.scan(pos + 1, c => c === ']');
          tokens.push(cairnFunctionRef(this.text(pos + 1, end)));
          pos = end + 1;
          break;
        }

        case '{': {
          const inner = this.readFrom(pos + 1);
          tokens.push(cairnBlock(inner.tokens));
          // skip the closing brace, or the next round stops here too
          pos = inner.cursor + 1;
          break;
        }

        case '}':
          return { cursor: pos, tokens };

        case ' ':
        case '\t':
        case '\n':
          pos++;
          break;

        // Comments run to the next backslash or newline, whichever is first
        case '\\':
          pos = this.scan(pos + 1, c => c === '\n' || c === '\\') + 1;
          break;

        case 'T':
          tokens.push(cairnBoolean(true));
          pos++;
          break;

        case 'F':
          tokens.push(cairnBoolean(false));
          pos++;
          break;

        default:
          if (!this.operators.has(ch)) {
            throw new ParseError({ type: 'UnknownFunction', name: `'${ch}'` }, pos);
          }
          tokens.push(cairnOperator(ch));
          pos++;
      }
    }

    return { cursor: Math.min(pos, this.chars.length), tokens };
  }

  /** Index of the first character at or after `from` matching `until`, or the input length. */
  private scan(from: number, until: (ch: string) => boolean): number {
    let pos = from;
    while (pos < this.chars.length && !until(this.chars[pos])) {
      pos++;
    }
    return pos;
  }

  private text(from: number, to: number): string {
    return this.chars.slice(from, to).join('');
  }

  private readNumber(raw: string, offset: number): CairnValue {
    const value = parseNumberLiteral(raw);
    if (value === null) {
      throw new ParseError({ type: 'InvalidNumberLit', text: raw }, offset);
    }
    return cairnNumber(value);
  }

  private isNumberChar(ch: string): boolean {
    return (ch >= '0' && ch <= '9') || ch === '.' || ch === '_';
  }
}

/** Read `source` against an operator table. */
export function parse(source: string, operators: OperatorTable): ReadResult {
  return new Reader(source, operators).read();
}
