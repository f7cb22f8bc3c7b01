/**
 * The core library: arithmetic, stack shuffling, control flow, strings,
 * printing and registry manipulation. Loaded into every engine the CLI and
 * `createEngine()` build.
 */

import { Engine } from './engine';
import { CairnError } from './errors';
import { CairnPlugin, FunctionDefinition } from './plugin';
import { parseNumberLiteral } from '../parser/reader';
import {
  CairnValue,
  cairnString,
  cairnNumber,
  cairnBoolean,
  cairnBlock,
  valueToString,
  valueToDisplay,
  valuesEqual,
} from './values';

function binary(alias: string, description: string, op: (a: number, b: number) => number): FunctionDefinition {
  return {
    alias,
    description,
    fn(engine) {
      const b = engine.popNumber();
      const a = engine.popNumber();
      engine.push(cairnNumber(op(a, b)));
    },
  };
}

function comparison(alias: string, description: string, op: (a: number, b: number) => boolean): FunctionDefinition {
  return {
    alias,
    description,
    fn(engine) {
      const b = engine.popNumber();
      const a = engine.popNumber();
      engine.push(cairnBoolean(op(a, b)));
    },
  };
}

function invokeMacro(engine: Engine, body: readonly CairnValue[]): void {
  engine.invoke(cairnBlock(body));
}

export const corePlugin: CairnPlugin = {
  name: 'core',
  description: 'Arithmetic, stack shuffling, control flow and registry words.',
  functions: {
    // Arithmetic
    add: binary('+', 'Add two numbers.', (a, b) => a + b),
    sub: binary('-', 'Subtract the top number from the one below.', (a, b) => a - b),
    mul: binary('*', 'Multiply two numbers.', (a, b) => a * b),
    div: binary('/', 'Divide the second number by the top one.', (a, b) => a / b),
    mod: binary('%', 'Remainder of the second number divided by the top one.', (a, b) => a % b),
    pow: binary('^', 'Raise the second number to the power of the top one.', (a, b) => a ** b),
    neg: {
      alias: '~',
      description: 'Negate a number.',
      fn(engine) {
        engine.push(cairnNumber(-engine.popNumber()));
      },
    },

    // Stack
    dup: {
      alias: 'd',
      description: 'Duplicate the top value.',
      fn(engine) {
        const a = engine.pop();
        engine.push(a);
        engine.push(a);
      },
    },
    drop: {
      alias: 'k',
      description: 'Discard the top value.',
      fn(engine) {
        engine.pop();
      },
    },
    swap: {
      alias: 's',
      description: 'Exchange the two top values.',
      fn(engine) {
        const b = engine.pop();
        const a = engine.pop();
        engine.push(b);
        engine.push(a);
      },
    },
    over: {
      alias: 'o',
      description: 'Copy the second value to the top.',
      fn(engine) {
        engine.push(engine.peekAt(1));
      },
    },
    rot: {
      alias: 'r',
      description: 'Move the third value to the top.',
      fn(engine) {
        const c = engine.pop();
        const b = engine.pop();
        const a = engine.pop();
        engine.push(b);
        engine.push(c);
        engine.push(a);
      },
    },
    size: {
      alias: 'z',
      description: 'Push the number of values on the stack.',
      fn(engine) {
        engine.push(cairnNumber(engine.depth));
      },
    },
    pick: {
      alias: 'g',
      description: 'Pop n, then copy the value at depth n to the top.',
      fn(engine) {
        const n = engine.popNumber();
        engine.push(engine.peekAt(n));
      },
    },
    put: {
      alias: '$',
      description: 'Pop n and a value, then store the value at depth n.',
      fn(engine) {
        const n = engine.popNumber();
        const value = engine.pop();
        engine.setAt(n, value);
      },
    },
    clear: {
      description: 'Empty the stack.',
      fn(engine) {
        engine.clear();
      },
    },

    // Control flow
    exec: {
      alias: 'x',
      description: 'Pop a function reference or macro and run it.',
      fn(engine) {
        engine.invoke(engine.pop());
      },
    },
    when: {
      alias: '?',
      description: 'Pop a macro and a condition; run the macro if the condition holds.',
      fn(engine) {
        const body = engine.popMacro();
        if (engine.popBoolean()) invokeMacro(engine, body);
      },
    },
    if: {
      alias: ':',
      description: 'Pop an else macro, a then macro and a condition; run one of them.',
      fn(engine) {
        const otherwise = engine.popMacro();
        const then = engine.popMacro();
        invokeMacro(engine, engine.popBoolean() ? then : otherwise);
      },
    },
    times: {
      alias: 't',
      description: 'Pop a macro and a count; run the macro that many times.',
      fn(engine) {
        const body = engine.popMacro();
        const count = Math.trunc(engine.popNumber());
        for (let i = 0; i < count; i++) {
          invokeMacro(engine, body);
        }
      },
    },
    while: {
      alias: 'w',
      description: 'Pop a body and a condition macro; run the body while the condition leaves a true value.',
      fn(engine) {
        const body = engine.popMacro();
        const condition = engine.popMacro();
        for (;;) {
          invokeMacro(engine, condition);
          if (!engine.popBoolean()) break;
          invokeMacro(engine, body);
        }
      },
    },

    // Logic
    eq: {
      alias: '=',
      description: 'Push whether the two top values are equal.',
      fn(engine) {
        const b = engine.pop();
        const a = engine.pop();
        engine.push(cairnBoolean(valuesEqual(a, b)));
      },
    },
    lt: comparison('<', 'Push whether the second number is less than the top one.', (a, b) => a < b),
    gt: comparison('>', 'Push whether the second number is greater than the top one.', (a, b) => a > b),
    not: {
      alias: '!',
      description: 'Negate a truth value.',
      fn(engine) {
        engine.push(cairnBoolean(!engine.popBoolean()));
      },
    },
    and: {
      alias: '&',
      description: 'Push whether both top values are true.',
      fn(engine) {
        const b = engine.popBoolean();
        const a = engine.popBoolean();
        engine.push(cairnBoolean(a && b));
      },
    },
    or: {
      alias: '|',
      description: 'Push whether either top value is true.',
      fn(engine) {
        const b = engine.popBoolean();
        const a = engine.popBoolean();
        engine.push(cairnBoolean(a || b));
      },
    },

    // Strings
    concat: {
      alias: ',',
      description: 'Join two strings.',
      fn(engine) {
        const b = engine.popString();
        const a = engine.popString();
        engine.push(cairnString(a + b));
      },
    },
    len: {
      description: 'Push the length of a string in characters.',
      fn(engine) {
        engine.push(cairnNumber(Array.from(engine.popString()).length));
      },
    },
    str: {
      description: 'Convert the top value to its printed form.',
      fn(engine) {
        engine.push(cairnString(valueToDisplay(engine.pop())));
      },
    },
    num: {
      description: 'Parse a string as a number.',
      fn(engine) {
        const text = engine.popString();
        const value = parseNumberLiteral(text);
        if (value === null) {
          throw new CairnError({ type: 'InvalidNumberLit', text });
        }
        engine.push(cairnNumber(value));
      },
    },
    print: {
      alias: 'p',
      description: 'Pop a value and print it.',
      fn(engine) {
        engine.emit(valueToDisplay(engine.pop()));
      },
    },

    // Registry
    define: {
      alias: '#',
      description: 'Pop a name and a macro; register the macro as a function under that name.',
      fn(engine) {
        const name = engine.popString();
        const body = engine.popMacro();
        engine.register(null, name, self => invokeMacro(self, body));
      },
    },
    alias: {
      alias: '@',
      description: 'Pop a character and a function name; bind the character as an operator.',
      fn(engine) {
        const symbol = engine.popString();
        const name = engine.popString();
        if (Array.from(symbol).length !== 1) {
          throw new CairnError({
            type: 'InvalidArgumentType',
            expected: 'single character',
            actual: valueToString(cairnString(symbol)),
          });
        }
        engine.bindOperator(symbol, name);
      },
    },
  },
  prelude: '{d*} "sq" #  {1+} "inc" #  {1-} "dec" #',
};
