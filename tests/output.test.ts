import {
  autoOutputMode,
  describeFailure,
  formatStack,
  terminalWidth,
  StackView,
} from '../src/runtime/output';
import { EvaluationError, ParseError } from '../src/runtime/errors';
import { parseNumberLiteral } from '../src/parser/reader';
import {
  CairnValue,
  cairnString,
  cairnNumber,
  cairnFunctionRef,
  cairnOperator,
  cairnBoolean,
} from '../src/runtime/values';

const RESET = '\x1b[0m';
const GREY = '\x1b[90m';

function view(...stack: CairnValue[]): StackView {
  return { stack, hasFunction: name => name === 'known' };
}

function cell(color: string, text: string): string {
  return `${GREY}[${RESET}${color}${text.padStart(11)}${RESET}${GREY}]${RESET}`;
}

describe('Stack output', () => {
  describe('simple', () => {
    it('should print rendered values bottom first', () => {
      const stack = view(cairnNumber(1), cairnString('a'), cairnFunctionRef('f'));
      expect(formatStack(stack, 'simple', 80)).toEqual(['1 "a" <fn f>']);
    });

    it('should print an empty line for an empty stack', () => {
      expect(formatStack(view(), 'simple', 80)).toEqual(['']);
    });
  });

  describe('machine', () => {
    it('should print the stack as JSON', () => {
      expect(formatStack(view(cairnNumber(1), cairnBoolean(false)), 'machine', 80)).toEqual([
        '[{"kind":"number","value":1},{"kind":"boolean","value":false}]',
      ]);
    });

    it('should keep numbers JSON cannot hold', () => {
      const stack = view(cairnNumber(Infinity), cairnNumber(-Infinity), cairnNumber(NaN), cairnNumber(-0));
      expect(formatStack(stack, 'machine', 80)).toEqual([
        '[{"kind":"number","value":"Infinity"},{"kind":"number","value":"-Infinity"},' +
          '{"kind":"number","value":"NaN"},{"kind":"number","value":"-0"}]',
      ]);
    });

    it('should write those numbers so the reader takes them back', () => {
      const [line] = formatStack(view(cairnNumber(-Infinity), cairnNumber(-0)), 'machine', 80);
      const entries: { value: unknown }[] = JSON.parse(line);
      expect(entries.map(entry => parseNumberLiteral(String(entry.value)))).toEqual([-Infinity, -0]);
    });
  });

  describe('quiet', () => {
    it('should print nothing', () => {
      expect(formatStack(view(cairnNumber(1)), 'quiet', 80)).toEqual([]);
    });
  });

  describe('human', () => {
    it('should mark an empty stack', () => {
      expect(formatStack(view(), 'human', 80)).toEqual(['(empty stack)']);
    });

    it('should draw cells top first with their depth underneath', () => {
      const lines = formatStack(view(cairnNumber(1), cairnString('hi')), 'human', 80);
      expect(lines).toEqual([
        cell('\x1b[36m', '"hi"') + cell('\x1b[97m', '1'),
        GREY + '0'.padStart(13) + '1'.padStart(13) + RESET,
      ]);
    });

    it('should colour function references by whether they exist', () => {
      const lines = formatStack(
        view(cairnFunctionRef('missing'), cairnFunctionRef('known'), cairnOperator('+')),
        'human',
        80,
      );
      expect(lines[0]).toBe(
        cell('\x1b[37m', "<sym '+'>") + cell('\x1b[37m', '<fn known>') + cell('\x1b[31m', '<fn missing>'),
      );
    });

    it('should not pad values wider than a cell', () => {
      const lines = formatStack(view(cairnString('a longer string')), 'human', 80);
      expect(lines).toEqual([
        cell('\x1b[36m', '"a longer string"'),
        GREY + '0'.padStart(19) + RESET,
      ]);
    });

    it('should cut off at the terminal width', () => {
      const lines = formatStack(view(cairnNumber(1), cairnNumber(2), cairnNumber(3)), 'human', 30);
      expect(lines).toEqual([
        cell('\x1b[97m', '3') + cell('\x1b[97m', '2') + ' »',
        GREY + '0'.padStart(13) + '1'.padStart(13) + RESET,
      ]);
    });
  });

  describe('defaults', () => {
    it('should pick human output for terminals only', () => {
      expect(autoOutputMode({ isTTY: true })).toBe('human');
      expect(autoOutputMode({ isTTY: false })).toBe('simple');
      expect(autoOutputMode({})).toBe('simple');
    });

    it('should fall back to 80 columns', () => {
      expect(terminalWidth({ columns: 120 })).toBe(120);
      expect(terminalWidth({})).toBe(80);
    });
  });

  describe('describeFailure()', () => {
    it('should show the stack an evaluation error left', () => {
      const error = new EvaluationError(
        { type: 'NotEnoughArguments' },
        [cairnNumber(1), cairnString('a')],
        cairnOperator('+'),
      );
      expect(describeFailure(error)).toEqual([
        "error: NotEnoughArguments: not enough arguments on the stack (in <sym '+'>)",
        'stack at failure: 1 "a"',
      ]);
    });

    it('should leave out an empty failure stack', () => {
      const error = new EvaluationError({ type: 'NotEnoughArguments' }, []);
      expect(describeFailure(error)).toEqual(['error: NotEnoughArguments: not enough arguments on the stack']);
    });

    it('should report parse errors on one line', () => {
      const error = new ParseError({ type: 'InvalidNumberLit', text: '1.2.3' }, 5);
      expect(describeFailure(error)).toEqual([
        'error: InvalidNumberLit: invalid number literal "1.2.3" (at offset 5)',
      ]);
    });

    it('should report anything else', () => {
      expect(describeFailure(new Error('disk full'))).toEqual(['error: disk full']);
      expect(describeFailure('oops')).toEqual(['error: oops']);
    });
  });
});
