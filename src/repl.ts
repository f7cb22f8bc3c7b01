import * as readline from 'readline';
import { Engine } from './runtime/engine';
import { ParseError } from './runtime/errors';
import { OutputMode, formatStack, describeFailure, terminalWidth } from './runtime/output';

export const DEFAULT_PROMPT = 'cairn> ';

export interface ReplOptions {
  engine: Engine;
  mode: OutputMode;
  prompt?: string;
  input?: NodeJS.ReadableStream;
  /** Human output is cut to `columns` when the stream has them. */
  output?: NodeJS.WritableStream & { columns?: number };
}

/**
 * Parse and evaluate one line of input, returning what to print.
 * The stack is shown after evaluation errors too: it has been rolled
 * back to where the failing call started.
 */
export function evaluateLine(engine: Engine, line: string, mode: OutputMode, width: number): string[] {
  const lines: string[] = [];
  try {
    engine.run(line);
  } catch (e) {
    lines.push(...describeFailure(e));
    // nothing ran, so there is no new stack to show
    if (e instanceof ParseError) return lines;
  }
  lines.push(...formatStack(engine, mode, width));
  return lines;
}

/**
 * Tab completion for function names: completes the text after the last
 * unclosed `[` against the registered names.
 */
export function completeFunctionName(engine: Engine, line: string): [string[], string] {
  const open = line.lastIndexOf('[');
  if (open === -1 || line.includes(']', open)) {
    return [[], line];
  }
  const prefix = line.slice(open + 1);
  const hits = engine.functionNames().filter(name => name.startsWith(prefix)).sort();
  return [hits, prefix];
}

/** Interactive loop. Resolves when input ends (Ctrl-D). */
export function startRepl(options: ReplOptions): Promise<void> {
  const { engine, mode } = options;
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  const rl = readline.createInterface({
    input,
    output,
    prompt: options.prompt ?? DEFAULT_PROMPT,
    completer: (line: string) => completeFunctionName(engine, line),
  });

  return new Promise(resolve => {
    rl.on('line', line => {
      for (const text of evaluateLine(engine, line, mode, terminalWidth(output))) {
        output.write(`${text}\n`);
      }
      rl.prompt();
    });

    rl.on('SIGINT', () => {
      output.write('\nUse Ctrl-D to quit.\n');
      rl.prompt();
    });

    rl.on('close', () => resolve());

    rl.prompt();
  });
}
