/**
 * Stack rendering for the REPL and the command line.
 *
 * `human` draws coloured, width-aware cells with their depth underneath;
 * the other modes are meant for pipes and scripts.
 */

import { CairnValue, valueToString } from './values';
import { EvaluationError } from './errors';

export const OUTPUT_MODES = ['human', 'simple', 'machine', 'quiet'] as const;
export type OutputMode = (typeof OUTPUT_MODES)[number];

/** What the renderer needs from an engine. */
export interface StackView {
  readonly stack: readonly CairnValue[];
  hasFunction(name: string): boolean;
}

const CELL_WIDTH = 11;

// \x1b[90m is "bright black", i.e. grey
const ANSI = {
  reset: '\x1b[0m',
  grey: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  brightWhite: '\x1b[97m',
};

/** Human output on a terminal, plain values when piped. */
export function autoOutputMode(stream: { isTTY?: boolean } = process.stdout): OutputMode {
  return stream.isTTY ? 'human' : 'simple';
}

export function terminalWidth(stream: { columns?: number } = process.stdout): number {
  return stream.columns ?? 80;
}

/** The lines that show `view`'s stack in `mode`. */
export function formatStack(view: StackView, mode: OutputMode, width: number): string[] {
  const stack = view.stack;
  switch (mode) {
    case 'human':
      return formatHuman(view, width);
    case 'simple':
      return [stack.map(valueToString).join(' ')];
    case 'machine':
      return [valuesToJson(stack)];
    case 'quiet':
      return [];
  }
}

/**
 * One line of JSON for a value sequence. JSON has no Infinity, NaN or -0;
 * those numbers are written as strings the number reader accepts
 * ("Infinity", "-Infinity", "NaN", "-0").
 */
export function valuesToJson(values: readonly CairnValue[]): string {
  return JSON.stringify(values, preserveNumbers);
}

function preserveNumbers(_key: string, value: unknown): unknown {
  if (typeof value !== 'number') return value;
  if (Object.is(value, -0)) return '-0';
  return Number.isFinite(value) ? value : String(value);
}

function formatHuman(view: StackView, width: number): string[] {
  const stack = view.stack;
  if (stack.length === 0) {
    return ['(empty stack)'];
  }

  let cells = '';
  let cellsWidth = 0;
  let indices = ANSI.grey;

  // Top of the stack comes first
  for (let depth = 0; depth < stack.length; depth++) {
    const value = stack[stack.length - 1 - depth];
    const text = valueToString(value).padStart(CELL_WIDTH);
    const cellWidth = text.length + 2;

    if (cellsWidth + cellWidth + 1 >= width) {
      cells += ' »';
      break;
    }

    cells += `${ANSI.grey}[${ANSI.reset}${colorFor(view, value)}${text}${ANSI.reset}${ANSI.grey}]${ANSI.reset}`;
    cellsWidth += cellWidth;
    indices += String(depth).padStart(cellWidth);
  }

  return [cells, indices + ANSI.reset];
}

function colorFor(view: StackView, value: CairnValue): string {
  switch (value.kind) {
    case 'string': return ANSI.cyan;
    case 'number': return ANSI.brightWhite;
    case 'function': return view.hasFunction(value.name) ? ANSI.white : ANSI.red;
    case 'boolean': return ANSI.yellow;
    default: return ANSI.white;
  }
}

/**
 * Lines reporting a failed parse or evaluation. For evaluation errors the
 * stack the failing call left behind is shown too; the live stack has
 * already been rolled back.
 */
export function describeFailure(error: unknown): string[] {
  if (!(error instanceof Error)) {
    return [`error: ${String(error)}`];
  }
  const lines = [`error: ${error.message}`];
  if (error instanceof EvaluationError && error.failedStack.length > 0) {
    lines.push(`stack at failure: ${error.failedStack.map(valueToString).join(' ')}`);
  }
  return lines;
}
