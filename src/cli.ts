#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Engine } from './runtime/engine';
import { CairnPlugin, installPlugin, loadPlugin } from './runtime/plugin';
import { corePlugin } from './runtime/stdlib';
import { loadConfig, applyEnvironment, isOutputMode, LoadedConfig, CairnConfig } from './runtime/config';
import {
  OUTPUT_MODES,
  autoOutputMode,
  describeFailure,
  formatStack,
  terminalWidth,
  valuesToJson,
} from './runtime/output';
import { startRepl } from './repl';

const USAGE = `
cairn - a small stack-based scripting language

Usage:
  cairn                        Start the interactive prompt
  cairn <code>                 Run <code> and print the stack
  cairn --file <file.cairn>    Run a script file and print the stack
  cairn --parse <code>         Print the token stream as JSON instead of running
  cairn --list                 List registered functions and their operators
  cairn --help                 Show this help message

Options:
  -f, --file <path>            Script to run
  --output <mode>              Stack display: ${OUTPUT_MODES.join(', ')} (default: human on a terminal, simple otherwise)
  --plugin <name>              Load plugins/<name>.js or plugins/<name>.cairn (repeatable)
  --config <path>              Path to cairn.config.json (auto-detected by default)
  --trace                      Log every function call and rollback

Examples:
  cairn '1 2+'
  cairn '{d*} "sq" #  7[sq]x'
  cairn --output machine --file script.cairn

Environment Variables:
  CAIRN_OUTPUT        Default output mode (overridden by --output)
  CAIRN_TRACE         Set to "1" to enable tracing
  CAIRN_PLUGIN_PATH   Extra plugin directories, separated like PATH
`;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const consoleIO: CliIO = {
  stdout: text => console.log(text),
  stderr: text => console.error(text),
};

const FLAGS_WITH_VALUES = new Set(['--file', '-f', '--output', '--config', '--plugin']);
const FLAGS = new Set([...FLAGS_WITH_VALUES, '--parse', '--list', '--trace', '--help', '-h']);

function getArg(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx !== -1 && idx + 1 < args.length) {
      return args[idx + 1];
    }
  }
  return undefined;
}

function getAllArgs(args: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length - 1; i++) {
    if (args[i] === flag) values.push(args[i + 1]);
  }
  return values;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Config file plus environment, or null after reporting why it failed. */
function readSettings(configPath: string | undefined, io: CliIO): { config: CairnConfig; baseDir: string } | null {
  try {
    const loaded: LoadedConfig = loadConfig(configPath);
    return { config: applyEnvironment(loaded.config), baseDir: loaded.baseDir };
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}`);
    return null;
  }
}

/**
 * One row per registered function: operator, name, description.
 */
export function listFunctions(engine: Engine, plugins: readonly CairnPlugin[]): string[] {
  const descriptions = new Map<string, string>();
  for (const plugin of plugins) {
    for (const [name, definition] of Object.entries(plugin.functions)) {
      if (definition.description) descriptions.set(name, definition.description);
    }
  }

  const aliases = new Map<string, string>();
  for (const [symbol, name] of engine.operatorEntries()) {
    aliases.set(name, symbol);
  }

  const names = engine.functionNames().sort();
  const nameWidth = Math.max(0, ...names.map(name => name.length));
  return names.map(name =>
    `  ${aliases.get(name) ?? ' '}  ${name.padEnd(nameWidth)}  ${descriptions.get(name) ?? ''}`.trimEnd(),
  );
}

/**
 * Run the command line. Returns the exit code.
 */
export async function main(args: string[], io: CliIO = consoleIO): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    io.stdout(USAGE);
    return 0;
  }

  // Anything that isn't a flag or a flag's value is code to run
  const code: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (FLAGS.has(args[i])) {
      if (FLAGS_WITH_VALUES.has(args[i])) i++;
      continue;
    }
    if (args[i].startsWith('--')) {
      io.stderr(`Error: Unknown option "${args[i]}". Run "cairn --help" for usage.`);
      return 1;
    }
    code.push(args[i]);
  }

  const settings = readSettings(getArg(args, '--config'), io);
  if (!settings) return 1;
  const { config, baseDir: configDir } = settings;

  const outputFlag = getArg(args, '--output');
  if (outputFlag !== undefined && !isOutputMode(outputFlag)) {
    io.stderr(`Error: Unknown output mode "${outputFlag}". Use one of ${OUTPUT_MODES.join(', ')}.`);
    return 1;
  }
  const mode = outputFlag ?? config.output ?? autoOutputMode();
  const trace = args.includes('--trace') || (config.trace ?? false);

  const engine = new Engine({ trace, emit: io.stdout, onTrace: io.stderr });
  const plugins: CairnPlugin[] = [corePlugin];
  installPlugin(engine, corePlugin);

  try {
    const requested = [
      ...(config.plugins ?? []).map(name => ({ name, baseDir: configDir })),
      ...getAllArgs(args, '--plugin').map(name => ({ name, baseDir: process.cwd() })),
    ];
    for (const { name, baseDir } of requested) {
      const plugin = loadPlugin(engine, name, baseDir);
      if (plugin) plugins.push(plugin);
    }
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}`);
    return 1;
  }

  if (args.includes('--list')) {
    for (const line of listFunctions(engine, plugins)) io.stdout(line);
    return 0;
  }

  let source: string | undefined;
  const file = getArg(args, '--file', '-f');
  if (file !== undefined) {
    const filePath = path.resolve(file);
    if (!fs.existsSync(filePath)) {
      io.stderr(`Error: File not found: ${filePath}`);
      return 1;
    }
    source = fs.readFileSync(filePath, 'utf-8');
  } else if (code.length > 0) {
    source = code.join(' ');
  }

  if (source === undefined) {
    await startRepl({ engine, mode, prompt: config.prompt });
    return 0;
  }

  // Parse-only mode
  if (args.includes('--parse')) {
    try {
      io.stdout(valuesToJson(engine.parse(source).tokens));
      return 0;
    } catch (e) {
      for (const line of describeFailure(e)) io.stderr(line);
      return 1;
    }
  }

  try {
    engine.run(source);
  } catch (e) {
    for (const line of describeFailure(e)) io.stderr(line);
    return 1;
  }

  for (const line of formatStack(engine, mode, terminalWidth())) io.stdout(line);
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(`Error: ${errorMessage(e)}`);
      process.exitCode = 1;
    },
  );
}
