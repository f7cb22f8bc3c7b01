/**
 * Configuration loader for Cairn.
 *
 * Loads cairn.config.json from the working directory or a specified path.
 * Provides the output mode, tracing and the plugins to load at startup.
 */

import * as fs from 'fs';
import * as path from 'path';
import { OutputMode, OUTPUT_MODES } from './output';

export interface CairnConfig {
  output?: OutputMode;
  trace?: boolean;
  /** Plugin names, resolved against the config file's directory. */
  plugins?: string[];
  prompt?: string;
}

export interface LoadedConfig {
  config: CairnConfig;
  /** Directory plugins are resolved from: the config file's, or cwd. */
  baseDir: string;
}

const CONFIG_FILENAMES = ['cairn.config.json', '.cairnrc.json'];

/**
 * Load Cairn configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. cairn.config.json in cwd
 * 3. .cairnrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): LoadedConfig {
  if (explicitPath) {
    const filePath = path.resolve(explicitPath);
    return { config: readConfigFile(filePath), baseDir: path.dirname(filePath) };
  }

  const cwd = process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(cwd, filename);
    if (fs.existsSync(filePath)) {
      return { config: readConfigFile(filePath), baseDir: cwd };
    }
  }

  return { config: {}, baseDir: cwd };
}

/**
 * Overlay CAIRN_OUTPUT and CAIRN_TRACE on a loaded config.
 */
export function applyEnvironment(config: CairnConfig, env: NodeJS.ProcessEnv = process.env): CairnConfig {
  const result: CairnConfig = { ...config };

  const output = env.CAIRN_OUTPUT;
  if (output) {
    if (!isOutputMode(output)) {
      throw new Error(`Invalid CAIRN_OUTPUT "${output}": expected one of ${OUTPUT_MODES.join(', ')}`);
    }
    result.output = output;
  }
  if (env.CAIRN_TRACE === '1') {
    result.trace = true;
  }

  return result;
}

export function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some(mode => mode === value);
}

function readConfigFile(filePath: string): CairnConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(parsed, filePath);
}

/**
 * Validate config structure. Throws on invalid config.
 */
function validateConfig(value: unknown, filePath: string): CairnConfig {
  if (!isPlainObject(value)) {
    throw new Error(`Invalid config in ${filePath}: must be an object`);
  }

  const config: CairnConfig = {};
  const { output, trace, plugins, prompt } = value;

  if (output !== undefined) {
    if (typeof output !== 'string' || !isOutputMode(output)) {
      throw new Error(`Invalid "output" in ${filePath}: must be one of ${OUTPUT_MODES.join(', ')}`);
    }
    config.output = output;
  }

  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
    }
    config.trace = trace;
  }

  if (plugins !== undefined) {
    if (!Array.isArray(plugins) || !plugins.every((p): p is string => typeof p === 'string')) {
      throw new Error(`Invalid "plugins" in ${filePath}: must be an array of strings`);
    }
    config.plugins = plugins;
  }

  if (prompt !== undefined) {
    if (typeof prompt !== 'string') {
      throw new Error(`Invalid "prompt" in ${filePath}: must be a string`);
    }
    config.prompt = prompt;
  }

  return config;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
