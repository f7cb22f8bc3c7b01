import * as fs from 'fs';
import * as path from 'path';
import { Engine, NativeFunction } from './engine';

/** A function a plugin contributes, with its optional operator alias. */
export interface FunctionDefinition {
  alias?: string;
  description?: string;
  fn: NativeFunction;
}

/**
 * CairnPlugin — the unit the standard library and user extensions ship in.
 *
 * A plugin is a table of named functions plus an optional prelude of Cairn
 * source that runs once the functions are registered, so a plugin can
 * define part of itself in the language.
 *
 * Example plugin:
 * ```ts
 * import { CairnPlugin, cairnString } from 'cairn-lang';
 *
 * const plugin: CairnPlugin = {
 *   name: 'greeter',
 *   functions: {
 *     greet: {
 *       alias: 'G',
 *       description: 'Greet the name on top of the stack.',
 *       fn(engine) {
 *         engine.push(cairnString(`hello, ${engine.popString()}`));
 *       },
 *     },
 *   },
 *   prelude: '{[greet] x [print] x} "welcome" #',
 * };
 *
 * export default plugin;
 * ```
 */
export interface CairnPlugin {
  name: string;
  description?: string;
  functions: Record<string, FunctionDefinition>;
  prelude?: string;
}

export class PluginError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PluginError';
  }
}

/** Register every function of `plugin`, then run its prelude. */
export function installPlugin(engine: Engine, plugin: CairnPlugin): void {
  for (const [name, definition] of Object.entries(plugin.functions)) {
    engine.register(definition.alias ?? null, name, definition.fn);
  }
  if (plugin.prelude) {
    engine.run(plugin.prelude);
  }
  engine.trace(`Loaded plugin "${plugin.name}" (${Object.keys(plugin.functions).length} functions)`);
}

/**
 * Resolve a plugin name to a file.
 *
 * Search order, in `<baseDir>/plugins` and then each CAIRN_PLUGIN_PATH directory:
 * 1. <name>.js
 * 2. <name>/index.js
 * 3. <name>.cairn
 * 4. <name>/index.cairn
 */
export function resolvePluginPath(name: string, baseDir: string): string | null {
  const searchDirs: string[] = [path.resolve(baseDir, 'plugins')];

  const pluginPath = process.env.CAIRN_PLUGIN_PATH;
  if (pluginPath) {
    for (const dir of pluginPath.split(path.delimiter)) {
      if (dir) searchDirs.push(path.resolve(dir));
    }
  }

  for (const dir of searchDirs) {
    const candidates = [
      path.resolve(dir, `${name}.js`),
      path.resolve(dir, name, 'index.js'),
      path.resolve(dir, `${name}.cairn`),
      path.resolve(dir, name, 'index.cairn'),
    ];
    for (const candidate of candidates) {
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

/**
 * Find and load a plugin. JS modules must export a CairnPlugin (as default
 * export or as module.exports); .cairn files are run against the engine.
 * Returns the plugin, or null for a .cairn script.
 */
export function loadPlugin(engine: Engine, name: string, baseDir: string): CairnPlugin | null {
  const resolved = resolvePluginPath(name, baseDir);
  if (!resolved) {
    throw new PluginError(
      `Plugin "${name}" not found. Searched in plugins/ directory and CAIRN_PLUGIN_PATH.`,
    );
  }

  if (resolved.endsWith('.cairn')) {
    const source = fs.readFileSync(resolved, 'utf-8');
    try {
      engine.run(source);
    } catch (e) {
      throw new PluginError(`Plugin "${name}" failed: ${e instanceof Error ? e.message : String(e)}`);
    }
    engine.trace(`Loaded plugin "${name}" from ${resolved}`);
    return null;
  }

  let exported: unknown;
  try {
    exported = require(resolved);
  } catch (e) {
    throw new PluginError(`Failed to load plugin "${name}": ${e instanceof Error ? e.message : String(e)}`);
  }

  const candidate = isRecord(exported) && 'default' in exported ? exported.default : exported;
  const plugin = toPlugin(candidate);
  if (!plugin) {
    throw new PluginError(`Plugin "${name}" does not export a valid CairnPlugin (missing functions).`);
  }

  try {
    installPlugin(engine, plugin);
  } catch (e) {
    throw new PluginError(`Plugin "${name}" setup failed: ${e instanceof Error ? e.message : String(e)}`);
  }
  return plugin;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Validate a module export field by field; null when it is not a plugin. */
function toPlugin(value: unknown): CairnPlugin | null {
  if (!isRecord(value)) return null;
  const { name, description, functions: table, prelude } = value;
  if (typeof name !== 'string' || !isRecord(table)) return null;

  const functions: Record<string, FunctionDefinition> = {};
  for (const [fnName, entry] of Object.entries(table)) {
    if (!isRecord(entry)) return null;
    const impl = entry.fn;
    const alias = typeof entry.alias === 'string' ? entry.alias : undefined;
    if (typeof impl !== 'function') return null;
    if (entry.alias !== undefined && alias === undefined) return null;
    functions[fnName] = {
      alias,
      description: typeof entry.description === 'string' ? entry.description : undefined,
      fn: engine => {
        Reflect.apply(impl, undefined, [engine]);
      },
    };
  }

  return {
    name,
    description: typeof description === 'string' ? description : undefined,
    functions,
    prelude: typeof prelude === 'string' ? prelude : undefined,
  };
}
