export { Reader, parse, parseNumberLiteral, OperatorTable, ReadResult } from './parser/reader';
export { Engine, EngineOptions, NativeFunction } from './runtime/engine';
export {
  ErrorKind,
  CairnError,
  ParseError,
  EvaluationError,
  describeErrorKind,
} from './runtime/errors';
export {
  CairnValue,
  CairnString,
  CairnNumber,
  CairnFunctionRef,
  CairnBlock,
  CairnOperator,
  CairnBoolean,
  cairnString,
  cairnNumber,
  cairnFunctionRef,
  cairnBlock,
  cairnOperator,
  cairnBoolean,
  typeName,
  valueToString,
  valueToSource,
  valueToDisplay,
  valuesEqual,
} from './runtime/values';
export {
  CairnPlugin,
  FunctionDefinition,
  PluginError,
  installPlugin,
  loadPlugin,
  resolvePluginPath,
} from './runtime/plugin';
export { corePlugin } from './runtime/stdlib';
export { CairnConfig, LoadedConfig, loadConfig, applyEnvironment } from './runtime/config';
export {
  OutputMode,
  OUTPUT_MODES,
  StackView,
  autoOutputMode,
  formatStack,
  describeFailure,
} from './runtime/output';
export { startRepl, evaluateLine, completeFunctionName } from './repl';

import { Engine, EngineOptions } from './runtime/engine';
import { installPlugin } from './runtime/plugin';
import { corePlugin } from './runtime/stdlib';
import { CairnValue } from './runtime/values';

/**
 * An engine with the core library installed.
 */
export function createEngine(options: EngineOptions = {}): Engine {
  const engine = new Engine(options);
  installPlugin(engine, corePlugin);
  return engine;
}

/**
 * Run a Cairn source string on a fresh engine and return its stack.
 */
export function execute(source: string, options?: EngineOptions): CairnValue[] {
  const engine = createEngine(options);
  engine.run(source);
  return engine.stack;
}
