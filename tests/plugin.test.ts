import * as path from 'path';
import { createEngine } from '../src/index';
import { Engine } from '../src/runtime/engine';
import { EvaluationError } from '../src/runtime/errors';
import { CairnPlugin, PluginError, installPlugin, loadPlugin, resolvePluginPath } from '../src/runtime/plugin';
import { cairnString, cairnNumber } from '../src/runtime/values';

// The fixtures directory contains test plugins (plugins/ subdirectory)
const fixturesDir = path.resolve(__dirname, 'fixtures');

describe('Plugin system', () => {
  let engine: Engine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe('installPlugin()', () => {
    it('should register functions and their aliases', () => {
      const plugin: CairnPlugin = {
        name: 'triple',
        functions: {
          triple: {
            alias: 'Y',
            fn(self) {
              self.push(cairnNumber(self.popNumber() * 3));
            },
          },
        },
      };
      installPlugin(engine, plugin);
      engine.run('2Y');
      expect(engine.stack).toEqual([cairnNumber(6)]);
    });

    it('should run the prelude after the functions exist', () => {
      installPlugin(engine, {
        name: 'half',
        functions: {
          half: {
            fn(self) {
              self.push(cairnNumber(self.popNumber() / 2));
            },
          },
        },
        prelude: '{[half]x [half]x} "quarter" #',
      });
      engine.run('8[quarter]x');
      expect(engine.stack).toEqual([cairnNumber(2)]);
    });
  });

  describe('resolvePluginPath()', () => {
    it('should prefer a .js module over a .cairn script', () => {
      expect(resolvePluginPath('dual', fixturesDir)).toBe(path.join(fixturesDir, 'plugins', 'dual.js'));
    });

    it('should find a directory plugin through its index', () => {
      expect(resolvePluginPath('multi', fixturesDir)).toBe(
        path.join(fixturesDir, 'plugins', 'multi', 'index.cairn'),
      );
    });

    it('should return null when nothing matches', () => {
      expect(resolvePluginPath('nonexistent', fixturesDir)).toBeNull();
    });

    describe('with CAIRN_PLUGIN_PATH', () => {
      const saved = process.env.CAIRN_PLUGIN_PATH;

      afterEach(() => {
        if (saved === undefined) delete process.env.CAIRN_PLUGIN_PATH;
        else process.env.CAIRN_PLUGIN_PATH = saved;
      });

      it('should search the listed directories', () => {
        process.env.CAIRN_PLUGIN_PATH = path.join(fixturesDir, 'extra');
        expect(resolvePluginPath('extra', __dirname)).toBe(path.join(fixturesDir, 'extra', 'extra.cairn'));
      });
    });
  });

  describe('loadPlugin()', () => {
    it('should load a JS plugin and run its prelude', () => {
      const plugin = loadPlugin(engine, 'greeter', fixturesDir);
      expect(plugin?.name).toBe('greeter');
      expect(plugin?.functions.greet.description).toBe('Greet the name on top of the stack.');

      engine.run('"world" G [greetFriend]x');
      expect(engine.stack).toEqual([cairnString('hello, world'), cairnString('hello, friend')]);
    });

    it('should roll back a JS function that fails', () => {
      loadPlugin(engine, 'greeter', fixturesDir);
      expect(() => engine.run('1 G')).toThrow(EvaluationError);
      expect(engine.stack).toEqual([cairnNumber(1)]);
    });

    it('should accept a default export', () => {
      loadPlugin(engine, 'defaulted', fixturesDir);
      engine.run('[answer]x');
      expect(engine.stack).toEqual([cairnNumber(42)]);
    });

    it('should run a .cairn plugin against the engine', () => {
      expect(loadPlugin(engine, 'cube', fixturesDir)).toBeNull();
      engine.run('3[cube]x');
      expect(engine.stack).toEqual([cairnNumber(27)]);
    });

    it('should load a directory plugin', () => {
      loadPlugin(engine, 'multi', fixturesDir);
      engine.run('1[inc2]x');
      expect(engine.stack).toEqual([cairnNumber(3)]);
    });

    it('should throw for missing plugins', () => {
      expect(() => loadPlugin(engine, 'nonexistent', fixturesDir)).toThrow(
        'Plugin "nonexistent" not found. Searched in plugins/ directory and CAIRN_PLUGIN_PATH.',
      );
    });

    it('should reject modules that are not plugins', () => {
      expect(() => loadPlugin(engine, 'broken', fixturesDir)).toThrow(PluginError);
      expect(() => loadPlugin(engine, 'broken', fixturesDir)).toThrow(
        'Plugin "broken" does not export a valid CairnPlugin (missing functions).',
      );
    });

    it('should report .cairn plugins that fail', () => {
      expect(() => loadPlugin(engine, 'failing', fixturesDir)).toThrow(
        `Plugin "failing" failed: UnknownFunction: unknown function 'q' (at offset 2)`,
      );
    });
  });
});
