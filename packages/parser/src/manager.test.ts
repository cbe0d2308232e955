import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  InvalidFilePathError,
  PanicError,
  UnsupportedLanguageError,
  ValidationError,
  backgroundContext,
  loadParserConfig,
  nopLogger,
  testingConfig,
} from '@symbolscope/core';
import { ParserManager } from './manager.js';
import { ParserManagerBuilder } from './builder.js';
import { LRUCache, type ASTCache, type CachedAST } from './cache.js';
import { SwiftParser } from './ast/languages/swift.js';

const SWIFT_SOURCE = 'struct Point {\n  let x: Int\n}\n';

function cachedManager(cache: ASTCache = new LRUCache()) {
  return new ParserManager({ config: loadParserConfig({}), cache });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ParserManager', () => {
  describe('classify', () => {
    const manager = new ParserManager({ config: testingConfig() });

    it('should classify sources by extension', () => {
      expect(manager.classify('src/engine.cpp')).toEqual({
        language: 'cpp',
        fileType: 'source',
        isGenerated: false,
        isTest: false,
      });
      expect(manager.classify('Sources/App/Model.swift').language).toBe('swift');
    });

    it('should classify header extensions as headers', () => {
      expect(manager.classify('include/engine.hpp').fileType).toBe('header');
      expect(manager.classify('include/engine.h').fileType).toBe('header');
    });

    it('should flag test files', () => {
      expect(manager.classify('test/widget_test.dart')).toEqual({
        language: 'dart',
        fileType: 'test',
        isGenerated: false,
        isTest: true,
      });
      expect(manager.classify('Tests/AppTests.swift').isTest).toBe(true);
      expect(manager.classify('src/parser.test.cpp').isTest).toBe(true);
    });

    it('should flag generated files', () => {
      expect(manager.classify('lib/models/user.g.dart').isGenerated).toBe(true);
      expect(manager.classify('lib/models/user.freezed.dart').isGenerated).toBe(true);
      expect(manager.classify('src\\proto\\msg.pb.h')).toEqual({
        language: 'cpp',
        fileType: 'header',
        isGenerated: true,
        isTest: false,
      });
    });

    it('should use only the final extension', () => {
      expect(manager.classify('archive.swift.cpp').language).toBe('cpp');
      expect(() => manager.classify('main.cpp.bak')).toThrow(UnsupportedLanguageError);
    });

    it('should reject unknown extensions', () => {
      expect(() => manager.classify('main.rs')).toThrow('classify main.rs: no language registered for extension "rs"');
    });
  });

  describe('parse', () => {
    it('should accept a canonical id or a descriptor', () => {
      const manager = new ParserManager({ config: testingConfig() });
      const swift = manager.supportedLanguages().find(lang => lang.name === 'swift');

      expect(swift).toBeDefined();
      if (!swift) return;
      const byDescriptor = manager.parse(backgroundContext, SWIFT_SOURCE, swift, 'Point.swift');
      const byId = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(byDescriptor.language).toBe('swift');
      expect(byId.root.children.map(child => child.type)).toEqual(['struct_declaration']);
    });

    it('should accept an empty path', () => {
      const manager = new ParserManager({ config: testingConfig() });

      expect(manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', '').filePath).toBe('');
    });

    it('should reject unsupported languages', () => {
      const manager = new ParserManager({ config: testingConfig() });

      expect(() => manager.parse(backgroundContext, 'fn main() {}', 'rust', 'main.rs')).toThrow(
        new UnsupportedLanguageError('unsupported language: rust', {
          operation: 'parse',
          filePath: 'main.rs',
          language: 'rust',
        }).message,
      );
    });

    it('should reject path traversal before touching the cache', () => {
      const cache = new LRUCache();
      const manager = cachedManager(cache);
      const get = vi.spyOn(cache, 'get');
      const set = vi.spyOn(cache, 'set');

      let caught: unknown;
      try {
        manager.parse(backgroundContext, 'int main() { return 0; }', 'cpp', '../../../etc/passwd');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidFilePathError);
      expect(caught instanceof InvalidFilePathError && caught.reason).toBe('path traversal detected');
      expect(get).not.toHaveBeenCalled();
      expect(set).not.toHaveBeenCalled();
      expect(cache.size()).toBe(0);
    });

    it('should reject null bytes and overlong paths', () => {
      const manager = new ParserManager({ config: testingConfig() });

      expect(() => manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'a\0.swift')).toThrow('null bytes');
      expect(() => manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', `${'a'.repeat(4096)}.swift`)).toThrow(
        'too long',
      );
    });

    it('should serve unchanged content from the cache', () => {
      const manager = cachedManager();
      const parse = vi.spyOn(SwiftParser.prototype, 'parse');

      const first = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');
      const second = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(second).toBe(first);
      expect(parse).toHaveBeenCalledTimes(1);
      expect(manager.getCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
    });

    it('should reparse when the content changes', () => {
      const manager = cachedManager();
      const parse = vi.spyOn(SwiftParser.prototype, 'parse');

      const first = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');
      const second = manager.parse(backgroundContext, 'struct Size {}\n', 'swift', 'Point.swift');

      expect(second).not.toBe(first);
      expect(second.root.children[0].id).toBe('struct-Size-1');
      expect(parse).toHaveBeenCalledTimes(2);
      expect(manager.getCacheStats()?.size).toBe(1);
    });

    it('should expire cached entries on the injected clock', () => {
      let now = 1_000;
      const manager = new ParserManagerBuilder()
        .withConfig({ cache: { ttlMs: 500 } })
        .withClock(() => now)
        .build();
      const parse = vi.spyOn(SwiftParser.prototype, 'parse');

      manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');
      now += 500;
      manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(parse).toHaveBeenCalledTimes(2);
      expect(manager.getCacheStats()?.evictions).toBe(1);
    });

    it('should record cache insertion failures on the root', () => {
      const failing: ASTCache = {
        get: () => undefined,
        set: () => {
          throw new Error('cache is read-only');
        },
        invalidate: () => {},
        clear: () => {},
        stats: () => ({ hits: 0, misses: 0, evictions: 0, size: 0, maxSize: 1 }),
      };
      const manager = cachedManager(failing);

      const ast = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(ast.root.metadata?.cache_error).toBe('cache is read-only');
      expect(ast.root.children).toHaveLength(1);
    });

    it('should not cache an AST its parser invalidated', () => {
      const cache = new LRUCache();
      const manager = cachedManager(cache);
      const direct = new SwiftParser({ config: loadParserConfig({}), logger: nopLogger, now: () => 0 });
      const ast = direct.parse(SWIFT_SOURCE, 'Point.swift', backgroundContext);
      ast.root.metadata = { ...ast.root.metadata, cache_invalidated: true };
      vi.spyOn(SwiftParser.prototype, 'parse').mockReturnValue(ast);

      manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(cache.has('Point.swift')).toBe(false);
    });

    it('should drop a stale entry whose hash no longer matches', () => {
      const cache = new LRUCache();
      const manager = cachedManager(cache);
      const stale = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');
      const entry: CachedAST = { ast: stale, version: stale.version, hash: 'not-the-hash' };
      cache.set('Point.swift', entry);
      const invalidate = vi.spyOn(cache, 'invalidate');

      const fresh = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(fresh).not.toBe(stale);
      expect(invalidate).toHaveBeenCalledWith('Point.swift');
      expect(cache.get('Point.swift', fresh.version)?.ast).toBe(fresh);
    });

    it('should recover unexpected parser exceptions', () => {
      const manager = new ParserManager({ config: testingConfig() });
      vi.spyOn(SwiftParser.prototype, 'parse').mockImplementation(() => {
        throw new Error('boom');
      });

      expect(() =>
        manager.parse({ requestId: 'req-1' }, SWIFT_SOURCE, 'swift', 'Point.swift'),
      ).toThrow(new PanicError(new Error('boom'), {
        operation: 'parse[req-1]',
        filePath: 'Point.swift',
        language: 'swift',
      }).message);
    });

    it('should log timings when metrics and profiling are on', () => {
      const debug = vi.fn();
      const manager = new ParserManager({
        config: loadParserConfig({ cache: { enabled: false }, logging: { enableProfiling: true } }),
        logger: { ...nopLogger, debug },
        now: () => 0,
      });

      manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(debug).toHaveBeenCalledWith('parsed file', { file_path: 'Point.swift', language: 'swift', parse_time_ms: 0 });
      expect(debug).toHaveBeenCalledWith('parse profile', {
        file_path: 'Point.swift',
        lookup_ms: 0,
        parse_ms: 0,
        store_ms: 0,
      });
    });

    it('should pass parser errors through unchanged', () => {
      const manager = new ParserManager({ config: testingConfig() });

      expect(() => manager.parse(backgroundContext, '', 'cpp', 'empty.cpp')).toThrow(
        'parse_cpp empty.cpp (cpp): content is empty',
      );
    });
  });

  describe('extractSymbols', () => {
    it('should drive the language walker', () => {
      const manager = new ParserManager({ config: testingConfig() });
      const ast = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      expect(manager.extractSymbols(ast).map(({ name, kind }) => ({ name, kind }))).toEqual([
        { name: 'Point', kind: 'struct' },
        { name: 'x', kind: 'variable' },
      ]);
    });

    it('should reject a missing AST', () => {
      const manager = new ParserManager({ config: testingConfig() });

      expect(() => manager.extractSymbols(null)).toThrow(ValidationError);
      expect(() => manager.extractSymbols(undefined)).toThrow('extract_symbols: ast is nil');
    });

    it('should reject an AST without a root', () => {
      const manager = new ParserManager({ config: testingConfig() });
      const ast = manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');
      const rootless = Object.assign({}, ast, { root: null });

      expect(() => manager.extractSymbols(rootless)).toThrow('extract_symbols Point.swift: ast root is nil');
    });
  });

  describe('supportedLanguages', () => {
    it('should list every registered language', () => {
      const manager = new ParserManager({ config: testingConfig() });

      expect(manager.supportedLanguages().map(({ name, parser }) => ({ name, parser }))).toEqual([
        { name: 'cpp', parser: 'tree-sitter' },
        { name: 'dart', parser: 'regex' },
        { name: 'swift', parser: 'regex' },
      ]);
    });
  });

  describe('cache management', () => {
    it('should report no stats when caching is disabled', () => {
      expect(new ParserManager({ config: testingConfig() }).getCacheStats()).toBeUndefined();
      expect(
        new ParserManager({ config: loadParserConfig({ performance: { enableCaching: false } }) }).getCacheStats(),
      ).toBeUndefined();
    });

    it('should clear the cache', () => {
      const manager = cachedManager();
      manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

      manager.clearCache();

      expect(manager.getCacheStats()?.size).toBe(0);
    });
  });
});

describe('ParserManagerBuilder', () => {
  it('should build with defaults', () => {
    const manager = new ParserManagerBuilder().build();

    expect(manager.getCacheStats()).toEqual({ hits: 0, misses: 0, evictions: 0, size: 0, maxSize: 1000 });
  });

  it('should apply partial config over the defaults', () => {
    const manager = new ParserManagerBuilder().withConfig({ cache: { maxSize: 2 } }).build();

    expect(manager.getCacheStats()?.maxSize).toBe(2);
    expect(manager.config.performance.maxSymbols).toBe(10000);
  });

  it('should use a caller-owned cache', () => {
    const cache = new LRUCache({ maxSize: 7 });
    const manager = new ParserManagerBuilder().withCache(cache).build();

    manager.parse(backgroundContext, SWIFT_SOURCE, 'swift', 'Point.swift');

    expect(cache.has('Point.swift')).toBe(true);
    expect(manager.getCacheStats()?.maxSize).toBe(7);
  });

  it('should route logs to the configured logger', () => {
    const debug = vi.fn();
    new ParserManagerBuilder().withLogger({ ...nopLogger, debug }).build();

    expect(debug).toHaveBeenCalledWith('parser manager initialized', {
      caching: true,
      languages: 'cpp,dart,swift',
    });
  });

  it('should provide presets', () => {
    const production = ParserManagerBuilder.forProduction().build();
    const development = ParserManagerBuilder.forDevelopment().build();
    const testing = ParserManagerBuilder.forTesting().build();

    expect(production.getCacheStats()?.maxSize).toBe(5000);
    expect(production.config.logging.level).toBe('warn');
    expect(development.config.cache.ttlMs).toBe(30 * 60 * 1000);
    expect(development.config.logging.enableProfiling).toBe(true);
    expect(testing.getCacheStats()).toBeUndefined();
    expect(testing.config.dart.enableAsyncAnalysis).toBe(false);
  });
});
