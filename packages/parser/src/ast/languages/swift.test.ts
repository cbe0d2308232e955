import { describe, it, expect } from 'vitest';
import { ParsingError, backgroundContext, loadParserConfig, nopLogger } from '@symbolscope/core';
import { SwiftParser } from './swift.js';
import type { SymbolInfo } from '../types.js';

function parseSymbols(content: string, filePath = 'Sources/App.swift') {
  const parser = new SwiftParser({ config: loadParserConfig({}), logger: nopLogger, now: () => 0 });
  const ast = parser.parse(content, filePath, backgroundContext);
  return { ast, symbols: parser.extractSymbols(ast) };
}

function summarize(symbols: SymbolInfo[]) {
  return symbols.map(({ name, kind }) => ({ name, kind }));
}

describe('SwiftParser', () => {
  it('should return an empty root for empty content', () => {
    const { ast, symbols } = parseSymbols('');

    expect(ast.root.id).toBe('swift-root');
    expect(ast.root.type).toBe('compilation_unit');
    expect(ast.root.children).toEqual([]);
    expect(ast.root.metadata?.has_swiftui).toBe(false);
    expect(symbols).toEqual([]);
  });

  it('should refuse to start when the deadline has passed', () => {
    const parser = new SwiftParser({ config: loadParserConfig({}), logger: nopLogger, now: () => 200 });

    expect(() => parser.parse('struct A {}', 'A.swift', { deadline: 100 })).toThrow(ParsingError);
  });

  it('should extract an actor with its members', () => {
    const { symbols } = parseSymbols(
      'actor BankAccount { private var balance: Double = 0; func deposit(_ a: Double) { balance += a } }\n',
      'Sources/Bank.swift',
    );

    expect(symbols.map(({ id, name, kind, visibility }) => ({ id, name, kind, visibility }))).toEqual([
      { id: 'actor-Sources/Bank.swift-1', name: 'BankAccount', kind: 'class', visibility: undefined },
      { id: 'property-Sources/Bank.swift-1', name: 'balance', kind: 'variable', visibility: 'private' },
      { id: 'method-Sources/Bank.swift-1', name: 'deposit', kind: 'method', visibility: undefined },
    ]);
    expect(symbols[0].metadata?.is_actor).toBe(true);
    expect(symbols[0].signature).toBe('actor BankAccount');
    expect(symbols[1].metadata).toMatchObject({ declared_type: 'Double', is_stored: true, is_computed: false });
    expect(symbols[2].signature).toBe('func deposit(_ a: Double)');
  });

  it('should emit associated types as types', () => {
    const { symbols } = parseSymbols(`protocol Container {
    associatedtype Item: Equatable
    var count: Int { get }
    func append(_ item: Item)
}
`);

    expect(summarize(symbols)).toEqual([
      { name: 'Container', kind: 'interface' },
      { name: 'Item', kind: 'type' },
      { name: 'count', kind: 'variable' },
      { name: 'append', kind: 'method' },
    ]);
    expect(symbols[1].metadata?.constraint).toBe('Equatable');
  });

  it('should detect frameworks and property wrappers', () => {
    const { ast, symbols } = parseSymbols(`import SwiftUI
import Combine

struct ContentView: View {
    @State private var count = 0
    @AppStorage("token") var token: String = ""

    var body: some View {
        Text("\\(count)")
    }

    init(count: Int) {
        self.count = count
    }
}
`);

    expect(summarize(symbols)).toEqual([
      { name: 'SwiftUI', kind: 'import' },
      { name: 'Combine', kind: 'import' },
      { name: 'ContentView', kind: 'struct' },
      { name: 'count', kind: 'variable' },
      { name: 'token', kind: 'variable' },
      { name: 'body', kind: 'variable' },
      { name: 'init', kind: 'constructor' },
    ]);
    expect(ast.root.metadata).toMatchObject({
      has_swiftui: true,
      has_combine: true,
      has_foundation: true,
      has_uikit: false,
      has_vapor: false,
      has_swiftdata: false,
      has_swift_testing: false,
      has_tca: false,
    });
    expect(symbols[2].metadata?.inherits).toEqual(['View']);
    expect(symbols[3].metadata).toMatchObject({ wrapper: '@State', is_wrapped: true, has_wrapper_args: false });
    expect(symbols[4].metadata).toMatchObject({ wrapper: '@AppStorage', has_wrapper_args: true });
    expect(symbols[5].metadata).toMatchObject({ is_computed: true, is_stored: false, declared_type: 'some View' });
  });

  it('should set the TCA flag from either module name', () => {
    expect(parseSymbols('import ComposableArchitecture\n').ast.root.metadata?.has_tca).toBe(true);
    expect(parseSymbols('import TCA\n').ast.root.metadata?.has_tca).toBe(true);
  });

  it('should count async, optional and control flow features', () => {
    const { ast, symbols } = parseSymbols(`func load() async throws -> [Item] {
    guard let url = makeURL() else { return [] }
    defer { finish() }
    let items = try await fetch(url)
    return items.map { $0.value } ?? []
}
`);

    expect(summarize(symbols)).toEqual([{ name: 'load', kind: 'function' }]);
    expect(symbols[0].signature).toBe('func load() async throws -> [Item]');
    expect(symbols[0].metadata).toMatchObject({ is_async: true, is_throws: true, return_type: '[Item]' });
    expect(ast.root.metadata).toMatchObject({
      has_closures: true,
      trailing_closure_count: 1,
      has_async_await: true,
      async_function_count: 1,
      await_call_count: 1,
      has_optionals: true,
      optional_binding_count: 1,
      nil_coalescing_count: 1,
      has_control_flow: true,
      guard_statement_count: 1,
      defer_statement_count: 1,
    });
    expect(ast.root.metadata?.closure_count).toBeUndefined();
    expect(ast.root.metadata?.force_unwrap_count).toBeUndefined();
  });

  it('should map operators and subscripts to operator symbols', () => {
    const { ast, symbols } = parseSymbols(`infix operator <>: AdditionPrecedence

struct Vector {
    static func + (lhs: Vector, rhs: Vector) -> Vector {
        return lhs
    }
    subscript(index: Int) -> Double {
        return 0
    }
}
`, 'Sources/Vector.swift');

    expect(symbols.map(({ id, name, kind }) => ({ id, name, kind }))).toEqual([
      { id: 'operator-Sources/Vector.swift-1', name: '<>', kind: 'operator' },
      { id: 'struct-Sources/Vector.swift-3', name: 'Vector', kind: 'struct' },
      { id: 'operator-func-Sources/Vector.swift-4', name: '+', kind: 'operator' },
      { id: 'subscript-Sources/Vector.swift-7', name: 'subscript', kind: 'operator' },
    ]);
    expect(symbols[0].metadata).toMatchObject({ operator_symbol: '<>', fixity: 'infix' });
    expect(symbols[3].metadata?.return_type).toBe('Double');
    expect(ast.root.metadata).toMatchObject({
      has_operators: true,
      operator_function_count: 1,
      operator_declaration_count: 1,
      has_subscripts: true,
      subscript_count: 1,
    });
  });

  it('should derive visibility from access modifiers', () => {
    const { symbols } = parseSymbols(`public class Service {
    fileprivate func helper() {}
    internal let id: String
    func plain() {}
}
`);

    expect(symbols.map(({ name, visibility }) => ({ name, visibility }))).toEqual([
      { name: 'Service', visibility: 'public' },
      { name: 'helper', visibility: 'private' },
      { name: 'id', visibility: 'public' },
      { name: 'plain', visibility: undefined },
    ]);
  });

  it('should keep locals out of the member list', () => {
    const { symbols } = parseSymbols(`final class Cache {
    private var store: [String: Int] = [:]

    init?(size: Int) {
        let limit = size
        store.reserveCapacity(limit)
    }

    deinit {
        store.removeAll()
    }
}
`);

    expect(summarize(symbols)).toEqual([
      { name: 'Cache', kind: 'class' },
      { name: 'store', kind: 'variable' },
      { name: 'init', kind: 'constructor' },
      { name: 'deinit', kind: 'destructor' },
    ]);
    expect(symbols[0].metadata?.is_final).toBe(true);
    expect(symbols[1].metadata?.declared_type).toBe('[String: Int]');
    expect(symbols[2].metadata?.is_failable).toBe(true);
  });

  it('should extract macros and generic typealiases', () => {
    const { ast, symbols } = parseSymbols(`@freestanding(expression)
public macro stringify<T>(_ value: T) -> (T, String) = #externalMacro(module: "M", type: "S")

typealias Handler<T> = (T) -> Void
`);

    expect(summarize(symbols)).toEqual([
      { name: 'stringify', kind: 'function' },
      { name: 'Handler', kind: 'type' },
    ]);
    expect(symbols[0].metadata).toMatchObject({ macro_role: 'freestanding' });
    expect(symbols[0].visibility).toBe('public');
    expect(symbols[1].metadata).toMatchObject({ aliased_type: '(T) -> Void', is_generic: true });
    expect(ast.root.metadata).toMatchObject({ has_macros: true, macro_declaration_count: 1, macro_usage_count: 1 });
  });
});
