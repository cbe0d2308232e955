/**
 * Regular expressions for the pattern-based Swift parser.
 *
 * A declaration is recognized in two steps: {@link DECLARATION_HEAD} finds the attributes,
 * modifiers and introducing keyword at a statement start, then the keyword's tail pattern
 * (anchored with the `y` flag at the end of the head) reads the name and header.
 */

const OPERATOR_CHARS = String.raw`[+\-*/%=!<>&|^~?.]+`;

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

/**
 * 1: attributes, 2: modifiers, 3: keyword.
 * `class` only counts as a modifier in front of `func`, `var`, `let` or `subscript`.
 */
export const DECLARATION_HEAD = new RegExp(
  String.raw`(?:^|(?<=[{};]))[^\S\n]*` +
    String.raw`((?:@\w+(?:\((?:[^()]|\([^()]*\))*\))?\s+)*)` +
    String.raw`((?:(?:public|private|fileprivate|internal|open|package|final|static|override|convenience|required|mutating|nonmutating|nonisolated|lazy|weak|unowned|dynamic|indirect|prefix|postfix|infix|class(?=[^\S\n]+(?:func|var|let|subscript)\b))(?:\([^)\n]*\))?[^\S\n]+)*)` +
    String.raw`(class|struct|protocol|enum|actor|extension|typealias|associatedtype|func|init|deinit|subscript|let|var|operator|macro|import)(?![\w$])`,
  'dgm',
);

/** 1: name, 2: header up to the opening brace */
export const TYPE_TAIL = /[^\S\n]+(\w+(?:\.\w+)*)([^{};]*)\{/dy;

/** 1: name, 2: generic parameters, 3: aliased type */
export const TYPEALIAS_TAIL = /[^\S\n]+(\w+)[^\S\n]*(<[^>\n]*>)?[^\S\n]*=[^\S\n]*([^;\n]+)/dy;

/** 1: name, 2: constraint */
export const ASSOCIATEDTYPE_TAIL = /[^\S\n]+(\w+)(?:[^\S\n]*:[^\S\n]*([^;\n=]+))?/dy;

/** 1: name or operator, 2: generic parameters */
export const FUNC_TAIL = new RegExp(
  String.raw`[^\S\n]+(\w+|${OPERATOR_CHARS})[^\S\n]*(<[^>\n]*>)?[^\S\n]*\(`,
  'dy',
);

/** 1: `?` or `!` for failable initializers, 2: generic parameters */
export const INIT_TAIL = /([?!])?[^\S\n]*(<[^>\n]*>)?[^\S\n]*\(/dy;

export const DEINIT_TAIL = /[^\S\n]*\{/dy;

/** 1: generic parameters */
export const SUBSCRIPT_TAIL = /[^\S\n]*(<[^>\n]*>)?[^\S\n]*\(/dy;

/** 1: name, 2: declared type, 3: what follows (`=`, `{` or nothing) */
export const PROPERTY_TAIL = /[^\S\n]+(\w+)[^\S\n]*(?::[^\S\n]*([^={;\n]+?))?[^\S\n]*(=|\{|;|$)/dmy;

/** 1: operator */
export const OPERATOR_TAIL = new RegExp(String.raw`[^\S\n]+(${OPERATOR_CHARS})`, 'dy');

/** 1: name */
export const MACRO_TAIL = /[^\S\n]+(\w+)/dy;

/** 1: module path */
export const IMPORT_TAIL = /[^\S\n]+(?:(?:struct|class|enum|protocol|typealias|func|let|var)[^\S\n]+)?([\w.]+)/dy;

/** Effects and return type after a parameter list: 1: effects, 2: return type */
export const SIGNATURE_TAIL = /[^\S\n]*((?:(?:async|throws|rethrows)[^\S\n]*)*)(?:->[^\S\n]*([^{\n]+?))?[^\S\n]*(?=\{|$|;|\bwhere\b)/my;

/** Wrapper attribute on a property: 1: name, 2: arguments */
export const PROPERTY_WRAPPER = /@(\w+)(\((?:[^()]|\([^()]*\))*\))?/;

/** Attributes that are not property wrappers */
export const NON_WRAPPER_ATTRIBUTES = new Set([
  'available',
  'objc',
  'nonobjc',
  'discardableResult',
  'inlinable',
  'usableFromInline',
  'MainActor',
  'Sendable',
  'escaping',
  'IBAction',
  'frozen',
]);

// ---------------------------------------------------------------------------
// Content features
// ---------------------------------------------------------------------------

export interface FeatureGroup {
  /** Boolean written when any count in the group is non-zero */
  flag: string;
  counts: Readonly<Record<string, RegExp>>;
}

export const SWIFT_FEATURE_GROUPS: readonly FeatureGroup[] = [
  {
    flag: 'has_closures',
    counts: {
      closure_count: /\{[^\S\n]*(?:\[[^\]\n]*\][^\S\n]*)?(?:\([^()\n]*\)|\w+(?:[^\S\n]*,[^\S\n]*\w+)*)(?:[^\S\n]*->[^\S\n]*[\w?]+)?[^\S\n]+in\b/g,
      trailing_closure_count: /(?:\w|\))[^\S\n]*\{[^\S\n]*(?:\$\d|(?:\[[^\]\n]*\][^\S\n]*)?\(?[\w, :]*?\)?[^\S\n]+in\b)/g,
      escaping_closure_count: /@escaping\b/g,
    },
  },
  {
    flag: 'has_async_await',
    counts: {
      async_function_count: /\bfunc[^\S\n]+\w+[^\n{]*?\)[^\S\n]*async\b/g,
      async_property_count: /\bvar[^\S\n]+\w+[^\S\n]*:[^{\n]+\{[^\S\n]*get[^\S\n]+async\b/g,
      await_call_count: /\bawait[^\S\n]+\w/g,
    },
  },
  {
    flag: 'has_optionals',
    counts: {
      optional_chaining_count: /\w\?\.\w/g,
      optional_binding_count: /\b(?:if|guard|while)[^\S\n]+(?:let|var)[^\S\n]+\w+/g,
      nil_coalescing_count: /\?\?/g,
      force_unwrap_count: /[\w)\]]!(?!=)/g,
    },
  },
  {
    flag: 'has_control_flow',
    counts: {
      guard_statement_count: /^[^\S\n]*guard\b[^{]*\belse[^\S\n]*\{/gm,
      defer_statement_count: /^[^\S\n]*defer[^\S\n]*\{/gm,
    },
  },
  {
    flag: 'has_subscripts',
    counts: {
      subscript_count: /\bsubscript[^\S\n]*(?:<[^>\n]*>)?\(/g,
    },
  },
  {
    flag: 'has_operators',
    counts: {
      operator_function_count: new RegExp(String.raw`\bfunc[^\S\n]+${OPERATOR_CHARS}[^\S\n]*(?:<[^>\n]*>)?\(`, 'g'),
      operator_declaration_count: new RegExp(String.raw`\b(?:prefix|postfix|infix)[^\S\n]+operator[^\S\n]+${OPERATOR_CHARS}`, 'g'),
    },
  },
  {
    flag: 'has_async_sequences',
    counts: {
      async_sequence_count: /\bfor[^\S\n]+(?:try[^\S\n]+)?await[^\S\n]+\w+[^\S\n]+in\b/g,
      async_iterator_count: /:[^\S\n]*(?:AsyncSequence|AsyncIteratorProtocol)\b/g,
    },
  },
  {
    flag: 'has_result_builders',
    counts: {
      result_builder_count: /@resultBuilder\b/g,
      view_builder_count: /@ViewBuilder\b/g,
      function_builder_count: /@_functionBuilder\b/g,
    },
  },
  {
    flag: 'has_macros',
    counts: {
      macro_declaration_count: /@(?:freestanding|attached)[^\S\n]*\((?:[^()]|\([^()]*\))*\)\s*(?:(?:public|internal|package)\s+)?macro\s+\w+/g,
      macro_usage_count: /#(?!(?:selector|keyPath|available|unavailable|if|elseif|else|endif|file|line|function|column)\b)\w+[^\S\n]*\(/g,
    },
  },
];

// ---------------------------------------------------------------------------
// Frameworks
// ---------------------------------------------------------------------------

/** Root flag -> modules whose import sets it */
export const FRAMEWORK_IMPORTS: ReadonlyArray<[string, readonly string[]]> = [
  ['has_swiftui', ['SwiftUI']],
  ['has_uikit', ['UIKit']],
  ['has_vapor', ['Vapor']],
  ['has_combine', ['Combine']],
  ['has_swiftdata', ['SwiftData']],
  ['has_swift_testing', ['Testing']],
  ['has_tca', ['ComposableArchitecture', 'TCA']],
  ['has_foundation', ['Foundation', 'SwiftUI', 'SwiftData']],
];
