/**
 * Regular expressions for the pattern-based Dart parser.
 *
 * Declaration patterns are global + multiline and anchored at a line start (callables and
 * variables also right after `{`, `}` or `;`); horizontal
 * whitespace is written `[^\S\n]` so a single match never runs across unrelated lines.
 */

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

/** 1: modifiers, 2: name, 3: rest of the header up to `{` */
export const CLASS_DECLARATION =
  /^[^\S\n]*((?:(?:abstract|sealed|final|base|interface|mixin)[^\S\n]+)*)class[^\S\n]+(\w+)([^{};]*)\{/dgm;

/** 1: name, 2: rest of the header */
export const MIXIN_DECLARATION = /^[^\S\n]*(?:base[^\S\n]+)?mixin[^\S\n]+(\w+)([^{};]*)\{/dgm;

/** 1: name (optional), 2: type parameters, 3: target type */
export const EXTENSION_DECLARATION =
  /^[^\S\n]*extension(?:[^\S\n]+(\w+))?[^\S\n]*(<[^>{\n]*>)?[^\S\n]+on[^\S\n]+([^{};]+?)\s*\{/dgm;

/** 1: name, 2: rest of the header */
export const ENUM_DECLARATION = /^[^\S\n]*enum[^\S\n]+(\w+)([^{};]*)\{/dgm;

/** 1: name, 2: type parameters, 3: aliased type */
export const TYPEDEF_DECLARATION = /^[^\S\n]*typedef[^\S\n]+(\w+)[^\S\n]*(<[^=\n]*>)?[^\S\n]*=[^\S\n]*([^;]+);/dgm;

/** Pre-2.13 form `typedef void Callback(int x);` - 1: return type, 2: name */
export const LEGACY_FUNCTION_TYPEDEF = /^[^\S\n]*typedef[^\S\n]+([\w<>?,. ]+?)[^\S\n]+(\w+)[^\S\n]*\([^)]*\)[^\S\n]*;/dgm;

/**
 * Head of a function or method up to its opening parenthesis.
 * 1: annotations, 2: return type and modifiers, 3: name
 */
export const CALLABLE_HEAD =
  /(?:^|(?<=[{};]))[^\S\n]*((?:@\w+(?:\([^)\n]*\))?\s+)*)((?:[\w$<>?,.[\]]+[^\S\n]+)*?)(\w+)[^\S\n]*(?:<[^>\n]*>)?[^\S\n]*\(/dgm;

/** 1: modifiers, 2: type, 3: name */
export const VARIABLE_DECLARATION =
  /(?:^|(?<=[{};]))[^\S\n]*((?:(?:static|late|final|const|var|covariant|external)[^\S\n]+)*)(?:([\w$<>?,.[\] ]+?)[^\S\n]+)?(\w+)[^\S\n]*(?:=(?![=>])|;)/dgm;

/** 1: path, 2: trailing clauses (`as`, `show`, `hide`) */
export const IMPORT_DIRECTIVE = /^[^\S\n]*import[^\S\n]+['"]([^'"\n]+)['"]([^;\n]*);/dgm;

/** 1: part file */
export const PART_DIRECTIVE = /^[^\S\n]*part[^\S\n]+['"]([^'"\n]+)['"][^\S\n]*;/dgm;

/** 1: file path, 2: library name */
export const PART_OF_DIRECTIVE = /^[^\S\n]*part[^\S\n]+of[^\S\n]+(?:['"]([^'"\n]+)['"]|(\w+(?:\.\w+)*))[^\S\n]*;/dgm;

// ---------------------------------------------------------------------------
// Header clauses
// ---------------------------------------------------------------------------

export const EXTENDS_CLAUSE = /\bextends\s+([\w.]+)(?:\s*<([^{]*?)>)?(?=\s+with\b|\s+implements\b|\s*$)/;
export const WITH_CLAUSE = /\bwith\s+(.+?)(?=\s+implements\b|\s*$)/s;
export const IMPLEMENTS_CLAUSE = /\bimplements\s+(.+?)\s*$/s;
export const ON_CLAUSE = /\bon\s+(.+?)(?=\s+implements\b|\s*$)/s;
export const AS_CLAUSE = /\bas\s+(\w+)/;

// ---------------------------------------------------------------------------
// Content features
// ---------------------------------------------------------------------------

export const ASYNC_FEATURES = {
  async_count: /\basync\b/g,
  await_count: /\bawait\s/g,
  yield_count: /\byield\b/g,
  stream_controller_count: /StreamController(?:<[\w\s<>,?]+>)?\s*\(/g,
  stream_subscription_count: /StreamSubscription<[\w\s<>,?]+>\s+\w+/g,
  future_builder_count: /FutureBuilder(?:<[\w\s<>,?]+>)?\s*\(/g,
  stream_builder_count: /StreamBuilder(?:<[\w\s<>,?]+>)?\s*\(/g,
} as const;

export const ERROR_HANDLING_FEATURES = {
  try_count: /\btry\s*\{/g,
  catch_count: /\bcatch\s*\([^)]+\)\s*\{/g,
  finally_count: /\bfinally\s*\{/g,
  throw_count: /\bthrow\s/g,
  rethrow_count: /\brethrow\s*;/g,
} as const;

export const PATTERN_MATCHING_FEATURES = {
  switch_expression_count: /=>\s*switch\s*\([^)]+\)\s*\{|=\s*switch\s*\([^)]+\)\s*\{/g,
  pattern_case_count: /\bcase\s+[^:;\n]+?\s+when\s+[^:\n]+:|\bcase\s+\w+\s*\([^)\n]*\)\s*:/g,
} as const;

export const RECORD_FEATURES = {
  record_type_count: /^[^\S\n]*\((?:\{[^(){}\n]*\}|[^(){}\n]*,[^(){}\n]*)\)[^\S\n]+\w+/gm,
} as const;

// ---------------------------------------------------------------------------
// Word lists
// ---------------------------------------------------------------------------

/** Words that are never method names */
export const CONTROL_FLOW_KEYWORDS = new Set([
  'if',
  'else',
  'for',
  'while',
  'do',
  'switch',
  'case',
  'break',
  'continue',
  'return',
  'throw',
  'try',
  'catch',
  'finally',
  'assert',
  'super',
  'this',
  'new',
  'await',
  'yield',
]);

/** Leading words that mark a line as something other than a variable or callable */
export const NON_MEMBER_LEADING_WORDS = new Set([
  'library',
  'import',
  'export',
  'part',
  'typedef',
  'class',
  'enum',
  'mixin',
  'extension',
  'return',
  'throw',
  'await',
  'yield',
  'assert',
  'abstract',
  'sealed',
  'base',
  'interface',
  'factory',
  'operator',
  'get',
  'set',
]);

export const LIFECYCLE_METHODS = new Set(['initState', 'didChangeDependencies', 'didUpdateWidget', 'dispose']);

export const HIGHER_ORDER_NAMES = new Set([
  'map',
  'filter',
  'reduce',
  'compose',
  'curry',
  'memoize',
  'pipe',
  'asyncMap',
  'asyncFilter',
]);

export const WIDGET_SUPERCLASSES: Record<string, string> = {
  StatelessWidget: 'stateless',
  StatefulWidget: 'stateful',
  ConsumerWidget: 'consumer',
  HookWidget: 'hook',
};
