import type { ASTNode } from '../types.js';

// ---------------------------------------------------------------------------
// Feature keys
// ---------------------------------------------------------------------------

const EMPTY_FEATURES = {
  // core
  has_classes: false,
  has_structs: false,
  has_functions: false,
  has_namespaces: false,
  has_constructors: false,
  has_destructors: false,
  has_inheritance: false,
  has_includes: false,
  // C++11/14/17
  has_templates: false,
  has_auto_keyword: false,
  has_lambdas: false,
  has_range_for: false,
  has_smart_pointers: false,
  has_constexpr: false,
  has_operator_overload: false,
  // C++20
  has_concepts: false,
  has_structured_binding: false,
  has_if_constexpr: false,
  has_coroutines: false,
  has_modules: false,
  // frameworks
  has_qt: false,
  has_boost: false,
  has_opencv: false,
  has_unreal: false,
  has_stl: false,
  // special members
  has_copy_constructor: false,
  has_move_constructor: false,
  has_copy_assignment: false,
  has_move_assignment: false,
  has_default_constructor: false,
  has_explicit_constructor: false,
  has_constexpr_constructor: false,
};

export type CppFeatureKey = keyof typeof EMPTY_FEATURES;
export type CppFeatures = Record<CppFeatureKey, boolean>;

/** Node types that flip a flag on sight */
const NODE_TYPE_FEATURES: Partial<Record<string, CppFeatureKey>> = {
  class_specifier: 'has_classes',
  struct_specifier: 'has_structs',
  function_definition: 'has_functions',
  namespace_definition: 'has_namespaces',
  preproc_include: 'has_includes',
  template_declaration: 'has_templates',
};

const FRAMEWORK_MARKERS: ReadonlyArray<[CppFeatureKey, readonly string[]]> = [
  ['has_qt', ['#include <Q', 'QObject', 'Q_OBJECT', 'SIGNAL', 'SLOT']],
  ['has_boost', ['#include <boost/', 'boost::', 'BOOST_']],
  ['has_opencv', ['#include <opencv2/', 'cv::']],
  ['has_unreal', ['UCLASS', 'UFUNCTION', 'UPROPERTY', '#include "CoreMinimal.h"']],
  ['has_stl', ['std::', '#include <vector>', '#include <string>', '#include <memory>']],
];

// ---------------------------------------------------------------------------
// PatternValidator
// ---------------------------------------------------------------------------

/**
 * Line filter for declaration-shaped text.
 *
 * A line is accepted when, after trimming, it is not a `//` comment or `#` directive,
 * contains none of the exclude substrings, and contains at least one include substring.
 */
export class PatternValidator {
  constructor(
    private readonly excludePatterns: readonly string[],
    private readonly includePatterns: readonly string[],
  ) {}

  isValidDeclaration(line: string): boolean {
    const trimmed = line.trim();
    if (trimmed.startsWith('//') || trimmed.startsWith('#')) {
      return false;
    }
    if (this.excludePatterns.some(pattern => trimmed.includes(pattern))) {
      return false;
    }
    return this.includePatterns.some(pattern => trimmed.includes(pattern));
  }

  /** True when any line of the content passes */
  validateDeclarationLines(content: string): boolean {
    return content.split('\n').some(line => this.isValidDeclaration(line));
  }
}

const constructorValidator = new PatternValidator(
  ['return ', 'if (', 'while (', 'for (', 'switch (', 'sizeof(', 'typeof(', 'decltype(', '#define', '#include'],
  [' : ', '{}', '= default', '= delete', 'explicit ', 'constexpr ', 'noexcept', '[['],
);

const destructorValidator = new PatternValidator(
  ['return ', 'if (', 'while (', 'for (', 'switch (', '& ~', '| ~', '^ ~', '= ~', '( ~'],
  ['virtual ~', '~', '= default', '= delete', 'noexcept'],
);

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

function emptyFeatures(): CppFeatures {
  return { ...EMPTY_FEATURES };
}

function detectFromAST(node: ASTNode, features: CppFeatures): void {
  const key = NODE_TYPE_FEATURES[node.type];
  if (key) features[key] = true;

  for (const child of node.children) {
    detectFromAST(child, features);
  }
}

function detectSpecialMembers(content: string, features: CppFeatures): void {
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line.startsWith('//') || line.startsWith('#')) continue;

    if ((line.includes('(const ') && line.includes('&')) || line.includes('= default')) {
      features.has_copy_constructor = true;
    }
    if (line.includes('&&') && line.includes('(')) {
      features.has_move_constructor = true;
    }
    if (line.includes('operator=')) {
      if (line.includes('&&')) {
        features.has_move_assignment = true;
      } else if (line.includes('&')) {
        features.has_copy_assignment = true;
      }
    }
    if (line.includes('= default') && line.includes('(')) {
      features.has_default_constructor = true;
    }
    if (line.includes('explicit ')) {
      features.has_explicit_constructor = true;
    }
    if (line.includes('constexpr ') && line.includes('(')) {
      features.has_constexpr_constructor = true;
    }
  }
}

function detectFromPatterns(content: string, features: CppFeatures): void {
  const has = (text: string) => content.includes(text);

  if (has('auto ')) features.has_auto_keyword = true;
  if (has('constexpr')) features.has_constexpr = true;
  if (has('operator')) features.has_operator_overload = true;

  if (constructorValidator.validateDeclarationLines(content)) features.has_constructors = true;
  if (has('~') && destructorValidator.validateDeclarationLines(content)) features.has_destructors = true;

  detectSpecialMembers(content, features);

  if (has(' : ') && (has('class ') || has('struct '))) features.has_inheritance = true;
  if (has('[') && has('](') && (has('{') || has('->'))) features.has_lambdas = true;
  if (has('for (') && has(' : ') && !has('for (;;')) features.has_range_for = true;
  if (['unique_ptr', 'shared_ptr', 'weak_ptr', 'make_unique', 'make_shared'].some(has)) {
    features.has_smart_pointers = true;
  }

  if (has('concept ') && (has('requires') || has('std::integral') || has('std::floating_point') || has('= '))) {
    features.has_concepts = true;
  }
  if (has('auto [') && has('] =')) features.has_structured_binding = true;
  if (has('if constexpr')) features.has_if_constexpr = true;
  if (['co_await', 'co_return', 'co_yield'].some(has)) features.has_coroutines = true;
  if ((has('import ') && !has('#include')) || has('module ')) features.has_modules = true;

  for (const [key, markers] of FRAMEWORK_MARKERS) {
    if (markers.some(has)) features[key] = true;
  }
}

/**
 * Feature flags for a converted C++ tree: node types first, then a pattern pass over the source.
 * Every flag is present in the result, `false` unless detected.
 */
export function detectCppFeatures(root: ASTNode, content: string): CppFeatures {
  const features = emptyFeatures();
  detectFromAST(root, features);
  detectFromPatterns(content, features);
  return features;
}
