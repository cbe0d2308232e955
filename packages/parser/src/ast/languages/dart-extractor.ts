import { runGuarded, type Logger, type ParseContext } from '@symbolscope/core';
import type { ASTNode, NodeMetadata } from '../types.js';
import { LineIndex, depthAt, depthAtLineStarts, extractBlock, findMatchingBrace, splitTopLevel } from '../../utils/text.js';
import {
  AS_CLAUSE,
  CALLABLE_HEAD,
  CLASS_DECLARATION,
  CONTROL_FLOW_KEYWORDS,
  ENUM_DECLARATION,
  EXTENDS_CLAUSE,
  EXTENSION_DECLARATION,
  HIGHER_ORDER_NAMES,
  IMPLEMENTS_CLAUSE,
  IMPORT_DIRECTIVE,
  LEGACY_FUNCTION_TYPEDEF,
  LIFECYCLE_METHODS,
  MIXIN_DECLARATION,
  NON_MEMBER_LEADING_WORDS,
  ON_CLAUSE,
  PART_DIRECTIVE,
  PART_OF_DIRECTIVE,
  TYPEDEF_DECLARATION,
  VARIABLE_DECLARATION,
  WIDGET_SUPERCLASSES,
  WITH_CLAUSE,
} from './dart-patterns.js';

export type DartStrategy = 'full' | 'limited' | 'streaming';

/** Streaming processes the source in windows of this many characters */
export const STREAMING_CHUNK_SIZE = 100 * 1024;

/** Global symbol cap of the limited strategy */
export const LIMITED_MAX_SYMBOLS = 5000;

/** Per-kind caps of the limited strategy */
export const LIMITED_KIND_CAPS: Readonly<Record<DeclarationKind, number>> = {
  import: 50,
  class: 1000,
  function: 500,
  mixin: 100,
  extension: 100,
  enum: 100,
  typedef: 100,
  asyncGenerator: 100,
  asyncFunction: 200,
  variable: 0,
  directive: 0,
  member: 0,
};

export type DeclarationKind =
  | 'import'
  | 'class'
  | 'function'
  | 'mixin'
  | 'extension'
  | 'enum'
  | 'typedef'
  | 'asyncGenerator'
  | 'asyncFunction'
  | 'variable'
  | 'directive'
  | 'member';

export interface DartExtractionOptions {
  filePath: string;
  strategy: DartStrategy;
  maxSymbols: number;
  asyncAnalysis: boolean;
}

export interface ExtractionFailure {
  step: string;
  error: string;
}

interface Span {
  start: number;
  end: number;
}

interface PatternMatch {
  /** Offset where the declaration text starts, indentation skipped */
  start: number;
  end: number;
  group(index: number): string | undefined;
  groupStart(index: number): number;
}

interface CallableMatch {
  name: string;
  start: number;
  end: number;
  nameStart: number;
  annotations: string;
  returnType: string;
  signature: string;
  asyncMarker?: 'async' | 'async*' | 'sync*';
}

const CALLABLE_TAIL = /^\s*(async\*|async|sync\*)?\s*(\{|=>|;)/;

function findAll(pattern: RegExp, content: string, span: Span): PatternMatch[] {
  const text = content.slice(span.start, span.end);
  const matches: PatternMatch[] = [];
  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    const lead = match[0].length - match[0].trimStart().length;
    matches.push({
      start: span.start + index + lead,
      end: span.start + index + match[0].length,
      group: i => match[i],
      groupStart: i => span.start + (match.indices?.[i]?.[0] ?? index),
    });
  }
  return matches;
}

function matchingParen(content: string, open: number): number {
  let depth = 0;
  for (let i = open; i < content.length; i++) {
    const ch = content[i];
    if (ch === '(') depth++;
    else if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function leadingWord(text: string): string {
  return /^\s*(\w+)/.exec(text)?.[1] ?? '';
}

function baseType(type: string): string {
  return type.trim().split('<')[0].replace(/\?$/, '');
}

/**
 * Pattern-driven Dart declaration extractor.
 *
 * Builds the root's child nodes for one source file under one strategy. Each step runs
 * guarded: a throw is logged, recorded in {@link failures}, and the nodes found so far stay.
 */
export class DartExtractor {
  readonly nodes: ASTNode[] = [];
  readonly failures: ExtractionFailure[] = [];

  private readonly index: LineIndex;
  private readonly lineDepths: number[];
  private readonly counts = new Map<DeclarationKind, number>();
  private remaining: number;

  constructor(
    private readonly content: string,
    private readonly options: DartExtractionOptions,
    private readonly ctx: ParseContext,
    private readonly logger: Logger,
  ) {
    this.index = new LineIndex(content);
    this.lineDepths = depthAtLineStarts(content);
    this.remaining =
      options.strategy === 'limited' ? Math.min(LIMITED_MAX_SYMBOLS, options.maxSymbols) : options.maxSymbols;
  }

  get withMembers(): boolean {
    return this.options.strategy === 'full';
  }

  get truncated(): boolean {
    return this.remaining <= 0;
  }

  run(): ASTNode[] {
    if (this.content.length === 0) return this.nodes;

    const whole: Span = { start: 0, end: this.content.length };
    switch (this.options.strategy) {
      case 'full':
        this.guard('extract_imports', () => this.extractImports(whole));
        this.guard('extract_classes', () => this.extractClasses(whole));
        this.guard('extract_mixins', () => this.extractMixins(whole));
        this.guard('extract_extensions', () => this.extractExtensions(whole));
        this.guard('extract_enums', () => this.extractEnums(whole));
        this.guard('extract_typedefs', () => this.extractTypedefs(whole));
        this.guard('extract_functions', () => this.extractFunctions(whole));
        this.guard('extract_variables', () => this.extractVariables(whole));
        this.guard('extract_part_directives', () => this.extractPartDirectives(whole));
        break;
      case 'limited':
        this.guard('extract_imports', () => this.extractImports(whole));
        this.guard('extract_classes', () => this.extractClasses(whole));
        this.guard('extract_functions', () => this.extractFunctions(whole));
        this.guard('extract_mixins', () => this.extractMixins(whole));
        this.guard('extract_extensions', () => this.extractExtensions(whole));
        this.guard('extract_enums', () => this.extractEnums(whole));
        this.guard('extract_typedefs', () => this.extractTypedefs(whole));
        break;
      case 'streaming':
        this.extractStreaming();
        break;
    }

    this.nodes.sort((a, b) => a.location.line - b.location.line || a.location.column - b.location.column);
    return this.nodes;
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  extractImports(span: Span): void {
    for (const match of findAll(IMPORT_DIRECTIVE, this.content, span)) {
      if (!this.admit('import')) return;
      const path = match.group(1) ?? '';
      const alias = AS_CLAUSE.exec(match.group(2) ?? '')?.[1];
      const metadata: NodeMetadata = { uri_scheme: path.startsWith('dart:') ? 'dart' : path.startsWith('package:') ? 'package' : 'relative' };
      if (alias) metadata.alias = alias;

      this.nodes.push(
        this.node('import_statement', `import-${this.lineOf(match.start)}`, match.start, match.end, {
          children: [this.leaf('string_literal', `import-path-${path}`, path, match.groupStart(1))],
          metadata,
        }),
      );
    }
  }

  extractClasses(span: Span): void {
    for (const match of this.findTopLevel(CLASS_DECLARATION, span)) {
      if (!this.admit('class')) return;
      const name = match.group(2) ?? '';
      const header = (match.group(3) ?? '').trim();
      const modifiers = (match.group(1) ?? '').trim().split(/\s+/).filter(Boolean);
      const superclass = EXTENDS_CLAUSE.exec(header);
      const block = extractBlock(this.content, match.end - 1);
      const end = block ? Math.min(block.end + 1, this.content.length) : match.end;

      const members = this.withMembers && block ? this.extractMembers(block, name) : [];
      const metadata: NodeMetadata = {};
      const modifier = modifiers.find(word => word !== 'abstract');
      if (modifier) metadata.modifier = modifier;
      if (modifiers.includes('abstract')) metadata.is_abstract = true;
      if (superclass) metadata.superclass = superclass[1];
      const mixins = WITH_CLAUSE.exec(header)?.[1];
      if (mixins) metadata.mixins = splitTopLevel(mixins, ',').map(part => part.trim());
      const interfaces = IMPLEMENTS_CLAUSE.exec(header)?.[1];
      if (interfaces) metadata.interfaces = splitTopLevel(interfaces, ',').map(part => part.trim());

      const isStateClass = superclass?.[1] === 'State';
      const widgetType = superclass ? WIDGET_SUPERCLASSES[superclass[1]] : undefined;
      if (isStateClass) {
        metadata.flutter_type = 'state_class';
        metadata.extends = 'State';
        const stateOf = superclass?.[2];
        if (stateOf) metadata.state_of = stateOf.trim();
        metadata.has_lifecycle_methods = members.some(member => member.type === 'lifecycle_method');
      } else if (widgetType) {
        metadata.flutter_type = 'widget';
        metadata.widget_type = widgetType;
        metadata.has_build_method = members.some(member => member.type === 'build_method');
      }

      const line = this.lineOf(match.start);
      this.nodes.push(
        this.node(isStateClass ? 'state_class_declaration' : 'class_declaration', `class-${name}-${line}`, match.start, end, {
          children: [this.leaf('identifier', `class-name-${name}`, name, match.groupStart(2)), ...members],
          metadata,
        }),
      );
    }
  }

  extractMixins(span: Span): void {
    for (const match of this.findTopLevel(MIXIN_DECLARATION, span)) {
      const name = match.group(1) ?? '';
      if (name === 'class') continue;
      if (!this.admit('mixin')) return;

      const constraint = ON_CLAUSE.exec((match.group(2) ?? '').trim())?.[1]?.trim() ?? '';
      const block = extractBlock(this.content, match.end - 1);
      const end = block ? Math.min(block.end + 1, this.content.length) : match.end;
      const members = this.withMembers && block ? this.extractMembers(block, name) : [];

      const line = this.lineOf(match.start);
      this.nodes.push(
        this.node('mixin_declaration', `mixin-${name}-${line}`, match.start, end, {
          children: [this.leaf('identifier', `mixin-name-${name}`, name, match.groupStart(1)), ...members],
          metadata: { dart_type: 'mixin', has_constraint: constraint !== '', constraint_type: constraint },
        }),
      );
    }
  }

  extractExtensions(span: Span): void {
    for (const match of this.findTopLevel(EXTENSION_DECLARATION, span)) {
      if (!this.admit('extension')) return;
      const line = this.lineOf(match.start);
      const declared = match.group(1);
      const name = declared ?? `Extension${line}`;
      const target = (match.group(3) ?? '').trim();
      const block = extractBlock(this.content, match.end - 1);
      const end = block ? Math.min(block.end + 1, this.content.length) : match.end;
      const members = this.withMembers && block ? this.extractMembers(block, name) : [];

      this.nodes.push(
        this.node('extension_declaration', `extension-${name}-${line}`, match.start, end, {
          children: [
            this.leaf('identifier', `extension-name-${name}`, name, declared ? match.groupStart(1) : match.start),
            this.leaf('type_identifier', `extension-target-${target}`, target, match.groupStart(3)),
            ...members,
          ],
          metadata: {
            dart_type: 'extension',
            extends_type: target,
            is_unnamed: declared === undefined,
            is_generic: match.group(2) !== undefined,
          },
        }),
      );
    }
  }

  extractEnums(span: Span): void {
    for (const match of this.findTopLevel(ENUM_DECLARATION, span)) {
      if (!this.admit('enum')) return;
      const name = match.group(1) ?? '';
      const header = (match.group(2) ?? '').trim();
      const block = extractBlock(this.content, match.end - 1);
      const end = block ? Math.min(block.end + 1, this.content.length) : match.end;

      const [valueSection, ...memberSections] = block ? splitTopLevel(block.body, ';') : [''];
      const values = block ? this.enumValues(valueSection, block.bodyStart) : [];
      const hasMemberSection = memberSections.join(';').trim() !== '';
      const members = this.withMembers && block && hasMemberSection ? this.extractMembers(block, name) : [];

      const line = this.lineOf(match.start);
      this.nodes.push(
        this.node('enum_declaration', `enum-${name}-${line}`, match.start, end, {
          children: [this.leaf('identifier', `enum-name-${name}`, name, match.groupStart(1)), ...values, ...members],
          metadata: {
            dart_type: 'enum',
            is_enhanced:
              hasMemberSection || /\b(?:implements|with)\b/.test(header) || values.some(value => value.value.includes('(')),
            value_count: values.length,
            has_methods: members.some(member => member.type !== 'variable_declaration'),
            is_generic: header.startsWith('<'),
          },
        }),
      );
    }
  }

  extractTypedefs(span: Span): void {
    const found: Array<{ match: PatternMatch; name: string; target: string; nameGroup: number; generic: boolean; legacy: boolean }> = [];
    for (const match of this.findTopLevel(TYPEDEF_DECLARATION, span)) {
      found.push({
        match,
        name: match.group(1) ?? '',
        target: collapse(match.group(3) ?? ''),
        nameGroup: 1,
        generic: match.group(2) !== undefined,
        legacy: false,
      });
    }
    for (const match of this.findTopLevel(LEGACY_FUNCTION_TYPEDEF, span)) {
      const text = this.content.slice(match.start, match.end);
      found.push({
        match,
        name: match.group(2) ?? '',
        target: collapse(text.replace(/^typedef\s+/, '').replace(/;$/, '')),
        nameGroup: 2,
        generic: false,
        legacy: true,
      });
    }
    found.sort((a, b) => a.match.start - b.match.start);

    for (const { match, name, target, nameGroup, generic, legacy } of found) {
      if (!this.admit('typedef')) return;
      const isFunction = legacy || /\bFunction\b/.test(target);
      const line = this.lineOf(match.start);
      this.nodes.push(
        this.node(isFunction ? 'function_typedef' : 'typedef_declaration', `typedef-${name}-${line}`, match.start, match.end, {
          children: [
            this.leaf('identifier', `typedef-name-${name}`, name, match.groupStart(nameGroup)),
            this.leaf('type_identifier', `typedef-target-${name}`, target, match.groupStart(nameGroup)),
          ],
          metadata: {
            dart_type: 'typedef',
            target_type: target,
            is_function_type: target.includes('(') && target.includes(')'),
            is_generic: generic,
          },
        }),
      );
    }
  }

  extractFunctions(span: Span): void {
    for (const callable of this.findCallables(span, 0)) {
      const { type, kind, prefix, metadata } = this.classifyTopLevel(callable);
      if (this.truncated) return;
      if (!this.admit(kind)) continue;

      const line = this.lineOf(callable.start);
      this.nodes.push(
        this.node(type, `${prefix}-${callable.name}-${line}`, callable.start, callable.end, {
          children: [this.leaf('identifier', `${prefix}-name-${callable.name}`, callable.name, callable.nameStart)],
          metadata: { ...metadata, signature: callable.signature },
        }),
      );
    }
  }

  extractVariables(span: Span): void {
    for (const variable of this.findVariables(span, 0)) {
      if (!this.admit('variable')) return;
      this.nodes.push(variable);
    }
  }

  extractPartDirectives(span: Span): void {
    for (const match of findAll(PART_DIRECTIVE, this.content, span)) {
      if (!this.admit('directive')) return;
      const file = match.group(1) ?? '';
      this.nodes.push(
        this.node('part_directive', `part-${file}-${this.lineOf(match.start)}`, match.start, match.end, {
          children: [this.leaf('string_literal', `part-file-${file}`, file, match.groupStart(1))],
        }),
      );
    }

    for (const match of findAll(PART_OF_DIRECTIVE, this.content, span)) {
      const path = match.group(1);
      const target = path ?? match.group(2) ?? '';
      if (target === '') continue;
      if (!this.admit('directive')) return;
      this.nodes.push(
        this.node('part_of_directive', `part-of-${target}-${this.lineOf(match.start)}`, match.start, match.end, {
          children: [this.leaf('identifier', `part-of-target-${target}`, target, match.groupStart(path ? 1 : 2))],
          metadata: { target_kind: path ? 'file' : 'library' },
        }),
      );
    }
  }

  extractStreaming(): void {
    const length = this.content.length;
    let offset = 0;

    while (offset < length && !this.truncated) {
      let end = Math.min(offset + STREAMING_CHUNK_SIZE, length);
      // Pull the window back to the last closing brace so a declaration is not split
      if (end < length) {
        const lastBrace = this.content.lastIndexOf('}', end - 1);
        if (lastBrace > offset && lastBrace < end - 1) end = lastBrace + 1;
      }

      const chunk: Span = { start: offset, end };
      this.guard('extract_chunk', () => this.extractChunk(chunk));
      offset = end;
    }

    if (this.truncated) {
      this.logger.debug('streaming extraction reached symbol limit', {
        file_path: this.options.filePath,
        max_symbols: this.options.maxSymbols,
      });
    }
  }

  extractChunk(chunk: Span): void {
    this.extractClasses(chunk);
    this.extractMixins(chunk);
    this.extractExtensions(chunk);
    this.extractEnums(chunk);
    this.extractFunctions(chunk);
    this.extractTypedefs(chunk);
    this.extractImports(chunk);
  }

  // ===========================================================================
  // Members
  // ===========================================================================

  private extractMembers(block: { bodyStart: number; end: number }, ownerName: string): ASTNode[] {
    const span: Span = { start: block.bodyStart, end: block.end };
    const depth = this.depthOf(block.bodyStart);
    const members: ASTNode[] = [];

    for (const callable of this.findCallables(span, depth, ownerName)) {
      if (!this.admit('member')) break;
      const { type, prefix, metadata } = this.classifyMember(callable);
      const line = this.lineOf(callable.start);
      members.push(
        this.node(type, `${prefix}-${callable.name}-${line}`, callable.start, callable.end, {
          children: [this.leaf('identifier', `${prefix}-name-${callable.name}`, callable.name, callable.nameStart)],
          metadata: { ...metadata, signature: callable.signature },
        }),
      );
    }

    for (const variable of this.findVariables(span, depth)) {
      if (!this.admit('member')) break;
      members.push(variable);
    }

    return members.sort((a, b) => a.location.line - b.location.line || a.location.column - b.location.column);
  }

  private classifyMember(callable: CallableMatch): { type: string; prefix: string; metadata: NodeMetadata } {
    const hasOverride = callable.annotations.includes('@override');

    if (callable.name === 'build' && /\bWidget\b/.test(callable.returnType) && /\(\s*BuildContext\b/.test(callable.signature)) {
      return { type: 'build_method', prefix: 'build', metadata: { flutter_type: 'build_method', has_override: hasOverride } };
    }
    if (LIFECYCLE_METHODS.has(callable.name) && hasOverride && /\bvoid\b/.test(callable.returnType)) {
      return {
        type: 'lifecycle_method',
        prefix: 'lifecycle',
        metadata: {
          flutter_type: 'lifecycle_method',
          lifecycle_stage: callable.name,
          has_override: true,
          widget_lifecycle: lifecyclePhase(callable.name),
        },
      };
    }
    if (this.options.asyncAnalysis && (callable.asyncMarker === 'async' || callable.asyncMarker === 'async*')) {
      return {
        type: 'async_method',
        prefix: 'async-method',
        metadata: {
          async_type: callable.asyncMarker === 'async*' ? 'generator' : 'method',
          return_type: baseType(callable.returnType.replace(/\b(?:static|external)\s+/g, '')) || 'Future',
        },
      };
    }
    if (HIGHER_ORDER_NAMES.has(callable.name)) {
      return {
        type: 'higher_order_method',
        prefix: 'higher-order-method',
        metadata: { functional_type: 'higher_order', pattern_name: callable.name },
      };
    }
    if (callable.name.startsWith('create') && /\bFunction\b/.test(callable.returnType)) {
      return { type: 'closure_factory', prefix: 'closure-factory', metadata: { functional_type: 'closure_factory' } };
    }
    return { type: 'method_declaration', prefix: 'method', metadata: hasOverride ? { has_override: true } : {} };
  }

  private classifyTopLevel(callable: CallableMatch): {
    type: string;
    kind: DeclarationKind;
    prefix: string;
    metadata: NodeMetadata;
  } {
    if (this.options.asyncAnalysis && callable.asyncMarker === 'async*') {
      return {
        type: 'async_generator',
        kind: 'asyncGenerator',
        prefix: 'async-generator',
        metadata: { async_type: 'generator', return_type: baseType(callable.returnType) || 'Stream' },
      };
    }
    if (this.options.asyncAnalysis && callable.asyncMarker === 'async') {
      return {
        type: 'async_function',
        kind: 'asyncFunction',
        prefix: 'async-function',
        metadata: { async_type: 'function', return_type: baseType(callable.returnType) || 'Future' },
      };
    }
    if (HIGHER_ORDER_NAMES.has(callable.name)) {
      return {
        type: 'higher_order_function',
        kind: 'function',
        prefix: 'higher-order',
        metadata: { functional_type: 'higher_order', pattern_name: callable.name },
      };
    }
    if (callable.name.startsWith('create') && /\bFunction\b/.test(callable.returnType)) {
      return { type: 'closure_factory', kind: 'function', prefix: 'closure-factory', metadata: { functional_type: 'closure_factory' } };
    }
    return { type: 'function_declaration', kind: 'function', prefix: 'function', metadata: {} };
  }

  // ===========================================================================
  // Matching helpers
  // ===========================================================================

  private findTopLevel(pattern: RegExp, span: Span): PatternMatch[] {
    return findAll(pattern, this.content, span).filter(match => this.depthOf(match.start) === 0);
  }

  private findCallables(span: Span, depth: number, ownerName?: string): CallableMatch[] {
    const callables: CallableMatch[] = [];

    for (const match of findAll(CALLABLE_HEAD, this.content, span)) {
      if (this.depthOf(match.start) !== depth) continue;

      const name = match.group(3) ?? '';
      const returnType = match.group(2) ?? '';
      if (CONTROL_FLOW_KEYWORDS.has(name) || name === ownerName) continue;
      if (NON_MEMBER_LEADING_WORDS.has(leadingWord(returnType + name))) continue;
      // `Foo(` is a class reference in a pattern or a constructor call
      if (/^[A-Z]/.test(name) && this.content.startsWith('(', match.groupStart(3) + name.length)) continue;

      const open = match.end - 1;
      const close = matchingParen(this.content, open);
      if (close === -1) continue;

      const tail = CALLABLE_TAIL.exec(this.content.slice(close + 1, close + 64));
      if (!tail) continue;
      const terminator = tail[2];
      if (terminator === ';' && returnType.trim() === '') continue;

      const bodyAt = close + 1 + tail[0].length - terminator.length;
      const end = this.callableEnd(bodyAt, terminator);
      const signatureStart = returnType ? match.groupStart(2) : match.groupStart(3);
      const marker = tail[1];

      callables.push({
        name,
        start: match.start,
        end,
        nameStart: match.groupStart(3),
        annotations: match.group(1) ?? '',
        returnType: returnType.trim(),
        signature: collapse(this.content.slice(signatureStart, close + 1)) + (marker ? ` ${marker}` : ''),
        asyncMarker: marker === 'async' || marker === 'async*' || marker === 'sync*' ? marker : undefined,
      });
    }

    return callables;
  }

  private callableEnd(bodyAt: number, terminator: string): number {
    if (terminator === '{') {
      const close = findMatchingBrace(this.content, bodyAt);
      return close === -1 ? this.content.length : close + 1;
    }
    if (terminator === '=>') {
      const semicolon = this.content.indexOf(';', bodyAt);
      return semicolon === -1 ? this.content.length : semicolon + 1;
    }
    return bodyAt + 1;
  }

  private findVariables(span: Span, depth: number): ASTNode[] {
    const variables: ASTNode[] = [];

    for (const match of findAll(VARIABLE_DECLARATION, this.content, span)) {
      if (this.depthOf(match.start) !== depth) continue;

      const modifiers = (match.group(1) ?? '').trim().split(/\s+/).filter(Boolean);
      const type = (match.group(2) ?? '').trim();
      const name = match.group(3) ?? '';
      if (modifiers.length === 0 && type === '') continue;
      if (NON_MEMBER_LEADING_WORDS.has(leadingWord(type)) || CONTROL_FLOW_KEYWORDS.has(name)) continue;
      // `a, b;` is an enum value list
      if (type.endsWith(',')) continue;

      const metadata: NodeMetadata = {};
      if (type) metadata.declared_type = type;
      for (const modifier of modifiers) {
        metadata[`is_${modifier}`] = true;
      }

      const line = this.lineOf(match.start);
      const statementEnd = this.content.indexOf(';', match.end - 1);
      variables.push(
        this.node('variable_declaration', `variable-${name}-${line}`, match.start, statementEnd === -1 ? match.end : statementEnd + 1, {
          children: [this.leaf('identifier', `variable-name-${name}`, name, match.groupStart(3))],
          metadata,
        }),
      );
    }

    return variables;
  }

  private enumValues(section: string, sectionStart: number): ASTNode[] {
    const values: ASTNode[] = [];
    let cursor = 0;

    for (const part of splitTopLevel(section, ',')) {
      const partStart = sectionStart + cursor;
      cursor += part.length + 1;

      const cleaned = part
        .replace(/\/\/[^\n]*/g, '')
        .replace(/\/\*[\s\S]*?\*\//g, '')
        .replace(/@\w+(?:\([^)]*\))?/g, '')
        .trim();
      const name = /^([A-Za-z_$][\w$]*)/.exec(cleaned)?.[1];
      if (!name) continue;

      const nameStart = partStart + part.indexOf(name);
      values.push(
        this.node('enum_value', `enum-value-${name}-${this.lineOf(nameStart)}`, nameStart, nameStart + cleaned.length, {
          value: cleaned,
          children: [this.leaf('identifier', `enum-value-name-${name}`, name, nameStart)],
          metadata: cleaned.includes('(') ? { has_arguments: true } : undefined,
        }),
      );
    }

    return values;
  }

  // ===========================================================================
  // Node construction
  // ===========================================================================

  private admit(kind: DeclarationKind): boolean {
    if (this.remaining <= 0) return false;
    if (this.options.strategy === 'limited') {
      const count = this.counts.get(kind) ?? 0;
      if (count >= LIMITED_KIND_CAPS[kind]) return false;
      this.counts.set(kind, count + 1);
    }
    this.remaining--;
    return true;
  }

  private guard(step: string, run: () => void): void {
    const { error } = runGuarded({ ...this.ctx, filePath: this.options.filePath, language: 'dart' }, step, this.logger, run, undefined);
    if (error) {
      this.failures.push({ step, error: error.message });
    }
  }

  private depthOf(offset: number): number {
    return depthAt(this.content, this.index, this.lineDepths, offset);
  }

  private lineOf(offset: number): number {
    return this.index.lineOf(offset);
  }

  private node(
    type: string,
    id: string,
    start: number,
    end: number,
    parts: { value?: string; children?: ASTNode[]; metadata?: NodeMetadata },
  ): ASTNode {
    const node: ASTNode = {
      id,
      type,
      value: parts.value ?? this.content.slice(start, end),
      location: {
        filePath: this.options.filePath,
        line: this.index.lineOf(start),
        column: this.index.columnOf(start),
        endLine: this.index.lineOf(end),
        endColumn: this.index.columnOf(end),
      },
      children: parts.children ?? [],
    };
    if (parts.metadata && Object.keys(parts.metadata).length > 0) node.metadata = parts.metadata;
    return node;
  }

  private leaf(type: string, id: string, value: string, start: number): ASTNode {
    return this.node(type, id, start, start + value.length, { value });
  }
}

export function lifecyclePhase(name: string): string {
  switch (name) {
    case 'initState':
    case 'didChangeDependencies':
      return 'initialization';
    case 'build':
      return 'rendering';
    case 'didUpdateWidget':
    case 'setState':
      return 'update';
    case 'deactivate':
    case 'dispose':
      return 'disposal';
    default:
      return 'unknown';
  }
}
