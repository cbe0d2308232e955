import {
  AST_VERSION,
  ParsingError,
  isCancelled,
  runGuarded,
  type Logger,
  type ParseContext,
} from '@symbolscope/core';
import { hashContent } from '../../content-hash.js';
import {
  LineIndex,
  countMatches,
  depthAt,
  depthAtLineStarts,
  findMatchingBrace,
  splitTopLevel,
} from '../../utils/text.js';
import type { AST, ASTNode, NodeMetadata, SymbolInfo, Visibility } from '../types.js';
import {
  ASSOCIATEDTYPE_TAIL,
  DECLARATION_HEAD,
  DEINIT_TAIL,
  FRAMEWORK_IMPORTS,
  FUNC_TAIL,
  IMPORT_TAIL,
  INIT_TAIL,
  MACRO_TAIL,
  NON_WRAPPER_ATTRIBUTES,
  OPERATOR_TAIL,
  PROPERTY_TAIL,
  PROPERTY_WRAPPER,
  SIGNATURE_TAIL,
  SUBSCRIPT_TAIL,
  SWIFT_FEATURE_GROUPS,
  TYPEALIAS_TAIL,
  TYPE_TAIL,
} from './swift-patterns.js';
import { extractSwiftSymbols } from './swift-symbols.js';
import type { LanguageDefinition, LanguageParser, ParserDependencies } from './types.js';

type SwiftKeyword =
  | 'class'
  | 'struct'
  | 'protocol'
  | 'enum'
  | 'actor'
  | 'extension'
  | 'typealias'
  | 'associatedtype'
  | 'func'
  | 'init'
  | 'deinit'
  | 'subscript'
  | 'let'
  | 'var'
  | 'operator'
  | 'macro'
  | 'import';

const TYPE_KEYWORDS = new Set<string>(['class', 'struct', 'protocol', 'enum', 'actor', 'extension']);

const FIXITIES = ['prefix', 'postfix', 'infix'];

function isSwiftKeyword(word: string): word is SwiftKeyword {
  return TYPE_KEYWORDS.has(word) || /^(?:typealias|associatedtype|func|init|deinit|subscript|let|var|operator|macro|import)$/.test(word);
}

function visibilityOf(modifiers: string[]): Visibility | undefined {
  for (const modifier of modifiers) {
    const access = modifier.replace(/\(.*\)$/, '');
    if (access === 'private' || access === 'fileprivate') return 'private';
    if (access === 'public' || access === 'open' || access === 'internal' || access === 'package') return 'public';
  }
  return undefined;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
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

function execAt(pattern: RegExp, content: string, at: number): RegExpExecArray | null {
  pattern.lastIndex = at;
  return pattern.exec(content);
}

/** Declaration before nesting: its span and, for types, where the body starts */
interface Declaration {
  node: ASTNode;
  start: number;
  end: number;
  bodyStart?: number;
}

interface Head {
  keyword: SwiftKeyword;
  attributes: string;
  modifiers: string[];
  start: number;
  keywordStart: number;
  end: number;
}

/**
 * Finds Swift declarations and nests them by containment.
 *
 * A declaration is kept when its brace depth equals the body depth of the innermost
 * enclosing type (or 0 at file level). Locals inside functions, closures and accessors
 * sit deeper and drop out.
 */
class SwiftScanner {
  private readonly index: LineIndex;
  private readonly lineDepths: number[];

  constructor(
    private readonly content: string,
    private readonly filePath: string,
  ) {
    this.index = new LineIndex(content);
    this.lineDepths = depthAtLineStarts(content);
  }

  scan(): ASTNode[] {
    const roots: ASTNode[] = [];
    const containers: Declaration[] = [];

    for (const match of this.content.matchAll(DECLARATION_HEAD)) {
      const head = this.headOf(match);
      if (!head) continue;

      while (containers.length > 0 && (containers[containers.length - 1]?.end ?? 0) <= head.start) {
        containers.pop();
      }
      const parent = containers[containers.length - 1];
      const expectedDepth = parent?.bodyStart !== undefined ? this.depthOf(parent.bodyStart) : 0;
      if (this.depthOf(head.start) !== expectedDepth) continue;
      if (head.keyword === 'import' && parent) continue;

      const declaration = this.read(head, parent !== undefined);
      if (!declaration) continue;

      if (parent) parent.node.children.push(declaration.node);
      else roots.push(declaration.node);
      if (declaration.bodyStart !== undefined) containers.push(declaration);
    }

    return roots;
  }

  private headOf(match: RegExpMatchArray): Head | undefined {
    const keyword = match[3] ?? '';
    if (!isSwiftKeyword(keyword)) return undefined;
    const index = match.index ?? 0;
    const lead = match[0].length - match[0].trimStart().length;
    return {
      keyword,
      attributes: (match[1] ?? '').trim(),
      modifiers: (match[2] ?? '').trim().split(/\s+/).filter(Boolean),
      start: index + lead,
      keywordStart: match.indices?.[3]?.[0] ?? index,
      end: index + match[0].length,
    };
  }

  private read(head: Head, nested: boolean): Declaration | undefined {
    switch (head.keyword) {
      case 'class':
      case 'struct':
      case 'protocol':
      case 'enum':
      case 'actor':
      case 'extension':
        return this.readType(head);
      case 'typealias':
        return this.readTypealias(head);
      case 'associatedtype':
        return this.readAssociatedType(head);
      case 'func':
        return this.readFunction(head, nested);
      case 'init':
        return this.readInitializer(head);
      case 'deinit':
        return this.readDeinitializer(head);
      case 'subscript':
        return this.readSubscript(head);
      case 'let':
      case 'var':
        return this.readProperty(head);
      case 'operator':
        return this.readOperator(head);
      case 'macro':
        return this.readMacro(head);
      case 'import':
        return this.readImport(head);
    }
  }

  // ---------------------------------------------------------------------------
  // Declarations
  // ---------------------------------------------------------------------------

  private readType(head: Head): Declaration | undefined {
    const match = execAt(TYPE_TAIL, this.content, head.end);
    if (!match) return undefined;

    const name = match[1] ?? '';
    const header = collapse(match[2] ?? '');
    const brace = TYPE_TAIL.lastIndex - 1;
    const close = findMatchingBrace(this.content, brace);
    const end = close === -1 ? this.content.length : close + 1;

    const metadata = this.baseMetadata(head, collapse(this.content.slice(head.keywordStart, brace)));
    const generics = /^<[^>]*>/.exec(header)?.[0];
    if (generics) metadata.is_generic = true;
    const conformances = /^:\s*(.+?)(?:\s+where\b.*)?$/.exec(header.slice(generics?.length ?? 0).trim())?.[1];
    if (conformances) metadata.inherits = splitTopLevel(conformances, ',').map(part => part.trim()).filter(Boolean);
    if (head.modifiers.includes('final')) metadata.is_final = true;
    if (head.keyword === 'actor') metadata.is_actor = true;
    if (head.keyword === 'extension') metadata.extended_type = name;
    if (/@resultBuilder\b|@_functionBuilder\b/.test(head.attributes)) metadata.is_result_builder = true;

    return {
      node: this.node(`${head.keyword}_declaration`, `${head.keyword}-${name}-${this.lineOf(head.start)}`, head.start, end, {
        name,
        nameStart: match.indices?.[1]?.[0] ?? head.keywordStart,
        metadata,
      }),
      start: head.start,
      end,
      bodyStart: brace + 1,
    };
  }

  private readTypealias(head: Head): Declaration | undefined {
    const match = execAt(TYPEALIAS_TAIL, this.content, head.end);
    if (!match) return undefined;
    const name = match[1] ?? '';
    const target = (match[3] ?? '').trim();
    const end = TYPEALIAS_TAIL.lastIndex;

    const metadata = this.baseMetadata(head, collapse(this.content.slice(head.keywordStart, end)));
    metadata.aliased_type = target;
    if (match[2]) metadata.is_generic = true;
    return this.simple(head, 'typealias', name, match.indices?.[1]?.[0], end, metadata);
  }

  private readAssociatedType(head: Head): Declaration | undefined {
    const match = execAt(ASSOCIATEDTYPE_TAIL, this.content, head.end);
    if (!match) return undefined;
    const name = match[1] ?? '';
    const end = ASSOCIATEDTYPE_TAIL.lastIndex;

    const metadata = this.baseMetadata(head, collapse(this.content.slice(head.keywordStart, end)));
    const constraint = match[2]?.trim();
    if (constraint) metadata.constraint = constraint;
    return this.simple(head, 'associatedtype', name, match.indices?.[1]?.[0], end, metadata);
  }

  private readFunction(head: Head, nested: boolean): Declaration | undefined {
    const match = execAt(FUNC_TAIL, this.content, head.end);
    if (!match) return undefined;
    const name = match[1] ?? '';
    const callable = this.readCallable(head, FUNC_TAIL.lastIndex - 1);
    if (!callable) return undefined;

    const { metadata, end } = callable;
    if (match[2]) metadata.is_generic = true;
    if (head.modifiers.includes('static') || head.modifiers.includes('class')) metadata.is_static = true;
    if (head.modifiers.includes('override')) metadata.is_override = true;
    if (head.modifiers.includes('mutating')) metadata.is_mutating = true;
    if (!/^\w/.test(name)) {
      metadata.operator_symbol = name;
      const fixity = head.modifiers.find(modifier => FIXITIES.includes(modifier));
      if (fixity) metadata.fixity = fixity;
    }
    if (/@ViewBuilder\b/.test(head.attributes)) metadata.is_view_builder = true;

    const type = nested ? 'method_declaration' : 'function_declaration';
    const prefix = nested ? 'method' : 'func';
    return {
      node: this.node(type, `${prefix}-${name}-${this.lineOf(head.start)}`, head.start, end, {
        name,
        nameStart: match.indices?.[1]?.[0] ?? head.keywordStart,
        metadata,
      }),
      start: head.start,
      end,
    };
  }

  private readInitializer(head: Head): Declaration | undefined {
    const match = execAt(INIT_TAIL, this.content, head.end);
    if (!match) return undefined;
    const callable = this.readCallable(head, INIT_TAIL.lastIndex - 1);
    if (!callable) return undefined;

    const { metadata, end } = callable;
    if (match[1]) metadata.is_failable = true;
    if (head.modifiers.includes('convenience')) metadata.is_convenience = true;
    if (head.modifiers.includes('required')) metadata.is_required = true;
    return this.simple(head, 'init', 'init', head.keywordStart, end, metadata);
  }

  private readDeinitializer(head: Head): Declaration | undefined {
    if (!execAt(DEINIT_TAIL, this.content, head.end)) return undefined;
    const close = findMatchingBrace(this.content, DEINIT_TAIL.lastIndex - 1);
    const end = close === -1 ? this.content.length : close + 1;
    return this.simple(head, 'deinit', 'deinit', head.keywordStart, end, this.baseMetadata(head, 'deinit'));
  }

  private readSubscript(head: Head): Declaration | undefined {
    if (!execAt(SUBSCRIPT_TAIL, this.content, head.end)) return undefined;
    const callable = this.readCallable(head, SUBSCRIPT_TAIL.lastIndex - 1);
    if (!callable) return undefined;
    return this.simple(head, 'subscript', 'subscript', head.keywordStart, callable.end, callable.metadata);
  }

  private readProperty(head: Head): Declaration | undefined {
    const match = execAt(PROPERTY_TAIL, this.content, head.end);
    if (!match) return undefined;
    const name = match[1] ?? '';
    const declaredType = match[2]?.trim();
    const follow = match[3] ?? '';

    let end: number;
    let accessors = '';
    if (follow === '{') {
      const brace = PROPERTY_TAIL.lastIndex - 1;
      const close = findMatchingBrace(this.content, brace);
      end = close === -1 ? this.content.length : close + 1;
      accessors = this.content.slice(brace + 1, close === -1 ? end : close);
    } else if (follow === '=') {
      end = this.statementEnd(PROPERTY_TAIL.lastIndex);
    } else {
      end = follow === ';' ? PROPERTY_TAIL.lastIndex - 1 : PROPERTY_TAIL.lastIndex;
    }

    const signature = `${head.keyword} ${name}${declaredType ? `: ${declaredType}` : ''}`;
    const metadata = this.baseMetadata(head, signature);
    if (declaredType) metadata.declared_type = declaredType;
    if (head.keyword === 'let') metadata.is_constant = true;
    if (head.modifiers.includes('static') || head.modifiers.includes('class')) metadata.is_static = true;
    if (head.modifiers.includes('lazy')) metadata.is_lazy = true;

    const observed = /\b(?:willSet|didSet)\b/.test(accessors);
    const computed = follow === '{' && !observed;
    metadata.is_computed = computed;
    metadata.is_stored = !computed;
    if (observed) metadata.has_observers = true;
    if (computed && /\bget[^\S\n]+async\b/.test(accessors)) metadata.is_async = true;

    const wrapper = this.wrapperOf(head.attributes);
    metadata.is_wrapped = wrapper !== undefined;
    if (wrapper) {
      metadata.wrapper = `@${wrapper.name}`;
      metadata.has_wrapper_args = wrapper.hasArgs;
    }

    return this.simple(head, 'property', name, match.indices?.[1]?.[0], end, metadata);
  }

  private readOperator(head: Head): Declaration | undefined {
    const fixity = head.modifiers.find(modifier => FIXITIES.includes(modifier));
    if (!fixity) return undefined;
    const match = execAt(OPERATOR_TAIL, this.content, head.end);
    if (!match) return undefined;
    const symbol = match[1] ?? '';
    const end = this.statementEnd(OPERATOR_TAIL.lastIndex);

    const metadata = this.baseMetadata(head, collapse(this.content.slice(head.start, end)));
    metadata.operator_symbol = symbol;
    metadata.fixity = fixity;
    return this.simple(head, 'operator', symbol, match.indices?.[1]?.[0], end, metadata);
  }

  private readMacro(head: Head): Declaration | undefined {
    const match = execAt(MACRO_TAIL, this.content, head.end);
    if (!match) return undefined;
    const name = match[1] ?? '';
    const end = this.statementEnd(MACRO_TAIL.lastIndex);

    const metadata = this.baseMetadata(head, collapse(this.content.slice(head.keywordStart, end)));
    const role = /@(freestanding|attached)\b/.exec(head.attributes)?.[1];
    if (role) metadata.macro_role = role;
    return this.simple(head, 'macro', name, match.indices?.[1]?.[0], end, metadata);
  }

  private readImport(head: Head): Declaration | undefined {
    const match = execAt(IMPORT_TAIL, this.content, head.end);
    if (!match) return undefined;
    const path = match[1] ?? '';
    const end = IMPORT_TAIL.lastIndex;

    const metadata: NodeMetadata = { module: path.split('.')[0] ?? path };
    if (head.attributes.includes('@testable')) metadata.is_testable = true;
    return this.simple(head, 'import', path, match.indices?.[1]?.[0], end, metadata);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /**
   * Parameter list, effects and return type starting at the `(` at `open`, plus the body when
   * one opens on the same line.
   */
  private readCallable(head: Head, open: number): { metadata: NodeMetadata; end: number } | undefined {
    const close = matchingParen(this.content, open);
    if (close === -1) return undefined;

    const tail = execAt(SIGNATURE_TAIL, this.content, close + 1);
    const effects = tail?.[1] ?? '';
    const returnType = tail?.[2]?.trim();
    const afterSignature = tail ? SIGNATURE_TAIL.lastIndex : close + 1;

    const lineEnd = this.lineEndFrom(close);
    const brace = this.content.indexOf('{', afterSignature);
    let end: number;
    if (brace !== -1 && brace < lineEnd) {
      const bodyClose = findMatchingBrace(this.content, brace);
      end = bodyClose === -1 ? this.content.length : bodyClose + 1;
    } else {
      end = lineEnd;
    }

    const signature = collapse(
      this.content.slice(head.keywordStart, close + 1) + (effects ? ` ${effects}` : '') + (returnType ? ` -> ${returnType}` : ''),
    );
    const metadata = this.baseMetadata(head, signature);
    if (/\basync\b/.test(effects)) metadata.is_async = true;
    if (/\b(?:throws|rethrows)\b/.test(effects)) metadata.is_throws = true;
    if (returnType) metadata.return_type = returnType;
    return { metadata, end };
  }

  private baseMetadata(head: Head, signature: string): NodeMetadata {
    const metadata: NodeMetadata = { signature };
    const visibility = visibilityOf(head.modifiers);
    if (visibility) metadata.visibility = visibility;
    if (head.modifiers.length > 0) metadata.modifiers = head.modifiers;
    if (head.attributes) metadata.attributes = head.attributes.split(/\s+(?=@)/);
    return metadata;
  }

  private wrapperOf(attributes: string): { name: string; hasArgs: boolean } | undefined {
    for (const part of attributes.split(/\s+(?=@)/)) {
      const match = PROPERTY_WRAPPER.exec(part);
      if (match?.[1] && !NON_WRAPPER_ATTRIBUTES.has(match[1])) {
        return { name: match[1], hasArgs: match[2] !== undefined };
      }
    }
    return undefined;
  }

  /** First newline or `;` at bracket depth 0 from `from` */
  private statementEnd(from: number): number {
    let depth = 0;
    for (let i = from; i < this.content.length; i++) {
      const ch = this.content[i];
      if (ch === '(' || ch === '[' || ch === '{') depth++;
      else if (ch === ')' || ch === ']' || ch === '}') {
        if (depth === 0) return i;
        depth--;
      } else if ((ch === '\n' || ch === ';') && depth === 0) return i;
    }
    return this.content.length;
  }

  private lineEndFrom(offset: number): number {
    const newline = this.content.indexOf('\n', offset);
    return newline === -1 ? this.content.length : newline;
  }

  private depthOf(offset: number): number {
    return depthAt(this.content, this.index, this.lineDepths, offset);
  }

  private lineOf(offset: number): number {
    return this.index.lineOf(offset);
  }

  private simple(
    head: Head,
    prefix: string,
    name: string,
    nameStart: number | undefined,
    end: number,
    metadata: NodeMetadata,
  ): Declaration {
    return {
      node: this.node(`${prefix}_declaration`, `${prefix}-${name}-${this.lineOf(head.start)}`, head.start, end, {
        name,
        nameStart: nameStart ?? head.keywordStart,
        metadata,
      }),
      start: head.start,
      end,
    };
  }

  private node(
    type: string,
    id: string,
    start: number,
    end: number,
    parts: { name: string; nameStart: number; metadata: NodeMetadata },
  ): ASTNode {
    return {
      id,
      type,
      value: this.content.slice(start, end),
      location: this.location(start, end),
      children: [
        {
          id: `${id}-name`,
          type: 'identifier',
          value: parts.name,
          location: this.location(parts.nameStart, parts.nameStart + parts.name.length),
          children: [],
        },
      ],
      metadata: parts.metadata,
    };
  }

  private location(start: number, end: number) {
    return {
      filePath: this.filePath,
      line: this.index.lineOf(start),
      column: this.index.columnOf(start),
      endLine: this.index.lineOf(end),
      endColumn: this.index.columnOf(end),
    };
  }
}

/**
 * Module names imported by the file, first path segment only.
 */
function importedModules(declarations: ASTNode[]): Set<string> {
  const modules = new Set<string>();
  for (const node of declarations) {
    const module = node.metadata?.module;
    if (node.type === 'import_declaration' && typeof module === 'string') modules.add(module);
  }
  return modules;
}

/**
 * Pattern-based Swift parser.
 */
export class SwiftParser implements LanguageParser {
  readonly language = 'swift' as const;

  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: ParserDependencies) {
    this.logger = deps.logger;
    this.now = deps.now;
  }

  parse(content: string, filePath: string, ctx: ParseContext): AST {
    const start = this.now();
    if (isCancelled(ctx, start)) {
      throw new ParsingError('parsing cancelled before start', { operation: 'parse_swift', filePath, language: 'swift' });
    }

    const guardedCtx: ParseContext = { ...ctx, filePath, language: 'swift' };
    const failures: Array<{ step: string; error: string }> = [];

    const declarations = runGuarded(
      guardedCtx,
      'extract_declarations',
      this.logger,
      () => new SwiftScanner(content, filePath).scan(),
      [],
    );
    if (declarations.error) failures.push({ step: 'extract_declarations', error: declarations.error.message });

    const metadata: NodeMetadata = { parser: 'regex', parse_quality: 'basic' };
    const modules = importedModules(declarations.value);
    for (const [flag, imports] of FRAMEWORK_IMPORTS) {
      metadata[flag] = imports.some(name => modules.has(name));
    }

    const features = runGuarded(
      guardedCtx,
      'detect_features',
      this.logger,
      () => {
        for (const group of SWIFT_FEATURE_GROUPS) {
          const counts = Object.entries(group.counts).map(([key, pattern]) => [key, countMatches(content, pattern)] as const);
          if (counts.every(([, count]) => count === 0)) continue;
          metadata[group.flag] = true;
          for (const [key, count] of counts) {
            if (count > 0) metadata[key] = count;
          }
        }
      },
      undefined,
    );
    if (features.error) failures.push({ step: 'detect_features', error: features.error.message });

    metadata.has_errors = failures.length > 0;
    metadata.error_count = failures.length;
    if (failures.length > 0) metadata.extraction_errors = failures;

    const index = new LineIndex(content);
    const root: ASTNode = {
      id: 'swift-root',
      type: 'compilation_unit',
      value: content,
      location: { filePath, line: 1, column: 1, endLine: index.lineCount, endColumn: index.columnOf(content.length) },
      children: declarations.value,
      metadata,
    };

    this.logger.debug('parsed Swift file', {
      file_path: filePath,
      declarations: root.children.length,
      parse_time_ms: this.now() - start,
    });

    return {
      language: 'swift',
      content,
      hash: hashContent(content),
      version: AST_VERSION,
      parsedAt: new Date(this.now()),
      root,
      filePath,
    };
  }

  extractSymbols(ast: AST): SymbolInfo[] {
    return extractSwiftSymbols(ast.root, { filePath: ast.filePath, lastModified: ast.parsedAt });
  }
}

export const swiftDefinition: LanguageDefinition = {
  id: 'swift',
  displayName: 'Swift',
  extensions: ['swift'],
  headerExtensions: [],
  backend: 'regex',
  createParser: deps => new SwiftParser(deps),
};
