import { hashContent } from '../../content-hash.js';
import type { ASTNode, SymbolInfo, SymbolKind, Visibility } from '../types.js';

/**
 * Scope the walker carries down the tree. Each node gets its own copy, so a sibling
 * (a base-class `public`, say) never leaks into another.
 */
export interface CppScope {
  readonly inClass: boolean;
  readonly className: string;
  readonly currentAccess: Visibility;
  readonly inNamespace: boolean;
  readonly namespaceName: string;
  readonly templateDepth: number;
}

export const ROOT_SCOPE: CppScope = {
  inClass: false,
  className: '',
  currentAccess: 'private',
  inNamespace: false,
  namespaceName: '',
  templateDepth: 0,
};

export interface CppSymbolOptions {
  filePath: string;
  enableVirtualDetection: boolean;
  lastModified: Date;
  /** Class and struct symbols past this count are dropped */
  maxClassesPerFile?: number;
  /** Member functions past this count are dropped, per enclosing class */
  maxMethodsPerClass?: number;
}

const ACCESS_LABELS: Record<string, Visibility> = {
  'public:': 'public',
  'private:': 'private',
  'protected:': 'protected',
};

/** Wrappers a function declarator can sit behind: `Foo& operator=(...)`, `T* make()` */
const DECLARATOR_WRAPPERS = new Set(['pointer_declarator', 'reference_declarator']);

const MEMBER_FUNCTION_KINDS = new Set<SymbolKind>(['method', 'constructor', 'destructor', 'operator']);

const CLASS_BODY_MEMBERS = new Set([
  'field_declaration',
  'function_definition',
  'function_declaration',
  'template_declaration',
]);

function childOfType(node: ASTNode, ...types: string[]): ASTNode | undefined {
  return node.children.find(child => types.includes(child.type));
}

/** `Foo` for `class Foo`, and the template's name for a specialization `class Foo<int>` */
function className(node: ASTNode): string | undefined {
  const name = childOfType(node, 'type_identifier');
  if (name) return name.value;
  const specialized = childOfType(node, 'template_type');
  if (!specialized) return undefined;
  return childOfType(specialized, 'type_identifier')?.value ?? specialized.value.split('<')[0].trim();
}

function parseAccess(text: string): Visibility | undefined {
  const label = text.trim().replace(/:$/, '').trim();
  return label === 'public' || label === 'private' || label === 'protected' ? label : undefined;
}

// ---------------------------------------------------------------------------
// Scope tracking
// ---------------------------------------------------------------------------

export function enterNode(node: ASTNode, scope: CppScope): CppScope {
  switch (node.type) {
    case 'class_specifier':
    case 'struct_specifier': {
      return {
        ...scope,
        inClass: true,
        className: className(node) ?? '',
        currentAccess: node.type === 'class_specifier' ? 'private' : 'public',
      };
    }
    case 'namespace_definition': {
      const name = childOfType(node, 'namespace_identifier', 'identifier');
      return { ...scope, inNamespace: true, namespaceName: name?.value ?? '' };
    }
    case 'template_declaration':
      return { ...scope, templateDepth: scope.templateDepth + 1 };
    case 'access_specifier': {
      const access = parseAccess(node.value);
      return access ? { ...scope, currentAccess: access } : scope;
    }
    default: {
      const label = ACCESS_LABELS[node.value.trim()];
      return label && scope.inClass ? { ...scope, currentAccess: label } : scope;
    }
  }
}

// ---------------------------------------------------------------------------
// Declarator helpers
// ---------------------------------------------------------------------------

export function findFunctionDeclarator(node: ASTNode): ASTNode | undefined {
  for (const child of node.children) {
    if (child.type === 'function_declarator') return child;
    if (DECLARATOR_WRAPPERS.has(child.type)) {
      const nested = findFunctionDeclarator(child);
      if (nested) return nested;
    }
  }
  return undefined;
}

function functionName(node: ASTNode): string {
  const declarator = findFunctionDeclarator(node);
  if (declarator) {
    for (const child of declarator.children) {
      switch (child.type) {
        case 'field_identifier':
        case 'identifier':
        case 'operator_name':
        case 'destructor_name':
        case 'qualified_identifier':
          return child.value;
        case 'template_function': {
          const id = childOfType(child, 'identifier');
          return id ? id.value : child.value.split('<')[0];
        }
      }
    }
  }
  return genericName(node);
}

function genericName(node: ASTNode): string {
  const named = childOfType(node, 'identifier', 'type_identifier', 'field_identifier', 'namespace_identifier');
  return named ? named.value : 'unnamed';
}

function isVirtual(node: ASTNode): boolean {
  return node.children.some(child => child.type === 'virtual' || child.type === 'virtual_function_specifier');
}

function virtualSpecifiers(node: ASTNode): string[] {
  const declarator = findFunctionDeclarator(node);
  if (!declarator) return [];
  const specifiers: string[] = [];
  for (const child of declarator.children) {
    if (child.type !== 'virtual_specifier') continue;
    for (const keyword of child.children) {
      if (keyword.type === 'override' || keyword.type === 'final') specifiers.push(keyword.type);
    }
    if (child.children.length === 0) {
      const text = child.value.trim();
      if (text === 'override' || text === 'final') specifiers.push(text);
    }
  }
  return specifiers;
}

function isPureVirtual(node: ASTNode): boolean {
  const children = node.children;
  if (children.some(child => child.type === 'pure_virtual_clause')) return true;
  for (let i = 0; i < children.length - 1; i++) {
    if (children[i].type === '=' && children[i + 1].type === 'number_literal' && children[i + 1].value === '0') {
      return true;
    }
  }
  return false;
}

function basicSignature(node: ASTNode): string {
  const declarator = findFunctionDeclarator(node);
  if (declarator) return declarator.value;
  return node.value.split('\n')[0].trim();
}

/**
 * Function signature with its qualifiers appended as one list: `f() override [virtual, override]`.
 */
export function enhancedSignature(node: ASTNode, enableVirtualDetection: boolean): string {
  const signature = basicSignature(node);
  if (!enableVirtualDetection) return signature;

  const qualifiers: string[] = [];
  if (isVirtual(node)) qualifiers.push('virtual');
  const specifiers = virtualSpecifiers(node);
  if (specifiers.includes('override')) qualifiers.push('override');
  if (specifiers.includes('final')) qualifiers.push('final');
  if (isPureVirtual(node)) qualifiers.push('pure virtual');

  return qualifiers.length > 0 ? `${signature} [${qualifiers.join(', ')}]` : signature;
}

export function classifyFunction(name: string, scope: CppScope): SymbolKind {
  const bare = name.includes('::') ? name.slice(name.lastIndexOf('::') + 2) : name;
  if (scope.inClass && bare === scope.className) return 'constructor';
  if (bare.startsWith('~')) return 'destructor';
  if (bare.includes('operator')) return 'operator';
  return scope.inClass ? 'method' : 'function';
}

function templateName(node: ASTNode): string {
  for (const child of node.children) {
    if (child.type === 'class_specifier' || child.type === 'struct_specifier') {
      return className(child) ?? genericName(child);
    }
    if (
      child.type === 'function_definition' ||
      child.type === 'declaration' ||
      child.type === 'field_declaration'
    ) {
      return functionName(child);
    }
  }
  return genericName(node);
}

/** `Foo<int>` of `template<> class Foo<int>`, or `f<int>` of `template<> void f<int>()` */
function specializedType(node: ASTNode): ASTNode | undefined {
  for (const child of node.children) {
    if (child.type === 'class_specifier' || child.type === 'struct_specifier') {
      return childOfType(child, 'template_type');
    }
    if (child.type === 'function_definition' || child.type === 'declaration') {
      const declarator = findFunctionDeclarator(child);
      return declarator ? childOfType(declarator, 'template_function') : undefined;
    }
  }
  return undefined;
}

function templateSignature(node: ASTNode): string {
  const parameters = childOfType(node, 'template_parameter_list');
  const signature = parameters ? parameters.value.trim() : '<>';
  const specialized = specializedType(node);
  return specialized ? `${signature} (specialization: ${specialized.value.trim()})` : signature;
}

// ---------------------------------------------------------------------------
// Walker
// ---------------------------------------------------------------------------

/**
 * Walks a converted C++ tree and emits one symbol per class, struct, function,
 * namespace, field, template and include, tracking class access along the way.
 */
export class CppSymbolWalker {
  private readonly symbols: SymbolInfo[] = [];
  private classCount = 0;
  private readonly methodCounts = new Map<string, number>();
  /** Symbols dropped by the per-file and per-class caps */
  skipped = 0;

  constructor(private readonly options: CppSymbolOptions) {}

  extract(root: ASTNode): SymbolInfo[] {
    this.visit(root, ROOT_SCOPE);
    return this.symbols;
  }

  private visit(node: ASTNode, parent: CppScope): void {
    const scope = enterNode(node, parent);

    const symbol = this.toSymbol(node, scope);
    if (symbol) this.emit(symbol, scope);

    for (const child of node.children) {
      if (child.type === 'field_declaration_list') {
        this.visitClassBody(child, scope);
      } else {
        this.visit(child, scope);
      }
    }
  }

  private visitClassBody(body: ASTNode, classScope: CppScope): void {
    let access = classScope.currentAccess;

    for (const child of body.children) {
      if (child.type === 'access_specifier') {
        access = parseAccess(child.value) ?? access;
        continue;
      }

      const scope: CppScope = { ...classScope, currentAccess: access };
      if (CLASS_BODY_MEMBERS.has(child.type)) {
        const memberScope = enterNode(child, scope);
        const symbol = this.toSymbol(child, memberScope);
        if (symbol) this.emit(symbol, memberScope);
        for (const grandchild of child.children) {
          this.visit(grandchild, memberScope);
        }
      } else {
        this.visit(child, scope);
      }
    }
  }

  private emit(symbol: SymbolInfo, scope: CppScope): void {
    if (this.admit(symbol, scope)) {
      this.symbols.push(symbol);
    } else {
      this.skipped++;
    }
  }

  private admit(symbol: SymbolInfo, scope: CppScope): boolean {
    if (symbol.kind === 'class') {
      if (this.classCount >= (this.options.maxClassesPerFile ?? Infinity)) return false;
      this.classCount++;
      return true;
    }
    if (scope.inClass && MEMBER_FUNCTION_KINDS.has(symbol.kind)) {
      const count = this.methodCounts.get(scope.className) ?? 0;
      if (count >= (this.options.maxMethodsPerClass ?? Infinity)) return false;
      this.methodCounts.set(scope.className, count + 1);
    }
    return true;
  }

  private toSymbol(node: ASTNode, scope: CppScope): SymbolInfo | null {
    switch (node.type) {
      case 'class_specifier': {
        const name = className(node);
        // `class Foo` used as a type has no body
        if (!name || !childOfType(node, 'field_declaration_list')) return null;
        return this.build(node, 'class', name, 'class', { visibility: this.visibilityOf(scope) });
      }
      case 'struct_specifier': {
        const name = className(node);
        if (!name || !childOfType(node, 'field_declaration_list')) return null;
        return this.build(node, 'struct', name, 'class', { visibility: 'public' });
      }
      case 'function_definition':
      case 'function_declaration':
        return this.functionSymbol(node, scope);
      case 'declaration':
        return findFunctionDeclarator(node) ? this.functionSymbol(node, scope) : null;
      case 'field_declaration': {
        if (findFunctionDeclarator(node)) return this.functionSymbol(node, scope);
        const field = childOfType(node, 'field_identifier');
        if (!field) return null;
        return this.build(node, 'field', field.value, 'variable', {
          visibility: this.visibilityOf(scope),
          signature: node.value.trim(),
        });
      }
      case 'namespace_definition': {
        const name = childOfType(node, 'namespace_identifier', 'identifier');
        return this.build(node, 'namespace', name?.value ?? 'anonymous', 'namespace', {});
      }
      case 'template_declaration':
        return this.build(node, 'template', templateName(node), 'template', {
          signature: templateSignature(node),
        });
      case 'preproc_include': {
        const path = childOfType(node, 'string_literal', 'system_lib_string');
        if (!path) return null;
        return this.build(node, 'include', path.value, 'import', {});
      }
      default:
        return null;
    }
  }

  private functionSymbol(node: ASTNode, scope: CppScope): SymbolInfo {
    const name = functionName(node);
    const kind = classifyFunction(name, scope);
    return this.build(node, 'func', name, kind, {
      visibility: this.visibilityOf(scope),
      signature: enhancedSignature(node, this.options.enableVirtualDetection),
    });
  }

  private visibilityOf(scope: CppScope): Visibility {
    return scope.inClass ? scope.currentAccess : 'public';
  }

  private build(
    node: ASTNode,
    idPrefix: string,
    name: string,
    kind: SymbolKind,
    extra: Pick<SymbolInfo, 'signature' | 'visibility'>,
  ): SymbolInfo {
    const location = { ...node.location, filePath: this.options.filePath };
    return {
      id: `${idPrefix}-${this.options.filePath}-${location.line}`,
      name,
      kind,
      location,
      language: 'cpp',
      ...(extra.signature !== undefined ? { signature: extra.signature } : {}),
      ...(extra.visibility !== undefined ? { visibility: extra.visibility } : {}),
      hash: hashContent(node.value),
      lastModified: this.options.lastModified,
    };
  }
}
