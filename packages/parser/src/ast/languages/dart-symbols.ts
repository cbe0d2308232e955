import { hashContent } from '../../content-hash.js';
import type { ASTNode, SymbolInfo, SymbolKind } from '../types.js';

export interface DartSymbolOptions {
  filePath: string;
  lastModified: Date;
}

interface SymbolMapping {
  kind: SymbolKind;
  idPrefix: string;
  signature?: (node: ASTNode, name: string) => string | undefined;
}

function metadataString(node: ASTNode, key: string): string | undefined {
  const value = node.metadata?.[key];
  return typeof value === 'string' ? value : undefined;
}

const signatureOf = (node: ASTNode): string | undefined => metadataString(node, 'signature');

/** Node type -> symbol kind. Types not listed here (identifiers, enum values, ...) are not symbols. */
const DART_SYMBOL_MAPPINGS: Record<string, SymbolMapping> = {
  class_declaration: { kind: 'class', idPrefix: 'class-' },
  state_class_declaration: { kind: 'state-class', idPrefix: 'state-class-' },
  mixin_declaration: { kind: 'mixin', idPrefix: 'mixin-' },
  extension_declaration: { kind: 'extension', idPrefix: 'extension-' },
  enum_declaration: { kind: 'enum', idPrefix: 'enum-' },
  typedef_declaration: {
    kind: 'typedef',
    idPrefix: 'typedef-',
    signature: node => metadataString(node, 'target_type'),
  },
  function_typedef: {
    kind: 'typedef',
    idPrefix: 'function-typedef-',
    signature: node => metadataString(node, 'target_type'),
  },
  function_declaration: { kind: 'function', idPrefix: 'function-', signature: signatureOf },
  method_declaration: { kind: 'method', idPrefix: 'method-', signature: signatureOf },
  build_method: {
    kind: 'build-method',
    idPrefix: 'build-',
    signature: () => 'Widget build(BuildContext context)',
  },
  lifecycle_method: {
    kind: 'lifecycle-method',
    idPrefix: 'lifecycle-',
    signature: (_node, name) => `void ${name}()`,
  },
  variable_declaration: { kind: 'variable', idPrefix: 'variable-' },
  import_statement: { kind: 'import', idPrefix: 'import-' },
  part_directive: { kind: 'directive', idPrefix: 'part-directive-' },
  part_of_directive: { kind: 'directive', idPrefix: 'part-of-directive-' },
  async_generator: { kind: 'function', idPrefix: 'async-generator-', signature: signatureOf },
  async_function: { kind: 'function', idPrefix: 'async-function-', signature: signatureOf },
  async_method: { kind: 'method', idPrefix: 'async-method-', signature: signatureOf },
  higher_order_function: { kind: 'method', idPrefix: 'higher-order-', signature: signatureOf },
  higher_order_method: { kind: 'method', idPrefix: 'higher-order-method-', signature: signatureOf },
  closure_factory: { kind: 'method', idPrefix: 'closure-factory-', signature: signatureOf },
};

function symbolName(node: ASTNode): string {
  const named = node.children.find(child => child.type === 'identifier' || child.type === 'string_literal');
  return named?.value ?? node.value;
}

function toSymbol(node: ASTNode, mapping: SymbolMapping, options: DartSymbolOptions): SymbolInfo {
  const name = symbolName(node);
  const kind: SymbolKind =
    mapping.kind === 'class' && node.metadata?.flutter_type === 'widget' ? 'widget' : mapping.kind;

  const symbol: SymbolInfo = {
    id: `${mapping.idPrefix}${options.filePath}-${node.location.line}`,
    name,
    kind,
    location: node.location,
    language: 'dart',
    visibility: name.startsWith('_') ? 'private' : 'public',
    hash: hashContent(node.value),
    lastModified: options.lastModified,
  };

  const signature = mapping.signature?.(node, name);
  if (signature) symbol.signature = signature;
  if (node.metadata) symbol.metadata = { ...node.metadata };
  return symbol;
}

/**
 * Walk a Dart AST in pre-order and emit a symbol for every declaration node.
 */
export function extractDartSymbols(root: ASTNode, options: DartSymbolOptions): SymbolInfo[] {
  const symbols: SymbolInfo[] = [];

  const visit = (node: ASTNode): void => {
    const mapping = DART_SYMBOL_MAPPINGS[node.type];
    if (mapping) symbols.push(toSymbol(node, mapping, options));
    for (const child of node.children) {
      visit(child);
    }
  };

  for (const child of root.children) {
    visit(child);
  }
  return symbols;
}
