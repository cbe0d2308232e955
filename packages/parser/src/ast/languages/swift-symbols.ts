import { hashContent } from '../../content-hash.js';
import type { ASTNode, SymbolInfo, SymbolKind, Visibility } from '../types.js';

export interface SwiftSymbolOptions {
  filePath: string;
  lastModified: Date;
}

const SWIFT_SYMBOL_KINDS: Record<string, { kind: SymbolKind; idPrefix: string }> = {
  class_declaration: { kind: 'class', idPrefix: 'class' },
  struct_declaration: { kind: 'struct', idPrefix: 'struct' },
  protocol_declaration: { kind: 'interface', idPrefix: 'protocol' },
  enum_declaration: { kind: 'enum', idPrefix: 'enum' },
  actor_declaration: { kind: 'class', idPrefix: 'actor' },
  extension_declaration: { kind: 'namespace', idPrefix: 'extension' },
  typealias_declaration: { kind: 'type', idPrefix: 'typealias' },
  associatedtype_declaration: { kind: 'type', idPrefix: 'associatedtype' },
  function_declaration: { kind: 'function', idPrefix: 'func' },
  method_declaration: { kind: 'method', idPrefix: 'method' },
  init_declaration: { kind: 'constructor', idPrefix: 'init' },
  deinit_declaration: { kind: 'destructor', idPrefix: 'deinit' },
  property_declaration: { kind: 'variable', idPrefix: 'property' },
  subscript_declaration: { kind: 'operator', idPrefix: 'subscript' },
  operator_declaration: { kind: 'operator', idPrefix: 'operator' },
  macro_declaration: { kind: 'function', idPrefix: 'macro' },
  import_declaration: { kind: 'import', idPrefix: 'import' },
};

function asVisibility(value: unknown): Visibility | undefined {
  return value === 'public' || value === 'private' || value === 'protected' ? value : undefined;
}

function toSymbol(node: ASTNode, kind: SymbolKind, idPrefix: string, options: SwiftSymbolOptions): SymbolInfo {
  const isOperatorFunction =
    (node.type === 'function_declaration' || node.type === 'method_declaration') &&
    typeof node.metadata?.operator_symbol === 'string';

  const symbol: SymbolInfo = {
    id: `${isOperatorFunction ? 'operator-func' : idPrefix}-${options.filePath}-${node.location.line}`,
    name: node.children.find(child => child.type === 'identifier')?.value ?? node.value,
    kind: isOperatorFunction ? 'operator' : kind,
    location: node.location,
    language: 'swift',
    hash: hashContent(node.value),
    lastModified: options.lastModified,
  };

  const signature = node.metadata?.signature;
  if (typeof signature === 'string') symbol.signature = signature;
  const visibility = asVisibility(node.metadata?.visibility);
  if (visibility) symbol.visibility = visibility;
  if (node.metadata) symbol.metadata = { ...node.metadata };
  return symbol;
}

/**
 * Pre-order walk: a type's symbol comes before its members.
 */
export function extractSwiftSymbols(root: ASTNode, options: SwiftSymbolOptions): SymbolInfo[] {
  const symbols: SymbolInfo[] = [];

  const visit = (node: ASTNode): void => {
    const mapping = SWIFT_SYMBOL_KINDS[node.type];
    if (mapping) symbols.push(toSymbol(node, mapping.kind, mapping.idPrefix, options));
    for (const child of node.children) {
      visit(child);
    }
  };

  for (const child of root.children) {
    visit(child);
  }
  return symbols;
}
