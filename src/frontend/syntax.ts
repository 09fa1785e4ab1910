/**
 * Go Syntax
 *
 * Tree-sitter parsing of Go sources plus small accessors over the
 * tree-sitter-go grammar shared by the checker and the extractor.
 */

import Parser from 'tree-sitter';
import GoLang from 'tree-sitter-go';

import type { SyntaxNode } from './types.js';

// tree-sitter's Language type (compiled parser) vs the grammar package's export
type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];

/** Node types that are top-level declarations */
export const TOP_LEVEL_DECLARATIONS = new Set([
  'function_declaration',
  'method_declaration',
  'import_declaration',
  'type_declaration',
  'const_declaration',
  'var_declaration',
]);

let parser: Parser | null = null;

function getParser(): Parser {
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(GoLang as TreeSitterLanguage);
  }
  return parser;
}

/**
 * Parse Go source text.
 *
 * @returns The root `source_file` node. The tree is kept even when it
 * contains syntax errors.
 */
export function parseGoSource(content: string): SyntaxNode {
  // The binding's default input buffer rejects sources past 32K characters
  return getParser().parse(content, undefined, { bufferSize: content.length * 2 + 1 }).rootNode;
}

/**
 * Whether a tree contains ERROR or MISSING nodes.
 */
export function hasSyntaxErrors(root: SyntaxNode): boolean {
  return root.hasError;
}

/**
 * Name declared by the package clause, if any.
 */
export function packageClauseName(root: SyntaxNode): string | undefined {
  const clause = root.namedChildren.find((c) => c.type === 'package_clause');
  return clause?.namedChildren[0]?.text;
}

/**
 * Texts of the comments that appear before the package clause.
 */
export function headerComments(root: SyntaxNode): string[] {
  const comments: string[] = [];
  for (const child of root.namedChildren) {
    if (child.type === 'package_clause') break;
    if (child.type === 'comment') comments.push(child.text);
  }
  return comments;
}

/**
 * A single import of a file.
 */
export interface ImportSpec {
  /** Explicit local name: an identifier, `.` or `_` */
  alias?: string;
  path: string;
  node: SyntaxNode;
}

/**
 * All imports declared by a file, in source order.
 */
export function importSpecs(root: SyntaxNode): ImportSpec[] {
  const specs: ImportSpec[] = [];
  for (const decl of root.namedChildren) {
    if (decl.type !== 'import_declaration') continue;
    for (const spec of declarationSpecs(decl)) {
      const pathNode = spec.childForFieldName('path');
      if (!pathNode) continue;
      const nameNode = spec.childForFieldName('name');
      specs.push({
        alias: nameNode?.text,
        path: unquote(pathNode.text),
        node: spec,
      });
    }
  }
  return specs;
}

/**
 * The individual specs of a declaration group (`import`, `type`, `const`,
 * `var`), flattening parenthesised lists.
 */
export function declarationSpecs(decl: SyntaxNode): SyntaxNode[] {
  const specs: SyntaxNode[] = [];
  for (const child of decl.namedChildren) {
    if (child.type.endsWith('_spec') || child.type === 'type_alias') {
      specs.push(child);
    } else if (child.type.endsWith('_spec_list')) {
      for (const inner of child.namedChildren) {
        if (inner.type.endsWith('_spec') || inner.type === 'type_alias') {
          specs.push(inner);
        }
      }
    }
  }
  return specs;
}

/**
 * Identifiers directly declared by a node, in order: the names of a
 * `var_spec`/`const_spec`, a parameter declaration or a type parameter
 * declaration.
 */
export function declaredNames(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((c) => c.type === 'identifier');
}

/**
 * Whether two nodes denote the same syntax (node objects are not stable).
 */
export function sameNode(a: SyntaxNode, b: SyntaxNode): boolean {
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

/**
 * Whether a node has an anonymous child token with the given text.
 */
export function hasToken(node: SyntaxNode, token: string): boolean {
  return node.children.some((c) => c.type === token);
}

/**
 * Value of a Go string literal (interpreted or raw).
 */
export function unquote(literal: string): string {
  if (literal.length >= 2) {
    const first = literal.charAt(0);
    if ((first === '"' || first === '`') && literal.endsWith(first)) {
      const body = literal.slice(1, -1);
      if (first === '`') return body;
      return body.replace(/\\(["\\])/g, '$1');
    }
  }
  return literal;
}
