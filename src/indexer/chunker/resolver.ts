/**
 * Symbol Resolver
 *
 * Two pure queries over a declaration subtree and its unit's TypesInfo:
 * the textual type of a type expression, and the external symbols the
 * subtree references. Both tolerate missing type information.
 */

import { channelPrefix } from '../../frontend/type-table.js';
import { declaredNames } from '../../frontend/syntax.js';
import type { ImportedPackage, SyntaxNode, TypesInfo } from '../../frontend/index.js';

/**
 * A qualified reference `alias.member` whose alias resolves to an import.
 */
export interface QualifiedAccess {
  /** Qualifier as written at the use site */
  alias: string;
  imported: ImportedPackage;
  member: string;
}

/**
 * Visit every member selection in a subtree whose base identifier is bound
 * to an imported package name, depth-first in source order.
 */
export function forEachQualifiedAccess(
  root: SyntaxNode,
  info: TypesInfo,
  visit: (access: QualifiedAccess) => void
): void {
  const stack: SyntaxNode[] = [root];
  for (let node = stack.pop(); node; node = stack.pop()) {
    const access = qualifiedAccess(node, info);
    if (access) visit(access);

    const children = node.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push(child);
    }
  }
}

function qualifiedAccess(node: SyntaxNode, info: TypesInfo): QualifiedAccess | undefined {
  let base: SyntaxNode | null;
  let member: SyntaxNode | null;
  if (node.type === 'selector_expression') {
    base = node.childForFieldName('operand');
    member = node.childForFieldName('field');
  } else if (node.type === 'qualified_type') {
    base = node.childForFieldName('package');
    member = node.childForFieldName('name');
  } else {
    return undefined;
  }

  if (!base || !member) return undefined;
  if (base.type !== 'identifier' && base.type !== 'package_identifier') return undefined;

  const object = info.objectOf(base);
  if (object?.kind !== 'pkgName') return undefined;
  return { alias: base.text, imported: object.imported, member: member.text };
}

/**
 * Fully-qualified external symbols referenced in a subtree, deduplicated
 * and sorted.
 */
export function accessedSymbols(node: SyntaxNode | null | undefined, info: TypesInfo | undefined): string[] {
  if (!node || !info) return [];

  const symbols = new Set<string>();
  forEachQualifiedAccess(node, info, (access) => {
    symbols.add(`${access.imported.path}.${access.member}`);
  });
  return [...symbols].sort();
}

/**
 * Text of a type expression: the resolved type string when the table has
 * one, else a reconstruction from syntax. Never fails; unknown shapes are
 * rendered as their source text.
 */
export function typeText(expr: SyntaxNode, info: TypesInfo): string {
  const resolved = info.typeOf(expr);
  if (resolved !== undefined) return resolved;

  switch (expr.type) {
    case 'identifier':
    case 'type_identifier':
    case 'field_identifier':
    case 'package_identifier':
      return expr.text;

    case 'pointer_type':
      return `*${childText(expr.namedChildren[0], info)}`;

    case 'slice_type':
      return `[]${childText(expr.childForFieldName('element'), info)}`;

    case 'map_type':
      return `map[${childText(expr.childForFieldName('key'), info)}]${childText(expr.childForFieldName('value'), info)}`;

    case 'qualified_type':
      return selectionText(expr.childForFieldName('package'), expr.childForFieldName('name'), info) ?? expr.text;

    case 'selector_expression':
      return selectionText(expr.childForFieldName('operand'), expr.childForFieldName('field'), info) ?? expr.text;

    case 'interface_type':
      return expr.namedChildren.some((c) => c.type !== 'comment') ? expr.text : 'interface{}';

    case 'channel_type':
      return `${channelPrefix(expr)}${childText(expr.childForFieldName('value'), info)}`;

    case 'variadic_parameter_declaration':
      return `...${childText(expr.childForFieldName('type'), info)}`;

    case 'function_type':
      return `func${signature(expr.childForFieldName('parameters'), expr.childForFieldName('result'), info)}`;

    default:
      return expr.text;
  }
}

function childText(node: SyntaxNode | null | undefined, info: TypesInfo): string {
  return node ? typeText(node, info) : '';
}

/**
 * `<import-path>.<member>` when the base is bound to an import, else
 * `<base>.<member>`.
 */
function selectionText(base: SyntaxNode | null, member: SyntaxNode | null, info: TypesInfo): string | undefined {
  if (!base || !member) return undefined;
  const object = base.type === 'identifier' || base.type === 'package_identifier' ? info.objectOf(base) : undefined;
  if (object?.kind === 'pkgName') {
    return `${object.imported.path}.${member.text}`;
  }
  return `${typeText(base, info)}.${member.text}`;
}

/**
 * Reconstructed signature `(a int, b string) (int, error)`. A single
 * unnamed result is rendered bare; several or named results are
 * parenthesised.
 */
export function signature(params: SyntaxNode | null, result: SyntaxNode | null, info: TypesInfo): string {
  const paramList = params ? fieldList(params, info) : [];
  let text = `(${paramList.join(', ')})`;

  if (!result) return text;
  if (result.type !== 'parameter_list') {
    return `${text} ${typeText(result, info)}`;
  }

  const results = fieldList(result, info);
  if (results.length === 0) return text;

  const first = result.namedChildren.find(isParameter);
  if (results.length === 1 && first && declaredNames(first).length === 0) {
    text += ` ${results[0] ?? ''}`;
  } else {
    text += ` (${results.join(', ')})`;
  }
  return text;
}

function isParameter(node: SyntaxNode): boolean {
  return node.type === 'parameter_declaration' || node.type === 'variadic_parameter_declaration';
}

function fieldList(list: SyntaxNode, info: TypesInfo): string[] {
  const entries: string[] = [];
  for (const param of list.namedChildren) {
    if (!isParameter(param)) continue;
    const type =
      param.type === 'variadic_parameter_declaration'
        ? typeText(param, info)
        : childText(param.childForFieldName('type'), info);

    const names = declaredNames(param);
    if (names.length === 0) {
      entries.push(type);
    } else {
      for (const name of names) entries.push(`${name.text} ${type}`);
    }
  }
  return entries;
}
