/**
 * Type Table
 *
 * The type-resolution table of one compilation unit. Identifier uses are
 * recorded eagerly by the checker; expression types are computed on demand
 * and memoised. Type strings follow the canonical `go/types` notation with
 * package-path qualifiers (`*net/http.Request`, `map[string]int`).
 */

import type Parser from 'tree-sitter';

import type { GoObject, SyntaxNode, TypesInfo } from './types.js';
import { declaredNames, hasToken, unquote } from './syntax.js';

const IDENTIFIER_TYPES = new Set(['identifier', 'type_identifier', 'package_identifier']);

const COMPARISON_OPERATORS = new Set(['==', '!=', '<', '<=', '>', '>=']);
const LOGICAL_OPERATORS = new Set(['&&', '||']);
const SHIFT_OPERATORS = new Set(['<<', '>>']);

/** Untyped constant kinds in promotion order */
const UNTYPED_RANK = ['untyped int', 'untyped rune', 'untyped float', 'untyped complex'];

const DEFAULT_TYPES: Record<string, string> = {
  'untyped bool': 'bool',
  'untyped int': 'int',
  'untyped rune': 'rune',
  'untyped float': 'float64',
  'untyped complex': 'complex128',
  'untyped string': 'string',
};

/** Nodes that end the search for an enclosing constant declaration */
const VALUE_CONTEXT_BOUNDARIES = new Set([
  'var_spec',
  'short_var_declaration',
  'assignment_statement',
  'function_declaration',
  'method_declaration',
  'func_literal',
  'block',
  'source_file',
]);

export class TypeTable implements TypesInfo {
  readonly pkgPath: string;
  private readonly uses = new Map<Parser.Tree, Map<number, GoObject>>();
  private readonly memo = new Map<Parser.Tree, Map<string, string | null>>();
  private readonly inProgress = new Set<string>();

  constructor(pkgPath: string) {
    this.pkgPath = pkgPath;
  }

  /** Record what an identifier use resolves to */
  recordUse(ident: SyntaxNode, object: GoObject): void {
    let byOffset = this.uses.get(ident.tree);
    if (!byOffset) {
      byOffset = new Map();
      this.uses.set(ident.tree, byOffset);
    }
    byOffset.set(ident.startIndex, object);
  }

  objectOf(ident: SyntaxNode): GoObject | undefined {
    if (!IDENTIFIER_TYPES.has(ident.type)) {
      return undefined;
    }
    return this.uses.get(ident.tree)?.get(ident.startIndex);
  }

  typeOf(expr: SyntaxNode): string | undefined {
    let byKey = this.memo.get(expr.tree);
    if (!byKey) {
      byKey = new Map();
      this.memo.set(expr.tree, byKey);
    }
    const key = nodeKey(expr);
    const cached = byKey.get(key);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    let type = this.exprType(expr);
    if (type !== undefined && type.startsWith('untyped ') && !inConstContext(expr)) {
      type = DEFAULT_TYPES[type] ?? type;
    }
    byKey.set(key, type ?? null);
    return type;
  }

  /**
   * Raw type of a node: untyped constant kinds are kept so that constant
   * expressions combine before defaulting.
   */
  private exprType(node: SyntaxNode): string | undefined {
    switch (node.type) {
      case 'type_identifier':
      case 'identifier':
        return this.identifierType(node);

      case 'qualified_type': {
        const pkg = node.childForFieldName('package');
        const name = node.childForFieldName('name');
        const object = pkg ? this.objectOf(pkg) : undefined;
        if (!name || object?.kind !== 'pkgName') return undefined;
        return `${object.imported.path}.${name.text}`;
      }

      case 'pointer_type':
        return prefixed('*', this.childType(node.namedChildren[0]));

      case 'slice_type':
        return prefixed('[]', this.childType(node.childForFieldName('element')));

      case 'array_type': {
        const length = node.childForFieldName('length');
        const element = this.childType(node.childForFieldName('element'));
        if (!length || length.type !== 'int_literal' || element === undefined) return undefined;
        return `[${length.text}]${element}`;
      }

      case 'implicit_length_array_type':
        return undefined;

      case 'map_type': {
        const key = this.childType(node.childForFieldName('key'));
        const value = this.childType(node.childForFieldName('value'));
        if (key === undefined || value === undefined) return undefined;
        return `map[${key}]${value}`;
      }

      case 'channel_type': {
        const value = this.childType(node.childForFieldName('value'));
        if (value === undefined) return undefined;
        return `${channelPrefix(node)}${value}`;
      }

      case 'function_type':
        return this.funcType(node.childForFieldName('parameters'), node.childForFieldName('result'));

      case 'struct_type':
        return this.structType(node);

      case 'interface_type':
        return this.interfaceType(node);

      case 'generic_type': {
        const base = this.childType(node.childForFieldName('type'));
        const args = node.childForFieldName('type_arguments');
        if (base === undefined || !args) return undefined;
        const argTypes = args.namedChildren.map((a) => this.childType(a));
        if (argTypes.some((t) => t === undefined)) return undefined;
        return `${base}[${argTypes.join(', ')}]`;
      }

      case 'parenthesized_type':
      case 'parenthesized_expression':
        return node.namedChildren[0] ? this.exprType(node.namedChildren[0]) : undefined;

      case 'negated_type':
        return prefixed('~', this.childType(node.namedChildren[0]));

      case 'type_elem': {
        const terms = node.namedChildren.map((t) => this.childType(t));
        if (terms.length === 0 || terms.some((t) => t === undefined)) return undefined;
        return terms.join(' | ');
      }

      case 'int_literal':
        return 'untyped int';
      case 'float_literal':
        return 'untyped float';
      case 'imaginary_literal':
        return 'untyped complex';
      case 'rune_literal':
        return 'untyped rune';
      case 'interpreted_string_literal':
      case 'raw_string_literal':
        return 'untyped string';
      case 'true':
      case 'false':
        return 'untyped bool';
      case 'nil':
        return 'untyped nil';
      case 'iota':
        return 'untyped int';

      case 'composite_literal':
        return this.childType(node.childForFieldName('type'));

      case 'func_literal':
        return this.funcType(node.childForFieldName('parameters'), node.childForFieldName('result'));

      case 'type_conversion_expression':
        return this.childType(node.childForFieldName('type'));

      case 'unary_expression':
        return this.unaryType(node);

      case 'binary_expression':
        return this.binaryType(node);

      case 'call_expression':
        return this.callType(node);

      default:
        return undefined;
    }
  }

  /** Type of a child node that must be a type or typed expression */
  private childType(node: SyntaxNode | null | undefined): string | undefined {
    return node ? this.typeOf(node) : undefined;
  }

  private identifierType(node: SyntaxNode): string | undefined {
    const object = this.objectOf(node);
    if (!object) return undefined;

    switch (object.kind) {
      case 'type':
        // Only a type identifier denotes a type; a value identifier bound to a
        // type is a conversion callee, handled by callType.
        if (node.type !== 'type_identifier') return undefined;
        return object.pkgPath ? `${object.pkgPath}.${object.name}` : object.name;
      case 'typeParam':
        return node.type === 'type_identifier' ? object.name : undefined;
      case 'nil':
        return 'untyped nil';
      case 'const':
        if (object.name === 'true' || object.name === 'false') return 'untyped bool';
        if (object.name === 'iota' && !object.spec) return 'untyped int';
        return this.valueObjectType(object.spec, object.index);
      case 'var':
        return this.valueObjectType(object.spec, object.index);
      case 'func':
        return object.decl && !object.decl.childForFieldName('type_parameters')
          ? this.funcType(object.decl.childForFieldName('parameters'), object.decl.childForFieldName('result'))
          : undefined;
      default:
        return undefined;
    }
  }

  /**
   * Type of the `index`th name of a package-level var/const spec: the
   * declared type, else the type of the matching initializer.
   */
  private valueObjectType(spec: SyntaxNode | undefined, index: number | undefined): string | undefined {
    if (!spec || index === undefined) return undefined;
    const key = `${spec.startIndex}:${spec.endIndex}:${index}`;
    if (this.inProgress.has(key)) return undefined;
    this.inProgress.add(key);
    try {
      const typeNode = spec.childForFieldName('type');
      if (typeNode) return this.typeOf(typeNode);

      const values = spec.childForFieldName('value');
      const value = values?.type === 'expression_list' ? values.namedChildren[index] : values;
      if (!value) return undefined;
      const type = this.exprType(value);
      if (spec.type === 'var_spec' && type !== undefined) {
        return DEFAULT_TYPES[type] ?? type;
      }
      return type;
    } finally {
      this.inProgress.delete(key);
    }
  }

  private unaryType(node: SyntaxNode): string | undefined {
    const operator = node.childForFieldName('operator')?.type;
    const operand = node.childForFieldName('operand');
    if (!operand) return undefined;
    const type = this.exprType(operand);
    switch (operator) {
      case '&':
        return type === undefined || type.startsWith('untyped ') ? undefined : `*${type}`;
      case '*':
        return type?.startsWith('*') ? type.slice(1) : undefined;
      case '!':
      case '-':
      case '+':
      case '^':
        return type;
      default:
        return undefined;
    }
  }

  private binaryType(node: SyntaxNode): string | undefined {
    const operator = node.childForFieldName('operator')?.type ?? '';
    const left = node.childForFieldName('left');
    const right = node.childForFieldName('right');
    if (!left || !right) return undefined;

    if (COMPARISON_OPERATORS.has(operator)) {
      return 'untyped bool';
    }
    const leftType = this.exprType(left);
    if (SHIFT_OPERATORS.has(operator)) {
      return leftType;
    }
    const rightType = this.exprType(right);
    if (LOGICAL_OPERATORS.has(operator)) {
      return leftType ?? rightType ?? 'untyped bool';
    }
    if (leftType === undefined || rightType === undefined) return undefined;
    if (leftType === rightType) return leftType;

    const leftRank = UNTYPED_RANK.indexOf(leftType);
    const rightRank = UNTYPED_RANK.indexOf(rightType);
    if (leftRank >= 0 && rightRank >= 0) {
      return UNTYPED_RANK[Math.max(leftRank, rightRank)];
    }
    if (leftType.startsWith('untyped ')) return rightType;
    if (rightType.startsWith('untyped ')) return leftType;
    return undefined;
  }

  private callType(node: SyntaxNode): string | undefined {
    const fn = node.childForFieldName('function');
    const args = node.childForFieldName('arguments')?.namedChildren ?? [];
    if (!fn) return undefined;

    if (fn.type === 'parenthesized_expression' || fn.type === 'parenthesized_type') {
      const inner = fn.namedChildren[0];
      // (*T)(x) style conversions
      return inner ? this.typeOf(inner) : undefined;
    }
    if (fn.type !== 'identifier') return undefined;

    const object = this.objectOf(fn);
    if (!object) return undefined;

    if (object.kind === 'type') {
      return object.pkgPath ? `${object.pkgPath}.${object.name}` : object.name;
    }
    if (object.kind === 'builtin') {
      return this.builtinCallType(object.name, args);
    }
    if (object.kind === 'func' && object.decl && !object.decl.childForFieldName('type_parameters')) {
      return this.resultType(object.decl.childForFieldName('result'));
    }
    return undefined;
  }

  private builtinCallType(name: string, args: SyntaxNode[]): string | undefined {
    const first = args[0];
    switch (name) {
      case 'len':
      case 'cap':
      case 'copy':
        return 'int';
      case 'new':
        return prefixed('*', first ? this.typeArgument(first) : undefined);
      case 'make':
        return first ? this.typeArgument(first) : undefined;
      case 'append':
      case 'min':
      case 'max':
        return first ? this.exprType(first) : undefined;
      case 'complex':
        return 'complex128';
      case 'real':
      case 'imag':
        return 'float64';
      case 'recover':
        return 'interface{}';
      default:
        return undefined;
    }
  }

  /**
   * Type denoted by a builtin's type argument, which the grammar may parse
   * as a plain expression identifier.
   */
  private typeArgument(node: SyntaxNode): string | undefined {
    if (node.type !== 'identifier') {
      return this.typeOf(node);
    }
    const object = this.objectOf(node);
    if (object?.kind === 'type') {
      return object.pkgPath ? `${object.pkgPath}.${object.name}` : object.name;
    }
    return object?.kind === 'typeParam' ? object.name : undefined;
  }

  /** The call result: a single type or a `(A, B)` tuple */
  private resultType(result: SyntaxNode | null): string | undefined {
    if (!result) return undefined;
    if (result.type !== 'parameter_list') {
      return this.typeOf(result);
    }
    const types: string[] = [];
    for (const param of result.namedChildren) {
      if (param.type !== 'parameter_declaration') continue;
      const type = this.childType(param.childForFieldName('type'));
      if (type === undefined) return undefined;
      const count = Math.max(1, declaredNames(param).length);
      for (let i = 0; i < count; i++) types.push(type);
    }
    if (types.length === 0) return undefined;
    return types.length === 1 ? types[0] : `(${types.join(', ')})`;
  }

  private funcType(params: SyntaxNode | null, result: SyntaxNode | null): string | undefined {
    const signature = this.signature(params, result);
    return signature === undefined ? undefined : `func${signature}`;
  }

  /** `(a int, b string) (int, error)` */
  private signature(params: SyntaxNode | null, result: SyntaxNode | null): string | undefined {
    const paramList = params ? this.parameterList(params) : [];
    if (paramList === undefined) return undefined;
    let out = `(${paramList.join(', ')})`;

    if (result) {
      if (result.type === 'parameter_list') {
        const results = this.parameterList(result);
        if (results === undefined) return undefined;
        const single = result.namedChildren.filter((c) => c.type === 'parameter_declaration');
        if (results.length === 1 && single.length === 1 && single[0] && declaredNames(single[0]).length === 0) {
          out += ` ${results[0] ?? ''}`;
        } else if (results.length > 0) {
          out += ` (${results.join(', ')})`;
        }
      } else {
        const type = this.typeOf(result);
        if (type === undefined) return undefined;
        out += ` ${type}`;
      }
    }
    return out;
  }

  private parameterList(list: SyntaxNode): string[] | undefined {
    const entries: string[] = [];
    for (const param of list.namedChildren) {
      if (param.type !== 'parameter_declaration' && param.type !== 'variadic_parameter_declaration') {
        continue;
      }
      let type = this.childType(param.childForFieldName('type'));
      if (type === undefined) return undefined;
      if (param.type === 'variadic_parameter_declaration') type = `...${type}`;

      const names = declaredNames(param);
      if (names.length === 0) {
        entries.push(type);
      } else {
        for (const name of names) entries.push(`${name.text} ${type}`);
      }
    }
    return entries;
  }

  private structType(node: SyntaxNode): string | undefined {
    const fields: string[] = [];
    const list = node.namedChildren.find((c) => c.type === 'field_declaration_list');
    for (const field of list?.namedChildren ?? []) {
      if (field.type !== 'field_declaration') continue;
      let type = this.childType(field.childForFieldName('type'));
      if (type === undefined) return undefined;

      const names = field.namedChildren.filter((c) => c.type === 'field_identifier');
      if (names.length === 0 && hasToken(field, '*')) type = `*${type}`;
      const tagNode = field.childForFieldName('tag');
      const tag = tagNode ? ` ${JSON.stringify(unquote(tagNode.text))}` : '';

      if (names.length === 0) {
        fields.push(`${type}${tag}`);
      } else {
        for (const name of names) fields.push(`${name.text} ${type}${tag}`);
      }
    }
    return `struct{${fields.join('; ')}}`;
  }

  private interfaceType(node: SyntaxNode): string | undefined {
    const elements: string[] = [];
    for (const element of node.namedChildren) {
      if (element.type === 'comment') continue;
      if (element.type === 'method_elem' || element.type === 'method_spec') {
        const name = element.childForFieldName('name');
        const signature = this.signature(
          element.childForFieldName('parameters'),
          element.childForFieldName('result')
        );
        if (!name || signature === undefined) return undefined;
        elements.push(`${name.text}${signature}`);
      } else {
        const type = this.typeOf(element);
        if (type === undefined) return undefined;
        elements.push(type);
      }
    }
    return elements.length === 0 ? 'interface{}' : `interface{${elements.join('; ')}}`;
  }
}

function nodeKey(node: SyntaxNode): string {
  return `${node.startIndex}:${node.endIndex}:${node.type}`;
}

function prefixed(prefix: string, type: string | undefined): string | undefined {
  return type === undefined ? undefined : `${prefix}${type}`;
}

/**
 * Direction prefix of a channel type: `chan `, `<-chan ` or `chan<- `.
 */
export function channelPrefix(node: SyntaxNode): string {
  const first = node.children[0];
  if (first?.type === '<-') return '<-chan ';
  if (hasToken(node, '<-')) return 'chan<- ';
  return 'chan ';
}

/**
 * Whether an expression is evaluated as part of a constant declaration,
 * where untyped constants keep their untyped kind.
 */
function inConstContext(node: SyntaxNode): boolean {
  for (let p = node.parent; p; p = p.parent) {
    if (p.type === 'const_spec') return true;
    if (VALUE_CONTEXT_BOUNDARIES.has(p.type)) return false;
  }
  return false;
}
