/**
 * Checker
 *
 * Resolves every identifier use of a package against Go's block scopes
 * (universe, package, file, function, block) and records the result in the
 * package's TypeTable. Identifiers that cannot be resolved are left out;
 * consumers treat a missing entry as "not an import".
 */

import type { GoObject, ImportedPackage, SourceFile, SyntaxNode } from './types.js';
import { Scope, createUniverse } from './scope.js';
import { TypeTable } from './type-table.js';
import { declarationSpecs, declaredNames, hasToken, importSpecs, sameNode } from './syntax.js';

export interface CheckOptions {
  /** Import path of the package being checked */
  pkgPath: string;
  files: SourceFile[];
  /** Package name an import path resolves to when the import has no alias */
  importName: (importPath: string) => string;
}

/** Statements that open an implicit block around their clauses */
const IMPLICIT_BLOCKS = new Set([
  'if_statement',
  'for_statement',
  'expression_switch_statement',
  'select_statement',
]);

const CASE_CLAUSES = new Set([
  'expression_case',
  'default_case',
  'type_case',
  'communication_case',
]);

/**
 * Build the type table of one package.
 */
export function checkPackage(options: CheckOptions): TypeTable {
  const checker = new Checker(options);
  checker.run();
  return checker.table;
}

class Checker {
  readonly table: TypeTable;
  private readonly options: CheckOptions;
  private readonly packageScope: Scope;

  constructor(options: CheckOptions) {
    this.options = options;
    this.table = new TypeTable(options.pkgPath);
    this.packageScope = new Scope(createUniverse());
  }

  run(): void {
    for (const file of this.options.files) {
      this.declarePackageObjects(file.root);
    }
    for (const file of this.options.files) {
      this.checkFile(file.root);
    }
  }

  private declarePackageObjects(root: SyntaxNode): void {
    const pkgPath = this.options.pkgPath;
    for (const decl of root.namedChildren) {
      switch (decl.type) {
        case 'function_declaration': {
          const name = decl.childForFieldName('name');
          if (name) {
            this.packageScope.declare(name.text, { kind: 'func', name: name.text, pkgPath, decl });
          }
          break;
        }
        case 'type_declaration':
          for (const spec of declarationSpecs(decl)) {
            const name = spec.childForFieldName('name');
            if (name) {
              this.packageScope.declare(name.text, { kind: 'type', name: name.text, pkgPath });
            }
          }
          break;
        case 'var_declaration':
        case 'const_declaration': {
          const kind = decl.type === 'var_declaration' ? 'var' : 'const';
          for (const spec of declarationSpecs(decl)) {
            declaredNames(spec).forEach((name, index) => {
              this.packageScope.declare(name.text, { kind, name: name.text, pkgPath, spec, index });
            });
          }
          break;
        }
      }
    }
  }

  private checkFile(root: SyntaxNode): void {
    const fileScope = new Scope(this.packageScope);
    for (const spec of importSpecs(root)) {
      if (spec.alias === '_' || spec.alias === '.') continue;
      const imported: ImportedPackage = {
        path: spec.path,
        name: this.options.importName(spec.path),
      };
      const name = spec.alias ?? imported.name;
      fileScope.declare(name, { kind: 'pkgName', name, imported });
    }

    for (const decl of root.namedChildren) {
      switch (decl.type) {
        case 'package_clause':
        case 'import_declaration':
        case 'comment':
          break;
        case 'function_declaration':
        case 'method_declaration':
          this.walkFunction(decl, fileScope);
          break;
        case 'type_declaration':
          for (const spec of declarationSpecs(decl)) this.walkTypeSpec(spec, fileScope, true);
          break;
        case 'var_declaration':
        case 'const_declaration':
          for (const spec of declarationSpecs(decl)) this.walkValueSpec(spec, fileScope, true);
          break;
        default:
          this.walk(decl, fileScope);
      }
    }
  }

  private record(ident: SyntaxNode, scope: Scope): void {
    const object = scope.lookup(ident.text, ident.startIndex);
    if (object) {
      this.table.recordUse(ident, object);
    }
  }

  private declare(scope: Scope, ident: SyntaxNode, object: GoObject, activeFrom: number): void {
    scope.declare(ident.text, object, activeFrom);
  }

  private walkChildren(node: SyntaxNode, scope: Scope): void {
    for (const child of node.namedChildren) {
      this.walk(child, scope);
    }
  }

  private walk(node: SyntaxNode, scope: Scope): void {
    switch (node.type) {
      case 'identifier':
      case 'type_identifier':
      case 'package_identifier':
        this.record(node, scope);
        return;

      case 'field_identifier':
      case 'label_name':
      case 'comment':
        return;

      case 'selector_expression': {
        const operand = node.childForFieldName('operand');
        if (operand) this.walk(operand, scope);
        return;
      }

      case 'qualified_type': {
        const pkg = node.childForFieldName('package');
        if (pkg) this.record(pkg, scope);
        return;
      }

      case 'func_literal':
        this.walkFunction(node, scope);
        return;

      case 'function_type':
      case 'method_elem':
      case 'method_spec':
        this.walkSignature(node, new Scope(scope));
        return;

      case 'block':
        this.walkChildren(node, new Scope(scope));
        return;

      case 'short_var_declaration':
        this.walkDefinition(node, scope);
        return;

      case 'var_spec':
      case 'const_spec':
        this.walkValueSpec(node, scope, false);
        return;

      case 'type_spec':
      case 'type_alias':
        this.walkTypeSpec(node, scope, false);
        return;

      case 'range_clause':
      case 'receive_statement':
        if (hasToken(node, ':=')) {
          this.walkDefinition(node, scope);
        } else {
          this.walkChildren(node, scope);
        }
        return;

      case 'type_switch_statement':
        this.walkTypeSwitch(node, new Scope(scope));
        return;

      default:
        if (IMPLICIT_BLOCKS.has(node.type) || CASE_CLAUSES.has(node.type)) {
          this.walkChildren(node, new Scope(scope));
        } else {
          this.walkChildren(node, scope);
        }
    }
  }

  /**
   * `left := right` forms: the right side is resolved first, the new names
   * become visible after the statement.
   */
  private walkDefinition(node: SyntaxNode, scope: Scope): void {
    const left = node.childForFieldName('left');
    const right = node.childForFieldName('right');
    if (right) this.walk(right, scope);
    if (!left) return;

    const names = left.type === 'identifier' ? [left] : left.namedChildren.filter((c) => c.type === 'identifier');
    for (const name of names) {
      this.declare(scope, name, { kind: 'var', name: name.text }, node.endIndex);
    }
  }

  private walkTypeSwitch(node: SyntaxNode, scope: Scope): void {
    const alias = node.childForFieldName('alias');
    const initializer = node.childForFieldName('initializer');
    const value = node.childForFieldName('value');

    if (initializer) this.walk(initializer, scope);
    if (value) this.walk(value, scope);
    if (alias && value) {
      for (const name of alias.type === 'identifier' ? [alias] : declaredNames(alias)) {
        this.declare(scope, name, { kind: 'var', name: name.text }, value.endIndex);
      }
    }

    const skip = [alias, initializer, value].filter((n): n is SyntaxNode => n !== null);
    for (const child of node.namedChildren) {
      if (skip.some((s) => sameNode(s, child))) continue;
      this.walk(child, scope);
    }
  }

  private walkValueSpec(spec: SyntaxNode, scope: Scope, topLevel: boolean): void {
    for (const child of spec.namedChildren) {
      if (child.type !== 'identifier') this.walk(child, scope);
    }
    if (topLevel) return;

    const kind = spec.type === 'const_spec' ? 'const' : 'var';
    declaredNames(spec).forEach((name, index) => {
      this.declare(scope, name, { kind, name: name.text, spec, index }, spec.endIndex);
    });
  }

  private walkTypeSpec(spec: SyntaxNode, scope: Scope, topLevel: boolean): void {
    const name = spec.childForFieldName('name');
    if (name && !topLevel) {
      this.declare(scope, name, { kind: 'type', name: name.text }, name.startIndex);
    }

    const inner = new Scope(scope);
    const typeParams = spec.childForFieldName('type_parameters');
    if (typeParams) this.declareTypeParams(typeParams, inner, spec.startIndex);

    const type = spec.childForFieldName('type');
    if (type) this.walk(type, inner);
  }

  private declareTypeParams(list: SyntaxNode, scope: Scope, activeFrom: number): void {
    for (const decl of list.namedChildren) {
      if (decl.type !== 'type_parameter_declaration') continue;
      for (const name of declaredNames(decl)) {
        this.declare(scope, name, { kind: 'typeParam', name: name.text }, activeFrom);
      }
    }
    for (const decl of list.namedChildren) {
      const constraint = decl.childForFieldName('type');
      if (constraint) this.walk(constraint, scope);
    }
  }

  private walkFunction(node: SyntaxNode, outer: Scope): void {
    const scope = new Scope(outer);
    const start = node.startIndex;

    const typeParams = node.childForFieldName('type_parameters');
    if (typeParams) this.declareTypeParams(typeParams, scope, start);

    const receiver = node.childForFieldName('receiver');
    if (receiver) this.declareReceiverTypeParams(receiver, scope, start);

    this.walkSignature(node, scope);

    const body = node.childForFieldName('body');
    if (body) this.walkChildren(body, scope);
  }

  /**
   * Resolve the types of a receiver, parameter list and result, then bind
   * the parameter names in `scope`.
   */
  private walkSignature(node: SyntaxNode, scope: Scope): void {
    const lists = ['receiver', 'parameters', 'result']
      .map((field) => node.childForFieldName(field))
      .filter((n): n is SyntaxNode => n !== null);

    for (const list of lists) {
      if (list.type !== 'parameter_list') {
        this.walk(list, scope);
        continue;
      }
      for (const param of list.namedChildren) {
        const type = param.childForFieldName('type');
        if (type) this.walk(type, scope);
      }
    }

    for (const list of lists) {
      if (list.type !== 'parameter_list') continue;
      for (const param of list.namedChildren) {
        for (const name of declaredNames(param)) {
          this.declare(scope, name, { kind: 'var', name: name.text }, node.startIndex);
        }
      }
    }
  }

  /** `func (l *List[T]) Len()` declares T for the method */
  private declareReceiverTypeParams(receiver: SyntaxNode, scope: Scope, activeFrom: number): void {
    for (const param of receiver.namedChildren) {
      let type = param.childForFieldName('type');
      if (type?.type === 'pointer_type') type = type.namedChildren[0] ?? null;
      if (type?.type !== 'generic_type') continue;

      const args = type.childForFieldName('type_arguments');
      for (const ident of args?.descendantsOfType('type_identifier') ?? []) {
        this.declare(scope, ident, { kind: 'typeParam', name: ident.text }, activeFrom);
      }
    }
  }
}
