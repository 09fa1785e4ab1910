/**
 * Checker and Type Table Tests
 *
 * Scope resolution and expression typing over real parse trees.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { TreeSitterFrontend } from '../frontend.js';
import { PositionIndex } from '../position-index.js';
import type { CompilationUnit, SyntaxNode, TypesInfo } from '../types.js';
import { TEST_BUILD_CONTEXT, createTempModule, removeTempModule } from '../../test-utils/index.js';

const SOURCE = `package demo

import (
	"fmt"
	str "strings"
	"net/http"
)

type Handler struct {
	Req  *http.Request
	Tags []string \`json:"tags"\`
}

type Reader interface {
	Read(p []byte) (n int, err error)
}

const Limit = 10

var Ratio = 1.5
var Count = Limit * 2
var Names = map[string]int{}
var ptr = &Handler{}
var ch = make(chan<- string)
var size = len("abc")
var ok = Count > 3
var a, b = Pair()

func Pair() (int, error) { return 0, nil }

func Use(fmt string) string {
	return fmt + str.ToUpper("x")
}

func Print() {
	fmt.Println("hi")
	str := "shadow"
	_ = str
}
`;

describe('checkPackage', () => {
  let root: string;
  let unit: CompilationUnit;
  let info: TypesInfo;
  let file: SyntaxNode;

  beforeAll(() => {
    root = createTempModule({ 'go.mod': 'module example.com/demo\n', 'demo.go': SOURCE });
    const result = new TreeSitterFrontend().load(root, {
      mode: 'project',
      positions: new PositionIndex(),
      buildContext: TEST_BUILD_CONTEXT,
    });
    const loaded = result.units[0];
    if (!loaded?.typesInfo || !loaded.syntax?.[0]) throw new Error('unit not loaded');
    unit = loaded;
    info = loaded.typesInfo;
    file = loaded.syntax[0].root;
  });

  afterAll(() => {
    removeTempModule(root);
  });

  function idents(text: string): SyntaxNode[] {
    return file.descendantsOfType(['identifier', 'package_identifier']).filter((n) => n.text === text);
  }

  function initializer(name: string): SyntaxNode {
    const spec = file
      .descendantsOfType(['var_spec', 'const_spec'])
      .find((s) => s.childForFieldName('name')?.text === name);
    const value = spec?.childForFieldName('value')?.namedChildren[0];
    if (!value) throw new Error(`no initializer for ${name}`);
    return value;
  }

  function typeSpec(name: string): SyntaxNode {
    const spec = file.descendantsOfType('type_spec').find((s) => s.childForFieldName('name')?.text === name);
    const type = spec?.childForFieldName('type');
    if (!type) throw new Error(`no type spec ${name}`);
    return type;
  }

  it('loads the package', () => {
    expect(unit.id).toBe('example.com/demo');
    expect(unit.errors).toEqual([]);
  });

  describe('objectOf', () => {
    it('resolves import names to their package', () => {
      const [, , printUse] = idents('fmt');

      expect(printUse && info.objectOf(printUse)).toEqual({
        kind: 'pkgName',
        name: 'fmt',
        imported: { path: 'fmt', name: 'fmt' },
      });
    });

    it('resolves an alias to the import path', () => {
      // [import alias, use in Use, ...]
      const [, aliasUse] = idents('str');

      expect(aliasUse && info.objectOf(aliasUse)).toEqual({
        kind: 'pkgName',
        name: 'str',
        imported: { path: 'strings', name: 'strings' },
      });
    });

    it('lets parameters shadow imports', () => {
      // [parameter name, use in Use, use in Print]
      const [param, bodyUse] = idents('fmt');

      expect(param && info.objectOf(param)).toBeUndefined();
      expect(bodyUse && info.objectOf(bodyUse)?.kind).toBe('var');
    });

    it('lets short variable declarations shadow imports after the statement', () => {
      // [import alias, use in Use, declared name in Print, use after the declaration]
      const uses = idents('str');
      const after = uses[3];

      expect(uses).toHaveLength(4);
      expect(after && info.objectOf(after)?.kind).toBe('var');
    });

    it('answers only for identifiers', () => {
      const selector = file.descendantsOfType('selector_expression')[0];

      expect(selector && info.objectOf(selector)).toBeUndefined();
    });
  });

  describe('typeOf', () => {
    it('qualifies named types with their package path', () => {
      expect(info.typeOf(typeSpec('Handler'))).toBe('struct{Req *net/http.Request; Tags []string "json:\\"tags\\""}');
    });

    it('renders interface method sets', () => {
      expect(info.typeOf(typeSpec('Reader'))).toBe('interface{Read(p []byte) (n int, err error)}');
    });

    it('keeps untyped kinds in constant declarations', () => {
      expect(info.typeOf(initializer('Limit'))).toBe('untyped int');
    });

    it('defaults untyped constants in variable declarations', () => {
      expect(info.typeOf(initializer('Ratio'))).toBe('float64');
      expect(info.typeOf(initializer('Count'))).toBe('int');
      expect(info.typeOf(initializer('ok'))).toBe('bool');
    });

    it('types composite literals, address-of and builtins', () => {
      expect(info.typeOf(initializer('Names'))).toBe('map[string]int');
      expect(info.typeOf(initializer('ptr'))).toBe('*example.com/demo.Handler');
      expect(info.typeOf(initializer('ch'))).toBe('chan<- string');
      expect(info.typeOf(initializer('size'))).toBe('int');
    });

    it('types calls of package functions as their results', () => {
      expect(info.typeOf(initializer('a'))).toBe('(int, error)');
    });

    it('returns undefined for calls into other packages', () => {
      const call = file
        .descendantsOfType('call_expression')
        .find((c) => c.childForFieldName('function')?.text === 'str.ToUpper');

      expect(call && info.typeOf(call)).toBeUndefined();
    });
  });
});
