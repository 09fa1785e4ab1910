/**
 * Symbol Resolver Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { accessedSymbols, signature, typeText } from '../resolver.js';
import type { SyntaxNode } from '../../../frontend/index.js';
import { loadSource, removeTempModule, type LoadedSource } from '../../../test-utils/index.js';

const SOURCE = `package demo

import (
	"context"
	"net/http"
	y "gopkg.in/yaml.v3"
)

type Server struct {
	mux *http.ServeMux
}

type Config struct {
	Name string
}

func (s *Server) Handle(ctx context.Context, w http.ResponseWriter, names ...string) (int, error) {
	out, err := y.Marshal(names)
	http.Error(w, string(out), 500)
	http.Error(w, "again", 500)
	return len(out), err
}

func Local(y Config) string {
	return y.Name
}

func Odd(v *unknown.T) error {
	return nil
}
`;

function paramType(decl: SyntaxNode, index: number): SyntaxNode {
  const params = decl.childForFieldName('parameters');
  const param = params?.namedChildren.filter((c) => c.type.endsWith('parameter_declaration'))[index];
  if (!param) throw new Error(`no parameter ${index}`);
  const type = param.type === 'variadic_parameter_declaration' ? param : param.childForFieldName('type');
  if (!type) throw new Error(`parameter ${index} has no type`);
  return type;
}

describe('Symbol Resolver', () => {
  let src: LoadedSource;

  beforeAll(() => {
    src = loadSource(SOURCE);
  });

  afterAll(() => {
    removeTempModule(src.root);
  });

  describe('accessedSymbols', () => {
    it('lists qualified references sorted and deduplicated', () => {
      expect(accessedSymbols(src.decl('Handle'), src.info)).toEqual([
        'context.Context',
        'gopkg.in/yaml.v3.Marshal',
        'net/http.Error',
        'net/http.ResponseWriter',
      ]);
    });

    it('includes qualified types inside struct fields', () => {
      expect(accessedSymbols(src.decl('Server'), src.info)).toEqual(['net/http.ServeMux']);
    });

    it('ignores selections on a local that shadows an import', () => {
      expect(accessedSymbols(src.decl('Local'), src.info)).toEqual([]);
    });

    it('ignores qualifiers that are not imported', () => {
      expect(accessedSymbols(src.decl('Odd'), src.info)).toEqual([]);
    });

    it('returns an empty list without a node or type information', () => {
      expect(accessedSymbols(null, src.info)).toEqual([]);
      expect(accessedSymbols(src.decl('Handle'), undefined)).toEqual([]);
    });
  });

  describe('typeText', () => {
    it('uses the resolved type of a receiver', () => {
      const decl = src.decl('Handle');
      const receiver = decl.childForFieldName('receiver')?.namedChildren[0]?.childForFieldName('type');
      if (!receiver) throw new Error('no receiver');
      expect(typeText(receiver, src.info)).toBe('*example.com/demo.Server');
    });

    it('qualifies imported types with their path', () => {
      expect(typeText(paramType(src.decl('Handle'), 1), src.info)).toBe('net/http.ResponseWriter');
    });

    it('renders a variadic parameter from syntax', () => {
      expect(typeText(paramType(src.decl('Handle'), 2), src.info)).toBe('...string');
    });

    it('falls back to source text for unresolved qualifiers', () => {
      expect(typeText(paramType(src.decl('Odd'), 0), src.info)).toBe('*unknown.T');
    });
  });

  describe('signature', () => {
    it('renders named parameters and several results', () => {
      const decl = src.decl('Handle');
      expect(signature(decl.childForFieldName('parameters'), decl.childForFieldName('result'), src.info)).toBe(
        '(ctx context.Context, w net/http.ResponseWriter, names ...string) (int, error)'
      );
    });

    it('renders a single bare result without parentheses', () => {
      const decl = src.decl('Odd');
      expect(signature(decl.childForFieldName('parameters'), decl.childForFieldName('result'), src.info)).toBe(
        '(v *unknown.T) error'
      );
    });
  });
});
