/**
 * Qualifier Rewriter
 *
 * Rewrites import aliases used as qualifiers (`yaml.Marshal`) in a chunk's
 * text into full import paths (`gopkg.in/yaml.v3.Marshal`), so the chunk
 * reads the same outside its file.
 *
 * The rewrite is textual: every `<alias>.` in the text is replaced,
 * including occurrences inside string literals and comments. Formatting
 * outside the rewritten tokens is preserved byte for byte.
 */

import type { SyntaxNode, TypesInfo } from '../../frontend/index.js';
import { forEachQualifiedAccess } from './resolver.js';

/**
 * Alias → full import path for every qualifier used in a subtree. Aliases
 * that already equal their import path are left out.
 */
export function collectQualifiers(node: SyntaxNode, info: TypesInfo): Map<string, string> {
  const replacements = new Map<string, string>();
  forEachQualifiedAccess(node, info, (access) => {
    if (access.alias !== access.imported.path) {
      replacements.set(access.alias, access.imported.path);
    }
  });
  return replacements;
}

/**
 * Placeholder for the i-th alias. NUL never appears in Go source text, so
 * a placeholder cannot collide with an alias or an import path.
 */
function placeholder(index: number): string {
  return `\u0000q${index}\u0000`;
}

function longestFirst(a: string, b: string): number {
  return b.length - a.length || (a < b ? -1 : a > b ? 1 : 0);
}

/**
 * Replace `<alias>.` by `<path>.` for every entry of `replacements`.
 *
 * Two phases: aliases are first swapped for placeholders, longest alias
 * first, then placeholders are swapped for paths. An import path that
 * contains another alias (or a shorter alias that prefixes a longer one)
 * is never rewritten twice.
 */
export function applyReplacements(text: string, replacements: ReadonlyMap<string, string>): string {
  if (replacements.size === 0) {
    return text;
  }

  const aliases = [...replacements.keys()].sort(longestFirst);
  const final = new Map<string, string>();

  let out = text;
  aliases.forEach((alias, index) => {
    const token = placeholder(index);
    final.set(token, replacements.get(alias) ?? alias);
    out = out.split(`${alias}.`).join(`${token}.`);
  });

  for (const token of [...final.keys()].sort(longestFirst)) {
    out = out.split(`${token}.`).join(`${final.get(token) ?? token}.`);
  }
  return out;
}

/**
 * Rewrite the qualifiers of `node` inside `text`. Returns `text` itself
 * when nothing needs rewriting.
 */
export function applyQualifierReplacements(
  text: string,
  node: SyntaxNode | null | undefined,
  info: TypesInfo | undefined
): string {
  if (!node || !info) {
    return text;
  }
  return applyReplacements(text, collectQualifiers(node, info));
}
