/**
 * Path/type scoped default attributes.
 *
 * A document's own metadata always wins. Matching rules only fill in keys
 * that are still missing, in declaration order, so an earlier rule is never
 * overwritten by a later one.
 */

import type { DefaultRule, DefaultScope } from "../config/schema.js";
import type { DocumentType, FrontMatter } from "../content/types.js";

/** The parts of a document that scope matching looks at */
export interface ScopeTarget {
  relativePath: string;
  type: DocumentType;
  frontmatter: FrontMatter;
}

function trimSlashes(path: string): string {
  return path.replace(/^\.?\/+/, "").replace(/\/+$/, "");
}

/** Segment-aware prefix test: `_posts` matches `_posts/a.md` but not `_posts-old/a.md` */
export function pathInScope(scopePath: string, relativePath: string): boolean {
  const scope = trimSlashes(scopePath);
  if (scope === "") return true;
  const path = trimSlashes(relativePath);
  return path === scope || path.startsWith(`${scope}/`);
}

export function matchesScope(scope: DefaultScope, target: ScopeTarget): boolean {
  if (!pathInScope(scope.path, target.relativePath)) return false;
  if (scope.type !== undefined && scope.type !== target.type) return false;
  return true;
}

/**
 * Effective metadata: own keys unchanged, plus every missing default key.
 * Default values are copied, so documents never share a nested mapping
 * with the config or with each other.
 */
export function applyDefaults(rules: readonly DefaultRule[], target: ScopeTarget): FrontMatter {
  const merged: FrontMatter = { ...target.frontmatter };
  for (const rule of rules) {
    if (!matchesScope(rule.scope, target)) continue;
    for (const [key, value] of Object.entries(rule.values)) {
      if (!Object.hasOwn(merged, key)) {
        merged[key] = structuredClone(value);
      }
    }
  }
  return merged;
}

/** Only the keys that defaults contributed */
export function effectiveDefaults(
  rules: readonly DefaultRule[],
  target: ScopeTarget
): FrontMatter {
  const merged = applyDefaults(rules, target);
  const contributed: FrontMatter = {};
  for (const [key, value] of Object.entries(merged)) {
    if (!Object.hasOwn(target.frontmatter, key)) {
      contributed[key] = value;
    }
  }
  return contributed;
}
