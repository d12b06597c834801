/**
 * Find the Markdown documents that make up a site.
 */

import { resolve } from "node:path";
import { glob } from "glob";
import type { SiteConfig } from "../config/schema.js";
import { MARKDOWN_EXTENSIONS, parseDocument, toPosix } from "./parser.js";
import type { BuildIssue, CollectionResult, SourceDocument } from "./types.js";

const DEFAULT_EXCLUDES = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.postline/**",
  "**/vendor/**",
];

/**
 * A path is skipped when any directory in it starts with `_` or `.`,
 * unless it is `_posts`, `_drafts` or listed in `include`.
 */
function isHidden(relativePath: string, include: string[], showDrafts: boolean): boolean {
  const dirs = relativePath.split("/").slice(0, -1);
  let prefix = "";
  for (const dir of dirs) {
    prefix = prefix ? `${prefix}/${dir}` : dir;
    if (!dir.startsWith("_") && !dir.startsWith(".")) continue;
    if (dir === "_posts") continue;
    if (dir === "_drafts" && showDrafts) continue;
    if (include.includes(prefix) || include.includes(dir)) continue;
    return true;
  }
  return false;
}

function isExcluded(relativePath: string, exclude: string[]): boolean {
  return exclude.some((entry) => {
    const clean = entry.replace(/^\/+|\/+$/g, "");
    return relativePath === clean || relativePath.startsWith(`${clean}/`);
  });
}

/** Relative paths of every Markdown document under the site root, sorted */
export async function discoverDocuments(
  root: string,
  config: Pick<SiteConfig, "include" | "exclude" | "show_drafts" | "destination">
): Promise<string[]> {
  const patterns = MARKDOWN_EXTENSIONS.map((ext) => `**/*${ext}`);
  const found = await glob(patterns, {
    cwd: root,
    nodir: true,
    dot: true,
    ignore: [...DEFAULT_EXCLUDES, `${config.destination}/**`],
  });

  return found
    .map(toPosix)
    .filter((p) => !isHidden(p, config.include, config.show_drafts))
    .filter((p) => !isExcluded(p, config.exclude))
    .sort();
}

/** Discover and parse the whole content collection */
export async function loadCollection(
  root: string,
  config: SiteConfig
): Promise<CollectionResult> {
  const paths = await discoverDocuments(root, config);
  const documents: SourceDocument[] = [];
  const issues: BuildIssue[] = [];

  for (const relativePath of paths) {
    try {
      documents.push(parseDocument(resolve(root, relativePath), root));
    } catch (e) {
      issues.push({
        file: relativePath,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  if (issues.length > 0) {
    console.warn(
      `Warning: ${issues.length} file(s) skipped:\n` +
        issues.map((i) => `  ${i.file}: ${i.message}`).join("\n")
    );
  }

  return { documents, issues };
}
