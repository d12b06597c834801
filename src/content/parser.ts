/**
 * Parse Markdown documents: split the frontmatter header, classify the
 * document by path and read the date/slug out of post file names.
 */

import matter from "gray-matter";
import { readFileSync, existsSync } from "node:fs";
import { basename, extname, relative, sep } from "node:path";
import type { DocumentType, FrontMatter, SourceDocument } from "./types.js";

const POST_FILENAME = /^(\d{4})-(\d{2})-(\d{2})-(.+)$/;

export const MARKDOWN_EXTENSIONS = [".md", ".markdown"];

/** Relative path with `/` separators */
export function toPosix(path: string): string {
  return path.split(sep).join("/");
}

/** Classify a document from its path segments */
export function documentType(relativePath: string): DocumentType {
  const segments = relativePath.split("/").slice(0, -1);
  if (segments.includes("_posts")) return "posts";
  if (segments.includes("_drafts")) return "drafts";
  return "pages";
}

/** Directories above the `_posts` / `_drafts` folder */
export function pathCategories(relativePath: string): string[] {
  const segments = relativePath.split("/").slice(0, -1);
  const marker = segments.findIndex((s) => s === "_posts" || s === "_drafts");
  return marker > 0 ? segments.slice(0, marker) : [];
}

/**
 * Split `2021-03-14-bayesian-networks` into date and slug.
 * Returns null when the name has no valid date prefix.
 */
export function parsePostFilename(name: string): { date: Date; slug: string } | null {
  const match = POST_FILENAME.exec(name);
  if (!match) return null;
  const [, y, m, d, slug] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return { date, slug };
}

/** Parse a single Markdown document */
export function parseDocument(filePath: string, root: string): SourceDocument {
  if (!existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const raw = readFileSync(filePath, "utf-8");
  const relativePath = toPosix(relative(root, filePath));
  const type = documentType(relativePath);
  const name = basename(filePath, extname(filePath));

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(raw);
  } catch (e) {
    throw new Error(
      `Invalid frontmatter in ${relativePath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  let slug = name;
  let fileDate: Date | undefined;
  if (type === "posts") {
    const fromName = parsePostFilename(name);
    if (!fromName) {
      throw new Error(
        `Post file name must look like YYYY-MM-DD-title: ${relativePath}`
      );
    }
    slug = fromName.slug;
    fileDate = fromName.date;
  } else if (type === "drafts") {
    const fromName = parsePostFilename(name);
    if (fromName) {
      slug = fromName.slug;
      fileDate = fromName.date;
    }
  }

  // gray-matter caches by input; copy so the header is ours alone
  const frontmatter: FrontMatter = { ...parsed.data };

  return {
    filePath,
    relativePath,
    type,
    frontmatter,
    content: parsed.content,
    raw,
    slug,
    fileDate,
    pathCategories: pathCategories(relativePath),
  };
}
