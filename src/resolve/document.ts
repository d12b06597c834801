/**
 * Resolve source documents into their published form.
 */

import type { SiteConfig } from "../config/schema.js";
import type { BuildIssue, SourceDocument } from "../content/types.js";
import { applyDefaults } from "../defaults/merge.js";
import { resolvePermalink, withBaseurl } from "../permalink/template.js";
import { leadingHeading, titleizeSlug } from "./headings.js";
import type {
  ResolvedDocument,
  ResolveOptions,
  ResolveResult,
  SkippedDocument,
} from "./types.js";

/** Normalise a `categories`/`tags` value: list, or whitespace-separated string */
export function toTagList(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) {
    return value
      .filter((v) => v !== null && v !== undefined)
      .map((v) => String(v).trim())
      .filter(Boolean);
  }
  if (typeof value === "string") {
    return value.split(/\s+/).filter(Boolean);
  }
  return [String(value)];
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** `title: 2021` reads as the text "2021" */
function titleText(value: unknown): string | undefined {
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return optionalString(value);
}

/**
 * Read a `date` value. gray-matter already turns YAML timestamps into Dates;
 * quoted strings are parsed here.
 */
export function parseDate(value: unknown): Date | undefined | null {
  if (value === undefined || value === null || value === "") return undefined;
  const date =
    value instanceof Date ? value : typeof value === "string" ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) return null;
  return date;
}

function excerptOf(content: string, separator: string): string {
  const body = content.replace(/^\s+/, "");
  const at = separator ? body.indexOf(separator) : -1;
  return (at === -1 ? body : body.slice(0, at)).trim();
}

/**
 * Resolve one document. Date problems are pushed to `issues`.
 * Undated drafts take `options.now`.
 */
export function resolveDocument(
  source: SourceDocument,
  config: SiteConfig,
  options: ResolveOptions = {},
  issues: BuildIssue[] = []
): ResolvedDocument {
  const data = applyDefaults(config.defaults, source);

  let content = source.content;
  let title = titleText(data.title)?.trim() || undefined;
  const headings = config.titles_from_headings;
  const headingsApply =
    headings.enabled && (source.type === "pages" || headings.collections);
  if (!title && headingsApply) {
    const heading = leadingHeading(content);
    if (heading) {
      title = heading.title;
      if (headings.strip_title) content = heading.rest;
    }
  }
  if (!title) {
    title = source.type === "pages" ? source.slug : titleizeSlug(source.slug);
  }

  let date = parseDate(data.date);
  if (date === null) {
    issues.push({
      file: source.relativePath,
      message: `Invalid date "${String(data.date)}"`,
    });
    date = undefined;
  }
  date = date ?? source.fileDate;
  if (!date && source.type === "drafts") {
    date = options.now ?? new Date();
  }

  const categories = unique([
    ...source.pathCategories,
    ...toTagList(data.category),
    ...toTagList(data.categories),
  ]);
  const tags = unique([...toTagList(data.tag), ...toTagList(data.tags)]);

  const excerpt =
    optionalString(data.excerpt) ??
    excerptOf(content, optionalString(data.excerpt_separator) ?? config.excerpt_separator);

  const path = resolvePermalink(
    {
      type: source.type,
      relativePath: source.relativePath,
      slug: optionalString(data.slug) ?? source.slug,
      categories,
      date,
      permalink: optionalString(data.permalink),
    },
    config.permalink
  );

  return {
    relativePath: source.relativePath,
    filePath: source.filePath,
    type: source.type,
    slug: source.slug,
    data,
    content,
    title,
    date,
    categories,
    tags,
    excerpt,
    layout: optionalString(data.layout),
    description: optionalString(data.description),
    path,
    url: withBaseurl(config.baseurl, path),
  };
}

/**
 * Resolve a whole collection, dropping unpublished documents (unless
 * `unpublished` is set) and future-dated posts (unless `future` is set).
 */
export function resolveCollection(
  sources: SourceDocument[],
  config: SiteConfig,
  options: ResolveOptions = {}
): ResolveResult {
  const now = options.now ?? new Date();
  const documents: ResolvedDocument[] = [];
  const skipped: SkippedDocument[] = [];
  const issues: BuildIssue[] = [];

  for (const source of sources) {
    const doc = resolveDocument(source, config, { now }, issues);

    if (doc.data.published === false && !config.unpublished) {
      skipped.push({ relativePath: doc.relativePath, reason: "unpublished" });
      continue;
    }
    if (
      doc.type !== "pages" &&
      doc.date &&
      doc.date.getTime() > now.getTime() &&
      !config.future
    ) {
      skipped.push({ relativePath: doc.relativePath, reason: "future" });
      continue;
    }

    documents.push(doc);
  }

  return { documents, skipped, issues };
}
