/**
 * A document after defaults, taxonomy, dates and permalinks are resolved.
 */

import type { BuildIssue, DocumentType, FrontMatter } from "../content/types.js";

export interface ResolvedDocument {
  relativePath: string;
  filePath: string;
  type: DocumentType;
  slug: string;
  /** Own metadata merged with matching defaults */
  data: FrontMatter;
  /** Body, minus the leading heading when `strip_title` used it */
  content: string;
  title: string;
  date?: Date;
  categories: string[];
  tags: string[];
  excerpt: string;
  layout?: string;
  description?: string;
  /** Published path, without baseurl */
  path: string;
  /** Published path, with baseurl */
  url: string;
}

export type SkipReason = "unpublished" | "future";

export interface SkippedDocument {
  relativePath: string;
  reason: SkipReason;
}

export interface ResolveResult {
  documents: ResolvedDocument[];
  skipped: SkippedDocument[];
  issues: BuildIssue[];
}

export interface ResolveOptions {
  /** Reference time for future-dated posts. Defaults to the current time. */
  now?: Date;
}
