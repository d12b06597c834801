/**
 * Content collection types.
 */

export type DocumentType = "posts" | "pages" | "drafts";

/** Page-local metadata from a document header */
export type FrontMatter = Record<string, unknown>;

/** A Markdown file as read from disk, before defaults are applied */
export interface SourceDocument {
  /** Absolute path */
  filePath: string;
  /** Path relative to the site root, always `/`-separated */
  relativePath: string;
  type: DocumentType;
  /** The document's own header, exactly as written */
  frontmatter: FrontMatter;
  /** Body after the header */
  content: string;
  raw: string;
  /** File name without date prefix or extension */
  slug: string;
  /** Date taken from a `YYYY-MM-DD-` file name prefix */
  fileDate?: Date;
  /** Directories above `_posts` / `_drafts` */
  pathCategories: string[];
}

export interface BuildIssue {
  file?: string;
  message: string;
}

export interface CollectionResult {
  documents: SourceDocument[];
  issues: BuildIssue[];
}
