/**
 * Site build pipeline.
 * Wires: discover → parse → apply defaults/resolve → paginate → group → render.
 */

import type { SiteConfig } from "../config/schema.js";
import type { BuildIssue } from "../content/types.js";
import { loadCollection } from "../content/discover.js";
import { resolveCollection } from "../resolve/document.js";
import type { ResolvedDocument, SkippedDocument } from "../resolve/types.js";
import { paginate, type Paginator } from "../pagination/paginate.js";
import { groupByCategory, groupByTag, type ArchiveGroup } from "../archive/group.js";
import { renderArchive, type ArchiveFragment } from "../archive/renderer.js";
import type { ArchiveTemplate } from "../archive/templates.js";
import { compareByDateDesc } from "../archive/order.js";

export interface BuildOptions {
  /** Reference time for future-dated posts */
  now?: Date;
  /** Override the archive fragment template */
  template?: ArchiveTemplate;
}

export interface SiteModel {
  config: Readonly<SiteConfig>;
  /** Every published document, newest first */
  documents: ResolvedDocument[];
  posts: ResolvedDocument[];
  pages: ResolvedDocument[];
  categories: ArchiveGroup[];
  tags: ArchiveGroup[];
  pagination: Paginator[];
  fragments: ArchiveFragment[];
  skipped: SkippedDocument[];
  issues: BuildIssue[];
}

/** Build the site model from already-resolved documents (no file access) */
export function assembleSite(
  config: Readonly<SiteConfig>,
  resolved: ResolvedDocument[],
  options: Pick<BuildOptions, "template"> = {}
): Omit<SiteModel, "skipped" | "issues"> {
  const documents = [...resolved].sort(compareByDateDesc);
  const posts = documents.filter((d) => d.type !== "pages");
  const pages = documents.filter((d) => d.type === "pages");
  const categories = groupByCategory(documents, { excerpts: config.show_excerpts });

  return {
    config,
    documents,
    posts,
    pages,
    categories,
    tags: groupByTag(documents, { excerpts: config.show_excerpts }),
    pagination: paginate(posts, config),
    fragments: renderArchive(categories, options.template),
  };
}

/** Load, resolve and assemble the site rooted at `root` */
export async function buildSite(
  root: string,
  config: Readonly<SiteConfig>,
  options: BuildOptions = {}
): Promise<SiteModel> {
  const collection = await loadCollection(root, config);
  const resolved = resolveCollection(collection.documents, config, { now: options.now });

  return {
    ...assembleSite(config, resolved.documents, options),
    skipped: resolved.skipped,
    issues: [...collection.issues, ...resolved.issues],
  };
}

/** Find a document by relative path or URL */
export function findDocument(
  site: Pick<SiteModel, "documents">,
  ref: string
): ResolvedDocument | undefined {
  const path = ref.replace(/^\.\//, "");
  return site.documents.find((d) => d.relativePath === path || d.url === ref);
}
