/**
 * postline — resolve a static blog's content into its navigable structure.
 * Public API facade.
 */

import { relative, resolve as resolvePath, sep } from "node:path";
import { loadConfig } from "./config/loader.js";
import type { SiteConfig } from "./config/schema.js";
import { parseDocument } from "./content/parser.js";
import type { FrontMatter } from "./content/types.js";
import { applyDefaults, effectiveDefaults } from "./defaults/merge.js";
import { resolveDocument } from "./resolve/document.js";
import type { ResolvedDocument } from "./resolve/types.js";
import { buildSite, type BuildOptions, type SiteModel } from "./site/build.js";
import { removeFragments, writeArchive } from "./archive/renderer.js";
import {
  buildManifest,
  diffManifests,
  loadManifest,
  saveManifest,
  staleFragments,
  type ManifestDiff,
} from "./site/manifest.js";

// Re-export
export { parseConfig, loadConfig, CONFIG_FILENAMES } from "./config/loader.js";
export type { LoadedConfig } from "./config/loader.js";
export { siteConfigSchema, validateConfig } from "./config/schema.js";
export type { SiteConfig, DefaultRule, DefaultScope, AuthorSetting } from "./config/schema.js";
export type {
  DocumentType,
  FrontMatter,
  SourceDocument,
  BuildIssue,
  CollectionResult,
} from "./content/types.js";
export { parseDocument, parsePostFilename, documentType } from "./content/parser.js";
export { discoverDocuments, loadCollection } from "./content/discover.js";
export { applyDefaults, effectiveDefaults, matchesScope, pathInScope } from "./defaults/merge.js";
export type { ScopeTarget } from "./defaults/merge.js";
export { resolveDocument, resolveCollection, toTagList } from "./resolve/document.js";
export type {
  ResolvedDocument,
  ResolveResult,
  ResolveOptions,
  SkippedDocument,
} from "./resolve/types.js";
export {
  resolvePermalink,
  expandStyle,
  fillTemplate,
  slugify,
  withBaseurl,
  PERMALINK_STYLES,
} from "./permalink/template.js";
export type { PermalinkInput } from "./permalink/template.js";
export { paginate, pagePath, firstPagePath } from "./pagination/paginate.js";
export type { Paginator } from "./pagination/paginate.js";
export { groupByCategory, groupByTag, findGroup } from "./archive/group.js";
export type { ArchiveEntry, ArchiveGroup, GroupOptions } from "./archive/group.js";
export { renderArchive, writeArchive, removeFragments } from "./archive/renderer.js";
export type { ArchiveFragment } from "./archive/renderer.js";
export { createArchiveTemplate, defaultArchiveTemplate } from "./archive/templates.js";
export type { ArchiveTemplate } from "./archive/templates.js";
export { buildSite, assembleSite, findDocument } from "./site/build.js";
export type { SiteModel, BuildOptions } from "./site/build.js";
export {
  buildManifest,
  computeDocumentHash,
  diffManifests,
  loadManifest,
  saveManifest,
  staleFragments,
} from "./site/manifest.js";
export type { Manifest, ManifestEntry, ManifestDiff } from "./site/manifest.js";

export interface WriteResult {
  fragments: string[];
  /** Fragments of an earlier write whose category is gone */
  removedFragments: string[];
  manifestPath: string;
  diff: ManifestDiff;
}

/** Main postline class — high-level API over one site root */
export class Postline {
  readonly root: string;
  readonly config: Readonly<SiteConfig>;
  /** Deprecation notices from loading the config */
  readonly warnings: string[];

  constructor(root: string, config: Readonly<SiteConfig>, warnings: string[] = []) {
    this.root = resolvePath(root);
    this.config = config;
    this.warnings = warnings;
  }

  /** Load the config found in `root` */
  static load(root = ".", configPath?: string): Postline {
    const loaded = loadConfig(root, configPath);
    return new Postline(root, loaded.config, loaded.warnings);
  }

  async build(options?: BuildOptions): Promise<SiteModel> {
    return buildSite(this.root, this.config, options);
  }

  /** Own metadata plus matching defaults for one file */
  metadata(file: string): { own: FrontMatter; defaults: FrontMatter; effective: FrontMatter } {
    const source = parseDocument(resolvePath(this.root, file), this.root);
    return {
      own: source.frontmatter,
      defaults: effectiveDefaults(this.config.defaults, source),
      effective: applyDefaults(this.config.defaults, source),
    };
  }

  /** Resolve a single file without building the whole site */
  resolve(file: string, now?: Date): ResolvedDocument {
    const source = parseDocument(resolvePath(this.root, file), this.root);
    return resolveDocument(source, this.config, { now });
  }

  /** Write archive fragments and the manifest; report URL changes since the last write */
  write(site: SiteModel, outputDir?: string): WriteResult {
    const dir = resolvePath(this.root, outputDir ?? `${this.config.destination}/categories`);
    const fragments = writeArchive(site.fragments, dir);
    const written = fragments.map((f) => relative(this.root, f).split(sep).join("/"));
    const manifest = buildManifest(site.documents, new Date(), written);
    const previous = loadManifest(this.root);
    const diff = diffManifests(previous, manifest);
    const removedFragments = removeFragments(staleFragments(previous, manifest), this.root);
    const manifestPath = saveManifest(this.root, manifest);
    return { fragments, removedFragments, manifestPath, diff };
  }
}
