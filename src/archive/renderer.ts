/**
 * Render archive groups to HTML fragments and write them out.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync, rmSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { slugify } from "../permalink/template.js";
import type { ArchiveGroup } from "./group.js";
import {
  defaultArchiveTemplate,
  resolveFilePattern,
  type ArchiveTemplate,
} from "./templates.js";

export interface ArchiveFragment {
  group: ArchiveGroup;
  /** Anchor / file slug, unique within one render */
  slug: string;
  /** Output path relative to the archive directory */
  filePath: string;
  html: string;
}

/**
 * Unique slug per group. Names that slug to nothing get `group-N`; clashes
 * get the first free numeric suffix in group order.
 */
export function groupSlugs(groups: ArchiveGroup[]): string[] {
  const taken = new Set(groups.map((group) => slugify(group.name, true)));
  const used = new Set<string>();
  return groups.map((group, index) => {
    const base = slugify(group.name, true) || `group-${index + 1}`;
    let slug = base;
    // suffixes never take a slug some other name maps to
    for (let n = 2; used.has(slug) || (slug !== base && taken.has(slug)); n++) {
      slug = `${base}-${n}`;
    }
    used.add(slug);
    return slug;
  });
}

/** Render one fragment per group */
export function renderArchive(
  groups: ArchiveGroup[],
  template: ArchiveTemplate = defaultArchiveTemplate
): ArchiveFragment[] {
  const slugs = groupSlugs(groups);
  return groups.map((group, i) => {
    const slug = slugs[i];
    const items = group.entries.map((entry) => template.renderEntry(entry));
    return {
      group,
      slug,
      filePath: resolveFilePattern(template.filePattern, group, slug),
      html: template.renderGroup(group, slug, items),
    };
  });
}

/** Write one fragment. Identical existing files are left untouched. */
export function writeFragment(fragment: ArchiveFragment, outputDir: string): string {
  const filePath = resolve(outputDir, fragment.filePath);
  mkdirSync(dirname(filePath), { recursive: true });

  if (existsSync(filePath)) {
    const existing = readFileSync(filePath, "utf-8");
    if (existing === fragment.html) return filePath;
  }

  writeFileSync(filePath, fragment.html, "utf-8");
  return filePath;
}

export function writeArchive(fragments: ArchiveFragment[], outputDir: string): string[] {
  return fragments.map((f) => writeFragment(f, outputDir));
}

/** Delete fragment files, paths relative to `root`. Returns the ones that existed. */
export function removeFragments(files: string[], root: string): string[] {
  const removed: string[] = [];
  for (const file of files) {
    const filePath = resolve(root, file);
    if (!existsSync(filePath)) continue;
    rmSync(filePath);
    removed.push(filePath);
  }
  return removed;
}
