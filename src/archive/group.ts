/**
 * Category / tag index, rebuilt from the current document set on every call.
 */

import type { ResolvedDocument } from "../resolve/types.js";
import { compareByDateDesc, compareNames } from "./order.js";

export interface ArchiveEntry {
  title: string;
  url: string;
  date?: Date;
  excerpt?: string;
  relativePath: string;
}

export interface ArchiveGroup {
  name: string;
  entries: ArchiveEntry[];
}

export interface GroupOptions {
  /** Attach each document's excerpt to its entry */
  excerpts?: boolean;
}

type Taxonomy = "categories" | "tags";

function groupBy(
  documents: ResolvedDocument[],
  key: Taxonomy,
  options: GroupOptions
): ArchiveGroup[] {
  const groups = new Map<string, ArchiveEntry[]>();

  for (const doc of documents) {
    // a set: a document joins each group once
    for (const name of new Set(doc[key])) {
      const entries = groups.get(name) ?? [];
      entries.push({
        title: doc.title,
        url: doc.url,
        date: doc.date,
        relativePath: doc.relativePath,
        ...(options.excerpts ? { excerpt: doc.excerpt } : {}),
      });
      groups.set(name, entries);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareNames(a, b))
    .map(([name, entries]) => ({ name, entries: entries.sort(compareByDateDesc) }));
}

export function groupByCategory(
  documents: ResolvedDocument[],
  options: GroupOptions = {}
): ArchiveGroup[] {
  return groupBy(documents, "categories", options);
}

export function groupByTag(
  documents: ResolvedDocument[],
  options: GroupOptions = {}
): ArchiveGroup[] {
  return groupBy(documents, "tags", options);
}

/** Look up one group by exact name */
export function findGroup(groups: ArchiveGroup[], name: string): ArchiveGroup | undefined {
  return groups.find((g) => g.name === name);
}
