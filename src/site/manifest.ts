/**
 * Build manifest: one content hash per published URL.
 * Persisted at <root>/.postline/manifest.json so the next build can report
 * what changed.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import deepEqual from "fast-deep-equal";
import hash from "object-hash";
import type { ResolvedDocument } from "../resolve/types.js";

const MANIFEST_FILENAME = "manifest.json";
const STATE_DIR = ".postline";

export interface ManifestEntry {
  path: string;
  hash: string;
  categories: string[];
}

export interface Manifest {
  generatedAt: string;
  entries: Record<string, ManifestEntry>;
  /** Archive fragment files written with this manifest, relative to the site root */
  fragments?: string[];
}

export interface ManifestDiff {
  added: string[];
  changed: string[];
  removed: string[];
}

/** Deterministic hash of everything that shapes a document's output */
export function computeDocumentHash(doc: ResolvedDocument): string {
  return hash(
    { url: doc.url, data: doc.data, content: doc.content },
    { algorithm: "sha1", encoding: "hex" }
  );
}

export function buildManifest(
  documents: ResolvedDocument[],
  generatedAt = new Date(),
  fragments?: string[]
): Manifest {
  const entries: Record<string, ManifestEntry> = {};
  for (const doc of documents) {
    entries[doc.url] = {
      path: doc.relativePath,
      hash: computeDocumentHash(doc),
      categories: doc.categories,
    };
  }
  const manifest: Manifest = { generatedAt: generatedAt.toISOString(), entries };
  if (fragments) manifest.fragments = [...fragments].sort();
  return manifest;
}

function isManifest(value: unknown): value is Manifest {
  if (typeof value !== "object" || value === null) return false;
  if (!("entries" in value) || !("generatedAt" in value)) return false;
  if ("fragments" in value) {
    const { fragments } = value;
    if (!Array.isArray(fragments) || !fragments.every((f) => typeof f === "string")) {
      return false;
    }
  }
  return typeof value.entries === "object" && value.entries !== null;
}

/** Load the previous manifest. Missing or corrupt files read as null. */
export function loadManifest(root: string): Manifest | null {
  const path = join(root, STATE_DIR, MANIFEST_FILENAME);
  if (!existsSync(path)) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
    return isManifest(parsed) ? parsed : null;
  } catch {
    // Corrupt manifest — treat as missing
    return null;
  }
}

export function saveManifest(root: string, manifest: Manifest): string {
  const dir = join(root, STATE_DIR);
  mkdirSync(dir, { recursive: true });
  const path = join(dir, MANIFEST_FILENAME);
  writeFileSync(path, JSON.stringify(manifest, null, 2) + "\n", "utf8");
  return path;
}

/** Fragment files listed in `previous` that `current` no longer writes */
export function staleFragments(previous: Manifest | null, current: Manifest): string[] {
  const keep = new Set(current.fragments ?? []);
  return (previous?.fragments ?? []).filter((f) => !keep.has(f)).sort();
}

/** URLs added, changed or removed between two manifests, each sorted */
export function diffManifests(previous: Manifest | null, current: Manifest): ManifestDiff {
  const before = previous?.entries ?? {};
  const added: string[] = [];
  const changed: string[] = [];
  const removed: string[] = [];

  for (const [url, entry] of Object.entries(current.entries)) {
    const prev = before[url];
    if (!prev) {
      added.push(url);
    } else if (!deepEqual(prev, entry)) {
      changed.push(url);
    }
  }
  for (const url of Object.keys(before)) {
    if (!current.entries[url]) {
      removed.push(url);
    }
  }

  return { added: added.sort(), changed: changed.sort(), removed: removed.sort() };
}
