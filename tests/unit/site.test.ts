import { describe, it, expect, beforeAll, afterEach, vi } from "vitest";
import { cpSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";
import { Postline } from "../../src/index.js";
import { buildSite, findDocument, type SiteModel } from "../../src/site/build.js";
import {
  buildManifest,
  computeDocumentHash,
  diffManifests,
  loadManifest,
  saveManifest,
  type Manifest,
} from "../../src/site/manifest.js";
import { documentSummary, groupCounts } from "../../src/mcp/tools.js";

const siteDir = fileURLToPath(new URL("../fixtures/site", import.meta.url));
const now = new Date(Date.UTC(2026, 0, 1));

describe("Site build", () => {
  let site: SiteModel;

  beforeAll(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    site = await buildSite(siteDir, Postline.load(siteDir).config, { now });
    vi.restoreAllMocks();
  });

  it("orders published documents newest first, undated last", () => {
    expect(site.documents.map((d) => d.url)).toEqual([
      "/blog/2022/01/09/uncategorised.html",
      "/blog/2021/03/14/bayesian-networks.html",
      "/blog/2020/11/02/dequeue-notes.html",
      "/blog/2019/06/30/gradient-checks.html",
      "/",
      "/about/",
    ]);
    expect(site.posts).toHaveLength(4);
    expect(site.pages.map((p) => p.title)).toEqual(["Home", "About"]);
  });

  it("reports skipped documents and unreadable files", () => {
    expect(site.skipped).toEqual([
      { relativePath: "_posts/2021-05-05-hidden.md", reason: "unpublished" },
      { relativePath: "_posts/2030-01-01-from-the-future.md", reason: "future" },
    ]);
    expect(site.issues.map((i) => i.file)).toEqual(["_posts/not-a-dated-post.md"]);
  });

  it("merges scoped defaults under document metadata", () => {
    const bayes = findDocument(site, "_posts/2021-03-14-bayesian-networks.md");
    expect(bayes?.data).toEqual({
      title: "Bayesian Networks",
      categories: ["machine-learning"],
      tags: ["statistics", "graphs"],
      description: "Reasoning under uncertainty with a small example",
      author: "Test Author",
      layout: "post",
      comments: true,
      toc: true,
      share: true,
    });

    const loose = findDocument(site, "/blog/2022/01/09/uncategorised.html");
    expect(loose?.layout).toBe("page");

    const gradient = findDocument(site, "ml/_posts/2019-06-30-gradient-checks.md");
    expect(gradient?.data.share).toBeUndefined();

    const about = findDocument(site, "/about/");
    expect(about?.data.masthead).toBe("masthead.html");
  });

  it("takes a missing title from the leading heading and strips it", () => {
    const notes = findDocument(site, "_posts/2020-11-02-dequeue-notes.md");
    expect(notes?.title).toBe("Notes on Deques");
    expect(notes?.content).toBe("A deque supports pushes at both ends.\n\nMore details.\n");
    expect(notes?.excerpt).toBe("A deque supports pushes at both ends.");
  });

  it("groups documents by category", () => {
    expect(site.categories.map((g) => [g.name, g.entries.map((e) => e.title)])).toEqual([
      ["data-structures", ["Notes on Deques"]],
      ["haskell", ["Notes on Deques"]],
      ["machine-learning", ["Bayesian Networks", "Gradient Checks"]],
      ["ml", ["Gradient Checks"]],
    ]);
  });

  it("groups documents by tag", () => {
    expect(site.tags.map((g) => [g.name, g.entries.length])).toEqual([
      ["graphs", 1],
      ["statistics", 2],
    ]);
  });

  it("paginates posts", () => {
    expect(site.pagination.map((p) => p.posts.map((x) => x.slug))).toEqual([
      ["uncategorised", "bayesian-networks"],
      ["dequeue-notes", "gradient-checks"],
    ]);
    expect(site.pagination[0].nextPagePath).toBe("/blog/page2/");
    expect(site.pagination[1].previousPagePath).toBe("/blog/");
  });

  it("renders one fragment per category", () => {
    expect(site.fragments.map((f) => f.filePath)).toEqual([
      "data-structures.html",
      "haskell.html",
      "machine-learning.html",
      "ml.html",
    ]);
    expect(site.fragments[1].html).toBe(
      [
        '<section id="haskell" class="taxonomy__section">',
        '  <h2 class="archive__subtitle">haskell</h2>',
        '  <ul class="archive__list">',
        '    <li class="archive__item"><a href="/blog/2020/11/02/dequeue-notes.html">Notes on Deques</a> <time datetime="2020-11-02">2020-11-02</time> <p class="archive__item-excerpt">A deque supports pushes at both ends.</p></li>',
        "  </ul>",
        "</section>",
        "",
      ].join("\n")
    );
  });

  it("summarises for MCP clients", () => {
    expect(groupCounts(site.categories)).toEqual([
      { name: "data-structures", count: 1 },
      { name: "haskell", count: 1 },
      { name: "machine-learning", count: 2 },
      { name: "ml", count: 1 },
    ]);
    const about = findDocument(site, "_pages/about.md");
    expect(about && documentSummary(about)).toMatchObject({
      relativePath: "_pages/about.md",
      type: "pages",
      title: "About",
      url: "/about/",
      date: null,
      categories: [],
    });
  });
});

describe("Manifest", () => {
  const base: Manifest = {
    generatedAt: "2026-01-01T00:00:00.000Z",
    entries: {
      "/a/": { path: "a.md", hash: "1", categories: [] },
      "/b/": { path: "b.md", hash: "2", categories: ["x"] },
      "/c/": { path: "c.md", hash: "3", categories: [] },
    },
  };

  it("diffs added, changed and removed URLs", () => {
    const next: Manifest = {
      generatedAt: "2026-01-02T00:00:00.000Z",
      entries: {
        "/a/": { path: "a.md", hash: "1", categories: [] },
        "/b/": { path: "b.md", hash: "2", categories: ["y"] },
        "/d/": { path: "d.md", hash: "4", categories: [] },
      },
    };
    expect(diffManifests(base, next)).toEqual({
      added: ["/d/"],
      changed: ["/b/"],
      removed: ["/c/"],
    });
  });

  it("treats everything as added without a previous manifest", () => {
    expect(diffManifests(null, base).added).toEqual(["/a/", "/b/", "/c/"]);
  });

  describe("on disk", () => {
    let root: string;

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it("round-trips and ignores a corrupt file", () => {
      root = join(tmpdir(), `postline-test-${randomUUID()}`);
      mkdirSync(root, { recursive: true });
      expect(loadManifest(root)).toBeNull();

      const path = saveManifest(root, base);
      expect(path).toBe(join(root, ".postline", "manifest.json"));
      expect(loadManifest(root)).toEqual(base);

      writeFileSync(path, "{ not json", "utf8");
      expect(loadManifest(root)).toBeNull();
    });
  });
});

describe("Postline", () => {
  let root: string;

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("writes fragments and reports changes between builds", async () => {
    root = join(tmpdir(), `postline-test-${randomUUID()}`);
    cpSync(siteDir, root, { recursive: true });
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const postline = Postline.load(root);
    expect(postline.warnings).toEqual([
      'defaults[0]: scope type "page" is deprecated, use "pages"',
    ]);

    const first = postline.write(await postline.build({ now }));
    expect(first.fragments).toHaveLength(4);
    expect(existsSync(join(root, "_site", "categories", "haskell.html"))).toBe(true);
    expect(first.diff.added).toHaveLength(6);

    writeFileSync(
      join(root, "_posts", "2022-01-09-uncategorised.md"),
      "---\ntitle: Loose Thoughts\nlayout: page\n---\nEdited.\n",
      "utf8"
    );
    const second = postline.write(await postline.build({ now }));
    expect(second.diff).toEqual({
      added: [],
      changed: ["/blog/2022/01/09/uncategorised.html"],
      removed: [],
    });

    const manifest = JSON.parse(readFileSync(second.manifestPath, "utf8"));
    expect(Object.keys(manifest.entries)).toHaveLength(6);
    expect(second.removedFragments).toEqual([]);
    vi.restoreAllMocks();
  });

  it("removes fragments of categories that no longer exist", async () => {
    root = join(tmpdir(), `postline-test-${randomUUID()}`);
    cpSync(siteDir, root, { recursive: true });
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const postline = Postline.load(root);
    const stale = join(root, "_site", "categories", "data-structures.html");
    postline.write(await postline.build({ now }));
    expect(existsSync(stale)).toBe(true);

    writeFileSync(
      join(root, "_posts", "2020-11-02-dequeue-notes.md"),
      "---\ncategories: haskell\n---\n# Notes on Deques\n\nBody.\n",
      "utf8"
    );
    const next = postline.write(await postline.build({ now }));
    expect(next.fragments).toHaveLength(3);
    expect(next.removedFragments).toEqual([stale]);
    expect(existsSync(stale)).toBe(false);
    expect(existsSync(join(root, "_site", "categories", "haskell.html"))).toBe(true);

    const manifest = loadManifest(root);
    expect(manifest?.fragments).toEqual([
      "_site/categories/haskell.html",
      "_site/categories/machine-learning.html",
      "_site/categories/ml.html",
    ]);
    vi.restoreAllMocks();
  });

  it("explains a document's metadata and URL", () => {
    root = join(tmpdir(), `postline-test-${randomUUID()}`);
    cpSync(siteDir, root, { recursive: true });
    const postline = Postline.load(root);

    const meta = postline.metadata("_posts/2022-01-09-uncategorised.md");
    expect(meta.own).toEqual({ title: "Loose Thoughts", layout: "page" });
    expect(meta.defaults).toEqual({
      author: "Test Author",
      comments: true,
      toc: true,
      share: true,
    });
    expect(meta.effective.layout).toBe("page");

    expect(postline.resolve("_posts/2021-03-14-bayesian-networks.md").url).toBe(
      "/blog/2021/03/14/bayesian-networks.html"
    );
  });

  it("hashes documents deterministically", () => {
    root = join(tmpdir(), `postline-test-${randomUUID()}`);
    cpSync(siteDir, root, { recursive: true });
    const postline = Postline.load(root);
    const a = postline.resolve("_pages/about.md");
    const b = postline.resolve("_pages/about.md");
    expect(computeDocumentHash(a)).toBe(computeDocumentHash(b));
    expect(buildManifest([a]).entries["/about/"].path).toBe("_pages/about.md");
  });
});
