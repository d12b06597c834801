import { describe, it, expect, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import {
  documentType,
  parseDocument,
  parsePostFilename,
  pathCategories,
} from "../../src/content/parser.js";
import { discoverDocuments, loadCollection } from "../../src/content/discover.js";
import { makeConfig } from "../fixtures/documents.js";
import { loadConfig } from "../../src/config/loader.js";

const siteDir = fileURLToPath(new URL("../fixtures/site", import.meta.url));

describe("Content parser", () => {
  describe("parsePostFilename", () => {
    it("splits date and slug", () => {
      const parsed = parsePostFilename("2021-03-14-bayesian-networks");
      expect(parsed?.slug).toBe("bayesian-networks");
      expect(parsed?.date.toISOString()).toBe("2021-03-14T00:00:00.000Z");
    });

    it("rejects names without a date", () => {
      expect(parsePostFilename("bayesian-networks")).toBeNull();
    });

    it("rejects impossible dates", () => {
      expect(parsePostFilename("2021-02-30-leap")).toBeNull();
    });
  });

  describe("documentType", () => {
    it("classifies by directory", () => {
      expect(documentType("_posts/a.md")).toBe("posts");
      expect(documentType("ml/_posts/a.md")).toBe("posts");
      expect(documentType("_drafts/a.md")).toBe("drafts");
      expect(documentType("_pages/about.md")).toBe("pages");
      expect(documentType("index.md")).toBe("pages");
    });
  });

  describe("pathCategories", () => {
    it("takes directories above _posts", () => {
      expect(pathCategories("ml/stats/_posts/a.md")).toEqual(["ml", "stats"]);
      expect(pathCategories("_posts/a.md")).toEqual([]);
      expect(pathCategories("_pages/a.md")).toEqual([]);
    });
  });

  describe("parseDocument", () => {
    it("reads frontmatter, body, date and slug of a post", () => {
      const doc = parseDocument(
        resolve(siteDir, "_posts/2021-03-14-bayesian-networks.md"),
        siteDir
      );
      expect(doc.relativePath).toBe("_posts/2021-03-14-bayesian-networks.md");
      expect(doc.type).toBe("posts");
      expect(doc.slug).toBe("bayesian-networks");
      expect(doc.fileDate?.toISOString()).toBe("2021-03-14T00:00:00.000Z");
      expect(doc.frontmatter).toEqual({
        title: "Bayesian Networks",
        categories: ["machine-learning"],
        tags: ["statistics", "graphs"],
        description: "Reasoning under uncertainty with a small example",
      });
      expect(doc.content).toBe(
        "A Bayesian network encodes conditional independence.\n\nSecond paragraph.\n"
      );
    });

    it("gives a headerless document empty frontmatter", () => {
      const doc = parseDocument(resolve(siteDir, "index.md"), siteDir);
      expect(doc.type).toBe("pages");
      expect(doc.slug).toBe("index");
      expect(doc.frontmatter).toEqual({});
      expect(doc.content).toBe("# Home\n\nLatest posts below.\n");
    });

    it("records path categories", () => {
      const doc = parseDocument(
        resolve(siteDir, "ml/_posts/2019-06-30-gradient-checks.md"),
        siteDir
      );
      expect(doc.pathCategories).toEqual(["ml"]);
    });

    it("throws for a post without a dated file name", () => {
      expect(() =>
        parseDocument(resolve(siteDir, "_posts/not-a-dated-post.md"), siteDir)
      ).toThrow("Post file name must look like YYYY-MM-DD-title: _posts/not-a-dated-post.md");
    });

    it("throws for a missing file", () => {
      expect(() => parseDocument("/nonexistent/file.md", "/nonexistent")).toThrow(
        "File not found"
      );
    });
  });

  describe("discoverDocuments", () => {
    it("skips underscore directories unless included", async () => {
      const paths = await discoverDocuments(siteDir, makeConfig("include: [_pages]"));
      expect(paths).toEqual([
        "_pages/about.md",
        "_posts/2020-11-02-dequeue-notes.md",
        "_posts/2021-03-14-bayesian-networks.md",
        "_posts/2021-05-05-hidden.md",
        "_posts/2022-01-09-uncategorised.md",
        "_posts/2030-01-01-from-the-future.md",
        "_posts/not-a-dated-post.md",
        "index.md",
        "ml/_posts/2019-06-30-gradient-checks.md",
      ]);
    });

    it("adds drafts when show_drafts is set", async () => {
      const paths = await discoverDocuments(siteDir, makeConfig("show_drafts: true"));
      expect(paths).toContain("_drafts/work-in-progress.md");
      expect(paths).not.toContain("_pages/about.md");
    });

    it("honours exclude", async () => {
      const paths = await discoverDocuments(siteDir, makeConfig("exclude: [ml, index.md]"));
      expect(paths).not.toContain("ml/_posts/2019-06-30-gradient-checks.md");
      expect(paths).not.toContain("index.md");
    });
  });

  describe("loadCollection", () => {
    it("collects unparseable files as issues", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const { documents, issues } = await loadCollection(siteDir, loadConfig(siteDir).config);
      expect(documents).toHaveLength(8);
      expect(issues).toEqual([
        {
          file: "_posts/not-a-dated-post.md",
          message: "Post file name must look like YYYY-MM-DD-title: _posts/not-a-dated-post.md",
        },
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
      warn.mockRestore();
    });
  });
});
