/**
 * MCP tool definitions for postline.
 * 5 tools: list_categories, get_category, list_tags, get_document, get_page
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { SiteModel } from "../site/build.js";
import { findDocument } from "../site/build.js";
import { findGroup, type ArchiveGroup } from "../archive/group.js";
import type { ResolvedDocument } from "../resolve/types.js";

/** Group names with entry counts */
export function groupCounts(groups: ArchiveGroup[]): Array<{ name: string; count: number }> {
  return groups.map((g) => ({ name: g.name, count: g.entries.length }));
}

/** A document without its body */
export function documentSummary(doc: ResolvedDocument) {
  return {
    relativePath: doc.relativePath,
    type: doc.type,
    title: doc.title,
    url: doc.url,
    date: doc.date?.toISOString() ?? null,
    categories: doc.categories,
    tags: doc.tags,
    layout: doc.layout ?? null,
    excerpt: doc.excerpt,
    data: doc.data,
  };
}

function text(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: typeof value === "string" ? value : JSON.stringify(value, null, 2),
      },
    ],
  };
}

export function registerTools(server: McpServer, site: SiteModel) {
  // list_categories
  server.tool(
    "list_categories",
    "List every category with the number of documents in it.",
    async () => text(groupCounts(site.categories))
  );

  // get_category
  server.tool(
    "get_category",
    "Get the archive listing (title, url, date) of one category, newest first.",
    {
      name: z.string().describe("Category name, exactly as written in frontmatter"),
    },
    async ({ name }) => {
      const group = findGroup(site.categories, name);
      return group ? text(group) : text(`Category not found: ${name}`);
    }
  );

  // list_tags
  server.tool(
    "list_tags",
    "List every tag with the number of documents carrying it.",
    async () => text(groupCounts(site.tags))
  );

  // get_document
  server.tool(
    "get_document",
    "Get a document's resolved metadata by relative path or published URL.",
    {
      ref: z.string().describe("Relative path (e.g. _posts/2021-01-01-x.md) or URL"),
      includeContent: z.boolean().default(false).describe("Include the Markdown body"),
    },
    async ({ ref, includeContent }) => {
      const doc = findDocument(site, ref);
      if (!doc) return text(`Document not found: ${ref}`);
      const summary = documentSummary(doc);
      return text(includeContent ? { ...summary, content: doc.content } : summary);
    }
  );

  // get_page
  server.tool(
    "get_page",
    "Get one post index page (posts, previous/next paths).",
    {
      page: z.number().int().min(1).default(1),
    },
    async ({ page }) => {
      const found = site.pagination.find((p) => p.page === page);
      if (!found) {
        return text(
          site.pagination.length === 0
            ? "Pagination is off"
            : `Page ${page} not found (1-${site.pagination.length})`
        );
      }
      return text({
        ...found,
        posts: found.posts.map((p) => ({ title: p.title, url: p.url })),
      });
    }
  );
}
