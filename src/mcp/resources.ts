/**
 * MCP resource definitions for postline.
 * 2 resources: site config, category archive
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SiteModel } from "../site/build.js";

export function registerResources(server: McpServer, site: SiteModel) {
  // Config resource — lets agents see defaults, permalink and pagination settings
  server.resource("config", "site://config", async () => ({
    contents: [
      {
        uri: "site://config",
        mimeType: "application/json",
        text: JSON.stringify(site.config, null, 2),
      },
    ],
  }));

  // Category archive, one fragment per category
  server.resource("archive", "site://archive", async () => ({
    contents: [
      {
        uri: "site://archive",
        mimeType: "text/html",
        text: site.fragments.map((f) => f.html).join("\n"),
      },
    ],
  }));
}
