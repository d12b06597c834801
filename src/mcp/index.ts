/**
 * MCP server entrypoint — stdio transport.
 * Exposes the resolved site (archive, documents, pagination) as read-only
 * MCP tools + resources.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Postline } from "../index.js";
import type { BuildOptions } from "../site/build.js";
import { registerTools } from "./tools.js";
import { registerResources } from "./resources.js";

/** Build the server over an already-resolved site */
export async function createMcpServer(
  site: Postline,
  options?: BuildOptions
): Promise<McpServer> {
  const model = await site.build(options);

  const server = new McpServer({
    name: "postline",
    version: "0.1.0",
  });

  registerTools(server, model);
  registerResources(server, model);
  return server;
}

export async function startMcpServer(root = ".", configPath?: string) {
  const server = await createMcpServer(Postline.load(root, configPath));
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}
