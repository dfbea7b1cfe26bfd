#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAppContext } from "./libs/context";
import { resolveConfig } from "./utils/configUtil";
import { registerTools } from "./tools";

// -------------------------
// Main
// -------------------------
async function main() {
  console.error("Runboard starting (stdio) ...");

  const config = resolveConfig();
  const ctx = await createAppContext(config);
  ctx.activity.record("system", "startup", `commands=${ctx.registry.length}, file=${config.commandsFilePath}`);
  console.error(`Commands file: ${config.commandsFilePath} (${ctx.registry.length} loaded)`);

  const server = new McpServer({ name: "runboard", version: "0.1.0" });

  registerTools(server, ctx);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Runboard has connected");
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
