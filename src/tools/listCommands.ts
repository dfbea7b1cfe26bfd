import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../libs/context";
import { entryView } from "./toolResult";

export const registerListCommandsTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "listCommands",
    {
      title: "listCommands",
      description: "List saved commands in their display order. Indices address commands in every other tool.",
      inputSchema: {},
    },
    async () => {
      const commands = ctx.registry.list().map(entryView);
      return {
        content: [
          {
            type: "text",
            text:
              commands.length === 0
                ? "no commands"
                : commands.map((c) => `${c.index}: ${c.name} [${c.commandType}]`).join("\n"),
          },
        ],
        structuredContent: { count: commands.length, commands },
      };
    },
  );
