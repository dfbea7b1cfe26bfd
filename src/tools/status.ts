import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../libs/context";

export const registerStatusTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "status",
    {
      title: "status",
      description: "Storage locations, command count, last load result and console size.",
      inputSchema: {},
    },
    async () => {
      const payload = {
        commandsFilePath: ctx.config.commandsFilePath,
        activityLogPath: ctx.config.activityLogFilePath,
        commandCount: ctx.registry.length,
        lastLoad: ctx.registry.lastLoad,
        console: {
          size: ctx.console.size,
          chars: ctx.console.chars,
          lastSeq: ctx.console.lastSeq,
          limit: ctx.config.consoleLimit,
          maxChars: ctx.config.consoleMaxChars,
        },
        activityTail: ctx.activity.tail(10),
      };

      return {
        content: [{ type: "text", text: ctx.registry.lastLoad.ok ? "ok" : ctx.registry.lastLoad.error }],
        structuredContent: payload,
      };
    },
  );
