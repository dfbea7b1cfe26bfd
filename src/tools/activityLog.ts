import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppContext } from "../libs/context";

export const registerActivityLogTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "activityLog",
    {
      title: "activityLog",
      description: "Recent registry and execution events (loads, saves, launches, rejections).",
      inputSchema: {
        limit: z.number().int().min(1).max(500).default(50),
      },
    },
    async ({ limit }) => {
      const events = ctx.activity.tail(limit);
      return {
        content: [
          {
            type: "text",
            text: events.map((e) => `${e.timestamp} ${e.action}${e.detail ? `: ${e.detail}` : ""}`).join("\n"),
          },
        ],
        structuredContent: {
          count: events.length,
          events,
          activityLogPath: ctx.config.activityLogFilePath,
        },
      };
    },
  );
