import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppContext } from "../libs/context";

export const registerReadConsoleTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "readConsole",
    {
      title: "readConsole",
      description:
        "Read relayed command output. Pass the lastSeq of a previous call (or consoleSeq from executeCommand) as afterSeq to get only newer chunks.",
      inputSchema: {
        afterSeq: z.number().int().min(0).default(0),
        limit: z.number().int().min(1).max(1000).default(200),
      },
    },
    async ({ afterSeq, limit }) => {
      const chunks = ctx.console.read(afterSeq, limit);
      const lastSeq = chunks.length > 0 ? chunks[chunks.length - 1].seq : afterSeq;
      return {
        content: [{ type: "text", text: chunks.map((c) => c.text).join("") }],
        structuredContent: { count: chunks.length, lastSeq, chunks },
      };
    },
  );

export const registerClearConsoleTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "clearConsole",
    {
      title: "clearConsole",
      description: "Discard all buffered console output.",
      inputSchema: {},
    },
    async () => {
      const cleared = ctx.console.size;
      ctx.console.clear();
      return {
        content: [{ type: "text", text: `cleared ${cleared} chunk(s)` }],
        structuredContent: { ok: true, cleared },
      };
    },
  );
