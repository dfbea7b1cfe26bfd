import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppContext } from "../libs/context";
import { failureResult } from "./toolResult";

export const registerExecuteCommandTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "executeCommand",
    {
      title: "executeCommand",
      description:
        "Launch the command at the given index in the background. Returns once the process has started; read its output with readConsole.",
      inputSchema: { index: z.number().int() },
    },
    async ({ index }) => {
      const consoleSeq = ctx.console.lastSeq;
      const result = await ctx.engine.executeAt(index);
      if (!result.ok) return failureResult(result);

      return {
        content: [{ type: "text", text: `Started '${result.name}' (pid ${result.pid})` }],
        structuredContent: { ...result, consoleSeq },
      };
    },
  );
