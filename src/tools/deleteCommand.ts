import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppContext } from "../libs/context";
import { mutationResult } from "./toolResult";

export const registerDeleteCommandTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "deleteCommand",
    {
      title: "deleteCommand",
      description: "Delete the command at the given index. Later commands shift down by one.",
      inputSchema: { index: z.number().int() },
    },
    async ({ index }) => {
      const name = ctx.registry.get(index)?.name;
      const result = await ctx.registry.delete(index);
      return mutationResult(result, `Command deleted: ${name ?? index}`);
    },
  );
