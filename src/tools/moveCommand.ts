import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppContext } from "../libs/context";
import { mutationResult } from "./toolResult";

export const registerMoveCommandTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "moveCommand",
    {
      title: "moveCommand",
      description:
        "Move a command: it is removed from `from` and re-inserted at `to` in the shortened list. Both must be valid current indices.",
      inputSchema: {
        from: z.number().int(),
        to: z.number().int(),
      },
    },
    async ({ from, to }) => {
      const result = await ctx.registry.move(from, to);
      return mutationResult(result, `Command moved: ${from} -> ${to}`);
    },
  );
