import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppContext } from "../libs/context";
import { createCommand } from "../utils/commandUtil";
import { commandInputSchema } from "./commandInput";
import { mutationResult } from "./toolResult";

export const registerUpdateCommandTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "updateCommand",
    {
      title: "updateCommand",
      description: "Replace the command at the given index.",
      inputSchema: {
        index: z.number().int(),
        ...commandInputSchema,
      },
    },
    async ({ index, name, commandType, content, description }) => {
      const command = createCommand({ name, kind: commandType, payload: content, description });
      const result = await ctx.registry.update(index, command);
      return mutationResult(result, `Command updated at ${index}: ${command.name}`);
    },
  );
