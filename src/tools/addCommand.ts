import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../libs/context";
import { createCommand } from "../utils/commandUtil";
import { commandInputSchema } from "./commandInput";
import { mutationResult } from "./toolResult";

export const registerAddCommandTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "addCommand",
    {
      title: "addCommand",
      description:
        "Append a command. commandType: single (one shell line), multi (one line per command, run in one shell), script (path to an executable).",
      inputSchema: commandInputSchema,
    },
    async ({ name, commandType, content, description }) => {
      const command = createCommand({ name, kind: commandType, payload: content, description });
      const result = await ctx.registry.add(command);
      return mutationResult(result, `Command added: ${command.name}`);
    },
  );
