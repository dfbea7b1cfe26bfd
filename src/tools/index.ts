import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../libs/context";
import { registerActivityLogTool } from "./activityLog";
import { registerAddCommandTool } from "./addCommand";
import { registerDeleteCommandTool } from "./deleteCommand";
import { registerExecuteCommandTool } from "./executeCommand";
import { registerImportCommandsTool } from "./importCommands";
import { registerListCommandsTool } from "./listCommands";
import { registerMoveCommandTool } from "./moveCommand";
import { registerClearConsoleTool, registerReadConsoleTool } from "./readConsole";
import { registerStatusTool } from "./status";
import { registerUpdateCommandTool } from "./updateCommand";

export const registerTools = (server: McpServer, ctx: AppContext) => {
  registerListCommandsTool(server, ctx);
  registerAddCommandTool(server, ctx);
  registerUpdateCommandTool(server, ctx);
  registerDeleteCommandTool(server, ctx);
  registerMoveCommandTool(server, ctx);
  registerExecuteCommandTool(server, ctx);
  registerReadConsoleTool(server, ctx);
  registerClearConsoleTool(server, ctx);
  registerImportCommandsTool(server, ctx);
  registerActivityLogTool(server, ctx);
  registerStatusTool(server, ctx);
};
