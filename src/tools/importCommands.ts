import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppContext } from "../libs/context";
import { readCommandImport } from "../utils/commandImport";

export const registerImportCommandsTool = (server: McpServer, ctx: AppContext) =>
  server.registerTool(
    "importCommands",
    {
      title: "importCommands",
      description:
        "Append commands read from a YAML file (commands: [{ name, type, content, description }]). Invalid entries are skipped.",
      inputSchema: {
        file: z.string().min(1),
      },
    },
    async ({ file }) => {
      let imported;
      try {
        imported = await readCommandImport(file);
      } catch (e) {
        return {
          content: [{ type: "text", text: `import failed: ${e instanceof Error ? e.message : String(e)}` }],
          structuredContent: { ok: false, error: "IMPORT_FAILED" },
          isError: true,
        };
      }

      let saveError: string | null = null;
      for (const command of imported.commands) {
        const result = await ctx.registry.add(command);
        if (!result.ok) saveError = result.detail;
      }

      ctx.activity.record(
        "registry",
        "commands_imported",
        `${imported.commands.length} added, ${imported.skipped.length} skipped from ${imported.path}`,
      );

      return {
        content: [
          {
            type: "text",
            text: `imported ${imported.commands.length} command(s), skipped ${imported.skipped.length}${
              saveError ? ` (not saved: ${saveError})` : ""
            }`,
          },
        ],
        structuredContent: {
          ok: saveError === null,
          path: imported.path,
          added: imported.commands.map((c) => c.name),
          skipped: imported.skipped,
          length: ctx.registry.length,
          ...(saveError ? { error: "PERSISTENCE_FAILURE", detail: saveError } : {}),
        },
        isError: saveError !== null,
      };
    },
  );
