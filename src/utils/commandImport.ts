import { readFile } from "node:fs/promises";
import path from "node:path";
import * as YAML from "yaml";
import type { Command } from "../types/Command";
import { createCommand, isCommandKind, splitCommandLines } from "./commandUtil";

type CommandDoc = {
  commands?: Array<{
    name?: unknown;
    type?: unknown;
    content?: unknown;
    description?: unknown;
  }>;
};

export type ImportedCommands = {
  path: string;
  commands: Command[];
  skipped: string[];
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toDoc = (parsed: unknown): CommandDoc => {
  if (!isRecord(parsed) || !Array.isArray(parsed.commands)) return {};
  return { commands: parsed.commands.filter(isRecord) };
};

/**
 * Reads command definitions from a YAML file:
 *
 * ```yaml
 * commands:
 *   - name: Disk usage
 *     type: single
 *     content: df -h
 * ```
 *
 * Entries without a name, a known type or non-blank content are skipped and
 * listed in `skipped`.
 */
export const readCommandImport = async (filePath: string, cwd: string = process.cwd()): Promise<ImportedCommands> => {
  const targetPath = path.isAbsolute(filePath) ? filePath : path.resolve(cwd, filePath);
  const text = await readFile(targetPath, "utf8");
  const list = toDoc(YAML.parse(text)).commands ?? [];

  const commands: Command[] = [];
  const skipped: string[] = [];

  list.forEach((c, i) => {
    const name = typeof c.name === "string" ? c.name.trim() : "";
    const type = typeof c.type === "string" ? c.type : "";
    const content = typeof c.content === "string" ? c.content : "";

    if (!name) {
      skipped.push(`#${i}: missing name`);
      return;
    }
    if (!isCommandKind(type)) {
      skipped.push(`#${i} ${name}: unknown type '${type}'`);
      return;
    }
    if (splitCommandLines(content).length === 0) {
      skipped.push(`#${i} ${name}: empty content`);
      return;
    }

    commands.push(
      createCommand({
        name,
        kind: type,
        payload: content,
        description: typeof c.description === "string" ? c.description : "",
      }),
    );
  });

  return { path: targetPath, commands, skipped };
};
