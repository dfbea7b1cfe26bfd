import { readFile } from "node:fs/promises";
import type { RegistryEntry } from "../types/Command";
import { commandsDocumentSchema, fromPersisted, toDocument } from "./commandUtil";
import { writeFileAtomic } from "./fsUtil";

export type LoadedCommands =
  | { status: "missing" }
  | { status: "loaded"; entries: RegistryEntry[] }
  | { status: "invalid"; reason: string };

const isMissingFileError = (e: unknown) =>
  typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";

export const readCommandsFile = async (filePath: string): Promise<LoadedCommands> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (e) {
    if (isMissingFileError(e)) return { status: "missing" };
    return { status: "invalid", reason: e instanceof Error ? e.message : String(e) };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    return { status: "invalid", reason: `malformed JSON: ${e instanceof Error ? e.message : String(e)}` };
  }

  const parsed = commandsDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "document";
    return { status: "invalid", reason: `invalid document at ${where}: ${issue?.message ?? "unknown"}` };
  }

  return { status: "loaded", entries: parsed.data.commands.map(fromPersisted) };
};

export const writeCommandsFile = async (filePath: string, entries: readonly RegistryEntry[]) => {
  await writeFileAtomic(filePath, `${JSON.stringify(toDocument(entries), null, 2)}\n`);
};
