import { z } from "zod";
import type {
  Command,
  CommandKind,
  CommandsDocument,
  PersistedCommand,
  RegistryEntry,
} from "../types/Command";

export const commandKinds = ["single", "multi", "script"] as const satisfies readonly CommandKind[];

export const isCommandKind = (value: string): value is CommandKind =>
  (commandKinds as readonly string[]).includes(value);

export const persistedCommandSchema = z.object({
  name: z.string(),
  command_type: z.string(),
  content: z.string(),
  description: z.string().default(""),
});

export const commandsDocumentSchema = z.object({
  commands: z.array(persistedCommandSchema).default([]),
});

export const createCommand = (input: {
  name: string;
  kind: CommandKind;
  payload: string;
  description?: string;
}): Command => {
  const fields = {
    name: input.name.trim(),
    payload: input.payload,
    description: (input.description ?? "").trim(),
  };
  switch (input.kind) {
    case "single":
      return Object.freeze({ ...fields, kind: "single" });
    case "multi":
      return Object.freeze({ ...fields, kind: "multi" });
    case "script":
      return Object.freeze({ ...fields, kind: "script" });
  }
};

export const fromPersisted = (raw: PersistedCommand): RegistryEntry => {
  if (isCommandKind(raw.command_type)) {
    return createCommand({
      name: raw.name,
      kind: raw.command_type,
      payload: raw.content,
      description: raw.description,
    });
  }
  return Object.freeze({
    name: raw.name,
    kind: "unrecognized",
    rawKind: raw.command_type,
    payload: raw.content,
    description: raw.description,
  });
};

export const toPersisted = (entry: RegistryEntry): PersistedCommand => ({
  name: entry.name,
  command_type: entry.kind === "unrecognized" ? entry.rawKind : entry.kind,
  content: entry.payload,
  description: entry.description,
});

export const toDocument = (entries: readonly RegistryEntry[]): CommandsDocument => ({
  commands: entries.map(toPersisted),
});

// Non-blank lines of a multi-line payload, each trimmed.
export const splitCommandLines = (payload: string): string[] =>
  payload
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

export const describeEntry = (entry: RegistryEntry) =>
  entry.kind === "unrecognized" ? `${entry.name} (${entry.rawKind}?)` : `${entry.name} (${entry.kind})`;
