export type CommandKind = "single" | "multi" | "script";

type CommandFields = {
  readonly name: string;
  readonly payload: string; // shell line, newline-delimited lines, or script path
  readonly description: string;
};

export type SingleCommand = CommandFields & { readonly kind: "single" };
export type MultiCommand = CommandFields & { readonly kind: "multi" };
export type ScriptCommand = CommandFields & { readonly kind: "script" };

export type Command = SingleCommand | MultiCommand | ScriptCommand;

// Loaded from a hand-edited document with a command_type we don't know.
// Kept so it round-trips to disk, rejected when executed.
export type UnrecognizedCommand = CommandFields & {
  readonly kind: "unrecognized";
  readonly rawKind: string;
};

export type RegistryEntry = Command | UnrecognizedCommand;

export type PersistedCommand = {
  name: string;
  command_type: string;
  content: string;
  description: string;
};

export type CommandsDocument = {
  commands: PersistedCommand[];
};
